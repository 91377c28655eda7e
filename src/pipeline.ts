import * as core from "@actions/core";
import type { Aggregation } from "./aggregate/stats.js";
import type { HubConfig } from "./config.js";
import { buildSnapshot } from "./output/snapshot.js";
import type { RunFailure, Snapshot } from "./output/schema.js";
import type {
  ClassifiedIssue,
  Issue,
  Registry,
  SourceFetchResult,
} from "./sources/types.js";

export interface PipelineResult {
  sourcesSucceeded: number;
  sourcesFailed: number;
  issuesFetched: number;
  issuesSkipped: number;
  failures: RunFailure[];
}

export interface PipelineDeps {
  fetch: (registry: Registry, config: HubConfig) => Promise<SourceFetchResult[]>;
  classify: (issues: Issue[], registry: Registry, config: HubConfig) => ClassifiedIssue[];
  aggregate: (
    issues: ClassifiedIssue[],
    registry: Registry,
    results: SourceFetchResult[]
  ) => Aggregation;
  persist: (snapshot: Snapshot, config: HubConfig) => Promise<void>;
  now?: () => Date;
}

/**
 * Nothing is written until every source has been fetched and counted, so a
 * run that dies halfway leaves the last published snapshot untouched.
 */
export async function runPipeline(
  config: HubConfig,
  registry: Registry,
  deps: PipelineDeps
): Promise<PipelineResult> {
  core.info("Stage 1/4: Fetching issues...");
  const results = await deps.fetch(registry, config);
  const fetched = results.flatMap((r) => r.issues);
  core.info(`  Fetched ${fetched.length} issues from ${results.length} sources`);

  core.info("Stage 2/4: Classifying issues...");
  const classified = deps.classify(fetched, registry, config);

  core.info("Stage 3/4: Aggregating...");
  const aggregation = deps.aggregate(classified, registry, results);
  const { by_priority: p } = aggregation.statistics;
  core.info(
    `  critical ${p.critical}, high ${p.high}, normal ${p.normal}, low ${p.low}`
  );

  core.info("Stage 4/4: Writing snapshot...");
  const snapshot = buildSnapshot({
    issues: classified,
    aggregation,
    registry,
    results,
    generatedAt: (deps.now ?? (() => new Date()))(),
    lookbackDaysNew: config.classification.lookback_days_new,
  });
  await deps.persist(snapshot, config);

  const { run } = snapshot;
  core.info(
    `  ${run.sources_succeeded} sources succeeded, ${run.sources_failed} failed, ${run.issues_skipped} issues skipped`
  );

  return {
    sourcesSucceeded: run.sources_succeeded,
    sourcesFailed: run.sources_failed,
    issuesFetched: run.issues_fetched,
    issuesSkipped: run.issues_skipped,
    failures: run.failures,
  };
}
