import { existsSync, readFileSync, readdirSync } from "node:fs";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import * as core from "@actions/core";
import type { z } from "zod";
import type { Aggregation } from "../aggregate/stats.js";
import { PersistenceError, describeError } from "../errors.js";
import type {
  ClassifiedIssue,
  Registry,
  SourceFetchResult,
} from "../sources/types.js";
import {
  IssuesByRepoFileSchema,
  IssuesFileSchema,
  RunFileSchema,
  SNAPSHOT_FILES,
  SourcesFileSchema,
  StatisticsSchema,
  type IssueRecord,
  type RunFailure,
  type Snapshot,
} from "./schema.js";

const SNAPSHOT_KEYS: readonly (keyof Snapshot)[] = [
  "issues",
  "issuesByRepo",
  "stats",
  "sources",
  "run",
];

export interface SnapshotFs {
  mkdir: (path: string, options: { recursive: true }) => Promise<unknown>;
  writeFile: (path: string, data: string, encoding: "utf-8") => Promise<void>;
  rename: (from: string, to: string) => Promise<void>;
  rm: (path: string, options: { recursive: true; force: true }) => Promise<void>;
}

const nodeFs: SnapshotFs = { mkdir, writeFile, rename, rm };

export function toIssueRecord(issue: ClassifiedIssue): IssueRecord {
  return {
    id: issue.id,
    number: issue.number,
    repo: issue.repo,
    category: issue.category,
    category_label: issue.categoryLabel,
    title: issue.title,
    url: issue.url,
    author: issue.author,
    author_avatar: issue.authorAvatar,
    created_at: issue.createdAt,
    updated_at: issue.updatedAt,
    comments: issue.comments,
    labels: issue.labels,
    body_preview: issue.bodyPreview,
    is_new: issue.isNew,
    priority: issue.priority,
    type: issue.type,
    friendly: issue.friendly,
    help_wanted: issue.helpWanted,
  };
}

export function collectFailures(results: SourceFetchResult[]): RunFailure[] {
  const failures: RunFailure[] = [];
  for (const result of results) {
    if (result.error) {
      failures.push({
        repo: result.source.repo,
        kind: result.error.kind,
        status: result.error.status ?? null,
        message: result.error.message,
      });
    }
    for (const skipped of result.skipped) {
      failures.push({
        repo: skipped.repo,
        kind: skipped.kind,
        status: null,
        message: skipped.message,
      });
    }
  }
  return failures;
}

export interface SnapshotInput {
  issues: ClassifiedIssue[];
  aggregation: Aggregation;
  registry: Registry;
  results: SourceFetchResult[];
  generatedAt: Date;
  lookbackDaysNew: number;
}

export function buildSnapshot(input: SnapshotInput): Snapshot {
  const records = new Map(input.issues.map((i) => [i, toIssueRecord(i)] as const));
  const record = (issue: ClassifiedIssue): IssueRecord =>
    records.get(issue) ?? toIssueRecord(issue);

  const issuesByRepo: Record<string, IssueRecord[]> = {};
  for (const [repo, issues] of input.aggregation.bySource) {
    issuesByRepo[repo] = issues.map(record);
  }

  const failed = input.results.filter((r) => r.error).length;

  return {
    issues: input.issues.map(record),
    issuesByRepo,
    stats: input.aggregation.statistics,
    sources: {
      categories: input.registry.categories.map((c) => ({ ...c })),
      sources: input.registry.sources.map((s) => ({
        repo: s.repo,
        category: s.category,
        display_name: s.displayName,
        weight: s.weight,
        friendly_labels: s.friendlyLabels,
      })),
    },
    run: {
      generated_at: input.generatedAt.toISOString(),
      lookback_days_new: input.lookbackDaysNew,
      sources_succeeded: input.results.length - failed,
      sources_failed: failed,
      issues_fetched: input.issues.length,
      issues_skipped: input.results.reduce((n, r) => n + r.skipped.length, 0),
      failures: collectFailures(input.results),
    },
  };
}

export function serialize(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

function backupPath(dataDir: string): string {
  return `${dataDir}.previous`;
}

async function discard(path: string, fs: SnapshotFs): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
  } catch (error) {
    core.warning(`Could not remove ${path}: ${describeError(error)}`);
  }
}

/**
 * Publishes a snapshot all at once: every file goes into a fresh staging
 * directory next to `dataDir`, which then replaces it with two renames.
 * On failure the previous snapshot stays (or is put back) in place.
 */
export async function writeSnapshot(
  snapshot: Snapshot,
  dataDir: string,
  fs: SnapshotFs = nodeFs
): Promise<void> {
  const staging = `${dataDir}.staging-${process.pid}-${Date.now()}`;
  const backup = backupPath(dataDir);

  try {
    await fs.mkdir(staging, { recursive: true });
    for (const key of SNAPSHOT_KEYS) {
      await fs.writeFile(
        join(staging, SNAPSHOT_FILES[key]),
        serialize(snapshot[key]),
        "utf-8"
      );
    }
  } catch (error) {
    await discard(staging, fs);
    throw new PersistenceError(`Could not write snapshot: ${describeError(error)}`);
  }

  const hadPrevious = existsSync(dataDir);
  try {
    if (hadPrevious) {
      await fs.rm(backup, { recursive: true, force: true });
      await fs.rename(dataDir, backup);
    }
    await fs.rename(staging, dataDir);
  } catch (error) {
    if (hadPrevious && !existsSync(dataDir) && existsSync(backup)) {
      try {
        await fs.rename(backup, dataDir);
      } catch (restoreError) {
        core.error(
          `Could not restore previous snapshot from ${backup}: ${describeError(restoreError)}`
        );
      }
    }
    await discard(staging, fs);
    throw new PersistenceError(`Could not publish snapshot: ${describeError(error)}`);
  }

  if (hadPrevious) {
    await discard(backup, fs);
  }
  core.info(`Published snapshot to ${dataDir}`);
}

/**
 * Cleans up after a run that was killed mid-publish: puts a backup back
 * if the published directory is missing and drops stale staging dirs.
 */
export async function recoverSnapshot(
  dataDir: string,
  fs: SnapshotFs = nodeFs
): Promise<void> {
  const backup = backupPath(dataDir);
  if (!existsSync(dataDir) && existsSync(backup)) {
    core.warning(`Restoring snapshot from ${backup}`);
    await fs.rename(backup, dataDir);
  }

  const parent = dirname(dataDir);
  if (!existsSync(parent)) return;

  const prefix = `${basename(dataDir)}.staging-`;
  for (const entry of readdirSync(parent)) {
    if (entry.startsWith(prefix)) {
      core.info(`Removing leftover ${entry}`);
      await discard(join(parent, entry), fs);
    }
  }
}

function readFile<T>(dataDir: string, file: string, schema: z.ZodType<T>): T {
  const path = join(dataDir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new PersistenceError(`Could not read ${path}: ${describeError(error)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new PersistenceError(
      `Invalid ${path}: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown error"}`
    );
  }
  return parsed.data;
}

/** Returns undefined when no snapshot has been published yet. */
export function readSnapshot(dataDir: string): Snapshot | undefined {
  if (!existsSync(dataDir)) return undefined;

  return {
    issues: readFile(dataDir, SNAPSHOT_FILES.issues, IssuesFileSchema),
    issuesByRepo: readFile(dataDir, SNAPSHOT_FILES.issuesByRepo, IssuesByRepoFileSchema),
    stats: readFile(dataDir, SNAPSHOT_FILES.stats, StatisticsSchema),
    sources: readFile(dataDir, SNAPSHOT_FILES.sources, SourcesFileSchema),
    run: readFile(dataDir, SNAPSHOT_FILES.run, RunFileSchema),
  };
}
