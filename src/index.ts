#!/usr/bin/env node
import * as core from "@actions/core";
import { aggregate } from "./aggregate/stats.js";
import { classifyIssues } from "./classifier/rules.js";
import { loadConfig, resolveConfigPath, resolveToken } from "./config.js";
import { describeError } from "./errors.js";
import { recoverSnapshot, writeSnapshot } from "./output/snapshot.js";
import { runPipeline } from "./pipeline.js";
import { loadRegistry } from "./registry.js";
import {
  assertCredential,
  createOctokitClient,
  estimateRequests,
  fetchAllSources,
  fetchOptionsFromConfig,
} from "./sources/github.js";

async function run(): Promise<void> {
  try {
    const configPath = resolveConfigPath();

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);
    const registry = loadRegistry(config.registry_file);
    core.info(
      `Tracking ${registry.sources.length} repos across ${registry.categories.length} categories`
    );

    const token = resolveToken();
    const client = createOctokitClient(token);
    await assertCredential(
      token,
      client,
      estimateRequests(
        registry.sources.length,
        config.fetch.max_issues_per_source,
        config.fetch.repo_details
      ),
      config.fetch.allow_anonymous
    );

    await recoverSnapshot(config.data_dir);

    const now = new Date();
    const result = await runPipeline(config, registry, {
      fetch: (reg, cfg) =>
        fetchAllSources(reg.sources, client, fetchOptionsFromConfig(cfg, now)),
      classify: (issues, reg, cfg) =>
        classifyIssues(issues, reg.sources, cfg.classification.friendly_labels),
      aggregate,
      persist: (snapshot, cfg) => writeSnapshot(snapshot, cfg.data_dir),
      now: () => now,
    });

    for (const failure of result.failures) {
      core.warning(`${failure.repo}: ${failure.message}`);
    }

    core.info(
      `Done: ${result.issuesFetched} issues from ${result.sourcesSucceeded} repos (${result.sourcesFailed} failed)`
    );
  } catch (error) {
    core.setFailed(describeError(error));
  }
}

void run();
