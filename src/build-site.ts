#!/usr/bin/env node
import * as core from "@actions/core";
import { loadConfig, resolveConfigPath } from "./config.js";
import { describeError } from "./errors.js";
import { buildSite } from "./output/site.js";

async function run(): Promise<void> {
  try {
    const configPath = resolveConfigPath();
    const config = loadConfig(configPath);
    await buildSite(config);
  } catch (error) {
    core.setFailed(describeError(error));
  }
}

void run();
