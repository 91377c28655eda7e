import { existsSync, readFileSync } from "node:fs";
import * as core from "@actions/core";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, describeError } from "./errors.js";

export const DEFAULT_FRIENDLY_LABELS = [
  "good first issue",
  "easy",
  "beginner",
  "starter",
  "first timers only",
  "help wanted",
  "up for grabs",
  "easy pickings",
];

const FetchSchema = z.object({
  max_issues_per_source: z.number().int().positive().default(30),
  concurrency: z.number().int().positive().default(1),
  request_delay_ms: z.number().int().nonnegative().default(500),
  retries: z.number().int().nonnegative().max(10).default(2),
  backoff_ms: z.number().int().nonnegative().default(1000),
  repo_details: z.boolean().default(true),
  allow_anonymous: z.boolean().default(false),
});

const ClassificationSchema = z.object({
  lookback_days_new: z.number().int().nonnegative().default(7),
  body_preview_length: z.number().int().positive().default(400),
  friendly_labels: z.array(z.string().min(1)).default(DEFAULT_FRIENDLY_LABELS),
});

const SiteSchema = z.object({
  title: z.string().min(1).default("Issue Hub"),
  description: z
    .string()
    .default("Open issues across the tracked repositories, refreshed daily."),
  max_issues: z.number().int().positive().default(600),
});

export const HubConfigSchema = z.object({
  registry_file: z.string().min(1).default("data/repos.json"),
  data_dir: z.string().min(1).default("data/snapshot"),
  site_dir: z.string().min(1).default("site"),
  fetch: FetchSchema.default({}),
  classification: ClassificationSchema.default({}),
  site: SiteSchema.default({}),
});

export type HubConfig = z.infer<typeof HubConfigSchema>;

export function parseConfig(yamlContent: string): HubConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML: ${describeError(error)}`);
  }

  // An empty document parses to null
  const result = HubConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid config: ${details}`);
  }
  return result.data;
}

export function loadConfig(filePath: string): HubConfig {
  if (!existsSync(filePath)) {
    core.info(`No config at ${filePath}, using defaults`);
    return parseConfig("");
  }
  return parseConfig(readFileSync(filePath, "utf-8"));
}

export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env
): string {
  return env.HUB_CONFIG || "hub.yml";
}

export function resolveToken(
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return env.GITHUB_TOKEN || undefined;
}
