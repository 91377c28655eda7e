import { z } from "zod";
import type { Issue, Source } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

const RawLabelSchema = z.union([
  z.string(),
  z.object({ name: z.string().nullish() }),
]);

export const RawIssueSchema = z.object({
  id: z.number().int(),
  number: z.number().int().positive(),
  title: z.string(),
  html_url: z.string().url(),
  body: z.string().nullish(),
  labels: z.array(RawLabelSchema).default([]),
  user: z
    .object({ login: z.string(), avatar_url: z.string().nullish() })
    .nullish(),
  created_at: z.string().datetime({ offset: true }),
  updated_at: z.string().datetime({ offset: true }),
  comments: z.number().int().nonnegative().default(0),
});

export type RawIssue = z.infer<typeof RawIssueSchema>;

export interface NormalizeOptions {
  bodyPreviewLength: number;
  /** Start of the "new" window; see newIssueCutoff. */
  newSince: Date;
}

export function isPullRequest(raw: unknown): boolean {
  return (
    typeof raw === "object" &&
    raw !== null &&
    "pull_request" in raw &&
    raw.pull_request != null
  );
}

/**
 * The cutoff is pinned to the start of the current UTC day so that two runs
 * on the same day agree on which issues are new.
 */
export function newIssueCutoff(now: Date, lookbackDays: number): Date {
  const startOfDay = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate()
  );
  return new Date(startOfDay - lookbackDays * DAY_MS);
}

/** Cuts at code points so an emoji is never split in half. */
export function buildBodyPreview(body: string, maxLength: number): string {
  const chars = Array.from(body);
  const preview = chars.slice(0, maxLength).join("").replace(/\r?\n/g, " ").trim();
  return chars.length > maxLength ? `${preview}...` : preview;
}

function labelNames(labels: RawIssue["labels"]): string[] {
  const names: string[] = [];
  for (const label of labels) {
    const name = typeof label === "string" ? label : label.name;
    if (name) names.push(name);
  }
  return names;
}

export function normalizeIssue(
  raw: RawIssue,
  source: Source,
  options: NormalizeOptions
): Issue {
  const body = raw.body ?? "";

  return {
    id: raw.id,
    number: raw.number,
    repo: source.repo,
    category: source.category,
    categoryLabel: source.categoryLabel,
    title: raw.title,
    url: raw.html_url,
    author: raw.user?.login ?? "unknown",
    authorAvatar: raw.user?.avatar_url ?? "",
    createdAt: raw.created_at,
    updatedAt: raw.updated_at,
    comments: raw.comments,
    labels: labelNames(raw.labels),
    body,
    bodyPreview: buildBodyPreview(body, options.bodyPreviewLength),
    isNew: Date.parse(raw.created_at) > options.newSince.getTime(),
  };
}
