/**
 * On-disk shape of a snapshot. These files are read by the site builder
 * and by anyone consuming `data/` directly, so field names are snake_case
 * and independent of the in-memory types.
 */
import { z } from "zod";

export const PrioritySchema = z.enum(["critical", "high", "normal", "low"]);
export const IssueTypeSchema = z.enum(["security", "bug", "feature", "docs", "other"]);

export const IssueRecordSchema = z.object({
  id: z.number().int(),
  number: z.number().int(),
  repo: z.string(),
  category: z.string(),
  category_label: z.string(),
  title: z.string(),
  url: z.string(),
  author: z.string(),
  author_avatar: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  comments: z.number().int().nonnegative(),
  labels: z.array(z.string()),
  body_preview: z.string(),
  is_new: z.boolean(),
  priority: PrioritySchema,
  type: IssueTypeSchema,
  friendly: z.boolean(),
  help_wanted: z.boolean(),
});

export const IssuesFileSchema = z.array(IssueRecordSchema);
export const IssuesByRepoFileSchema = z.record(z.string(), z.array(IssueRecordSchema));

const count = z.number().int().nonnegative();

export const PriorityCountsSchema = z.object({
  critical: count,
  high: count,
  normal: count,
  low: count,
});

export const TypeCountsSchema = z.object({
  security: count,
  bug: count,
  feature: count,
  docs: count,
  other: count,
});

export const CategoryStatsSchema = z.object({
  label: z.string(),
  icon: z.string(),
  total_sources: count,
  total_issues: count,
  new_issues: count,
  friendly_issues: count,
});

export const SourceStatsSchema = z.object({
  category: z.string(),
  category_label: z.string(),
  status: z.enum(["ok", "failed"]),
  fetched_issues: count,
  open_issues: count,
  stars: count.nullable(),
  forks: count.nullable(),
  description: z.string().nullable(),
  new_issues: count,
  friendly_issues: count,
  bugs: count,
  features: count,
});

export const StatisticsSchema = z.object({
  total_sources: count,
  total_issues: count,
  total_new_issues: count,
  total_friendly: count,
  total_help_wanted: count,
  by_priority: PriorityCountsSchema,
  by_type: TypeCountsSchema,
  by_category: z.record(z.string(), CategoryStatsSchema),
  sources: z.record(z.string(), SourceStatsSchema),
});

export const SourcesFileSchema = z.object({
  categories: z.array(z.object({ key: z.string(), label: z.string(), icon: z.string() })),
  sources: z.array(
    z.object({
      repo: z.string(),
      category: z.string(),
      display_name: z.string(),
      weight: z.number(),
      friendly_labels: z.array(z.string()),
    })
  ),
});

export const RunFileSchema = z.object({
  generated_at: z.string(),
  lookback_days_new: count,
  sources_succeeded: count,
  sources_failed: count,
  issues_fetched: count,
  issues_skipped: count,
  failures: z.array(
    z.object({
      repo: z.string(),
      kind: z.enum(["source_fetch", "serialization"]),
      status: z.number().int().nullable(),
      message: z.string(),
    })
  ),
});

export type IssueRecord = z.infer<typeof IssueRecordSchema>;
export type PriorityCounts = z.infer<typeof PriorityCountsSchema>;
export type TypeCounts = z.infer<typeof TypeCountsSchema>;
export type CategoryStats = z.infer<typeof CategoryStatsSchema>;
export type SourceStats = z.infer<typeof SourceStatsSchema>;
export type Statistics = z.infer<typeof StatisticsSchema>;
export type SourcesFile = z.infer<typeof SourcesFileSchema>;
export type RunFile = z.infer<typeof RunFileSchema>;
export type RunFailure = RunFile["failures"][number];

/** The five files of one run, in memory. */
export interface Snapshot {
  issues: IssueRecord[];
  issuesByRepo: Record<string, IssueRecord[]>;
  stats: Statistics;
  sources: SourcesFile;
  run: RunFile;
}

export const SNAPSHOT_FILES = {
  issues: "issues.json",
  issuesByRepo: "issues_by_repo.json",
  stats: "stats.json",
  sources: "sources.json",
  run: "run.json",
} as const satisfies Record<keyof Snapshot, string>;
