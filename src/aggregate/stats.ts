import type { CategoryStats, SourceStats, Statistics } from "../output/schema.js";
import type {
  ClassifiedIssue,
  Registry,
  SourceFetchResult,
} from "../sources/types.js";

export interface Aggregation {
  statistics: Statistics;
  /** Registry order; each list keeps the fetcher's order. */
  bySource: Map<string, ClassifiedIssue[]>;
}

export function emptyStatistics(): Statistics {
  return {
    total_sources: 0,
    total_issues: 0,
    total_new_issues: 0,
    total_friendly: 0,
    total_help_wanted: 0,
    by_priority: { critical: 0, high: 0, normal: 0, low: 0 },
    by_type: { security: 0, bug: 0, feature: 0, docs: 0, other: 0 },
    by_category: {},
    sources: {},
  };
}

export function aggregate(
  issues: ClassifiedIssue[],
  registry: Registry,
  results: SourceFetchResult[]
): Aggregation {
  const statistics = emptyStatistics();
  statistics.total_sources = registry.sources.length;

  const byCategory = new Map<string, CategoryStats>();
  for (const category of registry.categories) {
    const stats: CategoryStats = {
      label: category.label,
      icon: category.icon,
      total_sources: 0,
      total_issues: 0,
      new_issues: 0,
      friendly_issues: 0,
    };
    byCategory.set(category.key, stats);
    statistics.by_category[category.key] = stats;
  }

  const resultByRepo = new Map(results.map((r) => [r.source.repo, r] as const));
  const bySource = new Map<string, ClassifiedIssue[]>();
  const bySourceStats = new Map<string, SourceStats>();

  for (const source of registry.sources) {
    const result = resultByRepo.get(source.repo);
    const details = result?.details ?? null;
    const stats: SourceStats = {
      category: source.category,
      category_label: source.categoryLabel,
      status: result && !result.error ? "ok" : "failed",
      fetched_issues: 0,
      open_issues: 0,
      stars: details?.stars ?? null,
      forks: details?.forks ?? null,
      description: details?.description ?? null,
      new_issues: 0,
      friendly_issues: 0,
      bugs: 0,
      features: 0,
    };

    bySource.set(source.repo, []);
    bySourceStats.set(source.repo, stats);
    statistics.sources[source.repo] = stats;

    const category = byCategory.get(source.category);
    if (category) category.total_sources++;
  }

  for (const issue of issues) {
    statistics.total_issues++;
    statistics.by_priority[issue.priority]++;
    statistics.by_type[issue.type]++;
    if (issue.isNew) statistics.total_new_issues++;
    if (issue.friendly) statistics.total_friendly++;
    if (issue.helpWanted) statistics.total_help_wanted++;

    const category = byCategory.get(issue.category);
    if (category) {
      category.total_issues++;
      if (issue.isNew) category.new_issues++;
      if (issue.friendly) category.friendly_issues++;
    }

    let group = bySource.get(issue.repo);
    if (!group) {
      group = [];
      bySource.set(issue.repo, group);
    }
    group.push(issue);

    const source = bySourceStats.get(issue.repo);
    if (source) {
      source.fetched_issues++;
      if (issue.isNew) source.new_issues++;
      if (issue.friendly) source.friendly_issues++;
      if (issue.type === "bug") source.bugs++;
      if (issue.type === "feature") source.features++;
    }
  }

  for (const [repo, stats] of bySourceStats) {
    const details = resultByRepo.get(repo)?.details;
    stats.open_issues = details?.openIssues ?? stats.fetched_issues;
  }

  return { statistics, bySource };
}
