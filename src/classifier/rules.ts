import { DEFAULT_FRIENDLY_LABELS } from "../config.js";
import type {
  Classification,
  ClassifiedIssue,
  Issue,
  IssueType,
  Priority,
  Source,
} from "../sources/types.js";

export interface ClassifyInput {
  labels: string[];
  title: string;
  body: string;
}

export interface ClassifyOptions {
  friendlyLabels?: string[];
}

/** Lower-cased input shared by every predicate. */
export interface Signals {
  labels: string[];
  title: string;
  body: string;
}

export interface Rule<T> {
  name: string;
  test: (signals: Signals, type: IssueType) => boolean;
  outcome: T;
}

const labelContains =
  (...needles: string[]) =>
  (s: Signals): boolean =>
    s.labels.some((label) => needles.some((needle) => label.includes(needle)));

const titleMatches =
  (pattern: RegExp) =>
  (s: Signals): boolean =>
    pattern.test(s.title);

const either =
  (...predicates: Array<(s: Signals) => boolean>) =>
  (s: Signals): boolean =>
    predicates.some((p) => p(s));

// Order matters: the first rule that matches wins.
export const TYPE_RULES: readonly Rule<IssueType>[] = [
  {
    name: "security",
    test: either(
      labelContains("security", "vulnerab", "cve"),
      titleMatches(/\b(security|vulnerability|cve-\d|xss|csrf|sql injection)/),
      (s) => /\bcve-\d{4}-\d+/.test(s.body)
    ),
    outcome: "security",
  },
  {
    name: "bug",
    test: either(
      labelContains("bug", "defect", "error", "regression", "crash"),
      titleMatches(/\b(bug|crash(es|ed)?|regression|traceback|exception|broken)\b/)
    ),
    outcome: "bug",
  },
  {
    name: "feature",
    test: either(
      labelContains("enhancement", "feature", "proposal", "request"),
      titleMatches(/^\W*(feature|proposal|rfc|add|support)\b|feature request/)
    ),
    outcome: "feature",
  },
  {
    name: "docs",
    test: either(
      labelContains("docs", "documentation"),
      titleMatches(/\b(docs?|documentation|typo)\b/)
    ),
    outcome: "docs",
  },
];

export const PRIORITY_RULES: readonly Rule<Priority>[] = [
  { name: "security", test: (_, type) => type === "security", outcome: "critical" },
  {
    name: "critical-label",
    test: labelContains("critical", "blocker", "urgent", "p0", "severity: high"),
    outcome: "critical",
  },
  {
    name: "high-label",
    test: labelContains("high priority", "priority: high", "p1"),
    outcome: "high",
  },
  { name: "bug", test: (_, type) => type === "bug", outcome: "high" },
  {
    name: "low-label",
    test: labelContains("low priority", "priority: low", "p3", "nice to have", "minor"),
    outcome: "low",
  },
  { name: "docs", test: (_, type) => type === "docs", outcome: "low" },
];

export const DEFAULT_TYPE: IssueType = "other";
export const DEFAULT_PRIORITY: Priority = "normal";

export function firstMatch<T>(
  rules: readonly Rule<T>[],
  signals: Signals,
  type: IssueType,
  fallback: T
): T {
  for (const rule of rules) {
    if (rule.test(signals, type)) return rule.outcome;
  }
  return fallback;
}

/** "Good-First_Issue " and "good first issue" are the same label. */
export function normalizeLabel(label: string): string {
  return label.toLowerCase().replace(/[-_]+/g, " ").replace(/\s+/g, " ").trim();
}

export function classifyIssue(
  input: ClassifyInput,
  options: ClassifyOptions = {}
): Classification {
  const signals: Signals = {
    labels: input.labels.map((l) => l.toLowerCase()),
    title: input.title.toLowerCase(),
    body: input.body.toLowerCase(),
  };

  const type = firstMatch(TYPE_RULES, signals, DEFAULT_TYPE, DEFAULT_TYPE);
  const priority = firstMatch(PRIORITY_RULES, signals, type, DEFAULT_PRIORITY);

  const friendlySet = new Set(
    (options.friendlyLabels ?? DEFAULT_FRIENDLY_LABELS).map(normalizeLabel)
  );
  const normalized = input.labels.map(normalizeLabel);

  return {
    priority,
    type,
    friendly: normalized.some((label) => friendlySet.has(label)),
    helpWanted: normalized.includes("help wanted"),
  };
}

export function classifyIssues(
  issues: Issue[],
  sources: Source[],
  friendlyLabels: string[]
): ClassifiedIssue[] {
  const extraBySource = new Map(sources.map((s) => [s.repo, s.friendlyLabels] as const));

  return issues.map((issue) => ({
    ...issue,
    ...classifyIssue(issue, {
      friendlyLabels: [...friendlyLabels, ...(extraBySource.get(issue.repo) ?? [])],
    }),
  }));
}
