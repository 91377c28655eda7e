import type { SerializationError, SourceFetchError } from "../errors.js";

export interface Category {
  key: string;
  label: string;
  icon: string;
}

/** One tracked repository, as declared in the registry. */
export interface Source {
  repo: string; // "owner/name"
  owner: string;
  name: string;
  category: string;
  categoryLabel: string;
  displayName: string;
  weight: number;
  friendlyLabels: string[];
}

export interface Registry {
  categories: Category[];
  sources: Source[];
}

export interface Issue {
  id: number;
  number: number;
  repo: string;
  category: string;
  categoryLabel: string;
  title: string;
  url: string;
  author: string;
  authorAvatar: string;
  createdAt: string;
  updatedAt: string;
  comments: number;
  labels: string[];
  body: string;
  bodyPreview: string;
  isNew: boolean;
}

export type Priority = "critical" | "high" | "normal" | "low";
export type IssueType = "security" | "bug" | "feature" | "docs" | "other";

export const PRIORITIES: readonly Priority[] = ["critical", "high", "normal", "low"];
export const ISSUE_TYPES: readonly IssueType[] = [
  "security",
  "bug",
  "feature",
  "docs",
  "other",
];

export interface Classification {
  priority: Priority;
  type: IssueType;
  friendly: boolean;
  helpWanted: boolean;
}

export interface ClassifiedIssue extends Issue, Classification {}

export interface RepoDetails {
  description: string | null;
  stars: number;
  forks: number;
  openIssues: number;
}

export interface SourceFetchResult {
  source: Source;
  issues: Issue[];
  details: RepoDetails | null;
  error?: SourceFetchError;
  skipped: SerializationError[];
}
