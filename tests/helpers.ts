import type {
  ClassifiedIssue,
  Issue,
  Registry,
  Source,
} from "../src/sources/types.js";

export function makeSource(repo: string, category = "core", overrides: Partial<Source> = {}): Source {
  const [owner, name] = repo.split("/");
  return {
    repo,
    owner,
    name,
    category,
    categoryLabel: category.toUpperCase(),
    displayName: repo,
    weight: 1,
    friendlyLabels: [],
    ...overrides,
  };
}

export function makeRegistry(sources: Source[]): Registry {
  const keys = [...new Set(sources.map((s) => s.category))];
  return {
    categories: keys.map((key) => ({ key, label: key.toUpperCase(), icon: "" })),
    sources,
  };
}

export function makeIssue(id: number, repo: string, overrides: Partial<Issue> = {}): Issue {
  return {
    id,
    number: id,
    repo,
    category: "core",
    categoryLabel: "CORE",
    title: `Issue ${id}`,
    url: `https://github.com/${repo}/issues/${id}`,
    author: "octocat",
    authorAvatar: "",
    createdAt: "2024-05-01T00:00:00Z",
    updatedAt: "2024-05-02T00:00:00Z",
    comments: 0,
    labels: [],
    body: "",
    bodyPreview: "",
    isNew: false,
    ...overrides,
  };
}

export function makeClassified(
  id: number,
  repo: string,
  overrides: Partial<ClassifiedIssue> = {}
): ClassifiedIssue {
  return {
    ...makeIssue(id, repo),
    priority: "normal",
    type: "other",
    friendly: false,
    helpWanted: false,
    ...overrides,
  };
}

/** A raw issue as returned by the issues endpoint. */
export function rawIssue(id: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    number: id,
    title: `Issue ${id}`,
    html_url: `https://github.com/test/repo/issues/${id}`,
    body: "Body text",
    labels: [],
    user: { login: "octocat", avatar_url: "https://avatars.example/octocat" },
    created_at: "2024-05-01T00:00:00Z",
    updated_at: "2024-05-02T00:00:00Z",
    comments: 1,
    ...overrides,
  };
}
