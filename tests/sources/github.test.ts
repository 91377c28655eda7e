import { describe, it, expect, vi } from "vitest";
import {
  assertCredential,
  estimateRequests,
  fetchAllSources,
  fetchSourceIssues,
  isTransient,
  retryDelay,
  type FetchOptions,
  type GitHubIssueClient,
} from "../../src/sources/github.js";
import { ConfigurationError, SourceFetchError } from "../../src/errors.js";
import { makeSource, rawIssue } from "../helpers.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
}));

function httpError(
  status: number,
  message = `HTTP ${status}`,
  headers: Record<string, string> = {}
): Error {
  return Object.assign(new Error(message), { status, response: { headers } });
}

class FakeGitHub implements GitHubIssueClient {
  listCalls: string[] = [];
  pagesServed = 0;
  inFlight = 0;
  maxInFlight = 0;

  constructor(
    private pages: Record<string, unknown[][]>,
    private errors: Record<string, unknown[]> = {},
    private details: Record<string, unknown> = {},
    private delays: Record<string, number> = {},
    public remaining = 5000
  ) {}

  async *listOpenIssuePages(
    owner: string,
    repo: string,
    _perPage: number
  ): AsyncIterable<unknown[]> {
    const id = `${owner}/${repo}`;
    this.listCalls.push(id);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      const delay = this.delays[id];
      if (delay) await new Promise((resolve) => setTimeout(resolve, delay));

      const queued = this.errors[id];
      if (queued && queued.length > 0) throw queued.shift();

      for (const page of this.pages[id] ?? []) {
        this.pagesServed++;
        yield page;
      }
    } finally {
      this.inFlight--;
    }
  }

  async getRepository(owner: string, repo: string): Promise<unknown> {
    const details = this.details[`${owner}/${repo}`];
    if (details instanceof Error) throw details;
    return details ?? {};
  }

  async getRateLimitRemaining(): Promise<number> {
    return this.remaining;
  }
}

const source = makeSource("test/repo");

function makeOptions(overrides: Partial<FetchOptions> = {}): FetchOptions {
  return {
    maxIssues: 3,
    retries: 2,
    backoffMs: 100,
    repoDetails: false,
    normalize: {
      bodyPreviewLength: 100,
      newSince: new Date("2024-01-01T00:00:00Z"),
    },
    sleep: vi.fn(async () => {}),
    ...overrides,
  };
}

describe("fetchSourceIssues", () => {
  it("skips pull requests and stops at the bound", async () => {
    const client = new FakeGitHub({
      "test/repo": [
        [rawIssue(1), rawIssue(2, { pull_request: { url: "x" } }), rawIssue(3)],
        [rawIssue(4), rawIssue(5)],
        [rawIssue(6)],
      ],
    });

    const result = await fetchSourceIssues(source, client, makeOptions());

    expect(result.issues.map((i) => i.id)).toEqual([1, 3, 4]);
    expect(client.pagesServed).toBe(2);
    expect(result.error).toBeUndefined();
  });

  it("returns everything when the source has fewer issues than the bound", async () => {
    const client = new FakeGitHub({ "test/repo": [[rawIssue(1)]] });

    const result = await fetchSourceIssues(source, client, makeOptions());

    expect(result.issues.map((i) => i.id)).toEqual([1]);
  });

  it("skips malformed issues and records them", async () => {
    const client = new FakeGitHub({
      "test/repo": [[rawIssue(1), { id: "not-a-number" }, rawIssue(2)]],
    });

    const result = await fetchSourceIssues(source, client, makeOptions());

    expect(result.issues.map((i) => i.id)).toEqual([1, 2]);
    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].repo).toBe("test/repo");
    expect(result.skipped[0].message).toMatch(/^Malformed issue/);
  });

  it("retries a transient failure with backoff", async () => {
    const client = new FakeGitHub(
      { "test/repo": [[rawIssue(1)]] },
      { "test/repo": [httpError(503)] }
    );
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await fetchSourceIssues(source, client, makeOptions({ sleep }));

    expect(result.issues).toHaveLength(1);
    expect(client.listCalls).toEqual(["test/repo", "test/repo"]);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it("gives up after the configured number of retries", async () => {
    const client = new FakeGitHub(
      { "test/repo": [[rawIssue(1)]] },
      { "test/repo": [httpError(429), httpError(429), httpError(429)] }
    );
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await fetchSourceIssues(source, client, makeOptions({ sleep }));

    expect(result.issues).toEqual([]);
    expect(result.error).toBeInstanceOf(SourceFetchError);
    expect(result.error?.status).toBe(429);
    expect(client.listCalls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("does not retry a missing repository", async () => {
    const client = new FakeGitHub({}, { "test/repo": [httpError(404, "Not Found")] });
    const sleep = vi.fn(async (_ms: number) => {});

    const result = await fetchSourceIssues(source, client, makeOptions({ sleep }));

    expect(result.error?.status).toBe(404);
    expect(result.error?.message).toBe("Not Found");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("attaches repository details when enabled", async () => {
    const client = new FakeGitHub(
      { "test/repo": [[rawIssue(1)]] },
      {},
      {
        "test/repo": {
          description: "A test repo",
          stargazers_count: 10,
          forks_count: 2,
          open_issues_count: 40,
        },
      }
    );

    const result = await fetchSourceIssues(source, client, makeOptions({ repoDetails: true }));

    expect(result.details).toEqual({
      description: "A test repo",
      stars: 10,
      forks: 2,
      openIssues: 40,
    });
  });

  it("keeps the issues when the details request fails", async () => {
    const client = new FakeGitHub(
      { "test/repo": [[rawIssue(1)]] },
      {},
      { "test/repo": httpError(500) }
    );

    const result = await fetchSourceIssues(source, client, makeOptions({ repoDetails: true }));

    expect(result.issues).toHaveLength(1);
    expect(result.details).toBeNull();
    expect(result.error).toBeUndefined();
  });
});

describe("isTransient", () => {
  it("retries throttling, server and network errors only", () => {
    expect(isTransient(httpError(429))).toBe(true);
    expect(isTransient(httpError(502))).toBe(true);
    expect(isTransient(new Error("socket hang up"))).toBe(true);
    expect(isTransient(httpError(403, "API rate limit exceeded"))).toBe(true);
    expect(
      isTransient(httpError(403, "Forbidden", { "x-ratelimit-remaining": "0" }))
    ).toBe(true);
    expect(isTransient(httpError(403, "Resource not accessible"))).toBe(false);
    expect(isTransient(httpError(404))).toBe(false);
    expect(isTransient(httpError(422))).toBe(false);
  });
});

describe("retryDelay", () => {
  it("doubles per attempt", () => {
    expect(retryDelay(httpError(503), 0, 100)).toBe(100);
    expect(retryDelay(httpError(503), 2, 100)).toBe(400);
  });

  it("honors retry-after and caps the wait", () => {
    expect(retryDelay(httpError(429, "slow down", { "retry-after": "3" }), 0, 100)).toBe(3000);
    expect(retryDelay(httpError(429, "slow down", { "retry-after": "3600" }), 0, 100)).toBe(60_000);
    expect(retryDelay(httpError(503), 20, 100)).toBe(60_000);
  });
});

describe("fetchAllSources", () => {
  const sources = [
    makeSource("org/slow"),
    makeSource("org/broken"),
    makeSource("org/fast"),
    makeSource("org/last"),
  ];

  it("returns results in registry order and isolates failures", async () => {
    const client = new FakeGitHub(
      {
        "org/slow": [[rawIssue(1)]],
        "org/fast": [[rawIssue(2)]],
        "org/last": [[rawIssue(3)]],
      },
      { "org/broken": [httpError(404)] },
      {},
      { "org/slow": 20 }
    );

    const results = await fetchAllSources(sources, client, {
      ...makeOptions(),
      concurrency: 2,
      requestDelayMs: 0,
    });

    expect(results.map((r) => r.source.repo)).toEqual([
      "org/slow",
      "org/broken",
      "org/fast",
      "org/last",
    ]);
    expect(results.map((r) => r.issues.length)).toEqual([1, 0, 1, 1]);
    expect(results[1].error?.repo).toBe("org/broken");
  });

  it("never has more sources in flight than the concurrency limit", async () => {
    const client = new FakeGitHub(
      {},
      {},
      {},
      { "org/slow": 10, "org/broken": 10, "org/fast": 10, "org/last": 10 }
    );

    await fetchAllSources(sources, client, {
      ...makeOptions(),
      concurrency: 2,
      requestDelayMs: 0,
    });

    expect(client.maxInFlight).toBe(2);
  });

  it("pauses between sources but not after the last one", async () => {
    const sleep = vi.fn(async (_ms: number) => {});

    await fetchAllSources(sources.slice(0, 3), new FakeGitHub({}), {
      ...makeOptions({ sleep }),
      concurrency: 1,
      requestDelayMs: 250,
    });

    expect(sleep.mock.calls).toEqual([[250], [250]]);
  });

  it("does not pause for a single source", async () => {
    const sleep = vi.fn(async (_ms: number) => {});

    await fetchAllSources(sources.slice(0, 1), new FakeGitHub({}), {
      ...makeOptions({ sleep }),
      concurrency: 1,
      requestDelayMs: 250,
    });

    expect(sleep).not.toHaveBeenCalled();
  });
});

describe("estimateRequests", () => {
  it("counts issue pages, a spare page for pull requests and the details request", () => {
    expect(estimateRequests(10, 30, true)).toBe(30);
    expect(estimateRequests(2, 250, false)).toBe(8);
  });
});

describe("assertCredential", () => {
  it("accepts a token without touching the API", async () => {
    const client = new FakeGitHub({});
    const spy = vi.spyOn(client, "getRateLimitRemaining");

    await expect(assertCredential("test-token", client, 100, false)).resolves.toBeUndefined();
    expect(spy).not.toHaveBeenCalled();
  });

  it("fails before any request when no token is configured", async () => {
    const client = new FakeGitHub({});
    const spy = vi.spyOn(client, "getRateLimitRemaining");

    await expect(assertCredential(undefined, client, 100, false)).rejects.toThrow(
      ConfigurationError
    );
    expect(spy).not.toHaveBeenCalled();
  });

  it("runs anonymously when allowed and the quota suffices", async () => {
    const client = new FakeGitHub({}, {}, {}, {}, 60);
    await expect(assertCredential(undefined, client, 40, true)).resolves.toBeUndefined();
  });

  it("fails when the anonymous quota is too small", async () => {
    const client = new FakeGitHub({}, {}, {}, {}, 60);
    await expect(assertCredential(undefined, client, 200, true)).rejects.toThrow(
      "GITHUB_TOKEN is not set and the anonymous quota (60) is below the 200 requests this run needs"
    );
  });
});
