import { Octokit } from "@octokit/rest";
import * as core from "@actions/core";
import { z } from "zod";
import {
  ConfigurationError,
  SerializationError,
  SourceFetchError,
  describeError,
} from "../errors.js";
import type { HubConfig } from "../config.js";
import {
  RawIssueSchema,
  isPullRequest,
  newIssueCutoff,
  normalizeIssue,
  type NormalizeOptions,
} from "./normalize.js";
import type { Issue, RepoDetails, Source, SourceFetchResult } from "./types.js";

const MAX_PER_PAGE = 100;
const MAX_BACKOFF_MS = 60_000;

/**
 * The slice of the GitHub API the fetcher needs. Pages are handed over
 * unparsed; validation happens per item so that one bad record only
 * costs that record.
 */
export interface GitHubIssueClient {
  listOpenIssuePages(
    owner: string,
    repo: string,
    perPage: number
  ): AsyncIterable<unknown[]>;
  getRepository(owner: string, repo: string): Promise<unknown>;
  getRateLimitRemaining(): Promise<number>;
}

export function createOctokitClient(token?: string): GitHubIssueClient {
  const octokit = new Octokit({ auth: token, userAgent: "issue-hub/0.1.0" });

  return {
    async *listOpenIssuePages(owner, repo, perPage) {
      // Follows the Link header until the caller stops iterating
      const pages = octokit.paginate.iterator(octokit.rest.issues.listForRepo, {
        owner,
        repo,
        state: "open",
        sort: "updated",
        direction: "desc",
        per_page: perPage,
      });
      for await (const response of pages) {
        yield response.data;
      }
    },
    async getRepository(owner, repo) {
      const { data } = await octokit.rest.repos.get({ owner, repo });
      return data;
    },
    async getRateLimitRemaining() {
      const { data } = await octokit.rest.rateLimit.get();
      return data.rate.remaining;
    },
  };
}

export interface FetchOptions {
  maxIssues: number;
  retries: number;
  backoffMs: number;
  repoDetails: boolean;
  normalize: NormalizeOptions;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchAllOptions extends FetchOptions {
  concurrency: number;
  requestDelayMs: number;
}

export function fetchOptionsFromConfig(
  config: HubConfig,
  now: Date
): FetchAllOptions {
  return {
    maxIssues: config.fetch.max_issues_per_source,
    retries: config.fetch.retries,
    backoffMs: config.fetch.backoff_ms,
    repoDetails: config.fetch.repo_details,
    concurrency: config.fetch.concurrency,
    requestDelayMs: config.fetch.request_delay_ms,
    normalize: {
      bodyPreviewLength: config.classification.body_preview_length,
      newSince: newIssueCutoff(now, config.classification.lookback_days_new),
    },
  };
}

const HttpErrorSchema = z.object({
  status: z.number(),
  message: z.string().default(""),
  response: z
    .object({ headers: z.record(z.string(), z.unknown()).default({}) })
    .optional(),
});

const RepoDetailsSchema = z.object({
  description: z.string().nullish(),
  stargazers_count: z.number().default(0),
  forks_count: z.number().default(0),
  open_issues_count: z.number().default(0),
});

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function errorStatus(error: unknown): number | undefined {
  const parsed = HttpErrorSchema.safeParse(error);
  return parsed.success ? parsed.data.status : undefined;
}

function header(error: unknown, name: string): string | undefined {
  const parsed = HttpErrorSchema.safeParse(error);
  if (!parsed.success) return undefined;
  const value = parsed.data.response?.headers[name];
  return value === undefined || value === null ? undefined : String(value);
}

/**
 * Throttling, server errors and network failures (no HTTP status) are
 * worth another attempt; everything else (404 for a renamed repo, 401...)
 * will fail the same way again.
 */
export function isTransient(error: unknown): boolean {
  const parsed = HttpErrorSchema.safeParse(error);
  if (!parsed.success) return true;

  const { status, message } = parsed.data;
  if (status === 429 || status >= 500) return true;
  if (status === 403) {
    return (
      header(error, "x-ratelimit-remaining") === "0" ||
      /rate limit/i.test(message)
    );
  }
  return false;
}

export function retryDelay(
  error: unknown,
  attempt: number,
  backoffMs: number
): number {
  const retryAfter = Number(header(error, "retry-after"));
  if (Number.isFinite(retryAfter) && retryAfter > 0) {
    return Math.min(retryAfter * 1000, MAX_BACKOFF_MS);
  }
  return Math.min(backoffMs * 2 ** attempt, MAX_BACKOFF_MS);
}

async function collectIssues(
  source: Source,
  client: GitHubIssueClient,
  options: FetchOptions,
  skipped: SerializationError[]
): Promise<Issue[]> {
  const issues: Issue[] = [];
  const perPage = Math.min(options.maxIssues, MAX_PER_PAGE);

  for await (const page of client.listOpenIssuePages(
    source.owner,
    source.name,
    perPage
  )) {
    for (const raw of page) {
      if (isPullRequest(raw)) continue;

      const parsed = RawIssueSchema.safeParse(raw);
      if (!parsed.success) {
        const field = parsed.error.issues[0]?.path.join(".") || "<root>";
        skipped.push(
          new SerializationError(
            source.repo,
            `Malformed issue (${field}: ${parsed.error.issues[0]?.message ?? "invalid"})`
          )
        );
        continue;
      }

      issues.push(normalizeIssue(parsed.data, source, options.normalize));
      if (issues.length >= options.maxIssues) return issues;
    }
  }

  return issues;
}

async function fetchDetails(
  source: Source,
  client: GitHubIssueClient
): Promise<RepoDetails | null> {
  try {
    const parsed = RepoDetailsSchema.safeParse(
      await client.getRepository(source.owner, source.name)
    );
    if (!parsed.success) {
      core.warning(`${source.repo}: unexpected repository payload, skipping details`);
      return null;
    }
    return {
      description: parsed.data.description ?? null,
      stars: parsed.data.stargazers_count,
      forks: parsed.data.forks_count,
      openIssues: parsed.data.open_issues_count,
    };
  } catch (error) {
    core.warning(`${source.repo}: could not fetch details: ${describeError(error)}`);
    return null;
  }
}

export async function fetchSourceIssues(
  source: Source,
  client: GitHubIssueClient,
  options: FetchOptions
): Promise<SourceFetchResult> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    const skipped: SerializationError[] = [];
    try {
      const issues = await collectIssues(source, client, options, skipped);
      for (const error of skipped) {
        core.warning(`${source.repo}: ${error.message}`);
      }
      const details = options.repoDetails
        ? await fetchDetails(source, client)
        : null;
      return { source, issues, details, skipped };
    } catch (error) {
      if (attempt < options.retries && isTransient(error)) {
        const delay = retryDelay(error, attempt, options.backoffMs);
        core.warning(
          `${source.repo}: ${describeError(error)}, retrying in ${delay}ms (attempt ${attempt + 1}/${options.retries})`
        );
        await sleep(delay);
        continue;
      }

      const fetchError = new SourceFetchError(
        source.repo,
        describeError(error),
        errorStatus(error)
      );
      core.warning(`${source.repo}: giving up: ${fetchError.message}`);
      return { source, issues: [], details: null, error: fetchError, skipped: [] };
    }
  }
}

/**
 * Fetches every source with at most `concurrency` in flight. Results come
 * back in registry order whatever the completion order.
 */
export async function fetchAllSources(
  sources: Source[],
  client: GitHubIssueClient,
  options: FetchAllOptions
): Promise<SourceFetchResult[]> {
  const sleep = options.sleep ?? defaultSleep;
  const results = new Array<SourceFetchResult>(sources.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < sources.length) {
      const index = next++;
      const source = sources[index];
      core.info(
        `  [${index + 1}/${sources.length}] ${source.repo} (${source.categoryLabel})`
      );
      results[index] = await fetchSourceIssues(source, client, options);
      if (options.requestDelayMs > 0 && next < sources.length) {
        await sleep(options.requestDelayMs);
      }
    }
  };

  const workers = Math.max(1, Math.min(options.concurrency, sources.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

/**
 * Pull requests share the issue listing, so a source can need more pages
 * than `maxIssues` suggests. One spare page per source is budgeted for
 * them; a repo with many open PRs can still exceed the estimate.
 */
export function estimateRequests(
  sourceCount: number,
  maxIssues: number,
  repoDetails: boolean
): number {
  const pages = Math.ceil(maxIssues / Math.min(maxIssues, MAX_PER_PAGE)) + 1;
  return sourceCount * (pages + (repoDetails ? 1 : 0));
}

/**
 * Fails before the first issue request when the run cannot be made:
 * no token at all, or an anonymous quota too small for the registry.
 */
export async function assertCredential(
  token: string | undefined,
  client: GitHubIssueClient,
  requestsNeeded: number,
  allowAnonymous: boolean
): Promise<void> {
  if (token) return;

  if (!allowAnonymous) {
    throw new ConfigurationError(
      "GITHUB_TOKEN is not set; export a token or set fetch.allow_anonymous"
    );
  }

  let remaining: number;
  try {
    remaining = await client.getRateLimitRemaining();
  } catch (error) {
    throw new ConfigurationError(
      `GITHUB_TOKEN is not set and the anonymous quota could not be checked: ${describeError(error)}`
    );
  }

  if (remaining < requestsNeeded) {
    throw new ConfigurationError(
      `GITHUB_TOKEN is not set and the anonymous quota (${remaining}) is below the ${requestsNeeded} requests this run needs`
    );
  }
  core.warning(`GITHUB_TOKEN is not set, running anonymously (${remaining} requests left)`);
}
