import { Octokit } from "@octokit/rest";
import { retry } from "@octokit/plugin-retry";
import { throttling } from "@octokit/plugin-throttling";
import { logger } from "../logger";
import { config } from "../config";
import {
  RateLimitError,
  AbuseLimitError,
  GitHubAPIError,
  PaginationError,
} from "../errors";
import type {
  FeedConfig,
  RateLimitInfo,
  RepositoryFeed,
  SessionInfo,
} from "../../types/github";

// Create custom Octokit with plugins
const HarvestOctokit = Octokit.plugin(retry, throttling);

const NEXT_LINK_PATTERN = /<([^<>]+)>;\s*rel="next"/;

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
}

function readHeader(error: unknown, name: string): string | undefined {
  if (typeof error !== "object" || error === null || !("response" in error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response !== "object" || response === null || !("headers" in response)) {
    return undefined;
  }
  const headers = response.headers;
  if (typeof headers !== "object" || headers === null || !(name in headers)) {
    return undefined;
  }
  const value: unknown = Reflect.get(headers, name);
  return typeof value === "string" || typeof value === "number" ? String(value) : undefined;
}

/**
 * Map an Octokit request failure onto the harvester's error classes
 */
export function translateRequestError(error: unknown): Error {
  if (
    error instanceof RateLimitError ||
    error instanceof AbuseLimitError ||
    error instanceof GitHubAPIError ||
    error instanceof PaginationError
  ) {
    return error;
  }

  const status = readStatus(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === 403 || status === 429) {
    if (readHeader(error, "x-ratelimit-remaining") === "0") {
      const reset = parseInt(readHeader(error, "x-ratelimit-reset") ?? "", 10);
      const resetAt = isNaN(reset) ? null : new Date(reset * 1000);
      return new RateLimitError("GitHub API rate limit exceeded", resetAt);
    }

    if (status === 429 || /secondary rate|abuse/i.test(message)) {
      const retryAfter = parseInt(readHeader(error, "retry-after") ?? "", 10);
      return new AbuseLimitError(
        "GitHub secondary rate limit triggered",
        isNaN(retryAfter) ? undefined : retryAfter
      );
    }
  }

  if (status !== undefined) {
    return new GitHubAPIError(`GitHub API request failed: ${message}`, status, error);
  }

  return error instanceof Error ? error : new Error(message);
}

/**
 * Read the `since` cursor out of a Link header's rel="next" entry
 */
export function parseNextSince(link: string | undefined): number | null {
  if (!link) return null;

  const match = link.match(NEXT_LINK_PATTERN);
  if (!match) return null;

  const since = new URL(match[1]).searchParams.get("since");
  const parsed = since === null ? NaN : parseInt(since, 10);
  if (isNaN(parsed)) {
    throw new PaginationError(`Next page link has no numeric since parameter: ${match[1]}`);
  }
  return parsed;
}

/**
 * Walks GET /repositories, the global oldest-first list of public repositories
 *
 * Rate limit handlers never wait for the quota window: quota exhaustion ends
 * the run and the next run resumes from the output file.
 */
export class GitHubRepositoryFeed implements RepositoryFeed {
  private octokit: InstanceType<typeof HarvestOctokit>;
  private authenticated: boolean;

  constructor(feedConfig: FeedConfig = {}) {
    const token = feedConfig.githubToken || config.github.token;
    this.authenticated = Boolean(token);

    if (!token) {
      logger.warn("No GitHub token provided. API rate limits will be very restrictive.");
    }

    this.octokit = new HarvestOctokit({
      auth: token,
      baseUrl: feedConfig.baseUrl || config.github.baseUrl,
      userAgent: feedConfig.userAgent || config.github.userAgent,
      request: feedConfig.fetch ? { fetch: feedConfig.fetch } : undefined,
      retry: {
        retries: feedConfig.maxRetries ?? config.retry.maxRetries,
        retryAfterBaseValue: feedConfig.retryBaseDelayMs ?? config.retry.standardRetryBaseDelay,
        doNotRetry: [400, 401, 403, 404, 422, 429],
      },
      throttle: {
        onRateLimit: (retryAfter, options) => {
          logger.warn(
            `Rate limit reached for ${options.method} ${options.url}. Quota resets in ${retryAfter} seconds; stopping.`
          );
          return false;
        },
        onSecondaryRateLimit: (retryAfter, options) => {
          logger.warn(
            `Secondary rate limit for ${options.method} ${options.url}. Retry allowed after ${retryAfter} seconds; stopping.`
          );
          return false;
        },
      },
    });
  }

  /**
   * Check core rate limit status
   */
  async checkRateLimit(): Promise<RateLimitInfo> {
    const { data } = await this.call(() => this.octokit.rest.rateLimit.get());
    const core = data.resources.core;

    logger.info({
      remaining: core.remaining,
      limit: core.limit,
      reset: new Date(core.reset * 1000).toISOString(),
    }, "GitHub API rate limit status");

    return {
      limit: core.limit,
      remaining: core.remaining,
      reset: core.reset,
      used: core.limit - core.remaining,
    };
  }

  /**
   * Identify the caller: the authenticated login, or null when anonymous
   */
  async describeSession(): Promise<SessionInfo> {
    let login: string | null = null;

    if (this.authenticated) {
      try {
        const { data } = await this.octokit.rest.users.getAuthenticated();
        login = data.login;
      } catch (error) {
        if (readStatus(error) !== 401) throw translateRequestError(error);
        logger.warn("GitHub rejected the token; continuing without authentication details");
      }
    }

    const rateLimit = await this.checkRateLimit();
    return { login, rateLimit };
  }

  async *pages(since: number | null, signal?: AbortSignal): AsyncGenerator<unknown[], void, undefined> {
    let cursor = since;

    while (true) {
      logger.debug(`Fetching repositories since ${cursor ?? "the beginning"}`);

      const response = await this.call(() =>
        this.octokit.rest.repos.listPublic({
          ...(cursor !== null ? { since: cursor } : {}),
          request: { signal },
        })
      );

      const page: unknown[] = response.data;
      yield page;

      const next = parseNextSince(response.headers.link);
      if (next === null || page.length === 0) {
        return;
      }

      if (cursor !== null && next <= cursor) {
        throw new PaginationError(`Pagination cursor did not advance past ${cursor}`);
      }

      cursor = next;
    }
  }

  async fetchRepository(id: number, signal?: AbortSignal): Promise<unknown | null> {
    try {
      const { data } = await this.octokit.request("GET /repositories/{repository_id}", {
        repository_id: id,
        request: { signal },
      });
      return data;
    } catch (error) {
      if (readStatus(error) === 404) {
        return null;
      }
      throw translateRequestError(error);
    }
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw translateRequestError(error);
    }
  }
}
