import { logger } from "./logger";
import { AbuseLimitError, GitHubAPIError, RateLimitError } from "./errors";
import { parseRepositoryRecord } from "./github/repository-record";
import type { RepositoryFeed, RepositoryRecord } from "../types/github";

/**
 * How an enumeration ended. Returned, never thrown.
 */
export type EnumerationStop =
  | { reason: "exhausted" }
  | { reason: "quota-stopped"; resetAt: Date | null; error: Error }
  | { reason: "interrupted" }
  | { reason: "failed"; error: Error };

export interface EnumerationOptions {
  // Re-fetch each listed repository to fill counts and timestamps
  hydrate?: boolean;
  signal?: AbortSignal;
}

export type RepositoryStream = AsyncGenerator<RepositoryRecord, EnumerationStop, undefined>;

/**
 * Classify an error raised while talking to the feed into a terminal stop
 */
export function toStop(error: unknown, signal?: AbortSignal): EnumerationStop {
  if (signal?.aborted) {
    return { reason: "interrupted" };
  }

  if (error instanceof RateLimitError) {
    return { reason: "quota-stopped", resetAt: error.resetAt, error };
  }

  if (error instanceof AbuseLimitError) {
    const resetAt = error.retryAfter === undefined
      ? null
      : new Date(Date.now() + error.retryAfter * 1000);
    return { reason: "quota-stopped", resetAt, error };
  }

  return {
    reason: "failed",
    error: error instanceof Error ? error : new Error(String(error)),
  };
}

async function hydrateRecord(
  feed: RepositoryFeed,
  listed: RepositoryRecord,
  signal?: AbortSignal
): Promise<RepositoryRecord> {
  let detailed: unknown;
  try {
    detailed = await feed.fetchRepository(listed.id, signal);
  } catch (error) {
    // blocked or taken-down repositories keep their listed fields; quota errors end the run
    if (error instanceof GitHubAPIError && !signal?.aborted) {
      logger.warn(
        { id: listed.id, status: error.statusCode },
        `Could not hydrate ${listed.full_name}: ${error.message}; keeping the listed fields`
      );
      return listed;
    }
    throw error;
  }

  if (detailed === null) {
    logger.warn(`Repository ${listed.full_name} (${listed.id}) disappeared before it could be hydrated`);
    return listed;
  }
  const record = parseRepositoryRecord(detailed);
  return record.id === listed.id ? record : listed;
}

/**
 * Lazily yield repositories with ids strictly greater than `since`, in increasing order
 */
export async function* enumerateRepositories(
  feed: RepositoryFeed,
  since: number | null,
  options: EnumerationOptions = {}
): RepositoryStream {
  const { hydrate = false, signal } = options;
  let lastId = since;

  try {
    for await (const page of feed.pages(since, signal)) {
      for (const raw of page) {
        if (signal?.aborted) {
          return { reason: "interrupted" };
        }

        const listed = parseRepositoryRecord(raw);
        if (lastId !== null && listed.id <= lastId) {
          logger.debug(`Skipping repository ${listed.id}: not after ${lastId}`);
          continue;
        }

        const record = hydrate ? await hydrateRecord(feed, listed, signal) : listed;
        lastId = record.id;
        yield record;
      }
    }
  } catch (error) {
    return toStop(error, signal);
  }

  return signal?.aborted ? { reason: "interrupted" } : { reason: "exhausted" };
}
