import { logger } from "./logger";
import { enumerateRepositories, toStop, type EnumerationStop } from "./enumerator";
import type { RepositorySink } from "./sink/csv-sink";
import type { RepositoryFeed } from "../types/github";

export type HarvestState = "new" | "resuming" | "streaming" | "done" | "interrupted";

export interface HarvestOptions {
  hydrate?: boolean;
  // Spend one request checking the resume cursor still exists remotely
  confirmCursor?: boolean;
  progressInterval?: number;
  signal?: AbortSignal;
}

export interface HarvestOutcome {
  state: Extract<HarvestState, "done" | "interrupted">;
  stop: EnumerationStop;
  written: number;
  cursor: number | null;
}

function finish(stop: EnumerationStop, sink: RepositorySink): HarvestOutcome {
  const state = stop.reason === "exhausted" ? "done" : "interrupted";
  logger.info({ reason: stop.reason, written: sink.written, cursor: sink.cursor }, `Harvest ${state}`);
  return { state, stop, written: sink.written, cursor: sink.cursor };
}

/**
 * Copy repositories from the feed into the sink, starting after the sink's cursor
 */
export async function harvestRepositories(
  feed: RepositoryFeed,
  sink: RepositorySink,
  options: HarvestOptions = {}
): Promise<HarvestOutcome> {
  const { hydrate = false, confirmCursor = true, progressInterval = 100, signal } = options;
  let state: HarvestState = "new";
  const since = sink.cursor;

  if (since !== null && confirmCursor) {
    state = "resuming";
    logger.debug(`State ${state}: confirming repository ${since}`);

    try {
      const existing = await feed.fetchRepository(since, signal);
      if (existing === null) {
        logger.warn(`Resume cursor ${since} no longer exists remotely; continuing after it`);
      }
    } catch (error) {
      return finish(toStop(error, signal), sink);
    }
  }

  state = "streaming";
  logger.info(`State ${state}: fetching repositories since ${since ?? "the beginning"}`);

  const records = enumerateRepositories(feed, since, { hydrate, signal });

  while (true) {
    const next = await records.next();
    if (next.done) {
      return finish(next.value, sink);
    }

    const record = next.value;
    try {
      sink.append(record);
    } catch (error) {
      const stop = toStop(error);
      await records.return(stop);
      return finish(stop, sink);
    }

    logger.debug(`Found repo ${record.full_name} (${record.id})`);
    if (sink.written % progressInterval === 0) {
      logger.info(`Wrote ${sink.written} repositories; cursor at ${record.id}`);
    }
  }
}
