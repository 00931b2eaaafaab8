#!/usr/bin/env tsx

import "dotenv/config";
import * as fs from "fs";
import { pathToFileURL } from "url";
import { GitHubRepositoryFeed, type RepositoryFeed, type SessionInfo } from "./lib/github";
import { logger } from "./lib/logger";
import { config } from "./lib/config";
import { UsageError } from "./lib/errors";
import { toStop } from "./lib/enumerator";
import { harvestRepositories, type HarvestOutcome } from "./lib/harvester";
import { ResumableCsvSink } from "./lib/sink/csv-sink";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_QUOTA = 2;
export const EXIT_USAGE = 64;

export interface CliOptions {
  token?: string;
  filename: string;
  hydrate: boolean;
  help: boolean;
}

export interface SessionFeed extends RepositoryFeed {
  describeSession(): Promise<SessionInfo>;
}

export interface CliDependencies {
  createFeed(token?: string): SessionFeed;
}

const defaultDependencies: CliDependencies = {
  createFeed: (token) => new GitHubRepositoryFeed({ githubToken: token }),
};

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    token: undefined,
    filename: config.output.filename,
    hydrate: false,
    help: false,
  };

  const valueFor = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`Option ${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--token":
      case "-t":
        options.token = valueFor(arg, ++i);
        break;
      case "--filename":
      case "-f":
        options.filename = valueFor(arg, ++i);
        break;
      case "--hydrate":
        options.hydrate = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Print help message
 */
function printHelp() {
  console.log(`
Public Repository Harvester

Writes every public GitHub repository, oldest first, to a CSV file.
Re-running with the same file resumes after its last row.

Usage:
  repo-harvest [options]

Options:
  -t, --token <token>      GitHub token (default: $GITHUB_TOKEN); raises the quota from 60 to 5000 requests/hour
  -f, --filename <path>    CSV file to append to (default: ${config.output.filename})
  --hydrate                Fetch each repository's full details (one extra request per repository)
  -h, --help               Show this help message

Exit codes:
  0  feed exhausted, or stopped with Ctrl-C
  1  failure
  2  rate limit exhausted; run again later to resume
`);
}

/**
 * Map a finished harvest onto the process exit code
 */
export function exitCodeFor(outcome: HarvestOutcome): number {
  switch (outcome.stop.reason) {
    case "exhausted":
    case "interrupted":
      return EXIT_OK;
    case "quota-stopped":
      return EXIT_QUOTA;
    case "failed":
      return EXIT_FAILURE;
  }
}

function logSession(session: SessionInfo) {
  const { remaining, limit } = session.rateLimit;
  if (session.login) {
    logger.info(`Authenticated as ${session.login}, rate limit is ${remaining} out of ${limit}`);
  } else {
    logger.info(`Running without authentication. Rate limit is ${remaining} out of ${limit}`);
  }
}

function logOutcome(outcome: HarvestOutcome) {
  const { stop, written, cursor } = outcome;

  switch (stop.reason) {
    case "exhausted":
      logger.info(`✅ Feed exhausted. Wrote ${written} repositories; last id ${cursor ?? "none"}`);
      break;
    case "interrupted":
      logger.info(`Stopped after ${written} repositories; run again to resume after ${cursor ?? "the beginning"}`);
      break;
    case "quota-stopped":
      logger.error(
        `🚫 Rate limited by GitHub after ${written} repositories.` +
        (stop.resetAt ? ` Quota resets at ${stop.resetAt.toISOString()}.` : "") +
        " Run again later to resume."
      );
      break;
    case "failed":
      logger.error({ error: stop.error }, `❌ Harvest failed after ${written} repositories`);
      break;
  }
}

/**
 * Main CLI function
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  dependencies: CliDependencies = defaultDependencies
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(`${error.message}. See --help.`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (options.help) {
    printHelp();
    return EXIT_OK;
  }

  const token = options.token || config.github.token;
  const feed = dependencies.createFeed(token);

  try {
    logSession(await feed.describeSession());
  } catch (error) {
    const stop = toStop(error);
    logger.error({ error }, "Could not reach GitHub");
    return stop.reason === "quota-stopped" ? EXIT_QUOTA : EXIT_FAILURE;
  }

  let sink: ResumableCsvSink;
  try {
    sink = await ResumableCsvSink.open(options.filename, { fsync: config.output.fsync });
  } catch (error) {
    logger.error({ error }, `Cannot open ${options.filename}`);
    return EXIT_FAILURE;
  }

  const controller = new AbortController();
  const onSigint = () => {
    logger.info("Exiting...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const outcome = await harvestRepositories(feed, sink, {
      hydrate: options.hydrate,
      confirmCursor: config.output.confirmCursor,
      progressInterval: config.output.progressInterval,
      signal: controller.signal,
    });
    logOutcome(outcome);
    return exitCodeFor(outcome);
  } finally {
    process.off("SIGINT", onSigint);
    sink.close();
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

// Run if this is the main module
if (isMainModule()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ error }, "Unexpected error occurred");
      process.exitCode = EXIT_FAILURE;
    }
  );
}
