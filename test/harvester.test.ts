import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { GitHubAPIError, RateLimitError } from "../src/lib/errors";
import { harvestRepositories } from "../src/lib/harvester";
import { ResumableCsvSink, type RepositorySink } from "../src/lib/sink/csv-sink";
import type { RepositoryFeed } from "../src/types/github";
import { InMemoryFeed, rawRepository } from "./helpers/feeds";

const range = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, index) => rawRepository(from + index));

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "harvester-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function idsIn(file: string): string[] {
  const rows: string[][] = parse(fs.readFileSync(file, "utf-8"));
  return rows.slice(1).map((row) => row[0]);
}

async function run(file: string, feed: RepositoryFeed, confirmCursor = true) {
  const sink = await ResumableCsvSink.open(file);
  try {
    return await harvestRepositories(feed, sink, { confirmCursor, progressInterval: 2 });
  } finally {
    sink.close();
  }
}

describe("harvestRepositories", () => {
  it("writes the header and every record of an uninterrupted run", async () => {
    const file = path.join(dir, "repos.csv");

    const outcome = await run(file, new InMemoryFeed(range(1, 5), { pageSize: 2 }));

    expect(outcome).toEqual({
      state: "done",
      stop: { reason: "exhausted" },
      written: 5,
      cursor: 5,
    });
    expect(idsIn(file)).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("resumes after a quota stop without duplicates or gaps", async () => {
    const interruptedFile = path.join(dir, "resumed.csv");
    const straightFile = path.join(dir, "straight.csv");

    const first = await run(interruptedFile, new InMemoryFeed(range(1, 5), { pageSize: 3, pageBudget: 1 }));
    expect(first.state).toBe("interrupted");
    expect(first.stop.reason).toBe("quota-stopped");
    expect(first.written).toBe(3);
    expect(idsIn(interruptedFile)).toEqual(["1", "2", "3"]);

    const resumedFeed = new InMemoryFeed(range(1, 5), { pageSize: 3 });
    const second = await run(interruptedFile, resumedFeed);
    expect(second).toMatchObject({ state: "done", written: 2, cursor: 5 });
    expect(resumedFeed.fetched).toEqual([3]);
    expect(resumedFeed.pageRequests).toEqual([3]);

    await run(straightFile, new InMemoryFeed(range(1, 5), { pageSize: 3 }));

    expect(idsIn(interruptedFile)).toEqual(["1", "2", "3", "4", "5"]);
    expect(fs.readFileSync(interruptedFile, "utf-8")).toBe(fs.readFileSync(straightFile, "utf-8"));
  });

  it("continues after a resume cursor that was deleted remotely", async () => {
    const file = path.join(dir, "repos.csv");
    await run(file, new InMemoryFeed(range(1, 3)));

    const feed = new InMemoryFeed([rawRepository(1), rawRepository(2), rawRepository(4)]);
    const outcome = await run(file, feed);

    expect(feed.fetched).toEqual([3]);
    expect(outcome.state).toBe("done");
    expect(idsIn(file)).toEqual(["1", "2", "3", "4"]);
  });

  it("skips the cursor check when it is turned off", async () => {
    const file = path.join(dir, "repos.csv");
    await run(file, new InMemoryFeed(range(1, 2)));

    const feed = new InMemoryFeed(range(1, 4));
    await run(file, feed, false);

    expect(feed.fetched).toEqual([]);
    expect(idsIn(file)).toEqual(["1", "2", "3", "4"]);
  });

  it("stops before streaming when the cursor check hits the quota", async () => {
    const file = path.join(dir, "repos.csv");
    await run(file, new InMemoryFeed(range(1, 2)));

    const feed = new InMemoryFeed(range(1, 4));
    feed.fetchRepository = async () => {
      throw new RateLimitError("GitHub API rate limit exceeded");
    };
    const outcome = await run(file, feed);

    expect(outcome).toMatchObject({ state: "interrupted", written: 0, cursor: 2 });
    expect(outcome.stop.reason).toBe("quota-stopped");
    expect(feed.pageRequests).toEqual([]);
  });

  it("writes past a repository whose details are blocked", async () => {
    const file = path.join(dir, "repos.csv");
    const feed = new InMemoryFeed(range(1, 3));
    feed.fetchRepository = async (id: number) => {
      if (id === 2) {
        throw new GitHubAPIError("GitHub API request failed: Repository access blocked", 403);
      }
      return rawRepository(id);
    };

    const sink = await ResumableCsvSink.open(file);
    const outcome = await harvestRepositories(feed, sink, { hydrate: true }).finally(() => sink.close());

    expect(outcome).toEqual({
      state: "done",
      stop: { reason: "exhausted" },
      written: 3,
      cursor: 3,
    });
    expect(idsIn(file)).toEqual(["1", "2", "3"]);
  });

  it("turns a failed append into a failed stop", async () => {
    const appended: number[] = [];
    const sink: RepositorySink = {
      cursor: null,
      written: 0,
      append(record) {
        if (record.id === 2) {
          throw new Error("ENOSPC: no space left on device");
        }
        appended.push(record.id);
      },
      close() {},
    };

    const outcome = await harvestRepositories(new InMemoryFeed(range(1, 3)), sink);

    expect(appended).toEqual([1]);
    expect(outcome.state).toBe("interrupted");
    expect(outcome.stop.reason).toBe("failed");
    if (outcome.stop.reason === "failed") {
      expect(outcome.stop.error.message).toBe("ENOSPC: no space left on device");
    }
  });

  it("stops as interrupted when the signal aborts mid-run", async () => {
    const file = path.join(dir, "repos.csv");
    const controller = new AbortController();
    const sink = await ResumableCsvSink.open(file);
    const feed = new InMemoryFeed(range(1, 5));
    const append = sink.append.bind(sink);
    sink.append = (record) => {
      append(record);
      if (record.id === 2) controller.abort();
    };

    const outcome = await harvestRepositories(feed, sink, { signal: controller.signal });
    sink.close();

    expect(outcome).toEqual({
      state: "interrupted",
      stop: { reason: "interrupted" },
      written: 2,
      cursor: 2,
    });
    expect(idsIn(file)).toEqual(["1", "2"]);
  });
});
