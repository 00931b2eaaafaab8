import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_QUOTA,
  EXIT_USAGE,
  exitCodeFor,
  main,
  parseArgs,
  type CliDependencies,
} from "../src/cli";
import { GitHubAPIError, UsageError } from "../src/lib/errors";
import { REPOSITORY_COLUMNS } from "../src/lib/github/repository-record";
import { InMemorySessionFeed, rawRepository } from "./helpers/feeds";

const range = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, index) => rawRepository(from + index));

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe("parseArgs", () => {
  it("defaults to an anonymous run writing repos.csv", () => {
    expect(parseArgs([])).toEqual({
      token: undefined,
      filename: "repos.csv",
      hydrate: false,
      help: false,
    });
  });

  it("reads the token, filename and hydrate flags", () => {
    expect(parseArgs(["-t", "test-token", "--filename", "out.csv", "--hydrate"])).toEqual({
      token: "test-token",
      filename: "out.csv",
      hydrate: true,
      help: false,
    });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseArgs(["--since", "5"])).toThrow(new UsageError("Unknown option: --since"));
    expect(() => parseArgs(["--token"])).toThrow("Option --token needs a value");
    expect(() => parseArgs(["-f", "--hydrate"])).toThrow("Option -f needs a value");
  });
});

describe("exitCodeFor", () => {
  const outcome = { state: "interrupted" as const, written: 0, cursor: null };

  it("maps each stop reason onto an exit code", () => {
    expect(exitCodeFor({ ...outcome, state: "done", stop: { reason: "exhausted" } })).toBe(EXIT_OK);
    expect(exitCodeFor({ ...outcome, stop: { reason: "interrupted" } })).toBe(EXIT_OK);
    expect(
      exitCodeFor({ ...outcome, stop: { reason: "quota-stopped", resetAt: null, error: new Error("quota") } })
    ).toBe(EXIT_QUOTA);
    expect(exitCodeFor({ ...outcome, stop: { reason: "failed", error: new Error("boom") } })).toBe(EXIT_FAILURE);
  });
});

describe("main", () => {
  function dependenciesFor(feed: InMemorySessionFeed) {
    const tokens: Array<string | undefined> = [];
    const dependencies: CliDependencies = {
      createFeed: (token) => {
        tokens.push(token);
        return feed;
      },
    };
    return { dependencies, tokens };
  }

  it("harvests the whole feed into the given file", async () => {
    const file = path.join(dir, "repos.csv");
    const { dependencies, tokens } = dependenciesFor(new InMemorySessionFeed(range(1, 3)));

    const code = await main(["--token", "test-token", "--filename", file], dependencies);

    expect(code).toBe(EXIT_OK);
    expect(tokens).toEqual(["test-token"]);
    const lines = fs.readFileSync(file, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe(REPOSITORY_COLUMNS.join(","));
    expect(lines[3].startsWith("3,R_3,repo-3,")).toBe(true);
  });

  it("exits with the quota code and resumes on the next run", async () => {
    const file = path.join(dir, "repos.csv");

    const first = dependenciesFor(new InMemorySessionFeed(range(1, 5), { pageSize: 3, pageBudget: 1 }));
    expect(await main(["-f", file], first.dependencies)).toBe(EXIT_QUOTA);

    const second = dependenciesFor(new InMemorySessionFeed(range(1, 5), { pageSize: 3 }));
    expect(await main(["-f", file], second.dependencies)).toBe(EXIT_OK);

    const ids = fs.readFileSync(file, "utf-8").trimEnd().split("\n").slice(1).map((line) => line.split(",")[0]);
    expect(ids).toEqual(["1", "2", "3", "4", "5"]);
  });

  it("fails when the session cannot be described", async () => {
    const feed = new InMemorySessionFeed([]);
    feed.describeSession = async () => {
      throw new GitHubAPIError("GitHub API request failed: Bad credentials", 401);
    };

    const code = await main(["-f", path.join(dir, "repos.csv")], dependenciesFor(feed).dependencies);

    expect(code).toBe(EXIT_FAILURE);
    expect(fs.existsSync(path.join(dir, "repos.csv"))).toBe(false);
  });

  it("fails on an output file it cannot resume from", async () => {
    const file = path.join(dir, "repos.csv");
    fs.writeFileSync(file, "something,else\n");

    const code = await main(["-f", file], dependenciesFor(new InMemorySessionFeed([])).dependencies);

    expect(code).toBe(EXIT_FAILURE);
    expect(fs.readFileSync(file, "utf-8")).toBe("something,else\n");
  });

  it("reports usage errors without contacting GitHub", async () => {
    const { dependencies, tokens } = dependenciesFor(new InMemorySessionFeed([]));

    expect(await main(["--verbose"], dependencies)).toBe(EXIT_USAGE);
    expect(tokens).toEqual([]);
  });

  it("prints help", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(await main(["--help"], dependenciesFor(new InMemorySessionFeed([])).dependencies)).toBe(EXIT_OK);
    expect(log).toHaveBeenCalledTimes(1);
  });
});
