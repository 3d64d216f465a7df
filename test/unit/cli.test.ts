import { describe, test, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import chalk from "chalk";
import { createProgram, readVersion } from "../../src/cli";
import { buildFilterCriteria, renderReport, toJson } from "../../src/commands/list";
import { summarize } from "../../src/core/summary";
import type { Report } from "../../src/models";
import { daysAgo } from "../helpers/FakeGitClient";
import { makeStatus } from "../helpers/statuses";

const NOW = new Date("2024-06-15T12:00:00Z");

function reportOf(statuses: Report["statuses"]): Report {
  return { statuses, summary: summarize(statuses), skippedRepositories: [] };
}

beforeAll(() => {
  chalk.level = 0;
});

describe("createProgram", () => {
  test("should register every command", () => {
    const names = createProgram().commands.map((command) => command.name());
    expect(names).toEqual(["list", "add", "remove", "cleanup", "path"]);
  });

  test("should report the package version", () => {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "..", "..", "package.json"), "utf-8"));
    expect(pkg).toMatchObject({ version: readVersion() });
  });
});

describe("buildFilterCriteria", () => {
  test("should map flags to status kinds", () => {
    expect(
      buildFilterCriteria({ dirty: true, notPushed: true, upToDate: true, needsAttention: true, olderThan: "30d" }),
    ).toEqual({
      local: ["dirty"],
      remote: ["not-pushed", "up-to-date"],
      needsAttention: true,
      olderThan: "30d",
    });
  });

  test("should leave out unset flags", () => {
    expect(buildFilterCriteria({})).toEqual({});
  });
});

describe("renderReport", () => {
  beforeEach(() => {
    vi.stubEnv("HOME", "/home/tester");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("should print a table followed by the summary", () => {
    const report = reportOf([
      makeStatus({
        repository: "alpha",
        branch: "feature",
        local: { kind: "dirty" },
        remote: { kind: "ahead", ahead: 2 },
        lastActivity: daysAgo(NOW, 3),
        lastCommitSummary: "Add login",
      }),
      makeStatus({
        repository: "beta",
        branch: "fix",
        path: "/srv/beta/fix",
        local: { kind: "missing" },
        remote: { kind: "not-tracking" },
      }),
    ]);

    expect(renderReport(report, {}, false, NOW).split("\n")).toEqual([
      "Repository  Branch   Local    Remote        Last commit  Summary",
      "alpha       feature  Dirty    Ahead 2       3 days ago   Add login",
      "beta        fix      Missing  Not tracking  unknown",
      "  ↳ /srv/beta/fix (missing)",
      "",
      "Total WIP branches: 2",
      "Repositories with WIP: 2",
      "Local: 0 clean, 1 dirty, 0 staged, 1 missing | Remote: 0 up to date, 1 ahead, 0 behind, 0 diverged, 0 not pushed, 1 not tracking",
    ]);
  });

  test("should explain an empty filtered result", () => {
    expect(renderReport(reportOf([]), { local: ["dirty"] }, false, NOW).split("\n")).toEqual([
      "No worktrees match the specified filters.",
      "Filters applied: dirty",
    ]);
  });

  test("should say so when there is no work in progress", () => {
    expect(renderReport(reportOf([]), {}, true, NOW)).toBe("No work in progress branches found.");
  });

  test("toJson writes dates as ISO strings", () => {
    const json = toJson(reportOf([makeStatus({ lastActivity: new Date("2024-06-01T00:00:00Z") })]));
    expect(json).toMatchObject({
      worktrees: [{ repository: "alpha", branch: "feature", lastActivity: "2024-06-01T00:00:00.000Z" }],
      skippedRepositories: [],
    });
  });
});

describe("CLI runs", () => {
  let home: string;
  let root: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), "canopy-home-"));
    root = fs.mkdtempSync(path.join(os.tmpdir(), "canopy-root-"));
    vi.stubEnv("HOME", home);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    fs.rmSync(home, { recursive: true, force: true });
    fs.rmSync(root, { recursive: true, force: true });
  });

  test("list is the default command and prints JSON for an empty root", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    await createProgram().parseAsync(["node", "canopy", "--path", root, "--json"]);

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual({
      worktrees: [],
      summary: {
        total: 0,
        repositories: 0,
        local: { clean: 0, dirty: 0, staged: 0, missing: 0, unknown: 0 },
        remote: {
          "up-to-date": 0,
          ahead: 0,
          behind: 0,
          diverged: 0,
          "not-pushed": 0,
          "not-tracking": 0,
          unknown: 0,
        },
      },
      skippedRepositories: [],
    });
  });

  test("should exit with an error for a bad filter argument", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    await expect(
      createProgram().parseAsync(["node", "canopy", "list", "--path", root, "--older-than", "soon"]),
    ).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      "Error:",
      expect.stringContaining("Invalid --older-than value: Invalid duration format: soon"),
    );
  });

  test("should reject an invalid config file", async () => {
    fs.mkdirSync(path.join(home, ".config", "canopy"), { recursive: true });
    fs.writeFileSync(path.join(home, ".config", "canopy", "config.json"), '{"concurrency": "lots"}');
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });

    await expect(createProgram().parseAsync(["node", "canopy", "list", "--path", root])).rejects.toThrow(
      "exit 1",
    );
    expect(error).toHaveBeenCalledWith("Error:", expect.stringContaining("Invalid config in"));
  });
});
