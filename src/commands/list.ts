import { Command } from "commander";
import chalk from "chalk";
import type { FilterCriteria, LocalStatusKind, RemoteStatusKind, Report, WorktreeStatus } from "../models";
import { describeFilter, hasFilters } from "../core/filter";
import {
  formatLocalStatus,
  formatPathWithTilde,
  formatRelativeTime,
  formatRemoteStatus,
  handleCommandError,
} from "../utils";
import { type CommonOptions, loadContext } from "./context";

export interface FilterCommandOptions {
  dirty?: boolean;
  clean?: boolean;
  staged?: boolean;
  missing?: boolean;
  ahead?: boolean;
  behind?: boolean;
  diverged?: boolean;
  notPushed?: boolean;
  notTracking?: boolean;
  upToDate?: boolean;
  active?: boolean;
  needsAttention?: boolean;
  stale?: boolean;
  olderThan?: string;
  newerThan?: string;
}

export interface ListCommandOptions extends CommonOptions, FilterCommandOptions {
  all?: boolean;
  json?: boolean;
  emoji?: boolean;
}

const LOCAL_FLAGS: Array<[keyof FilterCommandOptions, LocalStatusKind]> = [
  ["dirty", "dirty"],
  ["clean", "clean"],
  ["staged", "staged"],
  ["missing", "missing"],
];

const REMOTE_FLAGS: Array<[keyof FilterCommandOptions, RemoteStatusKind]> = [
  ["ahead", "ahead"],
  ["behind", "behind"],
  ["diverged", "diverged"],
  ["notPushed", "not-pushed"],
  ["notTracking", "not-tracking"],
  ["upToDate", "up-to-date"],
];

export function buildFilterCriteria(options: FilterCommandOptions): FilterCriteria {
  const criteria: FilterCriteria = {};

  const local = LOCAL_FLAGS.filter(([flag]) => options[flag] === true).map(([, kind]) => kind);
  const remote = REMOTE_FLAGS.filter(([flag]) => options[flag] === true).map(([, kind]) => kind);
  if (local.length > 0) criteria.local = local;
  if (remote.length > 0) criteria.remote = remote;

  if (options.active) criteria.active = true;
  if (options.needsAttention) criteria.needsAttention = true;
  if (options.stale) criteria.stale = true;
  if (options.olderThan !== undefined) criteria.olderThan = options.olderThan;
  if (options.newerThan !== undefined) criteria.newerThan = options.newerThan;

  return criteria;
}

export function addFilterOptions(command: Command): Command {
  return command
    .option("--dirty", "Only worktrees with unstaged changes")
    .option("--clean", "Only worktrees without changes")
    .option("--staged", "Only worktrees with staged changes")
    .option("--missing", "Only worktrees whose directory is gone")
    .option("--ahead", "Only branches ahead of their upstream")
    .option("--behind", "Only branches behind their upstream")
    .option("--diverged", "Only branches diverged from their upstream")
    .option("--not-pushed", "Only branches whose upstream ref does not exist")
    .option("--not-tracking", "Only branches without an upstream")
    .option("--up-to-date", "Only branches level with their upstream")
    .option("--active", "Only worktrees with recent commits")
    .option("--needs-attention", "Only worktrees that are dirty, staged, diverged or not pushed")
    .option("--stale", "Only clean worktrees without commits for a long time")
    .option("--older-than <age>", "Last commit older than a duration (30d, 2w, 6M) or date (2024-01-31)")
    .option("--newer-than <age>", "Last commit newer than a duration or date");
}

export function createListCommand(): Command {
  const command = new Command("list");

  command
    .alias("ls")
    .description("Show work in progress across all worktrees")
    .option("-p, --path <dir>", "Directory containing the repositories")
    .option("--all", "Include worktrees of each repository's primary branch", false)
    .option("--json", "Output in JSON format", false)
    .option("--no-emoji", "Disable emoji in status output")
    .option("-v, --verbose", "Print debug output", false);

  addFilterOptions(command).action(async (options: ListCommandOptions) => {
    try {
      await runList(options);
    } catch (error) {
      handleCommandError(error);
    }
  });

  return command;
}

async function runList(options: ListCommandOptions): Promise<void> {
  const { manager, config } = await loadContext(options);
  const filter = buildFilterCriteria(options);

  const report = await manager.report({ filter, includePrimary: options.all });

  if (options.json) {
    console.log(JSON.stringify(toJson(report), null, 2));
    return;
  }

  const useEmoji = options.emoji !== false && config.emoji !== false;
  console.log(renderReport(report, filter, useEmoji));
}

export function toJson(report: Report): object {
  return {
    worktrees: report.statuses.map((status) => ({
      ...status,
      lastActivity: status.lastActivity ? status.lastActivity.toISOString() : null,
    })),
    summary: report.summary,
    skippedRepositories: report.skippedRepositories,
  };
}

function colorLocal(status: WorktreeStatus, text: string): string {
  switch (status.local.kind) {
    case "clean":
      return chalk.green(text);
    case "dirty":
    case "staged":
      return chalk.yellow(text);
    case "missing":
      return chalk.red(text);
    default:
      return chalk.gray(text);
  }
}

function colorRemote(status: WorktreeStatus, text: string): string {
  switch (status.remote.kind) {
    case "up-to-date":
      return chalk.green(text);
    case "diverged":
    case "not-pushed":
      return chalk.red(text);
    case "ahead":
    case "behind":
      return chalk.yellow(text);
    default:
      return chalk.gray(text);
  }
}

export function renderReport(
  report: Report,
  filter: FilterCriteria,
  useEmoji: boolean,
  now: Date = new Date(),
): string {
  const lines: string[] = [];

  if (report.statuses.length === 0) {
    lines.push(
      chalk.yellow(
        hasFilters(filter)
          ? "No worktrees match the specified filters."
          : "No work in progress branches found.",
      ),
    );
  } else {
    const rows = report.statuses.map((status) => ({
      status,
      cells: [
        status.repository,
        status.branch,
        formatLocalStatus(status.local, useEmoji),
        formatRemoteStatus(status.remote, useEmoji),
        formatRelativeTime(status.lastActivity, now),
        status.lastCommitSummary ?? "",
      ],
    }));
    const header = ["Repository", "Branch", "Local", "Remote", "Last commit", "Summary"];
    const widths = header.map((title, column) =>
      Math.max(title.length, ...rows.map((row) => row.cells[column].length)),
    );

    const pad = (text: string, column: number): string => text.padEnd(widths[column]);

    lines.push(chalk.bold(header.map(pad).join("  ").trimEnd()));
    for (const { status, cells } of rows) {
      lines.push(
        [
          pad(cells[0], 0),
          chalk.bold(pad(cells[1], 1)),
          colorLocal(status, pad(cells[2], 2)),
          colorRemote(status, pad(cells[3], 3)),
          chalk.gray(pad(cells[4], 4)),
          cells[5],
        ]
          .join("  ")
          .trimEnd(),
      );
      if (status.local.kind === "missing") {
        lines.push(chalk.gray(`  ↳ ${formatPathWithTilde(status.path)} (missing)`));
      }
    }
  }

  if (report.summary.total > 0) {
    const { summary } = report;
    lines.push("");
    lines.push(`Total WIP branches: ${summary.total}`);
    lines.push(`Repositories with WIP: ${summary.repositories}`);
    lines.push(
      chalk.gray(
        `Local: ${summary.local.clean} clean, ${summary.local.dirty} dirty, ${summary.local.staged} staged, ${summary.local.missing} missing` +
          ` | Remote: ${summary.remote["up-to-date"]} up to date, ${summary.remote.ahead} ahead, ${summary.remote.behind} behind, ${summary.remote.diverged} diverged, ${summary.remote["not-pushed"]} not pushed, ${summary.remote["not-tracking"]} not tracking`,
      ),
    );
  }

  if (hasFilters(filter)) {
    lines.push(`Filters applied: ${describeFilter(filter).join(", ")}`);
  }

  if (report.skippedRepositories.length > 0) {
    lines.push(chalk.yellow(`Skipped unreadable repositories: ${report.skippedRepositories.join(", ")}`));
  }

  return lines.join("\n");
}
