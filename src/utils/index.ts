import * as path from "path";
import { readFile } from "fs/promises";
import chalk from "chalk";
import { z } from "zod";
import type { LocalStatus, RemoteStatus } from "../models";
import { ConfigError, InvalidBranchNameError, errorMessage } from "./errors";

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Standard error handler for CLI commands.
 * Formats and displays the error, then exits with code 1.
 */
export function handleCommandError(error: unknown): never {
  console.error(chalk.red("Error:"), errorMessage(error));
  process.exit(1);
}

// ============================================================================
// Configuration
// ============================================================================

export const ROOT_ENV_VAR = "CANOPY_ROOT";

/**
 * Get the path to the canopy config directory (~/.config/canopy).
 */
export function getConfigDir(): string {
  const home = process.env.HOME || process.env.USERPROFILE || "";
  return path.join(home, ".config", "canopy");
}

/**
 * Get the path to the canopy config file (~/.config/canopy/config.json).
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.json");
}

const configSchema = z
  .object({
    root: z.string().min(1).optional(),
    activeDays: z.number().positive().optional(),
    staleDays: z.number().positive().optional(),
    concurrency: z.number().int().positive().optional(),
    emoji: z.boolean().optional(),
  })
  .strict();

export type CanopyConfig = z.infer<typeof configSchema>;

export function parseConfig(content: string, source: string): CanopyConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${source}: ${errorMessage(error)}`);
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${source}: ${issues}`);
  }
  return result.data;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Read the canopy config file. A missing file yields an empty config.
 */
export async function readConfig(configPath: string = getConfigPath()): Promise<CanopyConfig> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw new ConfigError(`Could not read ${configPath}: ${errorMessage(error)}`);
  }
  return parseConfig(content, configPath);
}

/**
 * Root directory to scan: --path, then $CANOPY_ROOT, then the config file,
 * then the working directory.
 */
export function resolveRoot(
  optionPath: string | undefined,
  config: CanopyConfig,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const chosen = optionPath || env[ROOT_ENV_VAR] || config.root || cwd;
  return path.resolve(cwd, expandHome(chosen));
}

function expandHome(input: string): string {
  const home = process.env.HOME || process.env.USERPROFILE;
  if (home && (input === "~" || input.startsWith("~/"))) {
    return path.join(home, input.slice(1));
  }
  return input;
}

// ============================================================================
// Durations and ages
// ============================================================================

// Duration constants in milliseconds
const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;
const MS_PER_WEEK = 7 * MS_PER_DAY;
const MS_PER_MONTH = 30 * MS_PER_DAY; // Approximate
const MS_PER_YEAR = 365 * MS_PER_DAY;

const DURATION_HELP =
  "use formats like: 30, 30d, 2w, 6M, 1y, 12h, 30m, 2weeks or ISO 8601 like P30D, P1Y, P2W, PT1H";

const LONG_UNITS: Record<string, string> = {
  day: "D",
  week: "W",
  month: "M",
  year: "Y",
};

const LONG_TIME_UNITS: Record<string, string> = {
  hour: "H",
  minute: "M",
  second: "S",
};

/**
 * Normalize human-friendly duration strings to ISO 8601 format.
 * Accepts formats like: 30, 30d, 2w, 6M, 1y, 12h, 30m, 3days, 2 weeks
 * Returns ISO 8601 format: P30D, P2W, P6M, P1Y, PT12H, PT30M
 * Note: Uppercase M = months, lowercase m = minutes; a bare number is days
 */
export function normalizeDuration(durationStr: string): string {
  const normalized = durationStr.trim();
  if (normalized === "") {
    return normalized;
  }

  // If it already starts with 'P', assume it's ISO 8601 format
  if (normalized.toUpperCase().startsWith("P")) {
    return normalized;
  }

  if (/^\d+(?:\.\d+)?$/.test(normalized)) {
    return `P${normalized}D`;
  }

  const long = normalized.match(/^(\d+(?:\.\d+)?)\s*(day|week|month|year|hour|minute|second)s?$/i);
  if (long) {
    const [, value, word] = long;
    const unit = word.toLowerCase();
    const timeUnit = LONG_TIME_UNITS[unit];
    return timeUnit ? `PT${value}${timeUnit}` : `P${value}${LONG_UNITS[unit]}`;
  }

  const match = normalized.match(/^(\d+(?:\.\d+)?)\s*([dDwWMmyYhHsS])$/);
  if (!match) {
    // Return as-is if format doesn't match - let parseDuration handle error
    return normalized;
  }

  const [, value, unit] = match;

  switch (unit) {
    case "d":
    case "D":
      return `P${value}D`;
    case "w":
    case "W":
      return `P${value}W`;
    case "M": // Uppercase M = months
      return `P${value}M`;
    case "y":
    case "Y":
      return `P${value}Y`;
    case "h":
    case "H":
      return `PT${value}H`;
    case "m": // Lowercase m = minutes
      return `PT${value}M`;
    default:
      return `PT${value}S`;
  }
}

const ISO_DURATION =
  /^P(?:(\d+(?:\.\d+)?)Y)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)W)?(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/**
 * Parse ISO 8601 duration string to milliseconds. Returns 0 for anything
 * that is not a well-formed duration.
 */
function parseISO8601Duration(iso: string): number {
  const match = iso.toUpperCase().match(ISO_DURATION);
  if (!match) {
    return 0;
  }

  const weights = [
    MS_PER_YEAR,
    MS_PER_MONTH,
    MS_PER_WEEK,
    MS_PER_DAY,
    MS_PER_HOUR,
    MS_PER_MINUTE,
    MS_PER_SECOND,
  ];

  return weights.reduce((total, weight, i) => {
    const part = match[i + 1];
    return part === undefined ? total : total + parseFloat(part) * weight;
  }, 0);
}

export function parseDuration(durationStr: string): number {
  if (!durationStr || durationStr.trim() === "") {
    throw new Error(`Duration cannot be empty (${DURATION_HELP})`);
  }

  const ms = parseISO8601Duration(normalizeDuration(durationStr));
  if (ms > 0) {
    return ms;
  }

  throw new Error(`Invalid duration format: ${durationStr} (${DURATION_HELP})`);
}

const ABSOLUTE_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Turn an age argument into an absolute cutoff instant. Accepts either a
 * duration (measured back from `now`) or a calendar date.
 */
export function parseAgeCutoff(input: string, now: Date): Date {
  const trimmed = input.trim();
  const date = trimmed.match(ABSOLUTE_DATE);
  if (date) {
    const [year, month, day] = date.slice(1, 4).map(Number);
    // Day 0 of the next month is the last day of this one
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    const time = Date.parse(trimmed);
    if (month < 1 || month > 12 || day < 1 || day > daysInMonth || Number.isNaN(time)) {
      throw new Error(`Invalid date: ${input}`);
    }
    return new Date(time);
  }
  return new Date(now.getTime() - parseDuration(trimmed));
}

// ============================================================================
// Formatting
// ============================================================================

export function formatRelativeTime(date: Date | null, now: Date = new Date()): string {
  if (!date || date.getTime() === 0) {
    return "unknown";
  }

  const diffMs = now.getTime() - date.getTime();
  const hours = diffMs / MS_PER_HOUR;

  if (hours < 1) {
    const minutes = Math.max(0, Math.floor(diffMs / MS_PER_MINUTE));
    const unit = minutes === 1 ? "minute" : "minutes";
    return `${minutes} ${unit} ago`;
  } else if (hours < 24) {
    const count = Math.floor(hours);
    const unit = count === 1 ? "hour" : "hours";
    return `${count} ${unit} ago`;
  } else if (hours < 24 * 7) {
    const days = Math.floor(hours / 24);
    const unit = days === 1 ? "day" : "days";
    return `${days} ${unit} ago`;
  } else if (hours < 24 * 30) {
    const weeks = Math.floor(hours / (24 * 7));
    const unit = weeks === 1 ? "week" : "weeks";
    return `${weeks} ${unit} ago`;
  } else {
    return date.toISOString().split("T")[0]; // YYYY-MM-DD format
  }
}

export function formatPathWithTilde(filePath: string): string {
  const homeDir = process.env.HOME || process.env.USERPROFILE;
  if (homeDir && filePath.startsWith(homeDir)) {
    // Only replace if the path is exactly homeDir or followed by a path separator
    if (filePath === homeDir || filePath[homeDir.length] === "/") {
      return filePath.replace(homeDir, "~");
    }
  }
  return filePath;
}

const LOCAL_LABELS: Record<LocalStatus["kind"], { text: string; emoji: string }> = {
  clean: { text: "Clean", emoji: "✅" },
  dirty: { text: "Dirty", emoji: "🔧" },
  staged: { text: "Staged", emoji: "📦" },
  missing: { text: "Missing", emoji: "❌" },
  unknown: { text: "Unknown", emoji: "❔" },
};

export function formatLocalStatus(status: LocalStatus, emoji = false): string {
  const label = LOCAL_LABELS[status.kind];
  return emoji ? `${label.emoji} ${label.text}` : label.text;
}

export function formatRemoteStatus(status: RemoteStatus, emoji = false): string {
  let text: string;
  let icon: string;
  switch (status.kind) {
    case "up-to-date":
      text = "Up to date";
      icon = "✅";
      break;
    case "ahead":
      text = `Ahead ${status.ahead}`;
      icon = "⬆️";
      break;
    case "behind":
      text = `Behind ${status.behind}`;
      icon = "⬇️";
      break;
    case "diverged":
      text = `Diverged +${status.ahead}/-${status.behind}`;
      icon = "🔀";
      break;
    case "not-pushed":
      text = "Not pushed";
      icon = "📤";
      break;
    case "not-tracking":
      text = "Not tracking";
      icon = "🚫";
      break;
    case "unknown":
      text = "Unknown";
      icon = "❔";
      break;
  }
  return emoji ? `${icon} ${text}` : text;
}

// ============================================================================
// Worktree paths
// ============================================================================

/**
 * Directory a new worktree for `branchName` goes into: a child of the
 * repository directory named after the branch.
 */
export function getWorktreePath(branchName: string, repositoryDir: string): string {
  // Validate branch name doesn't contain path traversal
  if (!branchName.trim() || branchName.includes("..") || path.isAbsolute(branchName)) {
    throw new InvalidBranchNameError(
      `Invalid branch name '${branchName}': contains path traversal characters`,
      { branch: branchName },
    );
  }

  // Sanitize special characters that could cause issues on various filesystems
  const sanitizedName = branchName.replace(/[<>:"|?*]/g, "-");

  // Replace slashes with the OS path separator for nested branches
  const dirName = sanitizedName.replace(/\//g, path.sep);

  const resolvedPath = path.resolve(repositoryDir, dirName);
  const resolvedRoot = path.resolve(repositoryDir);
  if (!resolvedPath.startsWith(resolvedRoot + path.sep)) {
    throw new InvalidBranchNameError(
      `Invalid branch name '${branchName}': would create worktree outside the repository`,
      { branch: branchName },
    );
  }

  return resolvedPath;
}
