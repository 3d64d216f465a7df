import confirm from "@inquirer/confirm";
import { WorktreeManager } from "../git/WorktreeManager";
import { SimpleGitClient } from "../git/SimpleGitClient";
import { type CanopyConfig, readConfig, resolveRoot } from "../utils";
import { DEFAULT_THRESHOLDS } from "../core/filter";
import { consoleLogger, enableDebug } from "../utils/logger";

export interface CommonOptions {
  path?: string;
  verbose?: boolean;
}

export interface CommandContext {
  manager: WorktreeManager;
  config: CanopyConfig;
}

/**
 * Read the config file, resolve the root to scan and wire a manager to the
 * git binary. Every command goes through here.
 */
export async function loadContext(options: CommonOptions): Promise<CommandContext> {
  if (options.verbose) {
    enableDebug();
  }

  const config = await readConfig();
  const root = resolveRoot(options.path, config);
  consoleLogger.debug(`Scanning ${root}`);

  const manager = new WorktreeManager(root, new SimpleGitClient({ logger: consoleLogger }), {
    logger: consoleLogger,
    concurrency: config.concurrency,
    thresholds: {
      activeDays: config.activeDays ?? DEFAULT_THRESHOLDS.activeDays,
      staleDays: config.staleDays ?? DEFAULT_THRESHOLDS.staleDays,
    },
  });

  return { manager, config };
}

/**
 * Ask before a destructive step. Without a terminal there is nobody to ask,
 * so the caller must have passed --yes.
 */
export async function confirmAction(message: string, skip: boolean): Promise<boolean> {
  if (skip) {
    return true;
  }
  if (!process.stdin.isTTY) {
    throw new Error("Confirmation required but stdin is not a TTY. Re-run with --yes.");
  }
  return confirm({ message, default: false });
}
