import { Command } from "commander";
import chalk from "chalk";
import type { CleanupResult } from "../models";
import { formatRelativeTime, handleCommandError } from "../utils";
import { type CommonOptions, confirmAction, loadContext } from "./context";
import { type FilterCommandOptions, addFilterOptions, buildFilterCriteria } from "./list";

interface CleanupCommandOptions extends CommonOptions, FilterCommandOptions {
  dryRun: boolean;
  yes: boolean;
  repo?: string;
  base?: string;
  allowUnpushed: boolean;
}

export function createCleanupCommand(): Command {
  const command = new Command("cleanup");

  command
    .description("Remove clean worktrees whose branches are merged into the primary branch")
    .option("--dry-run", "Show what would be removed without actually removing", false)
    .option("-y, --yes", "Skip confirmation prompt", false)
    .option("-r, --repo <name>", "Only clean up one repository")
    .option("--base <branch>", "Branch to check for merged branches (defaults to each repository's default branch)")
    .option("--allow-unpushed", "Also remove branches with commits their upstream does not have", false)
    .option("-p, --path <dir>", "Directory containing the repositories")
    .option("-v, --verbose", "Print debug output", false);

  addFilterOptions(command).action(async (options: CleanupCommandOptions) => {
    try {
      await runCleanup(options);
    } catch (error) {
      handleCommandError(error);
    }
  });

  return command;
}

async function runCleanup(options: CleanupCommandOptions): Promise<void> {
  const { manager } = await loadContext(options);
  const cleanupOptions = {
    repository: options.repo,
    base: options.base,
    allowUnpushed: options.allowUnpushed,
    filter: buildFilterCriteria(options),
  };

  const plan = await manager.cleanup({ ...cleanupOptions, dryRun: true });
  printSkipped(plan);

  if (plan.planned.length === 0) {
    console.log(chalk.yellow("No worktrees found with merged branches."));
    return;
  }

  console.log(chalk.green(`Found ${plan.planned.length} worktree(s) with merged branches:`));
  console.log();
  for (const status of plan.planned) {
    console.log(chalk.bold(`  ${status.repository}/${status.branch}`));
    console.log(chalk.gray(`    Path: ${status.path}`));
    console.log(chalk.gray(`    Last commit: ${formatRelativeTime(status.lastActivity)}`));
  }
  console.log();

  if (options.dryRun) {
    console.log(chalk.blue("This was a dry run. Remove --dry-run flag to actually remove the worktrees."));
    return;
  }

  if (!(await confirmAction(`Remove ${plan.planned.length} worktree(s)?`, options.yes))) {
    console.log(chalk.blue("Operation cancelled."));
    return;
  }

  console.log(chalk.blue("Removing worktrees..."));
  const result = await manager.cleanup(cleanupOptions);

  for (const status of result.removed) {
    console.log(chalk.green(`✓ Removed worktree: ${status.repository}/${status.branch}`));
  }
  for (const failure of result.failed) {
    console.log(chalk.red(`✗ Failed to remove ${failure.repository}/${failure.branch}: ${failure.error}`));
  }

  console.log();
  console.log(chalk.green(`Cleanup complete: ${result.removed.length} removed, ${result.failed.length} failed`));
  if (result.failed.length > 0) {
    process.exitCode = 1;
  }
}

function printSkipped(result: CleanupResult): void {
  if (result.skipped.length === 0) {
    return;
  }
  console.log(chalk.gray(`Skipping ${result.skipped.length} worktree(s):`));
  for (const { status, reason } of result.skipped) {
    console.log(chalk.gray(`  ${status.repository}/${status.branch}: ${reason}`));
  }
  console.log();
}
