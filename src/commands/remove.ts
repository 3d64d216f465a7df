import { Command } from "commander";
import chalk from "chalk";
import { formatLocalStatus, handleCommandError } from "../utils";
import { type CommonOptions, confirmAction, loadContext } from "./context";

interface RemoveCommandOptions extends CommonOptions {
  force: boolean;
  dryRun: boolean;
  yes: boolean;
}

export function createRemoveCommand(): Command {
  const command = new Command("remove");

  command
    .alias("rm")
    .description("Remove a worktree")
    .argument("<repo>", "Repository name under the root")
    .argument("<branch>", "Branch of the worktree to remove")
    .option("--force", "Remove the worktree even if it has uncommitted changes", false)
    .option("--dry-run", "Check whether the worktree can be removed without removing it", false)
    .option("-y, --yes", "Skip confirmation prompt", false)
    .option("-p, --path <dir>", "Directory containing the repositories")
    .option("-v, --verbose", "Print debug output", false)
    .action(async (repo: string, branch: string, options: RemoveCommandOptions) => {
      try {
        await runRemove(repo, branch, options);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

async function runRemove(repo: string, branch: string, options: RemoveCommandOptions): Promise<void> {
  const { manager } = await loadContext(options);

  // Runs every safety check without touching anything
  const check = await manager.remove(repo, branch, { force: options.force, dryRun: true });
  const label = `${check.status.repository}/${check.status.branch}`;

  if (options.dryRun) {
    console.log(chalk.blue(`Would remove worktree ${label}`));
    console.log(chalk.gray("  Path:"), check.status.path);
    console.log(chalk.gray("  Status:"), formatLocalStatus(check.status.local, false));
    return;
  }

  const loses = check.status.local.kind === "dirty" || check.status.local.kind === "staged";
  const message = loses
    ? `Are you sure you want to remove the worktree for '${label}'? Uncommitted changes will be lost!`
    : `Are you sure you want to remove the worktree for '${label}'?`;

  if (!(await confirmAction(message, options.yes))) {
    console.log(chalk.blue("Operation cancelled."));
    return;
  }

  await manager.remove(repo, branch, { force: options.force });
  console.log(chalk.green("✓ Removed worktree:"), chalk.bold(label));
}
