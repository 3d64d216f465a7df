import { Command } from "commander";
import chalk from "chalk";
import { handleCommandError } from "../utils";
import { type CommonOptions, loadContext } from "./context";

interface AddCommandOptions extends CommonOptions {
  base?: string;
  dryRun: boolean;
}

export function createAddCommand(): Command {
  const command = new Command("add");

  command
    .description("Create a worktree for a branch of a repository")
    .argument("<repo>", "Repository name under the root")
    .argument("<branch>", "Branch name (created from the base branch if it doesn't exist)")
    .option("-b, --base <branch>", "Base branch for a new branch (defaults to the repository's default branch)")
    .option("--dry-run", "Show what would be created without creating it", false)
    .option("-p, --path <dir>", "Directory containing the repositories")
    .option("-v, --verbose", "Print debug output", false)
    .action(async (repo: string, branch: string, options: AddCommandOptions) => {
      try {
        await runAdd(repo, branch, options);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}

async function runAdd(repo: string, branch: string, options: AddCommandOptions): Promise<void> {
  if (!branch.trim()) {
    throw new Error("Branch name is required");
  }

  const { manager } = await loadContext(options);
  const { performed, plan } = await manager.add(repo, branch.trim(), {
    base: options.base,
    dryRun: options.dryRun,
  });

  const origin = plan.createBranch ? `new branch from ${plan.base}` : "existing branch";

  if (!performed) {
    console.log(chalk.blue(`Would create worktree ${plan.repository}/${plan.branch} (${origin})`));
    console.log(chalk.gray("  Path:"), plan.path);
    return;
  }

  if (plan.createBranch) {
    console.log(chalk.green("✓ Created new branch and worktree:"), chalk.bold(`${plan.repository}/${plan.branch}`));
    console.log(chalk.gray("  Base:"), plan.base);
  } else {
    console.log(chalk.green("✓ Created worktree:"), chalk.bold(`${plan.repository}/${plan.branch}`));
  }
  console.log(chalk.gray("  Path:"), plan.path);
}
