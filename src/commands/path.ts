import { Command } from "commander";
import { handleCommandError } from "../utils";
import { type CommonOptions, loadContext } from "./context";

export function createPathCommand(): Command {
  const command = new Command("path");

  command
    .description("Print the directory of a worktree (e.g. cd \"$(canopy path repo branch)\")")
    .argument("<repo>", "Repository name under the root")
    .argument("<branch>", "Branch of the worktree")
    .option("-p, --path <dir>", "Directory containing the repositories")
    .option("-v, --verbose", "Print debug output", false)
    .action(async (repo: string, branch: string, options: CommonOptions) => {
      try {
        const { manager } = await loadContext(options);
        const { entry } = await manager.findWorktree(repo, branch);
        console.log(entry.path);
      } catch (error) {
        handleCommandError(error);
      }
    });

  return command;
}
