import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import { z } from "zod";
import { createAddCommand } from "./commands/add";
import { createCleanupCommand } from "./commands/cleanup";
import { createListCommand } from "./commands/list";
import { createPathCommand } from "./commands/path";
import { createRemoveCommand } from "./commands/remove";

const packageSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const packagePath = path.join(__dirname, "..", "package.json");
  return packageSchema.parse(JSON.parse(fs.readFileSync(packagePath, "utf-8"))).version;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("canopy")
    .description("Work-in-progress overview and cleanup for bare git repositories and their worktrees")
    .version(readVersion());

  program.addCommand(createListCommand(), { isDefault: true });
  program.addCommand(createAddCommand());
  program.addCommand(createRemoveCommand());
  program.addCommand(createCleanupCommand());
  program.addCommand(createPathCommand());

  return program;
}
