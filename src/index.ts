#!/usr/bin/env node

import chalk from "chalk";
import { createProgram } from "./cli";
import { handleCommandError } from "./utils";

process.on("uncaughtException", (error) => {
  console.error(chalk.red("Uncaught Exception:"), error.message);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("Unhandled Rejection:"), reason);
  process.exit(1);
});

createProgram().parseAsync().catch(handleCommandError);
