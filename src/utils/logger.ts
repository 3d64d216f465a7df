import chalk from "chalk";

export interface Logger {
  warn(message: string): void;
  debug(message: string): void;
}

let verbose = process.env.CANOPY_DEBUG === "1";

export function enableDebug(): void {
  verbose = true;
}

/**
 * Console-backed logger. Diagnostics go to stderr so that `--json` output
 * on stdout stays parseable.
 */
export const consoleLogger: Logger = {
  warn: (message) => console.error(chalk.yellow(`Warning: ${message}`)),
  debug: (message) => {
    if (verbose) {
      console.error(`${chalk.dim("[debug]")} ${message}`);
    }
  },
};

export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
