import chalk from "chalk";
import type { LogLevel } from "@callgate/config";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

// Everything goes to stderr: stdout is reserved for output that the next CI step consumes.
export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  return {
    debug: (msg) => {
      if (enabled("debug")) console.error(chalk.dim(`[debug] ${msg}`));
    },
    info: (msg) => {
      if (enabled("info")) console.error(msg);
    },
    warn: (msg) => {
      if (enabled("warn")) console.error(chalk.yellow(msg));
    },
    error: (msg) => {
      if (enabled("error")) console.error(chalk.red(msg));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
