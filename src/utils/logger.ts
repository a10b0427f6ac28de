/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(private level: LogLevel = "info") {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  // Errors are always shown
  error(message: string, error?: unknown): void {
    console.error(`${chalk.red("[ERROR]")} ${message}`);
    if (error) {
      console.error(error);
    }
  }
}
