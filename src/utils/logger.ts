/**
 * Logger Utility
 * Handles console output with different log levels. Everything goes to
 * stderr so converted text on stdout stays clean.
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

export class Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly sink: LogSink = (line) => console.error(line),
  ) {}

  isEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      this.sink(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      this.sink(`[INFO] ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      this.sink(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, error?: Error): void {
    this.sink(chalk.red(`[ERROR] ${message}`));
    if (error?.stack && this.isEnabled("debug")) {
      this.sink(chalk.dim(error.stack));
    }
  }
}
