/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types/config";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private scope?: string,
  ) {}

  /**
   * Create a logger that prefixes every message with a scope,
   * e.g. "EN/plain/html"
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope} ${scope}` : scope);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(`${chalk.dim("[DEBUG]")} ${this.format(message)}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${this.format(message)}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${this.format(message)}`);
    }
  }

  error(message: string, error?: Error): void {
    console.error(`${chalk.red("[ERROR]")} ${this.format(message)}`);
    if (error && this.isEnabled("debug")) {
      console.error(error);
    }
  }

  private format(message: string): string {
    return this.scope ? `${chalk.dim(`[${this.scope}]`)} ${message}` : message;
  }
}
