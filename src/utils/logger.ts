/**
 * Logger Utility
 * Leveled console output; the slicer shows whatever the hook prints
 */

import chalk from "chalk";
import type { LoggingConfig } from "../types";

export type LogLevel = LoggingConfig["level"];

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(
    private level: LogLevel = "info",
    private prefix: string = "[ff-gcode-post]",
  ) {}

  /**
   * Create a logger from config; verbose always logs debug output
   */
  static fromConfig(config: LoggingConfig, verbose?: boolean): Logger {
    return new Logger(verbose ? "debug" : config.level);
  }

  enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(chalk.dim(`${this.prefix} ${message}`));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`${this.prefix} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(chalk.yellow(`${this.prefix} ${message}`));
    }
  }

  error(message: string, error?: unknown): void {
    console.error(chalk.red(`${this.prefix} ${message}`));
    if (error !== undefined && this.enabled("debug")) {
      console.error(error);
    }
  }
}
