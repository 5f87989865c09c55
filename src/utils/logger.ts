/**
 * Structured logging with dual output: JSONL to file, plain text to stderr
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import chalk from "chalk";
import type { LoggingConfig } from "../config/types.js";
import type { LogEntry, LogContext } from "./log-types.js";

/** Log level values for comparison */
const LOG_LEVEL_VALUES: Record<LoggingConfig["level"], number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Keys rendered in the stderr prefix rather than as extra fields */
const PREFIX_KEYS = new Set(["ts", "level", "msg", "component", "source", "lineNumber"]);

/** Color formatting per log level */
function formatLevel(level: LogEntry["level"]): string {
  const label = level.toUpperCase().padEnd(5);
  switch (level) {
    case "debug":
      return chalk.dim.white(label);
    case "info":
      return chalk.cyan(label);
    case "warn":
      return chalk.yellow(label);
    case "error":
      return chalk.red(label);
  }
}

/** Format extra fields for human-readable output */
function formatFields(fields: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null) {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

/** Logger class with dual output: JSONL file + stderr plain text */
export class Logger {
  private level: number;
  private logFilePath: string | undefined;
  private writeToStderr: boolean;

  constructor(config: LoggingConfig, options?: { logFilePath?: string; stderr?: boolean }) {
    this.level = LOG_LEVEL_VALUES[config.level];
    this.logFilePath = options?.logFilePath ?? config.file;
    this.writeToStderr = options?.stderr ?? true;

    if (this.logFilePath) {
      mkdirSync(dirname(this.logFilePath), { recursive: true });
    }
  }

  /** Create a child logger with bound context */
  child(ctx: LogContext): ChildLogger {
    return new ChildLogger(this, ctx);
  }

  /** Check if a level should be logged */
  isLevelEnabled(level: LogEntry["level"]): boolean {
    return LOG_LEVEL_VALUES[level] >= this.level;
  }

  /** Core log method */
  log(level: LogEntry["level"], msg: string, fields?: LogContext): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...fields,
    };

    if (this.logFilePath) {
      appendFileSync(this.logFilePath, JSON.stringify(entry) + "\n");
    }

    if (this.writeToStderr) {
      const prefix = `[${entry.ts}] ${formatLevel(level)}`;
      const component = entry.component ? chalk.blue(`[${entry.component}]`) : "";
      const location =
        entry.lineNumber !== undefined
          ? chalk.magenta(`[${entry.source ?? "record"}:${entry.lineNumber}]`)
          : "";
      const extra: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(entry)) {
        if (!PREFIX_KEYS.has(key) && value !== undefined) {
          extra[key] = value;
        }
      }
      process.stderr.write(`${prefix} ${component}${location} ${msg}${formatFields(extra)}\n`);
    }
  }

  /** Log debug message */
  debug(msg: string, fields?: LogContext): void {
    this.log("debug", msg, fields);
  }

  /** Log info message */
  info(msg: string, fields?: LogContext): void {
    this.log("info", msg, fields);
  }

  /** Log warning message */
  warn(msg: string, fields?: LogContext): void {
    this.log("warn", msg, fields);
  }

  /** Log error message */
  error(msg: string, fields?: LogContext): void {
    this.log("error", msg, fields);
  }

  /** Update log level */
  setLevel(level: LoggingConfig["level"]): void {
    this.level = LOG_LEVEL_VALUES[level];
  }

  /** Get the log file path */
  getLogFilePath(): string | undefined {
    return this.logFilePath;
  }
}

/** Child logger that adds bound context to every log entry */
export class ChildLogger {
  private parent: Logger;
  private ctx: LogContext;

  constructor(parent: Logger, ctx: LogContext) {
    this.parent = parent;
    this.ctx = ctx;
  }

  /** Derive a further child with additional bound context */
  child(ctx: LogContext): ChildLogger {
    return new ChildLogger(this.parent, { ...this.ctx, ...ctx });
  }

  /** Check if a level would be written by the parent logger */
  isLevelEnabled(level: LogEntry["level"]): boolean {
    return this.parent.isLevelEnabled(level);
  }

  /** Log debug message */
  debug(msg: string, fields?: LogContext): void {
    this.parent.log("debug", msg, { ...this.ctx, ...fields });
  }

  /** Log info message */
  info(msg: string, fields?: LogContext): void {
    this.parent.log("info", msg, { ...this.ctx, ...fields });
  }

  /** Log warning message */
  warn(msg: string, fields?: LogContext): void {
    this.parent.log("warn", msg, { ...this.ctx, ...fields });
  }

  /** Log error message */
  error(msg: string, fields?: LogContext): void {
    this.parent.log("error", msg, { ...this.ctx, ...fields });
  }
}
