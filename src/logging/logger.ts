/**
 * Lightweight logging utility.
 * Outputs to console, log file and/or a caller-supplied sink with
 * timestamps, run ID and the emitting component.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Receives every formatted entry that passes the level filter. */
export type LogSink = (level: LogLevel, entry: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Component tag printed after the run ID (e.g. "fetch") */
  component?: string;
  /** Extra destination, used by tests to capture output */
  sink?: LogSink;
}

const DEFAULT_OPTIONS = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: true,
} satisfies Omit<Required<LoggerOptions>, "component" | "sink">;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger sharing this one's destinations with a different component tag. */
  child(component: string): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, component and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  component?: string,
  timestamp: string = new Date().toISOString()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const componentStr = component ? ` [${component}]` : "";

  let entry = `[${timestamp}] [${levelStr}] [${runId}]${componentStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context)}`;
  }

  return entry;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context, opts.component);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.sink) {
      opts.sink(level, entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${String(err)}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (component) => createLogger({ ...options, component }),
  };
}

/**
 * Logger that drops everything. Default for library callers that do not
 * pass one.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
