/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import type { LoggerOptions } from "../logging/index.js";
import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";

export { ConfigError } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
type ConfiguredLogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: ConfiguredLogLevel;
  /** Write log lines to LOG_DIR in addition to the console */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Application name, also the log file's base name */
  readonly appName: string;
}

function isLogLevel(value: string): value is ConfiguredLogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Load and validate application configuration.
 *
 * @throws ConfigError on an unknown NODE_ENV or LOG_LEVEL
 */
export function loadAppConfig(): AppConfig {
  const env = optionalEnv("NODE_ENV", "development");
  if (!["development", "production", "test"].includes(env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${env}. Must be development, production, or test.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info");
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return {
    env,
    logLevel,
    logToFile: optionalEnvBool("LOG_TO_FILE", env !== "test"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    appName: optionalEnv("APP_NAME", "doc-research-pipeline"),
  };
}

/**
 * Logger destinations for this configuration. Log lines go to
 * `<logDir>/<appName>.log` when file output is on.
 */
export function appLoggerOptions(app: AppConfig): LoggerOptions {
  return {
    level: app.logLevel,
    file: app.logToFile,
    logDir: app.logDir,
    logFile: `${app.appName}.log`,
  };
}
