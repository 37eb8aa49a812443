/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { userInfo } from "node:os";
import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";
import {
  optionalEnv,
  optionalEnvChoice,
  optionalEnvPositiveInt,
} from "./env.js";

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvPositiveInt,
  optionalEnvChoice,
  expandEnvVars,
} from "./env.js";

export interface AppConfig {
  /** Log level */
  readonly logLevel: LogLevel;
  /** Directory for log files; file logging is off when undefined */
  readonly logDir?: string;
  /** Connection string of the observation database */
  readonly opdbUrl: string;
  /** Default value of `--processes` */
  readonly processes: number;
}

function defaultDatabaseUrl(): string {
  let user = "postgres";
  try {
    user = userInfo().username;
  } catch {
    // no passwd entry for this uid (containers); keep the generic role
  }
  return `postgres:///${user}`;
}

/**
 * Load and validate application configuration.
 * Fails fast with ConfigError on malformed values.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const logDir = optionalEnv("LOG_DIR", "", env);
  return {
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info", env),
    logDir: logDir === "" ? undefined : logDir,
    opdbUrl: optionalEnv("OPDB_URL", defaultDatabaseUrl(), env),
    processes: optionalEnvPositiveInt("PIPELINE_PROCESSES", 1, env),
  };
}
