/**
 * Plumbing shared by the command-line entry points.
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { ConfigError } from "../config/env.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

/**
 * Whether the module at `moduleUrl` is the script node was started with,
 * also when started through an npm bin symlink.
 */
export function isMainModule(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return pathToFileURL(realpathSync(entry)).href === moduleUrl;
  } catch {
    return false;
  }
}

/**
 * Values of a repeatable option, each of which may be comma-separated:
 * `--blocks a,b --blocks c` gives ["a", "b", "c"].
 */
export function splitListOption(values: readonly string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Integer option value.
 *
 * @throws ConfigError if `value` is not an integer
 */
export function parseIntegerOption(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new ConfigError(`--${name} must be an integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Log level option; case-insensitive, so "INFO" and "info" are the same.
 *
 * @throws ConfigError on an unknown level
 */
export function parseLogLevelOption(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigError(`Invalid --loglevel: ${value}. Must be one of debug, info, warn, error.`);
  }
  return level;
}

function hasFormat(error: Error): error is Error & { format(): string } {
  return "format" in error && typeof error.format === "function";
}

/**
 * Run `main`, printing any error and exiting with status 1 on failure.
 */
export function runCli(main: () => Promise<void>): void {
  main().catch((err: unknown) => {
    if (err instanceof Error) {
      console.error(`Error: ${hasFormat(err) ? err.format() : err.message}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exit(1);
  });
}
