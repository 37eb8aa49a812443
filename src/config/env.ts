/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: Env = process.env): string {
  const value = env[key];
  if (value === undefined || value === "") {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: Env = process.env
): string {
  const value = env[key];
  return value !== undefined && value !== "" ? value : defaultValue;
}

/**
 * Get an optional environment variable as a positive integer.
 */
export function optionalEnvPositiveInt(
  key: string,
  defaultValue: number,
  env: Env = process.env
): number {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(
      `Environment variable ${key} must be a positive integer, got: ${value}`
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable restricted to a fixed set of values.
 */
export function optionalEnvChoice<T extends string>(
  key: string,
  choices: readonly T[],
  defaultValue: T,
  env: Env = process.env
): T {
  const value = env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid ${key}: ${value}. Must be one of ${choices.join(", ")}.`
    );
  }
  return match;
}

/**
 * Replace `$NAME` and `${NAME}` with environment values.
 * References to unset variables are left untouched.
 */
export function expandEnvVars(template: string, env: Env = process.env): string {
  return template.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (name === undefined) {
        return match;
      }
      const value = env[name];
      return value === undefined ? match : value;
    }
  );
}
