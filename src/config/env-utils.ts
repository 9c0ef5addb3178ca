/**
 * Environment Variable Parsing Utilities
 *
 * Standardized utilities for reading environment variables with type safety
 * and consistent default handling.
 */

/**
 * Read a raw environment variable, preserving empty strings.
 * Undefined means "not set" and lets the config schema apply its default.
 */
export function getEnvValue(key: string): string | undefined {
  return process.env[key];
}

/**
 * Parse comma-separated list from environment variable
 *
 * Trims whitespace from each item and filters out empty strings.
 * Returns undefined when the variable is unset so schema defaults still apply.
 *
 * @example
 * parseListEnv('TRUSTED_IMAGE_MARKERS') // ['a', 'b'] if TRUSTED_IMAGE_MARKERS='a, b'
 */
export function parseListEnv(key: string, delimiter = ','): string[] | undefined {
  const value = process.env[key];
  if (value === undefined) return undefined;
  return value
    .split(delimiter)
    .map((s) => s.trim())
    .filter(Boolean);
}
