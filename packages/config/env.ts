/**
 * Environment Variable Utilities
 *
 * Provides safe parsing of environment variables.
 */

/**
 * Parse integer environment variable with default
 */
export function parseIntEnv(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (!value) return defaultValue;
  // Number('  ') is 0, so whitespace-only values must fall back to the default
  const trimmed = value.trim();
  if (!trimmed) return defaultValue;
  const parsed = Number(trimmed);
  return Number.isInteger(parsed) ? parsed : defaultValue;
}

/**
 * Read a string environment variable, treating blank values as unset
 */
export function parseStringEnv(name: string, defaultValue: string): string {
  const value = process.env[name]?.trim();
  return value ? value : defaultValue;
}
