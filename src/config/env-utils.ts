/**
 * Environment Variable Parsing Utilities
 *
 * Standardized helpers for reading environment variables with defaults.
 * Empty values count as unset.
 */

/**
 * Parse integer from the first set environment variable among `keys`
 *
 * @example
 * parseIntEnv('PORT', 8000) // 8000 if PORT is unset or not a number
 */
export function parseIntEnv(keys: string | string[], defaultValue: number): number {
  const value = firstSetEnv(keys);
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse string from the first set environment variable among `keys`
 *
 * @example
 * parseStringEnv(['NEW_DOMAIN', 'TARGET_REGISTRY'], 'localhost:5000')
 */
export function parseStringEnv(keys: string | string[], defaultValue: string): string {
  return firstSetEnv(keys) ?? defaultValue;
}

function firstSetEnv(keys: string | string[]): string | undefined {
  for (const key of Array.isArray(keys) ? keys : [keys]) {
    const value = process.env[key]?.trim();
    if (value) return value;
  }
  return undefined;
}
