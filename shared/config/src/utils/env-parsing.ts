/**
 * Environment Variable Parsing Utilities
 *
 * Value-based parsing functions that accept a raw string value and return
 * a parsed value or a safe default. They work with pre-read values, which
 * keeps them composable with `??`.
 *
 * Conventions:
 * - Returns `defaultValue` for `undefined`, empty string, or NaN results
 * - Does NOT throw; range checks happen in the zod schemas afterwards
 */

/**
 * Parse a string value as an integer, returning `defaultValue` if
 * the value is undefined, empty, or not a valid integer.
 *
 * @example
 * ```typescript
 * const attempts = safeParseInt(process.env.FAILOVER_MAX_RECOVERY_ATTEMPTS, 3);
 * ```
 */
export function safeParseInt(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string value as a float, returning `defaultValue` if
 * the value is undefined, empty, or not a valid number.
 */
export function safeParseFloat(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a duration given in (possibly fractional) seconds into milliseconds.
 */
export function parseSecondsToMs(value: string | undefined, defaultMs: number): number {
  if (!value) return defaultMs;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultMs : Math.round(parsed * 1000);
}

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

/**
 * Parse a boolean flag. Unrecognized values fall back to the default.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return defaultValue;
}

/**
 * Parse a rate limit spec of the form `<maxTokens>/<intervalSeconds>`,
 * e.g. `RATE_LIMIT_ORDER=50/10`.
 *
 * Returns `undefined` when the value is missing or malformed so that the
 * caller keeps its default.
 */
export function parseRateLimitSpec(
  value: string | undefined
): { maxTokens: number; intervalMs: number } | undefined {
  if (!value) return undefined;
  const match = /^\s*(\d+(?:\.\d+)?)\s*\/\s*(\d+(?:\.\d+)?)\s*$/.exec(value);
  if (!match) return undefined;
  return {
    maxTokens: parseFloat(match[1]),
    intervalMs: Math.round(parseFloat(match[2]) * 1000),
  };
}
