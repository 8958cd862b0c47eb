/**
 * Safe Type Coercion Utilities
 *
 * Provides consistent, safe parsing of loosely typed appliance data into typed values.
 * Absent or meaningless values map to null rather than a defaulted zero or empty string.
 */

/**
 * Convert unknown value to a trimmed string, or null when absent or blank
 *
 * @example
 * parseNullableString(' iphone ') // "iphone"
 * parseNullableString('')         // null
 * parseNullableString(undefined)  // null
 */
export function parseNullableString(val: unknown): string | null {
  if (val == null) return null;
  const str = String(val).trim();
  return str === '' ? null : str;
}

/**
 * Convert unknown value to a non-negative integer, or null when absent or invalid
 *
 * @example
 * parseNullableCount(1234)    // 1234
 * parseNullableCount('17.9')  // 17
 * parseNullableCount(-1)      // null
 * parseNullableCount(null)    // null
 */
export function parseNullableCount(val: unknown): number | null {
  if (val == null || val === '') return null;
  const num = Number(val);
  if (!Number.isFinite(num) || num < 0) return null;
  return Math.trunc(num);
}

/**
 * Convert epoch seconds (possibly fractional) to a Date.
 * Zero, negative and non-numeric values mean "never" and map to null.
 *
 * @example
 * epochSecondsToDate(1700000000)     // 2023-11-14T22:13:20.000Z
 * epochSecondsToDate(1700000000.25)  // 2023-11-14T22:13:20.250Z
 * epochSecondsToDate(0)              // null
 */
export function epochSecondsToDate(val: unknown): Date | null {
  if (val == null || val === '') return null;
  const seconds = Number(val);
  if (!Number.isFinite(seconds) || seconds <= 0) return null;
  return new Date(Math.round(seconds * 1000));
}

/**
 * Latest of two nullable dates
 */
export function maxDate(a: Date | null, b: Date | null): Date | null {
  if (a === null) return b;
  if (b === null) return a;
  return a.getTime() >= b.getTime() ? a : b;
}

/**
 * Largest of two nullable numbers
 */
export function maxNullable(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}
