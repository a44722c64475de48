/**
 * Strict scalar parsing for request parameters.
 * Leading/trailing whitespace is ignored; anything else that is not a
 * plain run of decimal digits is rejected.
 */

const DIGITS = /^[0-9]+$/;

/** Parse a non-negative currency amount. Returns null if unparsable. */
export function scanAmount(raw: string): bigint | null {
  const s = raw.trim();
  if (!DIGITS.test(s)) return null;
  return BigInt(s);
}

/** Parse an unsigned integer that fits a JS safe integer. Returns null if unparsable. */
export function scanUnsigned(raw: string): number | null {
  const s = raw.trim();
  if (!DIGITS.test(s)) return null;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : null;
}

/** Optional form values arrive as undefined or "" when omitted. */
export function isAbsent(raw: string | undefined): raw is undefined | "" {
  return raw === undefined || raw === "";
}
