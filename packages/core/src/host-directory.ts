/**
 * Host directory pagination.
 *
 * An unparsable count is an error. A count larger than the directory is
 * not: it is clamped to the full length. Keep the two paths distinct.
 */

import { InputValidationError } from "./errors.js";
import { isAbsent, scanUnsigned } from "./scan.js";

/** undefined = no count requested (return everything). */
export function parseHostCount(requestedCount?: string): number | undefined {
  if (isAbsent(requestedCount)) return undefined;
  const count = scanUnsigned(requestedCount);
  if (count === null) {
    throw new InputValidationError("invalid_count", `Couldn't parse numhosts: "${requestedCount}"`);
  }
  return count;
}

export function takeHosts<T>(hosts: readonly T[], count: number | undefined): T[] {
  if (count === undefined) return hosts.slice();
  return hosts.slice(0, Math.min(count, hosts.length));
}

/** Prefix of `hosts`; `requestedCount` is parsed as above. */
export function sliceHosts<T>(hosts: readonly T[], requestedCount?: string): T[] {
  return takeHosts(hosts, parseHostCount(requestedCount));
}
