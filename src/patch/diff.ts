/**
 * Minimal single-hunk diff between two line arrays.
 */

import type { Modification } from "./types.ts";

/**
 * The modifications that turn `before` into `after`, as at most one
 * insert, delete or replace covering everything between the common
 * prefix and the common suffix. Equal inputs produce an empty list.
 */
export function diffLines(
  before: readonly string[],
  after: readonly string[],
): Modification[] {
  let prefix = 0;
  const shorter = Math.min(before.length, after.length);
  while (prefix < shorter && before[prefix] === after[prefix]) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < shorter - prefix &&
    before[before.length - 1 - suffix] === after[after.length - 1 - suffix]
  ) {
    suffix++;
  }

  const start = prefix;
  const end = before.length - suffix;
  const newLines = after.slice(prefix, after.length - suffix);

  if (start === end && newLines.length === 0) return [];
  if (start === end) return [{ type: "insert", atLine: start, newLines }];
  if (newLines.length === 0) return [{ type: "delete", range: { start, end } }];
  return [{ type: "replace", range: { start, end }, newLines }];
}
