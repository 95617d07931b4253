/**
 * Patch applicator: applies a modification list expressed in original
 * line indices with a single left-to-right merge.
 */

import { MalformedPatchError } from "../errors.ts";
import type { Modification } from "./types.ts";
import { modificationLines, modificationSpan } from "./types.ts";

// =============================================================================
// Ordering and Validation
// =============================================================================

function isZeroWidth(modification: Modification): boolean {
  const span = modificationSpan(modification);
  return span.start === span.end;
}

/**
 * Sort by span start. At equal starts a zero-width edit (an insert) goes
 * before one that consumes lines, so "insert at 3" and "delete [3, 5)"
 * compose as "insert, then delete". Otherwise source order is kept.
 */
export function sortModifications(
  modifications: readonly Modification[],
): Modification[] {
  return modifications.slice().sort((a, b) => {
    const diff = modificationSpan(a).start - modificationSpan(b).start;
    if (diff !== 0) return diff;
    return Number(!isZeroWidth(a)) - Number(!isZeroWidth(b));
  });
}

function describeModification(modification: Modification): string {
  const span = modificationSpan(modification);
  return `${modification.type} [${span.start}, ${span.end})`;
}

/**
 * Check that a modification list can be applied to a buffer of `lineCount`
 * lines. Returns the list in application order.
 *
 * Throws MalformedPatchError for non-integer or negative indices, an end
 * before its start, indices past the end of the buffer, or overlapping spans.
 */
export function validateModifications(
  lineCount: number,
  modifications: readonly Modification[],
): Modification[] {
  for (const modification of modifications) {
    const { start, end } = modificationSpan(modification);
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0) {
      throw new MalformedPatchError(
        `Invalid line indices in ${describeModification(modification)}`,
        modification,
      );
    }
    if (end < start) {
      throw new MalformedPatchError(
        `Range end precedes start in ${describeModification(modification)}`,
        modification,
      );
    }
    if (end > lineCount) {
      throw new MalformedPatchError(
        `${describeModification(modification)} exceeds buffer line count ${lineCount}`,
        modification,
      );
    }
  }

  const sorted = sortModifications(modifications);
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const next = sorted[i];
    if (!prev || !next) continue;
    if (modificationSpan(next).start < modificationSpan(prev).end) {
      throw new MalformedPatchError(
        `${describeModification(next)} overlaps ${describeModification(prev)}`,
        next,
      );
    }
  }
  return sorted;
}

// =============================================================================
// Application
// =============================================================================

/**
 * Apply modifications to a line array and return the new array.
 *
 * Walks the original lines once: copy the untouched lines before each
 * modification, emit its lines, resume at the end of its span, then copy
 * the tail. The input array is never mutated.
 */
export function applyModifications(
  lines: readonly string[],
  modifications: readonly Modification[],
): string[] {
  const sorted = validateModifications(lines.length, modifications);
  const output: string[] = [];
  let cursor = 0;

  for (const modification of sorted) {
    const span = modificationSpan(modification);
    for (let i = cursor; i < span.start; i++) {
      output.push(lines[i] ?? "");
    }
    for (const line of modificationLines(modification)) {
      output.push(line);
    }
    cursor = Math.max(cursor, span.end);
  }

  for (let i = cursor; i < lines.length; i++) {
    output.push(lines[i] ?? "");
  }
  return output;
}

/**
 * Map an original line index to its index after the modifications.
 *
 * - Before every span: unchanged
 * - At or after a zero-width insert: pushed down by the inserted lines
 * - Inside a removed span: clamped to where that span now starts
 * - After a span: shifted by (inserted - removed)
 */
export function shiftLine(
  modifications: readonly Modification[],
  line: number,
): number {
  let delta = 0;
  for (const modification of sortModifications(modifications)) {
    const span = modificationSpan(modification);
    if (span.start > line) break;
    const inserted = modificationLines(modification).length;
    if (span.start === span.end) {
      delta += inserted;
    } else if (span.end <= line) {
      delta += inserted - (span.end - span.start);
    } else {
      return span.start + delta;
    }
  }
  return line + delta;
}
