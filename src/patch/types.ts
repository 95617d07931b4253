/**
 * Line-level edit operations.
 *
 * A modification list is always expressed against the ORIGINAL line
 * indices of the buffer it is applied to. The applicator does the offset
 * bookkeeping; callers never pre-adjust indices.
 */

/** Half-open line range [start, end) */
export interface LineRange {
  readonly start: number;
  readonly end: number;
}

/** All modification kinds. */
export type Modification =
  | { readonly type: "insert"; readonly atLine: number; readonly newLines: readonly string[] }
  | { readonly type: "delete"; readonly range: LineRange }
  | {
      readonly type: "replace";
      readonly range: LineRange;
      readonly newLines: readonly string[];
    };

/** The original lines a modification covers. Inserts are zero-width. */
export function modificationSpan(modification: Modification): LineRange {
  if (modification.type === "insert") {
    return { start: modification.atLine, end: modification.atLine };
  }
  return modification.range;
}

/** Lines a modification emits in place of its span. */
export function modificationLines(modification: Modification): readonly string[] {
  return modification.type === "delete" ? [] : modification.newLines;
}
