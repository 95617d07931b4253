/**
 * Suggestion presenter: injects a candidate into the buffer as a block.
 *
 * Presentation only ever inserts whole lines. The candidate's range is
 * not applied until it is accepted, so deleting the block restores the
 * original buffer byte for byte.
 */

import { detectLineEnding, isTerminated, joinLines } from "../buffer/line_buffer.ts";
import type { CursorPosition, EditorSnapshot } from "../buffer/types.ts";
import { applyModifications, shiftLine } from "../patch/apply.ts";
import type { Modification } from "../patch/types.ts";
import { renderSuggestionBlock } from "./markup.ts";
import type {
  CompletionCandidate,
  EngineConfig,
  Presentation,
} from "./types.ts";

/**
 * Line the block is inserted before: the candidate's target line, or the
 * last line when the target lies past the end of the buffer.
 *
 * The empty line after a trailing terminator is a real cursor line, so a
 * target exactly there puts the block at the end of the buffer.
 */
export function anchorLineFor(
  lines: readonly string[],
  candidate: CompletionCandidate,
): number {
  const target = Math.max(candidate.range.start.line, 0);
  const last = lines[lines.length - 1];
  if (target === lines.length && last !== undefined && isTerminated(last)) {
    return lines.length;
  }
  return Math.min(target, Math.max(lines.length - 1, 0));
}

/**
 * Render `candidates[index]` as a block at `anchor`.
 *
 * A cursor at or below the anchor moves down with the text it was on, so
 * it never ends up inside the block.
 */
export function renderCandidate(
  lines: readonly string[],
  cursor: CursorPosition,
  candidates: readonly CompletionCandidate[],
  index: number,
  anchor: number,
  config: EngineConfig,
): Presentation {
  const candidate = candidates[index];
  if (candidate === undefined) {
    throw new RangeError(
      `Candidate index ${index} out of range for ${candidates.length} candidates`,
    );
  }

  const block = renderSuggestionBlock(
    candidate.text,
    index,
    candidates.length,
    config.markers,
    detectLineEnding(lines),
  );
  const modifications: Modification[] = [
    { type: "insert", atLine: anchor, newLines: block },
  ];
  const newLines = applyModifications(lines, modifications);

  return {
    lines: newLines,
    result: {
      content: joinLines(newLines),
      modifications,
      newCursor: {
        line: shiftLine(modifications, cursor.line),
        character: cursor.character,
      },
    },
    state: {
      candidates: candidates.slice(),
      currentIndex: index,
      anchorLineIndex: anchor,
      injectedLineCount: block.length,
    },
  };
}

/**
 * Present the first candidate. Returns undefined for an empty list.
 */
export function presentSuggestions(
  snapshot: EditorSnapshot,
  candidates: readonly CompletionCandidate[],
  config: EngineConfig,
): Presentation | undefined {
  const first = candidates[0];
  if (first === undefined) return undefined;
  return renderCandidate(
    snapshot.lines,
    snapshot.cursorPosition,
    candidates,
    0,
    anchorLineFor(snapshot.lines, first),
    config,
  );
}
