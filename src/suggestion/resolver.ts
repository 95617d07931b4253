/**
 * Suggestion resolver: reject, accept, and cycle a presented block.
 *
 * Every operation works from the CURRENT snapshot. The block is located
 * by its markers (stored anchor first), so typing elsewhere between
 * presentation and resolution does not break it.
 */

import {
  clampPosition,
  joinLines,
  offsetAt,
  positionAfterText,
  splitLines,
} from "../buffer/line_buffer.ts";
import type {
  CursorPosition,
  CursorRange,
  EditorSnapshot,
} from "../buffer/types.ts";
import { applyModifications, shiftLine } from "../patch/apply.ts";
import { diffLines } from "../patch/diff.ts";
import type { Modification } from "../patch/types.ts";
import { findSuggestionBlock, type SuggestionBlock } from "./markup.ts";
import { renderCandidate } from "./presenter.ts";
import type {
  CompletionCandidate,
  CycleDirection,
  EngineConfig,
  PresentationState,
  Transition,
} from "./types.ts";

// =============================================================================
// Helpers
// =============================================================================

export function locateBlock(
  lines: readonly string[],
  state: PresentationState,
  config: EngineConfig,
): SuggestionBlock | undefined {
  return findSuggestionBlock(
    lines,
    config.markers,
    state.anchorLineIndex,
    state.injectedLineCount,
  );
}

function currentCandidate(state: PresentationState): CompletionCandidate {
  const candidate = state.candidates[state.currentIndex];
  if (candidate === undefined) {
    throw new RangeError(
      `Presentation index ${state.currentIndex} out of range for ${state.candidates.length} candidates`,
    );
  }
  return candidate;
}

/**
 * Shift a candidate's range by how far the block moved since it was
 * presented (lines typed or removed above it).
 */
function followDrift(range: CursorRange, drift: number): CursorRange {
  if (drift === 0) return range;
  return {
    start: { line: Math.max(range.start.line + drift, 0), character: range.start.character },
    end: { line: Math.max(range.end.line + drift, 0), character: range.end.character },
  };
}

/** The snapshot unchanged; used when the block is no longer there. */
function unchanged(snapshot: EditorSnapshot): Transition {
  return {
    lines: snapshot.lines,
    result: {
      content: joinLines(snapshot.lines),
      modifications: [],
      newCursor: snapshot.cursorPosition,
    },
    state: undefined,
  };
}

/**
 * Remove a block and relocate the cursor:
 * - above the block: unchanged
 * - inside the block: start of the line the block began on
 * - below the block: moved up by the block's length, column kept
 */
export function stripBlock(
  lines: readonly string[],
  cursor: CursorPosition,
  block: SuggestionBlock,
): { lines: string[]; cursor: CursorPosition; modifications: Modification[] } {
  const modifications: Modification[] = [
    { type: "delete", range: { start: block.start, end: block.end } },
  ];
  const inside = cursor.line >= block.start && cursor.line < block.end;
  return {
    lines: applyModifications(lines, modifications),
    cursor: inside
      ? { line: block.start, character: 0 }
      : { line: shiftLine(modifications, cursor.line), character: cursor.character },
    modifications,
  };
}

// =============================================================================
// Reject
// =============================================================================

/**
 * Delete the block. All pending candidates are discarded.
 * When the block has already vanished from the buffer the result carries
 * no modifications.
 */
export function rejectSuggestion(
  snapshot: EditorSnapshot,
  state: PresentationState,
  config: EngineConfig,
): Transition {
  const block = locateBlock(snapshot.lines, state, config);
  if (!block) return unchanged(snapshot);

  const stripped = stripBlock(snapshot.lines, snapshot.cursorPosition, block);
  return {
    lines: stripped.lines,
    result: {
      content: joinLines(stripped.lines),
      modifications: stripped.modifications,
      newCursor: stripped.cursor,
    },
    state: undefined,
  };
}

// =============================================================================
// Accept
// =============================================================================

/**
 * Strip the block, then replace the candidate's range with its text.
 * The cursor ends up right after the inserted text.
 */
export function acceptSuggestion(
  snapshot: EditorSnapshot,
  state: PresentationState,
  config: EngineConfig,
): Transition {
  const block = locateBlock(snapshot.lines, state, config);
  if (!block) return unchanged(snapshot);

  const candidate = currentCandidate(state);
  const base = stripBlock(snapshot.lines, snapshot.cursorPosition, block).lines;
  const range = followDrift(candidate.range, block.start - state.anchorLineIndex);

  const start = clampPosition(base, range.start);
  const startOffset = offsetAt(base, start);
  const endOffset = Math.max(offsetAt(base, range.end), startOffset);
  const baseContent = joinLines(base);
  const content =
    baseContent.slice(0, startOffset) + candidate.text + baseContent.slice(endOffset);
  const newLines = splitLines(content);

  return {
    lines: newLines,
    result: {
      content,
      modifications: diffLines(snapshot.lines, newLines),
      newCursor: positionAfterText(start, candidate.text),
    },
    state: undefined,
  };
}

// =============================================================================
// Cycle
// =============================================================================

export function nextIndex(
  state: PresentationState,
  direction: CycleDirection,
): number {
  const count = state.candidates.length;
  const step = direction === "next" ? 1 : -1;
  return (((state.currentIndex + step) % count) + count) % count;
}

/**
 * Re-render the block with the neighbouring candidate at the same anchor.
 *
 * Computed as a reject of the current block followed by a presentation of
 * the new index, and returned as one replace over the old block.
 */
export function cycleSuggestion(
  snapshot: EditorSnapshot,
  state: PresentationState,
  direction: CycleDirection,
  config: EngineConfig,
): Transition {
  const block = locateBlock(snapshot.lines, state, config);
  if (!block) return unchanged(snapshot);

  // The new state is anchored where the block is now, so the candidates
  // move with it.
  const drift = block.start - state.anchorLineIndex;
  const candidates =
    drift === 0
      ? state.candidates
      : state.candidates.map((c) => ({ ...c, range: followDrift(c.range, drift) }));

  const stripped = stripBlock(snapshot.lines, snapshot.cursorPosition, block);
  const rendered = renderCandidate(
    stripped.lines,
    stripped.cursor,
    candidates,
    nextIndex(state, direction),
    block.start,
    config,
  );
  const injected = rendered.state.injectedLineCount;
  const modifications: Modification[] = [
    {
      type: "replace",
      range: { start: block.start, end: block.end },
      newLines: rendered.lines.slice(block.start, block.start + injected),
    },
  ];

  return {
    lines: rendered.lines,
    result: {
      content: rendered.result.content,
      modifications,
      newCursor: rendered.result.newCursor,
    },
    state: rendered.state,
  };
}
