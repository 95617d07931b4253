/**
 * What a suggestion panel shows for a presentation: the current
 * candidate's code with the line it starts on, and "k of n".
 */

import { lineContentLength, splitLines } from "../buffer/line_buffer.ts";
import type { PresentationState } from "./types.ts";

export interface PresentedSuggestion {
  /** Document line the candidate's range starts on, for line numbers */
  readonly startLineIndex: number;
  /** Candidate lines without terminators */
  readonly code: readonly string[];
  readonly suggestionCount: number;
  readonly currentSuggestionIndex: number;
}

export function toPresentedSuggestion(
  state: PresentationState,
): PresentedSuggestion | undefined {
  const candidate = state.candidates[state.currentIndex];
  if (candidate === undefined) return undefined;
  return {
    startLineIndex: candidate.range.start.line,
    code: splitLines(candidate.text).map((line) =>
      line.slice(0, lineContentLength(line)),
    ),
    suggestionCount: state.candidates.length,
    currentSuggestionIndex: state.currentIndex,
  };
}
