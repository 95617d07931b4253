/**
 * Suggestion engine types.
 *
 * The engine is a state machine per document:
 *   no presentation → presented (index i of n) → accepted | rejected
 * Cycling moves between indices without leaving the presented state.
 */

import type {
  CursorPosition,
  CursorRange,
  EditorSnapshot,
} from "../buffer/types.ts";
import type { Modification } from "../patch/types.ts";

// =============================================================================
// Candidates
// =============================================================================

/**
 * One proposed completion. `range` is in the document without the block,
 * may be zero-width for a pure insertion, and follows the block when
 * cycling finds it moved.
 */
export interface CompletionCandidate {
  readonly text: string;
  readonly range: CursorRange;
}

// =============================================================================
// Presentation State
// =============================================================================

/**
 * What the engine remembers about the block it injected into a document.
 * Created by a presentation, replaced by the next one, dropped on
 * accept or reject.
 */
export interface PresentationState {
  /** All candidates, in cycle order */
  readonly candidates: readonly CompletionCandidate[];
  /** Index of the candidate currently rendered */
  readonly currentIndex: number;
  /** First line of the injected block in the presented buffer */
  readonly anchorLineIndex: number;
  /** Lines the block occupies, header and footer included */
  readonly injectedLineCount: number;
}

// =============================================================================
// Results
// =============================================================================

/** What the editor integration receives back. */
export interface UpdatedContent {
  readonly content: string;
  /** Relative to the snapshot the call was made with */
  readonly modifications: readonly Modification[];
  readonly newCursor: CursorPosition;
}

/**
 * The outcome of one engine step, before it is committed.
 * `state` is the document's next presentation state (undefined clears it).
 */
export interface Transition {
  readonly lines: readonly string[];
  readonly result: UpdatedContent;
  readonly state: PresentationState | undefined;
}

/** A transition that leaves a block on screen. */
export interface Presentation extends Transition {
  readonly state: PresentationState;
}

export type CycleDirection = "next" | "previous";

// =============================================================================
// Configuration
// =============================================================================

/** Comment lines that delimit an injected block. */
export interface SuggestionMarkers {
  /** Start of the header line; followed by " <k>/<n>" */
  readonly headerPrefix: string;
  /** Start of the footer line */
  readonly footer: string;
}

export interface EngineConfig {
  readonly markers: SuggestionMarkers;
}

// =============================================================================
// Commands
// =============================================================================

/** All engine commands. */
export type SuggestionCommand =
  | {
      type: "present";
      snapshot: EditorSnapshot;
      candidates: readonly CompletionCandidate[];
    }
  | { type: "accept"; snapshot: EditorSnapshot }
  | { type: "reject"; snapshot: EditorSnapshot }
  | { type: "next"; snapshot: EditorSnapshot }
  | { type: "previous"; snapshot: EditorSnapshot };
