/**
 * Core types for the line buffer model.
 *
 * Design principles:
 * - Lines keep their own terminators, so joining them is the identity
 * - Positions are (line, character) pairs in UTF-16 code units
 * - Everything here is plain data; operations live in line_buffer.ts
 */

// =============================================================================
// Primitive Types
// =============================================================================

/** Identifier of an open editor document */
export type DocumentId = string & { readonly __brand: "DocumentId" };

export function documentId(id: string): DocumentId {
  // branded type construction
  return id as DocumentId;
}

/** Line terminator used when the engine writes new lines */
export type LineEnding = "\n" | "\r\n";

// =============================================================================
// Position Types
// =============================================================================

/** A cursor position: zero-based line plus UTF-16 offset within that line */
export interface CursorPosition {
  readonly line: number;
  readonly character: number;
}

/** A range between two cursor positions (start inclusive, end exclusive) */
export interface CursorRange {
  readonly start: CursorPosition;
  readonly end: CursorPosition;
}

// =============================================================================
// Buffer Types
// =============================================================================

/**
 * The editor's text as an ordered list of lines plus cursor state.
 *
 * GOTCHA: every line except possibly the last ends with its terminator.
 * `lines.join("")` must equal `content` for every buffer the engine returns.
 */
export interface LineBuffer {
  readonly content: string;
  readonly lines: readonly string[];
  readonly cursor: CursorPosition;
  readonly selections: readonly CursorRange[];
}

/**
 * What the editor integration hands the engine on every call.
 * Indentation settings are carried through untouched.
 */
export interface EditorSnapshot {
  readonly documentId: DocumentId;
  readonly content: string;
  readonly lines: readonly string[];
  readonly cursorPosition: CursorPosition;
  readonly selections: readonly CursorRange[];
  readonly tabSize: number;
  readonly indentSize: number;
  readonly usesTabsForIndentation: boolean;
}
