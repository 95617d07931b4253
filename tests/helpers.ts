/**
 * Test helpers and utilities.
 */

import { expect } from "vitest";
import { joinLines } from "../src/buffer/line_buffer.ts";
import {
  type CursorPosition,
  type DocumentId,
  documentId,
  type EditorSnapshot,
} from "../src/buffer/types.ts";
import { DEFAULT_MARKERS, resolveEngineConfig } from "../src/suggestion/config.ts";
import type { CompletionCandidate, EngineConfig } from "../src/suggestion/types.ts";

// =============================================================================
// Type Constructors (for tests only)
// =============================================================================

let documentCounter = 0;

export function createDocumentId(): DocumentId {
  return documentId(`file:///doc-${++documentCounter}.rs`);
}

export function pos(line: number, character: number): CursorPosition {
  return { line, character };
}

export function candidate(
  text: string,
  startLine: number,
  startCol = 0,
  endLine = startLine,
  endCol = startCol,
): CompletionCandidate {
  return {
    text,
    range: { start: pos(startLine, startCol), end: pos(endLine, endCol) },
  };
}

/** A snapshot of `lines` with the cursor at `cursor`. */
export function snapshotOf(
  lines: readonly string[],
  cursor: CursorPosition = pos(0, 0),
  id: DocumentId = documentId("file:///main.rs"),
): EditorSnapshot {
  return {
    documentId: id,
    content: joinLines(lines),
    lines: lines.slice(),
    cursorPosition: cursor,
    selections: [],
    tabSize: 1,
    indentSize: 1,
    usesTabsForIndentation: false,
  };
}

export const defaultConfig: EngineConfig = resolveEngineConfig();

// =============================================================================
// Block Builders
// =============================================================================

export function header(position: number, count: number, ending = "\n"): string {
  return `${DEFAULT_MARKERS.headerPrefix} ${position}/${count}${ending}`;
}

export function footer(ending = "\n"): string {
  return `${DEFAULT_MARKERS.footer}${ending}`;
}

// =============================================================================
// Assertion Helpers
// =============================================================================

export function expectPosition(
  actual: CursorPosition,
  line: number,
  character: number,
): void {
  expect({ line: actual.line, character: actual.character }).toEqual({
    line,
    character,
  });
}

// =============================================================================
// Reset (for test isolation)
// =============================================================================

export function resetCounters(): void {
  documentCounter = 0;
}
