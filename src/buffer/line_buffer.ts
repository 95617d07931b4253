/**
 * Line buffer: value operations over a line array whose lines keep
 * their terminators.
 *
 * Nothing here mutates its input. Position helpers clip out-of-range
 * positions instead of throwing, the same way a snapshot clips points.
 */

import type {
  CursorPosition,
  CursorRange,
  LineBuffer,
  LineEnding,
} from "./types.ts";

// =============================================================================
// Splitting and Joining
// =============================================================================

/**
 * Split text into lines, each keeping its `\n` (or `\r\n`) terminator.
 * A trailing terminator does not produce an empty last line, and empty
 * text produces no lines at all.
 */
export function splitLines(content: string): string[] {
  const lines: string[] = [];
  let start = 0;
  while (start < content.length) {
    const newline = content.indexOf("\n", start);
    if (newline === -1) {
      lines.push(content.slice(start));
      break;
    }
    lines.push(content.slice(start, newline + 1));
    start = newline + 1;
  }
  return lines;
}

export function joinLines(lines: readonly string[]): string {
  return lines.join("");
}

/** True when the line ends with a line terminator. */
export function isTerminated(line: string): boolean {
  return line.endsWith("\n");
}

/** Length of a line without its terminator. */
export function lineContentLength(line: string): number {
  if (line.endsWith("\r\n")) return line.length - 2;
  if (line.endsWith("\n")) return line.length - 1;
  return line.length;
}

/** Append `ending` unless the line already has a terminator. */
export function terminate(line: string, ending: LineEnding): string {
  return isTerminated(line) ? line : line + ending;
}

/**
 * The terminator the document already uses, judged by its first
 * terminated line. Documents without any terminator default to `\n`.
 */
export function detectLineEnding(lines: readonly string[]): LineEnding {
  for (const line of lines) {
    if (line.endsWith("\r\n")) return "\r\n";
    if (line.endsWith("\n")) return "\n";
  }
  return "\n";
}

// =============================================================================
// Construction and Equality
// =============================================================================

const ORIGIN: CursorPosition = { line: 0, character: 0 };

export function createLineBuffer(
  content: string,
  cursor: CursorPosition = ORIGIN,
  selections: readonly CursorRange[] = [],
): LineBuffer {
  return { content, lines: splitLines(content), cursor, selections };
}

export function lineBufferFromLines(
  lines: readonly string[],
  cursor: CursorPosition = ORIGIN,
  selections: readonly CursorRange[] = [],
): LineBuffer {
  return { content: joinLines(lines), lines: lines.slice(), cursor, selections };
}

export function linesEqual(
  a: readonly string[],
  b: readonly string[],
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function positionsEqual(a: CursorPosition, b: CursorPosition): boolean {
  return a.line === b.line && a.character === b.character;
}

/** Content, lines and cursor all match. Selections are not compared. */
export function lineBuffersEqual(a: LineBuffer, b: LineBuffer): boolean {
  return (
    a.content === b.content &&
    linesEqual(a.lines, b.lines) &&
    positionsEqual(a.cursor, b.cursor)
  );
}

// =============================================================================
// Positions
// =============================================================================

export function comparePositions(a: CursorPosition, b: CursorPosition): number {
  if (a.line !== b.line) return a.line - b.line;
  return a.character - b.character;
}

/**
 * Last line a cursor may sit on. When the text ends with a terminator the
 * cursor may rest on the empty line after it.
 */
function lastCursorLine(lines: readonly string[]): number {
  if (lines.length === 0) return 0;
  const last = lines[lines.length - 1] ?? "";
  return isTerminated(last) ? lines.length : lines.length - 1;
}

/**
 * Clip a position to the buffer.
 *
 * Past the last line → end of the last line. Column past the end of its
 * line → end of that line (terminator excluded).
 */
export function clampPosition(
  lines: readonly string[],
  position: CursorPosition,
): CursorPosition {
  const maxLine = lastCursorLine(lines);
  if (position.line < 0) return ORIGIN;
  if (position.line > maxLine) {
    return {
      line: maxLine,
      character: lineContentLength(lines[maxLine] ?? ""),
    };
  }
  const length = lineContentLength(lines[position.line] ?? "");
  const character = Math.min(Math.max(position.character, 0), length);
  return { line: position.line, character };
}

/** Flat offset into `joinLines(lines)` of a (clipped) position. */
export function offsetAt(
  lines: readonly string[],
  position: CursorPosition,
): number {
  const clipped = clampPosition(lines, position);
  let offset = 0;
  for (let i = 0; i < clipped.line; i++) {
    offset += (lines[i] ?? "").length;
  }
  return offset + clipped.character;
}

/** Position of a flat offset into `joinLines(lines)`. */
export function positionAt(
  lines: readonly string[],
  offset: number,
): CursorPosition {
  let remaining = Math.max(offset, 0);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (remaining < line.length || (i === lines.length - 1 && !isTerminated(line))) {
      return { line: i, character: Math.min(remaining, lineContentLength(line)) };
    }
    remaining -= line.length;
  }
  return { line: lastCursorLine(lines), character: 0 };
}

/** Where a cursor lands after `text` is typed at `start`. */
export function positionAfterText(
  start: CursorPosition,
  text: string,
): CursorPosition {
  const lastNewline = text.lastIndexOf("\n");
  if (lastNewline === -1) {
    return { line: start.line, character: start.character + text.length };
  }
  let newlines = 0;
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) newlines++;
  }
  return {
    line: start.line + newlines,
    character: text.length - lastNewline - 1,
  };
}
