/**
 * Rendering and locating the comment-delimited block a suggestion is
 * shown in: a header line carrying "k/n", the candidate's lines, and a
 * footer line (see DEFAULT_MARKERS for the default marker text).
 *
 * The block is found again by its markers, so it survives edits the user
 * makes elsewhere in the document between presentation and resolution.
 */

import { splitLines, terminate } from "../buffer/line_buffer.ts";
import type { LineEnding } from "../buffer/types.ts";
import type { SuggestionMarkers } from "./types.ts";

/** Where a block sits in a line array, plus what its header says. */
export interface SuggestionBlock {
  /** Header line index */
  readonly start: number;
  /** One past the footer line */
  readonly end: number;
  /** Zero-based candidate index from the header */
  readonly index: number;
  /** Candidate count from the header */
  readonly count: number;
}

/**
 * Header, one terminated line per line of `text`, footer.
 * Empty text still produces header and footer.
 */
export function renderSuggestionBlock(
  text: string,
  index: number,
  count: number,
  markers: SuggestionMarkers,
  lineEnding: LineEnding,
): string[] {
  const body = splitLines(text).map((line) => terminate(line, lineEnding));
  return [
    `${markers.headerPrefix} ${index + 1}/${count}${lineEnding}`,
    ...body,
    `${markers.footer}${lineEnding}`,
  ];
}

const COUNTER = /^\s*(\d+)\/(\d+)/;

function parseHeader(
  line: string,
  markers: SuggestionMarkers,
): { index: number; count: number } {
  const match = COUNTER.exec(line.slice(markers.headerPrefix.length));
  if (!match) return { index: 0, count: 1 };
  const position = Number(match[1]);
  const count = Number(match[2]);
  return { index: Math.max(position - 1, 0), count: Math.max(count, 1) };
}

function blockAt(
  lines: readonly string[],
  start: number,
  markers: SuggestionMarkers,
  length: number | undefined,
): SuggestionBlock | undefined {
  const header = lines[start];
  if (header === undefined || !header.startsWith(markers.headerPrefix)) {
    return undefined;
  }
  // GOTCHA: candidate text may itself contain a footer-looking line, so
  // the footer at the known block length wins over the first one found.
  if (length !== undefined && length >= 2) {
    const last = start + length - 1;
    if ((lines[last] ?? "").startsWith(markers.footer)) {
      return { start, end: last + 1, ...parseHeader(header, markers) };
    }
  }
  for (let i = start + 1; i < lines.length; i++) {
    if ((lines[i] ?? "").startsWith(markers.footer)) {
      return { start, end: i + 1, ...parseHeader(header, markers) };
    }
  }
  return undefined;
}

/**
 * Find the first complete block. When `hint` is given the block is looked
 * for there first, then anywhere in the document. `length` is the number
 * of lines the block was rendered with, when known.
 */
export function findSuggestionBlock(
  lines: readonly string[],
  markers: SuggestionMarkers,
  hint?: number,
  length?: number,
): SuggestionBlock | undefined {
  if (hint !== undefined) {
    const hinted = blockAt(lines, hint, markers, length);
    if (hinted) return hinted;
  }
  for (let i = 0; i < lines.length; i++) {
    const block = blockAt(lines, i, markers, length);
    if (block) return block;
  }
  return undefined;
}
