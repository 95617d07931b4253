/**
 * Validation of what the editor integration and the completion fetcher
 * hand the engine. Use these at the boundary; the engine itself trusts
 * its typed inputs.
 */

import { z } from "zod";
import { splitLines } from "../buffer/line_buffer.ts";
import { documentId, type EditorSnapshot } from "../buffer/types.ts";
import { InvalidInputError } from "../errors.ts";
import { formatIssues } from "./config.ts";
import type { CompletionCandidate } from "./types.ts";

const cursorPositionSchema = z.object({
  line: z.number().int().nonnegative(),
  character: z.number().int().nonnegative(),
});

const cursorRangeSchema = z.object({
  start: cursorPositionSchema,
  end: cursorPositionSchema,
});

export const completionCandidateSchema = z.object({
  text: z.string(),
  range: cursorRangeSchema,
});

export const editorSnapshotSchema = z
  .object({
    documentId: z.string().min(1).transform(documentId),
    content: z.string(),
    /** Derived from content when omitted */
    lines: z.array(z.string()).optional(),
    cursorPosition: cursorPositionSchema,
    selections: z.array(cursorRangeSchema).default([]),
    tabSize: z.number().int().positive().default(4),
    indentSize: z.number().int().positive().default(4),
    usesTabsForIndentation: z.boolean().default(false),
  })
  .superRefine((snapshot, ctx) => {
    const { lines } = snapshot;
    if (lines === undefined) return;
    lines.forEach((line, i) => {
      const newline = line.indexOf("\n");
      const isLast = i === lines.length - 1;
      if (newline !== -1 && newline !== line.length - 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Line contains an interior line break",
          path: ["lines", i],
        });
      } else if (newline === -1 && !isLast) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Only the last line may lack a terminator",
          path: ["lines", i],
        });
      }
    });
    if (lines.join("") !== snapshot.content) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Lines do not join to content",
        path: ["lines"],
      });
    }
  })
  .transform((snapshot) => ({
    ...snapshot,
    lines: snapshot.lines ?? splitLines(snapshot.content),
  }));

export type EditorSnapshotInput = z.input<typeof editorSnapshotSchema>;

/** Throws InvalidInputError listing every problem found. */
export function parseEditorSnapshot(input: unknown): EditorSnapshot {
  const parsed = editorSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError("editor snapshot", formatIssues(parsed.error));
  }
  return parsed.data;
}

/** Throws InvalidInputError listing every problem found. */
export function parseCandidates(input: unknown): CompletionCandidate[] {
  const parsed = z.array(completionCandidateSchema).safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError("completion candidates", formatIssues(parsed.error));
  }
  return parsed.data;
}
