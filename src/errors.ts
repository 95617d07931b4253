/**
 * Error types thrown by the engine.
 *
 * "Nothing to do" situations (no active presentation, no candidates) are
 * not errors: those operations return undefined.
 */

import type { Modification } from "./patch/types.ts";

/**
 * A modification list that cannot be applied: overlapping ranges, indices
 * outside the buffer, or a range whose end precedes its start.
 * The buffer being patched is left untouched.
 */
export class MalformedPatchError extends RangeError {
  readonly code = "MalformedPatch";
  readonly modification: Modification;

  constructor(message: string, modification: Modification) {
    super(message);
    this.name = "MalformedPatchError";
    this.modification = modification;
  }
}

/** Input from the editor integration failed validation. */
export class InvalidInputError extends TypeError {
  readonly code = "InvalidInput";
  readonly issues: readonly string[];

  constructor(what: string, issues: readonly string[]) {
    super(`Invalid ${what}: ${issues.join("; ")}`);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}
