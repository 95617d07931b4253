/**
 * Patch applicator tests.
 *
 * Key patterns:
 * - Indices always refer to the ORIGINAL lines
 * - Source order of a modification list does not matter
 * - Malformed lists throw before anything is produced
 */

import { describe, expect, test } from "vitest";
import { MalformedPatchError } from "../../src/errors.ts";
import {
  applyModifications,
  shiftLine,
  sortModifications,
  validateModifications,
} from "../../src/patch/apply.ts";
import { diffLines } from "../../src/patch/diff.ts";
import type { Modification } from "../../src/patch/types.ts";

const base = ["a\n", "b\n", "c\n", "d\n", "e"];

describe("applyModifications", () => {
  test("empty list copies the lines", () => {
    const result = applyModifications(base, []);
    expect(result).toEqual(base);
    expect(result).not.toBe(base);
  });

  test("insert before a line", () => {
    expect(
      applyModifications(base, [{ type: "insert", atLine: 1, newLines: ["x\n", "y\n"] }]),
    ).toEqual(["a\n", "x\n", "y\n", "b\n", "c\n", "d\n", "e"]);
  });

  test("insert at the end", () => {
    expect(
      applyModifications(["a\n"], [{ type: "insert", atLine: 1, newLines: ["z"] }]),
    ).toEqual(["a\n", "z"]);
  });

  test("insert into an empty buffer", () => {
    expect(
      applyModifications([], [{ type: "insert", atLine: 0, newLines: ["z\n"] }]),
    ).toEqual(["z\n"]);
  });

  test("delete a range", () => {
    expect(
      applyModifications(base, [{ type: "delete", range: { start: 1, end: 3 } }]),
    ).toEqual(["a\n", "d\n", "e"]);
  });

  test("replace a range with a different number of lines", () => {
    expect(
      applyModifications(base, [
        { type: "replace", range: { start: 2, end: 3 }, newLines: ["C1\n", "C2\n"] },
      ]),
    ).toEqual(["a\n", "b\n", "C1\n", "C2\n", "d\n", "e"]);
  });

  test("several modifications use original indices", () => {
    const modifications: Modification[] = [
      { type: "insert", atLine: 0, newLines: ["top\n"] },
      { type: "delete", range: { start: 1, end: 2 } },
      { type: "replace", range: { start: 3, end: 5 }, newLines: ["tail"] },
    ];
    expect(applyModifications(base, modifications)).toEqual([
      "top\n",
      "a\n",
      "c\n",
      "tail",
    ]);
  });

  test("source order does not matter", () => {
    const forward: Modification[] = [
      { type: "delete", range: { start: 0, end: 1 } },
      { type: "insert", atLine: 4, newLines: ["x\n"] },
    ];
    const backward = forward.slice().reverse();
    expect(applyModifications(base, backward)).toEqual(
      applyModifications(base, forward),
    );
    expect(applyModifications(base, forward)).toEqual(["b\n", "c\n", "d\n", "x\n", "e"]);
  });

  test("an insert at the start of a deleted range lands before it", () => {
    expect(
      applyModifications(base, [
        { type: "delete", range: { start: 1, end: 3 } },
        { type: "insert", atLine: 1, newLines: ["x\n"] },
      ]),
    ).toEqual(["a\n", "x\n", "d\n", "e"]);
  });

  test("does not mutate its inputs", () => {
    const lines = base.slice();
    const modifications: Modification[] = [
      { type: "insert", atLine: 3, newLines: ["x\n"] },
      { type: "insert", atLine: 1, newLines: ["y\n"] },
    ];
    applyModifications(lines, modifications);
    expect(lines).toEqual(base);
    expect(modifications[0]).toEqual({ type: "insert", atLine: 3, newLines: ["x\n"] });
  });
});

describe("Malformed patches", () => {
  test("overlapping ranges throw MalformedPatchError", () => {
    const call = () =>
      applyModifications(base, [
        { type: "delete", range: { start: 0, end: 3 } },
        { type: "replace", range: { start: 2, end: 4 }, newLines: ["x\n"] },
      ]);
    expect(call).toThrow(MalformedPatchError);
    expect(call).toThrow("replace [2, 4) overlaps delete [0, 3)");
  });

  test("an insert strictly inside a deleted range overlaps", () => {
    expect(() =>
      applyModifications(base, [
        { type: "delete", range: { start: 1, end: 4 } },
        { type: "insert", atLine: 2, newLines: ["x\n"] },
      ]),
    ).toThrow(MalformedPatchError);
  });

  test("ranges past the end throw", () => {
    expect(() =>
      applyModifications(base, [{ type: "delete", range: { start: 4, end: 6 } }]),
    ).toThrow("delete [4, 6) exceeds buffer line count 5");
    expect(() =>
      applyModifications(base, [{ type: "insert", atLine: 6, newLines: [] }]),
    ).toThrow(MalformedPatchError);
  });

  test("inverted and negative ranges throw", () => {
    expect(() =>
      applyModifications(base, [{ type: "delete", range: { start: 3, end: 2 } }]),
    ).toThrow("Range end precedes start in delete [3, 2)");
    expect(() =>
      applyModifications(base, [{ type: "insert", atLine: -1, newLines: [] }]),
    ).toThrow(MalformedPatchError);
    expect(() =>
      applyModifications(base, [{ type: "insert", atLine: 1.5, newLines: [] }]),
    ).toThrow(MalformedPatchError);
  });

  test("the error carries its code and the offending modification", () => {
    const bad: Modification = { type: "delete", range: { start: 0, end: 9 } };
    try {
      validateModifications(base.length, [bad]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedPatchError);
      if (err instanceof MalformedPatchError) {
        expect(err.code).toBe("MalformedPatch");
        expect(err.modification).toBe(bad);
      }
    }
  });

  test("adjacent ranges do not overlap", () => {
    expect(
      applyModifications(base, [
        { type: "delete", range: { start: 0, end: 2 } },
        { type: "delete", range: { start: 2, end: 4 } },
      ]),
    ).toEqual(["e"]);
  });
});

describe("sortModifications", () => {
  test("orders by start, zero-width first", () => {
    const sorted = sortModifications([
      { type: "delete", range: { start: 2, end: 3 } },
      { type: "insert", atLine: 2, newLines: [] },
      { type: "insert", atLine: 0, newLines: [] },
    ]);
    expect(sorted.map((m) => m.type)).toEqual(["insert", "insert", "delete"]);
  });
});

describe("shiftLine", () => {
  const insertAt2: Modification[] = [
    { type: "insert", atLine: 2, newLines: ["x\n", "y\n"] },
  ];
  const delete1to3: Modification[] = [
    { type: "delete", range: { start: 1, end: 3 } },
  ];

  test("lines before an insert stay put", () => {
    expect(shiftLine(insertAt2, 1)).toBe(1);
  });

  test("lines at or after an insert move down", () => {
    expect(shiftLine(insertAt2, 2)).toBe(4);
    expect(shiftLine(insertAt2, 4)).toBe(6);
  });

  test("lines inside a deleted range clamp to its start", () => {
    expect(shiftLine(delete1to3, 2)).toBe(1);
  });

  test("lines after a deleted range move up", () => {
    expect(shiftLine(delete1to3, 3)).toBe(1);
    expect(shiftLine(delete1to3, 4)).toBe(2);
  });
});

describe("Patch composition", () => {
  test("two sequential patches equal one combined patch", () => {
    const m1: Modification[] = [
      { type: "insert", atLine: 1, newLines: ["x\n"] },
      { type: "delete", range: { start: 3, end: 4 } },
    ];
    const afterFirst = applyModifications(base, m1);
    expect(afterFirst).toEqual(["a\n", "x\n", "b\n", "c\n", "e"]);

    const m2: Modification[] = [
      { type: "replace", range: { start: 0, end: 1 }, newLines: ["A\n"] },
      { type: "insert", atLine: 5, newLines: ["\n", "f"] },
    ];
    const sequential = applyModifications(afterFirst, m2);

    const combined = diffLines(base, sequential);
    expect(applyModifications(base, combined)).toEqual(sequential);
    expect(sequential).toEqual(["A\n", "x\n", "b\n", "c\n", "e", "\n", "f"]);
  });
});
