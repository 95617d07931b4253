import { describe, expect, test } from "vitest";
import { toPresentedSuggestion } from "../../src/suggestion/panel.ts";
import type { PresentationState } from "../../src/suggestion/types.ts";
import { candidate } from "../helpers.ts";

const state: PresentationState = {
  candidates: [candidate("\nstruct Dog {}", 7, 0, 7, 12), candidate("let a = 1\r\nlet b = 2\n", 3)],
  currentIndex: 0,
  anchorLineIndex: 1,
  injectedLineCount: 4,
};

describe("toPresentedSuggestion", () => {
  test("shows the current candidate without line terminators", () => {
    expect(toPresentedSuggestion(state)).toEqual({
      startLineIndex: 7,
      code: ["", "struct Dog {}"],
      suggestionCount: 2,
      currentSuggestionIndex: 0,
    });
  });

  test("follows the current index", () => {
    expect(toPresentedSuggestion({ ...state, currentIndex: 1 })).toEqual({
      startLineIndex: 3,
      code: ["let a = 1", "let b = 2"],
      suggestionCount: 2,
      currentSuggestionIndex: 1,
    });
  });

  test("an index out of range has nothing to show", () => {
    expect(toPresentedSuggestion({ ...state, currentIndex: 5 })).toBeUndefined();
  });
});
