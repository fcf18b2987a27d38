/**
 * Tests for input normalization
 */

import { describe, expect, test } from "vitest";
import { defaultNormalizer, isExitCommand, normalizeInput } from "../src/lib/input.ts";

describe("normalizeInput", () => {
  test("trims and collapses whitespace", () => {
    expect(normalizeInput("  What's   2 +\t2?  ")).toBe("What's 2 + 2?");
    expect(normalizeInput("5\n squared")).toBe("5 squared");
  });

  test("empty or whitespace-only input", () => {
    expect(normalizeInput("")).toBeNull();
    expect(normalizeInput("   \t ")).toBeNull();
  });

  test("non-string input", () => {
    expect(normalizeInput(42)).toBeNull();
    expect(normalizeInput(null)).toBeNull();
    expect(normalizeInput(undefined)).toBeNull();
    expect(normalizeInput({ query: "1 + 1" })).toBeNull();
  });

  test("default normalizer", () => {
    expect(defaultNormalizer.normalize(" 1 + 1 ")).toBe("1 + 1");
  });
});

describe("isExitCommand", () => {
  test("recognized words, any case", () => {
    for (const word of ["quit", "EXIT", " bye ", "Goodbye"]) {
      expect(isExitCommand(word)).toBe(true);
    }
  });

  test("other text", () => {
    expect(isExitCommand("quitting")).toBe(false);
    expect(isExitCommand("history")).toBe(false);
  });
});
