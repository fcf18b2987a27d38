/**
 * Pre-compiled pattern table for natural-language math queries
 *
 * Order is significant: operations are tried top to bottom and the first
 * pattern that matches wins. Overlapping phrasings resolve by position in
 * this table ("natural log of 10" hits `log` before `ln`). Keyword-led
 * patterns anchor on a word boundary so "cosine" never reads as "sine".
 */

import type { PatternGroup } from "./types.ts";

// =============================================================================
// BUILDING BLOCKS
// =============================================================================

/** Signed decimal literal, no exponent notation */
const N = String.raw`(-?\d+\.?\d*)`;

/** Function-style operand: "sqrt 9", "sqrt of 9", "sqrt(9)" */
const ARG = String.raw`\s*(?:of)?\s*\(?\s*${N}`;

const rx = (source: string): RegExp => new RegExp(source, "i");

// =============================================================================
// PATTERN TABLE
// =============================================================================

export const PATTERN_TABLE: readonly PatternGroup[] = [
  // Basic arithmetic
  {
    operation: "add",
    patterns: [
      { regex: rx(String.raw`${N}\s*(?:\+|plus|add)\s*${N}`) },
      { regex: rx(String.raw`\b(?:add|sum)\s*${N}\s*(?:and|to)\s*${N}`) },
    ],
  },
  {
    operation: "subtract",
    patterns: [
      { regex: rx(String.raw`${N}\s*(?:-|minus|subtract)\s*${N}`) },
      { regex: rx(String.raw`\bsubtract\s*${N}\s*from\s*${N}`), reversed: true },
    ],
  },
  {
    operation: "multiply",
    patterns: [
      { regex: rx(String.raw`${N}\s*(?:\*|×|x|times|multiply)\s*${N}`) },
      { regex: rx(String.raw`\bmultiply\s*${N}\s*(?:by|and)\s*${N}`) },
    ],
  },
  {
    operation: "divide",
    patterns: [
      { regex: rx(String.raw`${N}\s*(?:\/|÷|divided by|divide)\s*${N}`) },
      { regex: rx(String.raw`\bdivide\s*${N}\s*by\s*${N}`) },
    ],
  },

  // Powers and roots
  {
    operation: "power",
    patterns: [
      {
        regex: rx(
          String.raw`${N}\s*(?:to the power of|raised to the power of|raised to|power of|power)\s*${N}`,
        ),
      },
      { regex: rx(String.raw`${N}\s*\*\*\s*${N}`) },
      { regex: rx(String.raw`${N}\s*\^\s*${N}`) },
    ],
  },
  {
    operation: "square",
    patterns: [{ regex: rx(String.raw`${N}\s*squared`) }, { regex: rx(String.raw`\bsquare${ARG}`) }],
  },
  {
    operation: "cube",
    patterns: [{ regex: rx(String.raw`${N}\s*cubed`) }, { regex: rx(String.raw`\bcube${ARG}`) }],
  },
  {
    operation: "sqrt",
    patterns: [
      { regex: rx(String.raw`\b(?:square root|sqrt)${ARG}`) },
      { regex: rx(String.raw`√\s*${N}`) },
    ],
  },
  {
    operation: "cbrt",
    patterns: [
      { regex: rx(String.raw`\b(?:cube root|cbrt)${ARG}`) },
      { regex: rx(String.raw`∛\s*${N}`) },
    ],
  },

  // Trigonometry (degrees)
  { operation: "sin", patterns: [{ regex: rx(String.raw`\b(?:sin|sine)${ARG}\s*\)?\s*(?:degrees?)?`) }] },
  { operation: "cos", patterns: [{ regex: rx(String.raw`\b(?:cos|cosine)${ARG}\s*\)?\s*(?:degrees?)?`) }] },
  { operation: "tan", patterns: [{ regex: rx(String.raw`\b(?:tan|tangent)${ARG}\s*\)?\s*(?:degrees?)?`) }] },

  // Logarithms
  { operation: "log", patterns: [{ regex: rx(String.raw`\b(?:log|logarithm)${ARG}`) }] },
  { operation: "ln", patterns: [{ regex: rx(String.raw`\b(?:ln|natural log)${ARG}`) }] },

  // Factorial
  {
    operation: "factorial",
    patterns: [
      { regex: rx(String.raw`${N}\s*factorial`) },
      { regex: rx(String.raw`\bfactorial${ARG}`) },
      { regex: rx(String.raw`${N}\s*!`) },
    ],
  },
];

/** Operations whose single captured operand gets an implicit exponent */
export const IMPLICIT_EXPONENT = {
  square: 2,
  cube: 3,
} as const;
