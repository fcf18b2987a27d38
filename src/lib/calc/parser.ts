/**
 * Natural-language parser - ordered pattern table to ParsedRequest
 */

import { ParsingError } from "./errors.ts";
import { IMPLICIT_EXPONENT, PATTERN_TABLE } from "./patterns.ts";
import type { OperationName, OperationPattern, ParsedRequest, PatternGroup, QueryParser } from "./types.ts";

/**
 * Convert captured groups to numbers.
 * A capture that is not a finite number is a parse failure, never coerced.
 */
function toOperands(match: RegExpExecArray, pattern: OperationPattern): number[] {
  const operands: number[] = [];

  for (const group of match.slice(1)) {
    if (group === undefined) continue;
    const value = Number(group);
    if (!Number.isFinite(value)) {
      throw new ParsingError(`Could not read '${group}' as a number`);
    }
    operands.push(value);
  }

  return pattern.reversed ? operands.reverse() : operands;
}

/**
 * square/cube with one operand become [x, 2] / [x, 3] so they can go
 * through the generic power rule
 */
function withImplicitExponent(operation: OperationName, operands: number[]): number[] {
  if ((operation === "square" || operation === "cube") && operands.length === 1) {
    return [...operands, IMPLICIT_EXPONENT[operation]];
  }
  return operands;
}

/**
 * First matching (operation, pattern) pair in table order, or null
 */
function findMatch(
  lower: string,
  table: readonly PatternGroup[],
): { group: PatternGroup; pattern: OperationPattern; match: RegExpExecArray } | null {
  for (const group of table) {
    for (const pattern of group.patterns) {
      const match = pattern.regex.exec(lower);
      if (match) return { group, pattern, match };
    }
  }
  return null;
}

/**
 * Parse a question like "What's 25 + 17?" into an operation and operands.
 * Returns null when no pattern matches; throws ParsingError on a malformed capture.
 */
export function parseNaturalLanguage(
  text: string,
  table: readonly PatternGroup[] = PATTERN_TABLE,
): ParsedRequest | null {
  const found = findMatch(text.toLowerCase(), table);
  if (!found) return null;

  const { operation } = found.group;
  const operands = withImplicitExponent(operation, toOperands(found.match, found.pattern));

  return { operation, operands, original_text: text };
}

export function canParseNaturalLanguage(
  text: string,
  table: readonly PatternGroup[] = PATTERN_TABLE,
): boolean {
  return findMatch(text.toLowerCase(), table) !== null;
}

// =============================================================================
// PARSER REGISTRATION
// =============================================================================

export const parser: QueryParser = {
  name: "natural-language",
  description: "Fixed phrasing templates: '25 + 17', 'square root of 144', 'sin of 30 degrees'",
  priority: 10,
  canHandle: (text) => canParseNaturalLanguage(text),
  match: (text) => parseNaturalLanguage(text),
};
