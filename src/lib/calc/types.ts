/**
 * Type definitions for the calc module
 */

// Declaration order matters: the parser tries operations in this order.
export const OPERATIONS = [
  "add",
  "subtract",
  "multiply",
  "divide",
  "power",
  "square",
  "cube",
  "sqrt",
  "cbrt",
  "sin",
  "cos",
  "tan",
  "log",
  "ln",
  "factorial",
] as const;

export type OperationName = (typeof OPERATIONS)[number];

const OPERATION_SET: ReadonlySet<string> = new Set(OPERATIONS);

export function isOperationName(value: string): value is OperationName {
  return OPERATION_SET.has(value);
}

/** Factorial yields a bigint so large results stay exact; everything else is a float */
export type CalcResult = number | bigint;

export interface ParsedRequest {
  operation: OperationName;
  operands: number[];
  original_text: string;
}

// =============================================================================
// PATTERN TABLE TYPES
// =============================================================================

export interface OperationPattern {
  regex: RegExp;
  /** Captures appear in reverse evaluation order ("subtract 3 from 10") */
  reversed?: boolean;
}

export interface PatternGroup {
  operation: OperationName;
  patterns: readonly OperationPattern[];
}

// =============================================================================
// CHAIN TYPES
// =============================================================================

/** Parser registration interface - parsers implement this */
export interface QueryParser {
  /** Unique name for this parser */
  name: string;
  /** Human-readable description of what this parser handles */
  description?: string;
  /** Priority within the chain (lower = tried first) */
  priority: number;
  /** Cheap capability probe */
  canHandle: (text: string) => boolean;
  /** Returns null when nothing matches */
  match: (text: string) => ParsedRequest | null;
}

/** Calculator registration interface - calculators implement this */
export interface Calculator {
  name: string;
  description?: string;
  priority: number;
  supports: (operation: string) => boolean;
  evaluate: (operation: string, operands: readonly number[]) => CalcResult;
}
