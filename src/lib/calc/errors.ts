/**
 * Error taxonomy for query interpretation and evaluation.
 * Every error here is recoverable: the agent renders each one as text.
 */

export type CalcErrorCode =
  | "INVALID_INPUT"
  | "PARSING"
  | "UNSUPPORTED_OPERATION"
  | "INVALID_ARITY"
  | "INVALID_DOMAIN"
  | "DIVIDE_BY_ZERO";

export class CalculatorError extends Error {
  readonly code: CalcErrorCode;

  constructor(message: string, code: CalcErrorCode) {
    super(message);
    this.code = code;
    this.name = "CalculatorError";
  }
}

export class InvalidInputError extends CalculatorError {
  constructor(message = "Invalid input") {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}

export class ParsingError extends CalculatorError {
  constructor(message: string) {
    super(message, "PARSING");
    this.name = "ParsingError";
  }
}

export class UnsupportedOperationError extends CalculatorError {
  readonly operation: string;

  constructor(operation: string) {
    super(`Operation '${operation}' is not supported`, "UNSUPPORTED_OPERATION");
    this.operation = operation;
    this.name = "UnsupportedOperationError";
  }
}

export class InvalidArityError extends CalculatorError {
  readonly operation: string;
  /** e.g. "exactly 2" or "at least 2" */
  readonly expected: string;
  readonly received: number;

  constructor(label: string, operation: string, expected: string, received: number) {
    const noun = expected.endsWith(" 1") ? "operand" : "operands";
    super(`${label} requires ${expected} ${noun}`, "INVALID_ARITY");
    this.operation = operation;
    this.expected = expected;
    this.received = received;
    this.name = "InvalidArityError";
  }
}

export class InvalidDomainError extends CalculatorError {
  constructor(message: string) {
    super(message, "INVALID_DOMAIN");
    this.name = "InvalidDomainError";
  }
}

export class DivideByZeroError extends CalculatorError {
  constructor() {
    super("Cannot divide by zero", "DIVIDE_BY_ZERO");
    this.name = "DivideByZeroError";
  }
}

export function isCalculatorError(error: unknown): error is CalculatorError {
  return error instanceof CalculatorError;
}
