/**
 * Scientific calculator - arity/domain checks and evaluation per operation
 *
 * Pure: no state, no side effects. Trig input is in degrees.
 */

import {
  DivideByZeroError,
  InvalidArityError,
  InvalidDomainError,
  UnsupportedOperationError,
} from "./errors.ts";
import { isOperationName, type CalcResult, type Calculator, type OperationName } from "./types.ts";

export interface ScientificOptions {
  /** Largest argument factorial accepts */
  maxFactorial: number;
}

const DEFAULT_OPTIONS: ScientificOptions = {
  maxFactorial: 10_000,
};

type Arity = { exactly: number } | { atLeast: number };

interface OperationRule {
  /** Used in arity messages: "Subtraction requires exactly 2 operands" */
  label: string;
  arity: Arity;
  compute: (operands: readonly number[], options: ScientificOptions) => CalcResult;
}

// =============================================================================
// HELPERS
// =============================================================================

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/** Values are read after the arity check, so index access is safe */
function at(operands: readonly number[], index: number): number {
  const value = operands[index];
  if (value === undefined) {
    throw new RangeError(`Missing operand at position ${index}`);
  }
  return value;
}

function power(base: number, exponent: number): number {
  if (base === 0 && exponent < 0) {
    throw new DivideByZeroError();
  }
  return base ** exponent;
}

/** Float results must be real and representable; bigints are exact */
function checkResult(result: CalcResult): CalcResult {
  if (typeof result === "bigint") return result;
  if (Number.isNaN(result)) {
    throw new InvalidDomainError("Result is not a real number");
  }
  if (!Number.isFinite(result)) {
    throw new InvalidDomainError("Result is out of range");
  }
  return result;
}

export function factorial(n: number, maxFactorial = DEFAULT_OPTIONS.maxFactorial): bigint {
  if (n < 0) {
    throw new InvalidDomainError("Cannot calculate factorial of negative number");
  }
  if (!Number.isInteger(n)) {
    throw new InvalidDomainError("Factorial requires an integer");
  }
  if (n > maxFactorial) {
    throw new InvalidDomainError(`Factorial is limited to inputs up to ${maxFactorial}`);
  }
  const limit = BigInt(n);
  let result = 1n;
  for (let i = 2n; i <= limit; i++) {
    result *= i;
  }
  return result;
}

// =============================================================================
// RULE TABLE - one rule per operation, enforced by the Record type
// =============================================================================

const RULES: Record<OperationName, OperationRule> = {
  add: {
    label: "Addition",
    arity: { atLeast: 2 },
    compute: (ops) => ops.reduce((sum, n) => sum + n, 0),
  },
  subtract: {
    label: "Subtraction",
    arity: { exactly: 2 },
    compute: (ops) => at(ops, 0) - at(ops, 1),
  },
  multiply: {
    label: "Multiplication",
    arity: { atLeast: 2 },
    compute: (ops) => ops.reduce((product, n) => product * n, 1),
  },
  divide: {
    label: "Division",
    arity: { exactly: 2 },
    compute: (ops) => {
      if (at(ops, 1) === 0) throw new DivideByZeroError();
      return at(ops, 0) / at(ops, 1);
    },
  },
  power: {
    label: "Power operation",
    arity: { exactly: 2 },
    compute: (ops) => power(at(ops, 0), at(ops, 1)),
  },
  // square/cube arrive as [x, 2] / [x, 3] from the parser; a bare [x] is accepted too
  square: {
    label: "Power operation",
    arity: { exactly: 2 },
    compute: (ops) => power(at(ops, 0), at(ops, 1)),
  },
  cube: {
    label: "Power operation",
    arity: { exactly: 2 },
    compute: (ops) => power(at(ops, 0), at(ops, 1)),
  },
  sqrt: {
    label: "Square root",
    arity: { exactly: 1 },
    compute: (ops) => {
      const x = at(ops, 0);
      if (x < 0) throw new InvalidDomainError("Cannot calculate square root of negative number");
      return Math.sqrt(x);
    },
  },
  cbrt: {
    label: "Cube root",
    arity: { exactly: 1 },
    compute: (ops) => Math.cbrt(at(ops, 0)),
  },
  sin: {
    label: "Sine",
    arity: { exactly: 1 },
    compute: (ops) => Math.sin(toRadians(at(ops, 0))),
  },
  cos: {
    label: "Cosine",
    arity: { exactly: 1 },
    compute: (ops) => Math.cos(toRadians(at(ops, 0))),
  },
  tan: {
    label: "Tangent",
    arity: { exactly: 1 },
    compute: (ops) => Math.tan(toRadians(at(ops, 0))),
  },
  log: {
    label: "Logarithm",
    arity: { exactly: 1 },
    compute: (ops) => {
      const x = at(ops, 0);
      if (x <= 0) throw new InvalidDomainError("Cannot calculate logarithm of non-positive number");
      return Math.log10(x);
    },
  },
  ln: {
    label: "Natural logarithm",
    arity: { exactly: 1 },
    compute: (ops) => {
      const x = at(ops, 0);
      if (x <= 0) {
        throw new InvalidDomainError("Cannot calculate natural logarithm of non-positive number");
      }
      return Math.log(x);
    },
  },
  factorial: {
    label: "Factorial",
    arity: { exactly: 1 },
    compute: (ops, options) => factorial(at(ops, 0), options.maxFactorial),
  },
};

const IMPLIED_EXPONENT: Partial<Record<OperationName, number>> = { square: 2, cube: 3 };

function checkArity(operation: OperationName, rule: OperationRule, count: number): void {
  if ("exactly" in rule.arity && count !== rule.arity.exactly) {
    throw new InvalidArityError(rule.label, operation, `exactly ${rule.arity.exactly}`, count);
  }
  if ("atLeast" in rule.arity && count < rule.arity.atLeast) {
    throw new InvalidArityError(rule.label, operation, `at least ${rule.arity.atLeast}`, count);
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function supportsOperation(operation: string): operation is OperationName {
  return isOperationName(operation);
}

/**
 * Evaluate one operation. Throws a CalculatorError subclass on bad arity,
 * domain, or operation name.
 */
export function evaluateOperation(
  operation: string,
  operands: readonly number[],
  options: Partial<ScientificOptions> = {},
): CalcResult {
  if (!isOperationName(operation)) {
    throw new UnsupportedOperationError(operation);
  }

  const rule = RULES[operation];
  const implied = IMPLIED_EXPONENT[operation];
  const args = implied !== undefined && operands.length === 1 ? [...operands, implied] : operands;

  checkArity(operation, rule, args.length);
  return checkResult(rule.compute(args, { ...DEFAULT_OPTIONS, ...options }));
}

/** Build a calculator with its own limits */
export function createScientificCalculator(options: Partial<ScientificOptions> = {}): Calculator {
  return {
    name: "scientific",
    description: "Arithmetic, powers, roots, degree trigonometry, logarithms, factorial",
    priority: 10,
    supports: supportsOperation,
    evaluate: (operation, operands) => evaluateOperation(operation, operands, options),
  };
}

// =============================================================================
// CALCULATOR REGISTRATION
// =============================================================================

export const calculator: Calculator = createScientificCalculator();
