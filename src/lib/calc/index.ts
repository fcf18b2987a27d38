/**
 * Query interpretation: pattern parsing, evaluation, and the chains that
 * select between implementations
 */

export {
  CalculatorError,
  type CalcErrorCode,
  DivideByZeroError,
  InvalidArityError,
  InvalidDomainError,
  InvalidInputError,
  isCalculatorError,
  ParsingError,
  UnsupportedOperationError,
} from "./errors.ts";
export { canParseNaturalLanguage, parseNaturalLanguage, parser } from "./parser.ts";
export { IMPLICIT_EXPONENT, PATTERN_TABLE } from "./patterns.ts";
export { CalculatorChain, type ChainEntryInfo, ParserChain } from "./registry.ts";
export {
  calculator,
  createScientificCalculator,
  evaluateOperation,
  factorial,
  type ScientificOptions,
  supportsOperation,
} from "./scientific.ts";
export {
  type CalcResult,
  type Calculator,
  isOperationName,
  type OperationName,
  OPERATIONS,
  type ParsedRequest,
  type PatternGroup,
  type QueryParser,
} from "./types.ts";
