/**
 * Calculator Agent - orchestrates one query at a time
 *
 * Flow per query:
 * 1. Normalize input (empty/non-string -> invalid input)
 * 2. Built-in commands: help, history, clear (whole-string, case-insensitive)
 * 3. Parse through the parser chain (no match -> "could not understand")
 * 4. Evaluate through the calculator chain (typed errors -> error text)
 * 5. Record the answer in history
 * 6. Format the response
 *
 * Every failure becomes text; nothing is thrown to the caller.
 */

import type { AppConfig } from "../config.ts";
import { type Logger, silentLogger } from "../logger.ts";
import {
  type CalcErrorCode,
  type CalcResult,
  CalculatorChain,
  createScientificCalculator,
  DivideByZeroError,
  isCalculatorError,
  type OperationName,
  type ParsedRequest,
  ParserChain,
  parser as naturalLanguageParser,
} from "./calc/index.ts";
import { type OutputFormatter, TextFormatter } from "./format.ts";
import { type HistoryEntry, HistoryStore } from "./history.ts";
import { defaultNormalizer, type InputNormalizer } from "./input.ts";

export type AgentCommand = "help" | "history" | "clear";

export type QueryOutcome =
  | { kind: "result"; operation: OperationName; value: CalcResult; text: string }
  | { kind: "command"; command: AgentCommand; text: string }
  | { kind: "error"; code: CalcErrorCode | "UNEXPECTED"; text: string };

export interface AgentDeps {
  parsers: ParserChain;
  calculators: CalculatorChain;
  history: HistoryStore;
  normalizer?: InputNormalizer;
  formatter?: OutputFormatter;
  logger?: Logger;
  /** Entries shown by the history command */
  historyDisplayLimit?: number;
}

const COMMANDS: ReadonlySet<string> = new Set<AgentCommand>(["help", "history", "clear"]);

function isCommand(text: string): text is AgentCommand {
  return COMMANDS.has(text);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CalculatorAgent {
  private readonly parsers: ParserChain;
  private readonly calculators: CalculatorChain;
  private readonly history: HistoryStore;
  private readonly normalizer: InputNormalizer;
  private readonly formatter: OutputFormatter;
  private readonly logger: Logger;
  private readonly historyDisplayLimit: number;

  constructor(deps: AgentDeps) {
    this.parsers = deps.parsers;
    this.calculators = deps.calculators;
    this.history = deps.history;
    this.normalizer = deps.normalizer ?? defaultNormalizer;
    this.formatter = deps.formatter ?? new TextFormatter();
    this.logger = deps.logger ?? silentLogger;
    this.historyDisplayLimit = deps.historyDisplayLimit ?? 10;
  }

  /**
   * Single entry point for front ends: raw text in, display text out
   */
  processQuery(raw: unknown): string {
    return this.answer(raw).text;
  }

  /**
   * Same pipeline as processQuery, with the outcome kept structured
   */
  answer(raw: unknown): QueryOutcome {
    const text = this.normalizer.normalize(raw);
    if (text === null) {
      return this.fail("INVALID_INPUT", "Invalid input");
    }

    const lower = text.toLowerCase();
    if (isCommand(lower)) {
      return this.runCommand(lower);
    }

    let parsed: ParsedRequest | null;
    try {
      parsed = this.parsers.parse(text);
    } catch (error) {
      if (isCalculatorError(error)) {
        return this.fail(error.code, `Parsing error: ${error.message}`);
      }
      this.logger.error({ err: error, query: text }, "parser threw unexpectedly");
      return this.fail("UNEXPECTED", `Parsing error: ${errorMessage(error)}`);
    }

    if (!parsed) {
      this.logger.debug({ query: text }, "no pattern matched");
      return { kind: "error", code: "PARSING", text: this.formatter.formatParsingError() };
    }

    this.logger.debug(
      { operation: parsed.operation, operands: parsed.operands.length },
      "parsed query",
    );

    let value: CalcResult;
    try {
      value = this.calculators.evaluate(parsed.operation, parsed.operands);
    } catch (error) {
      if (error instanceof DivideByZeroError) {
        return this.fail(error.code, "Cannot divide by zero");
      }
      if (isCalculatorError(error)) {
        return this.fail(error.code, error.message);
      }
      this.logger.error({ err: error, operation: parsed.operation }, "calculation threw unexpectedly");
      return this.fail("UNEXPECTED", `Calculation error: ${errorMessage(error)}`);
    }

    // History keeps the user's text as typed, before normalization
    this.history.record(
      typeof raw === "string" ? raw : text,
      this.formatter.formatNumber(value),
      parsed.operation,
    );

    return {
      kind: "result",
      operation: parsed.operation,
      value,
      text: this.formatter.formatResult(value, text),
    };
  }

  welcome(): string {
    return this.formatter.formatWelcome();
  }

  goodbye(): string {
    return this.formatter.formatGoodbye();
  }

  recentHistory(limit?: number): HistoryEntry[] {
    return this.history.recent(limit);
  }

  historyText(limit: number = this.historyDisplayLimit): string {
    return this.formatter.formatHistory(this.history.recent(limit));
  }

  searchHistory(keyword: string): HistoryEntry[] {
    return this.history.search(keyword);
  }

  historyCount(): number {
    return this.history.count();
  }

  clearHistory(): void {
    this.history.clear();
  }

  private runCommand(command: AgentCommand): QueryOutcome {
    switch (command) {
      case "help":
        return { kind: "command", command, text: this.formatter.formatHelp() };
      case "history":
        return { kind: "command", command, text: this.historyText() };
      case "clear":
        this.history.clear();
        return { kind: "command", command, text: "History cleared!" };
    }
  }

  private fail(code: CalcErrorCode | "UNEXPECTED", message: string): QueryOutcome {
    return { kind: "error", code, text: this.formatter.formatError(message) };
  }
}

/**
 * Composition root: wires the default parser, calculator, and a fresh history store
 */
export function createAgent(
  config: Pick<AppConfig, "maxHistory" | "historyDisplayLimit" | "maxFactorial">,
  logger: Logger = silentLogger,
): CalculatorAgent {
  return new CalculatorAgent({
    parsers: new ParserChain([naturalLanguageParser]),
    calculators: new CalculatorChain([
      createScientificCalculator({ maxFactorial: config.maxFactorial }),
    ]),
    history: new HistoryStore({ max_history: config.maxHistory }),
    historyDisplayLimit: config.historyDisplayLimit,
    logger,
  });
}
