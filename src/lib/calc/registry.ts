/**
 * Parser and calculator chains
 *
 * Each chain holds interchangeable implementations ordered by priority.
 * The agent only talks to the chain, so implementations can be swapped or
 * added without touching it.
 */

import { UnsupportedOperationError } from "./errors.ts";
import type { CalcResult, Calculator, ParsedRequest, QueryParser } from "./types.ts";

interface Ranked {
  name: string;
  description?: string;
  priority: number;
}

export interface ChainEntryInfo {
  name: string;
  description: string;
  priority: number;
}

/**
 * Priority-sorted list with a lazily rebuilt cache
 */
class RankedList<T extends Ranked> {
  private readonly items: T[] = [];
  private sortedCache: T[] | null = null;

  constructor(items: readonly T[]) {
    for (const item of items) this.add(item);
  }

  add(item: T): void {
    this.items.push(item);
    this.sortedCache = null; // Invalidate cache
  }

  sorted(): T[] {
    if (!this.sortedCache) {
      // Array#sort is stable: equal priorities keep registration order
      this.sortedCache = [...this.items].sort((a, b) => a.priority - b.priority);
    }
    return this.sortedCache;
  }

  describe(): ChainEntryInfo[] {
    return this.sorted().map((item) => ({
      name: item.name,
      description: item.description ?? "(no description)",
      priority: item.priority,
    }));
  }
}

// =============================================================================
// PARSER CHAIN
// =============================================================================

export class ParserChain {
  private readonly parsers: RankedList<QueryParser>;

  constructor(parsers: readonly QueryParser[] = []) {
    this.parsers = new RankedList(parsers);
  }

  register(parser: QueryParser): void {
    this.parsers.add(parser);
  }

  canHandle(text: string): boolean {
    return this.parsers.sorted().some((p) => p.canHandle(text));
  }

  /**
   * Run parsers that claim the text until one produces a request
   */
  parse(text: string): ParsedRequest | null {
    for (const parser of this.parsers.sorted()) {
      if (!parser.canHandle(text)) continue;
      const parsed = parser.match(text);
      if (parsed) return parsed;
    }
    return null;
  }

  list(): ChainEntryInfo[] {
    return this.parsers.describe();
  }
}

// =============================================================================
// CALCULATOR CHAIN
// =============================================================================

export class CalculatorChain {
  private readonly calculators: RankedList<Calculator>;

  constructor(calculators: readonly Calculator[] = []) {
    this.calculators = new RankedList(calculators);
  }

  register(calculator: Calculator): void {
    this.calculators.add(calculator);
  }

  supports(operation: string): boolean {
    return this.calculators.sorted().some((c) => c.supports(operation));
  }

  /**
   * Evaluate with the first calculator that supports the operation
   */
  evaluate(operation: string, operands: readonly number[]): CalcResult {
    const calculator = this.calculators.sorted().find((c) => c.supports(operation));
    if (!calculator) {
      throw new UnsupportedOperationError(operation);
    }
    return calculator.evaluate(operation, operands);
  }

  list(): ChainEntryInfo[] {
    return this.calculators.describe();
  }
}
