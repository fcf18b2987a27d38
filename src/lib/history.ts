/**
 * History Store - bounded, insertion-ordered log of answered queries
 * Oldest entry is evicted first once capacity is reached.
 */

import type { OperationName } from "./calc/index.ts";

export type OperationType = OperationName | "unknown" | "calculation";

export interface HistoryEntry {
  readonly query: string;
  readonly result: string;
  readonly operation_type: OperationType;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export interface HistoryStoreConfig {
  max_history: number;
  now: () => number;
}

const DEFAULT_CONFIG: HistoryStoreConfig = {
  max_history: 100,
  now: () => Date.now(),
};

export class HistoryStore {
  private entries: HistoryEntry[] = [];
  private readonly config: HistoryStoreConfig;

  constructor(config: Partial<HistoryStoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.max_history) || this.config.max_history < 1) {
      throw new RangeError(`max_history must be a positive integer, got ${this.config.max_history}`);
    }
  }

  get capacity(): number {
    return this.config.max_history;
  }

  record(query: string, result: string, operationType: OperationType = "calculation"): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      query,
      result,
      operation_type: operationType,
      timestamp: this.config.now(),
    });

    this.entries.push(entry);

    // Inserts are one at a time, so at most one eviction
    if (this.entries.length > this.config.max_history) {
      this.entries.shift();
    }

    return entry;
  }

  /**
   * Newest first. `limit` keeps at most that many of the newest entries.
   */
  recent(limit?: number): HistoryEntry[] {
    if (limit === undefined) {
      return [...this.entries].reverse();
    }
    const n = Math.max(0, Math.floor(limit));
    if (n === 0) return [];
    return this.entries.slice(-n).reverse();
  }

  latest(): HistoryEntry | undefined {
    return this.entries[this.entries.length - 1];
  }

  clear(): void {
    this.entries = [];
  }

  count(): number {
    return this.entries.length;
  }

  /**
   * Case-insensitive substring match on query or result, insertion order
   */
  search(keyword: string): HistoryEntry[] {
    const needle = keyword.toLowerCase();
    return this.entries.filter(
      (e) => e.query.toLowerCase().includes(needle) || e.result.toLowerCase().includes(needle),
    );
  }
}

export interface SerializedHistoryEntry {
  query: string;
  result: string;
  operation_type: OperationType;
  timestamp: string;
}

/** JSON shape for front ends: timestamp as ISO-8601 */
export function serializeEntry(entry: HistoryEntry): SerializedHistoryEntry {
  return {
    query: entry.query,
    result: entry.result,
    operation_type: entry.operation_type,
    timestamp: new Date(entry.timestamp).toISOString(),
  };
}
