import { z } from "zod";
import type { CalculatorAgent } from "../lib/agent.ts";
import type { HistoryEntry } from "../lib/history.ts";

/**
 * Calculator tools: one agent (and its history) behind every tool
 */

export function createCalculatorTools(agent: CalculatorAgent) {
  const calculateTool = {
    name: "calculate",
    description: `Answer a short natural-language math question.

Supports: + - * / (or plus, minus, times, divided by), powers, squared, cubed,
square and cube roots, sin/cos/tan in degrees, log (base 10), ln, factorial.
One operation per question; "2 + 3 * 4" is not supported.

Also accepts the commands: help, history, clear.`,
    parameters: z.object({
      query: z.string().min(1).describe("Question, e.g. \"What's 25 + 17?\" or \"sin of 30 degrees\""),
    }),
    execute: async (args: { query: string }): Promise<string> => {
      return agent.processQuery(args.query);
    },
  };

  const getHistoryTool = {
    name: "get_history",
    description: "List recent calculations, newest first",
    parameters: z.object({
      limit: z.number().int().min(1).max(1000).optional().describe("Maximum entries to return"),
    }),
    execute: async (args: { limit?: number }): Promise<string> => {
      const entries = agent.recentHistory(args.limit);
      if (entries.length === 0) {
        return "No calculation history yet.";
      }
      return formatHistoryTable(`**Recent Calculations** (${entries.length})`, entries);
    },
  };

  const searchHistoryTool = {
    name: "search_history",
    description: "Find past calculations whose question or answer contains a keyword (case-insensitive)",
    parameters: z.object({
      keyword: z.string().min(1).describe("Text to look for in past questions and answers"),
    }),
    execute: async (args: { keyword: string }): Promise<string> => {
      const matches = agent.searchHistory(args.keyword);
      if (matches.length === 0) {
        return `No calculations match: ${args.keyword}`;
      }
      return formatHistoryTable(`**Matches for "${args.keyword}"** (${matches.length})`, matches);
    },
  };

  const clearHistoryTool = {
    name: "clear_history",
    description: "Clear all calculation history",
    parameters: z.object({}),
    execute: async (): Promise<string> => {
      const count = agent.historyCount();
      agent.clearHistory();
      return `Cleared ${count} history entr${count === 1 ? "y" : "ies"}.`;
    },
  };

  return { calculateTool, getHistoryTool, searchHistoryTool, clearHistoryTool };
}

export type CalculatorTools = ReturnType<typeof createCalculatorTools>;

function formatHistoryTable(title: string, entries: readonly HistoryEntry[]): string {
  const lines = [title, "", "| # | Question | Answer | Operation |", "|---|----------|--------|-----------|"];

  entries.forEach((e, i) => {
    lines.push(`| ${i + 1} | ${escapeCell(e.query)} | ${escapeCell(e.result)} | ${e.operation_type} |`);
  });

  return lines.join("\n");
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}
