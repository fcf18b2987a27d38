/**
 * MCP Schema Compliance Tests
 *
 * Validates that all tool schemas conform to MCP SDK requirements:
 * - inputSchema.type MUST be "object" at root level
 * - No oneOf/anyOf/allOf at root (breaks MCP validation)
 */

import { describe, expect, test } from "vitest";
import { z } from "zod";
import { createAgent } from "../src/lib/agent.ts";
import { createCalculatorTools } from "../src/tools/index.ts";

// Zod v4 native conversion, as FastMCP advertises it
const toJsonSchema = (schema: z.ZodType) => z.toJSONSchema(schema);

const { calculateTool, getHistoryTool, searchHistoryTool, clearHistoryTool } = createCalculatorTools(
  createAgent({ maxHistory: 10, historyDisplayLimit: 10, maxFactorial: 100 }),
);

const tools = [
  { name: "calculate", schema: calculateTool.parameters },
  { name: "get_history", schema: getHistoryTool.parameters },
  { name: "search_history", schema: searchHistoryTool.parameters },
  { name: "clear_history", schema: clearHistoryTool.parameters },
] as const;

describe("MCP Schema Compliance", () => {
  for (const { name, schema } of tools) {
    describe(`${name} tool`, () => {
      test('schema has type="object" at root', () => {
        expect(toJsonSchema(schema).type).toBe("object");
      });

      test("schema has no union keywords at root level", () => {
        const jsonSchema = toJsonSchema(schema);
        expect(jsonSchema.oneOf).toBeUndefined();
        expect(jsonSchema.anyOf).toBeUndefined();
        expect(jsonSchema.allOf).toBeUndefined();
      });

      test("schema has properties defined", () => {
        expect(toJsonSchema(schema).properties).toBeDefined();
      });
    });
  }

  test("calculate requires a query", () => {
    expect(toJsonSchema(calculateTool.parameters).required).toEqual(["query"]);
  });

  test("get_history limit is declared", () => {
    expect(Object.keys(toJsonSchema(getHistoryTool.parameters).properties ?? {})).toEqual(["limit"]);
  });
});
