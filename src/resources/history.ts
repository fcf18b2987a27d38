/**
 * History Resource - expose recent calculations as an MCP resource
 */

import type { CalculatorAgent } from "../lib/agent.ts";
import { serializeEntry } from "../lib/history.ts";

/**
 * URI: history://recent
 */
export function createHistoryResource(agent: CalculatorAgent, limit: number) {
  return {
    uri: "history://recent",
    name: "Recent calculations",
    description: `Up to ${limit} most recent calculations as JSON, newest first`,
    mimeType: "application/json",
    load: async () => {
      const entries = agent.recentHistory(limit);
      return {
        text: JSON.stringify(
          { count: agent.historyCount(), history: entries.map(serializeEntry) },
          null,
          2,
        ),
      };
    },
  };
}
