import { FastMCP } from "fastmcp";
import { loadConfigFromEnvironment } from "./config.ts";
import { createAgent } from "./lib/agent.ts";
import { createLogger } from "./logger.ts";
import { createHistoryResource } from "./resources/history.ts";
import { createCalculatorTools } from "./tools/index.ts";

const config = loadConfigFromEnvironment();
// stdout belongs to the stdio transport; logs go to stderr
const logger = createLogger({ name: "calc-agent-mcp", level: config.logLevel, destination: 2 });
const agent = createAgent(config, logger);
const tools = createCalculatorTools(agent);

const server = new FastMCP({
  name: "Calculator Agent",
  version: "0.1.0",
});

// Register tools
server.addTool(tools.calculateTool);
server.addTool(tools.getHistoryTool);
server.addTool(tools.searchHistoryTool);
server.addTool(tools.clearHistoryTool);

// Register resources
server.addResource(createHistoryResource(agent, config.historyDisplayLimit));

// Start server (stdio for local MCP agents like desktop clients)
try {
  await server.start({ transportType: "stdio" });
  logger.info({ maxHistory: config.maxHistory }, "MCP server listening on stdio");
} catch (err) {
  logger.fatal({ err }, "failed to start MCP server");
  process.exitCode = 1;
}
