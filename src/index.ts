import { FastMCP } from "fastmcp";
import { loadConfig } from "./config.ts";
import { analyzeExpressionTool, checkValueTool } from "./tools/index.ts";

const server = new FastMCP({
  name: "Expression Set Checker",
  version: "0.1.0",
});

// .env settings reach the tools through process.env
loadConfig();

// Register tools
server.addTool(analyzeExpressionTool);
server.addTool(checkValueTool);

// Start server (stdio for local MCP clients)
await server.start({ transportType: "stdio" });
