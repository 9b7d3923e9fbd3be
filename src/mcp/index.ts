#!/usr/bin/env node
// ============================================
// Support Desk MCP Server
// Policy and customer tools over stdio
// ============================================

import "dotenv/config";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { getProductionContainer } from "../app/container.production.js";
import { logger, redirectLogsToStderr } from "../lib/logger.js";
import { TOOLS, createToolHandler } from "./tools.js";

// ============================================
// Server Setup
// ============================================

redirectLogsToStderr();

const callTool = createToolHandler(getProductionContainer());

const server = new Server(
  {
    name: "support-desk-mcp",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: TOOLS,
}));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return callTool(name, args);
});

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MCP server running on stdio", { stage: "mcp", toolCount: TOOLS.length });
}

main().catch((err: unknown) => {
  logger.error("MCP server failed to start", { stage: "mcp", error: err });
  process.exit(1);
});
