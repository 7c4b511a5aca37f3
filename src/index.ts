#!/usr/bin/env node
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig, parseMCPSettings } from "./config/index.js";
import { APITransport } from "./transports/index.js";
import {
  createProgressNotifier,
  registerAllTools,
  toolDefinitions,
  type ToolContext,
  type ToolRegistry,
} from "./tools/index.js";
import { logger } from "./logger.js";

// Tool registry
const tools: ToolRegistry = new Map();

async function main(): Promise<void> {
  // Create MCP server instance
  const server = new Server(
    { name: "vergeos-mcp-ops", version: "0.1.0" },
    { capabilities: { tools: {} } }
  );

  // Load configuration from MCP settings
  const config = loadConfig(parseMCPSettings(process.env.MCP_SETTINGS));
  logger.setLevel(config.logLevel);

  const transport = new APITransport(config);
  registerAllTools(tools, transport, config);

  // ListTools handler - returns all tool definitions
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: toolDefinitions };
  });

  // CallTool handler - executes the requested tool
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    const handler = tools.get(name);
    if (!handler) {
      throw new Error(`Unknown tool: ${name}`);
    }

    const progressToken = request.params._meta?.progressToken;
    const context: ToolContext = {
      signal: extra.signal,
      onProgress: progressToken === undefined ? undefined : createProgressNotifier(server, progressToken),
    };

    try {
      const result = await handler(args ?? {}, context);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.warn(`${name} failed: ${errorMessage}`);
      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ error: errorMessage }, null, 2),
          },
        ],
        isError: true,
      };
    }
  });

  await transport.connect();

  // Set up graceful shutdown
  const shutdown = (): void => {
    transport
      .disconnect()
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  // Start the server with stdio transport
  await server.connect(new StdioServerTransport());
  logger.info("VergeOS MCP server ready on stdio");
}

// Run the main function
main().catch((error: unknown) => {
  logger.error("Fatal error:", error);
  process.exit(1);
});
