import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createServerContext } from "./context.js";
import { ToolRegistry } from "./tool-registry.js";
import * as searchTools from "./search-tools.js";
import * as dataManagementTools from "./data-management-tools.js";
import { logInfo, logError, getErrorMessage } from "../core/logging.js";

// Server configuration
const SERVER_NAME = "diagnosis-code-search-mcp";
const SERVER_VERSION = "0.1.0";

export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(searchTools.getToolDefinitions());
  registry.register(dataManagementTools.getToolDefinitions());
  return registry;
}

// Start server
export async function startServer(): Promise<void> {
  const ctx = await createServerContext();
  const registry = createToolRegistry();

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: registry.listTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    try {
      return await registry.callTool(name, args, ctx);
    } catch (error) {
      return {
        content: [{ type: "text" as const, text: `Error: ${getErrorMessage(error)}` }],
        isError: true,
      };
    }
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logInfo(`Received ${signal}, shutting down...`);
    void server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logError("Shutdown failed:", getErrorMessage(err));
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logInfo(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
}
