#!/usr/bin/env node

/**
 * MCP server for homeindex
 * Builds both inverted indexes once at startup and serves search tools over stdio
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { logger as indexLogger } from "@homeindex/core";
import { createToolHandlers, isToolName, toolDefinitions } from "./tools.js";
import { HomeSearchService } from "./service/home-search.js";
import { resolveServerConfig } from "./config.js";
import { errorCode, mapErrorToMcp } from "./errors.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = resolveServerConfig();

  if (!config.enabled) {
    console.error("homeindex MCP server is disabled (HOMEINDEX_MCP_ENABLED=false)");
    process.exit(0);
  }

  logger.setLevel(config.logLevel);
  indexLogger.setEnabled(config.logLevel === "debug");

  const service = await HomeSearchService.open(config.dataPath, config.indexOptions);
  const toolHandlers = createToolHandlers(service);

  const server = new Server(
    {
      name: "homeindex-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: toolDefinitions.map((tool) => ({ ...tool })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      return await toolHandlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCode(error),
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    data_path: config.dataPath,
    properties: service.health().properties,
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", {});
    await transport.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
