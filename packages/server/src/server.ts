#!/usr/bin/env node

/**
 * MCP server for AnnoStore
 * Exposes containers, searches and indexes via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { logger as storeLogger, openAnnoStore } from "@annostore/sdk";
import { loadServerConfig, toStoreOptions } from "./config.js";
import { AnnoStoreService } from "./service/annostore.js";
import { callTool, createToolHandlers, listTools } from "./tools.js";
import { logger } from "./observability/logger.js";

async function main(): Promise<void> {
  // Any stray console.log would corrupt the protocol channel
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = loadServerConfig();
  logger.setLevel(config.logLevel);
  storeLogger.setSink((line) => {
    console.error(line);
  });

  if (!config.enabled) {
    console.error("MCP AnnoStore server is disabled (MCP_ANNOSTORE_ENABLED=false)");
    process.exit(0);
  }

  const store = openAnnoStore(toStoreOptions(config));

  const principal = config.apiKey === undefined ? undefined : await store.authenticate(config.apiKey);
  if (config.apiKey !== undefined && principal === undefined) {
    throw new Error("ANNOSTORE_API_KEY does not match any user");
  }

  const handlers = createToolHandlers(new AnnoStoreService(store, principal));

  const server = new Server(
    {
      name: "annostore-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: listTools(config.readOnly) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(handlers, name, args ?? {}, { readOnly: config.readOnly });
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    data_root: config.dataRoot,
  });

  // Graceful shutdown: let index builds and global searches finish
  const shutdown = async () => {
    logger.info("server.shutdown", {});
    await store.close();
    await transport.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
