#!/usr/bin/env node

/**
 * Bond Bridge MCP server.
 *
 * Exposes a Bond Bridge's Local API as MCP tools over stdio so an AI
 * assistant can list and control fans, shades, lights and fireplaces.
 *
 * Configuration via environment variables:
 *   BOND_HOST             – Bridge IP or hostname (required)
 *   BOND_TOKEN            – Local API token (required)
 *   BOND_TIMEOUT          – Request timeout in seconds (default 10)
 *   BOND_MAX_RETRIES      – Retries for transient failures (default 3)
 *   BOND_RETRY_DELAY      – Base delay between retries in seconds (default 1)
 *   BOND_MAX_CONCURRENCY  – Device detail fetches in flight while listing (default 4)
 *   LOG_LEVEL             – pino level (default info)
 *   MCP_SERVER_NAME       – Name reported to the MCP host (default bond-mcp-server)
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { BridgeClient } from "./adapters/bridge.js";
import { registerTools, ToolDispatcher } from "./tools.js";
import { loadConfig } from "./util/config.js";
import { createLogger } from "./util/logger.js";

const SERVER_VERSION = "0.1.0";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const client = new BridgeClient(config, { logger: logger.child({ component: "bridge" }) });
  const dispatcher = new ToolDispatcher(client, { logger: logger.child({ component: "tools" }) });

  const server = new McpServer({ name: config.serverName, version: SERVER_VERSION });
  registerTools(server, dispatcher);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "shutting down");
    await server.close();
    await client.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      });
    });
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ host: config.host, version: SERVER_VERSION }, "bond-mcp server running (stdio)");
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
