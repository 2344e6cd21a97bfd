#!/usr/bin/env node
/**
 * MCP Server for GitHub organization documentation
 *
 * Exposes the /doc folders of an organization's repositories via the Model
 * Context Protocol. Can be used with Claude Desktop or any MCP-compatible client.
 *
 * Usage:
 *   npm start                      (stdio)
 *   MCP_TRANSPORT=http npm start   (Streamable HTTP on MCP_SERVER_PORT)
 *
 * Environment Variables:
 *   GITHUB_TOKEN - GitHub token (optional, raises rate limits)
 *   GITHUB_API_BASE_URL - API base URL (default: https://api.github.com)
 *   GITHUB_REQUEST_TIMEOUT_MS - Per-request timeout (default: 30000)
 *   LOG_LEVEL - debug, info, warn or error (default: info)
 *   MCP_TRANSPORT - stdio or http (default: stdio)
 *   MCP_SERVER_PORT - HTTP port (default: 8000)
 */

import * as dotenv from "dotenv";
dotenv.config();

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger, DocsVault, loadConfig } from "@knowledge-vault/core";
import { startHttpServer } from "./http";
import { createServer } from "./server";

async function main() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, scope: "server" });

  if (!config.githubToken) {
    logger.warn("GITHUB_TOKEN not set. API rate limits will be restricted.");
  }

  logger.info("Starting GitHub Knowledge Vault MCP server", {
    tokenConfigured: Boolean(config.githubToken),
    apiBaseUrl: config.apiBaseUrl,
    transport: config.transport,
    port: config.transport === "http" ? config.port : undefined,
  });

  const vault = DocsVault.fromConfig(config, logger.child("vault"));

  if (config.transport === "http") {
    await startHttpServer(vault, config.port, logger.child("http"));
    return;
  }

  const server = createServer(vault, logger);
  await server.connect(new StdioServerTransport());
  logger.info("MCP server running on stdio");
}

main().catch((error) => {
  console.error("Server error:", error);
  process.exit(1);
});
