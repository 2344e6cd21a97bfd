import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { DocsVault, Logger } from "@knowledge-vault/core";
import { RESOURCE_TEMPLATES, readResource } from "./resources";
import { TOOL_DEFINITIONS, callTool } from "./tools";

export const SERVER_NAME = "github-knowledge-vault";
export const SERVER_VERSION = "1.0.0";

/**
 * Create an MCP server exposing the vault's tools and read views.
 *
 * The server holds no state of its own, so one can be created per HTTP
 * request or once for a stdio session.
 */
export function createServer(vault: DocsVault, logger: Logger): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug("Tool called", { tool: name });
    return callTool(vault, name, args);
  });

  // Everything is reachable through the templates; there are no fixed resources
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: [] };
  });

  server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => {
    return { resourceTemplates: RESOURCE_TEMPLATES };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    logger.debug("Resource read", { uri: request.params.uri });
    return readResource(vault, request.params.uri);
  });

  return server;
}
