/**
 * Streamable HTTP transport
 *
 * Stateless mode: every POST to /mcp gets a fresh server and transport, both
 * closed when the response ends. CORS is open so browser-based MCP clients
 * can connect.
 */

import * as http from "http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { DocsVault, Logger } from "@knowledge-vault/core";
import { createServer } from "./server";

export const MCP_PATH = "/mcp";

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, OPTIONS",
  "Access-Control-Allow-Headers": "*",
  "Access-Control-Expose-Headers": "mcp-session-id, mcp-protocol-version",
  "Access-Control-Max-Age": "86400",
};

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function jsonRpcError(res: http.ServerResponse, status: number, message: string): void {
  sendJson(res, status, {
    jsonrpc: "2.0",
    error: { code: -32000, message },
    id: null,
  });
}

async function handleMcpRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  vault: DocsVault,
  logger: Logger
): Promise<void> {
  const server = createServer(vault, logger);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on("close", () => {
    transport.close().catch((error: unknown) => {
      logger.warn("Failed to close transport", { error: String(error) });
    });
    server.close().catch((error: unknown) => {
      logger.warn("Failed to close server", { error: String(error) });
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

export function createRequestListener(vault: DocsVault, logger: Logger) {
  return async (req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    const { pathname } = new URL(req.url ?? "/", "http://localhost");
    const path = pathname.replace(/\/+$/, "") || "/";

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (path === "/health" && req.method === "GET") {
      sendJson(res, 200, { status: "ok" });
      return;
    }

    if (path !== MCP_PATH) {
      sendJson(res, 404, { error: `Not found: ${pathname}` });
      return;
    }

    if (req.method !== "POST") {
      jsonRpcError(res, 405, "Method not allowed.");
      return;
    }

    try {
      await handleMcpRequest(req, res, vault, logger);
    } catch (error) {
      logger.error("Error handling MCP request", {
        error: error instanceof Error ? error.message : String(error),
      });
      if (!res.headersSent) {
        jsonRpcError(res, 500, "Internal server error");
      }
    }
  };
}

export async function startHttpServer(
  vault: DocsVault,
  port: number,
  logger: Logger
): Promise<http.Server> {
  const listener = createRequestListener(vault, logger);
  const httpServer = http.createServer((req, res) => {
    listener(req, res).catch((error: unknown) => {
      logger.error("Unhandled HTTP error", { error: String(error) });
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  logger.info("MCP server listening", { port, endpoint: MCP_PATH });
  return httpServer;
}
