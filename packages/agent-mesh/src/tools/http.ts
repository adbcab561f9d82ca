/**
 * Host an MCP tool server over Streamable HTTP (stateless).
 *
 * Every POST to /mcp gets a fresh McpServer + transport pair; tool servers
 * here keep no per-client state, so no session bookkeeping is needed.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";

export interface McpHttpOptions {
  createServerInstance: () => McpServer;
  /** 0 = random */
  port?: number;
  host?: string;
  logger?: Logger;
}

export interface McpHttpServer {
  httpServer: Server;
  url: string;
  port: number;
  close(): Promise<void>;
}

/** Decodes once at the end, so multibyte characters may straddle chunks */
export function readBody(req: Readable): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
    });
    req.on("end", () => {
      try {
        const data = Buffer.concat(chunks).toString("utf-8");
        resolve(data ? JSON.parse(data) : undefined);
      } catch (error) {
        reject(error);
      }
    });
    req.on("error", reject);
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function handle(
  req: IncomingMessage,
  res: ServerResponse,
  createServerInstance: () => McpServer,
  logger: Logger,
): Promise<void> {
  const path = new URL(req.url || "/", "http://localhost").pathname;
  if (path !== "/mcp") {
    sendJson(res, 404, { error: "Not found" });
    return;
  }
  if (req.method !== "POST") {
    sendJson(res, 405, { error: "Method not allowed" });
    return;
  }

  let body: unknown;
  try {
    body = await readBody(req);
  } catch {
    sendJson(res, 400, { error: "Invalid JSON body" });
    return;
  }

  const server = createServerInstance();
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
  res.on("close", () => {
    Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
      logger.debug(`MCP cleanup: ${errorMessage(error)}`);
    });
  });
  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

export async function serveMcpHttp(options: McpHttpOptions): Promise<McpHttpServer> {
  const { createServerInstance, port = 0, host = "127.0.0.1" } = options;
  const logger = options.logger ?? createSilentLogger();

  const httpServer = createServer((req, res) => {
    handle(req, res, createServerInstance, logger).catch((error: unknown) => {
      logger.error(`MCP request failed: ${errorMessage(error)}`);
      if (!res.headersSent) sendJson(res, 500, { error: errorMessage(error) });
    });
  });

  const actualPort = await new Promise<number>((resolve, reject) => {
    httpServer.on("error", reject);
    httpServer.listen(port, host, () => {
      httpServer.removeListener("error", reject);
      const addr = httpServer.address();
      if (typeof addr === "object" && addr) resolve(addr.port);
      else reject(new Error("Failed to get server address"));
    });
  });

  return {
    httpServer,
    url: `http://${host}:${actualPort}/mcp`,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      }),
  };
}
