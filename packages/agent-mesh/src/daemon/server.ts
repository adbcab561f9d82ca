/**
 * Agent server — one AgentHandler behind HTTP.
 *
 *   GET  /            liveness: { status: "ok", name }
 *   GET  /agent.json  agent card
 *   POST /messages    message → reply message
 *
 * Failures use the { success: false, error } envelope: 400 for bodies that
 * are not a message, 500 when the handler throws.
 */

import { randomUUID } from "node:crypto";
import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import type { AgentHandler } from "../agent/handle.ts";
import { decodeMessage, wireMessageSchema } from "../agent/schema.ts";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";

export interface ErrorEnvelope {
  success: false;
  error: string;
}

function errorResponse(c: Context, error: string, status: 400 | 404 | 500) {
  const body: ErrorEnvelope = { success: false, error };
  return c.json(body, status);
}

export function createAgentApp(handler: AgentHandler, logger: Logger = createSilentLogger()): Hono {
  const app = new Hono();
  app.use("*", cors());

  app.get("/", (c) => c.json({ status: "ok", name: handler.card.name }));

  app.get("/agent.json", (c) => c.json(handler.card));

  app.post("/messages", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return errorResponse(c, "Invalid JSON body", 400);
    }

    const parsed = wireMessageSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      return errorResponse(c, `Invalid message${where}: ${issue?.message ?? "unknown error"}`, 400);
    }

    const message = decodeMessage(parsed.data, randomUUID());
    try {
      return c.json(await handler.handle(message));
    } catch (error) {
      logger.error(`Handler failed for message ${message.id}: ${errorMessage(error)}`);
      return errorResponse(c, errorMessage(error), 500);
    }
  });

  app.notFound((c) => errorResponse(c, `Not found: ${c.req.method} ${c.req.path}`, 404));

  return app;
}

// ── Node server ────────────────────────────────────────────────────

export interface AgentServerOptions {
  handler: AgentHandler;
  /** 0 = random */
  port?: number;
  host?: string;
  logger?: Logger;
}

export interface RunningAgentServer {
  server: Server;
  url: string;
  port: number;
  /** Stop listening and release the handler's connections */
  close(): Promise<void>;
}

export async function startAgentServer(options: AgentServerOptions): Promise<RunningAgentServer> {
  const { handler, port = 0, host = "127.0.0.1" } = options;
  const logger = options.logger ?? createSilentLogger();

  await handler.initialize?.();
  const app = createAgentApp(handler, logger);

  const server: Server = serve({ fetch: app.fetch, port, hostname: host });
  const actualPort = await new Promise<number>((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => {
      server.removeListener("error", reject);
      const addr = server.address();
      if (typeof addr === "object" && addr) resolve(addr.port);
      else reject(new Error("Failed to get server address"));
    });
  });

  const url = `http://${host}:${actualPort}`;
  logger.info(`${handler.card.name} listening on ${url}`);

  return {
    server,
    url,
    port: actualPort,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      await handler.close?.();
    },
  };
}
