/**
 * AgentClient — how the network reaches one agent.
 *
 * HttpAgentClient talks to an agent server (see daemon/server.ts):
 *   GET  /            liveness
 *   GET  /agent.json  card
 *   POST /messages    message → reply
 *
 * Every call is bounded by a timeout; an unreachable agent fails the call
 * instead of hanging the caller.
 */

import { randomUUID } from "node:crypto";
import { AgentTransportError, errorMessage } from "../errors.ts";
import { decodeMessage, parseAgentCard, wireMessageSchema } from "./schema.ts";
import type { AgentCard, AgentMessage } from "./types.ts";

// ── Interface ──────────────────────────────────────────────────────

export interface AgentClient {
  readonly agent: string;
  readonly endpoint: string;
  /** Dispatch a message. Throws AgentTransportError on any transport failure. */
  send(message: AgentMessage): Promise<AgentMessage>;
  /** Lightweight liveness check; any status below 400 counts as reachable */
  testReachable(): Promise<boolean>;
  /** Fetch the agent's capability card */
  getCard(): Promise<AgentCard>;
}

// ── HttpAgentClient ────────────────────────────────────────────────

export const DEFAULT_SEND_TIMEOUT_MS = 30_000;
export const DEFAULT_REACHABILITY_TIMEOUT_MS = 2_000;

export interface HttpAgentClientOptions {
  /** Per-message timeout (default 30s) */
  timeoutMs?: number;
  /** Liveness check timeout (default 2s) */
  reachabilityTimeoutMs?: number;
  /** fetch implementation (tests route this into an in-process app) */
  fetch?: typeof fetch;
}

export class HttpAgentClient implements AgentClient {
  readonly agent: string;
  readonly endpoint: string;
  private timeoutMs: number;
  private reachabilityTimeoutMs: number;
  private fetchFn: typeof fetch;

  constructor(agent: string, endpoint: string, options: HttpAgentClientOptions = {}) {
    this.agent = agent;
    this.endpoint = endpoint.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    this.reachabilityTimeoutMs = options.reachabilityTimeoutMs ?? DEFAULT_REACHABILITY_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  async send(message: AgentMessage): Promise<AgentMessage> {
    const res = await this.request("/messages", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(message),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const body = await this.readJson(res);
    const parsed = wireMessageSchema.safeParse(body);
    if (!parsed.success) {
      throw new AgentTransportError(
        this.agent,
        `Malformed response from ${this.agent}: ${parsed.error.issues[0]?.message ?? "invalid message"}`,
      );
    }
    return decodeMessage(parsed.data, randomUUID());
  }

  async testReachable(): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.endpoint}/`, {
        method: "GET",
        signal: AbortSignal.timeout(this.reachabilityTimeoutMs),
      });
      return res.status < 400;
    } catch {
      return false;
    }
  }

  async getCard(): Promise<AgentCard> {
    const res = await this.request("/agent.json", {
      method: "GET",
      signal: AbortSignal.timeout(this.reachabilityTimeoutMs),
    });
    const body = await this.readJson(res);
    try {
      return parseAgentCard(body);
    } catch (error) {
      throw new AgentTransportError(this.agent, `Invalid agent card from ${this.agent}`, error);
    }
  }

  /** fetch + non-2xx check, all failures as AgentTransportError */
  private async request(path: string, init: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(`${this.endpoint}${path}`, init);
    } catch (error) {
      throw new AgentTransportError(
        this.agent,
        `Cannot reach ${this.agent} at ${this.endpoint}: ${errorMessage(error)}`,
        error,
      );
    }

    if (!res.ok) {
      const detail = await res.text().catch(() => "");
      throw new AgentTransportError(
        this.agent,
        `${this.agent} responded with HTTP ${res.status}${detail ? `: ${detail}` : ""}`,
      );
    }
    return res;
  }

  private async readJson(res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (error) {
      throw new AgentTransportError(this.agent, `Malformed response from ${this.agent}: not JSON`, error);
    }
  }
}
