/**
 * AgentHandler — what an agent is: a card plus handle(message) → message.
 *
 * Extra behavior is layered by composition (withLogging, createConnections)
 * instead of subclassing. LocalAgentClient puts a handler behind the
 * AgentClient contract so the network can dispatch to it in-process.
 */

import { AgentTransportError, errorMessage } from "../errors.ts";
import type { Logger } from "../logger.ts";
import type { AgentClient } from "./client.ts";
import { createMessage, createReply, messageText, textContent, type AgentCard, type AgentMessage } from "./types.ts";

// ── Interface ──────────────────────────────────────────────────────

export interface AgentHandler {
  readonly card: AgentCard;
  handle(message: AgentMessage): Promise<AgentMessage>;
  /** Optional async setup (tool discovery, connection checks) */
  initialize?(): Promise<void>;
  /** Release connections */
  close?(): Promise<void>;
}

/** Handler from a card and a text → text function */
export function defineAgent(
  card: AgentCard,
  answer: (query: string, message: AgentMessage) => string | Promise<string>,
): AgentHandler {
  return {
    card,
    async handle(message) {
      const text = await answer(messageText(message), message);
      return createReply(message, textContent(text));
    },
  };
}

// ── Wrappers ───────────────────────────────────────────────────────

/** Log every request and its latency */
export function withLogging(handler: AgentHandler, logger: Logger): AgentHandler {
  return {
    card: handler.card,
    initialize: handler.initialize?.bind(handler),
    close: handler.close?.bind(handler),
    async handle(message) {
      const start = Date.now();
      logger.info(`[${handler.card.name}] Handling message ${message.id}`);
      try {
        const reply = await handler.handle(message);
        logger.info(`[${handler.card.name}] Replied in ${Date.now() - start}ms`);
        return reply;
      } catch (error) {
        logger.error(`[${handler.card.name}] Failed: ${errorMessage(error)}`);
        throw error;
      }
    },
  };
}

/** Named clients an agent may call while answering */
export interface AgentConnections {
  has(name: string): boolean;
  /** Ask a connected agent; returns its reply text */
  ask(name: string, text: string, conversationId?: string): Promise<string>;
  names(): string[];
}

export function createConnections(clients: Record<string, AgentClient>): AgentConnections {
  return {
    has: (name) => name in clients,
    names: () => Object.keys(clients),
    async ask(name, text, conversationId) {
      const client = clients[name];
      if (!client) throw new Error(`No connection to agent '${name}'`);
      const reply = await client.send(createMessage(text, { role: "agent", conversationId }));
      return messageText(reply);
    },
  };
}

// ── In-process client ──────────────────────────────────────────────

export class LocalAgentClient implements AgentClient {
  readonly agent: string;
  readonly endpoint: string;

  constructor(
    agent: string,
    private readonly handler: AgentHandler,
  ) {
    this.agent = agent;
    this.endpoint = `local://${agent}`;
  }

  async send(message: AgentMessage): Promise<AgentMessage> {
    try {
      return await this.handler.handle(message);
    } catch (error) {
      throw new AgentTransportError(this.agent, errorMessage(error), error);
    }
  }

  async testReachable(): Promise<boolean> {
    return true;
  }

  async getCard(): Promise<AgentCard> {
    return this.handler.card;
  }
}
