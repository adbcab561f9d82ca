/**
 * Test doubles for agents: scripted clients and Hono-backed fetch.
 */

import type { Hono } from "hono";
import type { AgentClient } from "../../src/agent/client.ts";
import {
  createReply,
  messageText,
  textContent,
  type AgentCard,
  type AgentMessage,
} from "../../src/agent/types.ts";

export interface ScriptedClient extends AgentClient {
  /** Text of every message sent, in order */
  readonly received: string[];
  /** Full messages sent, in order */
  readonly messages: AgentMessage[];
}

/** Client whose replies come from `reply`; a thrown error fails the send */
export function scriptedClient(
  agent: string,
  reply: (text: string, message: AgentMessage) => string | AgentMessage,
  options: { reachable?: boolean; card?: AgentCard } = {},
): ScriptedClient {
  const received: string[] = [];
  const messages: AgentMessage[] = [];
  return {
    agent,
    endpoint: `test://${agent}`,
    received,
    messages,
    async send(message) {
      received.push(messageText(message));
      messages.push(message);
      const result = reply(messageText(message), message);
      return typeof result === "string" ? createReply(message, textContent(result)) : result;
    },
    async testReachable() {
      return options.reachable ?? true;
    },
    async getCard() {
      if (!options.card) throw new Error(`no card for ${agent}`);
      return options.card;
    },
  };
}

/** Records the global order of sends across several clients */
export function callLog() {
  const calls: string[] = [];
  return {
    calls,
    client(agent: string, reply: (text: string) => string): ScriptedClient {
      return scriptedClient(agent, (text) => {
        calls.push(agent);
        return reply(text);
      });
    },
  };
}

export function card(name: string, description: string, tags: string[] = []): AgentCard {
  return {
    name,
    description,
    skills: tags.length > 0 ? [{ name: "Main", description: "", tags }] : [],
  };
}

/** fetch that serves requests from in-process Hono apps keyed by origin */
export function honoFetch(apps: Record<string, Hono>): typeof fetch {
  return async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const app = apps[url.origin];
    if (!app) throw new TypeError(`fetch failed: no app for ${url.origin}`);
    return app.request(url.toString(), init);
  };
}
