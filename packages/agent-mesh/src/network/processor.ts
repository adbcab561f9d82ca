/**
 * QueryProcessor — single-shot query: pick an agent, dispatch, return text.
 *
 * Every expected failure comes back as an "Error: ..." string; nothing
 * below this boundary throws to the caller.
 */

import { randomUUID } from "node:crypto";
import type { AgentDirectory } from "../agent/directory.ts";
import { createMessage, extractText } from "../agent/types.ts";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { Router, RoutingDecision } from "../routing/types.ts";

export const NO_AGENTS_ERROR = "Error: No agents available in the network";
export const ROUTING_FAILED_ERROR = "Error: Failed to route query to an agent";

export function agentNotFoundError(agent: string): string {
  return `Error: Agent '${agent}' not found in network`;
}

export function invalidResponseError(agent: string): string {
  return `Error: Received invalid response from ${agent}`;
}

export function dispatchError(agent: string, cause: unknown): string {
  return `Error: Failed to process query with agent ${agent}: ${errorMessage(cause)}`;
}

export interface QueryProcessorOptions {
  directory: AgentDirectory;
  /** Read on every query so a router swap takes effect immediately */
  router: () => Router;
  logger?: Logger;
}

export class QueryProcessor {
  private directory: AgentDirectory;
  private getRouter: () => Router;
  private logger: Logger;

  constructor(options: QueryProcessorOptions) {
    this.directory = options.directory;
    this.getRouter = options.router;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Routing decision for a query, or NO_AGENT when the directory is empty */
  async route(query: string): Promise<RoutingDecision> {
    if (this.directory.size === 0) {
      this.logger.warn("No agents in network to route query to");
      return { agent: null, confidence: 0 };
    }
    return await this.getRouter().route(query);
  }

  async process(query: string, targetAgent?: string): Promise<string> {
    if (this.directory.size === 0) return NO_AGENTS_ERROR;

    let decision: RoutingDecision;
    if (targetAgent) {
      if (!this.directory.has(targetAgent)) return agentNotFoundError(targetAgent);
      decision = { agent: targetAgent, confidence: 1 };
    } else {
      try {
        decision = await this.route(query);
      } catch (error) {
        this.logger.error(`Router failed: ${errorMessage(error)}`);
        return ROUTING_FAILED_ERROR;
      }
    }

    const agent = decision.agent;
    if (!agent) return ROUTING_FAILED_ERROR;

    this.logger.info(`Routing query to ${agent} (confidence: ${decision.confidence.toFixed(2)})`);

    try {
      const client = this.directory.resolve(agent);
      const message = createMessage(query, { conversationId: randomUUID() });
      const response = await client.send(message);
      if (!response.content) return invalidResponseError(agent);
      return extractText(response.content);
    } catch (error) {
      this.logger.error(`Error processing query with ${agent}: ${errorMessage(error)}`);
      return dispatchError(agent, error);
    }
  }
}
