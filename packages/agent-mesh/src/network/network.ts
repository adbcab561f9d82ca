/**
 * AgentNetwork — directory + active router + processor + orchestrator.
 *
 * Owns the lifecycle: agents are added (card fetched once, a failed fetch
 * just means no keywords) and removed, and every change rebuilds the
 * router's index before the next lookup can see it.
 */

import { HttpAgentClient, type AgentClient, type HttpAgentClientOptions } from "../agent/client.ts";
import { AgentDirectory } from "../agent/directory.ts";
import type { AgentCard } from "../agent/types.ts";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import { AiRouter, type Classifier } from "../routing/ai.ts";
import { KeywordRouter } from "../routing/keyword.ts";
import type { RandomSource, Router, RouterType, RoutingDecision } from "../routing/types.ts";
import { ConversationOrchestrator, type Conversation, type StartOptions } from "./conversation.ts";
import { QueryProcessor } from "./processor.ts";

export interface AgentNetworkOptions {
  /** Requested strategy (default keyword). "ai" without a classifier falls back to keyword. */
  router?: RouterType;
  classifier?: Classifier;
  random?: RandomSource;
  logger?: Logger;
  /** Options for clients created by add() */
  client?: HttpAgentClientOptions;
  /** AI router cache bound */
  cacheSize?: number;
}

export interface AgentStatus {
  name: string;
  endpoint: string;
  available: boolean;
  card?: AgentCard;
}

export interface WorkflowCheck {
  valid: boolean;
  unknown: string[];
  unreachable: string[];
  /** Human-readable reason when not valid */
  error?: string;
}

export class AgentNetwork {
  readonly directory = new AgentDirectory();
  readonly processor: QueryProcessor;
  readonly conversations: ConversationOrchestrator;
  private activeRouter: Router;
  private logger: Logger;
  private clientOptions: HttpAgentClientOptions;

  constructor(options: AgentNetworkOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
    this.clientOptions = options.client ?? {};
    this.activeRouter = this.createRouter(options);

    this.directory.onChange((change) => {
      this.activeRouter.rebuild(this.directory.capabilities());
      this.logger.debug(`Router rebuilt after ${change.type} '${change.name}'`);
    });

    this.processor = new QueryProcessor({
      directory: this.directory,
      router: () => this.activeRouter,
      logger: this.logger.child("query"),
    });
    this.conversations = new ConversationOrchestrator({
      directory: this.directory,
      logger: this.logger.child("conversation"),
    });
  }

  get router(): Router {
    return this.activeRouter;
  }

  /** Register an HTTP agent; fetches its card for routing */
  async add(name: string, endpoint: string): Promise<void> {
    await this.addClient(name, new HttpAgentClient(name, endpoint, this.clientOptions));
  }

  /** Register any client (in-process agents, tests). Card is fetched when not given. */
  async addClient(name: string, client: AgentClient, card?: AgentCard): Promise<void> {
    let resolvedCard = card;
    if (!resolvedCard) {
      try {
        resolvedCard = await client.getCard();
      } catch (error) {
        this.logger.error(`Error getting card for ${name}: ${errorMessage(error)}`);
      }
    }
    this.directory.add({ name, client, card: resolvedCard });
    this.logger.info(`Added agent '${name}' at ${client.endpoint}`);
  }

  remove(name: string): boolean {
    const removed = this.directory.remove(name);
    if (removed) this.logger.info(`Removed agent '${name}' from network`);
    return removed;
  }

  async routeQuery(query: string): Promise<RoutingDecision> {
    return this.processor.route(query);
  }

  processQuery(query: string, targetAgent?: string): Promise<string> {
    return this.processor.process(query, targetAgent);
  }

  startConversation(
    initialQuery: string,
    workflow: readonly string[],
    options?: StartOptions,
  ): Promise<Conversation> {
    return this.conversations.startConversation(initialQuery, workflow, options);
  }

  /** All agents with a fresh reachability check */
  async listAgents(): Promise<AgentStatus[]> {
    return Promise.all(
      this.directory.list().map(async (entry) => ({
        name: entry.name,
        endpoint: entry.client.endpoint,
        available: await entry.client.testReachable(),
        card: entry.card,
      })),
    );
  }

  /**
   * Pre-flight for a conversation: every agent known and reachable.
   * This is the caller's job; the orchestrator only rejects unknown names.
   */
  async validateWorkflow(workflow: readonly string[]): Promise<WorkflowCheck> {
    if (workflow.length === 0) {
      return {
        valid: false,
        unknown: [],
        unreachable: [],
        error: "Workflow must contain at least one agent",
      };
    }

    const unknown = workflow.filter((agent) => !this.directory.has(agent));
    if (unknown.length > 0) {
      return {
        valid: false,
        unknown,
        unreachable: [],
        error: `Agent '${unknown[0]}' not found in the network`,
      };
    }

    const checks = await Promise.all(
      [...new Set(workflow)].map(async (agent) => ({
        agent,
        ok: await this.directory.resolve(agent).testReachable(),
      })),
    );
    const unreachable = checks.filter((p) => !p.ok).map((p) => p.agent);
    if (unreachable.length > 0) {
      return {
        valid: false,
        unknown: [],
        unreachable,
        error: `Cannot connect to the following agents: ${unreachable.join(", ")}`,
      };
    }
    return { valid: true, unknown: [], unreachable: [] };
  }

  private createRouter(options: AgentNetworkOptions): Router {
    const agents = this.directory.capabilities();
    if (options.router === "ai") {
      const ai = new AiRouter(agents, {
        classifier: options.classifier,
        random: options.random,
        logger: this.logger.child("router"),
        cacheSize: options.cacheSize,
      });
      if (ai.available) return ai;
      this.logger.warn("AI router initialization failed, falling back to keyword router");
    }
    return new KeywordRouter(agents, { random: options.random, logger: this.logger.child("router") });
  }
}
