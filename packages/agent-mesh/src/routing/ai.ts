/**
 * AI router — delegates the choice to an external classifier.
 *
 * Fallbacks (callers can swap this for the keyword router freely):
 * - no classifier, or the classifier throws → random agent, confidence 0.1
 * - classifier names an unknown agent → FIRST registered agent, 0.1
 * - no agents → { agent: null, confidence: 0 }
 *
 * Decisions are cached per raw query string, fallbacks included. The cache
 * is an LRU (default 1000 entries) and is dropped on every rebuild.
 */

import type { AgentCapabilities } from "../agent/types.ts";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import {
  FALLBACK_CONFIDENCE,
  NO_AGENT,
  randomDecision,
  type RandomSource,
  type Router,
  type RoutingDecision,
} from "./types.ts";

// ── Classifier contract ────────────────────────────────────────────

/** Per-agent context handed to the classifier */
export interface AgentRoutingContext {
  agent_name: string;
  description: string;
  skills: Array<{ name: string; description: string; tags: string[] }>;
}

export interface Classification {
  agentName: string;
  confidence: number;
}

export interface Classifier {
  classify(query: string, agents: AgentRoutingContext[]): Promise<Classification>;
}

export function buildRoutingContext(agents: AgentCapabilities[]): AgentRoutingContext[] {
  return agents.map(({ agent, card }) => ({
    agent_name: agent,
    description: card?.description ?? "",
    skills: (card?.skills ?? []).map((skill) => ({
      name: skill.name,
      description: skill.description,
      tags: skill.tags,
    })),
  }));
}

// ── LRU cache ──────────────────────────────────────────────────────

export class DecisionCache {
  private entries = new Map<string, RoutingDecision>();

  constructor(private readonly maxEntries: number) {}

  get(query: string): RoutingDecision | undefined {
    const hit = this.entries.get(query);
    if (hit !== undefined) {
      // Refresh recency
      this.entries.delete(query);
      this.entries.set(query, hit);
    }
    return hit;
  }

  set(query: string, decision: RoutingDecision): void {
    this.entries.delete(query);
    this.entries.set(query, decision);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// ── Router ─────────────────────────────────────────────────────────

export const DEFAULT_CACHE_SIZE = 1000;

export interface AiRouterOptions {
  /** Undefined means the classification service is unavailable */
  classifier?: Classifier;
  random?: RandomSource;
  logger?: Logger;
  cacheSize?: number;
}

export interface RouteOptions {
  /** Skip the cache lookup (the result is still stored) */
  useCache?: boolean;
}

export class AiRouter implements Router {
  readonly type = "ai" as const;
  private classifier?: Classifier;
  private random: RandomSource;
  private logger: Logger;
  private cache: DecisionCache;
  private agents: readonly string[] = [];
  private context: readonly AgentRoutingContext[] = [];
  /** Bumped on rebuild so in-flight decisions for an old agent set are not cached */
  private generation = 0;

  constructor(agents: AgentCapabilities[] = [], options: AiRouterOptions = {}) {
    this.classifier = options.classifier;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createSilentLogger();
    this.cache = new DecisionCache(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    if (!this.classifier) {
      this.logger.warn("AI classification not available; routing will fall back to random selection");
    }
    this.rebuild(agents);
  }

  /** Whether a classifier is configured */
  get available(): boolean {
    return this.classifier !== undefined;
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  rebuild(agents: AgentCapabilities[]): void {
    const context = buildRoutingContext(agents);
    this.agents = agents.map((a) => a.agent);
    this.context = context;
    this.generation++;
    this.cache.clear();
  }

  async route(query: string, options: RouteOptions = {}): Promise<RoutingDecision> {
    const { useCache = true } = options;
    if (useCache) {
      const cached = this.cache.get(query);
      if (cached) return cached;
    }

    const agents = this.agents;
    if (agents.length === 0) return NO_AGENT;

    const generation = this.generation;
    const decision = await this.decide(query, agents);
    if (generation === this.generation) this.cache.set(query, decision);
    return decision;
  }

  private async decide(query: string, agents: readonly string[]): Promise<RoutingDecision> {
    if (!this.classifier) {
      this.logger.warn("AI routing not available, falling back to random selection");
      return randomDecision(agents, this.random);
    }

    let result: Classification;
    try {
      result = await this.classifier.classify(query, [...this.context]);
    } catch (error) {
      this.logger.error(`AI routing failed: ${errorMessage(error)}`);
      return randomDecision(agents, this.random);
    }

    if (!agents.includes(result.agentName)) {
      this.logger.warn(`AI router suggested non-existent agent: ${result.agentName}`);
      const first = agents[0];
      return first === undefined ? NO_AGENT : { agent: first, confidence: FALLBACK_CONFIDENCE };
    }

    const confidence = Number.isFinite(result.confidence)
      ? Math.min(Math.max(result.confidence, 0), 1)
      : 0;
    this.logger.debug(`"${query}" → ${result.agentName} (${confidence.toFixed(2)})`);
    return { agent: result.agentName, confidence };
  }
}
