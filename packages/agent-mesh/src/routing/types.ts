/**
 * Router contract shared by the keyword and AI strategies.
 */

import type { AgentCapabilities } from "../agent/types.ts";

export interface RoutingDecision {
  /** null means no agent is available */
  agent: string | null;
  /** In [0, 1] */
  confidence: number;
}

export type RouterType = "keyword" | "ai";

export interface Router {
  readonly type: RouterType;
  route(query: string): RoutingDecision | Promise<RoutingDecision>;
  /** Replace the router's view of the agent set (called on every add/remove) */
  rebuild(agents: AgentCapabilities[]): void;
}

/** Confidence attached to a guessed (random or default) agent */
export const FALLBACK_CONFIDENCE = 0.1;

export const NO_AGENT: RoutingDecision = Object.freeze({ agent: null, confidence: 0 });

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/** Uniform pick from a non-empty list */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

/**
 * Deterministic random source (mulberry32) for reproducible fallbacks.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Random agent with fallback confidence, or NO_AGENT for an empty set */
export function randomDecision(agents: readonly string[], random: RandomSource): RoutingDecision {
  const agent = pickRandom(agents, random);
  return agent === undefined ? NO_AGENT : { agent, confidence: FALLBACK_CONFIDENCE };
}
