/**
 * Keyword router — scores a query by keyword overlap with agent cards.
 *
 * Keywords per agent with a card: its directory key, display-name tokens,
 * description tokens (minus stop words and short words), skill tags and
 * skill-name tokens. Each keyword found as a substring of the query adds one point to
 * every agent it maps to. Confidence is score / 10, capped at 1.
 */

import type { AgentCapabilities } from "../agent/types.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import {
  NO_AGENT,
  randomDecision,
  type RandomSource,
  type Router,
  type RoutingDecision,
} from "./types.ts";

export const STOP_WORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "the",
  "and",
  "or",
  "but",
  "in",
  "on",
  "at",
  "to",
  "for",
  "with",
  "about",
]);

/** Description words must be longer than this */
const MIN_DESCRIPTION_WORD = 3;

/** Fixed normalization: ten matching keywords mean full confidence */
const SCORE_SCALE = 10;

export interface KeywordRouterOptions {
  random?: RandomSource;
  logger?: Logger;
}

function tokens(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

/** Deduplicated keyword list for one agent */
export function extractKeywords({ agent, card }: AgentCapabilities): string[] {
  // No card, no keywords: the agent is only reachable by the random fallback
  if (!card) return [];
  const keywords = new Set<string>([agent.toLowerCase()]);

  for (const word of tokens(card.name)) keywords.add(word);

  for (const word of tokens(card.description)) {
    if (!STOP_WORDS.has(word) && word.length > MIN_DESCRIPTION_WORD) keywords.add(word);
  }

  for (const skill of card.skills) {
    for (const tag of skill.tags) keywords.add(tag.toLowerCase());
    for (const word of tokens(skill.name)) keywords.add(word);
  }

  return [...keywords];
}

/** keyword → agent names, agents in registration order */
export function buildKeywordIndex(agents: AgentCapabilities[]): Map<string, string[]> {
  const index = new Map<string, string[]>();
  for (const capabilities of agents) {
    for (const keyword of extractKeywords(capabilities)) {
      const mapped = index.get(keyword);
      if (mapped) mapped.push(capabilities.agent);
      else index.set(keyword, [capabilities.agent]);
    }
  }
  return index;
}

export class KeywordRouter implements Router {
  readonly type = "keyword" as const;
  private index: ReadonlyMap<string, readonly string[]> = new Map();
  private agents: readonly string[] = [];
  private random: RandomSource;
  private logger: Logger;

  constructor(agents: AgentCapabilities[] = [], options: KeywordRouterOptions = {}) {
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? createSilentLogger();
    this.rebuild(agents);
  }

  /** Build the new index off to the side, then swap both references */
  rebuild(agents: AgentCapabilities[]): void {
    const index = buildKeywordIndex(agents);
    const names = agents.map((a) => a.agent);
    this.index = index;
    this.agents = names;
    this.logger.debug(`Indexed ${index.size} keyword(s) for ${names.length} agent(s)`);
  }

  keywordsFor(agent: string): string[] {
    const result: string[] = [];
    for (const [keyword, agents] of this.index) {
      if (agents.includes(agent)) result.push(keyword);
    }
    return result;
  }

  route(query: string): RoutingDecision {
    const index = this.index;
    const agents = this.agents;
    if (agents.length === 0) return NO_AGENT;

    const lower = query.toLowerCase();
    const scores = new Map<string, number>();
    for (const [keyword, mapped] of index) {
      if (!lower.includes(keyword)) continue;
      for (const agent of mapped) scores.set(agent, (scores.get(agent) ?? 0) + 1);
    }

    let best: string | undefined;
    let bestScore = 0;
    for (const [agent, score] of scores) {
      if (score > bestScore) {
        best = agent;
        bestScore = score;
      }
    }

    if (best !== undefined) {
      const confidence = Math.min(bestScore / SCORE_SCALE, 1);
      this.logger.debug(`"${query}" → ${best} (score ${bestScore})`);
      return { agent: best, confidence };
    }

    this.logger.debug(`No keyword matched "${query}", picking at random`);
    return randomDecision(agents, this.random);
  }
}
