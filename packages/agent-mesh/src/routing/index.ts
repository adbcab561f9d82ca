export {
  FALLBACK_CONFIDENCE,
  NO_AGENT,
  pickRandom,
  randomDecision,
  seededRandom,
  type RandomSource,
  type Router,
  type RouterType,
  type RoutingDecision,
} from "./types.ts";
export { KeywordRouter, STOP_WORDS, buildKeywordIndex, extractKeywords } from "./keyword.ts";
export {
  AiRouter,
  DecisionCache,
  DEFAULT_CACHE_SIZE,
  buildRoutingContext,
  type AgentRoutingContext,
  type Classification,
  type Classifier,
} from "./ai.ts";
export { classifierFromEnv, createModelClassifier, DEFAULT_ROUTING_MODEL } from "./classifier.ts";
