/**
 * LLM-backed classifier for the AI router (AI SDK generateObject).
 */

import { gateway, generateObject, type LanguageModel } from "ai";
import { z } from "zod";
import type { AgentRoutingContext, Classification, Classifier } from "./ai.ts";

export const DEFAULT_ROUTING_MODEL = "openai/gpt-4o-mini";

const classificationSchema = z.object({
  agent_name: z.string().describe("Name of the agent that should handle the query"),
  confidence: z.number().min(0).max(1).describe("Confidence in the choice, 0 to 1"),
});

const SYSTEM_PROMPT = `You route user queries to the single most appropriate agent.
You are given a JSON object describing the available agents, keyed by agent name.
Answer with the agent_name exactly as it appears in that object.`;

export interface ModelClassifierOptions {
  /** Model instance, or a gateway model id like "openai/gpt-4o-mini" */
  model?: LanguageModel | string;
}

export function createModelClassifier(options: ModelClassifierOptions = {}): Classifier {
  const modelOption = options.model ?? DEFAULT_ROUTING_MODEL;
  const model = typeof modelOption === "string" ? gateway(modelOption) : modelOption;

  return {
    async classify(query: string, agents: AgentRoutingContext[]): Promise<Classification> {
      const agentInfo = Object.fromEntries(agents.map((a) => [a.agent_name, a]));
      const { object } = await generateObject({
        model,
        schema: classificationSchema,
        system: SYSTEM_PROMPT,
        prompt: `Agents:\n${JSON.stringify(agentInfo)}\n\nQuery: ${query}`,
      });
      return { agentName: object.agent_name, confidence: object.confidence };
    },
  };
}

/**
 * Classifier when the gateway can be used (an API key is configured),
 * otherwise undefined: the AI router then reports itself unavailable.
 */
export function classifierFromEnv(
  model: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Classifier | undefined {
  if (!env.AI_GATEWAY_API_KEY && !env.VERCEL_OIDC_TOKEN) return undefined;
  return createModelClassifier({ model: model ?? env.AGENT_MESH_MODEL ?? DEFAULT_ROUTING_MODEL });
}
