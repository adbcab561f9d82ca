/**
 * Knowledge agent — answers from a small fixed knowledge base.
 */

import { defineAgent, type AgentHandler } from "../agent/handle.ts";
import type { AgentCard } from "../agent/types.ts";

export const KNOWLEDGE_CARD: AgentCard = {
  name: "Knowledge Agent",
  description:
    "Provides factual information and answers to general knowledge questions across various domains",
  version: "1.0.0",
  skills: [
    {
      name: "Facts and Information",
      description: "Answer factual questions about the world",
      tags: ["knowledge", "facts", "information", "questions", "general"],
      examples: ["What is the capital of Japan?", "What is photosynthesis?"],
    },
    {
      name: "Definitions and Concepts",
      description: "Explain terms and concepts",
      tags: ["definition", "meaning", "concept", "explanation", "define"],
      examples: ["What is artificial intelligence?"],
    },
  ],
};

export const KNOWLEDGE_FALLBACK =
  "I don't have specific information on that question in my knowledge base. As a simulated agent, I have access to only a limited set of predefined answers.";

/** Topic (matched as a substring of the lower-cased query) → answer, in lookup order */
const KNOWLEDGE_BASE: ReadonlyArray<readonly [topic: string, answer: string]> = [
  [
    "capital of japan",
    "The capital of Japan is Tokyo, which is also the largest city in Japan with a population of over 13 million people.",
  ],
  [
    "capital of france",
    "The capital of France is Paris, often called the 'City of Light' (La Ville Lumière).",
  ],
  [
    "photosynthesis",
    "Photosynthesis is the process used by plants, algae, and certain bacteria to convert light energy, usually from the sun, into chemical energy in the form of glucose or other sugars. The basic equation is: 6CO₂ + 6H₂O + light energy → C₆H₁₂O₆ + 6O₂.",
  ],
  [
    "artificial intelligence",
    "Artificial Intelligence (AI) refers to systems or machines that mimic human intelligence to perform tasks and can iteratively improve themselves based on the information they collect. Common AI applications include machine learning, natural language processing, computer vision, and robotics.",
  ],
];

export function answerQuestion(query: string): string {
  const lower = query.toLowerCase();
  const hit = KNOWLEDGE_BASE.find(([topic]) => lower.includes(topic));
  return hit ? hit[1] : KNOWLEDGE_FALLBACK;
}

export function createKnowledgeAgent(): AgentHandler {
  return defineAgent(KNOWLEDGE_CARD, answerQuestion);
}
