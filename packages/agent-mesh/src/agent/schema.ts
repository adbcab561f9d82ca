/**
 * Wire schemas for the agent HTTP surface (zod).
 */

import { z } from "zod";
import { toResponseContent, type AgentCard, type AgentMessage } from "./types.ts";

export const agentSkillSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
  examples: z.array(z.string()).optional(),
});

export const agentCardSchema = z.object({
  name: z.string(),
  description: z.string().default(""),
  version: z.string().optional(),
  skills: z.array(agentSkillSchema).default([]),
});

/**
 * Message as it travels over HTTP. `content` is loose on purpose:
 * toResponseContent() normalizes it into the tagged union.
 */
export const wireMessageSchema = z.object({
  id: z.string().optional(),
  role: z.enum(["user", "agent", "system"]).default("agent"),
  content: z.unknown().optional(),
  parentId: z.string().optional(),
  conversationId: z.string().optional(),
});

export type WireMessage = z.infer<typeof wireMessageSchema>;

export function parseAgentCard(raw: unknown): AgentCard {
  return agentCardSchema.parse(raw);
}

/** Decode a wire message; a missing id is filled with the fallback */
export function decodeMessage(wire: WireMessage, fallbackId: string): AgentMessage {
  return {
    id: wire.id ?? fallbackId,
    role: wire.role,
    content: toResponseContent(wire.content),
    parentId: wire.parentId,
    conversationId: wire.conversationId,
  };
}
