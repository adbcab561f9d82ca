/**
 * Core message and capability types shared by agents, routers and the network.
 */

import { randomUUID } from "node:crypto";

// ── Messages ───────────────────────────────────────────────────────

export type MessageRole = "user" | "agent" | "system";

/**
 * Message payload. Agents may answer with text, an error, or anything else
 * (serialized to a string); readers go through extractText() instead of
 * probing shapes.
 */
export type ResponseContent =
  | { readonly type: "text"; readonly text: string }
  | { readonly type: "error"; readonly message: string }
  | { readonly type: "other"; readonly value: string };

export interface AgentMessage {
  readonly id: string;
  readonly role: MessageRole;
  /** Absent when an agent answered without recognizable content */
  readonly content?: ResponseContent;
  readonly parentId?: string;
  readonly conversationId?: string;
}

export function textContent(text: string): ResponseContent {
  return { type: "text", text };
}

export function errorContent(message: string): ResponseContent {
  return { type: "error", message };
}

export function extractText(content: ResponseContent): string {
  switch (content.type) {
    case "text":
      return content.text;
    case "error":
      return content.message;
    case "other":
      return content.value;
  }
}

/**
 * Normalize an arbitrary payload into ResponseContent.
 * Returns undefined for null/undefined (no recognizable content).
 */
export function toResponseContent(raw: unknown): ResponseContent | undefined {
  if (raw === null || raw === undefined) return undefined;
  if (typeof raw === "string") return textContent(raw);
  if (typeof raw === "object") {
    if ("text" in raw && typeof raw.text === "string") return textContent(raw.text);
    if ("type" in raw && raw.type === "error" && "message" in raw && typeof raw.message === "string") {
      return errorContent(raw.message);
    }
    if ("type" in raw && raw.type === "other" && "value" in raw && typeof raw.value === "string") {
      return { type: "other", value: raw.value };
    }
  }
  return { type: "other", value: typeof raw === "object" ? JSON.stringify(raw) : String(raw) };
}

export interface CreateMessageOptions {
  role?: MessageRole;
  parentId?: string;
  conversationId?: string;
}

/** Create a text message with a fresh id */
export function createMessage(text: string, options: CreateMessageOptions = {}): AgentMessage {
  return {
    id: randomUUID(),
    role: options.role ?? "user",
    content: textContent(text),
    parentId: options.parentId,
    conversationId: options.conversationId,
  };
}

/** Build an agent reply that references the request */
export function createReply(request: AgentMessage, content: ResponseContent): AgentMessage {
  return {
    id: randomUUID(),
    role: "agent",
    content,
    parentId: request.id,
    conversationId: request.conversationId,
  };
}

/** Text of a message, or "" when it has no content */
export function messageText(message: AgentMessage): string {
  return message.content ? extractText(message.content) : "";
}

// ── Capabilities ───────────────────────────────────────────────────

export interface AgentSkill {
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
}

/** Agent card — display name, description and declared skills */
export interface AgentCard {
  name: string;
  description: string;
  version?: string;
  skills: AgentSkill[];
}

/**
 * Routing metadata for one registered agent.
 * `card` is undefined when the agent's card could not be fetched.
 */
export interface AgentCapabilities {
  /** Canonical directory key */
  agent: string;
  card?: AgentCard;
}
