/**
 * ConversationOrchestrator — hands a message through an ordered list of agents.
 *
 * Each agent's reply becomes the next agent's input. A run ends when the
 * workflow is exhausted (result = last reply) or on the first failing call
 * (result = error text); there is no retry and no skipping ahead.
 *
 * Step transcript: the input entry is attributed to whoever produced it
 * ("user" for step 0, otherwise the previous agent), then the reply entry
 * to the agent that answered.
 */

import { randomUUID } from "node:crypto";
import type { AgentDirectory } from "../agent/directory.ts";
import { createMessage, messageText } from "../agent/types.ts";
import { ConversationError, errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";

// ── Types ──────────────────────────────────────────────────────────

export interface TranscriptEntry {
  /** "user" or an agent name */
  role: string;
  content: string;
}

/** Read-only copy handed to callers; the orchestrator keeps the live record */
export interface Conversation {
  readonly id: string;
  readonly workflow: readonly string[];
  readonly currentStep: number;
  readonly messages: readonly Readonly<TranscriptEntry>[];
  readonly complete: boolean;
  readonly result: string | null;
}

interface ConversationState {
  id: string;
  workflow: readonly string[];
  /** Index into workflow; only increases, never past workflow.length */
  currentStep: number;
  /** Append-only */
  messages: TranscriptEntry[];
  complete: boolean;
  /** Set once, together with complete */
  result: string | null;
}

export interface StartOptions {
  /** Checked between steps; an aborted run completes with a cancellation result */
  signal?: AbortSignal;
}

export function stepError(agent: string, cause: unknown): string {
  return `Error in conversation with agent ${agent}: ${errorMessage(cause)}`;
}

export function cancelledResult(agent: string): string {
  return `Conversation cancelled before agent ${agent}`;
}

// ── Orchestrator ───────────────────────────────────────────────────

export interface ConversationOrchestratorOptions {
  directory: AgentDirectory;
  logger?: Logger;
}

export class ConversationOrchestrator {
  private directory: AgentDirectory;
  private logger: Logger;
  private conversations = new Map<string, ConversationState>();
  private signals = new Map<string, AbortSignal>();

  constructor(options: ConversationOrchestratorOptions) {
    this.directory = options.directory;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Create a conversation and drive it to completion.
   * Rejects with ConversationError (nothing started) on an empty workflow or
   * an agent the directory does not know.
   */
  async startConversation(
    initialQuery: string,
    workflow: readonly string[],
    options: StartOptions = {},
  ): Promise<Conversation> {
    if (workflow.length === 0) {
      throw new ConversationError("Workflow must contain at least one agent");
    }
    for (const agent of workflow) {
      if (!this.directory.has(agent)) {
        throw new ConversationError(`Agent '${agent}' not found in network`);
      }
    }

    const conversation: ConversationState = {
      id: randomUUID(),
      workflow: Object.freeze([...workflow]),
      currentStep: 0,
      messages: [],
      complete: false,
      result: null,
    };
    this.conversations.set(conversation.id, conversation);
    if (options.signal) this.signals.set(conversation.id, options.signal);

    try {
      await this.processNextStep(conversation.id, initialQuery);
    } finally {
      this.signals.delete(conversation.id);
    }
    return freeze(conversation);
  }

  /**
   * Run the conversation forward from its current step with `input`.
   * No-op (logged) for unknown ids and already complete conversations.
   */
  async processNextStep(conversationId: string, input: string): Promise<void> {
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      this.logger.error(`Conversation ${conversationId} not found`);
      return;
    }
    if (conversation.complete) {
      this.logger.warn(`Conversation ${conversationId} is already complete`);
      return;
    }

    let currentInput = input;
    while (!conversation.complete) {
      const step = conversation.currentStep;
      if (step >= conversation.workflow.length) {
        this.finish(conversation, currentInput);
        this.logger.info(`Conversation ${conversationId} completed`);
        return;
      }

      const agent = conversation.workflow[step] ?? "";
      if (this.signals.get(conversationId)?.aborted) {
        this.finish(conversation, cancelledResult(agent));
        this.logger.warn(`Conversation ${conversationId} cancelled before ${agent}`);
        return;
      }

      conversation.messages.push({
        role: step === 0 ? "user" : (conversation.workflow[step - 1] ?? "user"),
        content: currentInput,
      });

      try {
        this.logger.info(`Sending message to ${agent} in conversation ${conversationId}`);
        const message = createMessage(currentInput, { role: "user", conversationId });
        const response = await this.directory.resolve(agent).send(message);
        const text = messageText(response);
        conversation.messages.push({ role: agent, content: text });
        conversation.currentStep = step + 1;
        currentInput = text;
      } catch (error) {
        this.logger.error(
          `Error in conversation ${conversationId} with agent ${agent}: ${errorMessage(error)}`,
        );
        this.finish(conversation, stepError(agent, error));
        return;
      }
    }
  }

  /** Final result, or null while running / for unknown ids */
  getResult(conversationId: string): string | null {
    const conversation = this.conversations.get(conversationId);
    if (!conversation?.complete) return null;
    return conversation.result;
  }

  /** Transcript copy; empty for unknown ids */
  getHistory(conversationId: string): TranscriptEntry[] {
    return this.conversations.get(conversationId)?.messages.map((m) => ({ ...m })) ?? [];
  }

  /** Frozen copy of the conversation's current state */
  snapshot(conversationId: string): Conversation | undefined {
    const conversation = this.conversations.get(conversationId);
    return conversation ? freeze(conversation) : undefined;
  }

  private finish(conversation: ConversationState, result: string): void {
    conversation.complete = true;
    conversation.result = result;
  }
}

function freeze(state: ConversationState): Conversation {
  return Object.freeze({
    id: state.id,
    workflow: Object.freeze([...state.workflow]),
    currentStep: state.currentStep,
    messages: Object.freeze(state.messages.map((m) => Object.freeze({ ...m }))),
    complete: state.complete,
    result: state.result,
  });
}
