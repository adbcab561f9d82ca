/**
 * Error types for agent dispatch and conversations.
 *
 * Failures are turned into text at the processor and orchestrator
 * boundary; no caller retries.
 */

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ── Error classes ──────────────────────────────────────────────────

/** Directory lookup for a name that was never registered (or was removed) */
export class UnknownAgentError extends Error {
  constructor(readonly agent: string) {
    super(`Agent '${agent}' not found in network`);
    this.name = "UnknownAgentError";
  }
}

/** An agent call failed: unreachable, timed out, non-2xx or malformed reply */
export class AgentTransportError extends Error {
  constructor(
    readonly agent: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "AgentTransportError";
  }
}

/** A conversation could not be started (empty or unknown workflow) */
export class ConversationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConversationError";
  }
}
