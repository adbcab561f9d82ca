/**
 * AgentDirectory — the set of agents the network can dispatch to.
 *
 * Explicit service object (no process-wide registry): created by the
 * network at startup, mutated only through add/remove, and observed by
 * routers through onChange so their indexes never go stale.
 */

import { UnknownAgentError } from "../errors.ts";
import type { AgentClient } from "./client.ts";
import type { AgentCapabilities, AgentCard } from "./types.ts";

export interface DirectoryEntry {
  name: string;
  client: AgentClient;
  /** Undefined when the card could not be fetched; contributes no keywords */
  card?: AgentCard;
}

export type DirectoryChange =
  | { type: "added"; name: string }
  | { type: "removed"; name: string };

export type DirectoryListener = (change: DirectoryChange) => void;

export class AgentDirectory {
  private entries = new Map<string, DirectoryEntry>();
  private listeners = new Set<DirectoryListener>();

  /** Add or replace an agent. Listeners run after the entry is visible. */
  add(entry: DirectoryEntry): void {
    this.entries.set(entry.name, entry);
    this.emit({ type: "added", name: entry.name });
  }

  /** Remove an agent; returns false when it was not registered */
  remove(name: string): boolean {
    if (!this.entries.delete(name)) return false;
    this.emit({ type: "removed", name });
    return true;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Client for `name`. Throws UnknownAgentError. */
  resolve(name: string): AgentClient {
    const entry = this.entries.get(name);
    if (!entry) throw new UnknownAgentError(name);
    return entry.client;
  }

  get(name: string): DirectoryEntry | undefined {
    return this.entries.get(name);
  }

  /** Agent names in registration order */
  names(): string[] {
    return [...this.entries.keys()];
  }

  list(): DirectoryEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /** Routing metadata for every agent, in registration order */
  capabilities(): AgentCapabilities[] {
    return this.list().map((entry) => ({ agent: entry.name, card: entry.card }));
  }

  /** Subscribe to add/remove. Returns an unsubscribe function. */
  onChange(listener: DirectoryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(change: DirectoryChange): void {
    for (const listener of this.listeners) listener(change);
  }
}
