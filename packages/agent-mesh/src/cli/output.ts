/**
 * CLI Output Utilities
 *
 * - --json mode: stdout = pure JSON data only, logs and errors to stderr
 * - Colors: only when stdout is a TTY and NO_COLOR is unset
 * - Exit codes: 0 = success, 1 = failure
 */

import pc from "picocolors";
import type { Conversation } from "../network/conversation.ts";
import type { AgentStatus } from "../network/network.ts";

export const isTTY = !!process.stdout.isTTY;
export const useColor = isTTY && !process.env.NO_COLOR;

const paint = (fn: (s: string) => string) => (s: string) => (useColor ? fn(s) : s);

export const c = {
  dim: paint(pc.dim),
  bold: paint(pc.bold),
  red: paint(pc.red),
  green: paint(pc.green),
  yellow: paint(pc.yellow),
  cyan: paint(pc.cyan),
};

export function outputJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/** Error to stderr, exit code 1 */
export function exitError(message: string): never {
  console.error(`${c.red("Error:")} ${message}`);
  process.exit(1);
}

export function formatAgentStatus(status: AgentStatus): string {
  const mark = status.available ? c.green("✓") : c.red("✗");
  const display = status.card ? ` ${c.dim(`(${status.card.name})`)}` : "";
  const state = status.available ? "" : ` ${c.yellow("[unreachable]")}`;
  return `  ${mark} ${status.name.padEnd(12)} ${status.endpoint}${display}${state}`;
}

export function formatTranscript(conversation: Conversation): string {
  const lines = conversation.messages.map((entry) => `${c.cyan(`[${entry.role}]`)} ${entry.content}`);
  lines.push("", c.bold("Result:"), conversation.result ?? "");
  return lines.join("\n");
}
