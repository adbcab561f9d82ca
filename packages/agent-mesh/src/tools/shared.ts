/**
 * Result shapes and helpers shared by the simulated tool servers.
 */

import type { Variables } from "@modelcontextprotocol/sdk/shared/uriTemplate.js";
import { errorMessage } from "../errors.ts";
import type { RandomSource } from "../routing/types.ts";

export type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean };

export type ResourceResult = { contents: Array<{ uri: string; mimeType: string; text: string }> };

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

export function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(message: string): ToolResult {
  return { content: [{ type: "text", text: message }], isError: true };
}

/** Tool body that throws on bad input; the error text becomes an error result */
export async function toolCall(build: () => ToolResult | Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await build();
  } catch (error) {
    return errorResult(errorMessage(error));
  }
}

export function resourceResult(uri: URL, text: string, mimeType = "application/json"): ResourceResult {
  return { contents: [{ uri: uri.href, mimeType, text }] };
}

/** One template variable, percent-decoded */
export function templateVar(variables: Variables, name: string): string {
  const value = variables[name];
  const raw = Array.isArray(value) ? (value[0] ?? "") : (value ?? "");
  return decodeURIComponent(raw);
}

export const titleCase = (s: string) => s.replace(/\b\w/g, (ch) => ch.toUpperCase());

/** Lower-cased, trimmed lookup key for a place name */
export const placeKey = (location: string) => location.toLowerCase().trim();

/** Fisher–Yates over a copy; a source that always returns ~1 keeps the order */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.min(Math.floor(random() * (i + 1)), i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** YYYY-MM-DD of `start` plus `offset` days (UTC) */
export function isoDate(start: Date, offset = 0): string {
  return new Date(start.getTime() + offset * DAY_MS).toISOString().slice(0, 10);
}
