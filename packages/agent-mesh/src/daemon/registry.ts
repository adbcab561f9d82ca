/**
 * Agent Registry — file-per-agent design.
 *
 * Each running agent server writes agents/{name}.json under the mesh home
 * and removes it on shutdown. Only the owning process writes its file, so
 * no locking is needed. Readers skip malformed files and can prune records
 * whose process is gone.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

/** Mesh home: $AGENT_MESH_HOME, else ~/.agent-mesh */
export function meshHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.AGENT_MESH_HOME || join(homedir(), ".agent-mesh");
}

export function defaultAgentsDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(meshHome(env), "agents");
}

const agentRecordSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  /** Card display name */
  displayName: z.string().optional(),
  pid: z.number().int(),
  startedAt: z.string(),
});

export type AgentRecord = z.infer<typeof agentRecordSchema>;

const SAFE_NAME = /^[A-Za-z0-9._-]+$/;

function recordFile(dir: string, name: string): string {
  if (!SAFE_NAME.test(name)) throw new Error(`Invalid agent name: ${name}`);
  return join(dir, `${name}.json`);
}

export function registerAgent(record: AgentRecord, dir: string = defaultAgentsDir()): void {
  mkdirSync(dir, { recursive: true });
  writeFileSync(recordFile(dir, record.name), JSON.stringify(record, null, 2));
}

/** Returns false when the agent was not registered */
export function unregisterAgent(name: string, dir: string = defaultAgentsDir()): boolean {
  const file = recordFile(dir, name);
  if (!existsSync(file)) return false;
  unlinkSync(file);
  return true;
}

/** All well-formed records, sorted by name */
export function listRegisteredAgents(dir: string = defaultAgentsDir()): AgentRecord[] {
  if (!existsSync(dir)) return [];
  const records: AgentRecord[] = [];
  for (const file of readdirSync(dir)) {
    if (!file.endsWith(".json")) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(join(dir, file), "utf-8"));
    } catch {
      continue; // half-written or foreign file
    }
    const parsed = agentRecordSchema.safeParse(raw);
    if (parsed.success) records.push(parsed.data);
  }
  return records.sort((a, b) => a.name.localeCompare(b.name));
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but owned by someone else
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

/** Remove records whose process no longer exists; returns the removed names */
export function pruneStaleAgents(
  dir: string = defaultAgentsDir(),
  alive: (pid: number) => boolean = isProcessAlive,
): string[] {
  const stale = listRegisteredAgents(dir).filter((record) => !alive(record.pid));
  for (const record of stale) unregisterAgent(record.name, dir);
  return stale.map((record) => record.name);
}
