/**
 * Mesh configuration file (agent-mesh.yaml)
 *
 * ```yaml
 * router: keyword        # keyword | ai
 * model: openai/gpt-4o-mini
 * timeoutMs: 30000
 * tools:                # running tool servers (default: in-process)
 *   weather: http://127.0.0.1:5001/mcp
 *   travel: http://127.0.0.1:5003/mcp
 * agents:
 *   math: http://127.0.0.1:5000
 *   weather: http://127.0.0.1:5002
 * ```
 *
 * Precedence: CLI flags > config file > registry of running agents.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { DEFAULT_SEND_TIMEOUT_MS } from "./agent/client.ts";
import { DEFAULT_ROUTING_MODEL } from "./routing/classifier.ts";

export const CONFIG_FILE = "agent-mesh.yaml";

const meshConfigSchema = z.object({
  agents: z.record(z.string(), z.string().url()).default({}),
  router: z.enum(["keyword", "ai"]).default("keyword"),
  model: z.string().optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_SEND_TIMEOUT_MS),
  tools: z
    .object({
      weather: z.string().url().optional(),
      maps: z.string().url().optional(),
      travel: z.string().url().optional(),
    })
    .strict()
    .default({}),
});

export type MeshConfig = z.infer<typeof meshConfigSchema> & { model: string };

/** Parse and validate config text; errors list every invalid field */
export function parseMeshConfig(
  content: string,
  source: string = CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env,
): MeshConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new Error(
      `Failed to parse YAML in ${source}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const result = meshConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid config file ${source}:\n${messages}`);
  }

  return {
    ...result.data,
    model: result.data.model ?? env.AGENT_MESH_MODEL ?? DEFAULT_ROUTING_MODEL,
  };
}

export interface LoadConfigOptions {
  /** Explicit file; must exist */
  path?: string;
  /** Directory searched for agent-mesh.yaml (default: cwd) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** Load the config file, or defaults when none is present */
export function loadMeshConfig(options: LoadConfigOptions = {}): MeshConfig {
  const env = options.env ?? process.env;
  if (options.path) {
    const file = resolve(options.path);
    if (!existsSync(file)) throw new Error(`Config file not found: ${file}`);
    return parseMeshConfig(readFileSync(file, "utf-8"), file, env);
  }

  const file = resolve(options.cwd ?? process.cwd(), CONFIG_FILE);
  if (!existsSync(file)) return parseMeshConfig("", CONFIG_FILE, env);
  return parseMeshConfig(readFileSync(file, "utf-8"), file, env);
}

// ── Endpoint specs ─────────────────────────────────────────────────

/** "math=http://127.0.0.1:5000" → { name, url } */
export function parseEndpointSpec(spec: string): { name: string; url: string } {
  const eq = spec.indexOf("=");
  const name = eq > 0 ? spec.slice(0, eq).trim() : "";
  const url = eq > 0 ? spec.slice(eq + 1).trim() : "";
  if (!name || !URL.canParse(url)) {
    throw new Error(`Invalid endpoint '${spec}', expected name=url`);
  }
  return { name, url };
}

export function parseEndpointSpecs(specs: readonly string[] = []): Record<string, string> {
  const endpoints: Record<string, string> = {};
  for (const spec of specs) {
    const { name, url } = parseEndpointSpec(spec);
    endpoints[name] = url;
  }
  return endpoints;
}

/** Merge endpoint sources; later sources win */
export function mergeEndpoints(
  ...sources: ReadonlyArray<Record<string, string>>
): Record<string, string> {
  return sources.reduce<Record<string, string>>((merged, source) => ({ ...merged, ...source }), {});
}
