/**
 * Shared CLI setup: logger, config, and a network built from every known
 * endpoint (registry < config file < --endpoint flags).
 */

import type { Command } from "commander";
import { loadMeshConfig, mergeEndpoints, parseEndpointSpecs, type MeshConfig } from "../config.ts";
import { listRegisteredAgents, pruneStaleAgents } from "../daemon/registry.ts";
import { createLogger, type Logger } from "../logger.ts";
import { AgentNetwork } from "../network/network.ts";
import { classifierFromEnv } from "../routing/classifier.ts";
import type { RouterType } from "../routing/types.ts";
import { exitError } from "./output.ts";

export interface CommonOptions {
  config?: string;
  debug?: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Mesh config file (default: ./agent-mesh.yaml)")
    .option("--debug", "Show debug logs");
}

/** Client commands keep stdout for results: info/debug only with --debug, all to stderr */
export function createClientLogger(debug = false): Logger {
  const toStderr = (line: string) => console.error(line);
  return createLogger({ debug, log: debug ? toStderr : () => {}, logError: toStderr });
}

export function loadConfigOrExit(options: CommonOptions): MeshConfig {
  try {
    return loadMeshConfig({ path: options.config });
  } catch (error) {
    exitError(error instanceof Error ? error.message : String(error));
  }
}

export function parseRouterType(value: string | undefined, fallback: RouterType): RouterType {
  if (value === undefined) return fallback;
  if (value === "keyword" || value === "ai") return value;
  exitError(`Unknown router '${value}'. Use keyword or ai.`);
}

/** Endpoints of running registered agents, after dropping dead ones */
export function registeredEndpoints(): Record<string, string> {
  pruneStaleAgents();
  return Object.fromEntries(listRegisteredAgents().map((record) => [record.name, record.url]));
}

export interface BuildNetworkOptions {
  config: MeshConfig;
  endpointSpecs?: string[];
  router?: RouterType;
  logger: Logger;
}

/** Network with every endpoint added in a stable order */
export async function buildNetwork(options: BuildNetworkOptions): Promise<AgentNetwork> {
  const { config, logger } = options;
  let flags: Record<string, string>;
  try {
    flags = parseEndpointSpecs(options.endpointSpecs);
  } catch (error) {
    exitError(error instanceof Error ? error.message : String(error));
  }
  const endpoints = mergeEndpoints(registeredEndpoints(), config.agents, flags);

  const router = options.router ?? config.router;
  const network = new AgentNetwork({
    router,
    classifier: router === "ai" ? classifierFromEnv(config.model) : undefined,
    logger,
    client: { timeoutMs: config.timeoutMs },
  });

  for (const [name, url] of Object.entries(endpoints)) {
    await network.add(name, url);
  }
  return network;
}
