/**
 * Built-in agent catalog.
 */

import { createConnections, withLogging, type AgentHandler } from "../agent/handle.ts";
import type { AgentClient } from "../agent/client.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { RandomSource } from "../routing/types.ts";
import { TOOL_SERVERS, type ToolServerName } from "../tools/index.ts";
import { connectHttp, connectInProcess, type ToolConnection } from "../tools/mcp-client.ts";
import { createKnowledgeAgent } from "./knowledge.ts";
import { createMathAgent } from "./math.ts";
import { createTravelAgent } from "./travel.ts";
import { createWeatherAgent } from "./weather.ts";

export const BUILTIN_AGENTS = ["math", "knowledge", "weather", "travel"] as const;
export type BuiltinAgentName = (typeof BUILTIN_AGENTS)[number];

export function isBuiltinAgent(name: string): name is BuiltinAgentName {
  return BUILTIN_AGENTS.some((agent) => agent === name);
}

export interface BuiltinAgentOptions {
  logger?: Logger;
  /** Agents this one may call (travel → weather) */
  connections?: Record<string, AgentClient>;
  /** Weather tools; defaults to toolUrls.weather, else an in-process server */
  weatherTools?: ToolConnection;
  /** Travel tools; defaults to toolUrls.travel, else an in-process server */
  travelTools?: ToolConnection;
  /** Streamable HTTP endpoints of running tool servers */
  toolUrls?: Partial<Record<ToolServerName, string>>;
  /** Random source for in-process tool servers */
  random?: RandomSource;
}

/** Connect to a running tool server when a URL is given, else start one in-process */
async function connectTools(
  server: ToolServerName,
  clientName: string,
  options: BuiltinAgentOptions,
  logger: Logger,
): Promise<ToolConnection> {
  const url = options.toolUrls?.[server];
  if (url) return connectHttp(url, clientName);
  const create = TOOL_SERVERS[server].prepare({ random: options.random, logger: logger.child("mcp") });
  return connectInProcess(create(), clientName);
}

export async function createBuiltinAgent(
  name: BuiltinAgentName,
  options: BuiltinAgentOptions = {},
): Promise<AgentHandler> {
  const logger = options.logger ?? createSilentLogger();
  let handler: AgentHandler;

  switch (name) {
    case "math":
      handler = createMathAgent();
      break;
    case "knowledge":
      handler = createKnowledgeAgent();
      break;
    case "weather": {
      const tools = options.weatherTools ?? (await connectTools("weather", "weather-agent", options, logger));
      handler = createWeatherAgent({ tools, logger });
      break;
    }
    case "travel": {
      const tools = options.travelTools ?? (await connectTools("travel", "travel-agent", options, logger));
      handler = createTravelAgent({
        tools,
        connections: createConnections(options.connections ?? {}),
        logger,
      });
      break;
    }
  }

  return withLogging(handler, logger);
}

export { createKnowledgeAgent } from "./knowledge.ts";
export { createMathAgent } from "./math.ts";
export { createTravelAgent } from "./travel.ts";
export { createWeatherAgent } from "./weather.ts";
