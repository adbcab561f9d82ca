/**
 * Catalog of the simulated tool servers `agent-mesh mcp` can run.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Logger } from "../logger.ts";
import type { RandomSource } from "../routing/types.ts";
import { createMapsMcpServer, loadMapsData } from "./maps-server.ts";
import { createTravelMcpServer, loadTravelData } from "./travel-server.ts";
import { createWeatherMcpServer, loadWeatherData } from "./weather-server.ts";

export interface ToolServerOptions {
  logger?: Logger;
  random?: RandomSource;
}

export interface ToolServerEntry {
  description: string;
  defaultPort: number;
  /** Loads the data once; the returned factory builds one server per session */
  prepare(options?: ToolServerOptions): () => McpServer;
}

export const TOOL_SERVERS = {
  weather: {
    description: "Current weather, forecasts and alerts",
    defaultPort: 5001,
    prepare(options = {}) {
      const data = loadWeatherData();
      return () => createWeatherMcpServer({ ...options, data });
    },
  },
  maps: {
    description: "Weather and terrain maps, coordinates",
    defaultPort: 5002,
    prepare(options = {}) {
      const data = loadMapsData();
      return () => createMapsMcpServer({ ...options, data });
    },
  },
  travel: {
    description: "Destination guides, activities, advisories and itineraries",
    defaultPort: 5003,
    prepare(options = {}) {
      const data = loadTravelData();
      return () => createTravelMcpServer({ ...options, data });
    },
  },
} satisfies Record<string, ToolServerEntry>;

export type ToolServerName = keyof typeof TOOL_SERVERS;

export const TOOL_SERVER_NAMES = Object.keys(TOOL_SERVERS).filter(isToolServer);

export function isToolServer(name: string): name is ToolServerName {
  return Object.hasOwn(TOOL_SERVERS, name);
}
