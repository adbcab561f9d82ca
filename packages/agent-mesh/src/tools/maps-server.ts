/**
 * Maps MCP tool server — text maps and coordinates for known cities.
 *
 * Tools: generate_weather_map, generate_terrain_map, get_location_info.
 * Resources: maps://weather/{location}, maps://terrain/{location}.
 */

import { readFileSync } from "node:fs";
import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { createSilentLogger, type Logger } from "../logger.ts";
import { pickRandom, type RandomSource } from "../routing/types.ts";
import { jsonResult, placeKey, resourceResult, templateVar, textResult, titleCase, toolCall } from "./shared.ts";

const placeSchema = z.object({ lat: z.number(), lon: z.number(), country: z.string() });

export type Place = z.infer<typeof placeSchema>;

export function loadMapsData(): Record<string, Place> {
  const raw = readFileSync(new URL("./maps-data.json", import.meta.url), "utf-8");
  return z.record(z.string(), placeSchema).parse(JSON.parse(raw));
}

export type MapKind = "weather" | "terrain";

const MAP_WIDTH = 40;
const MAP_HEIGHT = 20;
const FEATURE_COUNT = 10;
const SYMBOLS: Record<MapKind, string[]> = {
  weather: ["☁", "☀", "☂", "☔"],
  // mountains, water, forest, town
  terrain: ["^", "~", "*", "#"],
};

/**
 * Bordered grid with the city marked X at the centre, its name two rows
 * below, and a few scattered symbols for the map kind.
 */
export function drawMap(location: string, place: Place, kind: MapKind, random: RandomSource): string {
  const grid = Array.from({ length: MAP_HEIGHT }, (_, y) =>
    Array.from({ length: MAP_WIDTH }, (_, x): string => {
      if (y === 0 || y === MAP_HEIGHT - 1) return "-";
      if (x === 0 || x === MAP_WIDTH - 1) return "|";
      return " ";
    }),
  );
  const set = (x: number, y: number, ch: string) => {
    const row = grid[y];
    if (row && row[x] !== undefined) row[x] = ch;
  };

  const cx = Math.floor(MAP_WIDTH / 2);
  const cy = Math.floor(MAP_HEIGHT / 2);
  set(cx, cy, "X");

  const label = location.toUpperCase();
  const start = Math.max(cx - Math.floor(label.length / 2), 1);
  for (let i = 0; i < label.length && start + i < MAP_WIDTH - 1; i++) {
    set(start + i, cy + 2, label.charAt(i));
  }

  for (let i = 0; i < FEATURE_COUNT; i++) {
    const x = 1 + Math.floor(random() * (MAP_WIDTH - 2));
    const y = 1 + Math.floor(random() * (MAP_HEIGHT - 2));
    if (grid[y]?.[x] === " ") set(x, y, pickRandom(SYMBOLS[kind], random) ?? " ");
  }

  const title = titleCase(location);
  const heading = `${titleCase(kind)} Map`;
  return [
    `--- ${title} ${heading} ---`,
    ...grid.map((row) => row.join("")),
    `--- Coordinates: ${place.lat}, ${place.lon} ---`,
  ].join("\n");
}

export interface MapsServerOptions {
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
  data?: Record<string, Place>;
}

export function createMapsMcpServer(options: MapsServerOptions = {}): McpServer {
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? createSilentLogger();
  const places = options.data ?? loadMapsData();

  const find = (location: string, what: string): { key: string; place: Place } => {
    const key = placeKey(location);
    const place = places[key];
    if (!place) {
      logger.warn(`${what} not available for ${key}`);
      throw new Error(`${what} not available for ${key}`);
    }
    return { key, place };
  };

  const renderMap = (location: string, kind: MapKind): string => {
    const { key, place } = find(location, "Map data");
    logger.debug(`Drawing ${kind} map for ${key}`);
    return [
      drawMap(key, place, kind, random),
      "",
      `${titleCase(kind)} Map for ${titleCase(key)}`,
      `Generated at: ${now().toISOString()}`,
      `Coordinates: ${place.lat}, ${place.lon}`,
    ].join("\n");
  };

  const server = new McpServer({ name: "maps-tools", version: "1.0.0" });

  server.tool(
    "generate_weather_map",
    "Generate a weather map for a location",
    { location: z.string().describe("City name") },
    ({ location }) => toolCall(() => textResult(renderMap(location, "weather"))),
  );

  server.tool(
    "generate_terrain_map",
    "Generate a terrain map for a location",
    { location: z.string().describe("City name") },
    ({ location }) => toolCall(() => textResult(renderMap(location, "terrain"))),
  );

  server.tool(
    "get_location_info",
    "Get coordinates and country for a location",
    { location: z.string().describe("City name") },
    ({ location }) =>
      toolCall(() => {
        const { key, place } = find(location, "Location data");
        return jsonResult({
          name: titleCase(key),
          coordinates: { latitude: place.lat, longitude: place.lon },
          country: place.country,
          timezone: "UTC",
          timestamp: now().toISOString(),
        });
      }),
  );

  for (const kind of ["weather", "terrain"] as const) {
    server.resource(
      `${kind}-map`,
      new ResourceTemplate(`maps://${kind}/{location}`, { list: undefined }),
      { description: `${titleCase(kind)} map for a location`, mimeType: "text/plain" },
      (uri, variables) => resourceResult(uri, renderMap(templateVar(variables, "location"), kind), "text/plain"),
    );
  }

  return server;
}
