/**
 * Travel MCP tool server — destination guides, activity ideas, advisories
 * and day-by-day itineraries for a fixed set of cities.
 *
 * Tools: get_destination_info, suggest_activities, get_travel_advisory,
 * create_trip_itinerary. Resources: travel://destination/{location},
 * travel://advisory/{location}.
 */

import { readFileSync } from "node:fs";
import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { createSilentLogger, type Logger } from "../logger.ts";
import { pickRandom, type RandomSource } from "../routing/types.ts";
import {
  isoDate,
  jsonResult,
  placeKey,
  resourceResult,
  shuffle,
  templateVar,
  titleCase,
  toolCall,
} from "./shared.ts";

const destinationSchema = z.object({
  attractions: z.array(z.string()),
  indoor_activities: z.array(z.string()),
  outdoor_activities: z.array(z.string()),
  cuisines: z.array(z.string()),
  transportation: z.array(z.string()),
  safety: z.string(),
  language: z.string(),
  currency: z.string(),
  timezone: z.string(),
});

const advisorySchema = z.object({
  safety: z.string(),
  health: z.string(),
  entry: z.string(),
  local_laws: z.string(),
});

const travelDataSchema = z.object({
  destinations: z.record(z.string(), destinationSchema),
  advisories: z.record(z.string(), advisorySchema),
});

export type Destination = z.infer<typeof destinationSchema>;
export type TravelData = z.infer<typeof travelDataSchema>;

export function loadTravelData(): TravelData {
  const raw = readFileSync(new URL("./travel-data.json", import.meta.url), "utf-8");
  return travelDataSchema.parse(JSON.parse(raw));
}

const BAD_WEATHER = ["rain", "snow", "storm", "thunder", "cold", "windy", "hurricane", "tornado", "typhoon"];
const MAX_TRIP_DAYS = 7;

export function isBadWeather(condition: string | undefined): boolean {
  if (!condition) return false;
  const lower = condition.toLowerCase();
  return BAD_WEATHER.some((word) => lower.includes(word));
}

export interface ActivitySlot {
  activity: string;
  type: "indoor" | "outdoor" | "attraction" | "dining";
}

export interface ItineraryDay {
  day: number;
  date: string;
  morning: ActivitySlot | null;
  afternoon: ActivitySlot | null;
  evening: ActivitySlot;
  meals: Array<{ meal: string; suggestion: string }>;
  transportation_tip: string;
}

export interface TravelServerOptions {
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
  data?: TravelData;
}

export function createTravelMcpServer(options: TravelServerOptions = {}): McpServer {
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? createSilentLogger();
  const { destinations, advisories } = options.data ?? loadTravelData();

  const destination = (location: string): { key: string; data: Destination } => {
    const key = placeKey(location);
    const data = destinations[key];
    if (!data) {
      logger.warn(`Travel data not available for ${key}`);
      throw new Error(`Travel data not available for ${key}`);
    }
    return { key, data };
  };

  const pick = (items: string[]) => pickRandom(items, random) ?? "";

  const destinationGuide = (location: string) => {
    const { key, data } = destination(location);
    return {
      location: titleCase(key),
      attractions: data.attractions,
      indoor_activities: data.indoor_activities,
      outdoor_activities: data.outdoor_activities,
      cuisines: data.cuisines,
      transportation: data.transportation,
      safety_level: data.safety,
      language: data.language,
      currency: data.currency,
      timezone: data.timezone,
    };
  };

  const advisory = (location: string) => {
    const key = placeKey(location);
    const found = advisories[key];
    if (!found) throw new Error(`Travel advisory not available for ${key}`);
    return {
      location: titleCase(key),
      safety_info: found.safety,
      health_info: found.health,
      entry_requirements: found.entry,
      local_laws: found.local_laws,
    };
  };

  const itinerary = (location: string, requestedDays: number, weather: string | undefined) => {
    const { key, data } = destination(location);
    const days = Math.min(Math.max(1, requestedDays), MAX_TRIP_DAYS);
    const bad = isBadWeather(weather);
    const attractions = shuffle(data.attractions, random);
    const indoor = shuffle(data.indoor_activities, random);
    const outdoor = shuffle(data.outdoor_activities, random);
    const start = now();

    /** First non-empty pool wins */
    const take = (...pools: Array<[string[], ActivitySlot["type"]]>): ActivitySlot | null => {
      for (const [pool, type] of pools) {
        const activity = pool.shift();
        if (activity !== undefined) return { activity, type };
      }
      return null;
    };

    const plan: ItineraryDay[] = [];
    for (let day = 1; day <= days; day++) {
      const even = day % 2 === 0;
      const morning =
        bad || even
          ? take([indoor, "indoor"], [attractions, "attraction"])
          : take([outdoor, "outdoor"], [attractions, "attraction"]);
      const afternoon = bad
        ? take([indoor, "indoor"], [attractions, "attraction"])
        : even && outdoor.length > 0
          ? take([outdoor, "outdoor"])
          : take([indoor, "indoor"], [attractions, "attraction"]);

      plan.push({
        day,
        date: isoDate(start, day - 1),
        morning,
        afternoon,
        evening: { activity: `Dinner - ${pick(data.cuisines)} cuisine`, type: "dining" },
        meals: [
          { meal: "Breakfast", suggestion: "Hotel or local café" },
          { meal: "Lunch", suggestion: `Try ${pick(data.cuisines)} food` },
          { meal: "Dinner", suggestion: `${pick(data.cuisines)} restaurant` },
        ],
        transportation_tip: `Best way to get around: ${pick(data.transportation)}`,
      });
    }

    return {
      location: titleCase(key),
      trip_duration: days,
      weather_consideration: weather || "Not specified",
      itinerary: plan,
      tips: [
        `Language: ${data.language}`,
        `Currency: ${data.currency}`,
        `Timezone: ${data.timezone}`,
        "Carry a map or use map apps for navigation",
        "Check opening hours of attractions before visiting",
      ],
      generated_at: start.toISOString(),
    };
  };

  const server = new McpServer({ name: "travel-tools", version: "1.0.0" });

  server.tool(
    "get_destination_info",
    "Get comprehensive information about a travel destination",
    { location: z.string().describe("City name, e.g. Paris") },
    ({ location }) =>
      toolCall(() => jsonResult({ ...destinationGuide(location), timestamp: now().toISOString() })),
  );

  server.tool(
    "suggest_activities",
    "Get activity suggestions based on weather conditions",
    {
      location: z.string().describe("City name"),
      weather_condition: z.string().describe('Current conditions, e.g. "Sunny" or "Rainy"'),
    },
    ({ location, weather_condition }) =>
      toolCall(() => {
        const { key, data } = destination(location);
        const type = isBadWeather(weather_condition) ? "Indoor" : "Outdoor";
        const activities = shuffle(type === "Indoor" ? data.indoor_activities : data.outdoor_activities, random);
        return jsonResult({
          location: titleCase(key),
          weather_condition,
          recommended_activity_type: type,
          top_activities: activities.slice(0, 3),
          all_options: activities,
          timestamp: now().toISOString(),
        });
      }),
  );

  server.tool(
    "get_travel_advisory",
    "Get travel advisory information for a location",
    { location: z.string().describe("City name") },
    ({ location }) => toolCall(() => jsonResult({ ...advisory(location), updated_at: now().toISOString() })),
  );

  server.tool(
    "create_trip_itinerary",
    "Create a trip itinerary based on destination and duration",
    {
      location: z.string().describe("Destination city"),
      days: z.number().int().optional().describe(`Trip length (1-${MAX_TRIP_DAYS}, default 3)`),
      weather_condition: z.string().optional().describe("Expected weather, if known"),
    },
    ({ location, days, weather_condition }) => {
      logger.debug(`create_trip_itinerary(${location}, ${days ?? 3}, ${weather_condition ?? "-"})`);
      return toolCall(() => jsonResult(itinerary(location, days ?? 3, weather_condition)));
    },
  );

  server.resource(
    "destination",
    new ResourceTemplate("travel://destination/{location}", { list: undefined }),
    { description: "Destination information", mimeType: "application/json" },
    (uri, variables) =>
      resourceResult(uri, JSON.stringify(destinationGuide(templateVar(variables, "location")), null, 2)),
  );

  server.resource(
    "advisory",
    new ResourceTemplate("travel://advisory/{location}", { list: undefined }),
    { description: "Travel advisory for a destination", mimeType: "application/json" },
    (uri, variables) => resourceResult(uri, JSON.stringify(advisory(templateVar(variables, "location")), null, 2)),
  );

  return server;
}
