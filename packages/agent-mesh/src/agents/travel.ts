/**
 * Travel agent — trip plans, activity ideas, advisories and destination
 * guides from the travel tools, shaped by answers from the connected
 * "weather" agent.
 *
 * A missing or failing weather agent degrades the answer (placeholder
 * weather text); a failing travel tool turns into a fixed error line.
 */

import { z } from "zod";
import type { AgentConnections, AgentHandler } from "../agent/handle.ts";
import { createReply, messageText, textContent, type AgentCard } from "../agent/types.ts";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { ToolConnection } from "../tools/mcp-client.ts";
import { titleCase } from "../tools/shared.ts";

export const TRAVEL_CARD: AgentCard = {
  name: "Travel Agent",
  description: "Provides travel planning with weather information integration",
  version: "1.0.0",
  skills: [
    {
      name: "Trip Planning",
      description: "Plan a trip considering weather conditions",
      tags: ["travel", "planning", "itinerary", "vacation", "trip"],
      examples: ["Plan a 3-day trip to London considering weather"],
    },
    {
      name: "Weather-Based Activities",
      description: "Suggest activities based on weather forecast",
      tags: ["activities", "weather", "recommendations", "outdoor", "indoor"],
      examples: ["What should I do in Paris tomorrow if it rains?"],
    },
    {
      name: "Travel Advisory",
      description: "Get travel advisories including weather alerts",
      tags: ["advisory", "warnings", "safety", "alerts"],
      examples: ["Is it safe to travel to London next week?"],
    },
  ],
};

/** Connection name the travel agent asks for weather */
export const WEATHER_CONNECTION = "weather";

const DESTINATIONS = ["london", "paris", "new york", "tokyo", "sydney"];
const PLAN_WORDS = ["plan", "trip", "visit", "itinerary"];
const ACTIVITY_WORDS = ["activity", "activities", "do", "recommend"];
const ADVISORY_WORDS = ["advisory", "alert", "warning", "safe"];
const INFO_WORDS = ["info", "details"];
const MAX_TRIP_DAYS = 7;

/** Any word in the query starting with one of `words` ("planning" → plan; "London" ↛ do) */
export function mentionsWord(query: string, words: string[]): boolean {
  const tokens = query.toLowerCase().match(/[a-z]+/g) ?? [];
  return tokens.some((token) => words.some((word) => token.startsWith(word)));
}

const asksForInfo = (query: string) =>
  mentionsWord(query, INFO_WORDS) || query.toLowerCase().includes("tell me about");

export function extractDestination(query: string): string {
  const lower = query.toLowerCase();
  const city = DESTINATIONS.find((c) => lower.includes(c));
  return city ? titleCase(city) : "London";
}

/** "Plan a 5-day trip" / "for 5 days" → 5; otherwise the first bare number; default 3; at most a week */
export function extractTripDays(query: string): number {
  const match = /(\d+)\s*-?\s*days?\b/i.exec(query) ?? /\b(\d+)\b/.exec(query);
  const days = match?.[1] ? Number.parseInt(match[1], 10) : 3;
  return Math.min(Math.max(days, 1), MAX_TRIP_DAYS);
}

/** Condition hint for the itinerary tool, read off the weather agent's forecast text */
export function weatherHint(forecast: string | undefined): string | undefined {
  const lower = forecast?.toLowerCase() ?? "";
  if (lower.includes("rain")) return "Rainy";
  if (lower.includes("sun") || lower.includes("clear")) return "Sunny";
  return undefined;
}

// ── Tool output shapes ─────────────────────────────────────────────

const slotSchema = z.object({ activity: z.string(), type: z.string() });

const itinerarySchema = z.object({
  location: z.string(),
  trip_duration: z.number(),
  weather_consideration: z.string(),
  itinerary: z.array(
    z.object({
      day: z.number(),
      date: z.string(),
      morning: slotSchema.nullable(),
      afternoon: slotSchema.nullable(),
      evening: slotSchema,
      transportation_tip: z.string(),
    }),
  ),
  tips: z.array(z.string()),
});

const activitiesSchema = z.object({
  location: z.string(),
  weather_condition: z.string(),
  recommended_activity_type: z.string(),
  top_activities: z.array(z.string()).min(1),
  all_options: z.array(z.string()),
});

const advisorySchema = z.object({
  location: z.string(),
  safety_info: z.string(),
  health_info: z.string(),
  entry_requirements: z.string(),
  local_laws: z.string(),
  updated_at: z.string(),
});

const destinationSchema = z.object({
  location: z.string(),
  attractions: z.array(z.string()),
  indoor_activities: z.array(z.string()),
  outdoor_activities: z.array(z.string()),
  cuisines: z.array(z.string()),
  transportation: z.array(z.string()),
  safety_level: z.string(),
  language: z.string(),
  currency: z.string(),
  timezone: z.string(),
});

export type Itinerary = z.infer<typeof itinerarySchema>;
export type ActivitySuggestions = z.infer<typeof activitiesSchema>;
export type TravelAdvisory = z.infer<typeof advisorySchema>;
export type DestinationGuide = z.infer<typeof destinationSchema>;

// ── Formatting ─────────────────────────────────────────────────────

const bullets = (items: string[]) => items.map((item) => `  - ${item}`);
const slot = (s: z.infer<typeof slotSchema> | null) => (s ? `${s.activity} (${s.type})` : "Free time");

export function formatItinerary(plan: Itinerary, forecast: string): string {
  const lines = [
    `${plan.trip_duration}-Day Trip Plan for ${plan.location}`,
    "",
    `Weather Forecast: ${forecast}`,
    `Weather Consideration: ${plan.weather_consideration}`,
    "",
  ];
  for (const day of plan.itinerary) {
    lines.push(
      `Day ${day.day} (${day.date}):`,
      `  - Morning: ${slot(day.morning)}`,
      `  - Afternoon: ${slot(day.afternoon)}`,
      `  - Evening: ${day.evening.activity}`,
      `  - ${day.transportation_tip}`,
      "",
    );
  }
  lines.push("Tips:", ...bullets(plan.tips));
  return lines.join("\n");
}

export function formatActivities(suggestions: ActivitySuggestions): string {
  const type = suggestions.recommended_activity_type;
  return [
    `Activity Suggestions for ${suggestions.location}`,
    "",
    `Current Weather: ${suggestions.weather_condition}`,
    `Recommended: ${type} Activities`,
    "",
    "Top Recommendations:",
    ...bullets(suggestions.top_activities),
    "",
    `All ${type.toLowerCase()} options: ${suggestions.all_options.join(", ")}`,
  ].join("\n");
}

export function formatAdvisory(advisory: TravelAdvisory, alerts: string): string {
  return [
    `Travel Advisory for ${advisory.location}`,
    "",
    `Weather Alerts: ${alerts}`,
    "",
    "Safety Information:",
    `  ${advisory.safety_info}`,
    "",
    "Health Information:",
    `  ${advisory.health_info}`,
    "",
    "Entry Requirements:",
    `  ${advisory.entry_requirements}`,
    "",
    "Local Laws:",
    `  ${advisory.local_laws}`,
    "",
    `Last Updated: ${advisory.updated_at}`,
  ].join("\n");
}

export function formatDestinationGuide(guide: DestinationGuide): string {
  return [
    `Destination Guide: ${guide.location}`,
    "",
    "Top Attractions:",
    ...bullets(guide.attractions),
    "",
    "Indoor Activities:",
    ...bullets(guide.indoor_activities),
    "",
    "Outdoor Activities:",
    ...bullets(guide.outdoor_activities),
    "",
    `Local Cuisine: ${guide.cuisines.join(", ")}`,
    `Getting Around: ${guide.transportation.join(", ")}`,
    `Language: ${guide.language}`,
    `Currency: ${guide.currency}`,
    `Timezone: ${guide.timezone}`,
    `Safety Level: ${guide.safety_level}`,
  ].join("\n");
}

export function formatDestinationSummary(guide: DestinationGuide): string {
  return [
    `Destination Overview: ${guide.location}`,
    `Top attractions include ${guide.attractions.slice(0, 3).join(", ")}`,
    `Local language: ${guide.language}, Currency: ${guide.currency}`,
  ].join("\n");
}

const toolsUnavailable = (what: string, location: string) =>
  `Error: Unable to ${what} ${location}. The travel tools might be unavailable.`;

// ── Agent ──────────────────────────────────────────────────────────

export interface TravelAgentOptions {
  /** Travel tool server connection */
  tools: ToolConnection;
  connections: AgentConnections;
  logger?: Logger;
}

export function createTravelAgent(options: TravelAgentOptions): AgentHandler {
  const { tools, connections } = options;
  const logger = options.logger ?? createSilentLogger();

  /** Ask the weather agent; `unavailable` when it cannot answer */
  const askWeather = async (question: string, unavailable: string, conversationId?: string) => {
    try {
      return await connections.ask(WEATHER_CONNECTION, question, conversationId);
    } catch (error) {
      logger.error(`Weather lookup failed: ${errorMessage(error)}`);
      return unavailable;
    }
  };

  /** Call a travel tool and validate its JSON output */
  const callTool = async <T>(schema: z.ZodType<T>, tool: string, args: Record<string, unknown>): Promise<T> =>
    schema.parse(JSON.parse(await tools.call(tool, args)));

  const planTrip = async (location: string, days: number, conversationId?: string) => {
    logger.info(`Planning ${days}-day trip to ${location}`);
    const unavailable = "Weather forecast unavailable";
    const forecast = await askWeather(
      `What's the weather forecast for ${location} for the next ${days} days?`,
      unavailable,
      conversationId,
    );
    const hint = forecast === unavailable ? undefined : weatherHint(forecast);
    try {
      const plan = await callTool(itinerarySchema, "create_trip_itinerary", {
        location,
        days,
        ...(hint ? { weather_condition: hint } : {}),
      });
      return formatItinerary(plan, forecast);
    } catch (error) {
      logger.error(`Itinerary for ${location} failed: ${errorMessage(error)}`);
      return toolsUnavailable("plan a trip to", location);
    }
  };

  const suggestActivities = async (location: string, conversationId?: string) => {
    const weather = await askWeather(
      `What's the weather in ${location}?`,
      "Weather information unavailable",
      conversationId,
    );
    try {
      const suggestions = await callTool(activitiesSchema, "suggest_activities", {
        location,
        weather_condition: weather,
      });
      return formatActivities(suggestions);
    } catch (error) {
      logger.error(`Activity suggestions for ${location} failed: ${errorMessage(error)}`);
      return toolsUnavailable("suggest activities for", location);
    }
  };

  const travelAdvisory = async (location: string, conversationId?: string) => {
    const alerts = await askWeather(
      `Are there any weather alerts for ${location}?`,
      "Weather alert information unavailable",
      conversationId,
    );
    try {
      return formatAdvisory(await callTool(advisorySchema, "get_travel_advisory", { location }), alerts);
    } catch (error) {
      logger.error(`Advisory for ${location} failed: ${errorMessage(error)}`);
      return toolsUnavailable("retrieve travel advisories for", location);
    }
  };

  const destinationInfo = async (location: string) => {
    try {
      return formatDestinationGuide(await callTool(destinationSchema, "get_destination_info", { location }));
    } catch (error) {
      logger.error(`Destination info for ${location} failed: ${errorMessage(error)}`);
      return toolsUnavailable("retrieve destination information for", location);
    }
  };

  const overview = async (location: string, conversationId?: string) => {
    const weather = await askWeather(
      `What's the weather in ${location}?`,
      `Unable to retrieve weather for ${location} at this time.`,
      conversationId,
    );
    let summary: string;
    try {
      summary = formatDestinationSummary(await callTool(destinationSchema, "get_destination_info", { location }));
    } catch (error) {
      logger.error(`Destination summary for ${location} failed: ${errorMessage(error)}`);
      return `Sorry, I couldn't get travel information for ${location}. The travel tools might be unavailable.`;
    }
    return (
      `Here's some information about traveling to ${location}:\n\n` +
      `Weather: ${weather}\n\n` +
      `${summary}\n\n` +
      `For a more specific response, try asking about planning a trip, recommended activities, or travel advisories for ${location}.`
    );
  };

  const answer = (query: string, conversationId?: string): Promise<string> => {
    const location = extractDestination(query);
    if (mentionsWord(query, PLAN_WORDS)) return planTrip(location, extractTripDays(query), conversationId);
    if (mentionsWord(query, ACTIVITY_WORDS)) return suggestActivities(location, conversationId);
    if (mentionsWord(query, ADVISORY_WORDS)) return travelAdvisory(location, conversationId);
    if (asksForInfo(query)) return destinationInfo(location);
    return overview(location, conversationId);
  };

  return {
    card: TRAVEL_CARD,
    async initialize() {
      const names = await tools.listTools();
      logger.info(`Discovered ${names.length} travel tools: ${names.join(", ")}`);
      if (connections.has(WEATHER_CONNECTION)) {
        logger.info(`Connected agents: ${connections.names().join(", ")}`);
      } else {
        logger.warn("No weather agent connected; answers will omit weather information");
      }
    },
    async handle(message) {
      const text = await answer(messageText(message), message.conversationId);
      return createReply(message, textContent(text));
    },
    close: () => tools.close(),
  };
}
