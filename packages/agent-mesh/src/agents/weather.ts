/**
 * Weather agent — answers weather questions through the weather MCP tools.
 *
 * The tool connection is injected: in-process for tests and single-process
 * runs, Streamable HTTP when `agent-mesh mcp` runs separately.
 */

import { z } from "zod";
import type { AgentHandler } from "../agent/handle.ts";
import { createReply, messageText, textContent, type AgentCard } from "../agent/types.ts";
import { errorMessage } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { ToolConnection } from "../tools/mcp-client.ts";
import { titleCase } from "../tools/shared.ts";

export const WEATHER_CARD: AgentCard = {
  name: "Weather Agent",
  description: "Provides current weather information, forecasts and weather alerts",
  version: "1.0.0",
  skills: [
    {
      name: "Current Weather",
      description: "Get current weather conditions for a location",
      tags: ["weather", "current", "temperature", "conditions", "forecast"],
      examples: ["What's the weather in London?", "Is it raining in Tokyo?"],
    },
    {
      name: "Weather Forecast",
      description: "Get weather forecast for the coming days",
      tags: ["weather", "forecast", "prediction", "upcoming", "future"],
      examples: ["What's the forecast for Paris?", "Will it rain in New York tomorrow?"],
    },
    {
      name: "Weather Alerts",
      description: "Check active weather alerts for a location",
      tags: ["weather", "alerts", "warnings", "storm"],
      examples: ["Are there any weather alerts for Sydney?"],
    },
  ],
};

export const WEATHER_HELP =
  "I'm a weather agent. You can ask about weather conditions, forecasts, or weather alerts.";

const KNOWN_CITIES = [
  "london",
  "paris",
  "new york",
  "tokyo",
  "sydney",
  "berlin",
  "rome",
  "madrid",
  "cairo",
  "mumbai",
];
const AVAILABLE = "Available cities are: London, Paris, New York, Tokyo, Sydney.";

const WEATHER_TERMS = ["weather", "temperature", "forecast", "rain", "alert"];
const FORECAST_TERMS = ["forecast", "prediction", "tomorrow", "next", "future"];
const ALERT_TERMS = ["alert", "warning"];

// ── Tool output shapes ─────────────────────────────────────────────

const currentSchema = z.object({
  location: z.string(),
  condition: z.string(),
  temperature: z.number(),
  temperature_unit: z.string(),
  humidity: z.number(),
  wind_speed: z.number(),
  wind_unit: z.string(),
});

const forecastSchema = z.object({
  location: z.string(),
  forecast: z.array(
    z.object({
      date: z.string(),
      condition: z.string(),
      temperature_high: z.number(),
      temperature_low: z.number(),
    }),
  ),
});

const alertSchema = z.object({
  location: z.string(),
  alerts: z.array(
    z.object({
      type: z.string(),
      severity: z.string(),
      description: z.string(),
      expires_at: z.string(),
    }),
  ),
});

// ── Query parsing ──────────────────────────────────────────────────

/** First known city mentioned in the query, title-cased; London when none */
export function extractCity(query: string): string {
  const lower = query.toLowerCase();
  const city = KNOWN_CITIES.find((c) => lower.includes(c));
  return city ? titleCase(city) : "London";
}

/** "for the next 5 days" → 5; default 3 */
export function extractDays(query: string): number {
  const match = /(\d+)\s*-?\s*days?\b/i.exec(query);
  return match?.[1] ? Number.parseInt(match[1], 10) : 3;
}

const mentions = (query: string, terms: string[]) => {
  const lower = query.toLowerCase();
  return terms.some((term) => lower.includes(term));
};

// ── Formatting ─────────────────────────────────────────────────────

export function formatCurrent(json: string): string {
  const w = currentSchema.parse(JSON.parse(json));
  return [
    `Current Weather in ${w.location}:`,
    `Condition: ${w.condition}`,
    `Temperature: ${w.temperature}°${w.temperature_unit.toUpperCase()}`,
    `Humidity: ${w.humidity}%`,
    `Wind Speed: ${w.wind_speed} ${w.wind_unit}`,
  ].join("\n");
}

export function formatForecast(json: string, days: number): string {
  const f = forecastSchema.parse(JSON.parse(json));
  const lines = f.forecast.map(
    (day) => `${day.date}: ${day.condition}, High: ${day.temperature_high}°C, Low: ${day.temperature_low}°C\n`,
  );
  return `${days}-Day Weather Forecast for ${f.location}:\n\n${lines.join("")}`;
}

export function formatAlerts(json: string): string {
  const a = alertSchema.parse(JSON.parse(json));
  if (a.alerts.length === 0) return `No active weather alerts for ${a.location}.`;
  const lines = a.alerts.map(
    (alert) => `- ${alert.severity} ${alert.type}: ${alert.description} (until ${alert.expires_at})`,
  );
  return `Weather alerts for ${a.location}:\n${lines.join("\n")}`;
}

// ── Agent ──────────────────────────────────────────────────────────

export interface WeatherAgentOptions {
  tools: ToolConnection;
  logger?: Logger;
}

export function createWeatherAgent(options: WeatherAgentOptions): AgentHandler {
  const { tools } = options;
  const logger = options.logger ?? createSilentLogger();

  const current = async (city: string) => {
    try {
      return formatCurrent(await tools.call("get_current_weather", { location: city.toLowerCase() }));
    } catch (error) {
      logger.error(`Error getting current weather for '${city}': ${errorMessage(error)}`);
      return `Sorry, I couldn't get the current weather information for ${city}. ${AVAILABLE}`;
    }
  };

  const forecast = async (city: string, days: number) => {
    try {
      const json = await tools.call("get_weather_forecast", { location: city.toLowerCase(), days });
      return formatForecast(json, Math.min(Math.max(1, days), 7));
    } catch (error) {
      logger.error(`Error getting forecast for '${city}': ${errorMessage(error)}`);
      return `Sorry, I couldn't get the weather forecast for ${city}. ${AVAILABLE}`;
    }
  };

  const alerts = async (city: string) => {
    try {
      return formatAlerts(await tools.call("get_weather_alert", { location: city.toLowerCase() }));
    } catch (error) {
      logger.error(`Error getting alerts for '${city}': ${errorMessage(error)}`);
      return `Sorry, I couldn't get weather alerts for ${city}. ${AVAILABLE}`;
    }
  };

  const answer = async (query: string): Promise<string> => {
    if (!mentions(query, WEATHER_TERMS)) return WEATHER_HELP;
    const city = extractCity(query);
    if (mentions(query, ALERT_TERMS)) return alerts(city);
    if (mentions(query, FORECAST_TERMS)) return forecast(city, extractDays(query));
    return current(city);
  };

  return {
    card: WEATHER_CARD,
    async initialize() {
      const names = await tools.listTools();
      logger.info(`Discovered ${names.length} weather tools: ${names.join(", ")}`);
    },
    async handle(message) {
      return createReply(message, textContent(await answer(messageText(message))));
    },
    close: () => tools.close(),
  };
}
