/**
 * Weather MCP tool server — simulated conditions for a fixed set of cities.
 *
 * Tools: get_current_weather, get_weather_forecast, get_weather_alert.
 * Resources: weather://current/{location}, weather://forecast/{location}/{days}.
 * Values jitter around the fixture data; pass a seeded random source for
 * reproducible output.
 */

import { readFileSync } from "node:fs";
import { McpServer, ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { createSilentLogger, type Logger } from "../logger.ts";
import { pickRandom, type RandomSource } from "../routing/types.ts";
import { isoDate, jsonResult, placeKey, resourceResult, templateVar, titleCase, toolCall } from "./shared.ts";

const cityWeatherSchema = z.object({
  condition: z.string(),
  temperature: z.number(),
  humidity: z.number(),
  wind: z.number(),
  precipitation: z.number(),
});

export type CityWeather = z.infer<typeof cityWeatherSchema>;

export function loadWeatherData(): Record<string, CityWeather> {
  const raw = readFileSync(new URL("./weather-data.json", import.meta.url), "utf-8");
  return z.record(z.string(), cityWeatherSchema).parse(JSON.parse(raw));
}

const FORECAST_CONDITIONS = ["Sunny", "Partly Cloudy", "Cloudy", "Rainy", "Clear"];
const ALERT_TYPES = ["Flood", "High Wind", "Thunderstorm", "Extreme Heat", "Heavy Rain"];
const ALERT_SEVERITIES = ["Minor", "Moderate", "Severe"];
const HOUR_MS = 60 * 60 * 1000;

export interface WeatherServerOptions {
  random?: RandomSource;
  now?: () => Date;
  logger?: Logger;
  data?: Record<string, CityWeather>;
}

const round1 = (n: number) => Math.round(n * 10) / 10;
const clampPercent = (n: number) => Math.min(100, Math.max(0, Math.round(n)));

export function createWeatherMcpServer(options: WeatherServerOptions = {}): McpServer {
  const random = options.random ?? Math.random;
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? createSilentLogger();
  const data = options.data ?? loadWeatherData();
  const cities = Object.keys(data);
  /** Uniform float in [min, max) */
  const uniform = (min: number, max: number) => min + (max - min) * random();

  const lookup = (location: string): { key: string; weather: CityWeather } => {
    const key = placeKey(location);
    const weather = data[key];
    if (!weather) {
      logger.warn(`Weather data not available for ${key}`);
      throw new Error(`Weather data not available for ${key}. Available cities: ${cities.join(", ")}`);
    }
    return { key, weather };
  };

  const current = (location: string) => {
    const { key, weather } = lookup(location);
    return {
      location: titleCase(key),
      condition: weather.condition,
      temperature: round1(weather.temperature + uniform(-1, 1)),
      temperature_unit: "celsius",
      humidity: clampPercent(weather.humidity + uniform(-5, 5)),
      wind_speed: weather.wind,
      wind_unit: "km/h",
      timestamp: now().toISOString(),
    };
  };

  const forecast = (location: string, days: number) => {
    const { key, weather } = lookup(location);
    const count = Math.min(Math.max(1, days), 7);
    const start = now();

    const daily = Array.from({ length: count }, (_, i) => {
      const tempVariation = uniform(-3, 3);
      const humidityVariation = uniform(-10, 10);
      const condition =
        random() > 0.7
          ? (pickRandom(FORECAST_CONDITIONS, random) ?? weather.condition)
          : weather.condition;
      return {
        date: isoDate(start, i),
        condition,
        temperature_high: round1(weather.temperature + tempVariation + 2),
        temperature_low: round1(weather.temperature + tempVariation - 4),
        temperature_unit: "celsius",
        humidity: clampPercent(weather.humidity + humidityVariation),
        precipitation_chance: Math.round(random() * (condition.includes("Rainy") ? 100 : 30)),
      };
    });

    return { location: titleCase(key), forecast: daily, generated_at: start.toISOString() };
  };

  const alerts = (location: string) => {
    const place = titleCase(lookup(location).key);
    const timestamp = now();

    if (random() >= 0.3) {
      return { location: place, alerts: [], timestamp: timestamp.toISOString() };
    }

    const type = pickRandom(ALERT_TYPES, random) ?? "Heavy Rain";
    const alert = {
      type,
      severity: pickRandom(ALERT_SEVERITIES, random) ?? "Minor",
      description: `${type} warning for ${place} area`,
      issued_at: new Date(timestamp.getTime() - Math.ceil(uniform(1, 6)) * HOUR_MS).toISOString(),
      expires_at: new Date(timestamp.getTime() + Math.ceil(uniform(6, 24)) * HOUR_MS).toISOString(),
    };
    return { location: place, alerts: [alert], timestamp: timestamp.toISOString() };
  };

  const server = new McpServer({ name: "weather-tools", version: "1.0.0" });

  server.tool(
    "get_current_weather",
    "Get current weather conditions for a location",
    { location: z.string().describe("City name, e.g. London") },
    ({ location }) => {
      logger.debug(`get_current_weather(${location})`);
      return toolCall(() => jsonResult(current(location)));
    },
  );

  server.tool(
    "get_weather_forecast",
    "Get weather forecast for a location",
    {
      location: z.string().describe("City name"),
      days: z.number().int().optional().describe("Days to forecast (1-7, default 3)"),
    },
    ({ location, days }) => {
      logger.debug(`get_weather_forecast(${location}, ${days ?? 3})`);
      return toolCall(() => jsonResult(forecast(location, days ?? 3)));
    },
  );

  server.tool(
    "get_weather_alert",
    "Get active weather alerts for a location",
    { location: z.string().describe("City name") },
    ({ location }) => toolCall(() => jsonResult(alerts(location))),
  );

  server.resource(
    "current-weather",
    new ResourceTemplate("weather://current/{location}", { list: undefined }),
    { description: "Current weather for a location", mimeType: "application/json" },
    (uri, variables) => resourceResult(uri, JSON.stringify(current(templateVar(variables, "location")), null, 2)),
  );

  server.resource(
    "forecast",
    new ResourceTemplate("weather://forecast/{location}/{days}", { list: undefined }),
    { description: "Weather forecast for a location", mimeType: "application/json" },
    (uri, variables) => {
      const days = Number(templateVar(variables, "days"));
      if (!Number.isInteger(days)) throw new Error("Days must be a number");
      return resourceResult(uri, JSON.stringify(forecast(templateVar(variables, "location"), days), null, 2));
    },
  );

  return server;
}
