/**
 * Built-in Agent Unit Tests
 *
 * Math and knowledge answers, and the travel agent's composition of the
 * in-process travel tools with a faked weather connection.
 */

import { afterEach, describe, test, expect } from "vitest";
import type { AgentConnections, AgentHandler } from "../../src/agent/handle.ts";
import { createMessage, messageText } from "../../src/agent/types.ts";
import { BUILTIN_AGENTS, createBuiltinAgent, isBuiltinAgent } from "../../src/agents/index.ts";
import { KNOWLEDGE_FALLBACK, answerQuestion } from "../../src/agents/knowledge.ts";
import { MATH_FALLBACK, formatOperand, solveMathProblem } from "../../src/agents/math.ts";
import {
  createTravelAgent,
  extractDestination,
  extractTripDays,
  mentionsWord,
  weatherHint,
} from "../../src/agents/travel.ts";
import { createLogger } from "../../src/logger.ts";
import { connectInProcess, type ToolConnection } from "../../src/tools/mcp-client.ts";
import { createTravelMcpServer } from "../../src/tools/travel-server.ts";

async function ask(handler: AgentHandler, text: string): Promise<string> {
  return messageText(await handler.handle(createMessage(text)));
}

/** Weather connection answering from `reply`; omitted → no weather agent */
function weatherConnection(reply?: (question: string) => string) {
  const asked: string[] = [];
  const connections: AgentConnections = {
    has: (name) => reply !== undefined && name === "weather",
    names: () => (reply ? ["weather"] : []),
    async ask(name, text) {
      if (!reply || name !== "weather") throw new Error(`No connection to agent '${name}'`);
      asked.push(text);
      return reply(text);
    },
  };
  return { connections, asked };
}

// ── Math ───────────────────────────────────────────────────────────

describe("solveMathProblem", () => {
  test.each([
    ["What is 12 * 4?", "The result of 12.0 * 4.0 is 48"],
    ["Calculate 125 / 5", "The result of 125.0 / 5.0 is 25"],
    ["10 / 4", "The result of 10.0 / 4.0 is 2.5"],
    ["10 - 15", "The result of 10.0 - 15.0 is -5"],
    ["1.5 + 2", "The result of 1.5 + 2.0 is 3.5"],
    ["2 ^ 10", "The result of 2.0 ^ 10.0 is 1024"],
  ])("arithmetic: %s", (query, expected) => {
    expect(solveMathProblem(query)).toBe(expected);
  });

  test("division by zero", () => {
    expect(solveMathProblem("7 / 0")).toBe("Error: Division by zero is not allowed.");
  });

  test.each([
    ["Solve 3x + 7 = 22", "Solving the equation 3x + 7 = 22:\nx = 5"],
    ["x - 4 = 10", "Solving the equation x - 4 = 10:\nx = 14"],
    ["2x + 1 = 4", "Solving the equation 2x + 1 = 4:\nx = 1.5"],
  ])("equation: %s", (query, expected) => {
    expect(solveMathProblem(query)).toBe(expected);
  });

  test("a zero coefficient is not solved", () => {
    expect(solveMathProblem("0x + 5 = 5")).toBe(MATH_FALLBACK);
  });

  test("square roots", () => {
    expect(solveMathProblem("What is the square root of 16?")).toBe("The square root of 16.0 is 4");
    expect(solveMathProblem("Square root of 2")).toBe("The square root of 2.0 is 1.4142135623730951");
  });

  test("anything else", () => {
    expect(solveMathProblem("What is love?")).toBe(MATH_FALLBACK);
  });

  test("formatOperand", () => {
    expect(formatOperand(3)).toBe("3.0");
    expect(formatOperand(0.25)).toBe("0.25");
  });
});

// ── Knowledge ──────────────────────────────────────────────────────

describe("answerQuestion", () => {
  test("matches a topic anywhere in the question", () => {
    expect(answerQuestion("Hey, what's the CAPITAL OF FRANCE?")).toBe(
      "The capital of France is Paris, often called the 'City of Light' (La Ville Lumière).",
    );
    expect(answerQuestion("explain photosynthesis")).toMatch(/^Photosynthesis is the process/);
  });

  test("unknown topics get the fallback", () => {
    expect(answerQuestion("Who won the 1998 World Cup?")).toBe(KNOWLEDGE_FALLBACK);
  });
});

// ── Travel ─────────────────────────────────────────────────────────

const NOW = new Date("2025-03-01T12:00:00.000Z");
const open: ToolConnection[] = [];

/** Travel tools whose shuffles and picks keep the data order (last pick wins) */
async function travelTools(): Promise<ToolConnection> {
  const tools = await connectInProcess(createTravelMcpServer({ random: () => 0.99, now: () => NOW }));
  open.push(tools);
  return tools;
}

/** Tool connection whose every call fails */
const brokenTools: ToolConnection = {
  call: async (tool) => {
    throw new Error(`${tool} is down`);
  },
  listTools: async () => [],
  readResource: async (uri) => {
    throw new Error(`${uri} is down`);
  },
  close: async () => {},
};

afterEach(async () => {
  await Promise.all(open.splice(0).map((tools) => tools.close()));
});

describe("travel query parsing", () => {
  test("mentionsWord matches word prefixes only", () => {
    expect(mentionsWord("What can I do here?", ["do"])).toBe(true);
    expect(mentionsWord("Weather in London", ["do"])).toBe(false);
    expect(mentionsWord("Trip planning", ["plan"])).toBe(true);
  });

  test("extractDestination", () => {
    expect(extractDestination("Trip to NEW YORK please")).toBe("New York");
    expect(extractDestination("Trip to Atlantis")).toBe("London");
  });

  test("extractTripDays", () => {
    expect(extractTripDays("Plan a 5-day trip")).toBe(5);
    expect(extractTripDays("a trip for 2 days")).toBe(2);
    expect(extractTripDays("a trip with 4 friends")).toBe(4);
    expect(extractTripDays("Plan a trip to Rome")).toBe(3);
    expect(extractTripDays("Plan a trip for 30 days")).toBe(7);
    expect(extractTripDays("0 days in Paris")).toBe(1);
  });

  test("weatherHint", () => {
    expect(weatherHint("Light rain expected")).toBe("Rainy");
    expect(weatherHint("Sunny spells")).toBe("Sunny");
    expect(weatherHint("Clear skies")).toBe("Sunny");
    expect(weatherHint("Foggy")).toBeUndefined();
    expect(weatherHint(undefined)).toBeUndefined();
  });
});

describe("travel agent", () => {
  test("a rainy forecast gives an indoor itinerary", async () => {
    const { connections, asked } = weatherConnection(() => "Rainy all week");
    const travel = createTravelAgent({ tools: await travelTools(), connections });

    expect(await ask(travel, "Plan a 2-day trip to Paris")).toBe(
      [
        "2-Day Trip Plan for Paris",
        "",
        "Weather Forecast: Rainy all week",
        "Weather Consideration: Rainy",
        "",
        "Day 1 (2025-03-01):",
        "  - Morning: Louvre Museum (indoor)",
        "  - Afternoon: Musée d'Orsay (indoor)",
        "  - Evening: Dinner - Lebanese cuisine",
        "  - Best way to get around: Walking",
        "",
        "Day 2 (2025-03-02):",
        "  - Morning: Centre Pompidou (indoor)",
        "  - Afternoon: Galeries Lafayette (indoor)",
        "  - Evening: Dinner - Lebanese cuisine",
        "  - Best way to get around: Walking",
        "",
        "Tips:",
        "  - Language: French",
        "  - Currency: Euro (€)",
        "  - Timezone: GMT+1",
        "  - Carry a map or use map apps for navigation",
        "  - Check opening hours of attractions before visiting",
      ].join("\n"),
    );
    expect(asked).toEqual(["What's the weather forecast for Paris for the next 2 days?"]);
  });

  test("activities ask for current weather", async () => {
    const { connections, asked } = weatherConnection(() => "Clear skies");
    const travel = createTravelAgent({ tools: await travelTools(), connections });

    expect(await ask(travel, "What can I do in Tokyo?")).toBe(
      [
        "Activity Suggestions for Tokyo",
        "",
        "Current Weather: Clear skies",
        "Recommended: Outdoor Activities",
        "",
        "Top Recommendations:",
        "  - Yoyogi Park",
        "  - Shinjuku Gyoen",
        "  - Tsukiji Fish Market",
        "",
        "All outdoor options: Yoyogi Park, Shinjuku Gyoen, Tsukiji Fish Market, Sumida River Cruise, Ueno Park",
      ].join("\n"),
    );
    expect(asked).toEqual(["What's the weather in Tokyo?"]);
  });

  test("advisories ask for alerts", async () => {
    const { connections, asked } = weatherConnection(() => "No active weather alerts for Sydney.");
    const travel = createTravelAgent({ tools: await travelTools(), connections });

    expect(await ask(travel, "Is it safe to travel to Sydney?")).toBe(
      [
        "Travel Advisory for Sydney",
        "",
        "Weather Alerts: No active weather alerts for Sydney.",
        "",
        "Safety Information:",
        "  Generally safe for travelers. Take precautions for sun exposure.",
        "",
        "Health Information:",
        "  High standard of healthcare. Travel insurance recommended.",
        "",
        "Entry Requirements:",
        "  Passport and visa required for most visitors.",
        "",
        "Local Laws:",
        "  Strict quarantine laws for food, plants, and animal products.",
        "",
        "Last Updated: 2025-03-01T12:00:00.000Z",
      ].join("\n"),
    );
    expect(asked).toEqual(["Are there any weather alerts for Sydney?"]);
  });

  test("destination info comes from the tools alone", async () => {
    const { connections, asked } = weatherConnection(() => "Mild");
    const travel = createTravelAgent({ tools: await travelTools(), connections });

    expect(await ask(travel, "Tell me about Sydney")).toBe(
      [
        "Destination Guide: Sydney",
        "",
        "Top Attractions:",
        "  - Sydney Opera House",
        "  - Sydney Harbour Bridge",
        "  - Bondi Beach",
        "  - Taronga Zoo",
        "  - Darling Harbour",
        "",
        "Indoor Activities:",
        "  - Art Gallery of NSW",
        "  - Australian Museum",
        "  - Queen Victoria Building",
        "  - Sydney Tower Eye",
        "  - Sea Life Sydney Aquarium",
        "",
        "Outdoor Activities:",
        "  - Bondi to Coogee Coastal Walk",
        "  - Sydney Harbour Cruise",
        "  - Royal Botanic Garden",
        "  - Blue Mountains Day Trip",
        "  - Manly Beach",
        "",
        "Local Cuisine: Australian, Asian Fusion, Mediterranean, Seafood, Italian",
        "Getting Around: Train, Bus, Ferry, Taxi, Walking",
        "Language: English",
        "Currency: Australian Dollar (A$)",
        "Timezone: GMT+10",
        "Safety Level: High",
      ].join("\n"),
    );
    expect(asked).toEqual([]);
  });

  test("other questions get an overview with the weather", async () => {
    const { connections } = weatherConnection(() => "Mild");
    const travel = createTravelAgent({ tools: await travelTools(), connections });

    expect(await ask(travel, "How about Sydney?")).toBe(
      "Here's some information about traveling to Sydney:\n\n" +
        "Weather: Mild\n\n" +
        "Destination Overview: Sydney\n" +
        "Top attractions include Sydney Opera House, Sydney Harbour Bridge, Bondi Beach\n" +
        "Local language: English, Currency: Australian Dollar (A$)\n\n" +
        "For a more specific response, try asking about planning a trip, recommended activities, or travel advisories for Sydney.",
    );
  });

  test("without a weather agent the itinerary alternates outdoor and indoor", async () => {
    const lines: string[] = [];
    const { connections } = weatherConnection();
    const travel = createTravelAgent({
      tools: await travelTools(),
      connections,
      logger: createLogger({ log: (line) => lines.push(line) }),
    });

    await travel.initialize?.();
    expect(lines.filter((line) => line.includes("travel tools"))).toEqual([
      expect.stringMatching(
        /Discovered 4 travel tools: get_destination_info, suggest_activities, get_travel_advisory, create_trip_itinerary$/,
      ),
    ]);
    expect(lines.some((line) => line.endsWith("No weather agent connected; answers will omit weather information"))).toBe(true);

    const reply = (await ask(travel, "Plan a trip to Paris")).split("\n");
    expect(reply.slice(0, 5)).toEqual([
      "3-Day Trip Plan for Paris",
      "",
      "Weather Forecast: Weather forecast unavailable",
      "Weather Consideration: Not specified",
      "",
    ]);
    expect(reply.filter((line) => line.startsWith("  - Morning") || line.startsWith("  - Afternoon"))).toEqual([
      "  - Morning: Seine River Cruise (outdoor)",
      "  - Afternoon: Louvre Museum (indoor)",
      "  - Morning: Musée d'Orsay (indoor)",
      "  - Afternoon: Luxembourg Gardens (outdoor)",
      "  - Morning: Champs-Élysées (outdoor)",
      "  - Afternoon: Centre Pompidou (indoor)",
    ]);
  });

  test("failing travel tools give a fixed error per intent", async () => {
    const { connections } = weatherConnection(() => "Sunny");
    const travel = createTravelAgent({ tools: brokenTools, connections });

    expect(await ask(travel, "Plan a trip to Paris")).toBe(
      "Error: Unable to plan a trip to Paris. The travel tools might be unavailable.",
    );
    expect(await ask(travel, "What can I do in Paris?")).toBe(
      "Error: Unable to suggest activities for Paris. The travel tools might be unavailable.",
    );
    expect(await ask(travel, "Any warnings for Paris?")).toBe(
      "Error: Unable to retrieve travel advisories for Paris. The travel tools might be unavailable.",
    );
    expect(await ask(travel, "Details on Paris")).toBe(
      "Error: Unable to retrieve destination information for Paris. The travel tools might be unavailable.",
    );
    expect(await ask(travel, "How about Paris?")).toBe(
      "Sorry, I couldn't get travel information for Paris. The travel tools might be unavailable.",
    );
  });
});

// ── Catalog ────────────────────────────────────────────────────────

describe("built-in catalog", () => {
  test("names", () => {
    expect(BUILTIN_AGENTS).toEqual(["math", "knowledge", "weather", "travel"]);
    expect(isBuiltinAgent("math")).toBe(true);
    expect(isBuiltinAgent("poet")).toBe(false);
  });

  test("the travel agent starts its own travel tools when no URL is given", async () => {
    const lines: string[] = [];
    const travel = await createBuiltinAgent("travel", { logger: createLogger({ log: (line) => lines.push(line) }) });
    try {
      await travel.initialize?.();
      expect(
        lines.some((line) =>
          line.endsWith(
            "Discovered 4 travel tools: get_destination_info, suggest_activities, get_travel_advisory, create_trip_itinerary",
          ),
        ),
      ).toBe(true);
    } finally {
      await travel.close?.();
    }
  });

  test("createBuiltinAgent wraps the handler and keeps its card", async () => {
    const math = await createBuiltinAgent("math");
    expect(math.card.name).toBe("Math Agent");
    expect(await ask(math, "6 * 7")).toBe("The result of 6.0 * 7.0 is 42");
  });
});
