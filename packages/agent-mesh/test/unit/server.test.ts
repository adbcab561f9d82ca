/**
 * Listening Server Tests
 *
 * Agent and tool servers bound to an ephemeral port on 127.0.0.1, driven
 * by the real HTTP clients.
 */

import { Readable } from "node:stream";
import { describe, test, expect } from "vitest";
import { HttpAgentClient } from "../../src/agent/client.ts";
import { createMessage, messageText } from "../../src/agent/types.ts";
import { createMathAgent } from "../../src/agents/math.ts";
import { createWeatherAgent } from "../../src/agents/weather.ts";
import { startAgentServer } from "../../src/daemon/server.ts";
import { connectHttp } from "../../src/tools/mcp-client.ts";
import { readBody, serveMcpHttp } from "../../src/tools/http.ts";
import { TOOL_SERVERS } from "../../src/tools/index.ts";
import { createWeatherMcpServer } from "../../src/tools/weather-server.ts";

describe("startAgentServer", () => {
  test("serves an agent over HTTP", async () => {
    const running = await startAgentServer({ handler: createMathAgent() });
    try {
      expect(running.url).toBe(`http://127.0.0.1:${running.port}`);
      const client = new HttpAgentClient("math", running.url);
      expect(await client.testReachable()).toBe(true);
      expect((await client.getCard()).name).toBe("Math Agent");
      expect(messageText(await client.send(createMessage("9 - 2")))).toBe("The result of 9.0 - 2.0 is 7");
    } finally {
      await running.close();
    }
  });

  test("initialize runs before listening and close releases the handler", async () => {
    const events: string[] = [];
    const math = createMathAgent();
    const running = await startAgentServer({
      handler: {
        ...math,
        initialize: async () => {
          events.push("initialize");
        },
        close: async () => {
          events.push("close");
        },
      },
    });
    events.push("listening");
    await running.close();
    expect(events).toEqual(["initialize", "listening", "close"]);
  });
});

describe("serveMcpHttp", () => {
  test("weather tools over Streamable HTTP", async () => {
    const mcp = await serveMcpHttp({
      createServerInstance: () => createWeatherMcpServer({ random: () => 0.5 }),
    });
    const tools = await connectHttp(mcp.url);
    try {
      expect(mcp.url).toBe(`http://127.0.0.1:${mcp.port}/mcp`);
      expect(await tools.listTools()).toContain("get_weather_forecast");

      const weather = createWeatherAgent({ tools });
      const reply = await weather.handle(createMessage("What's the weather in Tokyo?"));
      expect(messageText(reply).split("\n")[0]).toBe("Current Weather in Tokyo:");
    } finally {
      await tools.close();
      await mcp.close();
    }
  });

  test("travel tools and resources over Streamable HTTP", async () => {
    const mcp = await serveMcpHttp({ createServerInstance: TOOL_SERVERS.travel.prepare() });
    const tools = await connectHttp(mcp.url);
    try {
      expect(await tools.listTools()).toContain("create_trip_itinerary");
      const guide = JSON.parse(await tools.readResource("travel://destination/tokyo"));
      expect(guide.language).toBe("Japanese");
    } finally {
      await tools.close();
      await mcp.close();
    }
  });

  test("other paths and methods are refused", async () => {
    const mcp = await serveMcpHttp({ createServerInstance: () => createWeatherMcpServer() });
    try {
      expect((await fetch(`http://127.0.0.1:${mcp.port}/other`)).status).toBe(404);
      expect((await fetch(mcp.url)).status).toBe(405);
    } finally {
      await mcp.close();
    }
  });
});

describe("readBody", () => {
  test("a character split across chunks is decoded whole", async () => {
    const bytes = Buffer.from(JSON.stringify({ location: "Zürich" }), "utf-8");
    // "ü" is two bytes; cut between them
    const cut = bytes.indexOf(0xc3) + 1;
    const stream = Readable.from([bytes.subarray(0, cut), bytes.subarray(cut)]);
    expect(await readBody(stream)).toEqual({ location: "Zürich" });
  });

  test("an empty body is undefined", async () => {
    expect(await readBody(Readable.from([]))).toBeUndefined();
  });

  test("malformed JSON rejects", async () => {
    await expect(readBody(Readable.from([Buffer.from("{nope")]))).rejects.toThrow(SyntaxError);
  });
});
