/**
 * Query Processor Unit Tests
 *
 * Routing + dispatch for single queries. Every failure mode comes back as
 * a fixed "Error: ..." string.
 */

import { describe, test, expect } from "vitest";
import { AgentDirectory } from "../../src/agent/directory.ts";
import { createReply, type AgentMessage } from "../../src/agent/types.ts";
import { AgentTransportError } from "../../src/errors.ts";
import { createLogger } from "../../src/logger.ts";
import {
  NO_AGENTS_ERROR,
  QueryProcessor,
  ROUTING_FAILED_ERROR,
} from "../../src/network/processor.ts";
import type { Router, RoutingDecision } from "../../src/routing/types.ts";
import { scriptedClient } from "../helpers/agents.ts";

function fixedRouter(decision: RoutingDecision): Router {
  return { type: "keyword", route: () => decision, rebuild: () => {} };
}

function throwingRouter(): Router & { calls: number } {
  const router = {
    type: "keyword" as const,
    calls: 0,
    route(): RoutingDecision {
      router.calls++;
      throw new Error("router must not be consulted");
    },
    rebuild: () => {},
  };
  return router;
}

function setup(router: Router) {
  const directory = new AgentDirectory();
  const lines: string[] = [];
  const logger = createLogger({ log: (line) => lines.push(line) });
  const processor = new QueryProcessor({ directory, router: () => router, logger });
  return { directory, processor, lines };
}

describe("QueryProcessor.process", () => {
  test("empty directory: fixed message, nothing routed", async () => {
    const router = throwingRouter();
    const { processor } = setup(router);
    expect(await processor.process("hello")).toBe(NO_AGENTS_ERROR);
    expect(await processor.process("hello", "math")).toBe("Error: No agents available in the network");
    expect(router.calls).toBe(0);
  });

  test("routed query returns the agent's text", async () => {
    const { directory, processor } = setup(fixedRouter({ agent: "echo", confidence: 0.3 }));
    const echo = scriptedClient("echo", (text) => `echo: ${text}`);
    directory.add({ name: "echo", client: echo });

    expect(await processor.process("ping")).toBe("echo: ping");
    expect(echo.received).toEqual(["ping"]);
  });

  test("dispatched messages are user messages with a conversation id", async () => {
    const { directory, processor } = setup(fixedRouter({ agent: "echo", confidence: 1 }));
    const echo = scriptedClient("echo", () => "ok");
    directory.add({ name: "echo", client: echo });

    await processor.process("ping");
    const [sent] = echo.messages;
    expect(sent?.role).toBe("user");
    expect(sent?.conversationId).toEqual(expect.any(String));
  });

  test("explicit target bypasses the router at full confidence", async () => {
    const router = throwingRouter();
    const { directory, processor, lines } = setup(router);
    directory.add({ name: "math", client: scriptedClient("math", () => "4") });

    expect(await processor.process("2 + 2", "math")).toBe("4");
    expect(router.calls).toBe(0);
    const routed = lines.filter((line) => line.includes("Routing query to"));
    expect(routed).toHaveLength(1);
    expect(routed[0]).toMatch(/Routing query to math \(confidence: 1\.00\)$/);
  });

  test("unknown target", async () => {
    const { directory, processor } = setup(throwingRouter());
    directory.add({ name: "math", client: scriptedClient("math", () => "4") });
    expect(await processor.process("q", "poet")).toBe("Error: Agent 'poet' not found in network");
  });

  test("router returning no agent", async () => {
    const { directory, processor } = setup(fixedRouter({ agent: null, confidence: 0 }));
    directory.add({ name: "math", client: scriptedClient("math", () => "4") });
    expect(await processor.process("q")).toBe(ROUTING_FAILED_ERROR);
  });

  test("router that throws", async () => {
    const { directory, processor } = setup(throwingRouter());
    directory.add({ name: "math", client: scriptedClient("math", () => "4") });
    expect(await processor.process("q")).toBe("Error: Failed to route query to an agent");
  });

  test("async routers are awaited", async () => {
    const router: Router = {
      type: "ai",
      route: async () => ({ agent: "math", confidence: 0.9 }),
      rebuild: () => {},
    };
    const { directory, processor } = setup(router);
    directory.add({ name: "math", client: scriptedClient("math", () => "4") });
    expect(await processor.process("q")).toBe("4");
  });

  test("reply without content", async () => {
    const { directory, processor } = setup(fixedRouter({ agent: "mute", confidence: 1 }));
    const mute = scriptedClient("mute", (_text, message): AgentMessage => ({
      id: "r1",
      role: "agent",
      parentId: message.id,
    }));
    directory.add({ name: "mute", client: mute });
    expect(await processor.process("q")).toBe("Error: Received invalid response from mute");
  });

  test("error content is returned as text", async () => {
    const { directory, processor } = setup(fixedRouter({ agent: "grumpy", confidence: 1 }));
    directory.add({
      name: "grumpy",
      client: scriptedClient("grumpy", (_text, message) =>
        createReply(message, { type: "error", message: "cannot comply" }),
      ),
    });
    expect(await processor.process("q")).toBe("cannot comply");
  });

  test("transport failure", async () => {
    const { directory, processor } = setup(fixedRouter({ agent: "down", confidence: 1 }));
    directory.add({
      name: "down",
      client: scriptedClient("down", () => {
        throw new AgentTransportError("down", "Cannot reach down at test://down: connection refused");
      }),
    });
    expect(await processor.process("q")).toBe(
      "Error: Failed to process query with agent down: Cannot reach down at test://down: connection refused",
    );
  });

  test("router is read on every query", async () => {
    let current = fixedRouter({ agent: "a", confidence: 1 });
    const directory = new AgentDirectory();
    const processor = new QueryProcessor({ directory, router: () => current });
    directory.add({ name: "a", client: scriptedClient("a", () => "from a") });
    directory.add({ name: "b", client: scriptedClient("b", () => "from b") });

    expect(await processor.process("q")).toBe("from a");
    current = fixedRouter({ agent: "b", confidence: 1 });
    expect(await processor.process("q")).toBe("from b");
  });
});

describe("QueryProcessor.route", () => {
  test("empty directory never consults the router", async () => {
    const router = throwingRouter();
    const { processor } = setup(router);
    expect(await processor.route("q")).toEqual({ agent: null, confidence: 0 });
    expect(router.calls).toBe(0);
  });
});
