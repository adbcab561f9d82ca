/**
 * Agent Registry Tests
 *
 * Each test gets its own temporary agents directory.
 */

import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import {
  defaultAgentsDir,
  isProcessAlive,
  listRegisteredAgents,
  meshHome,
  pruneStaleAgents,
  registerAgent,
  unregisterAgent,
  type AgentRecord,
} from "../../src/daemon/registry.ts";

function record(name: string, pid = 100): AgentRecord {
  return { name, url: `http://127.0.0.1:50${pid % 100}`, pid, startedAt: "2025-03-01T12:00:00.000Z" };
}

let dir: string;

beforeEach(() => {
  dir = join(mkdtempSync(join(tmpdir(), "agent-mesh-registry-")), "agents");
});

afterEach(() => {
  rmSync(join(dir, ".."), { recursive: true, force: true });
});

describe("registry", () => {
  test("register creates the directory; list is sorted by name", () => {
    registerAgent(record("weather"), dir);
    registerAgent({ ...record("math"), displayName: "Math Agent" }, dir);

    expect(listRegisteredAgents(dir)).toEqual([
      { ...record("math"), displayName: "Math Agent" },
      record("weather"),
    ]);
  });

  test("re-registering replaces the record", () => {
    registerAgent(record("math", 100), dir);
    registerAgent(record("math", 101), dir);
    expect(listRegisteredAgents(dir).map((r) => r.pid)).toEqual([101]);
  });

  test("unregister", () => {
    registerAgent(record("math"), dir);
    expect(unregisterAgent("math", dir)).toBe(true);
    expect(unregisterAgent("math", dir)).toBe(false);
    expect(existsSync(join(dir, "math.json"))).toBe(false);
  });

  test("malformed and foreign files are skipped", () => {
    registerAgent(record("math"), dir);
    writeFileSync(join(dir, "half.json"), "{");
    writeFileSync(join(dir, "other.json"), JSON.stringify({ name: "other" }));
    writeFileSync(join(dir, "notes.txt"), "hello");

    expect(listRegisteredAgents(dir).map((r) => r.name)).toEqual(["math"]);
  });

  test("a missing directory lists nothing", () => {
    expect(listRegisteredAgents(join(dir, "nowhere"))).toEqual([]);
  });

  test("names that would escape the directory are rejected", () => {
    expect(() => registerAgent(record("../evil"), dir)).toThrow("Invalid agent name: ../evil");
  });

  test("pruneStaleAgents removes records of dead processes", () => {
    registerAgent(record("alive", 1), dir);
    registerAgent(record("dead", 2), dir);

    expect(pruneStaleAgents(dir, (pid) => pid === 1)).toEqual(["dead"]);
    expect(listRegisteredAgents(dir).map((r) => r.name)).toEqual(["alive"]);
  });

  test("the current process is alive", () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });
});

describe("mesh home", () => {
  test("AGENT_MESH_HOME overrides the default", () => {
    expect(meshHome({ AGENT_MESH_HOME: "/srv/mesh" })).toBe("/srv/mesh");
    expect(defaultAgentsDir({ AGENT_MESH_HOME: "/srv/mesh" })).toBe("/srv/mesh/agents");
  });

  test("defaults under the home directory", () => {
    expect(meshHome({})).toMatch(/\.agent-mesh$/);
  });
});
