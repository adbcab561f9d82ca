/**
 * Logger Tests
 */

import { describe, test, expect } from "vitest";
import { createLogger, createSilentLogger } from "../../src/logger.ts";

function capture(debug = false) {
  const out: string[] = [];
  const err: string[] = [];
  const logger = createLogger({ debug, log: (l) => out.push(l), logError: (l) => err.push(l) });
  return { logger, out, err };
}

describe("createLogger", () => {
  test("child scopes nest with a colon", () => {
    const { logger, out } = capture();
    logger.child("network").child("router").info("rebuilt");
    expect(out).toHaveLength(1);
    expect(out[0]?.endsWith("[network:router] rebuilt")).toBe(true);
  });

  test("extra arguments are appended", () => {
    const { logger, out } = capture();
    logger.info("added", { agent: "math" }, new Error("late"), 3);
    expect(out[0]?.endsWith('added {"agent":"math"} late 3')).toBe(true);
  });

  test("warn and error go to the error sink", () => {
    const { logger, out, err } = capture();
    logger.warn("careful");
    logger.error("broken");
    expect(out).toEqual([]);
    expect(err).toHaveLength(2);
  });

  test("debug only when enabled", () => {
    const quiet = capture();
    quiet.logger.debug("hidden");
    expect(quiet.out).toEqual([]);
    expect(quiet.logger.isDebug()).toBe(false);

    const loud = capture(true);
    loud.logger.debug("shown");
    expect(loud.out).toHaveLength(1);
    expect(loud.logger.child("x").isDebug()).toBe(true);
  });
});

describe("createSilentLogger", () => {
  test("children are silent too", () => {
    const logger = createSilentLogger().child("x");
    expect(logger.isDebug()).toBe(false);
    expect(() => logger.error("nothing")).not.toThrow();
  });
});
