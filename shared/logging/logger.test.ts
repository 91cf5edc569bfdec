/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Logger, RingBuffer, redact, serializeError } from "./logger.js";
import { MemoryTransport } from "./transports/memory.js";
import type { LogLevel, LogTransport } from "./types.js";

function createLogger(minLevel: LogLevel = "trace") {
  const memory = new MemoryTransport();
  const logger = new Logger({ minLevel, component: "test", transports: [memory], historySize: 3 });
  return { logger, memory };
}

// ============================================
// RING BUFFER
// ============================================

describe("RingBuffer", () => {
  it("returns items oldest first before wrapping", () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);
    expect(buffer.toArray()).toEqual([1, 2]);
    expect(buffer.size).toBe(2);
  });

  it("overwrites the oldest item once full", () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach(n => buffer.push(n));
    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.last(2)).toEqual([4, 5]);
    expect(buffer.last(0)).toEqual([]);
  });

  it("clears", () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.clear();
    expect(buffer.toArray()).toEqual([]);
  });
});

// ============================================
// HELPERS
// ============================================

describe("redact", () => {
  it("replaces matching keys at any depth and leaves arrays alone", () => {
    expect(redact(
      { password: "test-secret", nested: { accessToken: "test-secret", tokens: 3 }, ids: ["a"] },
      [/password/i, /token$/i]
    )).toEqual({
      password: "[REDACTED]",
      nested: { accessToken: "[REDACTED]", tokens: 3 },
      ids: ["a"],
    });
  });
});

describe("serializeError", () => {
  it("keeps the cause message", () => {
    const error = new Error("outer", { cause: new Error("inner") });
    expect(serializeError(error)).toMatchObject({ name: "Error", message: "outer", cause: "inner" });
  });

  it("wraps non-Error throwables", () => {
    expect(serializeError("plain string")).toEqual({ name: "NonError", message: "plain string" });
  });
});

// ============================================
// LOGGER
// ============================================

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops entries below the minimum level", () => {
    const { logger, memory } = createLogger("info");
    logger.debug("hidden");
    logger.info("shown");

    expect(memory.messages()).toEqual(["shown"]);
    expect(logger.isLevelEnabled("debug")).toBe(false);
    expect(logger.isLevelEnabled("warn")).toBe(true);
  });

  it("respects each transport's own level", () => {
    const quiet = new MemoryTransport("error");
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [quiet] });
    logger.warn("not for you");
    logger.error("for you");

    expect(quiet.messages()).toEqual(["for you"]);
  });

  it("redacts sensitive keys, including nested ones", () => {
    const { logger, memory } = createLogger();
    logger.info("config", {
      apiKey: "test-secret",
      engine: { authorization: "Bearer test-secret", model: "m" },
      estimatedTokens: 12,
    });

    expect(memory.entries[0].data).toEqual({
      apiKey: "[REDACTED]",
      engine: { authorization: "[REDACTED]", model: "m" },
      estimatedTokens: 12,
    });
  });

  it("serializes errors alongside data", () => {
    const { logger, memory } = createLogger();
    logger.error("failed", new Error("boom"), { documentId: "d1" });

    const entry = memory.entries[0];
    expect(entry.level).toBe("error");
    expect(entry.error).toMatchObject({ name: "Error", message: "boom" });
    expect(entry.data).toEqual({ documentId: "d1" });
  });

  it("stamps a child's component and context on its entries", () => {
    const { logger, memory } = createLogger();
    logger.info("root");
    logger.child({ component: "test.child", sessionId: "s1" }).child({ userId: "alice" }).info("hello");

    expect(memory.entries[0].context).toBeUndefined();
    expect(memory.entries[1].component).toBe("test.child");
    expect(memory.entries[1].context).toEqual({ userId: "alice", sessionId: "s1" });
  });

  it("shares a bounded history with children", () => {
    const { logger } = createLogger();
    logger.info("one");
    logger.child({ component: "test.child" }).info("two");
    expect(logger.getRecentLogs().map(e => e.message)).toEqual(["one", "two"]);

    logger.info("three");
    logger.info("four");
    expect(logger.getRecentLogs().map(e => e.message)).toEqual(["two", "three", "four"]);
    expect(logger.getRecentLogs(1).map(e => e.message)).toEqual(["four"]);
  });

  it("keeps logging when a transport throws", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    const memory = new MemoryTransport();
    const failure = new Error("disk full");
    const broken: LogTransport = {
      name: "broken",
      minLevel: "trace",
      write() {
        throw failure;
      },
    };
    const logger = new Logger({ minLevel: "trace", component: "test", transports: [broken, memory] });

    logger.warn("still here");

    expect(memory.entries).toHaveLength(1);
    expect(consoleError).toHaveBeenCalledWith('[logging] transport "broken" failed:', failure);
  });

  it("finds entries by level and component prefix", () => {
    const { logger, memory } = createLogger();
    logger.child({ component: "server.context" }).warn("a");
    logger.child({ component: "server.sessions" }).warn("b");
    logger.child({ component: "server.context" }).info("c");

    expect(memory.find("warn", "server.context").map(e => e.message)).toEqual(["a"]);
    expect(memory.find("warn")).toHaveLength(2);
  });
});
