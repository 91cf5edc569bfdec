/**
 * Transport Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ConsoleTransport, formatValue } from "./console.js";
import { FileTransport } from "./file.js";
import type { LogEntry, LogLevel } from "../types.js";

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: "2026-01-02T12:04:05.000Z",
    level: "info",
    component: "server",
    message: "Ready",
    ...overrides,
  };
}

// ============================================
// CONSOLE
// ============================================

describe("ConsoleTransport", () => {
  it("writes context and data as key=value pairs", () => {
    const console = new ConsoleTransport({ colors: false });
    const line = console.format(entry({
      level: "warn",
      component: "server.context",
      message: "Context build failed",
      context: { sessionId: "s1" },
      data: { durationMs: 812, reason: "engine down" },
    }));

    expect(line).toBe('12:04:05 WARN  server.context  Context build failed  session=s1 durationMs=812 reason="engine down"');
  });

  it("appends the error on the same line", () => {
    const console = new ConsoleTransport({ colors: false });
    const line = console.format(entry({
      level: "error",
      message: "Failed",
      error: { name: "Error", message: "boom" },
    }));

    expect(line).toBe('12:04:05 ERROR server  Failed  err="Error: boom"');
  });

  it("puts data on indented lines when pretty", () => {
    const console = new ConsoleTransport({ colors: false, pretty: true });
    expect(console.format(entry({ data: { port: 8000 } }))).toBe("12:04:05 INFO  server  Ready\n    port: 8000");
  });

  it("hands the line and level to the output", () => {
    const lines: Array<[string, LogLevel]> = [];
    const console = new ConsoleTransport({ colors: false, output: (line, level) => lines.push([line, level]) });
    console.write(entry());

    expect(lines).toEqual([["12:04:05 INFO  server  Ready", "info"]]);
  });
});

describe("formatValue", () => {
  it("quotes only strings that need it", () => {
    expect(formatValue("s1")).toBe("s1");
    expect(formatValue("a b")).toBe('"a b"');
    expect(formatValue(["d1", "d2"])).toBe('["d1","d2"]');
    expect(formatValue(null)).toBe("null");
    expect(formatValue(false)).toBe("false");
  });
});

// ============================================
// FILE
// ============================================

describe("FileTransport", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "docprime-logs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function readLines(file: string): unknown[] {
    return fs.readFileSync(file, "utf-8").trim().split("\n").map(line => JSON.parse(line));
  }

  it("appends one JSON object per entry", async () => {
    const transport = new FileTransport({ logDir: dir, filename: "server" });
    transport.write(entry({ message: "one" }));
    transport.write(entry({ message: "two", data: { n: 2 } }));
    await transport.close();

    expect(transport.filePath).toBe(path.join(dir, "server.log"));
    expect(readLines(transport.filePath)).toEqual([
      entry({ message: "one" }),
      entry({ message: "two", data: { n: 2 } }),
    ]);
  });

  it("rotates when the file would outgrow its limit and keeps only the newest files", async () => {
    const transport = new FileTransport({ logDir: dir, filename: "server", maxBytes: 1, keep: 1 });
    for (const message of ["first", "second", "third"]) {
      transport.write(entry({ message }));
      await transport.flush();
    }
    await transport.close();

    expect(readLines(transport.filePath)).toEqual([entry({ message: "third" })]);
    expect(readLines(transport.rotatedPath(1))).toEqual([entry({ message: "second" })]);
    expect(fs.existsSync(transport.rotatedPath(2))).toBe(false);
  });

  it("drops entries after close", async () => {
    const transport = new FileTransport({ logDir: dir });
    await transport.close();
    transport.write(entry());

    expect(fs.readFileSync(path.join(dir, "docprime.log"), "utf-8")).toBe("");
  });
});
