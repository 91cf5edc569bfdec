/**
 * SQLite Document Store Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type Database from "better-sqlite3";
import type { MemoryTransport } from "@docprime/shared/logging";
import { openDatabase } from "../db/index.js";
import { runMigrations } from "../db/migrations.js";
import { SqliteDocumentStore } from "./store.js";
import { createTestLogger } from "../utils/test-logger.js";

describe("SqliteDocumentStore", () => {
  let db: Database.Database;
  let store: SqliteDocumentStore;
  let memory: MemoryTransport;
  let clock: number;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    db = openDatabase(":memory:");
    const test = createTestLogger();
    memory = test.memory;
    store = new SqliteDocumentStore(db, { logger: test.logger, now: () => clock });
  });

  afterEach(() => {
    db.close();
  });

  function countChunks(): number {
    return db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM document_chunks").get()?.n ?? -1;
  }

  // ============================================
  // WRITE & READ
  // ============================================

  it("stores segments and returns them in order", async () => {
    const record = store.saveDocument({
      id: "d1",
      name: "guide.txt",
      format: "txt",
      userId: "alice",
      segments: ["first", "second", "third"],
    });

    expect(record).toEqual({ id: "d1", name: "guide.txt", format: "txt", userId: "alice", createdAt: 1_700_000_000 });
    expect(await store.getSegments("d1", "alice")).toEqual(["first", "second", "third"]);
    expect(store.getDocument("d1")).toEqual(record);
  });

  it("rewrites segments when a document is saved again", async () => {
    store.saveDocument({ id: "d1", name: "v1", format: "txt", userId: "alice", segments: ["a", "b", "c"] });
    store.saveDocument({ id: "d1", name: "v2", format: "txt", userId: "alice", segments: ["z"] });

    expect(await store.getSegments("d1")).toEqual(["z"]);
    expect(store.getDocument("d1")?.name).toBe("v2");
    expect(countChunks()).toBe(1);
  });

  it("returns nothing for an unknown document", async () => {
    expect(await store.getSegments("missing")).toEqual([]);
    expect(store.getDocument("missing")).toBeUndefined();
  });

  // ============================================
  // OWNERSHIP
  // ============================================

  describe("ownership", () => {
    beforeEach(() => {
      store.saveDocument({ id: "d1", name: "notes", format: "md", userId: "alice", segments: ["secret plan"] });
    });

    it("hides segments from other users", async () => {
      expect(await store.getSegments("d1", "bob")).toEqual([]);
      expect(memory.find("warn").map(e => e.message)).toEqual([
        "User bob does not have access to document d1",
      ]);
    });

    it("skips the check when no user is given", async () => {
      expect(await store.getSegments("d1")).toEqual(["secret plan"]);
    });

    it("only lets the owner delete", async () => {
      expect(store.deleteDocument("d1", "bob")).toBe(false);
      expect(await store.getSegments("d1")).toEqual(["secret plan"]);

      expect(store.deleteDocument("d1", "alice")).toBe(true);
      expect(store.getDocument("d1")).toBeUndefined();
      expect(countChunks()).toBe(0);
    });

    it("reports false when deleting an unknown document", () => {
      expect(store.deleteDocument("missing", "alice")).toBe(false);
    });
  });

  // ============================================
  // LISTING
  // ============================================

  it("lists a user's documents newest first with segment counts", () => {
    store.saveDocument({ id: "old", name: "old.txt", format: "txt", userId: "alice", segments: ["1", "2"] });
    clock += 60_000;
    store.saveDocument({ id: "new", name: "new.md", format: "md", userId: "alice", segments: ["1"] });
    store.saveDocument({ id: "other", name: "x", format: "txt", userId: "bob", segments: ["1"] });

    expect(store.listUserDocuments("alice")).toEqual([
      { id: "new", name: "new.md", format: "md", userId: "alice", createdAt: 1_700_000_060, chunkCount: 1 },
      { id: "old", name: "old.txt", format: "txt", userId: "alice", createdAt: 1_700_000_000, chunkCount: 2 },
    ]);
    expect(store.listUserDocuments("nobody")).toEqual([]);
  });

  it("counts zero segments for an empty document", () => {
    store.saveDocument({ id: "empty", name: "empty.txt", format: "txt", userId: "alice", segments: [] });
    expect(store.listUserDocuments("alice")[0].chunkCount).toBe(0);
  });
});

describe("runMigrations", () => {
  it("is a no-op on an up-to-date database", () => {
    const db = openDatabase(":memory:");
    const version = runMigrations(db);

    expect(runMigrations(db)).toBe(version);
    const applied = db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM schema_version").get();
    expect(applied?.n).toBe(version + 1);
    db.close();
  });
});
