/**
 * HTTP Route Tests
 *
 * Full service graph on an in-memory database; the engine's fetch is stubbed.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { Hono } from "hono";
import { createApp, createServices, closeServices, type Services } from "./app.js";
import { loadConfig } from "./config.js";
import { openDatabase } from "./db/index.js";

type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

const NANOID = /^[A-Za-z0-9_-]{21}$/;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("HTTP API", () => {
  let services: Services;
  let app: Hono;
  let fetchMock: Mock<FetchFn>;
  let primeStatus: number;
  let clock: number;

  function engineCalls(endpoint: "/completions" | "/chat/completions"): RequestInit[] {
    return fetchMock.mock.calls
      .filter(([input]) => new URL(String(input)).pathname === `/v1${endpoint}`)
      .map(([, init]) => init ?? {});
  }

  function post(path: string, body: unknown, userId = "alice"): Promise<Response> {
    return Promise.resolve(app.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-user-id": userId },
      body: JSON.stringify(body),
    }));
  }

  function get(path: string, userId = "alice"): Promise<Response> {
    return Promise.resolve(app.request(path, { headers: { "x-user-id": userId } }));
  }

  function del(path: string, userId = "alice"): Promise<Response> {
    return Promise.resolve(app.request(path, { method: "DELETE", headers: { "x-user-id": userId } }));
  }

  function upload(id: string, text: string, userId = "alice"): Promise<Response> {
    return post("/v1/documents/upload", {
      document: text,
      document_type: "txt",
      document_name: `${id}.txt`,
      document_id: id,
    }, userId);
  }

  function chat(body: Record<string, unknown>, userId = "alice"): Promise<Response> {
    return post("/v1/chat/completions", {
      model: "test-model",
      messages: [{ role: "user", content: "What does the guide say?" }],
      ...body,
    }, userId);
  }

  beforeEach(() => {
    primeStatus = 200;
    fetchMock = vi.fn<FetchFn>(async (input) => {
      const path = new URL(String(input)).pathname;
      if (path === "/v1/completions") {
        return primeStatus === 200
          ? jsonResponse({ id: "cmpl-1", usage: { prompt_tokens: 12 } })
          : new Response("engine down", { status: primeStatus });
      }
      return jsonResponse({
        model: "test-model",
        choices: [{ message: { role: "assistant", content: "It says hello." }, finish_reason: "stop" }],
        usage: { prompt_tokens: 20, completion_tokens: 4 },
      });
    });
    vi.stubGlobal("fetch", fetchMock);

    const { config } = loadConfig({ ENGINE_URL: "http://engine.test/v1" });
    clock = 1_000_000;
    services = createServices(config, { db: openDatabase(":memory:"), now: () => clock });
    app = createApp(services);
  });

  afterEach(() => {
    closeServices(services);
    vi.unstubAllGlobals();
  });

  // ============================================
  // HEALTH & STATS
  // ============================================

  it("reports health", async () => {
    const res = await get("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", version: "0.1.0" });
  });

  it("returns JSON 404 for unknown routes", async () => {
    const res = await get("/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  // ============================================
  // DOCUMENTS
  // ============================================

  describe("documents", () => {
    it("uploads and lists a user's documents", async () => {
      const res = await upload("guide", "Hello from the guide.");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        success: true,
        document_id: "guide",
        chunk_count: 1,
        message: "Document uploaded and processed successfully",
      });

      const list = await get("/v1/documents");
      expect(await list.json()).toEqual({
        documents: [
          { id: "guide", name: "guide.txt", type: "txt", created_at: expect.any(Number), chunk_count: 1 },
        ],
      });

      expect(await (await get("/v1/documents", "bob")).json()).toEqual({ documents: [] });
    });

    it("rejects an invalid upload body", async () => {
      const res = await post("/v1/documents/upload", { document: "x" });
      expect(res.status).toBe(400);
    });

    it("rejects an unsupported format", async () => {
      const res = await post("/v1/documents/upload", {
        document: "JVBERi0=",
        document_type: "pdf",
        document_name: "report.pdf",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Error processing document: Unsupported document format: pdf" });
    });

    it("refuses to overwrite another user's document", async () => {
      await upload("guide", "alice's text");
      const res = await upload("guide", "bob's text", "bob");

      expect(res.status).toBe(403);
      expect(await services.store.getSegments("guide")).toEqual(["alice's text"]);
    });

    it("deletes only the owner's document", async () => {
      await upload("guide", "text");

      expect((await del("/v1/documents/guide", "bob")).status).toBe(404);
      const res = await del("/v1/documents/guide");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ success: true });
      expect(await (await get("/v1/documents")).json()).toEqual({ documents: [] });
    });
  });

  // ============================================
  // CHAT
  // ============================================

  describe("chat completions", () => {
    beforeEach(async () => {
      await upload("guide", "Hello from the guide.");
    });

    it("primes the context once and reuses it across turns", async () => {
      const first = await chat({ session_id: "s1", document_ids: ["guide"] });
      expect(first.status).toBe(200);
      expect(await first.json()).toMatchObject({
        object: "chat.completion",
        model: "test-model",
        choices: [{ index: 0, message: { role: "assistant", content: "It says hello." }, finish_reason: "stop" }],
        usage: { prompt_tokens: 20, completion_tokens: 4, total_tokens: 24 },
        session_id: "s1",
        context_enabled: true,
        context_used: true,
      });

      await chat({ session_id: "s1", document_ids: ["guide"] });

      expect(engineCalls("/completions")).toHaveLength(1);
      const chats = engineCalls("/chat/completions");
      expect(chats).toHaveLength(2);
      const body: unknown = JSON.parse(String(chats[1].body));
      expect(body).toMatchObject({
        messages: [
          {
            role: "system",
            content: "<system>\nThe following are important documents to reference: Hello from the guide.\n</system>",
          },
          { role: "user", content: "What does the guide say?" },
        ],
      });

      expect(await (await get("/stats/context")).json()).toMatchObject({
        activeEntries: 1,
        hits: 1,
        misses: 1,
        builds: 1,
      });
    });

    it("answers without context when priming fails", async () => {
      primeStatus = 500;
      const res = await chat({ session_id: "s1", document_ids: ["guide"] });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        context_used: false,
        context_error: "Context build for session s1 failed: Engine error while priming context: 500 engine down",
      });
      const body: unknown = JSON.parse(String(engineCalls("/chat/completions")[0].body));
      expect(body).toMatchObject({ messages: [{ role: "user", content: "What does the guide say?" }] });
    });

    it("skips the context when disabled", async () => {
      const res = await chat({ session_id: "s1", document_ids: ["guide"], context_enabled: false });

      expect(await res.json()).toMatchObject({ context_enabled: false, context_used: false });
      expect(engineCalls("/completions")).toHaveLength(0);
    });

    it("creates a session when none is given", async () => {
      const res = await chat({});
      expect(await res.json()).toMatchObject({ session_id: expect.stringMatching(NANOID), context_used: false });
      expect(services.registry.size).toBe(1);
    });

    it("rejects an invalid body and streaming", async () => {
      expect((await post("/v1/chat/completions", { messages: [] })).status).toBe(400);
      expect((await chat({ stream: true })).status).toBe(400);
    });

    it("does not let another user continue a session", async () => {
      await chat({ session_id: "s1" });
      const res = await chat({ session_id: "s1" }, "bob");
      expect(res.status).toBe(404);
    });

    it("does not refresh a session for a caller who does not own it", async () => {
      await chat({ session_id: "s1" });
      clock += 60_000;

      expect((await chat({ session_id: "s1" }, "bob")).status).toBe(404);
      expect((await del("/v1/sessions/s1", "bob")).status).toBe(404);

      expect(services.registry.peek("s1")?.lastAccessedAt).toBe(1_000_000);
      expect(engineCalls("/chat/completions")).toHaveLength(1);
    });

    it("rebuilds after the document is replaced", async () => {
      await chat({ session_id: "s1", document_ids: ["guide"] });
      await upload("guide", "Updated guide.");
      await chat({ session_id: "s1", document_ids: ["guide"] });

      expect(engineCalls("/completions")).toHaveLength(2);
    });
  });

  // ============================================
  // SESSIONS
  // ============================================

  describe("sessions", () => {
    it("lists the caller's sessions with their history length", async () => {
      await upload("guide", "Hello from the guide.");
      await chat({ session_id: "s1", document_ids: ["guide"] });
      await chat({ session_id: "s2" }, "bob");

      expect(await (await get("/v1/sessions")).json()).toEqual({
        sessions: [
          {
            sessionId: "s1",
            userId: "alice",
            createdAt: expect.any(Number),
            lastAccessedAt: expect.any(Number),
            conversationLength: 2,
            documentCount: 1,
            documentIds: ["guide"],
          },
        ],
      });
      expect(await (await get("/stats/sessions")).json()).toEqual({
        totalSessions: 2,
        totalUsers: 2,
        sessionsPerUser: { alice: 1, bob: 1 },
      });
    });

    it("deletes a session and its cached context", async () => {
      await upload("guide", "Hello from the guide.");
      await chat({ session_id: "s1", document_ids: ["guide"] });

      expect((await del("/v1/sessions/s1", "bob")).status).toBe(404);
      const res = await del("/v1/sessions/s1");
      expect(res.status).toBe(200);
      expect(services.registry.has("s1")).toBe(false);
      expect(services.cache.get("s1")).toBeUndefined();
    });
  });
});
