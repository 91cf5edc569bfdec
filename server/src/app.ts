/**
 * Service Composition
 *
 * Builds the long-lived components once and wires them together. Routes,
 * the sweeper and the process entry receive them from here; nothing else
 * holds module-level state.
 */

import type Database from "better-sqlite3";
import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ServerConfig } from "./config.js";
import { openDatabase } from "./db/index.js";
import { SessionRegistry } from "./sessions/registry.js";
import { SessionSweeper } from "./sessions/sweeper.js";
import { ContextCache } from "./context/cache.js";
import { SqliteDocumentStore } from "./documents/store.js";
import { DocumentProcessor } from "./documents/processor.js";
import { OpenAICompatibleEngine } from "./engine/openai-compatible.js";
import type { Engine, PrimedContext } from "./engine/types.js";
import { createComponentLogger } from "./logging.js";
import { errorMessage } from "./errors.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerChatRoutes } from "./routes/chat.js";
import { registerDocumentRoutes } from "./routes/documents.js";
import { registerSessionRoutes } from "./routes/sessions.js";

export interface Services {
  config: ServerConfig;
  db: Database.Database;
  registry: SessionRegistry;
  cache: ContextCache<PrimedContext>;
  sweeper: SessionSweeper;
  store: SqliteDocumentStore;
  processor: DocumentProcessor;
  engine: Engine;
}

export interface ServiceOverrides {
  /** Use this database instead of opening one in config.dbDir */
  db?: Database.Database;
  engine?: Engine;
  /** Clock, epoch ms (default: Date.now) */
  now?: () => number;
}

export function createServices(config: ServerConfig, overrides: ServiceOverrides = {}): Services {
  const now = overrides.now || Date.now;
  const db = overrides.db || openDatabase(config.dbDir);

  const engine = overrides.engine || new OpenAICompatibleEngine({
    baseUrl: config.engine.baseUrl,
    model: config.engine.model,
    apiKey: config.engine.apiKey,
    requestTimeoutMs: config.buildTimeoutMs,
    now,
  });

  const registry = new SessionRegistry({ now });
  const store = new SqliteDocumentStore(db, { now });
  const processor = new DocumentProcessor(store, {
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
  });
  const cache = new ContextCache<PrimedContext>({
    registry,
    segments: store,
    builder: engine,
    maxContextTokens: config.maxContextTokens,
    buildTimeoutMs: config.buildTimeoutMs,
    now,
  });
  const sweeper = new SessionSweeper(registry, {
    timeoutMs: config.sessionTimeoutMs,
    intervalMs: config.sweepIntervalMs,
    now,
  });

  return { config, db, registry, cache, sweeper, store, processor, engine };
}

/** Stop the sweeper, detach the cache and close the database. */
export function closeServices(services: Services): void {
  services.sweeper.stop();
  services.cache.dispose();
  services.db.close();
}

export function createApp(services: Services): Hono {
  const log = createComponentLogger("http");
  const app = new Hono();

  const origins = services.config.corsOrigins;
  app.use("*", cors({ origin: origins.includes("*") ? "*" : origins }));

  registerHealthRoutes(app, services);
  registerChatRoutes(app, services);
  registerDocumentRoutes(app, services);
  registerSessionRoutes(app, services);

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  app.onError((err, c) => {
    log.error(`Unhandled error on ${c.req.method} ${c.req.path}`, err);
    return c.json({ error: errorMessage(err) }, 500);
  });

  return app;
}
