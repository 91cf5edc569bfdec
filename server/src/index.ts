/**
 * docprime Server - Main Entry Point
 *
 * Loads configuration, wires the services and starts the HTTP API and the
 * session sweeper.
 */

import { config as loadEnv } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from project root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
loadEnv({ path: resolve(__dirname, "../../.env") });

import { serve } from "@hono/node-server";
import { loadConfig } from "./config.js";
import { initServerLogging, createComponentLogger, closeServerLogging } from "./logging.js";
import { createServices, createApp, closeServices } from "./app.js";

// ============================================
// CONFIGURATION
// ============================================

const { config, warnings } = loadConfig();

initServerLogging({ minLevel: config.logLevel, logDir: config.logDir });
const log = createComponentLogger("main");

for (const warning of warnings) {
  log.warn(warning);
}

log.info("Configuration loaded", {
  port: config.port,
  engineUrl: config.engine.baseUrl,
  model: config.engine.model,
  sessionTimeoutMs: config.sessionTimeoutMs,
  sweepIntervalMs: config.sweepIntervalMs,
  maxContextTokens: config.maxContextTokens,
  chunkSize: config.chunkSize,
  chunkOverlap: config.chunkOverlap,
});

// ============================================
// SERVICES
// ============================================

const services = createServices(config);
const app = createApp(services);

if (config.knowledgeDir) {
  const knowledgeDir = config.knowledgeDir;
  services.processor.ingestDirectory(knowledgeDir, "anonymous").catch((err: unknown) => {
    log.error(`Failed to ingest documents from ${knowledgeDir}`, err);
  });
}

services.sweeper.start();

// ============================================
// START
// ============================================

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`HTTP API running on http://localhost:${info.port}`);
});

// Graceful shutdown
function shutdown(signal: string): void {
  log.info(`Received ${signal}, shutting down`);
  server.close();
  closeServices(services);
  closeServerLogging().then(
    () => process.exit(0),
    () => process.exit(1)
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
