/**
 * Health & Stats Routes
 */

import type { Hono } from "hono";
import type { Services } from "../app.js";

export const SERVICE_VERSION = "0.1.0";

export function registerHealthRoutes(app: Hono, services: Services): void {
  app.get("/health", (c) => c.json({ status: "ok", version: SERVICE_VERSION }));

  app.get("/stats/context", (c) => c.json(services.cache.stats()));

  app.get("/stats/sessions", (c) => c.json(services.registry.stats()));
}
