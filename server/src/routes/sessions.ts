/**
 * Session Routes
 *
 * Listing and deletion are scoped to the calling user. Deleting a session
 * drops its cached context through the registry's deletion hook.
 */

import type { Hono } from "hono";
import type { Services } from "../app.js";
import { getUserId } from "./helpers.js";

export function registerSessionRoutes(app: Hono, services: Services): void {
  const { registry } = services;

  app.get("/v1/sessions", (c) => {
    return c.json({ sessions: registry.listForUser(getUserId(c)) });
  });

  app.delete("/v1/sessions/:id", (c) => {
    const sessionId = c.req.param("id");
    const session = registry.peek(sessionId);
    if (!session || session.userId !== getUserId(c)) {
      return c.json({ success: false, error: `Session ${sessionId} not found` }, 404);
    }
    registry.delete(sessionId);
    return c.json({ success: true });
  });
}
