/**
 * Chat Completions Route
 *
 * OpenAI-compatible /v1/chat/completions with session-scoped document
 * context. When document_ids are given the session's context is brought up
 * to date first; if that fails the request is answered without context.
 */

import type { Hono } from "hono";
import { nanoid } from "nanoid";
import type { Services } from "../app.js";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { ChatCompletionRequestSchema } from "./schemas.js";
import { formatIssues, getUserId, readJson } from "./helpers.js";

export function registerChatRoutes(app: Hono, services: Services): void {
  const { cache, engine, registry } = services;
  const log = createComponentLogger("http.chat");

  app.post("/v1/chat/completions", async (c) => {
    const startedAt = Date.now();
    const userId = getUserId(c);

    const parsed = ChatCompletionRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: formatIssues(parsed.error) }, 400);
    }
    const body = parsed.data;
    if (body.stream) {
      return c.json({ error: "Streaming responses are not supported" }, 400);
    }

    const sessionId = body.session_id || nanoid();
    // Ownership first: a foreign caller must not refresh someone else's session
    const existing = registry.peek(sessionId);
    if (existing && existing.userId !== userId) {
      return c.json({ error: `Session ${sessionId} not found` }, 404);
    }
    registry.getOrCreate(sessionId, userId);

    let contextError: string | undefined;
    if (body.context_enabled && body.document_ids && body.document_ids.length > 0) {
      try {
        await cache.ensureReady(sessionId, body.document_ids, userId);
      } catch (err) {
        contextError = errorMessage(err);
        log.warn(`Continuing without document context for session ${sessionId}: ${contextError}`, {
          sessionId,
          documentIds: body.document_ids,
        });
      }
    }

    const context = body.context_enabled ? cache.get(sessionId) : undefined;
    const result = await engine.chat(body.messages, context, {
      model: body.model,
      temperature: body.temperature,
      maxTokens: body.max_tokens,
    });

    registry.recordTurn(sessionId, body.messages, result.message);

    return c.json({
      id: `chatcmpl-${nanoid()}`,
      object: "chat.completion",
      created: Math.floor(Date.now() / 1000),
      model: result.model,
      choices: [
        {
          index: 0,
          message: result.message,
          finish_reason: result.finishReason,
        },
      ],
      usage: {
        prompt_tokens: result.usage.promptTokens,
        completion_tokens: result.usage.completionTokens,
        total_tokens: result.usage.promptTokens + result.usage.completionTokens,
      },
      session_id: sessionId,
      context_enabled: body.context_enabled,
      context_used: context !== undefined,
      ...(contextError ? { context_error: contextError } : {}),
      processing_time: (Date.now() - startedAt) / 1000,
    });
  });
}
