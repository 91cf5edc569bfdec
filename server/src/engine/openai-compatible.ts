/**
 * OpenAI-Compatible Engine Client
 *
 * Primes the engine's prefix cache with the document prompt via
 * /completions, then replays that exact prompt as the leading system message
 * of every /chat/completions call so the engine can reuse the cached prefix.
 * Works with vLLM, llama.cpp server, LM Studio and other servers that speak
 * the OpenAI API.
 */

import { nanoid } from "nanoid";
import { z } from "zod";
import type { ILogger } from "@docprime/shared/logging";
import { createComponentLogger } from "../logging.js";
import { BuilderError, errorMessage } from "../errors.js";
import type { ConversationMessage } from "../sessions/types.js";
import type {
  BuildParams,
  ChatEngine,
  ChatOptions,
  ChatResult,
  ContextBuilder,
  PrimedContext,
} from "./types.js";

const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

const UsageSchema = z.object({
  prompt_tokens: z.number().optional(),
  completion_tokens: z.number().optional(),
});

const CompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  usage: UsageSchema.optional(),
});

const ChatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable().optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })).min(1),
  usage: UsageSchema.optional(),
});

export interface OpenAICompatibleEngineOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  /** Per-request HTTP deadline */
  requestTimeoutMs?: number;
  logger?: ILogger;
  now?: () => number;
}

/** Wrap document text the way the engine sees it in every request. */
export function formatContextPrompt(text: string): string {
  return `<system>\nThe following are important documents to reference: ${text}\n</system>`;
}

export class OpenAICompatibleEngine implements ContextBuilder<PrimedContext>, ChatEngine {
  private baseUrl: string;
  private model: string;
  private apiKey: string;
  private requestTimeoutMs: number;
  private log: ILogger;
  private now: () => number;

  constructor(options: OpenAICompatibleEngineOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.apiKey = options.apiKey || "";
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.log = options.logger || createComponentLogger("engine");
    this.now = options.now || Date.now;
  }

  // ============================================
  // CONTEXT BUILDING
  // ============================================

  async build(text: string, params: BuildParams): Promise<PrimedContext> {
    const prompt = formatContextPrompt(text);
    const body = {
      model: this.model,
      prompt,
      max_tokens: params.maxNewTokens,
      temperature: params.deterministic ? 0 : 0.7,
      stream: false,
    };

    let response: Response;
    try {
      response = await this.post("/completions", body);
    } catch (err) {
      throw new BuilderError(`Engine unreachable at ${this.baseUrl}: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new BuilderError(
        `Engine error while priming context: ${response.status} ${await response.text()}`,
        { status: response.status }
      );
    }

    const parsed = CompletionResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BuilderError(`Unexpected /completions response: ${parsed.error.message}`);
    }

    const context: PrimedContext = {
      id: parsed.data.id || nanoid(),
      prompt,
      model: parsed.data.model || this.model,
      promptTokens: parsed.data.usage?.prompt_tokens || 0,
      createdAt: this.now(),
    };
    this.log.debug(`Primed context ${context.id}`, { promptTokens: context.promptTokens, model: context.model });
    return context;
  }

  // ============================================
  // CHAT
  // ============================================

  async chat(
    messages: ConversationMessage[],
    context: PrimedContext | undefined,
    options?: ChatOptions
  ): Promise<ChatResult> {
    const model = options?.model || context?.model || this.model;
    const outgoing = context
      ? [{ role: "system", content: context.prompt }, ...messages]
      : messages;

    const response = await this.post("/chat/completions", {
      model,
      messages: outgoing.map(m => ({ role: m.role, content: m.content })),
      temperature: options?.temperature ?? 0.7,
      max_tokens: options?.maxTokens ?? 1024,
      stream: false,
    });

    if (!response.ok) {
      throw new Error(`Engine API error: ${response.status} ${await response.text()}`);
    }

    const parsed = ChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected /chat/completions response: ${parsed.error.message}`);
    }

    const choice = parsed.data.choices[0];
    return {
      message: { role: "assistant", content: choice.message.content || "" },
      model: parsed.data.model || model,
      finishReason: choice.finish_reason || "stop",
      usage: {
        promptTokens: parsed.data.usage?.prompt_tokens || 0,
        completionTokens: parsed.data.usage?.completion_tokens || 0,
      },
    };
  }

  private post(endpoint: string, body: unknown): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    return fetch(`${this.baseUrl}${endpoint}`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
  }
}
