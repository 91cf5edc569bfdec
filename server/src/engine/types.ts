/**
 * Inference Engine Boundary
 *
 * The context cache only ever sees ContextBuilder. Handles are opaque to it:
 * stored, returned, and compared by identity, never inspected.
 */

import type { ConversationMessage } from "../sessions/types.js";

export interface BuildParams {
  /** Greedy decoding (temperature 0) */
  deterministic: boolean;
  /** Tokens to generate while priming; 1 is enough to fill the prefix cache */
  maxNewTokens: number;
}

/**
 * Turns reference text into a reusable context handle.
 * Expensive and fallible; rejects with BuilderError on engine failure.
 * Must not mutate caller state.
 */
export interface ContextBuilder<THandle> {
  build(text: string, params: BuildParams): Promise<THandle>;
}

/** Handle produced by the OpenAI-compatible engine client. */
export interface PrimedContext {
  id: string;
  /** Exact prompt the engine has cached; replayed as the leading system message */
  prompt: string;
  model: string;
  promptTokens: number;
  /** Epoch ms */
  createdAt: number;
}

export interface ChatOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ChatResult {
  message: ConversationMessage;
  model: string;
  finishReason: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
}

/** Generates replies, optionally on top of a primed context. */
export interface ChatEngine {
  chat(messages: ConversationMessage[], context: PrimedContext | undefined, options?: ChatOptions): Promise<ChatResult>;
}

/** What the service needs from a real engine: priming plus chat. */
export type Engine = ContextBuilder<PrimedContext> & ChatEngine;
