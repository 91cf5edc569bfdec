/**
 * Request Body Schemas
 */

import { z } from "zod";

export const MessageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  name: z.string().optional(),
});

export const ChatCompletionRequestSchema = z.object({
  model: z.string().optional(),
  messages: z.array(MessageSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  stream: z.boolean().optional(),
  user: z.string().optional(),
  session_id: z.string().min(1).optional(),
  document_ids: z.array(z.string().min(1)).optional(),
  context_enabled: z.boolean().default(true),
});


export const DocumentUploadRequestSchema = z.object({
  /** Raw text, or base64 for non-text formats */
  document: z.string(),
  document_type: z.string().min(1),
  document_name: z.string().min(1),
  document_id: z.string().min(1).optional(),
});
