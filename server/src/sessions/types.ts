/**
 * Session Types
 */

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  name?: string;
}

/**
 * A conversation session. Owned by the SessionRegistry; callers get the live
 * object but should mutate it only through registry methods.
 */
export interface Session {
  id: string;
  userId: string;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms, bumped on every registry read or write */
  lastAccessedAt: number;
  /** Append-only */
  history: ConversationMessage[];
  /** Document IDs bound to this session */
  documentIds: Set<string>;
}

export interface SessionSummary {
  sessionId: string;
  userId: string;
  createdAt: number;
  lastAccessedAt: number;
  conversationLength: number;
  documentCount: number;
  documentIds: string[];
}

export interface SessionRegistryStats {
  totalSessions: number;
  totalUsers: number;
  sessionsPerUser: Record<string, number>;
}

export type SessionDeletedListener = (session: Session) => void;
