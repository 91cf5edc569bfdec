/**
 * Session Registry
 *
 * Owns session identity, lifecycle, conversation history and the set of
 * documents bound to each session. Two tables: sessions by ID, and a
 * user -> session IDs index.
 *
 * Every method is synchronous. Node runs each call to completion before any
 * other request code, so a call is one critical section: a session cannot be
 * swept and touched in the same instant.
 *
 * The registry never triggers cache rebuilds. The ContextCache reads it and
 * subscribes to deletions through onSessionDeleted().
 */

import type { ILogger } from "@docprime/shared/logging";
import { createComponentLogger } from "../logging.js";
import type {
  ConversationMessage,
  Session,
  SessionDeletedListener,
  SessionRegistryStats,
  SessionSummary,
} from "./types.js";

export interface SessionRegistryOptions {
  logger?: ILogger;
  /** Clock, epoch ms (default: Date.now) */
  now?: () => number;
}

export class SessionRegistry {
  private sessions = new Map<string, Session>();
  private userSessions = new Map<string, Set<string>>();
  private deletedListeners = new Set<SessionDeletedListener>();
  private log: ILogger;
  private now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.log = options.logger || createComponentLogger("sessions");
    this.now = options.now || Date.now;
  }

  // ============================================
  // LOOKUP
  // ============================================

  /**
   * Return the session, bumping last-access, or create it for the given user.
   * An existing session keeps its original owner.
   */
  getOrCreate(sessionId: string, userId: string): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.lastAccessedAt = this.now();
      return existing;
    }

    const now = this.now();
    const session: Session = {
      id: sessionId,
      userId,
      createdAt: now,
      lastAccessedAt: now,
      history: [],
      documentIds: new Set(),
    };

    this.sessions.set(sessionId, session);
    let owned = this.userSessions.get(userId);
    if (!owned) {
      owned = new Set();
      this.userSessions.set(userId, owned);
    }
    owned.add(sessionId);

    this.log.info(`Created session ${sessionId}`, { sessionId, userId });
    return session;
  }

  /** Lookup that counts as activity: bumps last-access. */
  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastAccessedAt = this.now();
    }
    return session;
  }

  /** Lookup that does not touch recency, for ownership checks. */
  peek(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /** Membership test that does not touch recency. */
  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  // ============================================
  // MUTATION
  // ============================================

  /**
   * Append a request's input messages and the reply to the history.
   * A missing session is a benign race with eviction: warn and return.
   */
  recordTurn(sessionId: string, inputMessages: ConversationMessage[], outputMessage: ConversationMessage): void {
    const session = this.get(sessionId);
    if (!session) {
      this.log.warn(`Session ${sessionId} not found for update`, { sessionId });
      return;
    }

    session.history.push(...inputMessages.map(m => ({ ...m })), { ...outputMessage });
    this.log.debug(`Recorded turn for session ${sessionId}`, {
      sessionId,
      inputMessages: inputMessages.length,
      historyLength: session.history.length,
    });
  }

  /** Union the given IDs into the session's bound set. */
  bindDocuments(sessionId: string, documentIds: Iterable<string>): void {
    const session = this.get(sessionId);
    if (!session) {
      this.log.warn(`Session ${sessionId} not found for document binding`, { sessionId });
      return;
    }
    for (const id of documentIds) {
      session.documentIds.add(id);
    }
  }

  /** Make the given IDs the session's entire bound set. */
  replaceDocuments(sessionId: string, documentIds: Iterable<string>): void {
    const session = this.get(sessionId);
    if (!session) {
      this.log.warn(`Session ${sessionId} not found for document binding`, { sessionId });
      return;
    }
    session.documentIds = new Set(documentIds);
  }

  /**
   * Remove a session and its user index entry. Deletion listeners run
   * synchronously before this returns.
   */
  delete(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    this.sessions.delete(sessionId);
    const owned = this.userSessions.get(session.userId);
    if (owned) {
      owned.delete(sessionId);
      if (owned.size === 0) {
        this.userSessions.delete(session.userId);
      }
    }

    for (const listener of this.deletedListeners) {
      try {
        listener(session);
      } catch (err) {
        this.log.error(`Session deletion listener failed`, err, { sessionId });
      }
    }

    this.log.info(`Deleted session ${sessionId}`, { sessionId, userId: session.userId });
    return true;
  }

  onSessionDeleted(listener: SessionDeletedListener): () => void {
    this.deletedListeners.add(listener);
    return () => {
      this.deletedListeners.delete(listener);
    };
  }

  // ============================================
  // LISTING
  // ============================================

  listForUser(userId: string): SessionSummary[] {
    const owned = this.userSessions.get(userId);
    if (!owned) return [];

    const summaries: SessionSummary[] = [];
    for (const id of owned) {
      const session = this.sessions.get(id);
      if (session) summaries.push(summarize(session));
    }
    return summaries;
  }

  /** Snapshot of all sessions. Does not touch recency. */
  list(): Session[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  stats(): SessionRegistryStats {
    const sessionsPerUser: Record<string, number> = {};
    for (const [userId, ids] of this.userSessions) {
      sessionsPerUser[userId] = ids.size;
    }
    return {
      totalSessions: this.sessions.size,
      totalUsers: this.userSessions.size,
      sessionsPerUser,
    };
  }
}

export function summarize(session: Session): SessionSummary {
  return {
    sessionId: session.id,
    userId: session.userId,
    createdAt: session.createdAt,
    lastAccessedAt: session.lastAccessedAt,
    conversationLength: session.history.length,
    documentCount: session.documentIds.size,
    documentIds: Array.from(session.documentIds),
  };
}
