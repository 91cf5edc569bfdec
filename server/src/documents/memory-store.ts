/**
 * In-Memory Segment Store
 *
 * Map-backed SegmentStore for tests and for running without a database.
 */

import type { SegmentStore } from "./types.js";

export class InMemorySegmentStore implements SegmentStore {
  private documents = new Map<string, { userId?: string; segments: string[] }>();
  private failing = new Set<string>();
  private stalled = new Set<string>();
  lookups = 0;

  /** Store a document; a document without an owner is readable by anyone */
  set(documentId: string, segments: string[], userId?: string): this {
    this.documents.set(documentId, { userId, segments: [...segments] });
    return this;
  }

  delete(documentId: string): boolean {
    return this.documents.delete(documentId);
  }

  /** Make lookups of this document throw */
  failOn(documentId: string): this {
    this.failing.add(documentId);
    return this;
  }

  /** Make lookups of this document never settle */
  stall(documentId: string): this {
    this.stalled.add(documentId);
    return this;
  }

  async getSegments(documentId: string, userId?: string): Promise<string[]> {
    this.lookups++;
    if (this.stalled.has(documentId)) {
      return new Promise<string[]>(() => {});
    }
    if (this.failing.has(documentId)) {
      throw new Error(`Storage failure reading ${documentId}`);
    }
    const doc = this.documents.get(documentId);
    if (!doc) return [];
    if (userId && doc.userId && doc.userId !== userId) return [];
    return [...doc.segments];
  }
}
