/**
 * SQLite Document Store
 *
 * Documents and their ordered segments in better-sqlite3. Implements the
 * SegmentStore read side consumed by the context cache; writes come from
 * the document processor.
 */

import type Database from "better-sqlite3";
import type { ILogger } from "@docprime/shared/logging";
import { createComponentLogger } from "../logging.js";
import { PermissionError } from "../errors.js";
import type { DocumentRecord, DocumentSummary, NewDocument, SegmentStore } from "./types.js";

interface DocumentRow {
  id: string;
  name: string;
  type: string;
  user_id: string;
  created_at: number;
}

interface DocumentSummaryRow extends DocumentRow {
  chunk_count: number;
}

function rowToRecord(row: DocumentRow): DocumentRecord {
  return {
    id: row.id,
    name: row.name,
    format: row.type,
    userId: row.user_id,
    createdAt: row.created_at,
  };
}

export class SqliteDocumentStore implements SegmentStore {
  private log: ILogger;
  private now: () => number;

  constructor(private db: Database.Database, options: { logger?: ILogger; now?: () => number } = {}) {
    this.log = options.logger || createComponentLogger("documents");
    this.now = options.now || Date.now;
  }

  /**
   * Insert or replace a document. Existing segments are rewritten so the
   * stored order always matches `doc.segments`.
   */
  saveDocument(doc: NewDocument): DocumentRecord {
    const createdAt = Math.floor(this.now() / 1000);

    const insertDoc = this.db.prepare<[string, string, string, string, number]>(
      "INSERT OR REPLACE INTO documents (id, name, type, user_id, created_at) VALUES (?, ?, ?, ?, ?)"
    );
    const clearChunks = this.db.prepare<[string]>("DELETE FROM document_chunks WHERE document_id = ?");
    const insertChunk = this.db.prepare<[string, string, number, string]>(
      "INSERT INTO document_chunks (id, document_id, chunk_index, content) VALUES (?, ?, ?, ?)"
    );

    const txn = this.db.transaction(() => {
      clearChunks.run(doc.id);
      insertDoc.run(doc.id, doc.name, doc.format, doc.userId, createdAt);
      doc.segments.forEach((segment, index) => {
        insertChunk.run(`${doc.id}_chunk_${index}`, doc.id, index, segment);
      });
    });
    txn();

    this.log.info(`Document ${doc.id} stored with ${doc.segments.length} segment(s)`, {
      documentId: doc.id,
      userId: doc.userId,
    });

    return { id: doc.id, name: doc.name, format: doc.format, userId: doc.userId, createdAt };
  }

  async getSegments(documentId: string, userId?: string): Promise<string[]> {
    try {
      this.assertAccess(documentId, userId);
    } catch (err) {
      if (err instanceof PermissionError) {
        this.log.warn(err.message, { documentId, userId });
        return [];
      }
      throw err;
    }

    const rows = this.db
      .prepare<[string], { content: string }>(
        "SELECT content FROM document_chunks WHERE document_id = ? ORDER BY chunk_index"
      )
      .all(documentId);
    return rows.map(row => row.content);
  }

  getDocument(documentId: string): DocumentRecord | undefined {
    const row = this.db
      .prepare<[string], DocumentRow>("SELECT id, name, type, user_id, created_at FROM documents WHERE id = ?")
      .get(documentId);
    return row ? rowToRecord(row) : undefined;
  }

  /** The user's documents with segment counts, newest first. */
  listUserDocuments(userId: string): DocumentSummary[] {
    const rows = this.db
      .prepare<[string], DocumentSummaryRow>(`
        SELECT d.id, d.name, d.type, d.user_id, d.created_at, COUNT(c.id) AS chunk_count
        FROM documents d
        LEFT JOIN document_chunks c ON c.document_id = d.id
        WHERE d.user_id = ?
        GROUP BY d.id
        ORDER BY d.created_at DESC, d.rowid DESC
      `)
      .all(userId);
    return rows.map(row => ({ ...rowToRecord(row), chunkCount: row.chunk_count }));
  }

  /**
   * Delete a document and its segments. Only the owner may delete;
   * returns false for unknown documents and non-owners.
   */
  deleteDocument(documentId: string, userId: string): boolean {
    const owner = this.db
      .prepare<[string], { user_id: string }>("SELECT user_id FROM documents WHERE id = ?")
      .get(documentId);
    if (!owner) return false;
    if (owner.user_id !== userId) {
      this.log.warn(`User ${userId} may not delete document ${documentId}`, { documentId, userId });
      return false;
    }

    const txn = this.db.transaction(() => {
      this.db.prepare<[string]>("DELETE FROM document_chunks WHERE document_id = ?").run(documentId);
      this.db.prepare<[string]>("DELETE FROM documents WHERE id = ?").run(documentId);
    });
    txn();

    this.log.info(`Deleted document ${documentId}`, { documentId, userId });
    return true;
  }

  /** Throws PermissionError when a user is given and does not own the document. */
  private assertAccess(documentId: string, userId?: string): void {
    if (!userId) return;
    const row = this.db
      .prepare<[string, string], { id: string }>("SELECT id FROM documents WHERE id = ? AND user_id = ?")
      .get(documentId, userId);
    if (!row) {
      throw new PermissionError(userId, documentId);
    }
  }
}
