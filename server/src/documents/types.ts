/**
 * Document & Segment Types
 */

/** Read side of document storage, as consumed by the context cache. */
export interface SegmentStore {
  /**
   * Ordered segments of a document. Empty (not an error) for an unknown
   * document, or when userId is given and does not own it.
   */
  getSegments(documentId: string, userId?: string): Promise<string[]>;
}

export interface DocumentRecord {
  id: string;
  name: string;
  /** Format tag: "txt", "md", "html", ... */
  format: string;
  userId: string;
  /** Epoch seconds */
  createdAt: number;
}

export interface DocumentSummary extends DocumentRecord {
  chunkCount: number;
}

export interface NewDocument {
  id: string;
  name: string;
  format: string;
  userId: string;
  segments: string[];
}

export interface ProcessDocumentInput {
  /** Raw text, or base64 for non-text formats */
  content: string;
  format: string;
  /** How `content` is encoded (default: "text" for txt, "base64" otherwise) */
  encoding?: "text" | "base64";
  name: string;
  id?: string;
  userId: string;
}

export interface ProcessedDocument {
  documentId: string;
  chunkCount: number;
  chunks: string[];
}
