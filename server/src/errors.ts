/**
 * Error Types
 *
 * NotFoundError and PermissionError are thrown only at internal seams; the
 * public surfaces convert them to undefined / false / empty results.
 */

export class NotFoundError extends Error {
  public kind: "session" | "document";
  public id: string;

  constructor(kind: "session" | "document", id: string) {
    super(`${kind} ${id} not found`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

export class PermissionError extends Error {
  public userId: string;
  public documentId: string;

  constructor(userId: string, documentId: string) {
    super(`User ${userId} does not have access to document ${documentId}`);
    this.name = "PermissionError";
    this.userId = userId;
    this.documentId = documentId;
  }
}

/** The requested document set resolved to zero usable segments. */
export class NoContentError extends Error {
  public sessionId: string;
  public documentIds: string[];

  constructor(sessionId: string, documentIds: string[]) {
    super(`No content available for session ${sessionId} (documents: ${documentIds.join(", ") || "none"})`);
    this.name = "NoContentError";
    this.sessionId = sessionId;
    this.documentIds = documentIds;
  }
}

/** Raised by a context builder implementation when the engine fails. */
export class BuilderError extends Error {
  public status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "BuilderError";
    this.status = options?.status;
  }
}

/** A context rebuild failed or ran past its deadline. */
export class BuildError extends Error {
  public sessionId: string;
  public timedOut: boolean;

  constructor(sessionId: string, message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(message, { cause: options?.cause });
    this.name = "BuildError";
    this.sessionId = sessionId;
    this.timedOut = options?.timedOut ?? false;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** An upload whose format the processor cannot turn into text. */
export class UnsupportedFormatError extends Error {
  public format: string;

  constructor(format: string) {
    super(`Unsupported document format: ${format}`);
    this.name = "UnsupportedFormatError";
    this.format = format;
  }
}
