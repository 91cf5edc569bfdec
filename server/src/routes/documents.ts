/**
 * Document Routes
 *
 * Upload, list and delete documents for the calling user. Re-uploading or
 * deleting a document clears every cached context built from it.
 */

import type { Hono } from "hono";
import type { Services } from "../app.js";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { DocumentUploadRequestSchema } from "./schemas.js";
import { formatIssues, getUserId, readJson } from "./helpers.js";

export function registerDocumentRoutes(app: Hono, services: Services): void {
  const { cache, processor, store } = services;
  const log = createComponentLogger("http.documents");

  app.post("/v1/documents/upload", async (c) => {
    const userId = getUserId(c);
    const parsed = DocumentUploadRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) {
      return c.json({ error: formatIssues(parsed.error) }, 400);
    }
    const body = parsed.data;

    if (body.document_id) {
      const existing = store.getDocument(body.document_id);
      if (existing && existing.userId !== userId) {
        return c.json({ error: `Document ${body.document_id} belongs to another user` }, 403);
      }
    }

    try {
      const result = await processor.processDocument({
        content: body.document,
        format: body.document_type,
        name: body.document_name,
        id: body.document_id,
        userId,
      });

      const invalidated = cache.invalidateDocument(result.documentId);
      if (invalidated.length > 0) {
        log.info(`Document ${result.documentId} replaced, cleared ${invalidated.length} cached context(s)`, {
          sessionIds: invalidated,
        });
      }

      return c.json({
        success: true,
        document_id: result.documentId,
        chunk_count: result.chunkCount,
        message: "Document uploaded and processed successfully",
      });
    } catch (err) {
      log.error("Error processing document", err, { userId });
      return c.json({ error: `Error processing document: ${errorMessage(err)}` }, 400);
    }
  });

  app.get("/v1/documents", (c) => {
    const documents = store.listUserDocuments(getUserId(c)).map(doc => ({
      id: doc.id,
      name: doc.name,
      type: doc.format,
      created_at: doc.createdAt,
      chunk_count: doc.chunkCount,
    }));
    return c.json({ documents });
  });

  app.delete("/v1/documents/:id", (c) => {
    const documentId = c.req.param("id");
    if (!store.deleteDocument(documentId, getUserId(c))) {
      return c.json({ success: false, error: `Document ${documentId} not found` }, 404);
    }
    cache.invalidateDocument(documentId);
    return c.json({ success: true });
  });
}
