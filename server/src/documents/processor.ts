/**
 * Document Processor
 *
 * Turns an upload into text, splits it into segments and stores both.
 * Text formats arrive raw; other formats arrive base64-encoded.
 */

import { promises as fs } from "fs";
import * as path from "path";
import { nanoid } from "nanoid";
import type { ILogger } from "@docprime/shared/logging";
import { createComponentLogger } from "../logging.js";
import { UnsupportedFormatError, errorMessage } from "../errors.js";
import { TextSplitter } from "./splitter.js";
import type { SqliteDocumentStore } from "./store.js";
import type { ProcessDocumentInput, ProcessedDocument } from "./types.js";

const RAW_FORMATS = new Set(["txt", "text"]);
const MARKUP_FORMATS = new Set(["html", "htm"]);
const SUPPORTED_FORMATS = new Set(["txt", "text", "md", "markdown", "html", "htm", "csv", "json"]);

/** Files picked up by ingestDirectory() */
const INGEST_EXTENSIONS = new Set([".md", ".txt"]);

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export type DocumentWriter = Pick<SqliteDocumentStore, "saveDocument">;

export interface DocumentProcessorOptions {
  chunkSize: number;
  chunkOverlap: number;
  logger?: ILogger;
}

export class DocumentProcessor {
  private splitter: TextSplitter;
  private log: ILogger;

  constructor(private store: DocumentWriter, options: DocumentProcessorOptions) {
    this.splitter = new TextSplitter({ chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap });
    this.log = options.logger || createComponentLogger("documents");
  }

  async processDocument(input: ProcessDocumentInput): Promise<ProcessedDocument> {
    const format = input.format.toLowerCase().replace(/^\./, "");
    if (!SUPPORTED_FORMATS.has(format)) {
      throw new UnsupportedFormatError(input.format);
    }

    const documentId = input.id || nanoid();
    const encoding = input.encoding ?? (RAW_FORMATS.has(format) ? "text" : "base64");
    const text = extractText(input.content, format, encoding);
    const chunks = this.splitter.splitText(text);

    this.log.info(`Document loaded and split into ${chunks.length} chunk(s)`, {
      documentId,
      format,
    });

    this.store.saveDocument({
      id: documentId,
      name: input.name,
      format,
      userId: input.userId,
      segments: chunks,
    });

    return { documentId, chunkCount: chunks.length, chunks };
  }

  /**
   * Load every .md/.txt file directly inside `dir` for `userId`. A file that
   * fails to load is logged and skipped.
   */
  async ingestDirectory(dir: string, userId: string): Promise<ProcessedDocument[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    const files = entries
      .filter(entry => entry.isFile() && INGEST_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
      .map(entry => entry.name)
      .sort();

    const results: ProcessedDocument[] = [];
    for (const name of files) {
      try {
        const content = await fs.readFile(path.join(dir, name), "utf-8");
        results.push(await this.processDocument({
          content,
          format: path.extname(name).slice(1),
          encoding: "text",
          name,
          userId,
        }));
      } catch (err) {
        this.log.error(`Failed to ingest ${name}: ${errorMessage(err)}`, err, { dir });
      }
    }

    this.log.info(`Ingested ${results.length} of ${files.length} file(s) from ${dir}`, { userId });
    return results;
  }
}

// ============================================
// TEXT EXTRACTION
// ============================================

function extractText(content: string, format: string, encoding: "text" | "base64"): string {
  const decoded = encoding === "text" ? content : decodeBase64(content);
  return MARKUP_FORMATS.has(format) ? htmlToText(decoded) : decoded;
}

/** Decode base64, or return the content unchanged when it is not base64. */
export function decodeBase64(content: string): string {
  const compact = content.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return content;
  }
  return Buffer.from(compact, "base64").toString("utf-8");
}

const HTML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": "\"",
  "&#39;": "'",
  "&nbsp;": " ",
};

/** Strip tags, scripts and styles; block-level closes become line breaks. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style|noscript)[\s>][\s\S]*?<\/\1>/gi, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|h[1-6]|li|tr|section|article)>/gi, "\n\n")
    .replace(/<[^>]+>/g, "")
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, entity => HTML_ENTITIES[entity] ?? entity)
    .split("\n")
    .map(line => line.trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
