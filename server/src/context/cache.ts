/**
 * Context Cache
 *
 * Maps each session to the context handle built from its current document
 * set, and decides per request whether that handle can be reused.
 *
 * Concurrency model:
 * - Entry swaps, in-flight markers and registry writes happen in synchronous
 *   code with no await in between, which makes each of them atomic on Node's
 *   event loop.
 * - Segment fetches and builder calls are the only suspension points. They run
 *   outside those sections, so one session's rebuild never blocks another's.
 * - At most one rebuild per session is in flight. Callers asking for the same
 *   document set share its promise; callers asking for a different set wait
 *   for it to settle and then re-evaluate (last write wins).
 */

import type { ILogger } from "@docprime/shared/logging";
import { createComponentLogger } from "../logging.js";
import { BuildError, NoContentError, errorMessage } from "../errors.js";
import { TimeoutError, withTimeout } from "../utils/timeout.js";
import { CHARS_PER_TOKEN, estimateTokens } from "../utils/tokens.js";
import type { BuildParams, ContextBuilder } from "../engine/types.js";
import type { SegmentStore } from "../documents/types.js";
import type { SessionRegistry } from "../sessions/registry.js";
import type { CachedContextEntry, ContextCacheOptions, ContextCacheStats } from "./types.js";

export const SEGMENT_SEPARATOR = "\n\n";

const BUILD_PARAMS: BuildParams = { deterministic: true, maxNewTokens: 1 };

interface InFlightBuild {
  buildId: number;
  documentIds: ReadonlySet<string>;
  promise: Promise<void>;
}

interface AssembledContext {
  text: string;
  segmentCount: number;
  droppedSegments: number;
  estimatedTokens: number;
}

interface PreparedContext<THandle> {
  handle: THandle;
  assembled: AssembledContext;
  buildDurationMs: number;
}

export class ContextCache<THandle> {
  private entries = new Map<string, CachedContextEntry<THandle>>();
  private inflight = new Map<string, InFlightBuild>();
  private buildSeq = 0;
  private counters = { hits: 0, misses: 0, builds: 0, failures: 0 };

  private registry: SessionRegistry;
  private segments: SegmentStore;
  private builder: ContextBuilder<THandle>;
  private maxContextTokens: number;
  private buildTimeoutMs: number;
  private log: ILogger;
  private now: () => number;
  private unsubscribe: () => void;

  constructor(options: ContextCacheOptions<THandle>) {
    this.registry = options.registry;
    this.segments = options.segments;
    this.builder = options.builder;
    this.maxContextTokens = options.maxContextTokens;
    this.buildTimeoutMs = options.buildTimeoutMs;
    this.log = options.logger || createComponentLogger("context");
    this.now = options.now || Date.now;

    // Session deletion (explicit or swept) drops the cached context
    this.unsubscribe = this.registry.onSessionDeleted(session => this.clear(session.id));
  }

  // ============================================
  // ENSURE READY
  // ============================================

  /**
   * Make sure the session's cached context was built from exactly
   * `documentIds` (compared as a set). Rejects with NoContentError when the
   * documents yield no segments, and with BuildError when the segment fetch
   * plus build fails or outlasts `buildTimeoutMs`, or when the session is
   * cleared or deleted before the result can be installed. A failed or timed-out
   * build leaves the previous entry and fingerprint as they were.
   */
  async ensureReady(sessionId: string, documentIds: string[], userId: string): Promise<void> {
    const requested = uniqueIds(documentIds);
    const fingerprint: ReadonlySet<string> = new Set(requested);

    for (;;) {
      this.registry.getOrCreate(sessionId, userId);

      const flight = this.inflight.get(sessionId);
      if (flight) {
        if (sameSet(flight.documentIds, fingerprint)) {
          this.log.debug(`Joining in-flight build for session ${sessionId}`, { sessionId });
          return flight.promise;
        }
        // A different set is being built: let it finish, then look again.
        // Its outcome is reported to its own callers.
        await flight.promise.then(noop, noop);
        continue;
      }

      const entry = this.entries.get(sessionId);
      if (entry && sameSet(entry.documentIds, fingerprint)) {
        this.counters.hits++;
        this.log.debug(`Context already built for session ${sessionId}`, { sessionId });
        return;
      }

      this.counters.misses++;
      return this.startRebuild(sessionId, requested, fingerprint, userId);
    }
  }

  private startRebuild(
    sessionId: string,
    requested: string[],
    fingerprint: ReadonlySet<string>,
    userId: string
  ): Promise<void> {
    const buildId = ++this.buildSeq;
    const promise = this.rebuild(buildId, sessionId, requested, fingerprint, userId).finally(() => {
      if (this.inflight.get(sessionId)?.buildId === buildId) {
        this.inflight.delete(sessionId);
      }
    });
    this.inflight.set(sessionId, { buildId, documentIds: fingerprint, promise });
    return promise;
  }

  private async rebuild(
    buildId: number,
    sessionId: string,
    requested: string[],
    fingerprint: ReadonlySet<string>,
    userId: string
  ): Promise<void> {
    // One deadline covers the segment fetch and the builder call
    let prepared: PreparedContext<THandle>;
    try {
      prepared = await withTimeout(
        this.prepare(sessionId, requested, userId),
        this.buildTimeoutMs,
        "Context build"
      );
    } catch (err) {
      if (err instanceof NoContentError) throw err;
      this.counters.failures++;
      const timedOut = err instanceof TimeoutError;
      this.log.error(`Context build failed for session ${sessionId}`, err, { sessionId, timedOut });
      throw new BuildError(
        sessionId,
        timedOut
          ? `Context build for session ${sessionId} timed out after ${this.buildTimeoutMs}ms`
          : `Context build for session ${sessionId} failed: ${errorMessage(err)}`,
        { cause: err, timedOut }
      );
    }

    // Cleared or deleted while building: the result must not resurrect it
    if (this.inflight.get(sessionId)?.buildId !== buildId || !this.registry.has(sessionId)) {
      const reason = this.registry.has(sessionId) ? "cleared" : "deleted";
      this.log.warn(`Discarding context built for session ${sessionId}: session was ${reason} during the build`, {
        sessionId,
      });
      throw new BuildError(sessionId, `Context for session ${sessionId} was ${reason} during the build`);
    }

    const { handle, assembled, buildDurationMs } = prepared;
    this.entries.set(sessionId, {
      sessionId,
      handle,
      documentIds: fingerprint,
      builtAt: this.now(),
      buildDurationMs,
      estimatedTokens: assembled.estimatedTokens,
      segmentCount: assembled.segmentCount,
    });
    this.registry.replaceDocuments(sessionId, requested);
    this.counters.builds++;

    this.log.info(`Context built for session ${sessionId}`, {
      sessionId,
      buildDurationMs,
      documentIds: requested,
    });
  }

  /** Segments to text to handle; rejects with NoContentError when nothing is left to build from */
  private async prepare(sessionId: string, requested: string[], userId: string): Promise<PreparedContext<THandle>> {
    const perDocument = await this.collectSegments(sessionId, requested, userId);
    const assembled = this.assemble(sessionId, perDocument);

    if (assembled.segmentCount === 0) {
      this.log.warn(`No document segments found to load for session ${sessionId}`, {
        sessionId,
        documentIds: requested,
      });
      throw new NoContentError(sessionId, requested);
    }

    this.log.info(`Building context for session ${sessionId}`, {
      sessionId,
      documentIds: requested,
      segmentCount: assembled.segmentCount,
      estimatedTokens: assembled.estimatedTokens,
    });

    const startedAt = this.now();
    const handle = await this.builder.build(assembled.text, BUILD_PARAMS);
    return { handle, assembled, buildDurationMs: this.now() - startedAt };
  }

  /**
   * Fetch segments for every document, in request order. A document with no
   * segments, or whose lookup throws, is logged and skipped.
   */
  private async collectSegments(sessionId: string, documentIds: string[], userId: string): Promise<string[][]> {
    return Promise.all(documentIds.map(async (documentId) => {
      try {
        const segments = await this.segments.getSegments(documentId, userId);
        if (segments.length === 0) {
          this.log.warn(`Document ${documentId} not found or has no segments, skipping`, {
            sessionId,
            documentId,
          });
        }
        return segments;
      } catch (err) {
        this.log.error(`Failed to load segments for document ${documentId}, skipping`, err, {
          sessionId,
          documentId,
        });
        return [];
      }
    }));
  }

  /**
   * Join segments document-then-chunk with blank lines, stopping before the
   * estimated token budget is exceeded.
   */
  private assemble(sessionId: string, perDocument: string[][]): AssembledContext {
    const kept: string[] = [];
    let length = 0;
    let droppedSegments = 0;

    for (const segment of perDocument.flat()) {
      const nextLength = kept.length === 0 ? segment.length : length + SEGMENT_SEPARATOR.length + segment.length;
      if (droppedSegments > 0 || Math.ceil(nextLength / CHARS_PER_TOKEN) > this.maxContextTokens) {
        droppedSegments++;
        continue;
      }
      kept.push(segment);
      length = nextLength;
    }

    if (droppedSegments > 0) {
      this.log.warn(`Context token budget reached for session ${sessionId}, dropped ${droppedSegments} segment(s)`, {
        sessionId,
        maxContextTokens: this.maxContextTokens,
        keptSegments: kept.length,
      });
    }

    const text = kept.join(SEGMENT_SEPARATOR);
    return {
      text,
      segmentCount: kept.length,
      droppedSegments,
      estimatedTokens: estimateTokens(text),
    };
  }

  // ============================================
  // READS & INVALIDATION
  // ============================================

  get(sessionId: string): THandle | undefined {
    return this.entries.get(sessionId)?.handle;
  }

  getEntry(sessionId: string): CachedContextEntry<THandle> | undefined {
    return this.entries.get(sessionId);
  }

  isBuilding(sessionId: string): boolean {
    return this.inflight.has(sessionId);
  }

  /**
   * Drop the session's entry and fingerprint. An in-flight rebuild is
   * detached: it still settles for its callers but will not install.
   */
  clear(sessionId: string): void {
    const hadEntry = this.entries.delete(sessionId);
    const hadFlight = this.inflight.delete(sessionId);
    if (hadEntry || hadFlight) {
      this.log.info(`Cleared context for session ${sessionId}`, { sessionId });
    }
  }

  /**
   * Clear every entry built from `documentId`, so the next ensureReady
   * rebuilds from the document's current segments. Returns the cleared
   * session IDs.
   */
  invalidateDocument(documentId: string): string[] {
    const affected: string[] = [];
    for (const [sessionId, entry] of this.entries) {
      if (entry.documentIds.has(documentId)) affected.push(sessionId);
    }
    for (const [sessionId, flight] of this.inflight) {
      if (flight.documentIds.has(documentId) && !affected.includes(sessionId)) affected.push(sessionId);
    }
    for (const sessionId of affected) {
      this.clear(sessionId);
    }
    return affected;
  }

  stats(): ContextCacheStats {
    const perSessionDocumentCounts: Record<string, number> = {};
    let totalDocumentBindings = 0;
    for (const [sessionId, entry] of this.entries) {
      perSessionDocumentCounts[sessionId] = entry.documentIds.size;
      totalDocumentBindings += entry.documentIds.size;
    }
    return {
      activeEntries: this.entries.size,
      totalDocumentBindings,
      perSessionDocumentCounts,
      buildsInFlight: this.inflight.size,
      ...this.counters,
    };
  }

  /** Detach from the registry's deletion hook. */
  dispose(): void {
    this.unsubscribe();
  }
}

// ============================================
// HELPERS
// ============================================

function noop(): void {}

/** De-duplicate, keeping first occurrence order */
export function uniqueIds(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids));
}

export function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const id of a) {
    if (!b.has(id)) return false;
  }
  return true;
}
