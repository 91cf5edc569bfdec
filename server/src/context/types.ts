/**
 * Context Cache Types
 */

import type { ILogger } from "@docprime/shared/logging";
import type { ContextBuilder } from "../engine/types.js";
import type { SegmentStore } from "../documents/types.js";
import type { SessionRegistry } from "../sessions/registry.js";

export interface CachedContextEntry<THandle> {
  sessionId: string;
  handle: THandle;
  /** Document IDs the handle was built from; the validity fingerprint */
  documentIds: ReadonlySet<string>;
  /** Epoch ms */
  builtAt: number;
  buildDurationMs: number;
  estimatedTokens: number;
  segmentCount: number;
}

export interface ContextCacheStats {
  activeEntries: number;
  /** Sum of fingerprint sizes across entries */
  totalDocumentBindings: number;
  perSessionDocumentCounts: Record<string, number>;
  buildsInFlight: number;
  hits: number;
  /** Rebuilds started */
  misses: number;
  /** Rebuilds that installed an entry */
  builds: number;
  /** Rebuilds that failed in the builder or timed out */
  failures: number;
}

export interface ContextCacheOptions<THandle> {
  registry: SessionRegistry;
  segments: SegmentStore;
  builder: ContextBuilder<THandle>;
  /** Estimated-token budget for the concatenated segments */
  maxContextTokens: number;
  /** Deadline for one builder call */
  buildTimeoutMs: number;
  logger?: ILogger;
  /** Clock, epoch ms (default: Date.now) */
  now?: () => number;
}
