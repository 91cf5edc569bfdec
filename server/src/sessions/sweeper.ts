/**
 * Session Sweeper
 *
 * Periodically evicts sessions idle past the timeout. Eviction goes through
 * SessionRegistry.delete(), so the ContextCache drops the session's entry
 * through its deletion hook.
 */

import type { ILogger } from "@docprime/shared/logging";
import { createComponentLogger } from "../logging.js";
import type { SessionRegistry } from "./registry.js";

export interface SessionSweeperOptions {
  /** Idle time after which a session is evicted */
  timeoutMs: number;
  /** Time between sweeps */
  intervalMs: number;
  logger?: ILogger;
  /** Clock, epoch ms (default: Date.now) */
  now?: () => number;
}

export class SessionSweeper {
  private timer: ReturnType<typeof setInterval> | null = null;
  private log: ILogger;
  private now: () => number;

  constructor(private registry: SessionRegistry, private options: SessionSweeperOptions) {
    this.log = options.logger || createComponentLogger("sweeper");
    this.now = options.now || Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sweep();
    }, this.options.intervalMs);
    // Don't keep the process alive for sweeping
    this.timer.unref();
    this.log.info("Session sweeper started", {
      intervalMs: this.options.intervalMs,
      timeoutMs: this.options.timeoutMs,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Delete every session whose idle time exceeds the timeout.
   * Runs without yielding, so no request can touch a session between the
   * idle check and its deletion. Returns the evicted session IDs.
   */
  sweep(now: number = this.now()): string[] {
    const expired = this.registry
      .list()
      .filter(session => now - session.lastAccessedAt > this.options.timeoutMs)
      .map(session => session.id);

    for (const sessionId of expired) {
      this.registry.delete(sessionId);
    }

    if (expired.length > 0) {
      this.log.info(`Evicted ${expired.length} idle session(s)`, { sessionIds: expired });
    }
    return expired;
  }
}
