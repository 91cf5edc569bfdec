/**
 * In-Memory Context Builder
 *
 * Stand-in for the inference engine. Counts calls, records the text it was
 * given, and can be told to fail or stall.
 */

import { BuilderError } from "../errors.js";
import type { BuildParams, ContextBuilder } from "./types.js";

export interface FakeContextHandle {
  id: number;
  text: string;
  params: BuildParams;
}

export class InMemoryContextBuilder implements ContextBuilder<FakeContextHandle> {
  calls = 0;
  readonly texts: string[] = [];
  private failuresLeft = 0;
  private delayMs = 0;
  private gate: Promise<void> | null = null;
  private releaseGate: (() => void) | null = null;

  async build(text: string, params: BuildParams): Promise<FakeContextHandle> {
    this.calls++;
    const id = this.calls;
    this.texts.push(text);

    if (this.gate) {
      await this.gate;
    }
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new BuilderError(`Engine failure on build ${id}`);
    }
    return { id, text, params };
  }

  /** Fail the next `count` builds */
  failNext(count = 1): void {
    this.failuresLeft = count;
  }

  /** Delay every build by `ms` */
  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  /** Hold every build until release() is called */
  hold(): void {
    this.gate = new Promise(resolve => {
      this.releaseGate = resolve;
    });
  }

  release(): void {
    this.releaseGate?.();
    this.gate = null;
    this.releaseGate = null;
  }
}
