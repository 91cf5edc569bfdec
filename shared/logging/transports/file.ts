/**
 * File Transport
 *
 * JSON lines in `<dir>/<name>.log`. When a write would push the file past
 * `maxBytes`, the file shifts to `<name>.1.log`, older ones up by one, and the
 * oldest beyond `keep` is removed.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogEntry, LogLevel, LogTransport } from "../types.js";

export interface FileTransportOptions {
  logDir: string;
  minLevel?: LogLevel;
  /** Base name without extension (default: "docprime") */
  filename?: string;
  /** Default: 10 MiB */
  maxBytes?: number;
  /** Rotated files kept next to the live one (default: 5) */
  keep?: number;
}

export class FileTransport implements LogTransport {
  readonly name = "file";
  readonly minLevel: LogLevel;
  readonly filePath: string;
  private readonly dir: string;
  private readonly base: string;
  private readonly maxBytes: number;
  private readonly keep: number;
  private stream: fs.WriteStream | null;
  private bytes: number;
  /** Writes the stream has not yet acknowledged */
  private pending = 0;
  private drained: Array<() => void> = [];

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "info";
    this.dir = options.logDir;
    this.base = options.filename || "docprime";
    this.maxBytes = options.maxBytes || 10 * 1024 * 1024;
    this.keep = options.keep ?? 5;
    this.filePath = path.join(this.dir, `${this.base}.log`);

    fs.mkdirSync(this.dir, { recursive: true });
    this.bytes = fs.existsSync(this.filePath) ? fs.statSync(this.filePath).size : 0;
    this.stream = this.open();
  }

  write(entry: LogEntry): void {
    if (!this.stream) return;

    const line = JSON.stringify(entry) + "\n";
    const size = Buffer.byteLength(line);
    if (this.bytes > 0 && this.bytes + size > this.maxBytes) {
      this.rotate();
    }

    this.bytes += size;
    this.pending++;
    this.stream?.write(line, () => this.settle());
  }

  flush(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise(resolve => this.drained.push(() => resolve()));
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.stream;
    this.stream = null;
    if (stream) {
      await new Promise<void>(resolve => stream.end(() => resolve()));
    }
  }

  /** Path of the n-th rotated file */
  rotatedPath(n: number): string {
    return path.join(this.dir, `${this.base}.${n}.log`);
  }

  private open(): fs.WriteStream {
    const stream = fs.createWriteStream(this.filePath, { flags: "a" });
    stream.on("error", err => {
      console.error(`[logging] cannot write ${this.filePath}:`, err);
    });
    return stream;
  }

  private settle(): void {
    this.pending--;
    if (this.pending > 0) return;
    const waiters = this.drained;
    this.drained = [];
    for (const resolve of waiters) resolve();
  }

  private rotate(): void {
    this.stream?.end();

    if (this.keep < 1) {
      fs.rmSync(this.filePath, { force: true });
    } else {
      fs.rmSync(this.rotatedPath(this.keep), { force: true });
      for (let n = this.keep - 1; n >= 1; n--) {
        const from = this.rotatedPath(n);
        if (fs.existsSync(from)) fs.renameSync(from, this.rotatedPath(n + 1));
      }
      if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, this.rotatedPath(1));
    }

    this.bytes = 0;
    this.stream = this.open();
  }
}
