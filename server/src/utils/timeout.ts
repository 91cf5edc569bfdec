/**
 * Promise deadlines.
 *
 * The underlying operation is not cancelled; its late result is ignored.
 */

export class TimeoutError extends Error {
  public timeoutMs: number;

  constructor(timeoutMs: number, what = "Operation") {
    super(`${what} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what?: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, what)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
