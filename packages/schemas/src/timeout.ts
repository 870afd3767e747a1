import { DriverError } from "./errors.js";

/**
 * Races a promise against a timeout. Rejects with a TimeoutError if the
 * timeout fires first. The timer is always cleaned up and never keeps the
 * process alive on its own.
 */
export class TimeoutError extends DriverError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`, { timeoutMs });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export function withTimeout<T>(
  promise: Promise<T>,
  ms: number | undefined,
  label = "Operation",
): Promise<T> {
  if (ms === undefined || ms <= 0) return promise;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
    timer.unref();
  });
  return Promise.race([promise, timeout]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
