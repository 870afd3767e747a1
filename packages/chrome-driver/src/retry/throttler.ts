export interface ThrottlerOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces out actions to at most `ratePerSecond` per second. Intended for a
 * single sequential caller; concurrent callers are not coordinated.
 */
export class Throttler {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastActionAt: number;

  constructor(ratePerSecond: number, options?: ThrottlerOptions) {
    if (!Number.isFinite(ratePerSecond) || ratePerSecond <= 0) {
      throw new RangeError(`ratePerSecond must be a positive number, got ${ratePerSecond}`);
    }
    this.intervalMs = 1000 / ratePerSecond;
    this.now = options?.now ?? Date.now;
    this.sleep = options?.sleep ?? sleep;
    this.lastActionAt = this.now();
  }

  /** Waits until at least one interval has passed since the previous slot. */
  async waitForNextSlot(): Promise<void> {
    const remaining = this.intervalMs - (this.now() - this.lastActionAt);
    if (remaining > 0) await this.sleep(remaining);
    this.lastActionAt = this.now();
  }
}
