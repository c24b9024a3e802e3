/**
 * Global rate gate for outbound backend calls.
 *
 * Every caller goes through one promise chain, so grants are handed out in
 * call order and consecutive grants are at least `minIntervalMs` apart. Only
 * the waiting caller is delayed; other handlers keep running.
 */

export interface RateLimiterOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastGrantAt: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.minIntervalMs) || options.minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be a non-negative number, got ${options.minIntervalMs}`);
    }
    this.minIntervalMs = options.minIntervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait for this caller's turn, then record and return the grant time.
   */
  acquire(): Promise<number> {
    const turn = this.tail.then(() => this.waitForSlot());
    // A failed sleep must not wedge the queue for later callers
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );
    return turn;
  }

  private async waitForSlot(): Promise<number> {
    if (this.lastGrantAt !== null) {
      // Timers may fire a little early, so re-check after every sleep
      let elapsed = this.now() - this.lastGrantAt;
      while (elapsed < this.minIntervalMs) {
        await this.sleep(this.minIntervalMs - elapsed);
        elapsed = this.now() - this.lastGrantAt;
      }
    }
    const grantedAt = this.now();
    this.lastGrantAt = grantedAt;
    return grantedAt;
  }
}
