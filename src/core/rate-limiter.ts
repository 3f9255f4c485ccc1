/**
 * Request spacing for the SEC EDGAR API.
 * SEC allows 10 requests per second per user-agent.
 *
 * Each acquire() reserves a start slot at least 1000 / requestsPerSecond ms
 * after the previous one, so no 1-second window ever holds more than
 * requestsPerSecond requests. Bursts are not allowed.
 */

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private nextSlot: number = 0;
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(requestsPerSecond: number = 10, options: RateLimiterOptions = {}) {
    if (!(requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${requestsPerSecond}`);
    }
    this.intervalMs = 1000 / requestsPerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async acquire(): Promise<void> {
    // Reserve synchronously so overlapping callers still get distinct slots
    const slot = Math.max(this.now(), this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    let waitMs = slot - this.now();
    while (waitMs > 0) {
      await this.sleep(Math.ceil(waitMs));
      waitMs = slot - this.now();
    }
  }
}
