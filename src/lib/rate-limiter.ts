import type { Logger } from './logger.js';
import { sleep } from './timeout.js';

/**
 * Sliding-window limiter for requests to the classifieds site.
 *
 * Hard cap: `requestsPerMinute` within any rolling 60s window.
 * Minimum spacing: 60s / requestsPerMinute between consecutive requests, so a
 * full window is never spent in one burst.
 */

const ONE_MINUTE = 60_000;

export interface RequestRateLimiterOptions {
  requestsPerMinute: number;
  logger?: Logger;
}

export class RequestRateLimiter {
  private requests: number[] = [];
  private slotLock: Promise<void> = Promise.resolve();
  private readonly limit: number;
  private readonly spacingMs: number;
  private readonly logger?: Logger;

  constructor(options: RequestRateLimiterOptions) {
    this.limit = options.requestsPerMinute;
    this.spacingMs = Math.floor(ONE_MINUTE / options.requestsPerMinute);
    this.logger = options.logger;
  }

  /**
   * Check if a request can proceed. Returns wait time in ms (0 = proceed).
   */
  checkRequest(): number {
    this.prune();
    const now = Date.now();

    if (this.requests.length >= this.limit) {
      const oldestInWindow = this.requests[0];
      return oldestInWindow + ONE_MINUTE - now + 50; // +50ms buffer
    }

    const last = this.requests[this.requests.length - 1];
    if (last !== undefined && now - last < this.spacingMs) {
      return this.spacingMs - (now - last);
    }

    return 0;
  }

  recordRequest(): void {
    this.requests.push(Date.now());
  }

  /**
   * Wait until a request is allowed, then record it.
   * Callers are serialized through a promise chain so two callers cannot both
   * observe a free slot and burst past the limit. An aborted wait rejects with the
   * signal's reason and records nothing.
   */
  async waitForSlot(signal?: AbortSignal): Promise<void> {
    const previous = this.slotLock;
    let release: () => void = () => undefined;
    this.slotLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;

    try {
      signal?.throwIfAborted();
      let waitMs = this.checkRequest();
      while (waitMs > 0) {
        this.logger?.debug({ waitMs }, 'Rate limiter: waiting for request slot');
        await sleep(waitMs, signal);
        signal?.throwIfAborted();
        waitMs = this.checkRequest();
      }
      this.recordRequest();
    } finally {
      release();
    }
  }

  getUsage(): { lastMinute: number; limit: number } {
    this.prune();
    return { lastMinute: this.requests.length, limit: this.limit };
  }

  private prune(): void {
    const cutoff = Date.now() - ONE_MINUTE;
    while (this.requests.length > 0 && this.requests[0] <= cutoff) {
      this.requests.shift();
    }
  }
}
