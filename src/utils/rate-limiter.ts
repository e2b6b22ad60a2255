import { delay } from './shared.js';

export interface RateLimiterOptions {
  /** Minimum spacing between two request starts */
  minDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
}

export interface RateLimiterStats {
  totalRequests: number;
  backoffs: number;
  currentDelayMs: number;
}

/**
 * Shared spacing limiter with exponential backoff.
 *
 * - Every `acquire()` reserves the next start slot, so concurrent callers are
 *   spread at least `currentDelayMs` apart.
 * - On 429/503 responses the spacing grows by `backoffMultiplier`.
 * - After 5 consecutive 2xx responses it halves back toward the minimum.
 */
export class RateLimiter {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly backoffMultiplier: number;

  private currentDelayMs: number;
  private totalRequests = 0;
  private backoffs = 0;
  private consecutive2xx = 0;
  private nextSlot = 0;

  constructor(options: RateLimiterOptions = {}) {
    this.minDelayMs = Math.max(0, options.minDelayMs ?? 100);
    this.maxDelayMs = Math.max(this.minDelayMs, options.maxDelayMs ?? 30000);
    this.backoffMultiplier = options.backoffMultiplier ?? 2;
    this.currentDelayMs = this.minDelayMs;
  }

  /**
   * Wait for this caller's slot. Rejects with the signal's reason if aborted
   * while waiting.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.currentDelayMs;
    this.totalRequests += 1;
    if (slot > now) {
      await delay(slot - now, signal);
    }
  }

  /** Call after each response to adapt the spacing. */
  recordResponse(status: number): void {
    if (status === 429 || status === 503) {
      this.consecutive2xx = 0;
      const grown = Math.max(this.currentDelayMs, 1) * this.backoffMultiplier;
      this.currentDelayMs = Math.min(grown, this.maxDelayMs);
      this.backoffs += 1;
    } else if (status >= 200 && status < 300) {
      this.consecutive2xx += 1;
      if (this.consecutive2xx >= 5) {
        this.currentDelayMs = Math.max(Math.floor(this.currentDelayMs / 2), this.minDelayMs);
        this.consecutive2xx = 0;
      }
    } else {
      this.consecutive2xx = 0;
    }
  }

  getStats(): RateLimiterStats {
    return {
      totalRequests: this.totalRequests,
      backoffs: this.backoffs,
      currentDelayMs: this.currentDelayMs,
    };
  }
}
