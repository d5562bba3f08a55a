// src/services/rateLimiter.service.ts
import { Clock, systemClock } from '../utils/clock';
import { RateLimitedError } from '../utils/errors';

export interface RateLimiterOptions {
  /** Requests admitted per client per window. */
  limit: number;
  windowMs: number;
  clock?: Clock;
  /** Stale windows are swept once this many clients are tracked. */
  maxTrackedClients?: number;
}

interface ClientWindow {
  windowStart: number;
  count: number;
}

/**
 * Fixed-window counter keyed by client identity. Windows are aligned to
 * multiples of `windowMs`, so every counter resets on the same boundary.
 */
export class FixedWindowRateLimiter {
  readonly limit: number;
  readonly windowMs: number;

  private readonly clock: Clock;
  private readonly maxTrackedClients: number;
  private readonly windows = new Map<string, ClientWindow>();
  private lastSweptWindow = -1;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError('Rate limit must be a positive integer');
    }
    if (!Number.isInteger(options.windowMs) || options.windowMs < 1) {
      throw new RangeError('Rate limit window must be a positive integer of milliseconds');
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? systemClock;
    this.maxTrackedClients = options.maxTrackedClients ?? 10_000;
  }

  /** Counts one request for `clientId`, or throws RateLimitedError with the time left in the window. */
  consume(clientId: string): void {
    const now = this.clock();
    const windowStart = now - (now % this.windowMs);

    let window = this.windows.get(clientId);
    if (!window || window.windowStart !== windowStart) {
      // Only closed windows can be dropped, so sweep at most once per window
      if (!window && this.windows.size >= this.maxTrackedClients && this.lastSweptWindow < windowStart) {
        this.sweep();
      }
      window = { windowStart, count: 0 };
      this.windows.set(clientId, window);
    }

    if (window.count >= this.limit) {
      throw new RateLimitedError(windowStart + this.windowMs - now);
    }
    window.count++;
  }

  /** Drops counters from windows that have closed. Returns how many were dropped. */
  sweep(): number {
    const now = this.clock();
    const currentWindow = now - (now % this.windowMs);
    this.lastSweptWindow = currentWindow;
    let dropped = 0;
    for (const [clientId, window] of this.windows) {
      if (window.windowStart < currentWindow) {
        this.windows.delete(clientId);
        dropped++;
      }
    }
    return dropped;
  }

  get trackedClients(): number {
    return this.windows.size;
  }
}
