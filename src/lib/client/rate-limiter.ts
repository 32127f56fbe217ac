/**
 * Rate limiters
 *
 * A limiter is the synchronization point shared by every call of a client:
 * `take` is awaited exactly once per call, before the pre-request hook.
 */

import { debugRateLimit } from '../utils/debug.js';
import { sleep } from '../utils/sleep.js';

export interface Limiter {
  /**
   * Wait until the caller may proceed and resolve with the time the slot was
   * granted. Must tolerate any number of simultaneous callers and reject
   * promptly with the signal's reason when it aborts.
   */
  take(signal?: AbortSignal): Promise<Date>;
}

/** Never blocks. */
export class UnlimitedLimiter implements Limiter {
  async take(signal?: AbortSignal): Promise<Date> {
    if (signal?.aborted) throw signal.reason;
    return new Date();
  }
}

export interface IntervalLimiterOptions {
  /** Calls permitted per period. */
  rate: number;
  /** Period length in ms (default: 1000). */
  perMs?: number;
}

/**
 * Evenly spaced slots
 *
 * Each caller reserves the next free slot, `perMs / rate` after the previous
 * one, and sleeps until it comes up. Reservation happens synchronously, so
 * concurrent callers never share a slot. A slot reserved by a caller that is
 * then aborted stays consumed.
 */
export class IntervalLimiter implements Limiter {
  private readonly intervalMs: number;
  private nextSlot = 0;

  constructor(opts: IntervalLimiterOptions) {
    const perMs = opts.perMs ?? 1000;
    if (!(opts.rate > 0) || !(perMs > 0)) {
      throw new RangeError(`invalid limiter rate ${opts.rate} per ${perMs}ms`);
    }
    this.intervalMs = perMs / opts.rate;
  }

  async take(signal?: AbortSignal): Promise<Date> {
    if (signal?.aborted) throw signal.reason;

    const now = Date.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      debugRateLimit('Waiting %dms for next slot (interval=%dms)', waitMs, this.intervalMs);
      await sleep(waitMs, signal);
    }

    return new Date();
  }

  get interval(): number {
    return this.intervalMs;
  }
}
