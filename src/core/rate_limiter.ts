import { Clock, systemClock } from './types.js';

export interface RateLimiterOptions {
  /** Attempts admitted per rolling window. */
  ratePerMinute: number;
  /** Max attempts admitted back-to-back; unset means the full window cap. */
  burst?: number;
  windowMs?: number;
  clock?: Clock;
}

/**
 * Admission control shared by every dispatcher in the process.
 *
 * Two constraints are combined:
 *  - a rolling-window log: the k-th admitted attempt is never earlier than the
 *    (k - cap)-th plus the window, so no window ever holds more than `cap`;
 *  - an optional burst ceiling (GCRA), spacing attempts by `window / cap`
 *    once `burst` slots have been used.
 *
 * `acquire` is synchronous and hands out instants monotonically, so callers
 * racing on the event loop are serialized without a lock.
 */
export class RateLimiter {
  readonly cap: number;
  readonly burst: number | null;
  readonly windowMs: number;
  private readonly clock: Clock;
  private readonly admitted: number[] = [];
  private tat = 0;

  constructor(opts: RateLimiterOptions) {
    if (!Number.isInteger(opts.ratePerMinute) || opts.ratePerMinute < 1) {
      throw new RangeError(`ratePerMinute must be a positive integer, got ${opts.ratePerMinute}`);
    }
    if (opts.burst !== undefined && (!Number.isInteger(opts.burst) || opts.burst < 1)) {
      throw new RangeError(`burst must be a positive integer, got ${opts.burst}`);
    }
    this.cap = opts.ratePerMinute;
    this.burst = opts.burst === undefined ? null : Math.min(opts.burst, opts.ratePerMinute);
    this.windowMs = opts.windowMs ?? 60_000;
    this.clock = opts.clock ?? systemClock;
  }

  /**
   * Reserve the next slot and return how long (ms) the caller must wait
   * before issuing its attempt. Never negative.
   */
  acquire(): number {
    const now = this.clock().getTime();
    const at = this.nextEligible(now);
    this.admitted.push(at);
    if (this.admitted.length > this.cap) this.admitted.shift();
    if (this.burst !== null) {
      this.tat = Math.max(this.tat, at) + this.interval();
    }
    return at - now;
  }

  /** Instants of the most recent reservations (at most `cap`), oldest first. */
  reservations(): readonly number[] {
    return this.admitted;
  }

  private nextEligible(now: number) {
    let at = now;
    const last = this.admitted[this.admitted.length - 1];
    if (last !== undefined) at = Math.max(at, last);
    if (this.admitted.length >= this.cap) {
      at = Math.max(at, this.admitted[this.admitted.length - this.cap] + this.windowMs);
    }
    if (this.burst !== null) {
      at = Math.max(at, this.tat - (this.burst - 1) * this.interval());
    }
    return at;
  }

  private interval() {
    return this.windowMs / this.cap;
  }
}
