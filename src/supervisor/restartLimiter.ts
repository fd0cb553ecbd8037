// ============================================================
// Restart Rate Limiter
// ============================================================
// At most `max` restarts inside any trailing window. A restart
// stamped at t stops counting once now − t ≥ windowMs.
// ============================================================

import type { Clock } from '../utils/clock.js';

export class RestartRateLimiter {
  private stamps: number[] = [];

  constructor(
    private readonly max: number,
    private readonly windowMs: number,
    private readonly clock: Pick<Clock, 'now'>,
  ) {}

  /** Record a restart if the budget allows it. */
  tryAcquire(): boolean {
    this.prune();
    if (this.stamps.length >= this.max) return false;
    this.stamps.push(this.clock.now());
    return true;
  }

  count(): number {
    this.prune();
    return this.stamps.length;
  }

  /** Milliseconds until the oldest restart leaves the window; 0 when under budget. */
  msUntilAvailable(): number {
    this.prune();
    if (this.stamps.length < this.max) return 0;
    return this.stamps[0] + this.windowMs - this.clock.now();
  }

  private prune(): void {
    const now = this.clock.now();
    this.stamps = this.stamps.filter((t) => now - t < this.windowMs);
  }
}
