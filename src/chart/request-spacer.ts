import { setTimeout as sleep } from 'timers/promises';

/**
 * Keeps consecutive calls at least `minIntervalMs` apart by waiting out the
 * remainder. Used to stay under the public CoinGecko rate limit.
 */
export class RequestSpacer {
  private lastRequestAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<unknown> = sleep,
  ) {}

  /** Resolves once the caller may send; returns how long it waited. */
  async acquire(): Promise<number> {
    const now = this.now();
    // Reserve the slot before waiting so overlapping callers queue up.
    const slot = Math.max(now, this.lastRequestAt + this.minIntervalMs);
    this.lastRequestAt = slot;
    const waited = slot - now;
    if (waited > 0) await this.wait(waited);
    return waited;
  }
}
