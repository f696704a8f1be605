import pLimit from 'p-limit';
import { Clock, systemClock } from '../clock';

export interface RateLimits {
  requestsPerMinute: number;
  tokensPerMinute: number;
  /** Window length; one minute unless overridden */
  windowMs?: number;
}

export interface BucketSnapshot {
  requestsAvailable: number;
  tokensAvailable: number;
  windowStart: number;
  windowEnd: number;
}

export const DEFAULT_WINDOW_MS = 60_000;

/**
 * Requests-per-minute and tokens-per-minute budget shared by every dispatcher worker.
 *
 * Windows are fixed: when the clock passes the end of the current window both counters
 * are reset to their ceilings (not topped up). Debits run one at a time through a single
 * gate, so a waiting worker holds its place in line until the next window opens.
 */
export class TokenBucket {
  private readonly gate = pLimit(1);
  private readonly windowMs: number;
  private windowStart: number;
  private requestsAvailable: number;
  private tokensAvailable: number;

  constructor(
    private readonly limits: RateLimits,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isInteger(limits.requestsPerMinute) || limits.requestsPerMinute < 1) {
      throw new RangeError(`requestsPerMinute must be a positive integer, got ${limits.requestsPerMinute}`);
    }
    if (!Number.isInteger(limits.tokensPerMinute) || limits.tokensPerMinute < 1) {
      throw new RangeError(`tokensPerMinute must be a positive integer, got ${limits.tokensPerMinute}`);
    }

    this.windowMs = limits.windowMs ?? DEFAULT_WINDOW_MS;
    this.windowStart = clock.now();
    this.requestsAvailable = limits.requestsPerMinute;
    this.tokensAvailable = limits.tokensPerMinute;
  }

  /**
   * Debit one request and `tokens` tokens, waiting for the next window when either quota
   * is short. Resolves with the token cost actually debited (clamped to the ceiling so a
   * single oversized request cannot wait forever).
   */
  acquire(tokens: number): Promise<number> {
    return this.gate(() => this._debit(tokens));
  }

  snapshot(): BucketSnapshot {
    this._replenish();
    return {
      requestsAvailable: this.requestsAvailable,
      tokensAvailable: this.tokensAvailable,
      windowStart: this.windowStart,
      windowEnd: this.windowStart + this.windowMs
    };
  }

  private async _debit(tokens: number): Promise<number> {
    const cost = Math.min(Math.max(0, Math.ceil(tokens)), this.limits.tokensPerMinute);

    for (;;) {
      this._replenish();

      if (this.requestsAvailable >= 1 && this.tokensAvailable >= cost) {
        this.requestsAvailable -= 1;
        this.tokensAvailable -= cost;
        return cost;
      }

      const waitMs = this.windowStart + this.windowMs - this.clock.now();
      await this.clock.sleep(Math.max(1, waitMs));
    }
  }

  private _replenish(): void {
    const now = this.clock.now();
    if (now < this.windowStart + this.windowMs) {
      return;
    }

    const elapsedWindows = Math.floor((now - this.windowStart) / this.windowMs);
    this.windowStart += elapsedWindows * this.windowMs;
    this.requestsAvailable = this.limits.requestsPerMinute;
    this.tokensAvailable = this.limits.tokensPerMinute;
  }
}
