import { setTimeout as delay } from 'node:timers/promises';
import { CancelledError, RateLimitExceededError } from '../errors.js';

export interface Clock {
  /** Milliseconds; only differences are used. */
  now(): number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const systemClock: Clock = { now: () => performance.now() };

export const defaultSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new CancelledError();
    throw error;
  }
};

const TOKEN_EPSILON = 1e-9;

export interface RateBucket {
  capacity: number;
  tokensAvailable: number;
  /** tokens per second */
  refillRate: number;
  lastRefill: number;
}

export interface TokenBucketOptions {
  category: string;
  capacity: number;
  refillPerSecond: number;
  /** Ceiling on how long a caller may wait for a token. */
  maxWaitMs: number;
  clock?: Clock;
  sleep?: Sleep;
}

/**
 * Token bucket with lazy refill: tokens are topped up from the elapsed time
 * whenever the bucket is touched, never by a timer. Waiting callers are
 * served in arrival order.
 */
export class TokenBucket {
  readonly category: string;
  readonly capacity: number;
  readonly refillPerSecond: number;
  private readonly maxWaitMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private tokens: number;
  private lastRefill: number;
  private queued = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: TokenBucketOptions) {
    if (!(options.capacity >= 1)) throw new RangeError('capacity must be at least 1');
    if (!(options.refillPerSecond > 0)) throw new RangeError('refillPerSecond must be positive');
    this.category = options.category;
    this.capacity = options.capacity;
    this.refillPerSecond = options.refillPerSecond;
    this.maxWaitMs = options.maxWaitMs;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = options.capacity;
    this.lastRefill = this.clock.now();
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    const tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillPerSecond);
    // absorb rounding so a wait of exactly 1/rate seconds yields a whole token
    const whole = Math.round(tokens);
    this.tokens = Math.abs(tokens - whole) < TOKEN_EPSILON ? whole : tokens;
    this.lastRefill = now;
  }

  available(): number {
    this.refill();
    return this.tokens;
  }

  snapshot(): RateBucket {
    this.refill();
    return {
      capacity: this.capacity,
      tokensAvailable: this.tokens,
      refillRate: this.refillPerSecond,
      lastRefill: this.lastRefill,
    };
  }

  /** Take a token if one is available right now and nobody is waiting. */
  tryWithdraw(): boolean {
    if (this.queued > 0) return false;
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Milliseconds until a newly arriving caller would get its token. */
  predictedWaitMs(): number {
    this.refill();
    const deficit = this.queued + 1 - this.tokens;
    return deficit <= 0 ? 0 : (deficit / this.refillPerSecond) * 1000;
  }

  /**
   * Take a token, waiting behind earlier callers if necessary. Fails at once
   * with RateLimitExceededError when the expected wait is past the ceiling.
   */
  async withdraw(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    if (this.tryWithdraw()) return;

    const waitMs = this.predictedWaitMs();
    if (waitMs > this.maxWaitMs) {
      throw new RateLimitExceededError(this.category, waitMs, this.maxWaitMs);
    }

    this.queued++;
    const previous = this.tail;
    const turn = previous.then(() => this.takeWhenReady(signal));
    // later callers wait for this turn whether it succeeds or not
    this.tail = turn.catch(() => undefined);

    try {
      await turn;
    } finally {
      this.queued--;
    }
  }

  private async takeWhenReady(signal?: AbortSignal): Promise<void> {
    for (;;) {
      if (signal?.aborted) throw new CancelledError();
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const waitMs = ((1 - this.tokens) / this.refillPerSecond) * 1000;
      await this.sleep(Math.ceil(waitMs), signal);
    }
  }
}
