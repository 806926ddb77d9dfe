import { TokenBucket, type Clock, type RateBucket, type Sleep } from './token-bucket.js';
import { logger } from '../utils/logger.js';
import type { RateLimitConfig } from '../config.js';

const log = logger.child('ratelimit');

/** Every model without its own entry shares this bucket. */
export const DEFAULT_CATEGORY_KEY = 'default_unknown_model';

export interface CategoryLimit {
  key: string;
  requestsPerMinute: number;
  burst?: number;
}

/**
 * Admission gate in front of the reasoning engine: one token bucket per
 * `tier:model` category. Distinct categories never share tokens.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(
    private readonly config: RateLimitConfig,
    private readonly options: { clock?: Clock; sleep?: Sleep } = {},
  ) {}

  /**
   * Limit for a model under a tier: exact name first, then the longest
   * configured prefix (`gemini-2.5-pro-001` → `gemini-2.5-pro`), then the
   * default entry.
   */
  resolveCategory(model: string, tier: string = this.config.tier): CategoryLimit {
    const table = this.config.tiers[tier] ?? {};
    const name = model.toLowerCase();

    if (Object.hasOwn(table, name)) {
      return { key: `${tier}:${name}`, ...table[name] };
    }

    const prefix = Object.keys(table)
      .filter(candidate => name.startsWith(candidate.toLowerCase()))
      .sort((a, b) => b.length - a.length)[0];
    if (prefix !== undefined) {
      return { key: `${tier}:${prefix.toLowerCase()}`, ...table[prefix] };
    }

    return { key: `${tier}:${DEFAULT_CATEGORY_KEY}`, ...this.config.default };
  }

  bucketFor(model: string, tier?: string): TokenBucket {
    const limit = this.resolveCategory(model, tier);
    let bucket = this.buckets.get(limit.key);
    if (!bucket) {
      bucket = new TokenBucket({
        category: limit.key,
        capacity: limit.burst ?? limit.requestsPerMinute,
        refillPerSecond: limit.requestsPerMinute / 60,
        maxWaitMs: this.config.maxWaitMs,
        clock: this.options.clock,
        sleep: this.options.sleep,
      });
      this.buckets.set(limit.key, bucket);
      log.debug(`Created bucket ${limit.key} (${limit.requestsPerMinute} rpm)`);
    }
    return bucket;
  }

  /** Withdraw one token for a call to `model`, waiting if allowed. */
  acquire(model: string, signal?: AbortSignal): Promise<void> {
    return this.bucketFor(model).withdraw(signal);
  }

  snapshot(): Record<string, RateBucket> {
    const result: Record<string, RateBucket> = {};
    for (const [key, bucket] of [...this.buckets.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      result[key] = bucket.snapshot();
    }
    return result;
  }
}
