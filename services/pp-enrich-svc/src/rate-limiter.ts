import { setTimeout as delay } from 'node:timers/promises';

import { getLogger } from '@pp/common';

import type { ProviderLimitConfig } from './config';

export type AcquireResult = { granted: true; waitedMs: number } | { granted: false; retryAfterMs: number };

export interface RateLimiter {
  acquire(provider: string): Promise<AcquireResult>;
}

interface Bucket {
  tokens: number;
  updatedAt: number;
  limit: ProviderLimitConfig;
}

export interface TokenBucketOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Per-process token buckets keyed by provider. A caller that would have to
 * wait longer than the provider's acquire timeout gets WouldBlock back with
 * the time until a token frees up; shorter waits are taken in place by
 * reserving the token up front.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly logger = getLogger({ module: 'enrich-rate-limiter' });
  private readonly buckets = new Map<string, Bucket>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(
    private readonly limits: Record<string, ProviderLimitConfig>,
    options: TokenBucketOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  async acquire(provider: string): Promise<AcquireResult> {
    const bucket = this.getBucket(provider);
    if (!bucket) {
      return { granted: true, waitedMs: 0 };
    }

    this.refill(bucket);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { granted: true, waitedMs: 0 };
    }

    const waitMs = Math.ceil(((1 - bucket.tokens) / bucket.limit.ratePerSecond) * 1000);
    if (waitMs > bucket.limit.acquireTimeoutMs) {
      this.logger.debug({ provider, retryAfterMs: waitMs }, 'Provider rate limit would block.');
      return { granted: false, retryAfterMs: waitMs };
    }

    bucket.tokens -= 1;
    await this.sleep(waitMs);
    return { granted: true, waitedMs: waitMs };
  }

  /** Tokens currently available for a provider, after refill. */
  available(provider: string): number {
    const bucket = this.getBucket(provider);
    if (!bucket) {
      return Number.POSITIVE_INFINITY;
    }
    this.refill(bucket);
    return bucket.tokens;
  }

  private getBucket(provider: string): Bucket | undefined {
    const existing = this.buckets.get(provider);
    if (existing) {
      return existing;
    }

    const limit = this.limits[provider];
    if (!limit) {
      return undefined;
    }

    const bucket: Bucket = { tokens: limit.capacity, updatedAt: this.now(), limit };
    this.buckets.set(provider, bucket);
    return bucket;
  }

  private refill(bucket: Bucket): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - bucket.updatedAt) / 1000;
    bucket.tokens = Math.min(bucket.limit.capacity, bucket.tokens + elapsedSeconds * bucket.limit.ratePerSecond);
    bucket.updatedAt = now;
  }
}
