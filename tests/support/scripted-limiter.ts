import type { AcquireResult, RateLimiter } from '../../services/pp-enrich-svc/src/rate-limiter';

/** Denies the first N acquires per provider, then grants everything. */
export class ScriptedLimiter implements RateLimiter {
  readonly calls: string[] = [];
  private readonly remainingDenials: Map<string, number>;

  constructor(
    denials: Record<string, number> = {},
    private readonly retryAfterMs = 1
  ) {
    this.remainingDenials = new Map(Object.entries(denials));
  }

  async acquire(provider: string): Promise<AcquireResult> {
    this.calls.push(provider);
    const remaining = this.remainingDenials.get(provider) ?? 0;
    if (remaining > 0) {
      this.remainingDenials.set(provider, remaining - 1);
      return { granted: false, retryAfterMs: this.retryAfterMs };
    }
    return { granted: true, waitedMs: 0 };
  }
}
