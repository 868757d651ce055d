import { getConfig as getBaseConfig, type ServiceConfig } from '@pp/common';

export interface JobStoreConfig {
  keyPrefix: string;
  leaseMs: number;
}

export interface EnrichmentQueueConfig {
  /** Broker endpoint; undefined selects inline delivery. */
  url?: string;
  queueKey: string;
  maxConcurrency: number;
  pollIntervalMs: number;
}

export interface RetryPolicyConfig {
  retryLimit: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export interface StreamConfig {
  pollIntervalMs: number;
  maxWaitMs: number;
}

export interface ProviderLimitConfig {
  /** Tokens added per second. */
  ratePerSecond: number;
  capacity: number;
  /** Longest an acquire may wait for a token before reporting WouldBlock. */
  acquireTimeoutMs: number;
}

export interface LeadListingConfig {
  defaultPageSize: number;
  maxPageSize: number;
}

export interface EnrichServiceConfig {
  base: ServiceConfig;
  store: JobStoreConfig;
  queue: EnrichmentQueueConfig;
  retry: RetryPolicyConfig;
  stream: StreamConfig;
  providers: Record<string, ProviderLimitConfig>;
  leads: LeadListingConfig;
}

export const DEFAULT_PROVIDER_LIMITS: Record<string, ProviderLimitConfig> = {
  signals: { ratePerSecond: 5, capacity: 10, acquireTimeoutMs: 0 },
  techstack: { ratePerSecond: 5, capacity: 10, acquireTimeoutMs: 0 },
  scoring: { ratePerSecond: 10, capacity: 20, acquireTimeoutMs: 250 }
};

let cachedConfig: EnrichServiceConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Parses `name:rate:capacity[:timeoutMs]` entries separated by commas.
 * Malformed entries are ignored.
 */
export function parseProviderLimits(raw: string | undefined): Record<string, ProviderLimitConfig> {
  const limits: Record<string, ProviderLimitConfig> = { ...DEFAULT_PROVIDER_LIMITS };
  if (!raw) {
    return limits;
  }

  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  for (const entry of entries) {
    const [name, rate, capacity, timeout] = entry.split(':').map((segment) => segment.trim());
    const ratePerSecond = Number(rate);
    const bucketCapacity = Number(capacity);
    if (!name || !Number.isFinite(ratePerSecond) || !Number.isFinite(bucketCapacity) || ratePerSecond <= 0 || bucketCapacity < 1) {
      continue;
    }
    limits[name] = {
      ratePerSecond,
      capacity: Math.floor(bucketCapacity),
      acquireTimeoutMs: Math.max(0, parseNumber(timeout, 0))
    };
  }

  return limits;
}

function resolveQueueUrl(base: ServiceConfig): string | undefined {
  const explicit = process.env.ENRICH_QUEUE_URL?.trim();
  if (explicit) {
    return explicit;
  }
  if (!base.redisConfigured) {
    return undefined;
  }
  return base.redis.url ?? `redis://${base.redis.host}:${base.redis.port}`;
}

export function getEnrichServiceConfig(): EnrichServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const store: JobStoreConfig = {
    keyPrefix: process.env.ENRICH_STORE_PREFIX ?? '',
    leaseMs: Math.max(1_000, parseNumber(process.env.ENRICH_LEASE_MS, 300_000))
  } satisfies JobStoreConfig;

  const queue: EnrichmentQueueConfig = {
    url: resolveQueueUrl(base),
    queueKey: process.env.ENRICH_QUEUE_KEY ?? 'queue:enrich',
    maxConcurrency: Math.max(1, parseNumber(process.env.ENRICH_CONCURRENCY, 2)),
    pollIntervalMs: Math.max(250, parseNumber(process.env.ENRICH_POLL_INTERVAL_MS, 1000))
  } satisfies EnrichmentQueueConfig;

  const retry: RetryPolicyConfig = {
    retryLimit: Math.max(0, parseNumber(process.env.ENRICH_RETRY_LIMIT, 5)),
    retryBaseDelayMs: Math.max(1, parseNumber(process.env.ENRICH_RETRY_BASE_DELAY_MS, 500)),
    retryMaxDelayMs: Math.max(1, parseNumber(process.env.ENRICH_RETRY_MAX_DELAY_MS, 30_000))
  } satisfies RetryPolicyConfig;

  const stream: StreamConfig = {
    pollIntervalMs: Math.max(50, parseNumber(process.env.ENRICH_STREAM_POLL_MS, 500)),
    maxWaitMs: Math.max(1_000, parseNumber(process.env.ENRICH_STREAM_MAX_WAIT_MS, 60_000))
  } satisfies StreamConfig;

  const leads: LeadListingConfig = {
    defaultPageSize: Math.max(1, parseNumber(process.env.ENRICH_LEADS_PAGE_SIZE, 50)),
    maxPageSize: Math.max(1, parseNumber(process.env.ENRICH_LEADS_MAX_PAGE_SIZE, 200))
  } satisfies LeadListingConfig;

  cachedConfig = {
    base,
    store,
    queue,
    retry,
    stream,
    providers: parseProviderLimits(process.env.ENRICH_PROVIDER_LIMITS),
    leads
  } satisfies EnrichServiceConfig;

  return cachedConfig;
}

export function resetEnrichConfigForTesting(): void {
  cachedConfig = null;
}
