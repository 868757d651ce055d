export interface RedisConfig {
  url?: string;
  host: string;
  port: number;
  password?: string;
  tls: boolean;
  tlsRejectUnauthorized: boolean;
}

export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
  enableRequestLogging: boolean;
}

export interface MonitoringConfig {
  traceHeader: string;
  requestIdHeader: string;
}

export interface ServiceConfig {
  /** True when a Redis endpoint was configured explicitly. */
  redisConfigured: boolean;
  redis: RedisConfig;
  runtime: RuntimeConfig;
  monitoring: MonitoringConfig;
}

let cachedConfig: ServiceConfig | null = null;

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'n'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function getConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // VALKEY_URL is accepted for deployments that name the server by its fork.
  const redisUrl = nonEmpty(process.env.REDIS_URL) ?? nonEmpty(process.env.VALKEY_URL);
  const redisHost = nonEmpty(process.env.REDIS_HOST);

  cachedConfig = {
    redisConfigured: redisUrl !== undefined || redisHost !== undefined,
    redis: {
      url: redisUrl,
      host: redisHost ?? 'localhost',
      port: parseNumber(process.env.REDIS_PORT, 6379),
      password: nonEmpty(process.env.REDIS_PASSWORD),
      tls: parseBoolean(process.env.REDIS_TLS, false),
      tlsRejectUnauthorized: parseBoolean(process.env.REDIS_TLS_REJECT_UNAUTHORIZED, true)
    },
    runtime: {
      serviceName: process.env.SERVICE_NAME ?? 'pp-service',
      logLevel: process.env.LOG_LEVEL ?? 'info',
      enableRequestLogging: parseBoolean(process.env.ENABLE_REQUEST_LOGGING, true)
    },
    monitoring: {
      traceHeader: process.env.TRACE_HEADER ?? 'X-Cloud-Trace-Context',
      requestIdHeader: process.env.REQUEST_ID_HEADER ?? 'X-Request-ID'
    }
  } satisfies ServiceConfig;

  return cachedConfig;
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
