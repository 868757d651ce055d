import Redis, { type RedisOptions } from 'ioredis';

import { getConfig, type RedisConfig } from './config';
import { getLogger } from './logger';

export interface ConnectRedisOptions {
  /** Connection name used in logs. */
  name: string;
  url?: string;
  redis?: RedisConfig;
  /** Fail commands immediately while disconnected instead of buffering them. */
  failFast?: boolean;
  maxReconnectAttempts?: number;
}

let client: Redis | null = null;
let connecting: Promise<Redis> | null = null;

function buildTlsOptions(config: RedisConfig | undefined): RedisOptions['tls'] {
  if (!config?.tls) {
    return undefined;
  }
  return {
    rejectUnauthorized: config.tlsRejectUnauthorized,
    ca: process.env.REDIS_TLS_CA ? [process.env.REDIS_TLS_CA] : undefined
  };
}

/**
 * Opens a Redis connection and resolves once it is ready. Rejects on the first
 * connection error so callers can decide whether to degrade.
 */
export function connectRedis(options: ConnectRedisOptions): Promise<Redis> {
  const logger = getLogger({ module: 'redis', connection: options.name });
  const maxReconnectAttempts = options.maxReconnectAttempts ?? 10;

  const baseOptions: RedisOptions = {
    retryStrategy: (times: number) => {
      if (times > maxReconnectAttempts) {
        logger.error('Too many Redis reconnection attempts, giving up');
        return null;
      }
      // 100ms, 200ms, 400ms ... capped at 3s
      const delay = Math.min(100 * Math.pow(2, times), 3000);
      logger.info({ retries: times, delay }, 'Reconnecting to Redis...');
      return delay;
    },
    keepAlive: 5000,
    enableOfflineQueue: !options.failFast,
    maxRetriesPerRequest: options.failFast ? 1 : 20,
    lazyConnect: false
  };

  const url = options.url ?? options.redis?.url;
  let redisClient: Redis;
  if (url) {
    logger.info({ tls: url.startsWith('rediss://') }, 'Initializing Redis client from URL...');
    redisClient = new Redis(url, baseOptions);
  } else {
    const redisConfig = options.redis ?? getConfig().redis;
    logger.info({ host: redisConfig.host, port: redisConfig.port, tls: redisConfig.tls }, 'Initializing Redis client...');
    redisClient = new Redis({
      ...baseOptions,
      host: redisConfig.host,
      port: redisConfig.port,
      password: redisConfig.password,
      tls: buildTlsOptions(redisConfig)
    });
  }

  redisClient.on('error', (error: Error) => {
    logger.error({ error }, 'Redis client encountered an error.');
  });

  redisClient.on('reconnecting', () => {
    logger.info('Redis client reconnecting...');
  });

  return new Promise((resolve, reject) => {
    const readyHandler = () => {
      logger.info('Redis connection established.');
      cleanup();
      resolve(redisClient);
    };

    const errorHandler = (error: Error) => {
      logger.error({ error }, 'Failed to connect to Redis.');
      cleanup();
      redisClient.disconnect();
      reject(error);
    };

    const cleanup = () => {
      redisClient.off('ready', readyHandler);
      redisClient.off('error', errorHandler);
    };

    redisClient.once('ready', readyHandler);
    redisClient.once('error', errorHandler);
  });
}

/** Shared store connection, created on first use from the base config. */
export async function getRedisClient(): Promise<Redis> {
  if (client && client.status === 'ready') {
    return client;
  }

  if (connecting) {
    return connecting;
  }

  const config = getConfig();
  connecting = connectRedis({ name: 'store', redis: config.redis, failFast: true })
    .then((redisClient) => {
      client = redisClient;
      const logger = getLogger({ module: 'redis', connection: 'store' });
      redisClient.on('end', () => {
        logger.warn('Clearing cached Redis client after connection ended.');
        if (client === redisClient) {
          client = null;
        }
      });
      return redisClient;
    })
    .finally(() => {
      connecting = null;
    });

  return connecting;
}

export async function closeRedisClient(): Promise<void> {
  if (connecting) {
    await connecting.catch(() => undefined);
  }

  if (client && client.status === 'ready') {
    await client.quit();
  }

  client = null;
}

export function resetRedisForTesting(): void {
  client = null;
  connecting = null;
}
