import { buildServer, getLogger } from '@pp/common';
import type { FastifyInstance } from 'fastify';

import type { EnrichServiceConfig } from './config';
import { InlineDelivery, QueueDelivery, type JobDelivery } from './delivery';
import { EnrichmentService, type PauseFn } from './enrichment-service';
import { InMemoryJobStore } from './in-memory-job-store';
import type { JobStore } from './job-store';
import { PipelineExecutor } from './pipeline';
import { RedisQueueBroker, type QueueBroker } from './queue-broker';
import { TokenBucketRateLimiter, type RateLimiter } from './rate-limiter';
import { RedisJobStore } from './redis-job-store';
import { registerRoutes } from './routes';
import type { PipelineStages } from './stages';
import { EnrichmentWorker } from './worker';

export interface EnrichmentComponents {
  store: JobStore;
  limiter: RateLimiter;
  executor: PipelineExecutor;
  worker: EnrichmentWorker;
  delivery: JobDelivery;
  service: EnrichmentService;
}

export interface ComponentOverrides {
  store?: JobStore;
  /** `null` forces inline delivery even when a queue URL is configured. */
  broker?: QueueBroker | null;
  limiter?: RateLimiter;
  stages?: PipelineStages;
  workerId?: string;
  sleep?: (ms: number) => Promise<unknown>;
  pause?: PauseFn;
}

function selectStore(config: EnrichServiceConfig): JobStore {
  if (config.base.redisConfigured) {
    return new RedisJobStore(config);
  }
  getLogger({ module: 'enrich-bootstrap' }).warn('No Redis endpoint configured; using the in-memory job store.');
  return new InMemoryJobStore();
}

/** Wires the store, limiter, executor, worker and delivery chosen by config. */
export function createComponents(config: EnrichServiceConfig, overrides: ComponentOverrides = {}): EnrichmentComponents {
  const store = overrides.store ?? selectStore(config);
  const limiter = overrides.limiter ?? new TokenBucketRateLimiter(config.providers);
  const executor = new PipelineExecutor(store, limiter, overrides.stages);

  const broker = overrides.broker !== undefined ? overrides.broker : config.queue.url ? new RedisQueueBroker(config.queue) : null;
  const worker = new EnrichmentWorker(config, store, executor, broker, {
    workerId: overrides.workerId,
    sleep: overrides.sleep
  });
  const delivery: JobDelivery = broker ? new QueueDelivery(broker, worker) : new InlineDelivery(worker);
  const service = new EnrichmentService(config, store, delivery, overrides.pause);

  return { store, limiter, executor, worker, delivery, service };
}

export async function buildEnrichmentServer(
  components: EnrichmentComponents,
  options: { logger?: boolean } = {}
): Promise<FastifyInstance> {
  const server = await buildServer({ disableDefaultHealthRoute: true, logger: options.logger });
  await registerRoutes(server, { service: components.service });

  server.addHook('onClose', async () => {
    await components.delivery.close();
  });

  return server;
}
