import 'dotenv/config';

import { closeRedisClient, getLogger } from '@pp/common';

import { buildEnrichmentServer, createComponents } from './app';
import { getEnrichServiceConfig } from './config';

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'pp-enrich-svc';

  const logger = getLogger({ module: 'enrich-bootstrap' });

  try {
    const config = getEnrichServiceConfig();
    const components = createComponents(config);

    // A store that is configured but unreachable is fatal.
    await components.store.ping();
    logger.info({ delivery: components.delivery.mode }, 'Job store reachable.');

    const server = await buildEnrichmentServer(components);
    await components.delivery.start();

    const port = Number(process.env.PORT ?? 8080);
    const host = process.env.HOST ?? '0.0.0.0';
    await server.listen({ port, host });
    logger.info({ port, delivery: components.delivery.mode }, 'pp-enrich-svc listening.');

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      try {
        await server.close();
        await closeRedisClient();
        logger.info('pp-enrich-svc closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to shutdown gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap pp-enrich-svc.');
    process.exit(1);
  }
}

void bootstrap();
