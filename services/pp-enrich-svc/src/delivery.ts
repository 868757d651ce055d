import { getLogger } from '@pp/common';

import type { QueueBroker } from './queue-broker';
import type { EnrichmentWorker, WorkerOutcome } from './worker';

export type DeliveryMode = 'inline' | 'queue';

export interface DispatchResult {
  mode: DeliveryMode;
  /** Present when the job ran in the caller. */
  outcome?: WorkerOutcome;
}

export type DeliveryHealth = 'inline' | 'queue' | 'queue_unreachable';

/** How a newly created job reaches the worker. */
export interface JobDelivery {
  readonly mode: DeliveryMode;
  dispatch(jobId: string): Promise<DispatchResult>;
  health(): Promise<DeliveryHealth>;
  start(): Promise<void>;
  close(): Promise<void>;
}

/** Runs every job in the submitting caller. */
export class InlineDelivery implements JobDelivery {
  readonly mode = 'inline' as const;
  private readonly logger = getLogger({ module: 'enrich-delivery' });

  constructor(private readonly worker: EnrichmentWorker) {}

  async dispatch(jobId: string): Promise<DispatchResult> {
    const outcome = await this.worker.runToCompletion(jobId);
    this.logger.info({ jobId, outcome: outcome.kind }, 'Ran enrichment job inline.');
    return { mode: 'inline', outcome };
  }

  async health(): Promise<DeliveryHealth> {
    return 'inline';
  }

  async start(): Promise<void> {
    return;
  }

  async close(): Promise<void> {
    return;
  }
}

/**
 * Publishes jobs to the broker and consumes them with the worker loops. A
 * submission the broker cannot take runs inline instead.
 */
export class QueueDelivery implements JobDelivery {
  readonly mode = 'queue' as const;
  private readonly logger = getLogger({ module: 'enrich-delivery' });
  private readonly fallback: InlineDelivery;

  constructor(
    private readonly broker: QueueBroker,
    private readonly worker: EnrichmentWorker
  ) {
    this.fallback = new InlineDelivery(worker);
  }

  async dispatch(jobId: string): Promise<DispatchResult> {
    try {
      await this.broker.enqueue(jobId);
      return { mode: 'queue' };
    } catch (error) {
      this.logger.warn({ error, jobId }, 'Queue broker unreachable; running job inline.');
      return this.fallback.dispatch(jobId);
    }
  }

  async health(): Promise<DeliveryHealth> {
    try {
      await this.broker.ping();
      return 'queue';
    } catch (error) {
      this.logger.warn({ error }, 'Queue broker health check failed.');
      return 'queue_unreachable';
    }
  }

  async start(): Promise<void> {
    await this.worker.start();
  }

  async close(): Promise<void> {
    await this.worker.stop();
    await this.broker.close();
  }
}
