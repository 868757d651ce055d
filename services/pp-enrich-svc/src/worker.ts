import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';

import { getLogger } from '@pp/common';

import type { EnrichServiceConfig, RetryPolicyConfig } from './config';
import { InvalidTransitionError, JobNotFoundError } from './errors';
import type { ClaimResult, JobStore } from './job-store';
import type { PipelineExecutor } from './pipeline';
import type { QueueBroker, QueueMessage } from './queue-broker';

export type WorkerOutcome =
  | { kind: 'completed'; jobId: string }
  | { kind: 'failed'; jobId: string; reason: string }
  | { kind: 'retry'; jobId: string; delayMs: number; attempts: number }
  /** Another worker holds a live lease; try again once it could have lapsed. */
  | { kind: 'deferred'; jobId: string; delayMs: number; owner: string }
  | { kind: 'skipped'; jobId: string; reason: string };

export interface EnrichmentWorkerOptions {
  workerId?: string;
  sleep?: (ms: number) => Promise<unknown>;
}

/** Exponential backoff, capped, never shorter than a provider's retry hint. */
export function computeRetryDelay(policy: RetryPolicyConfig, attempt: number, retryAfterMs?: number): number {
  const exponent = Math.max(0, attempt - 1);
  const backoff = Math.min(policy.retryMaxDelayMs, policy.retryBaseDelayMs * Math.pow(2, exponent));
  return Math.max(backoff, retryAfterMs ?? 0);
}

export class EnrichmentWorker {
  private readonly logger = getLogger({ module: 'enrich-worker' });
  private readonly workerId: string;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private running = false;
  private loops: Promise<void>[] = [];
  private activeJobs = 0;
  private succeeded = 0;
  private failed = 0;

  constructor(
    private readonly config: EnrichServiceConfig,
    private readonly store: JobStore,
    private readonly executor: PipelineExecutor,
    private readonly broker: QueueBroker | null = null,
    options: EnrichmentWorkerOptions = {}
  ) {
    this.workerId = options.workerId ?? `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  get id(): string {
    return this.workerId;
  }

  /**
   * One execution attempt under this worker's lease. Transient failures count
   * against the retry limit; the caller decides how to schedule the retry.
   */
  async execute(jobId: string): Promise<WorkerOutcome> {
    let claim: ClaimResult;
    try {
      claim = await this.store.claimJob(jobId, this.workerId, this.config.store.leaseMs);
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        this.logger.warn({ jobId }, 'Job not found when attempting to process.');
        return { kind: 'skipped', jobId, reason: 'missing' };
      }
      throw error;
    }

    if (!claim.claimed) {
      if (claim.reason === 'terminal') {
        this.logger.info({ jobId }, 'Job already finished; skipping.');
        return { kind: 'skipped', jobId, reason: 'terminal' };
      }
      const delayMs = Math.max(1, claim.expiresInMs);
      this.logger.info({ jobId, owner: claim.owner, delayMs }, 'Job is leased by another worker; deferring.');
      return { kind: 'deferred', jobId, delayMs, owner: claim.owner };
    }

    this.activeJobs += 1;
    try {
      const result = await this.executor.execute(jobId);
      switch (result.kind) {
        case 'completed':
          this.succeeded += 1;
          return { kind: 'completed', jobId };
        case 'failed':
          this.failed += 1;
          return { kind: 'failed', jobId, reason: result.reason };
        case 'abandoned':
          return { kind: 'skipped', jobId, reason: result.reason };
        case 'transient':
          return await this.scheduleRetry(jobId, result.code, result.retryAfterMs);
      }
    } finally {
      this.activeJobs = Math.max(0, this.activeJobs - 1);
      await this.store.releaseJob(jobId, this.workerId);
    }
  }

  /** Runs a job to a terminal outcome in the calling context, sleeping between retries. */
  async runToCompletion(jobId: string): Promise<WorkerOutcome> {
    for (;;) {
      const outcome = await this.execute(jobId);
      if (outcome.kind !== 'retry' && outcome.kind !== 'deferred') {
        return outcome;
      }
      await this.sleep(outcome.delayMs);
    }
  }

  /** Resolves null when the queue stayed empty for `timeoutMs`. */
  async processNext(timeoutMs: number = this.config.queue.pollIntervalMs): Promise<WorkerOutcome | null> {
    const broker = this.requireBroker();
    const message = await broker.dequeue(timeoutMs);
    if (!message) {
      return null;
    }

    let outcome: WorkerOutcome;
    try {
      outcome = await this.execute(message.jobId);
    } catch (error) {
      this.logger.error({ error, jobId: message.jobId }, 'Job execution failed; redelivering.');
      await broker.nack(message, this.config.retry.retryBaseDelayMs);
      throw error;
    }

    await this.settle(broker, message, outcome);
    return outcome;
  }

  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    const broker = this.requireBroker();
    try {
      await broker.requeueInFlight();
    } catch (error) {
      this.logger.warn({ error }, 'Queue broker unreachable at start; consumers will keep retrying.');
    }

    this.running = true;
    this.loops = Array.from({ length: this.config.queue.maxConcurrency }, () => this.loop());
    this.logger.info({ concurrency: this.config.queue.maxConcurrency, workerId: this.workerId }, 'Enrichment worker started.');
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    await Promise.all(this.loops);
    this.loops = [];
    this.logger.info({ succeeded: this.succeeded, failed: this.failed }, 'Enrichment worker stopped.');
  }

  stats(): { active: number; succeeded: number; failed: number } {
    return { active: this.activeJobs, succeeded: this.succeeded, failed: this.failed };
  }

  private async loop(): Promise<void> {
    while (this.running) {
      try {
        await this.processNext();
      } catch (error) {
        this.logger.error({ error }, 'Worker loop encountered an error.');
        await this.sleep(this.config.queue.pollIntervalMs);
      }
    }
  }

  private async settle(broker: QueueBroker, message: QueueMessage, outcome: WorkerOutcome): Promise<void> {
    if (outcome.kind === 'retry' || outcome.kind === 'deferred') {
      await broker.nack(message, outcome.delayMs);
      return;
    }
    await broker.ack(message);
  }

  private async scheduleRetry(jobId: string, code: string, retryAfterMs?: number): Promise<WorkerOutcome> {
    const attempts = await this.store.incrementAttempts(jobId);
    const policy = this.config.retry;

    if (attempts > policy.retryLimit) {
      try {
        await this.store.updateJobStatus(jobId, { state: 'failed', reason: 'retries_exhausted' });
      } catch (error) {
        if (error instanceof InvalidTransitionError) {
          this.logger.info({ jobId }, 'Job settled elsewhere before retries ran out.');
          return { kind: 'skipped', jobId, reason: 'lost_race' };
        }
        throw error;
      }
      this.failed += 1;
      this.logger.error({ jobId, attempts, code }, 'Transient retries exhausted; job failed.');
      return { kind: 'failed', jobId, reason: 'retries_exhausted' };
    }

    const delayMs = computeRetryDelay(policy, attempts, retryAfterMs);
    this.logger.warn({ jobId, attempts, code, delayMs }, 'Scheduling job retry.');
    return { kind: 'retry', jobId, delayMs, attempts };
  }

  private requireBroker(): QueueBroker {
    if (!this.broker) {
      throw new Error('Enrichment worker has no queue broker; use inline delivery instead.');
    }
    return this.broker;
  }
}
