import { setTimeout as delay } from 'node:timers/promises';

import { badRequestError, getLogger } from '@pp/common';
import type { Logger } from 'pino';

import type { EnrichServiceConfig } from './config';
import type { DeliveryHealth, DispatchResult, JobDelivery } from './delivery';
import { JobNotFoundError, LeadNotFoundError } from './errors';
import { describeStatus, isTerminal, statusEquals } from './job-status';
import type { JobStore } from './job-store';
import { deriveLeadId } from './lead-identity';
import type { JobRecord, LeadPage, LeadRecord, SubmitLeadRequest } from './types';

export interface SubmitResult {
  job: JobRecord;
  lead: LeadRecord;
  dispatch: DispatchResult;
}

export interface StreamOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  store: 'ok' | 'unavailable';
  delivery: DeliveryHealth;
}

export type PauseFn = (ms: number, signal?: AbortSignal) => Promise<void>;

async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      return;
    }
    throw error;
  }
}

/**
 * Entry point for callers: submission, status and lead reads, and the
 * polling status stream. Reads always go to the store.
 */
export class EnrichmentService {
  private readonly logger = getLogger({ module: 'enrich-service' });
  private readonly metricsLogger: Logger = this.logger.child({ component: 'metrics' });

  constructor(
    private readonly config: EnrichServiceConfig,
    private readonly store: JobStore,
    private readonly delivery: JobDelivery,
    private readonly pauseFn: PauseFn = pause
  ) {}

  async submit(request: SubmitLeadRequest): Promise<SubmitResult> {
    const workspaceId = request.workspace_id.trim();
    if (!workspaceId) {
      throw badRequestError('workspace_id must not be empty.');
    }

    const startedAt = Date.now();
    const leadId = deriveLeadId(request.lead_input);
    const lead = await this.store.registerLead(leadId, request.lead_input, workspaceId);
    const job = await this.store.createJob(leadId, workspaceId, { force: request.force ?? false });
    const dispatch = await this.delivery.dispatch(job.jobId);

    this.metricsLogger.info(
      {
        metric: 'job_submission',
        jobId: job.jobId,
        leadId,
        workspaceId,
        mode: dispatch.mode,
        forced: job.force,
        durationMs: Date.now() - startedAt
      },
      'enrichment metric'
    );

    return { job, lead, dispatch };
  }

  async getStatus(jobId: string): Promise<JobRecord> {
    const job = await this.store.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  async getLead(leadId: string): Promise<LeadRecord> {
    const lead = await this.store.getLead(leadId);
    if (!lead) {
      throw new LeadNotFoundError(leadId);
    }
    return lead;
  }

  async listLeads(workspaceId: string, page = 1, size?: number): Promise<LeadPage> {
    const { defaultPageSize, maxPageSize } = this.config.leads;
    const pageSize = Math.min(maxPageSize, size ?? defaultPageSize);
    return this.store.listLeads(workspaceId, page, pageSize);
  }

  /**
   * Polls the job and yields a snapshot whenever its status changes. Ends
   * after a terminal status, when the timeout passes, or on abort. Throws
   * JobNotFoundError if the job is unknown on the first read.
   */
  async *stream(jobId: string, options: StreamOptions = {}): AsyncGenerator<JobRecord, void, undefined> {
    const { pollIntervalMs, maxWaitMs } = this.config.stream;
    const timeoutMs = Math.min(maxWaitMs, Math.max(0, options.timeoutMs ?? maxWaitMs));
    const deadline = Date.now() + timeoutMs;
    const { signal } = options;

    let last: JobRecord | null = null;
    let emitted = 0;

    try {
      for (;;) {
        if (signal?.aborted) {
          return;
        }

        const job = await this.store.getJob(jobId);
        if (!job) {
          if (!last) {
            throw new JobNotFoundError(jobId);
          }
          return;
        }

        if (!last || !statusEquals(last.status, job.status)) {
          last = job;
          emitted += 1;
          yield job;
        }

        if (isTerminal(job.status)) {
          return;
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          return;
        }
        await this.pauseFn(Math.min(pollIntervalMs, remaining), signal);
      }
    } finally {
      this.logger.debug(
        { jobId, emitted, lastStatus: last ? describeStatus(last.status) : null },
        'Status stream closed.'
      );
    }
  }

  async health(): Promise<HealthReport> {
    let store: HealthReport['store'] = 'ok';
    try {
      await this.store.ping();
    } catch (error) {
      this.logger.error({ error }, 'Job store health check failed.');
      store = 'unavailable';
    }

    const delivery = await this.delivery.health();
    const status = store === 'ok' && delivery !== 'queue_unreachable' ? 'ok' : 'degraded';
    return { status, store, delivery };
  }
}
