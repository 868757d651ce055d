import { ServiceError } from '@pp/common';

export class DuplicateActiveJobError extends ServiceError {
  constructor(
    public readonly existingJobId: string,
    leadId: string,
    workspaceId: string
  ) {
    super('An enrichment job for this lead is already active in the workspace.', {
      statusCode: 409,
      code: 'duplicate_active_job',
      details: { job_id: existingJobId, lead_id: leadId, workspace_id: workspaceId }
    });
    this.name = 'DuplicateActiveJobError';
  }
}

export class JobNotFoundError extends ServiceError {
  constructor(public readonly jobId: string) {
    super(`Enrichment job ${jobId} was not found.`, {
      statusCode: 404,
      code: 'job_not_found',
      details: { job_id: jobId }
    });
    this.name = 'JobNotFoundError';
  }
}

export class LeadNotFoundError extends ServiceError {
  constructor(public readonly leadId: string) {
    super(`Lead ${leadId} was not found.`, {
      statusCode: 404,
      code: 'lead_not_found',
      details: { lead_id: leadId }
    });
    this.name = 'LeadNotFoundError';
  }
}

export class StoreUnavailableError extends ServiceError {
  constructor(operation: string, cause?: unknown) {
    super('Job store is unavailable.', {
      statusCode: 503,
      code: 'store_unavailable',
      details: { operation },
      cause
    });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A lost compare-and-set race on a job's status. Never surfaced to callers;
 * the losing actor logs it and drops its attempt.
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}.`);
    this.name = 'InvalidTransitionError';
  }
}
