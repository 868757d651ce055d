import { InvalidTransitionError } from './errors';
import { canTransition, describeStatus, isTerminal, nextTimestamp, progressOf } from './job-status';
import type {
  JobRecord,
  JobStatus,
  LeadGrade,
  LeadInput,
  LeadPage,
  LeadRecord,
  StageName,
  StageResults
} from './types';

export interface CreateJobOptions {
  /** Re-run stages whose results already exist and overwrite them. */
  force?: boolean;
}

export interface UpsertResultOptions {
  force?: boolean;
}

export interface UpsertResult {
  applied: boolean;
}

/**
 * Durable record of job lifecycle and lead results. Every mutation is atomic
 * and visible to all readers as soon as it resolves.
 */
export interface JobStore {
  /** Throws DuplicateActiveJobError when the lead already has a non-terminal job in the workspace. */
  createJob(leadId: string, workspaceId: string, options?: CreateJobOptions): Promise<JobRecord>;
  getJob(jobId: string): Promise<JobRecord | null>;
  /** Compare-and-set against the stored status; throws InvalidTransitionError on an illegal move. */
  updateJobStatus(jobId: string, next: JobStatus): Promise<JobRecord>;
  incrementAttempts(jobId: string): Promise<number>;
  /** Takes or renews the execution lease; refused for terminal jobs and while another owner's lease runs. */
  claimJob(jobId: string, owner: string, leaseMs: number): Promise<ClaimResult>;
  releaseJob(jobId: string, owner: string): Promise<void>;

  registerLead(leadId: string, rawInput: LeadInput, workspaceId: string): Promise<LeadRecord>;
  /** Writes a stage result only when absent, unless forced. */
  upsertLeadResult<K extends StageName>(
    leadId: string,
    stage: K,
    result: StageResults[K],
    options?: UpsertResultOptions
  ): Promise<UpsertResult>;
  setLeadGrade(leadId: string, grade: LeadGrade): Promise<void>;
  getLead(leadId: string): Promise<LeadRecord | null>;
  listLeads(workspaceId: string, page: number, size: number): Promise<LeadPage>;

  ping(): Promise<void>;
}

export interface JobLease {
  owner: string;
  expiresAt: number;
}

export function newJobRecord(jobId: string, leadId: string, workspaceId: string, force: boolean, now: number = Date.now()): JobRecord {
  const timestamp = new Date(now).toISOString();
  const status: JobStatus = { state: 'queued' };
  return {
    jobId,
    leadId,
    workspaceId,
    status,
    progress: progressOf(status),
    createdAt: timestamp,
    updatedAt: timestamp,
    attempts: 0,
    force
  };
}

/** Applies a status move to a record or throws when the state machine forbids it. */
export function transitionJob(job: JobRecord, next: JobStatus, now: number = Date.now()): JobRecord {
  if (!canTransition(job.status, next)) {
    throw new InvalidTransitionError(job.jobId, describeStatus(job.status), describeStatus(next));
  }
  return {
    ...job,
    status: next,
    progress: progressOf(next),
    updatedAt: nextTimestamp(job.updatedAt, now)
  };
}

export type ClaimResult =
  | { claimed: true }
  | { claimed: false; reason: 'terminal' }
  | { claimed: false; reason: 'leased'; owner: string; expiresInMs: number };

export function evaluateClaim(job: JobRecord, lease: JobLease | null, owner: string, now: number = Date.now()): ClaimResult {
  if (isTerminal(job.status)) {
    return { claimed: false, reason: 'terminal' };
  }
  if (!lease || lease.owner === owner || lease.expiresAt <= now) {
    return { claimed: true };
  }
  return { claimed: false, reason: 'leased', owner: lease.owner, expiresInMs: lease.expiresAt - now };
}

export function clampPage(page: number, size: number): { page: number; size: number; start: number } {
  const safePage = Number.isFinite(page) && page >= 1 ? Math.floor(page) : 1;
  const safeSize = Number.isFinite(size) && size >= 1 ? Math.floor(size) : 1;
  return { page: safePage, size: safeSize, start: (safePage - 1) * safeSize };
}
