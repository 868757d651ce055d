import { randomUUID } from 'node:crypto';

import { getLogger } from '@pp/common';

import { DuplicateActiveJobError, JobNotFoundError, LeadNotFoundError } from './errors';
import { STAGE_FIELDS, isTerminal, nextTimestamp } from './job-status';
import {
  clampPage,
  evaluateClaim,
  newJobRecord,
  transitionJob,
  type ClaimResult,
  type CreateJobOptions,
  type JobLease,
  type JobStore,
  type UpsertResult,
  type UpsertResultOptions
} from './job-store';
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

/**
 * Process-local store for development and tests. Every method body runs
 * synchronously between awaits, which makes each mutation atomic for all
 * callers sharing the instance.
 */
export class InMemoryJobStore implements JobStore {
  private readonly logger = getLogger({ module: 'enrich-job-store' });
  private readonly jobs = new Map<string, JobRecord>();
  private readonly leases = new Map<string, JobLease>();
  private readonly leads = new Map<string, LeadRecord>();
  private readonly activeJobs = new Map<string, string>();
  private readonly workspaceLeads = new Map<string, string[]>();

  constructor(private readonly idFactory: () => string = randomUUID) {}

  async createJob(leadId: string, workspaceId: string, options: CreateJobOptions = {}): Promise<JobRecord> {
    const activeKey = `${workspaceId}:${leadId}`;
    const existingId = this.activeJobs.get(activeKey);
    const existing = existingId ? this.jobs.get(existingId) : undefined;
    if (existingId && existing && !isTerminal(existing.status)) {
      throw new DuplicateActiveJobError(existingId, leadId, workspaceId);
    }

    const record = newJobRecord(this.idFactory(), leadId, workspaceId, options.force ?? false);
    this.jobs.set(record.jobId, record);
    this.activeJobs.set(activeKey, record.jobId);
    this.logger.info({ jobId: record.jobId, leadId, workspaceId, force: record.force }, 'Created enrichment job.');
    return structuredClone(record);
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    const record = this.jobs.get(jobId);
    return record ? structuredClone(record) : null;
  }

  async updateJobStatus(jobId: string, next: JobStatus): Promise<JobRecord> {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }

    const updated = transitionJob(current, next);
    this.jobs.set(jobId, updated);

    if (isTerminal(updated.status)) {
      this.leases.delete(jobId);
      const activeKey = `${updated.workspaceId}:${updated.leadId}`;
      if (this.activeJobs.get(activeKey) === jobId) {
        this.activeJobs.delete(activeKey);
      }
    }

    this.logger.info(
      { jobId, status: updated.status, previousStatus: current.status, leadId: updated.leadId },
      'Updated enrichment job status.'
    );
    return structuredClone(updated);
  }

  async incrementAttempts(jobId: string): Promise<number> {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }
    const attempts = current.attempts + 1;
    this.jobs.set(jobId, { ...current, attempts });
    return attempts;
  }

  async claimJob(jobId: string, owner: string, leaseMs: number): Promise<ClaimResult> {
    const current = this.jobs.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }
    const now = Date.now();
    const claim = evaluateClaim(current, this.leases.get(jobId) ?? null, owner, now);
    if (claim.claimed) {
      this.leases.set(jobId, { owner, expiresAt: now + leaseMs });
    }
    return claim;
  }

  async releaseJob(jobId: string, owner: string): Promise<void> {
    if (this.leases.get(jobId)?.owner === owner) {
      this.leases.delete(jobId);
    }
  }

  async registerLead(leadId: string, rawInput: LeadInput, workspaceId: string): Promise<LeadRecord> {
    let record = this.leads.get(leadId);
    if (!record) {
      const timestamp = new Date().toISOString();
      record = { leadId, rawInput: structuredClone(rawInput), createdAt: timestamp, updatedAt: timestamp };
      this.leads.set(leadId, record);
    }

    const members = this.workspaceLeads.get(workspaceId) ?? [];
    if (!members.includes(leadId)) {
      members.push(leadId);
      this.workspaceLeads.set(workspaceId, members);
    }
    return structuredClone(record);
  }

  async upsertLeadResult<K extends StageName>(
    leadId: string,
    stage: K,
    result: StageResults[K],
    options: UpsertResultOptions = {}
  ): Promise<UpsertResult> {
    const current = this.leads.get(leadId);
    if (!current) {
      throw new LeadNotFoundError(leadId);
    }

    const field = STAGE_FIELDS[stage];
    if (current[field] && !options.force) {
      return { applied: false };
    }

    this.leads.set(leadId, {
      ...current,
      [field]: structuredClone(result),
      updatedAt: nextTimestamp(current.updatedAt)
    });
    this.logger.debug({ leadId, stage, applied: true, force: options.force ?? false }, 'Upserted lead stage result.');
    return { applied: true };
  }

  async setLeadGrade(leadId: string, grade: LeadGrade): Promise<void> {
    const current = this.leads.get(leadId);
    if (!current) {
      throw new LeadNotFoundError(leadId);
    }
    if (!current.synthesized) {
      throw new Error(`Lead ${leadId} cannot be graded before synthesis completes.`);
    }
    this.leads.set(leadId, { ...current, grade, updatedAt: nextTimestamp(current.updatedAt) });
  }

  async getLead(leadId: string): Promise<LeadRecord | null> {
    const record = this.leads.get(leadId);
    return record ? structuredClone(record) : null;
  }

  async listLeads(workspaceId: string, page: number, size: number): Promise<LeadPage> {
    const bounds = clampPage(page, size);
    const members = this.workspaceLeads.get(workspaceId) ?? [];
    const items = members
      .slice(bounds.start, bounds.start + bounds.size)
      .map((leadId) => this.leads.get(leadId))
      .filter((lead): lead is LeadRecord => lead !== undefined)
      .map((lead) => structuredClone(lead));
    return { items, page: bounds.page, size: bounds.size, total: members.length };
  }

  async ping(): Promise<void> {
    return;
  }
}
