import { getLogger } from '@pp/common';
import type { Logger } from 'pino';

import { InvalidTransitionError } from './errors';
import { STAGE_FIELDS, completedStageCount, describeStatus, isTerminal } from './job-status';
import type { JobStore } from './job-store';
import type { RateLimiter } from './rate-limiter';
import { DEFAULT_STAGES, gradeFor, type PipelineStages, type Stage } from './stages';
import type { JobRecord, LeadRecord, StageName, StageOutcome, StageResults } from './types';

export type ExecutionResult =
  | { kind: 'completed'; job: JobRecord }
  | { kind: 'failed'; job: JobRecord; reason: string }
  | { kind: 'transient'; code: string; retryAfterMs?: number }
  | { kind: 'abandoned'; reason: 'missing' | 'terminal' | 'lost_race' };

type StepResult =
  | { kind: 'advanced'; job: JobRecord; lead: LeadRecord }
  | Exclude<ExecutionResult, { kind: 'completed' } | { kind: 'abandoned' }>;

/**
 * Drives one job through mining, validation and synthesis. Stages the job has
 * already completed are skipped, so a re-delivered job resumes where it
 * stopped.
 */
export class PipelineExecutor {
  private readonly logger = getLogger({ module: 'enrich-pipeline' });

  constructor(
    private readonly store: JobStore,
    private readonly limiter: RateLimiter,
    private readonly stages: PipelineStages = DEFAULT_STAGES
  ) {}

  async execute(jobId: string): Promise<ExecutionResult> {
    try {
      return await this.run(jobId);
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        this.logger.info({ jobId, from: error.from, to: error.to }, 'Lost status race; abandoning attempt.');
        return { kind: 'abandoned', reason: 'lost_race' };
      }
      throw error;
    }
  }

  private async run(jobId: string): Promise<ExecutionResult> {
    let job = await this.store.getJob(jobId);
    if (!job) {
      this.logger.warn({ jobId }, 'Job not found when attempting to execute.');
      return { kind: 'abandoned', reason: 'missing' };
    }
    if (isTerminal(job.status)) {
      this.logger.info({ jobId, status: describeStatus(job.status) }, 'Skipping job already in a terminal state.');
      return { kind: 'abandoned', reason: 'terminal' };
    }

    const jobLogger = this.logger.child({ jobId, leadId: job.leadId, workspaceId: job.workspaceId });

    if (job.status.state === 'queued') {
      job = await this.store.updateJobStatus(jobId, { state: 'running' });
    }

    let lead = await this.store.getLead(job.leadId);
    if (!lead) {
      const failed = await this.store.updateJobStatus(jobId, { state: 'failed', reason: 'lead_not_found' });
      jobLogger.error('Lead record missing; job failed.');
      return { kind: 'failed', job: failed, reason: 'lead_not_found' };
    }

    const [miner, validator, synthesizer] = this.stages;
    const steps: Array<(current: JobRecord, snapshot: LeadRecord) => Promise<StepResult>> = [
      (current, snapshot) => this.runStage(miner, current, snapshot, jobLogger),
      (current, snapshot) => this.runStage(validator, current, snapshot, jobLogger),
      (current, snapshot) => this.runStage(synthesizer, current, snapshot, jobLogger)
    ];

    for (const [index, step] of steps.entries()) {
      if (completedStageCount(job.status) > index) {
        continue;
      }
      const outcome = await step(job, lead);
      if (outcome.kind !== 'advanced') {
        return outcome;
      }
      job = outcome.job;
      lead = outcome.lead;
    }

    if (!lead.synthesized) {
      throw new Error(`Lead ${lead.leadId} has no synthesis result after the pipeline finished.`);
    }

    const grade = gradeFor(lead.synthesized);
    await this.store.setLeadGrade(lead.leadId, grade);
    job = await this.store.updateJobStatus(jobId, { state: 'succeeded' });
    jobLogger.info({ grade, attempts: job.attempts }, 'Enrichment job succeeded.');
    return { kind: 'completed', job };
  }

  private async runStage<K extends StageName>(
    stage: Stage<K>,
    job: JobRecord,
    lead: LeadRecord,
    jobLogger: Logger
  ): Promise<StepResult> {
    const field = STAGE_FIELDS[stage.kind];
    const alreadyPresent = lead[field] !== undefined;

    if (!alreadyPresent || job.force) {
      const outcome = await this.invoke(stage, lead, jobLogger);

      if (outcome.kind === 'transient') {
        jobLogger.warn(
          { stage: stage.kind, code: outcome.code, retryAfterMs: outcome.retryAfterMs },
          'Stage failed transiently.'
        );
        return { kind: 'transient', code: outcome.code, retryAfterMs: outcome.retryAfterMs };
      }

      if (outcome.kind === 'permanent') {
        const failed = await this.store.updateJobStatus(job.jobId, { state: 'failed', reason: outcome.code });
        jobLogger.error({ stage: stage.kind, code: outcome.code, message: outcome.message }, 'Stage failed permanently.');
        return { kind: 'failed', job: failed, reason: outcome.code };
      }

      const { applied } = await this.store.upsertLeadResult(lead.leadId, stage.kind, outcome.result, { force: job.force });
      if (!applied) {
        jobLogger.info({ stage: stage.kind }, 'Stage result already present; keeping the stored value.');
      }
    } else {
      jobLogger.debug({ stage: stage.kind }, 'Stage result already present on lead; skipping stage.');
    }

    const refreshed = await this.store.getLead(lead.leadId);
    if (!refreshed) {
      throw new Error(`Lead ${lead.leadId} disappeared during stage ${stage.kind}.`);
    }
    const advanced = await this.store.updateJobStatus(job.jobId, { state: 'stage_complete', stage: stage.kind });
    jobLogger.info({ stage: stage.kind, progress: advanced.progress }, 'Stage complete.');
    return { kind: 'advanced', job: advanced, lead: refreshed };
  }

  private async invoke<K extends StageName>(
    stage: Stage<K>,
    lead: LeadRecord,
    jobLogger: Logger
  ): Promise<StageOutcome<StageResults[K]>> {
    try {
      return await stage.run(lead, this.limiter);
    } catch (error) {
      jobLogger.warn({ error, stage: stage.kind }, 'Stage threw unexpectedly; treating as transient.');
      return { kind: 'transient', code: 'stage_error' };
    }
  }
}
