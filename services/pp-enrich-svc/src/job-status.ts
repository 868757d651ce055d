import { STAGES, type JobStatus, type LeadRecord, type StageName } from './types';

export const STAGE_FIELDS = {
  mining: 'mined',
  validation: 'validated',
  synthesis: 'synthesized'
} as const satisfies Record<StageName, keyof LeadRecord>;

export type StageField = (typeof STAGE_FIELDS)[StageName];

const PROGRESS: Record<StageName, number> = {
  mining: 0.2,
  validation: 0.5,
  synthesis: 0.8
};

export function isStageName(value: string): value is StageName {
  return STAGES.some((stage) => stage === value);
}

export function isTerminal(status: JobStatus): boolean {
  return status.state === 'succeeded' || status.state === 'failed';
}

/**
 * Number of stages the job has already completed. Stages are completed in
 * order, so this is also the index of the next stage to run.
 */
export function completedStageCount(status: JobStatus): number {
  switch (status.state) {
    case 'queued':
    case 'running':
      return 0;
    case 'stage_complete':
      return STAGES.indexOf(status.stage) + 1;
    case 'succeeded':
      return STAGES.length;
    case 'failed':
      return 0;
  }
}

export function progressOf(status: JobStatus): number {
  switch (status.state) {
    case 'queued':
    case 'running':
    case 'failed':
      return 0;
    case 'stage_complete':
      return PROGRESS[status.stage];
    case 'succeeded':
      return 1;
  }
}

/**
 * queued -> running -> stage_complete(mining) -> stage_complete(validation)
 * -> stage_complete(synthesis) -> succeeded, with failed reachable from any
 * state after queued. Terminal states have no successors.
 */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  if (isTerminal(from)) {
    return false;
  }

  switch (to.state) {
    case 'queued':
      return false;
    case 'running':
      return from.state === 'queued';
    case 'stage_complete': {
      const index = STAGES.indexOf(to.stage);
      if (index === 0) {
        return from.state === 'running';
      }
      return from.state === 'stage_complete' && from.stage === STAGES[index - 1];
    }
    case 'succeeded':
      return from.state === 'stage_complete' && from.stage === STAGES[STAGES.length - 1];
    case 'failed':
      return from.state !== 'queued';
  }
}

export function statusEquals(a: JobStatus, b: JobStatus): boolean {
  return describeStatus(a) === describeStatus(b);
}

/** Compact form used in logs and error messages, e.g. `stage_complete(mining)`. */
export function describeStatus(status: JobStatus): string {
  switch (status.state) {
    case 'stage_complete':
      return `stage_complete(${status.stage})`;
    case 'failed':
      return `failed(${status.reason})`;
    default:
      return status.state;
  }
}

export interface EncodedStatus {
  status: string;
  stage: string;
  reason: string;
}

export function encodeStatus(status: JobStatus): EncodedStatus {
  return {
    status: status.state,
    stage: status.state === 'stage_complete' ? status.stage : '',
    reason: status.state === 'failed' ? status.reason : ''
  };
}

export function decodeStatus(fields: Partial<EncodedStatus>): JobStatus {
  switch (fields.status) {
    case 'queued':
      return { state: 'queued' };
    case 'running':
      return { state: 'running' };
    case 'succeeded':
      return { state: 'succeeded' };
    case 'stage_complete':
      if (fields.stage && isStageName(fields.stage)) {
        return { state: 'stage_complete', stage: fields.stage };
      }
      throw new Error(`Stored job status has an unknown stage: ${fields.stage ?? '<missing>'}`);
    case 'failed':
      return { state: 'failed', reason: fields.reason || 'unknown' };
    default:
      throw new Error(`Stored job status is not recognised: ${fields.status ?? '<missing>'}`);
  }
}

/**
 * Timestamps must strictly increase per record even when two writes land in
 * the same millisecond.
 */
export function nextTimestamp(previous: string | undefined, now: number = Date.now()): string {
  const previousMs = previous ? Date.parse(previous) : Number.NaN;
  const next = Number.isFinite(previousMs) && previousMs >= now ? previousMs + 1 : now;
  return new Date(next).toISOString();
}
