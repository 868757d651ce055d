export const STAGES = ['mining', 'validation', 'synthesis'] as const;

export type StageName = (typeof STAGES)[number];

export type JobStatus =
  | { state: 'queued' }
  | { state: 'running' }
  | { state: 'stage_complete'; stage: StageName }
  | { state: 'succeeded' }
  | { state: 'failed'; reason: string };

export type JobState = JobStatus['state'];

export interface JobRecord {
  jobId: string;
  leadId: string;
  workspaceId: string;
  status: JobStatus;
  /** Fraction of the pipeline completed, derived from status. */
  progress: number;
  createdAt: string;
  updatedAt: string;
  attempts: number;
  force: boolean;
}

/** Caller-supplied identifying fields for a lead. */
export interface LeadInput {
  company?: string;
  name?: string;
  contact?: string;
  domain?: string;
  [field: string]: unknown;
}

export interface MinedResult {
  company: string;
  signals: string[];
}

export interface ValidatedResult {
  company: string;
  techStack: string[];
  risks: string[];
}

export interface SynthesizedResult {
  company: string;
  fitScore: number;
  wedge: string;
  techStack: string[];
  signals: string[];
}

export type LeadGrade = 'A' | 'B' | 'C' | 'D';

export interface StageResults {
  mining: MinedResult;
  validation: ValidatedResult;
  synthesis: SynthesizedResult;
}

export interface LeadRecord {
  leadId: string;
  rawInput: LeadInput;
  mined?: MinedResult;
  validated?: ValidatedResult;
  synthesized?: SynthesizedResult;
  grade?: LeadGrade;
  createdAt: string;
  updatedAt: string;
}

export interface LeadPage {
  items: LeadRecord[];
  page: number;
  size: number;
  total: number;
}

export interface SubmitLeadRequest {
  lead_input: LeadInput;
  workspace_id: string;
  force?: boolean;
}

export interface SubmitLeadResponse {
  job_id: string;
  lead_id: string;
}

export type StageFailure =
  | { kind: 'transient'; code: string; message?: string; retryAfterMs?: number }
  | { kind: 'permanent'; code: string; message: string };

export type StageOutcome<T> = { kind: 'ok'; result: T } | StageFailure;
