import { companyOf } from './lead-identity';
import type { RateLimiter } from './rate-limiter';
import type {
  LeadGrade,
  LeadRecord,
  MinedResult,
  StageFailure,
  StageName,
  StageOutcome,
  StageResults,
  SynthesizedResult,
  ValidatedResult
} from './types';

export interface Stage<K extends StageName = StageName> {
  readonly kind: K;
  /** Rate limiter key of the external provider this stage calls. */
  readonly provider: string;
  run(lead: LeadRecord, limiter: RateLimiter): Promise<StageOutcome<StageResults[K]>>;
}

export type PipelineStages = readonly [Stage<'mining'>, Stage<'validation'>, Stage<'synthesis'>];

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

async function throttle(limiter: RateLimiter, provider: string): Promise<StageFailure | null> {
  const permit = await limiter.acquire(provider);
  if (permit.granted) {
    return null;
  }
  return {
    kind: 'transient',
    code: 'rate_limited',
    message: `Provider ${provider} is rate limited.`,
    retryAfterMs: permit.retryAfterMs
  };
}

function missingCompany(): StageFailure {
  return { kind: 'permanent', code: 'invalid_input', message: 'Lead input has no company or name.' };
}

/** Discovers public buying signals for the lead's company. */
export const minerStage: Stage<'mining'> = {
  kind: 'mining',
  provider: 'signals',
  async run(lead, limiter): Promise<StageOutcome<MinedResult>> {
    const company = companyOf(lead.rawInput);
    if (!company) {
      return missingCompany();
    }

    const blocked = await throttle(limiter, 'signals');
    if (blocked) {
      return blocked;
    }

    return {
      kind: 'ok',
      result: {
        company,
        signals: [`${company} mentioned cost pressures on forums`, `${company} evaluating cloud spend reduction`]
      }
    };
  }
};

/** Competitive checks and tech stack inference. */
export const validatorStage: Stage<'validation'> = {
  kind: 'validation',
  provider: 'techstack',
  async run(lead, limiter): Promise<StageOutcome<ValidatedResult>> {
    const company = companyOf(lead.rawInput);
    if (!company) {
      return missingCompany();
    }

    const blocked = await throttle(limiter, 'techstack');
    if (blocked) {
      return blocked;
    }

    const risks = ['Unknown budget owner'];
    const contact = typeof lead.rawInput.contact === 'string' ? lead.rawInput.contact.trim() : '';
    if (contact.length > 0 && !EMAIL_PATTERN.test(contact)) {
      risks.push('Contact is not a deliverable e-mail address');
    }

    return {
      kind: 'ok',
      result: {
        company,
        techStack: ['AWS', 'Salesforce'],
        risks
      }
    };
  }
};

export function computeFitScore(mined: MinedResult, validated: ValidatedResult): number {
  const base = mined.signals.length > 0 ? 90 : 70;
  const riskPenalty = validated.risks.length * 5;
  return Math.max(0, Math.min(100, base - riskPenalty));
}

/** Combines mined signals and validation into a fit score and outreach wedge. */
export const synthesizerStage: Stage<'synthesis'> = {
  kind: 'synthesis',
  provider: 'scoring',
  async run(lead, limiter): Promise<StageOutcome<SynthesizedResult>> {
    const { mined, validated } = lead;
    if (!mined || !validated) {
      return {
        kind: 'permanent',
        code: 'missing_stage_input',
        message: 'Synthesis needs mining and validation results.'
      };
    }

    const blocked = await throttle(limiter, 'scoring');
    if (blocked) {
      return blocked;
    }

    const company = mined.company;
    const mentionsCost = mined.signals.join(' ').toLowerCase().includes('cost');
    const wedge = mentionsCost
      ? `${company} faces cost pressure; lead with ROI and consolidation.`
      : `${company} can trim tooling costs with your bundled pricing.`;

    return {
      kind: 'ok',
      result: {
        company,
        fitScore: computeFitScore(mined, validated),
        wedge,
        techStack: validated.techStack,
        signals: mined.signals
      }
    };
  }
};

export const DEFAULT_STAGES: PipelineStages = [minerStage, validatorStage, synthesizerStage];

export function gradeFor(synthesized: SynthesizedResult): LeadGrade {
  const score = synthesized.fitScore;
  if (score >= 85) {
    return 'A';
  }
  if (score >= 70) {
    return 'B';
  }
  if (score >= 50) {
    return 'C';
  }
  return 'D';
}
