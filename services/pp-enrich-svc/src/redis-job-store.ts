import { randomUUID } from 'node:crypto';

import { getLogger, getRedisClient, ServiceError } from '@pp/common';
import type { ChainableCommander, Redis } from 'ioredis';
import pLimit from 'p-limit';

import type { EnrichServiceConfig } from './config';
import {
  DuplicateActiveJobError,
  InvalidTransitionError,
  JobNotFoundError,
  LeadNotFoundError,
  StoreUnavailableError
} from './errors';
import { STAGE_FIELDS, decodeStatus, encodeStatus, isTerminal, nextTimestamp } from './job-status';
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

const MAX_CAS_ATTEMPTS = 10;
const GRADES: readonly LeadGrade[] = ['A', 'B', 'C', 'D'];

interface WatchPlan<T> {
  value: T;
  /** Commands queued inside MULTI; omitted when nothing needs writing. */
  commit?: (tx: ChainableCommander) => void;
}

type WatchOutcome<T> = { done: true; value: T } | { done: false };

export type RedisProvider = () => Promise<Redis>;

/**
 * Redis-backed store. Records live at `jobs:{id}` and `leads:{id}`; the
 * active-job index at `active:{workspace}:{lead}` and the per-workspace lead
 * listing at `workspaces:{workspace}:leads`.
 *
 * Compare-and-set uses WATCH/MULTI/EXEC. WATCH state belongs to the
 * connection, so transactional sections issued from this process are run one
 * at a time.
 */
export class RedisJobStore implements JobStore {
  private readonly logger = getLogger({ module: 'enrich-job-store' });
  private readonly serial = pLimit(1);

  constructor(
    private readonly config: EnrichServiceConfig,
    private readonly redisProvider: RedisProvider = getRedisClient
  ) {}

  private key(suffix: string): string {
    return `${this.config.store.keyPrefix}${suffix}`;
  }

  private jobKey(jobId: string): string {
    return this.key(`jobs:${jobId}`);
  }

  private jobEventsChannel(jobId: string): string {
    return this.key(`jobs:${jobId}:events`);
  }

  private leadKey(leadId: string): string {
    return this.key(`leads:${leadId}`);
  }

  private activeKey(workspaceId: string, leadId: string): string {
    return this.key(`active:${workspaceId}:${leadId}`);
  }

  private workspaceLeadsKey(workspaceId: string): string {
    return this.key(`workspaces:${workspaceId}:leads`);
  }

  async createJob(leadId: string, workspaceId: string, options: CreateJobOptions = {}): Promise<JobRecord> {
    const activeKey = this.activeKey(workspaceId, leadId);

    const job = await this.run('createJob', (redis) =>
      this.withWatch(redis, [activeKey], async (): Promise<WatchPlan<JobRecord>> => {
        const existingId = await redis.get(activeKey);
        if (existingId) {
          const existing = await this.readJob(redis, existingId);
          if (existing && !isTerminal(existing.status)) {
            throw new DuplicateActiveJobError(existingId, leadId, workspaceId);
          }
        }

        const record = newJobRecord(randomUUID(), leadId, workspaceId, options.force ?? false);
        return {
          value: record,
          commit: (tx) => {
            tx.hset(this.jobKey(record.jobId), this.serializeJob(record));
            tx.set(activeKey, record.jobId);
          }
        };
      })
    );

    this.logger.info({ jobId: job.jobId, leadId, workspaceId, force: job.force }, 'Created enrichment job.');
    return job;
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    return this.run('getJob', (redis) => this.readJob(redis, jobId));
  }

  async updateJobStatus(jobId: string, next: JobStatus): Promise<JobRecord> {
    const key = this.jobKey(jobId);

    const { previous, updated } = await this.run('updateJobStatus', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<{ previous: JobRecord; updated: JobRecord }>> => {
        const current = await this.readJob(redis, jobId);
        if (!current) {
          throw new JobNotFoundError(jobId);
        }

        const record = transitionJob(current, next);
        const terminal = isTerminal(record.status);
        const activeKey = this.activeKey(record.workspaceId, record.leadId);
        let releaseActive = false;
        if (terminal) {
          await redis.watch(activeKey);
          releaseActive = (await redis.get(activeKey)) === jobId;
        }

        return {
          value: { previous: current, updated: record },
          commit: (tx) => {
            tx.hset(key, {
              ...encodeStatus(record.status),
              progress: record.progress.toString(),
              updatedAt: record.updatedAt
            });
            if (terminal) {
              tx.hdel(key, 'leaseOwner', 'leaseExpiresAt');
            }
            if (releaseActive) {
              tx.del(activeKey);
            }
            tx.publish(this.jobEventsChannel(jobId), JSON.stringify({ jobId, status: record.status, updatedAt: record.updatedAt }));
          }
        };
      })
    );

    this.logger.info(
      { jobId, status: updated.status, previousStatus: previous.status, leadId: updated.leadId },
      'Updated enrichment job status.'
    );
    return updated;
  }

  async incrementAttempts(jobId: string): Promise<number> {
    const key = this.jobKey(jobId);
    return this.run('incrementAttempts', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<number>> => {
        const current = await this.readJob(redis, jobId);
        if (!current) {
          throw new JobNotFoundError(jobId);
        }
        const attempts = current.attempts + 1;
        return {
          value: attempts,
          commit: (tx) => {
            tx.hset(key, { attempts: attempts.toString() });
          }
        };
      })
    );
  }

  async claimJob(jobId: string, owner: string, leaseMs: number): Promise<ClaimResult> {
    const key = this.jobKey(jobId);
    return this.run('claimJob', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<ClaimResult>> => {
        const hash = await redis.hgetall(key);
        const current = this.deserializeJob(hash);
        if (!current) {
          throw new JobNotFoundError(jobId);
        }
        const now = Date.now();
        const claim = evaluateClaim(current, this.readLease(hash), owner, now);
        if (!claim.claimed) {
          return { value: claim };
        }
        return {
          value: claim,
          commit: (tx) => {
            tx.hset(key, { leaseOwner: owner, leaseExpiresAt: (now + leaseMs).toString() });
          }
        };
      })
    );
  }

  async releaseJob(jobId: string, owner: string): Promise<void> {
    const key = this.jobKey(jobId);
    await this.run('releaseJob', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<void>> => {
        const leaseOwner = await redis.hget(key, 'leaseOwner');
        if (leaseOwner !== owner) {
          return { value: undefined };
        }
        return {
          value: undefined,
          commit: (tx) => {
            tx.hdel(key, 'leaseOwner', 'leaseExpiresAt');
          }
        };
      })
    );
  }

  async registerLead(leadId: string, rawInput: LeadInput, workspaceId: string): Promise<LeadRecord> {
    const key = this.leadKey(leadId);
    const indexKey = this.workspaceLeadsKey(workspaceId);

    return this.run('registerLead', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<LeadRecord>> => {
        const existing = this.deserializeLead(await redis.hgetall(key));
        const now = Date.now();
        const record: LeadRecord = existing ?? {
          leadId,
          rawInput,
          createdAt: new Date(now).toISOString(),
          updatedAt: new Date(now).toISOString()
        };

        return {
          value: record,
          commit: (tx) => {
            if (!existing) {
              tx.hset(key, this.serializeLead(record));
            }
            tx.zadd(indexKey, 'NX', now, leadId);
          }
        };
      })
    );
  }

  async upsertLeadResult<K extends StageName>(
    leadId: string,
    stage: K,
    result: StageResults[K],
    options: UpsertResultOptions = {}
  ): Promise<UpsertResult> {
    const key = this.leadKey(leadId);
    const field = STAGE_FIELDS[stage];

    const outcome = await this.run('upsertLeadResult', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<UpsertResult>> => {
        const hash = await redis.hgetall(key);
        if (Object.keys(hash).length === 0) {
          throw new LeadNotFoundError(leadId);
        }
        if (hash[field] && !options.force) {
          return { value: { applied: false } };
        }
        return {
          value: { applied: true },
          commit: (tx) => {
            tx.hset(key, { [field]: JSON.stringify(result), updatedAt: nextTimestamp(hash.updatedAt) });
          }
        };
      })
    );

    this.logger.debug({ leadId, stage, applied: outcome.applied, force: options.force ?? false }, 'Upserted lead stage result.');
    return outcome;
  }

  async setLeadGrade(leadId: string, grade: LeadGrade): Promise<void> {
    const key = this.leadKey(leadId);
    await this.run('setLeadGrade', (redis) =>
      this.withWatch(redis, [key], async (): Promise<WatchPlan<void>> => {
        const hash = await redis.hgetall(key);
        if (Object.keys(hash).length === 0) {
          throw new LeadNotFoundError(leadId);
        }
        if (!hash.synthesized) {
          throw new Error(`Lead ${leadId} cannot be graded before synthesis completes.`);
        }
        return {
          value: undefined,
          commit: (tx) => {
            tx.hset(key, { grade, updatedAt: nextTimestamp(hash.updatedAt) });
          }
        };
      })
    );
  }

  async getLead(leadId: string): Promise<LeadRecord | null> {
    return this.run('getLead', async (redis) => this.deserializeLead(await redis.hgetall(this.leadKey(leadId))));
  }

  async listLeads(workspaceId: string, page: number, size: number): Promise<LeadPage> {
    const bounds = clampPage(page, size);
    const indexKey = this.workspaceLeadsKey(workspaceId);

    return this.run('listLeads', async (redis) => {
      const total = await redis.zcard(indexKey);
      const leadIds = await redis.zrange(indexKey, bounds.start, bounds.start + bounds.size - 1);
      const hashes = await Promise.all(leadIds.map((leadId) => redis.hgetall(this.leadKey(leadId))));
      const items = hashes
        .map((hash) => this.deserializeLead(hash))
        .filter((lead): lead is LeadRecord => lead !== null);
      return { items, page: bounds.page, size: bounds.size, total };
    });
  }

  async ping(): Promise<void> {
    await this.run('ping', (redis) => redis.ping());
  }

  private async run<T>(operation: string, action: (redis: Redis) => Promise<T>): Promise<T> {
    let redis: Redis;
    try {
      redis = await this.redisProvider();
    } catch (error) {
      this.logger.error({ error, operation }, 'Failed to acquire Redis client.');
      throw new StoreUnavailableError(operation, error);
    }

    try {
      return await action(redis);
    } catch (error) {
      if (error instanceof ServiceError || error instanceof InvalidTransitionError) {
        throw error;
      }
      this.logger.error({ error, operation }, 'Job store operation failed.');
      throw new StoreUnavailableError(operation, error);
    }
  }

  private async withWatch<T>(redis: Redis, keys: string[], plan: () => Promise<WatchPlan<T>>): Promise<T> {
    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt += 1) {
      const outcome = await this.serial(() => this.attemptWatched(redis, keys, plan));
      if (outcome.done) {
        return outcome.value;
      }
      this.logger.debug({ keys, attempt }, 'Watched keys changed before commit; retrying.');
    }
    throw new Error(`Gave up after ${MAX_CAS_ATTEMPTS} contended attempts on ${keys.join(', ')}.`);
  }

  private async attemptWatched<T>(redis: Redis, keys: string[], plan: () => Promise<WatchPlan<T>>): Promise<WatchOutcome<T>> {
    await redis.watch(...keys);

    let decided: WatchPlan<T>;
    try {
      decided = await plan();
    } catch (error) {
      await redis.unwatch();
      throw error;
    }

    if (!decided.commit) {
      await redis.unwatch();
      return { done: true, value: decided.value };
    }

    const tx = redis.multi();
    decided.commit(tx);
    const results = await tx.exec();
    if (results === null) {
      return { done: false };
    }

    const failure = results.find(([error]) => error !== null);
    if (failure?.[0]) {
      throw failure[0];
    }
    return { done: true, value: decided.value };
  }

  private async readJob(redis: Redis, jobId: string): Promise<JobRecord | null> {
    return this.deserializeJob(await redis.hgetall(this.jobKey(jobId)));
  }

  private readLease(hash: Record<string, string>): JobLease | null {
    if (!hash.leaseOwner) {
      return null;
    }
    return { owner: hash.leaseOwner, expiresAt: Number(hash.leaseExpiresAt ?? 0) };
  }

  private serializeJob(record: JobRecord): Record<string, string> {
    return {
      jobId: record.jobId,
      leadId: record.leadId,
      workspaceId: record.workspaceId,
      ...encodeStatus(record.status),
      progress: record.progress.toString(),
      createdAt: record.createdAt,
      updatedAt: record.updatedAt,
      attempts: record.attempts.toString(),
      force: record.force ? '1' : '0'
    };
  }

  private deserializeJob(hash: Record<string, string>): JobRecord | null {
    if (!hash || !hash.jobId) {
      return null;
    }

    return {
      jobId: hash.jobId,
      leadId: hash.leadId,
      workspaceId: hash.workspaceId,
      status: decodeStatus(hash),
      progress: Number(hash.progress ?? 0),
      createdAt: hash.createdAt,
      updatedAt: hash.updatedAt,
      attempts: Number(hash.attempts ?? 0),
      force: hash.force === '1'
    } satisfies JobRecord;
  }

  private serializeLead(record: LeadRecord): Record<string, string> {
    const base: Record<string, string> = {
      leadId: record.leadId,
      rawInput: JSON.stringify(record.rawInput),
      createdAt: record.createdAt,
      updatedAt: record.updatedAt
    };
    if (record.mined) {
      base.mined = JSON.stringify(record.mined);
    }
    if (record.validated) {
      base.validated = JSON.stringify(record.validated);
    }
    if (record.synthesized) {
      base.synthesized = JSON.stringify(record.synthesized);
    }
    if (record.grade) {
      base.grade = record.grade;
    }
    return base;
  }

  private deserializeLead(hash: Record<string, string>): LeadRecord | null {
    if (!hash || !hash.leadId) {
      return null;
    }

    const grade = GRADES.find((value) => value === hash.grade);
    return {
      leadId: hash.leadId,
      rawInput: hash.rawInput ? (JSON.parse(hash.rawInput) as LeadInput) : {},
      mined: hash.mined ? (JSON.parse(hash.mined) as StageResults['mining']) : undefined,
      validated: hash.validated ? (JSON.parse(hash.validated) as StageResults['validation']) : undefined,
      synthesized: hash.synthesized ? (JSON.parse(hash.synthesized) as StageResults['synthesis']) : undefined,
      grade,
      createdAt: hash.createdAt,
      updatedAt: hash.updatedAt
    } satisfies LeadRecord;
  }
}
