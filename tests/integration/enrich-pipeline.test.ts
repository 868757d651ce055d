import { afterEach, describe, expect, it } from '@jest/globals';
import type { FastifyInstance } from 'fastify';

import { buildEnrichmentServer, createComponents, type EnrichmentComponents } from '../../services/pp-enrich-svc/src/app';
import { describeStatus } from '../../services/pp-enrich-svc/src/job-status';
import type { JobStore } from '../../services/pp-enrich-svc/src/job-store';
import { RedisQueueBroker } from '../../services/pp-enrich-svc/src/queue-broker';
import { RedisJobStore } from '../../services/pp-enrich-svc/src/redis-job-store';
import type { JobRecord, JobStatus, LeadRecord } from '../../services/pp-enrich-svc/src/types';
import { buildTestConfig } from '../support/config';
import { FakeRedis } from '../support/fake-redis';
import { RecordingJobStore } from '../support/recording-store';
import { ScriptedLimiter } from '../support/scripted-limiter';

const config = buildTestConfig();
const acme = { lead_input: { company: 'Acme', contact: 'jdoe@acme.com' }, workspace_id: 'ws-1' };

interface Harness {
  app: FastifyInstance;
  components: EnrichmentComponents;
  sleeps: number[];
}

function redisStore(fake: FakeRedis): RedisJobStore {
  return new RedisJobStore(config, async () => fake.asRedis());
}

function queueBroker(fake: FakeRedis): RedisQueueBroker {
  return new RedisQueueBroker(config.queue, async () => fake.asRedis());
}

function stableJob(job: JobRecord): Omit<JobRecord, 'jobId' | 'createdAt' | 'updatedAt'> {
  return {
    leadId: job.leadId,
    workspaceId: job.workspaceId,
    status: job.status,
    progress: job.progress,
    attempts: job.attempts,
    force: job.force
  };
}

function stableLead(lead: LeadRecord): Omit<LeadRecord, 'createdAt' | 'updatedAt'> {
  return {
    leadId: lead.leadId,
    rawInput: lead.rawInput,
    mined: lead.mined,
    validated: lead.validated,
    synthesized: lead.synthesized,
    grade: lead.grade
  };
}

function publishedStatuses(fake: FakeRedis, jobId: string): string[] {
  return fake.published
    .filter((event) => event.channel === `jobs:${jobId}:events`)
    .map((event) => {
      const parsed: { status: JobStatus } = JSON.parse(event.message);
      return describeStatus(parsed.status);
    });
}

async function settle(components: EnrichmentComponents, jobId: string, maxRounds = 50): Promise<JobRecord | null> {
  for (let round = 0; round < maxRounds; round += 1) {
    const job = await components.store.getJob(jobId);
    if (job && (job.status.state === 'succeeded' || job.status.state === 'failed')) {
      return job;
    }
    await components.worker.processNext(10);
  }
  return components.store.getJob(jobId);
}

describe('lead enrichment end to end', () => {
  const servers: FastifyInstance[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map((server) => server.close()));
  });

  async function harness(store: JobStore, broker: RedisQueueBroker | null, limiter = new ScriptedLimiter()): Promise<Harness> {
    const sleeps: number[] = [];
    const components = createComponents(config, {
      store,
      broker,
      limiter,
      sleep: async (ms: number) => {
        sleeps.push(ms);
      }
    });
    const app = await buildEnrichmentServer(components, { logger: false });
    servers.push(app);
    return { app, components, sleeps };
  }

  async function submit(app: FastifyInstance, body: object = acme): Promise<{ job_id: string; lead_id: string }> {
    const response = await app.inject({ method: 'POST', url: '/enqueue', payload: body });
    expect(response.statusCode).toBe(202);
    return response.json<{ job_id: string; lead_id: string }>();
  }

  it('enriches a queued lead through every stage', async () => {
    const storeRedis = new FakeRedis();
    const { app, components } = await harness(redisStore(storeRedis), queueBroker(new FakeRedis()));

    const { job_id: jobId, lead_id: leadId } = await submit(app);
    const queued = await app.inject({ method: 'GET', url: `/status/${jobId}` });
    expect(queued.json()).toMatchObject({ status: { state: 'queued' }, progress: 0 });

    await expect(components.worker.processNext(10)).resolves.toEqual({ kind: 'completed', jobId });

    expect(publishedStatuses(storeRedis, jobId)).toEqual([
      'running',
      'stage_complete(mining)',
      'stage_complete(validation)',
      'stage_complete(synthesis)',
      'succeeded'
    ]);

    const lead = (await app.inject({ method: 'GET', url: `/leads/${leadId}` })).json<LeadRecord>();
    expect(lead.mined).toEqual({
      company: 'Acme',
      signals: ['Acme mentioned cost pressures on forums', 'Acme evaluating cloud spend reduction']
    });
    expect(lead.validated?.techStack).toEqual(['AWS', 'Salesforce']);
    expect(lead.synthesized?.fitScore).toBe(85);
    expect(lead.grade).toBe('A');

    const stream = await app.inject({ method: 'GET', url: `/stream/${jobId}` });
    expect(stream.body.match(/^event: status$/gm)).toHaveLength(1);
    expect(stream.body).toContain('"state":"succeeded"');
  });

  it('retries rate-limited mining without writing it twice', async () => {
    const store = new RecordingJobStore();
    const limiter = new ScriptedLimiter({ signals: 2 });
    const { app, sleeps } = await harness(store, null, limiter);

    const { job_id: jobId } = await submit(app);

    const status = await app.inject({ method: 'GET', url: `/status/${jobId}` });
    expect(status.json()).toMatchObject({ status: { state: 'succeeded' }, attempts: 2 });
    expect(sleeps).toEqual([1, 2]);
    expect(limiter.calls).toEqual(['signals', 'signals', 'signals', 'techstack', 'scoring']);
    expect(store.writes.filter((write) => write.stage === 'mining')).toHaveLength(1);
    expect(store.statusesOf(jobId)).toEqual([
      'running',
      'stage_complete(mining)',
      'stage_complete(validation)',
      'stage_complete(synthesis)',
      'succeeded'
    ]);
  });

  it('resumes a queued job after a transient validation failure', async () => {
    const storeRedis = new FakeRedis();
    const limiter = new ScriptedLimiter({ techstack: 1 });
    const broker = queueBroker(new FakeRedis());
    const { app, components } = await harness(redisStore(storeRedis), broker, limiter);

    const { job_id: jobId } = await submit(app);
    const settled = await settle(components, jobId);

    expect(settled).toMatchObject({ status: { state: 'succeeded' }, attempts: 1 });
    expect(limiter.calls).toEqual(['signals', 'techstack', 'techstack', 'scoring']);
    expect(publishedStatuses(storeRedis, jobId)).toEqual([
      'running',
      'stage_complete(mining)',
      'stage_complete(validation)',
      'stage_complete(synthesis)',
      'succeeded'
    ]);
    await expect(broker.depth()).resolves.toBe(0);
  });

  it('produces the same records inline and through the queue', async () => {
    const inline = await harness(redisStore(new FakeRedis()), null);
    const queued = await harness(redisStore(new FakeRedis()), queueBroker(new FakeRedis()));

    const inlineIds = await submit(inline.app);
    const queuedIds = await submit(queued.app);
    await settle(queued.components, queuedIds.job_id);

    expect(inlineIds.lead_id).toBe(queuedIds.lead_id);

    const [inlineJob, queuedJob] = await Promise.all([
      inline.components.store.getJob(inlineIds.job_id),
      queued.components.store.getJob(queuedIds.job_id)
    ]);
    const [inlineLead, queuedLead] = await Promise.all([
      inline.components.store.getLead(inlineIds.lead_id),
      queued.components.store.getLead(queuedIds.lead_id)
    ]);
    if (!inlineJob || !queuedJob || !inlineLead || !queuedLead) {
      throw new Error('records missing');
    }

    expect(stableJob(queuedJob)).toEqual(stableJob(inlineJob));
    expect(stableJob(inlineJob)).toMatchObject({ status: { state: 'succeeded' }, progress: 1 });
    expect(stableLead(queuedLead)).toEqual(stableLead(inlineLead));
  });

  it('runs inline when the queue is unreachable and reports it', async () => {
    const unreachable = new RedisQueueBroker(config.queue, async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    });
    const { app } = await harness(redisStore(new FakeRedis()), unreachable);

    const { job_id: jobId } = await submit(app);

    const status = await app.inject({ method: 'GET', url: `/status/${jobId}` });
    expect(status.json()).toMatchObject({ status: { state: 'succeeded' } });

    const health = await app.inject({ method: 'GET', url: '/health' });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ status: 'degraded', store: 'ok', delivery: 'queue_unreachable' });
  });

  it('rejects duplicates only while a job is active', async () => {
    const store = new RecordingJobStore();
    const { app, components } = await harness(store, queueBroker(new FakeRedis()));

    const first = await submit(app);
    const duplicate = await app.inject({ method: 'POST', url: '/enqueue', payload: acme });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json()).toMatchObject({ code: 'duplicate_active_job', details: { job_id: first.job_id } });

    await settle(components, first.job_id);
    const second = await submit(app);
    expect(second.job_id).not.toBe(first.job_id);
    expect(second.lead_id).toBe(first.lead_id);

    await settle(components, second.job_id);
    await expect(store.getJob(second.job_id)).resolves.toMatchObject({ status: { state: 'succeeded' } });
    expect(store.writes.filter((write) => write.stage === 'mining')).toHaveLength(1);

    const leads = await app.inject({ method: 'GET', url: '/leads?workspace_id=ws-1' });
    expect(leads.json()).toMatchObject({ total: 1 });
  });

  it('fails jobs whose input cannot be mined', async () => {
    const { app } = await harness(new RecordingJobStore(), null);

    const { job_id: jobId } = await submit(app, { lead_input: { contact: 'someone@example.com' }, workspace_id: 'ws-1' });

    const stream = await app.inject({ method: 'GET', url: `/stream/${jobId}` });
    expect(stream.body).toContain('"reason":"invalid_input"');
    const status = await app.inject({ method: 'GET', url: `/status/${jobId}` });
    expect(status.json()).toMatchObject({ status: { state: 'failed', reason: 'invalid_input' }, progress: 0 });
  });
});
