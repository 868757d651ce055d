import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { getLogger, sanitizeError } from '@pp/common';

import type { EnrichmentService } from './enrichment-service';
import { enqueueLeadSchema, jobStatusSchema, leadSchema, listLeadsSchema, streamSchema } from './schemas';
import type { SubmitLeadRequest, SubmitLeadResponse } from './types';

interface RegisterRoutesOptions {
  service: EnrichmentService;
}

interface ListLeadsQuery {
  workspace_id: string;
  page?: number;
  size?: number;
}

function formatEvent(event: string, id: string, data: unknown): string {
  return `event: ${event}\nid: ${id}\ndata: ${JSON.stringify(data)}\n\n`;
}

export async function registerRoutes(app: FastifyInstance, { service }: RegisterRoutesOptions): Promise<void> {
  const logger = getLogger({ module: 'enrich-routes' });

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const report = await service.health();
    if (report.store !== 'ok') {
      reply.status(503);
    }
    return report;
  });

  app.post(
    '/enqueue',
    { schema: enqueueLeadSchema },
    async (request: FastifyRequest<{ Body: SubmitLeadRequest }>, reply: FastifyReply): Promise<SubmitLeadResponse> => {
      const { job, dispatch } = await service.submit(request.body);
      request.log.info({ jobId: job.jobId, leadId: job.leadId, mode: dispatch.mode }, 'Accepted enrichment job.');
      reply.status(202);
      return { job_id: job.jobId, lead_id: job.leadId };
    }
  );

  app.get(
    '/status/:jobId',
    { schema: jobStatusSchema },
    async (request: FastifyRequest<{ Params: { jobId: string } }>) => service.getStatus(request.params.jobId)
  );

  app.get(
    '/leads',
    { schema: listLeadsSchema },
    async (request: FastifyRequest<{ Querystring: ListLeadsQuery }>) => {
      const { workspace_id: workspaceId, page, size } = request.query;
      return service.listLeads(workspaceId, page, size);
    }
  );

  app.get(
    '/leads/:leadId',
    { schema: leadSchema },
    async (request: FastifyRequest<{ Params: { leadId: string } }>) => service.getLead(request.params.leadId)
  );

  app.get(
    '/stream/:jobId',
    { schema: streamSchema },
    async (
      request: FastifyRequest<{ Params: { jobId: string }; Querystring: { timeout_ms?: number } }>,
      reply: FastifyReply
    ) => {
      const { jobId } = request.params;
      // Unknown jobs get a regular 404 before the response is taken over.
      await service.getStatus(jobId);

      const controller = new AbortController();
      reply.raw.on('close', () => controller.abort());

      reply.hijack();
      reply.raw.writeHead(200, {
        'content-type': 'text/event-stream',
        'cache-control': 'no-cache',
        connection: 'keep-alive',
        'x-request-id': request.requestContext.requestId
      });

      try {
        for await (const job of service.stream(jobId, { timeoutMs: request.query.timeout_ms, signal: controller.signal })) {
          reply.raw.write(formatEvent('status', job.updatedAt, job));
        }
      } catch (error) {
        logger.error({ error, jobId }, 'Status stream failed.');
        const { payload } = sanitizeError(error);
        reply.raw.write(formatEvent('error', jobId, payload));
      } finally {
        reply.raw.end();
      }
    }
  );
}
