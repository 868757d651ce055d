import type { FastifySchema } from 'fastify';

const jobIdParams = {
  type: 'object',
  required: ['jobId'],
  properties: {
    jobId: { type: 'string', minLength: 1 }
  }
} as const;

export const enqueueLeadSchema: FastifySchema = {
  body: {
    type: 'object',
    additionalProperties: false,
    required: ['lead_input', 'workspace_id'],
    properties: {
      lead_input: {
        type: 'object',
        minProperties: 1,
        properties: {
          company: { type: 'string' },
          name: { type: 'string' },
          contact: { type: 'string' },
          domain: { type: 'string' }
        }
      },
      workspace_id: { type: 'string', minLength: 1, maxLength: 128 },
      force: { type: 'boolean' }
    }
  },
  response: {
    202: {
      type: 'object',
      required: ['job_id', 'lead_id'],
      properties: {
        job_id: { type: 'string' },
        lead_id: { type: 'string' }
      }
    }
  }
};

export const jobStatusSchema: FastifySchema = {
  params: jobIdParams
};

export const listLeadsSchema: FastifySchema = {
  querystring: {
    type: 'object',
    required: ['workspace_id'],
    properties: {
      workspace_id: { type: 'string', minLength: 1 },
      page: { type: 'integer', minimum: 1 },
      size: { type: 'integer', minimum: 1 }
    }
  }
};

export const leadSchema: FastifySchema = {
  params: {
    type: 'object',
    required: ['leadId'],
    properties: {
      leadId: { type: 'string', minLength: 1 }
    }
  }
};

export const streamSchema: FastifySchema = {
  params: jobIdParams,
  querystring: {
    type: 'object',
    properties: {
      timeout_ms: { type: 'integer', minimum: 0 }
    }
  }
};
