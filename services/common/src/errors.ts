import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';

import { getLogger } from './logger';
import type { ErrorResponse } from './types';

export interface ServiceErrorOptions {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ServiceError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, { statusCode = 500, code = 'internal', details, cause }: ServiceErrorOptions = {}) {
    super(message);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

type ErrorFactory = (message: string, details?: Record<string, unknown>) => ServiceError;

function errorFactory(statusCode: number, code: string): ErrorFactory {
  return (message: string, details?: Record<string, unknown>) => new ServiceError(message, { statusCode, code, details });
}

export const badRequestError = errorFactory(400, 'bad_request');

interface SanitizedError {
  statusCode: number;
  payload: ErrorResponse;
}

function isClientFrameworkError(err: unknown): err is Error & { statusCode: number; validation?: unknown } {
  if (!(err instanceof Error) || !('statusCode' in err)) {
    return false;
  }
  const { statusCode } = err;
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

export function sanitizeError(err: unknown): SanitizedError {
  if (err instanceof ServiceError) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.code,
        message: err.message,
        details: err.details
      }
    };
  }

  // Schema validation and body parsing failures raised by Fastify itself.
  if (isClientFrameworkError(err)) {
    return {
      statusCode: err.statusCode,
      payload: {
        code: err.validation ? 'bad_request' : 'client_error',
        message: err.message
      }
    };
  }

  if (err instanceof Error) {
    return {
      statusCode: 500,
      payload: {
        code: 'internal',
        message: 'An unexpected error occurred.'
      }
    };
  }

  return {
    statusCode: 500,
    payload: {
      code: 'internal',
      message: 'Unknown error.'
    }
  };
}

function shouldLogError(statusCode: number): boolean {
  return statusCode >= 500;
}

export const errorHandlerPlugin: FastifyPluginAsync = fp(async (fastify) => {
  const logger = getLogger({ module: 'error-handler' });

  fastify.setErrorHandler(async (err: unknown, request: FastifyRequest, reply: FastifyReply) => {
    const sanitized = sanitizeError(err);
    const requestId = request.requestContext?.requestId;

    if (shouldLogError(sanitized.statusCode)) {
      logger.error({ err, requestId, path: request.url }, 'Request failed with server error.');
    } else {
      logger.warn({ err, requestId, path: request.url }, 'Request failed with client error.');
    }

    if (!reply.sent) {
      reply.status(sanitized.statusCode).send(sanitized.payload);
    }
  });
});
