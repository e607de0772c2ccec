import type { FastifyError, FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { CoreError } from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  retryable?: boolean;
  details?: unknown;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      const response: ErrorResponse = {
        error: 'validation_error',
        message: 'Request validation failed',
        details: error.issues.map((e) => ({ path: e.path.join('.'), message: e.message })),
      };
      return reply.status(400).send(response);
    }

    if (error instanceof CoreError) {
      const response: ErrorResponse = {
        error: error.code,
        message: error.message,
        retryable: error.transient,
        details: error.details,
      };
      if (error.transient) request.log.warn({ code: error.code }, error.message);
      return reply.status(error.statusCode).send(response);
    }

    // Fastify's own client errors (bad JSON, unsupported media type, ...)
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.code ?? 'bad_request', message: error.message });
    }

    request.log.error(error);
    const response: ErrorResponse = { error: 'internal_error', message: 'An unexpected error occurred' };
    return reply.status(500).send(response);
  });
}
