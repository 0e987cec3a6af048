import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '../lib/errors';

/**
 * Maps domain errors and request validation failures onto the
 * `{ success: false, error, code, details? }` envelope.
 */
export function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof ZodError) {
    request.log.info({ issues: error.issues }, 'Request validation failed');
    return reply.code(400).send({
      success: false,
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      details: {
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    });
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      request.log.error({ err: error }, error.message);
    } else {
      request.log.info({ code: error.code, details: error.details }, error.message);
    }
    return reply.code(error.statusCode).send({
      success: false,
      error: error.message,
      code: error.code,
      ...(error.details ? { details: error.details } : {}),
    });
  }

  // Fastify's own client errors (malformed JSON, payload too large, ...)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return reply.code(error.statusCode).send({
      success: false,
      error: error.message,
      code: 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST',
    });
  }

  request.log.error({ err: error }, 'Unhandled error');
  return reply.code(500).send({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
}
