import { FastifyRequest, FastifyReply } from 'fastify';
import { authService, JwtPayload } from '../services/auth.service';
import type { OperationContext } from '../lib/context';

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
}

/**
 * Simple auth middleware - import and use directly in preHandler
 * Usage: { preHandler: [authenticate] }
 */
export async function authenticate(request: FastifyRequest, reply: FastifyReply) {
  try {
    const authHeader = request.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return reply.code(401).send({ success: false, error: 'Authentication required', code: 'UNAUTHORIZED' });
    }
    const token = authHeader.substring(7);
    request.user = authService.verifyToken(token);
  } catch (err) {
    request.log.debug({ err }, 'Token verification failed');
    return reply.code(401).send({ success: false, error: 'Invalid or expired token', code: 'UNAUTHORIZED' });
  }
}

/** Caller identity for service calls. Only valid behind `authenticate`. */
export function requestContext(request: FastifyRequest): OperationContext {
  if (!request.user) {
    throw new Error('requestContext called on an unauthenticated route');
  }
  return authService.toContext(request.user, request.server.clock);
}
