import type { FastifyReply, FastifyRequest } from 'fastify';
import { ErrorCode, apiError } from '../config/error-codes.js';

// Extend FastifyRequest to carry the authenticated operator
declare module 'fastify' {
  interface FastifyRequest {
    operatorId: string;
  }
}

export function parseAdminIds(raw: string): string[] {
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

/**
 * Admin guard: verifies the JWT from the Authorization header, then checks
 * its subject against the configured operator ids.
 */
export function adminGuard(adminIds: readonly string[]) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const decoded = await request.jwtVerify<{ sub: string }>();
      request.operatorId = decoded.sub;
    } catch {
      return reply.status(401).send(apiError(ErrorCode.UNAUTHORIZED, 'Invalid or expired token'));
    }

    if (!adminIds.includes(request.operatorId)) {
      return reply.status(403).send(apiError(ErrorCode.FORBIDDEN, 'Admin access required'));
    }
  };
}
