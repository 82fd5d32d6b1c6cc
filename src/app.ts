import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';
import { ZodError } from 'zod';
import type { AppContext } from './context.js';
import { ErrorCode, HTTP_STATUS, apiError } from './config/error-codes.js';
import { GatewayError } from './services/errors.js';
import { paymentRoutes } from './routes/payment.js';
import { adminRoutes } from './routes/admin.js';

/** Builds the HTTP surface without listening, so tests can drive it with inject(). */
export async function buildApp(ctx: AppContext): Promise<FastifyInstance> {
  const { config } = ctx;
  const app = Fastify({
    logger: {
      level: config.NODE_ENV === 'test' ? 'silent' : config.NODE_ENV === 'development' ? 'info' : 'warn',
    },
  });

  // ─── Plugins ──────────────────────────────────────────────────────────
  await app.register(cors, {
    origin: config.NODE_ENV === 'development' ? true : config.CORS_ORIGINS.split(',').map((s) => s.trim()),
  });

  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  await app.register(jwt, {
    secret: config.JWT_SECRET,
  });

  // ─── Error Handler ────────────────────────────────────────────────────
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    // Zod validation errors: field + message only
    if (error instanceof ZodError) {
      return reply.status(400).send({
        ...apiError(ErrorCode.VALIDATION_ERROR, 'Validation Error'),
        details: error.issues.map((i) => ({
          field: i.path.join('.'),
          message: i.message,
        })),
      });
    }

    if (error instanceof GatewayError) {
      const status = HTTP_STATUS[error.code];
      if (status >= 500) request.log.warn({ err: error }, 'request failed');
      return reply.status(status).send(apiError(error.code, error.message));
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'unhandled error');
      return reply.status(statusCode).send(apiError(ErrorCode.INTERNAL_ERROR, 'Internal Server Error'));
    }

    return reply.status(statusCode).send(apiError(statusCode === 404 ? ErrorCode.NOT_FOUND : ErrorCode.VALIDATION_ERROR, error.message || 'Request Error'));
  });

  // ─── Routes ───────────────────────────────────────────────────────────
  await app.register(paymentRoutes, { ctx });
  await app.register(adminRoutes, { ctx });

  // ─── Health Check ─────────────────────────────────────────────────────
  app.get('/api/health', async () => ({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    env: config.NODE_ENV,
    chains: ctx.chains.chains(),
  }));

  return app;
}
