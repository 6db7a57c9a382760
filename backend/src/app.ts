import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError, ValidationError } from './common/errors.js';
import { registerImpactRoutes } from './modules/impact/impact.routes.js';
import { ImpactService, createImpactService } from './modules/impact/impact.service.js';

export interface BuildAppOptions {
  logger?: boolean;
  impactService?: ImpactService;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: options.logger === false ? false : { level: env.LOG_LEVEL },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ValidationError) {
      app.log.warn({ code: err.code, issues: err.issues }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        issues: err.issues,
      });
    }

    if (err instanceof AppError) {
      app.log.warn({ code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors (malformed JSON bodies included)
    if (err.validation || err.statusCode === 400) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Unknown errors
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    service: 'news-impact-engine',
    timestamp: new Date().toISOString(),
  }));

  const impactService = options.impactService ?? createImpactService();
  app.register(async (fastify) => {
    await registerImpactRoutes(fastify, impactService);
  });

  return app;
}
