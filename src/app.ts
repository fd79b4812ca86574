import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { isMongoConnected } from './db/mongoose.js';
import type { EngineConfig } from './config/engine.config.js';
import { advisorRoutes, type AdvisoryCycleDeps } from './modules/advisor/index.js';

export interface AppOptions {
  deps: AdvisoryCycleDeps;
  engineConfig: EngineConfig;
  logLevel?: string;
  now?: () => Date;
}

/**
 * Build Fastify Application
 */
export function buildApp(opts: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: {
      level: opts.logLevel ?? env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    app.log.error(err);

    if (err instanceof AppError) {
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
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
    storage: isMongoConnected() ? 'mongodb' : 'memory',
    timestamp: new Date().toISOString(),
  }));

  app.register(advisorRoutes, {
    prefix: '/api/advisor',
    deps: opts.deps,
    engineConfig: opts.engineConfig,
    now: opts.now,
  });

  return app;
}
