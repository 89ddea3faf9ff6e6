import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { AppError } from './common/errors.js';
import { isMongoConnected } from './db/mongoose.js';
import { registerInspectionModule, type InspectionHostDeps } from './modules/inspection/index.js';

export interface BuildAppOptions {
  inspection?: Partial<InspectionHostDeps>;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL,
    },
    bodyLimit: 50 * 1024 * 1024,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      else app.log.warn({ code: err.code }, err.message);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    app.log.error(err);

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? 'INTERNAL_ERROR' : err.code,
      message: env.NODE_ENV === 'production' && statusCode >= 500 ? 'Internal server error' : err.message,
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
    mongo: isMongoConnected(),
    timestamp: new Date().toISOString(),
  }));

  app.register(async fastify => {
    await registerInspectionModule(fastify, options.inspection);
  });

  return app;
}
