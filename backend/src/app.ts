import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { env as processEnv, Env } from './config/env.js';
import { AppError } from './common/errors.js';
import {
  createMarketSnapshotService,
  MarketSnapshotService,
  registerMarketSnapshotModule,
} from './modules/market-snapshot/index.js';

export interface BuildAppOptions {
  config?: Env;
  /** Pre-built service (tests inject one wired to fake venues) */
  service?: MarketSnapshotService;
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions = {}): FastifyInstance {
  const env = options.config ?? processEnv;

  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: env.CORS_ORIGINS === '*' ? true : env.CORS_ORIGINS.split(','),
  });

  // Global error handler
  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        request.log.error({ err, code: err.code }, err.message);
      } else {
        request.log.info({ code: err.code }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    request.log.error(err);

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

  const service = options.service ?? createMarketSnapshotService(env, app.log);

  app.register(async (fastify) => {
    await registerMarketSnapshotModule(fastify, service);
    fastify.log.info({ defaultExchange: service.defaultExchange }, 'Market snapshot module registered');
  });

  return app;
}
