import Fastify, { FastifyInstance } from 'fastify';
import * as Sentry from '@sentry/node';
import { config } from './config/env';
import { buildLoggerOptions } from './infrastructure/logger';
import healthRoutes, { HealthRoutesOptions } from './routes/healthRoutes';

/**
 * The HTTP surface of a stage process: liveness and readiness only. The pipeline itself runs on
 * the broker.
 */
export function buildApp(health: HealthRoutesOptions): FastifyInstance {
  const app = Fastify({
    logger: buildLoggerOptions({ level: config.LOG_LEVEL, nodeEnv: config.NODE_ENV, name: `invoice-${health.stage}` }),
  });

  app.register(healthRoutes, health);

  // Global Error Handler
  app.setErrorHandler((error, request, reply) => {
    request.log.error(error);

    Sentry.withScope((scope) => {
      scope.setContext('request', { method: request.method, url: request.url });
      scope.setTag('stage', health.stage);
      scope.setTag('status_code', String(error.statusCode || 500));
      Sentry.captureException(error);
    });

    const statusCode = error.statusCode || 500;
    return reply.status(statusCode).send({
      error: {
        code: error.code || 'INTERNAL_ERROR',
        message: error.message || 'Something went wrong',
      },
    });
  });

  return app;
}
