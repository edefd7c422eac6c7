import * as Sentry from '@sentry/node';
import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';
import { createPipelineContext, startStageConsumer } from './infrastructure/container';
import { checkDatabase } from './infrastructure/database';
import { createLogger } from './infrastructure/logger';
import { pingWithTimeout } from './infrastructure/redis';

// Initialize Sentry before anything else
initSentry();

const start = async () => {
  const stage = config.PIPELINE_STAGE;
  const logger = createLogger({ level: config.LOG_LEVEL, nodeEnv: config.NODE_ENV, name: `invoice-${stage}` }).child({
    stage,
  });
  const ctx = createPipelineContext(config, logger);

  const app = buildApp({
    stage,
    checks: {
      redis: () => pingWithTimeout(ctx.redis, 1000, 1),
      database: () => checkDatabase(ctx.pool, 1000),
    },
  });

  let isShuttingDown = false;

  const handleShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info({ event: 'shutdown.started', signal, graceMs: config.SHUTDOWN_GRACE_MS }, 'shutdown.started');

    // Backstop in case a close call hangs past the drain window.
    const timeout = setTimeout(() => {
      logger.error({ event: 'shutdown.forced' }, 'Force shutdown due to timeout');
      process.exit(1);
    }, config.SHUTDOWN_GRACE_MS + 10_000);

    try {
      await ctx.close();
      await app.close();
      await Sentry.close(2000);
      clearTimeout(timeout);
      logger.info({ event: 'shutdown.completed' }, 'Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ event: 'shutdown.failed', err: err instanceof Error ? err.message : String(err) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    handleShutdown('SIGINT').catch(() => process.exit(1));
  });
  process.on('SIGTERM', () => {
    handleShutdown('SIGTERM').catch(() => process.exit(1));
  });

  try {
    // In production, verify Redis connectivity before consuming.
    // (Fail-fast, but with short timeout and one retry for cold-start networking blips.)
    if (config.NODE_ENV === 'production') {
      const result = await pingWithTimeout(ctx.redis, 1000, 1);
      if (!result.ok) {
        throw new Error(`Redis connectivity check failed: ${result.error}`);
      }
    }

    await ctx.broker.declareTopology();
    startStageConsumer(ctx, stage);

    await app.listen({ port: config.PORT, host: '0.0.0.0' });
    logger.info({ event: 'stage.started', port: config.PORT }, `Stage ${stage} running`);
  } catch (err) {
    logger.error({ event: 'stage.start_failed', err: err instanceof Error ? err.message : String(err) }, 'stage.start_failed');
    Sentry.captureException(err);
    await ctx.close().catch((closeErr: unknown) => {
      logger.error(
        { event: 'shutdown.failed', err: closeErr instanceof Error ? closeErr.message : String(closeErr) },
        'shutdown.failed'
      );
    });
    process.exit(1);
  }
};

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
