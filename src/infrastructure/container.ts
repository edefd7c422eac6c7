import * as Sentry from '@sentry/node';
import type { Pool } from 'pg';
import type Redis from 'ioredis';
import type { Worker } from 'bullmq';
import OpenAI from 'openai';
import type { AppConfig } from '../config/env';
import { BrokerClient } from '../broker/brokerClient';
import { RedisRedeliveryCounter } from '../broker/redeliveryCounter';
import { buildPipelineTopology } from '../broker/topology';
import { QueueName } from '../events/schemas';
import { PgInvoiceRepository, InvoiceRepository } from '../repositories/invoiceRepository';
import { PgPurchaseOrderRepository, PurchaseOrderRepository } from '../repositories/purchaseOrderRepository';
import { ExtractionPipelineService } from '../services/ExtractionPipelineService';
import { FieldExtractor } from '../services/llm/fieldExtractor';
import { MatchingService } from '../services/matching/matchingService';
import { OcrChain } from '../services/ocr/ocrChain';
import { classifyTesseractError, TesseractEngine } from '../services/ocr/tesseractEngine';
import { classifyTextractError, TextractEngine } from '../services/ocr/textractEngine';
import type { OcrStrategy } from '../services/ocr/types';
import { ErpClient } from '../services/posting/erpClient';
import { PostingService } from '../services/posting/postingService';
import { ObjectStore, S3ObjectStore } from '../services/S3Service';
import { createDatabasePool } from './database';
import type { Logger } from './logger';
import { closeRedis, createRedisConnection } from './redis';

export type PipelineStage = AppConfig['PIPELINE_STAGE'];

export type PipelineContext = {
  config: AppConfig;
  logger: Logger;
  pool: Pool;
  redis: Redis;
  broker: BrokerClient;
  invoices: InvoiceRepository;
  purchaseOrders: PurchaseOrderRepository;
  objectStore: ObjectStore;
  /** Aborted once in-flight deliveries have had `SHUTDOWN_GRACE_MS` to finish. */
  shutdown: AbortController;
  close(): Promise<void>;
};

/**
 * Builds every client a stage process needs. Nothing here connects eagerly except ioredis; callers
 * own the returned context and must `close()` it.
 */
export function createPipelineContext(config: AppConfig, logger: Logger): PipelineContext {
  const pool = createDatabasePool({ connectionString: config.DATABASE_URL, max: config.DATABASE_POOL_MAX }, logger);
  const redis = createRedisConnection(
    {
      url: config.REDIS_URL,
      host: config.REDIS_HOST,
      port: config.REDIS_PORT,
      password: config.REDIS_PASSWORD,
      reconnectBaseMs: config.BROKER_RECONNECT_BASE_MS,
      reconnectMaxMs: config.BROKER_RECONNECT_MAX_MS,
    },
    logger
  );

  const broker = new BrokerClient({
    connection: redis,
    topology: buildPipelineTopology(config.BROKER_EXCHANGE),
    counter: new RedisRedeliveryCounter(redis),
    policy: {
      maxRedeliveries: config.BROKER_MAX_REDELIVERIES,
      redeliveryDelayMs: config.BROKER_REDELIVERY_DELAY_MS,
      redeliveryDelayMaxMs: config.BROKER_REDELIVERY_DELAY_MAX_MS,
    },
    logger,
    onDeadLetter: (record, error) => {
      Sentry.withScope((scope) => {
        scope.setTag('queue', record.queue);
        scope.setTag('message_id', record.messageId);
        scope.setContext('deadLetter', { reason: record.reason, deliveryCount: record.deliveryCount });
        if (error instanceof Error) Sentry.captureException(error);
        else Sentry.captureMessage(`dead-lettered: ${record.reason}`, 'error');
      });
    },
  });

  const objectStore = new S3ObjectStore(
    {
      bucket: config.S3_INVOICE_BUCKET,
      region: config.AWS_REGION,
      accessKeyId: config.AWS_ACCESS_KEY_ID,
      secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
    },
    logger
  );

  const shutdown = new AbortController();
  let closed = false;

  return {
    config,
    logger,
    pool,
    redis,
    broker,
    invoices: new PgInvoiceRepository(pool),
    purchaseOrders: new PgPurchaseOrderRepository(pool),
    objectStore,
    shutdown,
    async close() {
      if (closed) return;
      closed = true;
      // In-flight handlers get the grace period; only stragglers are cancelled.
      await broker.close(config.SHUTDOWN_GRACE_MS, () => shutdown.abort());
      shutdown.abort();
      await pool.end();
      await closeRedis(redis);
    },
  };
}

export function buildOcrChain(ctx: PipelineContext): OcrChain {
  const { config } = ctx;
  const strategies: OcrStrategy[] = [
    {
      engine: new TextractEngine({
        region: config.AWS_REGION,
        accessKeyId: config.AWS_ACCESS_KEY_ID,
        secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
      }),
      maxAttempts: config.OCR_PRIMARY_MAX_ATTEMPTS,
      classify: classifyTextractError,
    },
  ];
  if (config.OCR_FALLBACK_ENABLED) {
    strategies.push({
      engine: new TesseractEngine({ binaryPath: config.TESSERACT_PATH, language: config.TESSERACT_LANGUAGE }),
      maxAttempts: 1,
      classify: classifyTesseractError,
    });
  }
  return new OcrChain(strategies, {
    timeoutMs: config.OCR_TIMEOUT_MS,
    retryBackoffMs: config.OCR_RETRY_BACKOFF_MS,
    logger: ctx.logger.child({ component: 'ocr' }),
  });
}

/** Starts the consumer for one pipeline stage. */
export function startStageConsumer(ctx: PipelineContext, stage: PipelineStage): Worker {
  const { config, broker } = ctx;
  const exchange = config.BROKER_EXCHANGE;

  switch (stage) {
    case 'extract': {
      const extractor = new FieldExtractor({
        client: config.OPENAI_API_KEY
          ? new OpenAI({ apiKey: config.OPENAI_API_KEY, timeout: config.OPENAI_TIMEOUT_MS, maxRetries: 1 })
          : null,
        model: config.OPENAI_MODEL,
        maxPromptChars: config.LLM_MAX_PROMPT_CHARS,
        logger: ctx.logger,
      });
      const handler = new ExtractionPipelineService({
        invoices: ctx.invoices,
        objectStore: ctx.objectStore,
        ocr: buildOcrChain(ctx),
        extractor,
        publisher: broker,
        exchange,
        signal: ctx.shutdown.signal,
      });
      return broker.consume(QueueName.INGESTED, handler, config.BROKER_PREFETCH);
    }
    case 'match': {
      const handler = new MatchingService({
        invoices: ctx.invoices,
        purchaseOrders: ctx.purchaseOrders,
        publisher: broker,
        exchange,
        tolerance: config.MATCH_TOLERANCE,
      });
      return broker.consume(QueueName.EXTRACTED, handler, config.BROKER_PREFETCH);
    }
    case 'post': {
      const erp = new ErpClient({
        baseUrl: config.ERP_API_BASE_URL,
        token: config.ERP_API_TOKEN,
        maxRetries: config.ERP_RETRY_MAX,
        retryBackoffMs: config.ERP_RETRY_BACKOFF_MS,
        timeoutMs: config.ERP_TIMEOUT_MS,
        logger: ctx.logger,
      });
      const handler = new PostingService({ invoices: ctx.invoices, erp, publisher: broker, exchange });
      return broker.consume(QueueName.APPROVED, handler, config.BROKER_PREFETCH);
    }
  }
}
