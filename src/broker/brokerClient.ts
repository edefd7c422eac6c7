import { randomUUID } from 'crypto';
import { Job, JobsOptions, Queue, Worker } from 'bullmq';
import Redis from 'ioredis';
import type { Logger } from '../infrastructure/logger';
import { withTimeout } from '../utils/backoff';
import { dispatchDelivery } from './dispatch';
import type { RedeliveryCounter } from './redeliveryCounter';
import { deadLetterQueueName, declaredQueues, resolveBindings, Topology } from './topology';
import {
  CONTENT_TYPE_JSON,
  DeadLetterRecord,
  DeliveryDisposition,
  EventPublisher,
  MessageEnvelope,
  messageEnvelopeSchema,
  MessageHandler,
  PublishOptions,
  RetryPolicy,
} from './types';

const DELIVERY_JOB = 'deliver';
const DEAD_LETTER_JOB = 'dead-letter';

export class UnroutableMessageError extends Error {
  constructor(exchange: string, routingKey: string) {
    super(`No queue bound to ${exchange}/${routingKey}`);
    this.name = 'UnroutableMessageError';
  }
}

export type BrokerClientOptions = {
  connection: Redis;
  topology: Topology;
  counter: RedeliveryCounter;
  policy: RetryPolicy;
  logger: Logger;
  /** Applies to broker-level failures only (the dispatch itself throwing); handler retries are counted separately. */
  defaultJobOptions?: JobsOptions;
  onDeadLetter?: (record: DeadLetterRecord, error: unknown) => void;
};

export type ReplayResult = { replayed: number; skipped: number };

/**
 * Exchange/queue semantics over BullMQ: a publish fans out to every queue bound to the routing key,
 * and each working queue has a `<queue>.dead-letter` companion that nothing consumes.
 */
export class BrokerClient implements EventPublisher {
  private readonly queues = new Map<string, Queue>();
  private readonly workers: Worker[] = [];
  private readonly logger: Logger;
  private readyEvents = 0;
  private closed = false;

  constructor(private readonly options: BrokerClientOptions) {
    this.logger = options.logger.child({ component: 'broker' });

    options.connection.on('ready', () => {
      this.readyEvents += 1;
      if (this.readyEvents === 1 || this.closed) return;
      this.logger.info({ event: 'broker.reconnected', reconnects: this.readyEvents - 1 }, 'broker.reconnected');
      this.declareTopology().catch((err: unknown) => {
        this.logger.error(
          { event: 'broker.topology.redeclare_failed', err: err instanceof Error ? err.message : String(err) },
          'broker.topology.redeclare_failed'
        );
      });
    });
  }

  /** Idempotent: safe to call on every (re)connect. */
  async declareTopology(): Promise<string[]> {
    const names = declaredQueues(this.options.topology);
    for (const name of names) {
      this.queueFor(name);
      this.queueFor(deadLetterQueueName(name));
    }
    await Promise.all([...this.queues.values()].map((q) => q.waitUntilReady()));
    this.logger.info({ event: 'broker.topology.declared', queues: names }, 'broker.topology.declared');
    return names;
  }

  async publish(exchange: string, routingKey: string, payload: object, options: PublishOptions): Promise<void> {
    const targets = resolveBindings(this.options.topology, exchange, routingKey);
    if (targets.length === 0) {
      throw new UnroutableMessageError(exchange, routingKey);
    }

    const envelope: MessageEnvelope = {
      messageId: randomUUID(),
      correlationId: options.correlationId,
      exchange,
      routingKey,
      contentType: CONTENT_TYPE_JSON,
      timestamp: new Date().toISOString(),
      body: JSON.stringify(payload),
    };

    await Promise.all(targets.map((queue) => this.queueFor(queue).add(DELIVERY_JOB, envelope)));
    this.logger.debug(
      {
        event: 'broker.published',
        exchange,
        routingKey,
        queues: targets,
        messageId: envelope.messageId,
        correlationId: options.correlationId,
      },
      'broker.published'
    );
  }

  /**
   * Starts a worker on `queue`. `prefetch` bounds how many deliveries are in flight at once.
   */
  consume<T>(queue: string, handler: MessageHandler<T>, prefetch: number): Worker {
    const { connection, counter, policy } = this.options;
    const logger = this.logger.child({ queue });

    const worker = new Worker<unknown, DeliveryDisposition>(
      queue,
      async (job: Job<unknown, DeliveryDisposition>) =>
        dispatchDelivery({
          queue,
          raw: job.data,
          handler,
          counter,
          policy,
          logger,
          onDeadLetter: this.options.onDeadLetter,
          actions: {
            requeue: async (envelope, delayMs) => {
              await this.queueFor(queue).add(DELIVERY_JOB, envelope, { delay: delayMs });
            },
            deadLetter: async (record) => {
              // jobId dedupes a dead-letter written twice for the same message.
              await this.queueFor(deadLetterQueueName(queue)).add(DEAD_LETTER_JOB, record, {
                jobId: record.messageId,
              });
            },
          },
        }),
      { connection, concurrency: prefetch }
    );

    worker.on('failed', (job, err) => {
      logger.error(
        { event: 'broker.delivery.failed', jobId: job?.id, attemptsMade: job?.attemptsMade, err: err.message },
        'broker.delivery.failed'
      );
    });
    worker.on('error', (err) => {
      logger.error({ event: 'broker.worker.error', err: err.message }, 'broker.worker.error');
    });

    this.workers.push(worker);
    logger.info({ event: 'broker.consumer.started', prefetch }, 'broker.consumer.started');
    return worker;
  }

  async listDeadLetters(queue: string, limit: number): Promise<unknown[]> {
    const jobs = await this.queueFor(deadLetterQueueName(queue)).getJobs(
      ['waiting', 'paused', 'delayed'],
      0,
      Math.max(0, limit - 1),
      true
    );
    return jobs.map((job) => job.data);
  }

  /**
   * Moves up to `limit` parked messages from `<queue>.dead-letter` back onto `queue`.
   * Records whose envelope is not a valid envelope stay parked.
   */
  async replayDeadLetters(queue: string, limit: number): Promise<ReplayResult> {
    const dlq = this.queueFor(deadLetterQueueName(queue));
    const jobs = await dlq.getJobs(['waiting', 'paused', 'delayed'], 0, Math.max(0, limit - 1), true);
    const result: ReplayResult = { replayed: 0, skipped: 0 };

    for (const job of jobs) {
      const record: unknown = job.data;
      const envelope = messageEnvelopeSchema.safeParse(
        typeof record === 'object' && record !== null && 'envelope' in record ? record.envelope : undefined
      );
      if (!envelope.success) {
        result.skipped += 1;
        this.logger.warn({ event: 'broker.replay.skipped', queue, jobId: job.id }, 'broker.replay.skipped');
        continue;
      }
      await this.options.counter.clear(envelope.data.messageId);
      await this.queueFor(queue).add(DELIVERY_JOB, envelope.data);
      await job.remove();
      result.replayed += 1;
    }

    this.logger.info({ event: 'broker.replay.done', queue, ...result }, 'broker.replay.done');
    return result;
  }

  /**
   * Stops taking deliveries and waits up to `graceMs` for in-flight handlers, then calls
   * `onDrainTimeout` and forces the workers shut. Unfinished jobs are picked up again by BullMQ's
   * stalled-job check.
   */
  async close(graceMs: number, onDrainTimeout?: () => void): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await withTimeout('broker drain', graceMs, () => Promise.all(this.workers.map((w) => w.close())));
    } catch (err) {
      this.logger.warn(
        { event: 'broker.drain.timeout', graceMs, err: err instanceof Error ? err.message : String(err) },
        'broker.drain.timeout'
      );
      onDrainTimeout?.();
      await Promise.all(this.workers.map((w) => w.close(true)));
    }

    await Promise.all([...this.queues.values()].map((q) => q.close()));
    this.logger.info({ event: 'broker.closed' }, 'broker.closed');
  }

  private queueFor(name: string): Queue {
    const existing = this.queues.get(name);
    if (existing) return existing;

    const queue = new Queue(name, {
      connection: this.options.connection,
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: 'exponential', delay: 5000 },
        removeOnComplete: 1000,
        removeOnFail: 2000,
        ...this.options.defaultJobOptions,
      },
    });
    this.queues.set(name, queue);
    return queue;
  }
}
