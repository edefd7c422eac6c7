import { randomUUID } from 'crypto';
import type { Logger } from '../infrastructure/logger';
import { computeBackoffDelay } from '../utils/backoff';
import type { RedeliveryCounter } from './redeliveryCounter';
import {
  DeadLetterRecord,
  DeliveryDisposition,
  HandlerOutcome,
  MessageEnvelope,
  messageEnvelopeSchema,
  MessageHandler,
  Outcome,
  RetryPolicy,
} from './types';

export interface DeliveryActions {
  /** Nack with requeue: the same envelope goes back on the working queue after `delayMs`. */
  requeue(envelope: MessageEnvelope, delayMs: number): Promise<void>;
  /** Ack and park a copy for operators. */
  deadLetter(record: DeadLetterRecord): Promise<void>;
}

export type DispatchParams<T> = {
  queue: string;
  raw: unknown;
  handler: MessageHandler<T>;
  counter: RedeliveryCounter;
  actions: DeliveryActions;
  policy: RetryPolicy;
  logger: Logger;
  onDeadLetter?: (record: DeadLetterRecord, error: unknown) => void;
};

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

function messageIdOf(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'messageId' in raw && typeof raw.messageId === 'string') {
    return raw.messageId;
  }
  return randomUUID();
}

/**
 * Runs one delivery through parse → handle → ack/requeue/dead-letter. The handler always runs to
 * completion before the disposition is chosen; a thrown error counts as retryable.
 */
export async function dispatchDelivery<T>(params: DispatchParams<T>): Promise<DeliveryDisposition> {
  const { queue, raw, handler, counter, actions, policy } = params;

  const deadLetter = async (
    messageId: string,
    reason: string,
    deliveryCount: number,
    error: unknown,
    logger: Logger
  ): Promise<DeliveryDisposition> => {
    const record: DeadLetterRecord = {
      messageId,
      queue,
      reason,
      failedAt: new Date().toISOString(),
      deliveryCount,
      envelope: raw,
    };
    await actions.deadLetter(record);
    await counter.clear(messageId);
    logger.error({ event: 'consumer.message.deadLettered', reason, deliveryCount }, 'consumer.message.deadLettered');
    params.onDeadLetter?.(record, error);
    return 'dead-lettered';
  };

  const envelopeResult = messageEnvelopeSchema.safeParse(raw);
  if (!envelopeResult.success) {
    const messageId = messageIdOf(raw);
    return deadLetter(
      messageId,
      `malformed envelope: ${envelopeResult.error.issues.map((i) => i.path.join('.') || i.message).join(', ')}`,
      1,
      envelopeResult.error,
      params.logger.child({ queue, messageId })
    );
  }

  const envelope = envelopeResult.data;
  const logger = params.logger.child({
    queue,
    messageId: envelope.messageId,
    correlationId: envelope.correlationId,
  });
  const deliveryCount = (await counter.peek(envelope.messageId)) + 1;

  let body: unknown;
  try {
    body = JSON.parse(envelope.body);
  } catch (error) {
    return deadLetter(envelope.messageId, `unparseable body: ${describeError(error)}`, deliveryCount, error, logger);
  }

  const payload = handler.schema.safeParse(body);
  if (!payload.success) {
    const issues = payload.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return deadLetter(envelope.messageId, `invalid payload: ${issues}`, deliveryCount, payload.error, logger);
  }

  let outcome: HandlerOutcome;
  try {
    outcome = await handler.handle(payload.data, {
      messageId: envelope.messageId,
      correlationId: envelope.correlationId,
      queue,
      deliveryCount,
      publishedAt: envelope.timestamp,
      logger,
    });
  } catch (error) {
    logger.error(
      { event: 'consumer.handler.threw', err: { message: describeError(error) } },
      'consumer.handler.threw'
    );
    outcome = Outcome.retryable(`unhandled handler error: ${describeError(error)}`, error);
  }

  switch (outcome.kind) {
    case 'success':
      await counter.clear(envelope.messageId);
      logger.debug({ event: 'consumer.message.acked', note: outcome.note, deliveryCount }, 'consumer.message.acked');
      return 'acked';

    case 'permanent':
      return deadLetter(envelope.messageId, outcome.reason, deliveryCount, outcome.error, logger);

    case 'retryable': {
      const redeliveries = await counter.increment(envelope.messageId);
      if (redeliveries > policy.maxRedeliveries) {
        return deadLetter(
          envelope.messageId,
          `redelivery ceiling (${policy.maxRedeliveries}) exceeded: ${outcome.reason}`,
          deliveryCount,
          outcome.error,
          logger
        );
      }
      const delayMs = computeBackoffDelay(redeliveries, policy.redeliveryDelayMs, policy.redeliveryDelayMaxMs);
      await actions.requeue(envelope, delayMs);
      logger.warn(
        { event: 'consumer.message.requeued', reason: outcome.reason, redeliveries, delayMs },
        'consumer.message.requeued'
      );
      return 'requeued';
    }
  }
}
