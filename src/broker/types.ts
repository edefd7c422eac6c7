import z from 'zod';
import type { Logger } from '../infrastructure/logger';

/**
 * What a stage handler tells the framework. Business outcomes (NEEDS_REVIEW, FAILED, POSTING_FAILED)
 * are persisted data and always come back as `success`; the other two kinds are transport signals.
 */
export type HandlerOutcome =
  | { kind: 'success'; note?: string }
  | { kind: 'retryable'; reason: string; error?: unknown }
  | { kind: 'permanent'; reason: string; error?: unknown };

export const Outcome = {
  success: (note?: string): HandlerOutcome => ({ kind: 'success', note }),
  retryable: (reason: string, error?: unknown): HandlerOutcome => ({ kind: 'retryable', reason, error }),
  permanent: (reason: string, error?: unknown): HandlerOutcome => ({ kind: 'permanent', reason, error }),
};

export const CONTENT_TYPE_JSON = 'application/json';

export const messageEnvelopeSchema = z.object({
  messageId: z.string().min(1),
  correlationId: z.string().min(1),
  exchange: z.string(),
  routingKey: z.string(),
  contentType: z.literal(CONTENT_TYPE_JSON),
  timestamp: z.string(),
  body: z.string(),
});
export type MessageEnvelope = z.infer<typeof messageEnvelopeSchema>;

export type MessageContext = {
  messageId: string;
  correlationId: string;
  queue: string;
  /** 1 on first delivery; counted by the redelivery side channel, not the broker. */
  deliveryCount: number;
  publishedAt: string;
  logger: Logger;
};

export interface MessageHandler<T> {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  handle(payload: T, ctx: MessageContext): Promise<HandlerOutcome>;
}

export type PublishOptions = {
  correlationId: string;
};

export interface EventPublisher {
  publish(exchange: string, routingKey: string, payload: object, options: PublishOptions): Promise<void>;
}

export type DeadLetterRecord = {
  messageId: string;
  queue: string;
  reason: string;
  failedAt: string;
  deliveryCount: number;
  /** The envelope as received; kept verbatim even when it failed validation. */
  envelope: unknown;
};

export type RetryPolicy = {
  maxRedeliveries: number;
  redeliveryDelayMs: number;
  redeliveryDelayMaxMs: number;
};

export type DeliveryDisposition = 'acked' | 'requeued' | 'dead-lettered';
