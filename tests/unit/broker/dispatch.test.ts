import { describe, it, expect, vi } from 'vitest';
import z from 'zod';
import { DeliveryActions, dispatchDelivery } from '../../../src/broker/dispatch';
import { HandlerOutcome, MessageContext, MessageEnvelope, MessageHandler, Outcome, RetryPolicy } from '../../../src/broker/types';
import { InMemoryRedeliveryCounter, silentLogger } from '../../support/fakes';

const payloadSchema = z.object({ correlationId: z.string() });
type Payload = z.infer<typeof payloadSchema>;

function envelope(overrides: Partial<MessageEnvelope> = {}): MessageEnvelope {
  return {
    messageId: 'msg-1',
    correlationId: 'inv-1',
    exchange: 'invoices',
    routingKey: 'invoice.approved',
    contentType: 'application/json',
    timestamp: '2024-05-01T10:00:00.000Z',
    body: JSON.stringify({ correlationId: 'inv-1' }),
    ...overrides,
  };
}

function setup(outcome: () => Promise<HandlerOutcome>, policy: Partial<RetryPolicy> = {}) {
  const handle = vi.fn(async (_payload: Payload, _ctx: MessageContext) => outcome());
  const handler: MessageHandler<Payload> = { schema: payloadSchema, handle };
  const counter = new InMemoryRedeliveryCounter();
  const requeue = vi.fn<DeliveryActions['requeue']>(async () => undefined);
  const deadLetter = vi.fn<DeliveryActions['deadLetter']>(async () => undefined);
  const onDeadLetter = vi.fn();
  const fullPolicy: RetryPolicy = { maxRedeliveries: 2, redeliveryDelayMs: 1000, redeliveryDelayMaxMs: 60_000, ...policy };

  const deliver = (raw: unknown) =>
    dispatchDelivery({
      queue: 'invoice-approved',
      raw,
      handler,
      counter,
      actions: { requeue, deadLetter },
      policy: fullPolicy,
      logger: silentLogger(),
      onDeadLetter,
    });

  return { handle, counter, requeue, deadLetter, onDeadLetter, deliver };
}

describe('dispatchDelivery', () => {
  it('acks a successful delivery and passes the parsed payload with delivery count 1', async () => {
    const { deliver, handle, requeue, deadLetter } = setup(async () => Outcome.success());

    await expect(deliver(envelope())).resolves.toBe('acked');

    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle.mock.calls[0][0]).toEqual({ correlationId: 'inv-1' });
    const ctx = handle.mock.calls[0][1];
    expect(ctx).toMatchObject({
      messageId: 'msg-1',
      correlationId: 'inv-1',
      queue: 'invoice-approved',
      deliveryCount: 1,
      publishedAt: '2024-05-01T10:00:00.000Z',
    });
    expect(requeue).not.toHaveBeenCalled();
    expect(deadLetter).not.toHaveBeenCalled();
  });

  it('dead-letters a malformed envelope without invoking the handler', async () => {
    const { deliver, handle, requeue, deadLetter } = setup(async () => Outcome.success());
    const raw = { messageId: 'msg-bad', correlationId: 'inv-1' };

    await expect(deliver(raw)).resolves.toBe('dead-lettered');

    expect(handle).not.toHaveBeenCalled();
    expect(requeue).not.toHaveBeenCalled();
    expect(deadLetter).toHaveBeenCalledTimes(1);
    const record = deadLetter.mock.calls[0][0];
    expect(record.messageId).toBe('msg-bad');
    expect(record.queue).toBe('invoice-approved');
    expect(record.deliveryCount).toBe(1);
    expect(record.envelope).toEqual(raw);
    expect(record.reason.startsWith('malformed envelope:')).toBe(true);
  });

  it('dead-letters a body that is not JSON', async () => {
    const { deliver, handle, deadLetter } = setup(async () => Outcome.success());

    await expect(deliver(envelope({ body: '{not json' }))).resolves.toBe('dead-lettered');

    expect(handle).not.toHaveBeenCalled();
    expect(deadLetter.mock.calls[0][0].reason.startsWith('unparseable body: SyntaxError')).toBe(true);
  });

  it('dead-letters a payload that fails the handler schema', async () => {
    const { deliver, handle, deadLetter } = setup(async () => Outcome.success());

    await expect(deliver(envelope({ body: JSON.stringify({ approvedBy: 'ops' }) }))).resolves.toBe('dead-lettered');

    expect(handle).not.toHaveBeenCalled();
    expect(deadLetter.mock.calls[0][0].reason).toBe('invalid payload: correlationId: Required');
  });

  it('requeues a retryable outcome with exponential delay and dead-letters past the ceiling', async () => {
    const { deliver, requeue, deadLetter, counter, handle } = setup(async () => Outcome.retryable('erp down'));
    const message = envelope();

    await expect(deliver(message)).resolves.toBe('requeued');
    await expect(deliver(message)).resolves.toBe('requeued');
    await expect(deliver(message)).resolves.toBe('dead-lettered');

    expect(requeue.mock.calls.map((c) => c[1])).toEqual([1000, 2000]);
    expect(requeue.mock.calls[0][0]).toEqual(message);
    expect(handle.mock.calls.map((c) => c[1].deliveryCount)).toEqual([1, 2, 3]);
    expect(deadLetter).toHaveBeenCalledTimes(1);
    expect(deadLetter.mock.calls[0][0].reason).toBe('redelivery ceiling (2) exceeded: erp down');
    expect(deadLetter.mock.calls[0][0].deliveryCount).toBe(3);
    expect(await counter.peek('msg-1')).toBe(0);
  });

  it('caps the redelivery delay', async () => {
    const { deliver, requeue } = setup(async () => Outcome.retryable('busy'), {
      maxRedeliveries: 5,
      redeliveryDelayMaxMs: 1500,
    });

    await deliver(envelope());
    await deliver(envelope());

    expect(requeue.mock.calls.map((c) => c[1])).toEqual([1000, 1500]);
  });

  it('treats an exception escaping the handler as retryable', async () => {
    const { deliver, requeue, deadLetter } = setup(async () => {
      throw new Error('connection reset');
    });

    await expect(deliver(envelope())).resolves.toBe('requeued');

    expect(requeue).toHaveBeenCalledTimes(1);
    expect(deadLetter).not.toHaveBeenCalled();
  });

  it('dead-letters a permanent outcome immediately and reports it', async () => {
    const { deliver, requeue, deadLetter, onDeadLetter } = setup(async () =>
      Outcome.permanent('invoice inv-1 does not exist')
    );

    await expect(deliver(envelope())).resolves.toBe('dead-lettered');

    expect(requeue).not.toHaveBeenCalled();
    expect(deadLetter.mock.calls[0][0].reason).toBe('invoice inv-1 does not exist');
    expect(onDeadLetter).toHaveBeenCalledTimes(1);
  });

  it('clears the redelivery count after a later success', async () => {
    let calls = 0;
    const { deliver, counter } = setup(async () => {
      calls += 1;
      return calls === 1 ? Outcome.retryable('transient') : Outcome.success();
    });

    await deliver(envelope());
    expect(await counter.peek('msg-1')).toBe(1);

    await expect(deliver(envelope())).resolves.toBe('acked');
    expect(await counter.peek('msg-1')).toBe(0);
  });
});
