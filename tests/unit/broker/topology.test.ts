import { describe, it, expect } from 'vitest';
import { buildPipelineTopology, deadLetterQueueName, declaredQueues, resolveBindings } from '../../../src/broker/topology';

describe('pipeline topology', () => {
  const topology = buildPipelineTopology('invoices');

  it('binds each routing key to its queue', () => {
    expect(resolveBindings(topology, 'invoices', 'invoice.ingested')).toEqual(['invoice-ingested']);
    expect(resolveBindings(topology, 'invoices', 'invoice.extracted')).toEqual(['invoice-extracted']);
    expect(resolveBindings(topology, 'invoices', 'invoice.matched')).toEqual(['invoice-matched']);
    expect(resolveBindings(topology, 'invoices', 'invoice.approved')).toEqual(['invoice-approved']);
    expect(resolveBindings(topology, 'invoices', 'invoice.posted')).toEqual(['invoice-posted']);
  });

  it('routes nothing for an unknown exchange or key', () => {
    expect(resolveBindings(topology, 'payments', 'invoice.ingested')).toEqual([]);
    expect(resolveBindings(topology, 'invoices', 'invoice.deleted')).toEqual([]);
  });

  it('lists each queue once and names its dead-letter companion', () => {
    expect(declaredQueues(topology)).toEqual([
      'invoice-ingested',
      'invoice-extracted',
      'invoice-matched',
      'invoice-approved',
      'invoice-posted',
    ]);
    expect(deadLetterQueueName('invoice-approved')).toBe('invoice-approved.dead-letter');
  });
});
