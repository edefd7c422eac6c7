import { describe, it, expect, vi } from 'vitest';
import {
  computeVariance,
  matchAgainstPurchaseOrders,
  normalizeCandidates,
  withinTolerance,
} from '../../../../src/services/matching/poMatchEngine';
import { InMemoryPurchaseOrderRepository } from '../../../support/fakes';
import { toMinorUnits } from '../../../../src/utils/money';

const TOLERANCE = 0.02;

function lookupFrom(orders: Array<{ poNumber: string; amount: string }>) {
  const repo = new InMemoryPurchaseOrderRepository(orders);
  return { repo, lookup: (po: string) => repo.findByNumber(po) };
}

describe('computeVariance', () => {
  it('is the signed relative difference from the PO amount', () => {
    expect(computeVariance(102000, 100000)).toBe(0.02);
    expect(computeVariance(98000, 100000)).toBe(-0.02);
  });

  it('treats a zero PO amount as a full mismatch', () => {
    expect(computeVariance(5000, 0)).toBe(1.0);
  });

  it('applies the tolerance to both directions', () => {
    expect(withinTolerance(-0.02, TOLERANCE)).toBe(true);
    expect(withinTolerance(0.0201, TOLERANCE)).toBe(false);
  });
});

describe('matchAgainstPurchaseOrders', () => {
  it('auto-approves an invoice exactly at the tolerance boundary', async () => {
    const { lookup } = lookupFrom([{ poNumber: 'PO-1', amount: '1000.00' }]);

    const result = await matchAgainstPurchaseOrders(
      { invoiceAmountMinor: toMinorUnits('1020.00'), poNumbers: ['PO-1'], tolerance: TOLERANCE },
      lookup
    );

    expect(result.decision).toBe('AUTO_APPROVED');
    expect(result.details).toEqual({ poNumber: 'PO-1', poAmountMinor: 100000, invoiceAmountMinor: 102000, variance: 0.02 });
  });

  it('sends an invoice one cent over the boundary to review', async () => {
    const { lookup } = lookupFrom([{ poNumber: 'PO-1', amount: '1000.00' }]);

    const result = await matchAgainstPurchaseOrders(
      { invoiceAmountMinor: toMinorUnits('1020.01'), poNumbers: ['PO-1'], tolerance: TOLERANCE },
      lookup
    );

    expect(result.decision).toBe('NEEDS_REVIEW');
    expect(result.details.variance).toBe(2001 / 100000);
  });

  it('sends a zero-amount PO to review with variance 1', async () => {
    const { lookup } = lookupFrom([{ poNumber: 'PO-0', amount: '0.00' }]);

    const result = await matchAgainstPurchaseOrders(
      { invoiceAmountMinor: 1, poNumbers: ['PO-0'], tolerance: TOLERANCE },
      lookup
    );

    expect(result.decision).toBe('NEEDS_REVIEW');
    expect(result.details.variance).toBe(1.0);
  });

  it('skips candidates that do not exist and decides on the first hit', async () => {
    const { lookup, repo } = lookupFrom([
      { poNumber: 'PO-1', amount: '500.00' },
      { poNumber: 'PO-2', amount: '1000.00' },
    ]);

    const result = await matchAgainstPurchaseOrders(
      { invoiceAmountMinor: 100000, poNumbers: ['MISSING', ' po-1 ', 'PO-2'], tolerance: TOLERANCE },
      lookup
    );

    expect(result.details.poNumber).toBe('PO-1');
    expect(result.decision).toBe('NEEDS_REVIEW');
    expect(repo.lookups).toEqual(['MISSING', 'PO-1']);
  });

  it('sends invoices without usable PO references to review without a lookup', async () => {
    const lookup = vi.fn(async () => null);

    const result = await matchAgainstPurchaseOrders(
      { invoiceAmountMinor: 100000, poNumbers: ['', '   '], tolerance: TOLERANCE },
      lookup
    );

    expect(lookup).not.toHaveBeenCalled();
    expect(result).toEqual({
      decision: 'NEEDS_REVIEW',
      details: { poNumber: null, poAmountMinor: null, invoiceAmountMinor: 100000, variance: null },
      candidates: [],
    });
  });

  it('sends an invoice to review when no candidate exists', async () => {
    const { lookup } = lookupFrom([]);

    const result = await matchAgainstPurchaseOrders(
      { invoiceAmountMinor: 100000, poNumbers: ['PO-404'], tolerance: TOLERANCE },
      lookup
    );

    expect(result.decision).toBe('NEEDS_REVIEW');
    expect(result.details.poNumber).toBeNull();
    expect(result.candidates).toEqual(['PO-404']);
  });

  it('normalises candidates before lookup', () => {
    expect(normalizeCandidates([' po-7 ', '', 'Po-8'])).toEqual(['PO-7', 'PO-8']);
  });
});
