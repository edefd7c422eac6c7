import { InvoiceStatus, MatchDecision, MatchDetails, normalizePoNumber, PurchaseOrder } from '../../domain/invoice';

export type MatchInput = {
  invoiceAmountMinor: number;
  poNumbers: string[];
  /** Fraction, e.g. 0.02 for 2%. */
  tolerance: number;
};

export type MatchResult = {
  decision: MatchDecision;
  details: MatchDetails;
  /** Candidates looked up, in order, after normalisation. */
  candidates: string[];
};

export type PurchaseOrderLookup = (poNumber: string) => Promise<PurchaseOrder | null>;

/** Relative difference of invoice against PO. A zero PO amount is treated as a total mismatch. */
export function computeVariance(invoiceAmountMinor: number, poAmountMinor: number): number {
  if (poAmountMinor === 0) return 1.0;
  return (invoiceAmountMinor - poAmountMinor) / poAmountMinor;
}

export function withinTolerance(variance: number, tolerance: number): boolean {
  return Math.abs(variance) <= tolerance;
}

export function normalizeCandidates(poNumbers: string[]): string[] {
  return poNumbers.map(normalizePoNumber).filter((p) => p !== '');
}

/**
 * Looks candidates up in order and decides on the first PO that exists. Later candidates are
 * never consulted, even if they would match more closely.
 */
export async function matchAgainstPurchaseOrders(input: MatchInput, lookup: PurchaseOrderLookup): Promise<MatchResult> {
  const candidates = normalizeCandidates(input.poNumbers);
  const noMatch: MatchResult = {
    decision: InvoiceStatus.NEEDS_REVIEW,
    details: { poNumber: null, poAmountMinor: null, invoiceAmountMinor: input.invoiceAmountMinor, variance: null },
    candidates,
  };

  for (const candidate of candidates) {
    const po = await lookup(candidate);
    if (!po) continue;

    const variance = computeVariance(input.invoiceAmountMinor, po.totalAmountMinor);
    return {
      decision: withinTolerance(variance, input.tolerance) ? InvoiceStatus.AUTO_APPROVED : InvoiceStatus.NEEDS_REVIEW,
      details: {
        poNumber: po.poNumber,
        poAmountMinor: po.totalAmountMinor,
        invoiceAmountMinor: input.invoiceAmountMinor,
        variance,
      },
      candidates,
    };
  }

  return noMatch;
}
