export const InvoiceStatus = {
  PENDING: 'PENDING',
  PROCESSING: 'PROCESSING',
  NEEDS_REVIEW: 'NEEDS_REVIEW',
  AUTO_APPROVED: 'AUTO_APPROVED',
  REVIEWED: 'REVIEWED',
  POSTED: 'POSTED',
  POSTING_FAILED: 'POSTING_FAILED',
  FAILED: 'FAILED',
} as const;
export type InvoiceStatus = (typeof InvoiceStatus)[keyof typeof InvoiceStatus];

export const ExtractionStatus = {
  PENDING: 'PENDING',
  COMPLETED: 'COMPLETED',
} as const;
export type ExtractionStatus = (typeof ExtractionStatus)[keyof typeof ExtractionStatus];

export type MatchDecision = typeof InvoiceStatus.AUTO_APPROVED | typeof InvoiceStatus.NEEDS_REVIEW;
export type ReviewDecision = 'APPROVED' | 'REJECTED';
export type PostingStatus = typeof InvoiceStatus.POSTED | typeof InvoiceStatus.POSTING_FAILED;

/**
 * Forward-only transitions. Every write in the repositories is guarded on one of these edges.
 */
export const ALLOWED_TRANSITIONS: Readonly<Record<InvoiceStatus, readonly InvoiceStatus[]>> = {
  PENDING: ['PROCESSING'],
  PROCESSING: ['NEEDS_REVIEW', 'AUTO_APPROVED', 'FAILED'],
  NEEDS_REVIEW: ['REVIEWED'],
  AUTO_APPROVED: ['REVIEWED'],
  REVIEWED: ['POSTED', 'POSTING_FAILED'],
  POSTED: [],
  POSTING_FAILED: [],
  FAILED: [],
};

export function canTransition(from: InvoiceStatus, to: InvoiceStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/** Amount, vendor and PO references are frozen once a human (or the posting step) has seen them. */
export function isFinanciallyLocked(status: InvoiceStatus): boolean {
  return status === 'REVIEWED' || status === 'POSTED' || status === 'POSTING_FAILED';
}

export type ExtractedFields = {
  vendorName?: string;
  invoiceNumber?: string;
  invoiceDate?: string; // YYYY-MM-DD
  totalAmount?: number;
  currency?: string;
  poNumbers: string[];
};

export type MatchDetails = {
  poNumber: string | null;
  poAmountMinor: number | null;
  invoiceAmountMinor: number;
  variance: number | null;
};

export type Invoice = {
  id: string;
  status: InvoiceStatus;
  extractionStatus: ExtractionStatus;
  documentKey: string;
  filename: string;
  vendorName: string | null;
  invoiceNumber: string | null;
  invoiceDate: string | null;
  totalAmountMinor: number | null;
  currency: string | null;
  poNumbers: string[];
  extractionConfidence: number | null;
  rawOcrKey: string | null;
  ocrEngine: string | null;
  promptTruncated: boolean;
  failureReason: string | null;
  matchedPoNumber: string | null;
  matchedAmountMinor: number | null;
  variance: number | null;
  matchError: string | null;
  reviewedBy: string | null;
  reviewDecision: ReviewDecision | null;
  reviewedAt: Date | null;
  reviewNotes: string | null;
  externalReference: string | null;
  postingError: string | null;
  postedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type PurchaseOrder = {
  poNumber: string;
  totalAmountMinor: number;
  orderDate: string | null;
};

export function normalizePoNumber(raw: string): string {
  return raw.trim().toUpperCase();
}
