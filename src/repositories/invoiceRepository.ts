import { Pool } from 'pg';
import {
  ExtractedFields,
  ExtractionStatus,
  Invoice,
  InvoiceStatus,
  MatchDecision,
  MatchDetails,
  ReviewDecision,
} from '../domain/invoice';
import { formatMinorUnits, toMinorUnits } from '../utils/money';

export class InvoiceNotFoundError extends Error {
  constructor(id: string) {
    super(`Invoice ${id} not found`);
    this.name = 'InvoiceNotFoundError';
  }
}

export type ExtractionRecord = {
  fields: ExtractedFields;
  confidence: number;
  rawOcrKey: string;
  ocrEngine: string;
  promptTruncated: boolean;
};

export type ReviewRecord = {
  reviewer: string;
  decision: ReviewDecision;
  notes?: string | null;
};

export type PostingRecord =
  | { status: typeof InvoiceStatus.POSTED; externalReference: string | null }
  | { status: typeof InvoiceStatus.POSTING_FAILED; error: string };

/**
 * Every mutating method is a conditional update on the current status and returns whether a row
 * changed. `false` means another delivery (or another worker) already made the transition.
 */
export interface InvoiceRepository {
  create(input: { id: string; documentKey: string; filename: string }): Promise<Invoice>;
  findById(id: string): Promise<Invoice | null>;
  markProcessing(id: string): Promise<boolean>;
  markFailed(id: string, reason: string): Promise<boolean>;
  saveExtraction(id: string, record: ExtractionRecord): Promise<boolean>;
  saveMatchDecision(id: string, decision: MatchDecision, details: MatchDetails, error: string | null): Promise<boolean>;
  recordReview(id: string, review: ReviewRecord): Promise<boolean>;
  recordPosting(id: string, outcome: PostingRecord): Promise<boolean>;
}

type InvoiceRow = {
  id: string;
  status: InvoiceStatus;
  extraction_status: ExtractionStatus;
  document_key: string;
  filename: string;
  vendor_name: string | null;
  invoice_number: string | null;
  invoice_date: string | null;
  total_amount: string | null;
  currency: string | null;
  po_numbers: string[] | null;
  extraction_confidence: number | null;
  raw_ocr_key: string | null;
  ocr_engine: string | null;
  prompt_truncated: boolean;
  failure_reason: string | null;
  matched_po_number: string | null;
  matched_amount: string | null;
  variance: number | null;
  match_error: string | null;
  reviewed_by: string | null;
  review_decision: ReviewDecision | null;
  reviewed_at: Date | null;
  review_notes: string | null;
  external_reference: string | null;
  posting_error: string | null;
  posted_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

const INVOICE_COLUMNS = `
  id, status, extraction_status, document_key, filename, vendor_name, invoice_number,
  to_char(invoice_date, 'YYYY-MM-DD') AS invoice_date, total_amount::text AS total_amount, currency,
  po_numbers, extraction_confidence, raw_ocr_key, ocr_engine, prompt_truncated, failure_reason,
  matched_po_number, matched_amount::text AS matched_amount, variance, match_error,
  reviewed_by, review_decision, reviewed_at, review_notes,
  external_reference, posting_error, posted_at, created_at, updated_at
`;

function mapInvoiceRow(row: InvoiceRow): Invoice {
  return {
    id: row.id,
    status: row.status,
    extractionStatus: row.extraction_status,
    documentKey: row.document_key,
    filename: row.filename,
    vendorName: row.vendor_name,
    invoiceNumber: row.invoice_number,
    invoiceDate: row.invoice_date,
    totalAmountMinor: row.total_amount === null ? null : toMinorUnits(row.total_amount),
    currency: row.currency,
    poNumbers: row.po_numbers ?? [],
    extractionConfidence: row.extraction_confidence,
    rawOcrKey: row.raw_ocr_key,
    ocrEngine: row.ocr_engine,
    promptTruncated: row.prompt_truncated,
    failureReason: row.failure_reason,
    matchedPoNumber: row.matched_po_number,
    matchedAmountMinor: row.matched_amount === null ? null : toMinorUnits(row.matched_amount),
    variance: row.variance,
    matchError: row.match_error,
    reviewedBy: row.reviewed_by,
    reviewDecision: row.review_decision,
    reviewedAt: row.reviewed_at,
    reviewNotes: row.review_notes,
    externalReference: row.external_reference,
    postingError: row.posting_error,
    postedAt: row.posted_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const minorOrNull = (minor: number | null | undefined) => (minor === null || minor === undefined ? null : formatMinorUnits(minor));

export class PgInvoiceRepository implements InvoiceRepository {
  constructor(private readonly pool: Pool) {}

  async create(input: { id: string; documentKey: string; filename: string }): Promise<Invoice> {
    // Re-registering the same correlation id is a no-op; the original row is returned.
    await this.pool.query(
      `INSERT INTO invoices (id, status, extraction_status, document_key, filename)
       VALUES ($1, 'PENDING', 'PENDING', $2, $3)
       ON CONFLICT (id) DO NOTHING`,
      [input.id, input.documentKey, input.filename]
    );
    const invoice = await this.findById(input.id);
    if (!invoice) throw new InvoiceNotFoundError(input.id);
    return invoice;
  }

  async findById(id: string): Promise<Invoice | null> {
    const result = await this.pool.query<InvoiceRow>(`SELECT ${INVOICE_COLUMNS} FROM invoices WHERE id = $1`, [id]);
    return result.rows.length === 0 ? null : mapInvoiceRow(result.rows[0]);
  }

  async markProcessing(id: string): Promise<boolean> {
    const res = await this.pool.query(
      `UPDATE invoices SET status = 'PROCESSING', updated_at = now()
       WHERE id = $1 AND status = 'PENDING'`,
      [id]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async markFailed(id: string, reason: string): Promise<boolean> {
    const res = await this.pool.query(
      `UPDATE invoices SET status = 'FAILED', failure_reason = $2, updated_at = now()
       WHERE id = $1 AND status = 'PROCESSING'`,
      [id, reason]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async saveExtraction(id: string, record: ExtractionRecord): Promise<boolean> {
    const { fields } = record;
    const res = await this.pool.query(
      `UPDATE invoices SET
         extraction_status = 'COMPLETED',
         vendor_name = $2, invoice_number = $3, invoice_date = $4::date, total_amount = $5::numeric,
         currency = $6, po_numbers = $7::text[], extraction_confidence = $8,
         raw_ocr_key = $9, ocr_engine = $10, prompt_truncated = $11, updated_at = now()
       WHERE id = $1 AND status = 'PROCESSING' AND extraction_status = 'PENDING'`,
      [
        id,
        fields.vendorName ?? null,
        fields.invoiceNumber ?? null,
        fields.invoiceDate ?? null,
        fields.totalAmount === undefined ? null : formatMinorUnits(toMinorUnits(fields.totalAmount)),
        fields.currency ?? null,
        fields.poNumbers,
        record.confidence,
        record.rawOcrKey,
        record.ocrEngine,
        record.promptTruncated,
      ]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async saveMatchDecision(
    id: string,
    decision: MatchDecision,
    details: MatchDetails,
    error: string | null
  ): Promise<boolean> {
    const res = await this.pool.query(
      `UPDATE invoices SET
         status = $2, matched_po_number = $3, matched_amount = $4::numeric, variance = $5,
         match_error = $6, updated_at = now()
       WHERE id = $1 AND status = 'PROCESSING' AND extraction_status = 'COMPLETED'`,
      [id, decision, details.poNumber, minorOrNull(details.poAmountMinor), details.variance, error]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async recordReview(id: string, review: ReviewRecord): Promise<boolean> {
    const res = await this.pool.query(
      `UPDATE invoices SET
         status = 'REVIEWED', reviewed_by = $2, review_decision = $3, review_notes = $4,
         reviewed_at = now(), updated_at = now()
       WHERE id = $1 AND status IN ('NEEDS_REVIEW', 'AUTO_APPROVED')`,
      [id, review.reviewer, review.decision, review.notes ?? null]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async recordPosting(id: string, outcome: PostingRecord): Promise<boolean> {
    const res =
      outcome.status === InvoiceStatus.POSTED
        ? await this.pool.query(
            `UPDATE invoices SET status = 'POSTED', external_reference = $2, posting_error = NULL,
               posted_at = now(), updated_at = now()
             WHERE id = $1 AND status = 'REVIEWED' AND review_decision = 'APPROVED'`,
            [id, outcome.externalReference]
          )
        : await this.pool.query(
            `UPDATE invoices SET status = 'POSTING_FAILED', posting_error = $2, updated_at = now()
             WHERE id = $1 AND status = 'REVIEWED' AND review_decision = 'APPROVED'`,
            [id, outcome.error]
          );
    return (res.rowCount ?? 0) > 0;
  }
}
