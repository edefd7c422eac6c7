import pino from 'pino';
import type { EventPublisher, MessageContext, PublishOptions } from '../../src/broker/types';
import type { RedeliveryCounter } from '../../src/broker/redeliveryCounter';
import {
  ExtractionStatus,
  Invoice,
  InvoiceStatus,
  MatchDecision,
  MatchDetails,
  normalizePoNumber,
  PurchaseOrder,
} from '../../src/domain/invoice';
import type { Logger } from '../../src/infrastructure/logger';
import type {
  ExtractionRecord,
  InvoiceRepository,
  PostingRecord,
  ReviewRecord,
} from '../../src/repositories/invoiceRepository';
import type { PurchaseOrderRepository } from '../../src/repositories/purchaseOrderRepository';
import type { ObjectStore } from '../../src/services/S3Service';
import { toMinorUnits } from '../../src/utils/money';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function messageContext(overrides: Partial<MessageContext> = {}): MessageContext {
  return {
    messageId: 'msg-1',
    correlationId: 'inv-1',
    queue: 'test-queue',
    deliveryCount: 1,
    publishedAt: '2024-01-01T00:00:00.000Z',
    logger: silentLogger(),
    ...overrides,
  };
}

export function buildInvoice(overrides: Partial<Invoice> = {}): Invoice {
  const now = new Date('2024-01-01T00:00:00.000Z');
  return {
    id: 'inv-1',
    status: InvoiceStatus.PENDING,
    extractionStatus: ExtractionStatus.PENDING,
    documentKey: 'invoices/inv-1/invoice.png',
    filename: 'invoice.png',
    vendorName: null,
    invoiceNumber: null,
    invoiceDate: null,
    totalAmountMinor: null,
    currency: null,
    poNumbers: [],
    extractionConfidence: null,
    rawOcrKey: null,
    ocrEngine: null,
    promptTruncated: false,
    failureReason: null,
    matchedPoNumber: null,
    matchedAmountMinor: null,
    variance: null,
    matchError: null,
    reviewedBy: null,
    reviewDecision: null,
    reviewedAt: null,
    reviewNotes: null,
    externalReference: null,
    postingError: null,
    postedAt: null,
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

/** Same guards as the SQL in PgInvoiceRepository, applied to a Map. */
export class InMemoryInvoiceRepository implements InvoiceRepository {
  readonly rows = new Map<string, Invoice>();

  seed(invoice: Invoice): Invoice {
    this.rows.set(invoice.id, { ...invoice });
    return invoice;
  }

  get(id: string): Invoice {
    const row = this.rows.get(id);
    if (!row) throw new Error(`no invoice ${id} in fake`);
    return row;
  }

  async create(input: { id: string; documentKey: string; filename: string }): Promise<Invoice> {
    const existing = this.rows.get(input.id);
    if (existing) return { ...existing };
    const invoice = buildInvoice({ id: input.id, documentKey: input.documentKey, filename: input.filename });
    this.rows.set(invoice.id, invoice);
    return { ...invoice };
  }

  async findById(id: string): Promise<Invoice | null> {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async markProcessing(id: string): Promise<boolean> {
    return this.update(id, (r) => r.status === InvoiceStatus.PENDING, { status: InvoiceStatus.PROCESSING });
  }

  async markFailed(id: string, reason: string): Promise<boolean> {
    return this.update(id, (r) => r.status === InvoiceStatus.PROCESSING, {
      status: InvoiceStatus.FAILED,
      failureReason: reason,
    });
  }

  async saveExtraction(id: string, record: ExtractionRecord): Promise<boolean> {
    const { fields } = record;
    return this.update(
      id,
      (r) => r.status === InvoiceStatus.PROCESSING && r.extractionStatus === ExtractionStatus.PENDING,
      {
        extractionStatus: ExtractionStatus.COMPLETED,
        vendorName: fields.vendorName ?? null,
        invoiceNumber: fields.invoiceNumber ?? null,
        invoiceDate: fields.invoiceDate ?? null,
        totalAmountMinor: fields.totalAmount === undefined ? null : toMinorUnits(fields.totalAmount),
        currency: fields.currency ?? null,
        poNumbers: fields.poNumbers,
        extractionConfidence: record.confidence,
        rawOcrKey: record.rawOcrKey,
        ocrEngine: record.ocrEngine,
        promptTruncated: record.promptTruncated,
      }
    );
  }

  async saveMatchDecision(id: string, decision: MatchDecision, details: MatchDetails, error: string | null): Promise<boolean> {
    return this.update(
      id,
      (r) => r.status === InvoiceStatus.PROCESSING && r.extractionStatus === ExtractionStatus.COMPLETED,
      {
        status: decision,
        matchedPoNumber: details.poNumber,
        matchedAmountMinor: details.poAmountMinor,
        variance: details.variance,
        matchError: error,
      }
    );
  }

  async recordReview(id: string, review: ReviewRecord): Promise<boolean> {
    return this.update(
      id,
      (r) => r.status === InvoiceStatus.NEEDS_REVIEW || r.status === InvoiceStatus.AUTO_APPROVED,
      {
        status: InvoiceStatus.REVIEWED,
        reviewedBy: review.reviewer,
        reviewDecision: review.decision,
        reviewNotes: review.notes ?? null,
        reviewedAt: new Date(),
      }
    );
  }

  async recordPosting(id: string, outcome: PostingRecord): Promise<boolean> {
    const eligible = (r: Invoice) => r.status === InvoiceStatus.REVIEWED && r.reviewDecision === 'APPROVED';
    if (outcome.status === InvoiceStatus.POSTED) {
      return this.update(id, eligible, {
        status: InvoiceStatus.POSTED,
        externalReference: outcome.externalReference,
        postingError: null,
        postedAt: new Date(),
      });
    }
    return this.update(id, eligible, { status: InvoiceStatus.POSTING_FAILED, postingError: outcome.error });
  }

  private update(id: string, guard: (row: Invoice) => boolean, patch: Partial<Invoice>): boolean {
    const row = this.rows.get(id);
    if (!row || !guard(row)) return false;
    this.rows.set(id, { ...row, ...patch, updatedAt: new Date() });
    return true;
  }
}

export class InMemoryPurchaseOrderRepository implements PurchaseOrderRepository {
  readonly lookups: string[] = [];
  private readonly orders = new Map<string, PurchaseOrder>();

  constructor(orders: Array<{ poNumber: string; amount: string }> = []) {
    for (const o of orders) {
      this.orders.set(normalizePoNumber(o.poNumber), {
        poNumber: normalizePoNumber(o.poNumber),
        totalAmountMinor: toMinorUnits(o.amount),
        orderDate: null,
      });
    }
  }

  async findByNumber(poNumber: string): Promise<PurchaseOrder | null> {
    const key = normalizePoNumber(poNumber);
    this.lookups.push(key);
    return this.orders.get(key) ?? null;
  }
}

export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, Buffer>();

  async getObject(key: string): Promise<Buffer> {
    const body = this.objects.get(key);
    if (!body) throw new Error(`NoSuchKey: ${key}`);
    return body;
  }

  async putObject(key: string, body: Buffer): Promise<string> {
    this.objects.set(key, body);
    return key;
  }

  async putJson(key: string, value: unknown): Promise<string> {
    return this.putObject(key, Buffer.from(JSON.stringify(value), 'utf-8'));
  }

  json(key: string): unknown {
    const body = this.objects.get(key);
    return body ? JSON.parse(body.toString('utf-8')) : undefined;
  }
}

export type PublishedMessage = {
  exchange: string;
  routingKey: string;
  payload: object;
  correlationId: string;
};

export class RecordingPublisher implements EventPublisher {
  readonly published: PublishedMessage[] = [];

  async publish(exchange: string, routingKey: string, payload: object, options: PublishOptions): Promise<void> {
    this.published.push({ exchange, routingKey, payload, correlationId: options.correlationId });
  }

  byRoutingKey(routingKey: string): PublishedMessage[] {
    return this.published.filter((m) => m.routingKey === routingKey);
  }
}

export class InMemoryRedeliveryCounter implements RedeliveryCounter {
  readonly counts = new Map<string, number>();

  async peek(messageId: string): Promise<number> {
    return this.counts.get(messageId) ?? 0;
  }

  async increment(messageId: string): Promise<number> {
    const next = (this.counts.get(messageId) ?? 0) + 1;
    this.counts.set(messageId, next);
    return next;
  }

  async clear(messageId: string): Promise<void> {
    this.counts.delete(messageId);
  }
}
