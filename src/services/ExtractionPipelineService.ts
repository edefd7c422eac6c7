import { ExtractionStatus, ExtractedFields, Invoice, InvoiceStatus } from '../domain/invoice';
import type { HandlerOutcome, EventPublisher, MessageContext, MessageHandler } from '../broker/types';
import { Outcome } from '../broker/types';
import { ExtractedEvent, IngestedEvent, ingestedEventSchema, RoutingKey } from '../events/schemas';
import type { InvoiceRepository } from '../repositories/invoiceRepository';
import { minorUnitsToNumber } from '../utils/money';
import { FieldExtraction, FieldExtractor, LlmTransientError } from './llm/fieldExtractor';
import { OcrAbortedError, OcrChain, OcrChainResult } from './ocr/ocrChain';
import type { ObjectStore } from './S3Service';

export const rawOcrKey = (correlationId: string) => `raw-ocr/${correlationId}.json`;

export const NO_TOTAL_REASON = 'no total amount extracted';

export type ExtractionPipelineDeps = {
  invoices: InvoiceRepository;
  objectStore: ObjectStore;
  ocr: OcrChain;
  extractor: FieldExtractor;
  publisher: EventPublisher;
  exchange: string;
  /** Aborted on shutdown; cancels in-flight OCR calls. */
  signal?: AbortSignal;
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

function fieldsFromInvoice(invoice: Invoice): ExtractedFields {
  const fields: ExtractedFields = { poNumbers: invoice.poNumbers };
  if (invoice.vendorName) fields.vendorName = invoice.vendorName;
  if (invoice.invoiceNumber) fields.invoiceNumber = invoice.invoiceNumber;
  if (invoice.invoiceDate) fields.invoiceDate = invoice.invoiceDate;
  if (invoice.totalAmountMinor !== null) fields.totalAmount = minorUnitsToNumber(invoice.totalAmountMinor);
  if (invoice.currency) fields.currency = invoice.currency;
  return fields;
}

/**
 * Consumes `invoice.ingested`: OCR, raw text archive, LLM field extraction, then hands off to
 * matching via `invoice.extracted`.
 */
export class ExtractionPipelineService implements MessageHandler<IngestedEvent> {
  readonly schema = ingestedEventSchema;

  constructor(private readonly deps: ExtractionPipelineDeps) {}

  async handle(event: IngestedEvent, ctx: MessageContext): Promise<HandlerOutcome> {
    const { invoices } = this.deps;
    const id = event.correlationId;
    const logger = ctx.logger;

    const claimed = await invoices.markProcessing(id);
    if (!claimed) {
      const invoice = await invoices.findById(id);
      if (!invoice) {
        return Outcome.permanent(`invoice ${id} does not exist`);
      }
      if (invoice.status !== InvoiceStatus.PROCESSING) {
        logger.info({ event: 'extraction.duplicate', status: invoice.status }, 'extraction.duplicate');
        return Outcome.success('duplicate');
      }
      if (invoice.extractionStatus === ExtractionStatus.COMPLETED) {
        // Fields were saved but the hand-off (or the failure mark) may not have happened.
        const fields = fieldsFromInvoice(invoice);
        if (fields.totalAmount === undefined) {
          return this.failWithoutTotal(id, ctx);
        }
        await this.publishExtracted(id, invoice.rawOcrKey ?? rawOcrKey(id), {
          ...fields,
          totalAmount: fields.totalAmount,
        });
        logger.info({ event: 'extraction.republished' }, 'extraction.republished');
        return Outcome.success('republished');
      }
      logger.info({ event: 'extraction.resumed', deliveryCount: ctx.deliveryCount }, 'extraction.resumed');
    }

    let bytes: Buffer;
    try {
      bytes = await this.deps.objectStore.getObject(event.documentKey);
    } catch (error) {
      return Outcome.retryable(`document fetch failed: ${errorMessage(error)}`, error);
    }

    let chain: OcrChainResult;
    try {
      chain = await this.deps.ocr.run({ bytes, filename: event.filename }, this.deps.signal);
    } catch (error) {
      if (error instanceof OcrAbortedError) {
        return Outcome.retryable('OCR cancelled', error);
      }
      throw error;
    }

    if (chain.status === 'exhausted') {
      const reason = `OCR produced no text (${chain.attempts
        .map((a) => `${a.engine}#${a.attempt}:${a.outcome}`)
        .join(', ')})`;
      await invoices.markFailed(id, reason);
      logger.warn({ event: 'extraction.failed', reason }, 'extraction.failed');
      return Outcome.success('ocr exhausted');
    }

    const ocr = chain.result;
    const archiveKey = rawOcrKey(id);
    try {
      await this.deps.objectStore.putJson(archiveKey, {
        correlationId: id,
        engine: ocr.engine,
        confidence: ocr.confidence,
        text: ocr.text,
        attempts: chain.attempts,
        raw: ocr.raw ?? null,
      });
    } catch (error) {
      return Outcome.retryable(`raw OCR archive failed: ${errorMessage(error)}`, error);
    }

    let extraction: FieldExtraction;
    try {
      extraction = await this.deps.extractor.extract(ocr.text, logger);
    } catch (error) {
      if (error instanceof LlmTransientError) {
        return Outcome.retryable(error.message, error);
      }
      throw error;
    }

    const saved = await invoices.saveExtraction(id, {
      fields: extraction.fields,
      confidence: extraction.confidence,
      rawOcrKey: archiveKey,
      ocrEngine: ocr.engine,
      promptTruncated: extraction.promptTruncated,
    });
    if (!saved) {
      logger.info({ event: 'extraction.already_saved' }, 'extraction.already_saved');
      return Outcome.success('already extracted');
    }

    const { totalAmount } = extraction.fields;
    if (totalAmount === undefined) {
      return this.failWithoutTotal(id, ctx);
    }

    try {
      await this.publishExtracted(id, archiveKey, { ...extraction.fields, totalAmount });
    } catch (error) {
      return Outcome.retryable(`publish extracted failed: ${errorMessage(error)}`, error);
    }

    logger.info(
      {
        event: 'extraction.completed',
        engine: ocr.engine,
        confidence: extraction.confidence,
        poNumbers: extraction.fields.poNumbers.length,
        promptTruncated: extraction.promptTruncated,
      },
      'extraction.completed'
    );
    return Outcome.success();
  }

  /** Matching cannot decide without a total, so the invoice stops here as FAILED. */
  private async failWithoutTotal(id: string, ctx: MessageContext): Promise<HandlerOutcome> {
    await this.deps.invoices.markFailed(id, NO_TOTAL_REASON);
    ctx.logger.warn({ event: 'extraction.failed', reason: NO_TOTAL_REASON }, 'extraction.failed');
    return Outcome.success('no total amount');
  }

  private async publishExtracted(id: string, key: string, fields: ExtractedEvent['fields']): Promise<void> {
    const payload: ExtractedEvent = { correlationId: id, rawOcrKey: key, fields };
    await this.deps.publisher.publish(this.deps.exchange, RoutingKey.EXTRACTED, payload, { correlationId: id });
  }
}
