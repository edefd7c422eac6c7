import { InvoiceStatus } from '../../domain/invoice';
import { EventPublisher, HandlerOutcome, MessageContext, MessageHandler, Outcome } from '../../broker/types';
import { ApprovedEvent, approvedEventSchema, PostedEvent, RoutingKey } from '../../events/schemas';
import type { InvoiceRepository, PostingRecord } from '../../repositories/invoiceRepository';
import { minorUnitsToNumber } from '../../utils/money';
import type { ErpClient } from './erpClient';

export type PostingServiceDeps = {
  invoices: InvoiceRepository;
  erp: ErpClient;
  publisher: EventPublisher;
  exchange: string;
};

/**
 * Consumes `invoice.approved`. ERP outcomes are persisted (POSTED / POSTING_FAILED) and announced
 * on `invoice.posted`; the delivery itself is always acked once the invoice is known.
 */
export class PostingService implements MessageHandler<ApprovedEvent> {
  readonly schema = approvedEventSchema;

  constructor(private readonly deps: PostingServiceDeps) {}

  async handle(event: ApprovedEvent, ctx: MessageContext): Promise<HandlerOutcome> {
    const id = event.correlationId;
    const logger = ctx.logger;

    const invoice = await this.deps.invoices.findById(id);
    if (!invoice) {
      return Outcome.permanent(`invoice ${id} does not exist`);
    }
    if (invoice.status === InvoiceStatus.POSTED) {
      logger.info({ event: 'posting.already_posted' }, 'posting.already_posted');
      return Outcome.success('already posted');
    }
    if (invoice.status !== InvoiceStatus.REVIEWED || invoice.reviewDecision !== 'APPROVED') {
      logger.warn(
        { event: 'posting.not_eligible', status: invoice.status, reviewDecision: invoice.reviewDecision },
        'posting.not_eligible'
      );
      return Outcome.success('not eligible');
    }

    let outcome: PostingRecord;
    if (invoice.totalAmountMinor === null) {
      outcome = { status: InvoiceStatus.POSTING_FAILED, error: 'invoice has no total amount' };
    } else {
      const result = await this.deps.erp.postInvoice(
        {
          id: invoice.id,
          vendor: invoice.vendorName,
          invoice_number: invoice.invoiceNumber,
          amount: minorUnitsToNumber(invoice.totalAmountMinor),
          currency: invoice.currency,
        },
        logger
      );
      outcome = result.ok
        ? { status: InvoiceStatus.POSTED, externalReference: result.externalReference }
        : { status: InvoiceStatus.POSTING_FAILED, error: result.error };
    }

    const recorded = await this.deps.invoices.recordPosting(id, outcome);
    if (!recorded) {
      logger.info({ event: 'posting.concurrent_transition' }, 'posting.concurrent_transition');
      return Outcome.success('already transitioned');
    }

    const posted: PostedEvent =
      outcome.status === InvoiceStatus.POSTED
        ? {
            correlationId: id,
            status: outcome.status,
            ...(outcome.externalReference ? { externalReference: outcome.externalReference } : {}),
          }
        : { correlationId: id, status: outcome.status, error: outcome.error };

    try {
      await this.deps.publisher.publish(this.deps.exchange, RoutingKey.POSTED, posted, { correlationId: id });
    } catch (error) {
      // The ledger write already happened; a redelivery must not post again.
      logger.error(
        { event: 'posting.event.unpublished', err: error instanceof Error ? error.message : String(error) },
        'posting.event.unpublished'
      );
    }

    logger.info({ event: 'posting.completed', status: outcome.status }, 'posting.completed');
    return Outcome.success();
  }
}
