import { InvoiceStatus, MatchDecision, MatchDetails } from '../../domain/invoice';
import { HandlerOutcome, MessageContext, MessageHandler, Outcome, EventPublisher } from '../../broker/types';
import { ExtractedEvent, extractedEventSchema, MatchedEvent, RoutingKey } from '../../events/schemas';
import type { InvoiceRepository } from '../../repositories/invoiceRepository';
import type { PurchaseOrderRepository } from '../../repositories/purchaseOrderRepository';
import { minorUnitsToNumber, toMinorUnits } from '../../utils/money';
import { matchAgainstPurchaseOrders } from './poMatchEngine';

export type MatchingServiceDeps = {
  invoices: InvoiceRepository;
  purchaseOrders: PurchaseOrderRepository;
  publisher: EventPublisher;
  exchange: string;
  tolerance: number;
};

export function toMatchedEvent(
  correlationId: string,
  decision: MatchDecision,
  details: MatchDetails,
  error?: string
): MatchedEvent {
  const event: MatchedEvent = {
    correlationId,
    status: decision,
    details: {
      poNumber: details.poNumber,
      poAmount: details.poAmountMinor === null ? null : minorUnitsToNumber(details.poAmountMinor),
      invoiceAmount: minorUnitsToNumber(details.invoiceAmountMinor),
      variancePct: details.variance,
    },
  };
  if (error !== undefined) event.error = error;
  return event;
}

/**
 * Consumes `invoice.extracted` and decides AUTO_APPROVED or NEEDS_REVIEW. Any failure while
 * deciding lands the invoice in NEEDS_REVIEW; it is never approved on error.
 */
export class MatchingService implements MessageHandler<ExtractedEvent> {
  readonly schema = extractedEventSchema;

  constructor(private readonly deps: MatchingServiceDeps) {}

  async handle(event: ExtractedEvent, ctx: MessageContext): Promise<HandlerOutcome> {
    const id = event.correlationId;
    const logger = ctx.logger;
    const invoiceAmountMinor = toMinorUnits(event.fields.totalAmount);

    let decision: MatchDecision;
    let details: MatchDetails;
    try {
      const result = await matchAgainstPurchaseOrders(
        { invoiceAmountMinor, poNumbers: event.fields.poNumbers, tolerance: this.deps.tolerance },
        (poNumber) => this.deps.purchaseOrders.findByNumber(poNumber)
      );
      decision = result.decision;
      details = result.details;
    } catch (error) {
      return this.failSafe(id, invoiceAmountMinor, error, ctx);
    }

    const saved = await this.deps.invoices.saveMatchDecision(id, decision, details, null);
    if (!saved) {
      logger.info({ event: 'matching.already_decided' }, 'matching.already_decided');
      return Outcome.success('already decided');
    }

    try {
      await this.publish(toMatchedEvent(id, decision, details));
    } catch (error) {
      return Outcome.retryable(`publish matched failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }

    logger.info(
      { event: 'matching.decided', decision, poNumber: details.poNumber, variance: details.variance },
      'matching.decided'
    );
    return Outcome.success();
  }

  private async failSafe(id: string, invoiceAmountMinor: number, error: unknown, ctx: MessageContext): Promise<HandlerOutcome> {
    const message = error instanceof Error ? error.message : String(error);
    const details: MatchDetails = { poNumber: null, poAmountMinor: null, invoiceAmountMinor, variance: null };
    ctx.logger.error({ event: 'matching.error', err: message }, 'matching.error');

    let saved: boolean;
    try {
      saved = await this.deps.invoices.saveMatchDecision(id, InvoiceStatus.NEEDS_REVIEW, details, message);
    } catch (persistError) {
      return Outcome.retryable(
        `fail-safe NEEDS_REVIEW not persisted: ${persistError instanceof Error ? persistError.message : String(persistError)}`,
        persistError
      );
    }
    if (!saved) return Outcome.success('already decided');

    try {
      await this.publish(toMatchedEvent(id, InvoiceStatus.NEEDS_REVIEW, details, message));
    } catch (publishError) {
      ctx.logger.warn(
        {
          event: 'matching.error_event.unpublished',
          err: publishError instanceof Error ? publishError.message : String(publishError),
        },
        'matching.error_event.unpublished'
      );
    }
    return Outcome.success('needs review after error');
  }

  private publish(event: MatchedEvent): Promise<void> {
    return this.deps.publisher.publish(this.deps.exchange, RoutingKey.MATCHED, event, {
      correlationId: event.correlationId,
    });
  }
}
