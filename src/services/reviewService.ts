import { InvoiceStatus, ReviewDecision } from '../domain/invoice';
import type { EventPublisher } from '../broker/types';
import { ApprovedEvent, RoutingKey } from '../events/schemas';
import type { Logger } from '../infrastructure/logger';
import { InvoiceNotFoundError, InvoiceRepository } from '../repositories/invoiceRepository';

export class InvoiceNotReviewableError extends Error {
  constructor(id: string, status: string) {
    super(`Invoice ${id} cannot be reviewed in status ${status}`);
    this.name = 'InvoiceNotReviewableError';
  }
}

export type ReviewInput = {
  invoiceId: string;
  reviewer: string;
  decision: ReviewDecision;
  notes?: string | null;
};

export type ReviewServiceDeps = {
  invoices: InvoiceRepository;
  publisher: EventPublisher;
  exchange: string;
  logger: Logger;
};

export function createReviewService(deps: ReviewServiceDeps) {
  return {
    /**
     * Moves NEEDS_REVIEW / AUTO_APPROVED to REVIEWED. An approval is handed to posting via
     * `invoice.approved`; a rejection stops there.
     */
    async submitReview(input: ReviewInput): Promise<{ status: typeof InvoiceStatus.REVIEWED; decision: ReviewDecision }> {
      const reviewer = input.reviewer.trim();
      if (!reviewer) throw new Error('reviewer is required');

      const updated = await deps.invoices.recordReview(input.invoiceId, {
        reviewer,
        decision: input.decision,
        notes: input.notes ?? null,
      });

      if (!updated) {
        const invoice = await deps.invoices.findById(input.invoiceId);
        if (!invoice) throw new InvoiceNotFoundError(input.invoiceId);
        throw new InvoiceNotReviewableError(input.invoiceId, invoice.status);
      }

      deps.logger.info(
        { event: 'review.recorded', correlationId: input.invoiceId, reviewer, decision: input.decision },
        'review.recorded'
      );

      if (input.decision === 'APPROVED') {
        const event: ApprovedEvent = { correlationId: input.invoiceId, approvedBy: reviewer };
        await deps.publisher.publish(deps.exchange, RoutingKey.APPROVED, event, {
          correlationId: input.invoiceId,
        });
      }

      return { status: InvoiceStatus.REVIEWED, decision: input.decision };
    },
  };
}

export type ReviewService = ReturnType<typeof createReviewService>;

