import { describe, it, expect } from 'vitest';
import { InvoiceNotFoundError } from '../../../src/repositories/invoiceRepository';
import { createReviewService, InvoiceNotReviewableError } from '../../../src/services/reviewService';
import { buildInvoice, InMemoryInvoiceRepository, RecordingPublisher, silentLogger } from '../../support/fakes';

function setup(status: 'NEEDS_REVIEW' | 'AUTO_APPROVED' | 'PROCESSING' = 'NEEDS_REVIEW') {
  const invoices = new InMemoryInvoiceRepository();
  invoices.seed(buildInvoice({ id: 'inv-1', status, extractionStatus: 'COMPLETED' }));
  const publisher = new RecordingPublisher();
  const service = createReviewService({ invoices, publisher, exchange: 'invoices', logger: silentLogger() });
  return { invoices, publisher, service };
}

describe('reviewService.submitReview', () => {
  it('records an approval and hands the invoice to posting', async () => {
    const { service, invoices, publisher } = setup();

    const result = await service.submitReview({
      invoiceId: 'inv-1',
      reviewer: '  ap-clerk ',
      decision: 'APPROVED',
      notes: 'PO amended by phone',
    });

    expect(result).toEqual({ status: 'REVIEWED', decision: 'APPROVED' });
    expect(invoices.get('inv-1')).toMatchObject({
      status: 'REVIEWED',
      reviewedBy: 'ap-clerk',
      reviewDecision: 'APPROVED',
      reviewNotes: 'PO amended by phone',
    });
    expect(publisher.published).toEqual([
      {
        exchange: 'invoices',
        routingKey: 'invoice.approved',
        correlationId: 'inv-1',
        payload: { correlationId: 'inv-1', approvedBy: 'ap-clerk' },
      },
    ]);
  });

  it('confirms auto-approved invoices the same way', async () => {
    const { service, invoices } = setup('AUTO_APPROVED');

    await service.submitReview({ invoiceId: 'inv-1', reviewer: 'ap-clerk', decision: 'APPROVED' });

    expect(invoices.get('inv-1').status).toBe('REVIEWED');
  });

  it('stops a rejected invoice at REVIEWED without publishing', async () => {
    const { service, invoices, publisher } = setup();

    await service.submitReview({ invoiceId: 'inv-1', reviewer: 'ap-clerk', decision: 'REJECTED' });

    expect(invoices.get('inv-1')).toMatchObject({ status: 'REVIEWED', reviewDecision: 'REJECTED', reviewNotes: null });
    expect(publisher.published).toHaveLength(0);
  });

  it('refuses a second review', async () => {
    const { service, publisher } = setup();
    await service.submitReview({ invoiceId: 'inv-1', reviewer: 'ap-clerk', decision: 'APPROVED' });

    await expect(
      service.submitReview({ invoiceId: 'inv-1', reviewer: 'ap-lead', decision: 'REJECTED' })
    ).rejects.toThrow('Invoice inv-1 cannot be reviewed in status REVIEWED');
    expect(publisher.published).toHaveLength(1);
  });

  it('refuses invoices still being processed', async () => {
    const { service } = setup('PROCESSING');

    await expect(
      service.submitReview({ invoiceId: 'inv-1', reviewer: 'ap-clerk', decision: 'APPROVED' })
    ).rejects.toBeInstanceOf(InvoiceNotReviewableError);
  });

  it('reports unknown invoices', async () => {
    const { service } = setup();

    await expect(
      service.submitReview({ invoiceId: 'inv-404', reviewer: 'ap-clerk', decision: 'APPROVED' })
    ).rejects.toBeInstanceOf(InvoiceNotFoundError);
  });

  it('requires a reviewer', async () => {
    const { service, invoices } = setup();

    await expect(service.submitReview({ invoiceId: 'inv-1', reviewer: '   ', decision: 'APPROVED' })).rejects.toThrow(
      'reviewer is required'
    );
    expect(invoices.get('inv-1').status).toBe('NEEDS_REVIEW');
  });
});
