import { randomUUID } from 'crypto';
import path from 'path';
import type { EventPublisher } from '../broker/types';
import type { Invoice } from '../domain/invoice';
import { IngestedEvent, RoutingKey } from '../events/schemas';
import type { Logger } from '../infrastructure/logger';
import type { InvoiceRepository } from '../repositories/invoiceRepository';
import type { ObjectStore } from './S3Service';

export type RegisterDocumentInput = {
  filename: string;
  content: Buffer;
  contentType?: string;
  /** Defaults to a fresh UUID. */
  correlationId?: string;
};

export type IngestionServiceDeps = {
  invoices: InvoiceRepository;
  objectStore: ObjectStore;
  publisher: EventPublisher;
  exchange: string;
  logger: Logger;
};

export const documentKeyFor = (correlationId: string, filename: string) =>
  `invoices/${correlationId}/${path.basename(filename).replace(/[^A-Za-z0-9._-]/g, '_')}`;

export function createIngestionService(deps: IngestionServiceDeps) {
  return {
    /** Stores the document, creates the PENDING invoice and publishes `invoice.ingested`. */
    async registerDocument(input: RegisterDocumentInput): Promise<Invoice> {
      const correlationId = input.correlationId ?? randomUUID();
      const documentKey = documentKeyFor(correlationId, input.filename);

      await deps.objectStore.putObject(documentKey, input.content, input.contentType);
      const invoice = await deps.invoices.create({ id: correlationId, documentKey, filename: input.filename });

      const event: IngestedEvent = { correlationId, documentKey: invoice.documentKey, filename: invoice.filename };
      await deps.publisher.publish(deps.exchange, RoutingKey.INGESTED, event, { correlationId });

      deps.logger.info({ event: 'ingestion.registered', correlationId, documentKey }, 'ingestion.registered');
      return invoice;
    },

    /** Re-announces an invoice that never left PENDING. */
    async republishIngested(invoice: Invoice): Promise<void> {
      if (invoice.status !== 'PENDING') {
        throw new Error(`Invoice ${invoice.id} is ${invoice.status}; only PENDING invoices can be requeued`);
      }
      const event: IngestedEvent = {
        correlationId: invoice.id,
        documentKey: invoice.documentKey,
        filename: invoice.filename,
      };
      await deps.publisher.publish(deps.exchange, RoutingKey.INGESTED, event, { correlationId: invoice.id });
      deps.logger.info({ event: 'ingestion.republished', correlationId: invoice.id }, 'ingestion.republished');
    },
  };
}

export type IngestionService = ReturnType<typeof createIngestionService>;
