#!/usr/bin/env tsx
/**
 * Republish `invoice.ingested` for an invoice still in PENDING (e.g. the original publish was lost).
 * Usage:
 *   INVOICE_ID=<uuid> npm run requeue:invoice
 * or
 *   npm run requeue:invoice -- <uuid>
 */
import { config } from '../src/config/env';
import { createPipelineContext } from '../src/infrastructure/container';
import { createLogger } from '../src/infrastructure/logger';
import { createIngestionService } from '../src/services/ingestionService';

const logger = createLogger({ level: config.LOG_LEVEL, nodeEnv: config.NODE_ENV, name: 'requeue-invoice' });
const ctx = createPipelineContext(config, logger);

async function main() {
  const id = process.argv[2] || process.env.INVOICE_ID;
  if (!id) {
    console.error('Usage: INVOICE_ID=<uuid> npm run requeue:invoice  OR  npm run requeue:invoice -- <uuid>');
    process.exitCode = 1;
    return;
  }

  const invoice = await ctx.invoices.findById(id);
  if (!invoice) {
    console.error(`Invoice ${id} not found`);
    process.exitCode = 1;
    return;
  }

  await ctx.broker.declareTopology();
  const ingestion = createIngestionService({
    invoices: ctx.invoices,
    objectStore: ctx.objectStore,
    publisher: ctx.broker,
    exchange: config.BROKER_EXCHANGE,
    logger,
  });
  await ingestion.republishIngested(invoice);

  console.log('Requeued invoice:', { id: invoice.id, status: invoice.status, documentKey: invoice.documentKey });
}

main()
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  })
  .finally(async () => {
    await ctx.close();
  });
