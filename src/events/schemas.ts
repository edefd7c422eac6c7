import z from 'zod';

export const RoutingKey = {
  INGESTED: 'invoice.ingested',
  EXTRACTED: 'invoice.extracted',
  MATCHED: 'invoice.matched',
  APPROVED: 'invoice.approved',
  POSTED: 'invoice.posted',
} as const;
export type RoutingKey = (typeof RoutingKey)[keyof typeof RoutingKey];

export const QueueName = {
  INGESTED: 'invoice-ingested',
  EXTRACTED: 'invoice-extracted',
  MATCHED: 'invoice-matched',
  APPROVED: 'invoice-approved',
  POSTED: 'invoice-posted',
} as const;
export type QueueName = (typeof QueueName)[keyof typeof QueueName];

const correlationId = z.string().trim().min(1);

export const ingestedEventSchema = z.object({
  correlationId,
  documentKey: z.string().min(1),
  filename: z.string(),
});
export type IngestedEvent = z.infer<typeof ingestedEventSchema>;

export const extractedFieldsSchema = z.object({
  vendorName: z.string().optional(),
  invoiceNumber: z.string().optional(),
  invoiceDate: z.string().optional(),
  totalAmount: z.number().finite(),
  currency: z.string().optional(),
  poNumbers: z.array(z.string()).default([]),
});

export const extractedEventSchema = z.object({
  correlationId,
  rawOcrKey: z.string(),
  fields: extractedFieldsSchema,
});
export type ExtractedEvent = z.infer<typeof extractedEventSchema>;

export const matchedEventSchema = z.object({
  correlationId,
  status: z.enum(['AUTO_APPROVED', 'NEEDS_REVIEW']),
  details: z.object({
    poNumber: z.string().nullable(),
    poAmount: z.number().nullable(),
    invoiceAmount: z.number(),
    variancePct: z.number().nullable(),
  }),
  error: z.string().optional(),
});
export type MatchedEvent = z.infer<typeof matchedEventSchema>;

export const approvedEventSchema = z.object({
  correlationId,
  approvedBy: z.string().min(1),
});
export type ApprovedEvent = z.infer<typeof approvedEventSchema>;

export const postedEventSchema = z.object({
  correlationId,
  status: z.enum(['POSTED', 'POSTING_FAILED']),
  externalReference: z.string().optional(),
  error: z.string().optional(),
});
export type PostedEvent = z.infer<typeof postedEventSchema>;
