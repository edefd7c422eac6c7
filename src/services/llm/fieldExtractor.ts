import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import z from 'zod';
import { format, isValid, parse } from 'date-fns';
import type { ExtractedFields } from '../../domain/invoice';
import type { Logger } from '../../infrastructure/logger';
import { parseMoneyLike } from '../../utils/numberParsing';

export const TRUNCATION_MARKER = '...[truncated]';

/** Rate limiting, 5xx, timeouts and connection failures: the delivery should be retried. */
export class LlmTransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LlmTransientError';
  }
}

export type CompletionResult = {
  choices: Array<{ message: { content: string | null } }>;
};

/** The one completions call the extractor makes; an `OpenAI` instance satisfies it. */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<CompletionResult>;
    };
  };
}

export type FieldExtraction = {
  fields: ExtractedFields;
  /** Share of vendor, number, date and total that came back; 0 when the model call failed. */
  confidence: number;
  promptTruncated: boolean;
};

const DATE_FORMATS = ['yyyy-MM-dd', 'dd/MM/yyyy', 'd/M/yyyy', 'dd.MM.yyyy', 'd MMM yyyy', 'd MMMM yyyy', 'MMM d, yyyy', 'MMMM d, yyyy'];

export function normalizeInvoiceDate(raw: string): string | undefined {
  const value = raw.trim();
  for (const pattern of DATE_FORMATS) {
    const parsed = parse(value, pattern, new Date(2000, 0, 1));
    if (isValid(parsed)) return format(parsed, 'yyyy-MM-dd');
  }
  return undefined;
}

/** Ambiguous separators, more than two decimals and out-of-range totals count as absent. */
export function parseAmount(raw: unknown): number | undefined {
  const parsed = parseMoneyLike(raw);
  return parsed.value === null ? undefined : parsed.value;
}

const optionalText = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? v.trim() : undefined),
  z.string().optional()
);

const modelOutputSchema = z.object({
  vendor_name: optionalText,
  invoice_number: optionalText,
  invoice_date: optionalText,
  total_amount: z.unknown().transform(parseAmount),
  currency: optionalText.transform((v) => v?.toUpperCase()),
  po_numbers: z
    .unknown()
    .transform((v) => (Array.isArray(v) ? v : typeof v === 'string' ? [v] : []))
    .transform((list) =>
      list.filter((p): p is string => typeof p === 'string' && p.trim() !== '').map((p) => p.trim())
    ),
});

export function cleanModelOutput(raw: unknown): ExtractedFields {
  const parsed = modelOutputSchema.safeParse(raw);
  if (!parsed.success) return { poNumbers: [] };
  const out = parsed.data;
  const fields: ExtractedFields = { poNumbers: out.po_numbers };
  if (out.vendor_name) fields.vendorName = out.vendor_name;
  if (out.invoice_number) fields.invoiceNumber = out.invoice_number;
  if (out.invoice_date) {
    const date = normalizeInvoiceDate(out.invoice_date);
    if (date) fields.invoiceDate = date;
  }
  if (out.total_amount !== undefined) fields.totalAmount = out.total_amount;
  if (out.currency) fields.currency = out.currency;
  return fields;
}

/** Keeps the head of the text; invoices put vendor, number and PO references near the top. */
export function boundPromptText(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };
  return { text: text.slice(0, maxChars) + TRUNCATION_MARKER, truncated: true };
}

export function buildExtractionPrompt(invoiceText: string): string {
  return [
    'You are an accounts-payable assistant. Extract fields from the invoice text below.',
    'Rules:',
    '1. Return only a JSON object, no commentary.',
    '2. Use null for anything not present in the text.',
    '3. Dates in YYYY-MM-DD.',
    '4. Amounts as numbers without currency symbols.',
    '5. po_numbers is an array of every purchase order reference, in the order they appear.',
    '',
    'INVOICE TEXT:',
    invoiceText,
    '',
    'Return JSON with keys: vendor_name, invoice_number, invoice_date, total_amount, currency, po_numbers.',
  ].join('\n');
}

export function describeTransientLlmError(error: unknown): string | null {
  if (error instanceof OpenAI.APIConnectionTimeoutError) return 'LLM request timed out';
  if (error instanceof OpenAI.APIConnectionError) return `LLM connection failed: ${error.message}`;
  if (error instanceof OpenAI.RateLimitError) return 'LLM rate limit exceeded';
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    if (error.status === 429) return 'LLM rate limit exceeded';
    if (error.status >= 500) return `LLM server error ${error.status}`;
  }
  return null;
}

export type FieldExtractorOptions = {
  client: ChatClient | null;
  model: string;
  maxPromptChars: number;
  logger: Logger;
};

export class FieldExtractor {
  constructor(private readonly options: FieldExtractorOptions) {}

  /**
   * Transient model failures throw `LlmTransientError` so the delivery is retried; client errors and
   * unusable replies yield empty fields with confidence 0.
   */
  async extract(ocrText: string, logger: Logger = this.options.logger): Promise<FieldExtraction> {
    const bounded = boundPromptText(ocrText, this.options.maxPromptChars);
    if (bounded.truncated) {
      logger.warn(
        { event: 'llm.prompt.truncated', originalChars: ocrText.length, maxChars: this.options.maxPromptChars },
        'llm.prompt.truncated'
      );
    }
    const empty: FieldExtraction = { fields: { poNumbers: [] }, confidence: 0, promptTruncated: bounded.truncated };

    const { client } = this.options;
    if (!client) {
      logger.warn({ event: 'llm.unconfigured' }, 'llm.unconfigured');
      return empty;
    }

    let content: string | null | undefined;
    try {
      const completion = await client.chat.completions.create({
        model: this.options.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [{ role: 'user', content: buildExtractionPrompt(bounded.text) }],
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      const transient = describeTransientLlmError(error);
      if (transient !== null) {
        logger.warn({ event: 'llm.request.transient', err: transient }, 'llm.request.transient');
        throw new LlmTransientError(transient, { cause: error });
      }
      logger.error(
        { event: 'llm.request.failed', err: error instanceof Error ? error.message : String(error) },
        'llm.request.failed'
      );
      return empty;
    }

    if (!content) {
      logger.warn({ event: 'llm.response.empty' }, 'llm.response.empty');
      return empty;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(content);
    } catch (error) {
      logger.warn(
        { event: 'llm.response.unparseable', err: error instanceof Error ? error.message : String(error) },
        'llm.response.unparseable'
      );
      return empty;
    }

    const fields = cleanModelOutput(parsedJson);
    const found = [fields.vendorName, fields.invoiceNumber, fields.invoiceDate, fields.totalAmount].filter(
      (v) => v !== undefined
    ).length;
    return { fields, confidence: found / 4, promptTruncated: bounded.truncated };
  }
}
