import type { Logger } from '../../infrastructure/logger';
import { computeBackoffDelay, sleep as defaultSleep, Sleep } from '../../utils/backoff';

export type ErpInvoicePayload = {
  id: string;
  vendor: string | null;
  invoice_number: string | null;
  amount: number;
  currency: string | null;
};

export type ErpPostResult =
  | { ok: true; externalReference: string | null; attempts: number }
  | { ok: false; error: string; status: number | null; retryable: boolean; attempts: number };

export class ErpRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ErpRequestError';
  }
}

export type ErpClientOptions = {
  baseUrl: string;
  token: string;
  maxRetries: number;
  retryBackoffMs: number;
  timeoutMs: number;
  logger: Logger;
  fetch?: typeof fetch;
  sleep?: Sleep;
};

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function referenceFrom(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) return null;
  const candidates: unknown[] = [
    'reference' in body ? body.reference : undefined,
    'id' in body ? body.id : undefined,
  ];
  for (const value of candidates) {
    if (typeof value === 'string' && value !== '') return value;
    if (typeof value === 'number') return String(value);
  }
  return null;
}

/**
 * Posts approved invoices to the ledger. 429, 5xx, network errors and timeouts are retried here
 * with exponential backoff, so one post makes at most `maxRetries + 1` calls.
 */
export class ErpClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleep;

  constructor(private readonly options: ErpClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async postInvoice(payload: ErpInvoicePayload, logger: Logger = this.options.logger): Promise<ErpPostResult> {
    const totalAttempts = this.options.maxRetries + 1;
    let lastError: ErpRequestError | null = null;

    for (let attempt = 1; attempt <= totalAttempts; attempt += 1) {
      try {
        const externalReference = await this.send(payload);
        logger.info({ event: 'erp.post.succeeded', attempt, externalReference }, 'erp.post.succeeded');
        return { ok: true, externalReference, attempts: attempt };
      } catch (error) {
        lastError =
          error instanceof ErpRequestError
            ? error
            : new ErpRequestError(error instanceof Error ? error.message : String(error), null, false, { cause: error });

        if (!lastError.retryable) {
          logger.warn(
            { event: 'erp.post.rejected', attempt, status: lastError.status, err: lastError.message },
            'erp.post.rejected'
          );
          return { ok: false, error: lastError.message, status: lastError.status, retryable: false, attempts: attempt };
        }
        if (attempt < totalAttempts) {
          const delayMs = computeBackoffDelay(attempt, this.options.retryBackoffMs);
          logger.warn(
            { event: 'erp.post.retry', attempt, delayMs, status: lastError.status, err: lastError.message },
            'erp.post.retry'
          );
          await this.sleep(delayMs);
        }
      }
    }

    logger.error(
      { event: 'erp.post.exhausted', attempts: totalAttempts, status: lastError?.status ?? null },
      'erp.post.exhausted'
    );
    return {
      ok: false,
      error: lastError?.message ?? 'ERP post failed',
      status: lastError?.status ?? null,
      retryable: true,
      attempts: totalAttempts,
    };
  }

  private async send(payload: ErpInvoicePayload): Promise<string | null> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/invoices`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.token}`,
          // Lets the ledger drop a second post of the same invoice from a concurrent redelivery.
          'Idempotency-Key': payload.id,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')
          ? `ERP request timed out after ${this.options.timeoutMs}ms`
          : `ERP request failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new ErpRequestError(reason, null, true, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new ErpRequestError(
        `ERP responded ${response.status}${text ? `: ${text.slice(0, 500)}` : ''}`,
        response.status,
        isRetryableStatus(response.status)
      );
    }

    const body: unknown = await response.json().catch(() => null);
    return referenceFrom(body);
  }
}
