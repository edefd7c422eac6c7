import type { Logger } from '../../infrastructure/logger';
import { computeBackoffDelay, sleep as defaultSleep, Sleep, TimeoutError, withTimeout } from '../../utils/backoff';
import type { OcrDocument, OcrResult, OcrStrategy } from './types';

export type OcrAttempt = {
  engine: string;
  attempt: number;
  outcome: 'recognized' | 'empty' | 'retry' | 'skip' | 'abort';
  error?: string;
};

export type OcrChainResult =
  | { status: 'recognized'; result: OcrResult; attempts: OcrAttempt[] }
  | { status: 'exhausted'; attempts: OcrAttempt[] };

export class OcrAbortedError extends Error {
  constructor(readonly attempts: OcrAttempt[]) {
    super('OCR chain aborted');
    this.name = 'OcrAbortedError';
  }
}

export type OcrChainOptions = {
  timeoutMs: number;
  retryBackoffMs: number;
  logger: Logger;
  sleep?: Sleep;
};

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

/**
 * Tries each strategy in order. A strategy's classifier decides whether a failed attempt is retried
 * on the same engine, skipped to the next engine, or aborts the whole chain. Blank text counts as a
 * skip.
 */
export class OcrChain {
  private readonly sleep: Sleep;

  constructor(
    private readonly strategies: OcrStrategy[],
    private readonly options: OcrChainOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  get engineNames(): string[] {
    return this.strategies.map((s) => s.engine.name);
  }

  async run(document: OcrDocument, signal?: AbortSignal): Promise<OcrChainResult> {
    const attempts: OcrAttempt[] = [];
    const { logger } = this.options;

    for (const strategy of this.strategies) {
      const engine = strategy.engine.name;

      for (let attempt = 1; attempt <= strategy.maxAttempts; attempt += 1) {
        if (signal?.aborted) {
          attempts.push({ engine, attempt, outcome: 'abort', error: 'cancelled before attempt' });
          throw new OcrAbortedError(attempts);
        }

        // Per-attempt signal: follows shutdown, and is aborted when the attempt times out.
        const attemptController = new AbortController();
        const forwardAbort = () => attemptController.abort(signal?.reason);
        signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
          const result = await withTimeout(`${engine} ocr`, this.options.timeoutMs, () =>
            strategy.engine.recognize(document, attemptController.signal)
          );
          if (result.text.trim() === '') {
            attempts.push({ engine, attempt, outcome: 'empty' });
            logger.warn({ event: 'ocr.engine.empty', engine, attempt }, 'ocr.engine.empty');
            break;
          }
          attempts.push({ engine, attempt, outcome: 'recognized' });
          logger.info(
            { event: 'ocr.engine.recognized', engine, attempt, confidence: result.confidence },
            'ocr.engine.recognized'
          );
          return { status: 'recognized', result, attempts };
        } catch (error) {
          if (error instanceof TimeoutError) attemptController.abort(error);
          const action = strategy.classify(error);
          attempts.push({ engine, attempt, outcome: action, error: errorMessage(error) });

          if (action === 'abort') {
            logger.warn({ event: 'ocr.chain.aborted', engine, attempt }, 'ocr.chain.aborted');
            throw new OcrAbortedError(attempts);
          }
          if (action === 'skip' || attempt === strategy.maxAttempts) {
            logger.warn(
              { event: 'ocr.engine.skipped', engine, attempt, action, err: errorMessage(error) },
              'ocr.engine.skipped'
            );
            break;
          }

          const delayMs = computeBackoffDelay(attempt, this.options.retryBackoffMs);
          logger.warn(
            { event: 'ocr.engine.retry', engine, attempt, delayMs, err: errorMessage(error) },
            'ocr.engine.retry'
          );
          await this.sleep(delayMs);
        } finally {
          signal?.removeEventListener('abort', forwardAbort);
        }
      }
    }

    return { status: 'exhausted', attempts };
  }
}
