import { DetectDocumentTextCommand, TextractClient } from '@aws-sdk/client-textract';
import { TimeoutError } from '../../utils/backoff';
import { FailureAction, isAbortError, OcrDocument, OcrEngine, OcrEngineError, OcrResult } from './types';

const RETRYABLE_ERRORS = new Set([
  'ThrottlingException',
  'ProvisionedThroughputExceededException',
  'LimitExceededException',
  'InternalServerError',
  'ServiceUnavailableException',
  'TimeoutError',
  'RequestTimeout',
  'ECONNRESET',
  'ETIMEDOUT',
]);

export type TextractEngineOptions = {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  client?: TextractClient;
};

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('$metadata' in error)) return undefined;
  const metadata = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) return undefined;
  return typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined;
}

/**
 * Throttling, timeouts and 5xx are worth another attempt; anything else (unsupported or corrupt
 * document, bad parameters, errors we do not recognise) moves on to the next engine.
 */
export function classifyTextractError(error: unknown): FailureAction {
  if (isAbortError(error)) return 'abort';
  if (error instanceof TimeoutError) return 'retry';
  if (error instanceof OcrEngineError) return error.kind === 'transient' ? 'retry' : 'skip';
  if (error instanceof Error && RETRYABLE_ERRORS.has(error.name)) return 'retry';
  const status = httpStatusOf(error);
  if (status !== undefined && status >= 500) return 'retry';
  return 'skip';
}

export class TextractEngine implements OcrEngine {
  readonly name = 'textract';
  private readonly client: TextractClient;

  constructor(options: TextractEngineOptions) {
    this.client =
      options.client ??
      new TextractClient({
        region: options.region,
        credentials:
          options.accessKeyId && options.secretAccessKey
            ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
            : undefined,
      });
  }

  async recognize(document: OcrDocument, signal?: AbortSignal): Promise<OcrResult> {
    const response = await this.client.send(
      new DetectDocumentTextCommand({ Document: { Bytes: document.bytes } }),
      { abortSignal: signal }
    );

    const lines = (response.Blocks ?? []).filter((b) => b.BlockType === 'LINE' && b.Text);
    const text = lines.map((b) => b.Text ?? '').join('\n');
    const confidences = lines.map((b) => b.Confidence ?? 0);
    const confidence =
      confidences.length > 0 ? confidences.reduce((a, b) => a + b, 0) / confidences.length / 100 : 0;

    return {
      engine: this.name,
      text,
      confidence,
      raw: { blocks: response.Blocks ?? [], documentMetadata: response.DocumentMetadata },
    };
  }
}
