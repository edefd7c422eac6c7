export type OcrDocument = {
  bytes: Buffer;
  filename: string;
};

export type OcrResult = {
  engine: string;
  text: string;
  /** 0..1, averaged over recognised lines or words. */
  confidence: number;
  raw?: unknown;
};

export interface OcrEngine {
  readonly name: string;
  recognize(document: OcrDocument, signal?: AbortSignal): Promise<OcrResult>;
}

export type OcrErrorKind = 'transient' | 'unsupported' | 'unavailable' | 'aborted';

export class OcrEngineError extends Error {
  constructor(
    readonly engine: string,
    readonly kind: OcrErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${engine}: ${message}`, options);
    this.name = 'OcrEngineError';
  }
}

/** What a strategy does with a failed attempt: try the same engine again, move to the next one, or stop the chain. */
export type FailureAction = 'retry' | 'skip' | 'abort';

export type OcrStrategy = {
  engine: OcrEngine;
  maxAttempts: number;
  classify(error: unknown): FailureAction;
};

export type DocumentKind = 'pdf' | 'png' | 'jpeg' | 'tiff' | 'unknown';

export function detectDocumentKind(bytes: Buffer): DocumentKind {
  if (bytes.subarray(0, 4).toString('latin1') === '%PDF') return 'pdf';
  if (bytes.length >= 4 && bytes[0] === 0x89 && bytes.subarray(1, 4).toString('latin1') === 'PNG') return 'png';
  if (bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) return 'jpeg';
  const tiffMagic = bytes.subarray(0, 4).toString('hex');
  if (tiffMagic === '49492a00' || tiffMagic === '4d4d002a') return 'tiff';
  return 'unknown';
}

export function isAbortError(error: unknown): boolean {
  return (
    (error instanceof OcrEngineError && error.kind === 'aborted') ||
    (error instanceof Error && error.name === 'AbortError')
  );
}
