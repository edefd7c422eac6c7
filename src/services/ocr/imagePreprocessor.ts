import sharp from 'sharp';

export interface PreprocessingOptions {
  autoRotate?: boolean;
  grayscale?: boolean;
  normalise?: boolean;
  maxWidth?: number;
  maxHeight?: number;
}

export interface PreprocessingResult {
  buffer: Buffer;
  originalDimensions: { width: number; height: number };
  processedDimensions: { width: number; height: number };
}

// Maximum dimensions to prevent memory issues
export const MAX_WIDTH = 4000;
export const MAX_HEIGHT = 4000;

export class ImageTooLargeError extends Error {
  constructor(width: number, height: number) {
    super(`Image dimensions (${width}x${height}) exceed safety limits. Maximum allowed: ${MAX_WIDTH * 2}x${MAX_HEIGHT * 2}`);
    this.name = 'ImageTooLargeError';
  }
}

/**
 * Prepares a scanned page for the local OCR engine: EXIF rotation, grayscale, contrast
 * normalisation and a bounded downscale. Output is always PNG.
 */
export async function preprocessForOcr(input: Buffer, options: PreprocessingOptions = {}): Promise<PreprocessingResult> {
  const {
    autoRotate = true,
    grayscale = true,
    normalise = true,
    maxWidth = MAX_WIDTH,
    maxHeight = MAX_HEIGHT,
  } = options;

  const metadata = await sharp(input).metadata();
  const originalWidth = metadata.width || 0;
  const originalHeight = metadata.height || 0;

  // Reject extremely large images early
  if (originalWidth > MAX_WIDTH * 2 || originalHeight > MAX_HEIGHT * 2) {
    throw new ImageTooLargeError(originalWidth, originalHeight);
  }

  let pipeline = sharp(input);
  if (autoRotate) pipeline = pipeline.rotate();
  if (grayscale) pipeline = pipeline.grayscale();
  if (normalise) pipeline = pipeline.normalise();
  if (originalWidth > maxWidth || originalHeight > maxHeight) {
    pipeline = pipeline.resize(maxWidth, maxHeight, { fit: 'inside', withoutEnlargement: true });
  }

  const { data, info } = await pipeline.png({ compressionLevel: 9 }).toBuffer({ resolveWithObject: true });

  return {
    buffer: data,
    originalDimensions: { width: originalWidth, height: originalHeight },
    processedDimensions: { width: info.width, height: info.height },
  };
}
