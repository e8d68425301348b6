import { logger } from './logger.js';
import { MAGIC } from './signatures.js';
import { findExifSegment } from './formats/jpeg.js';
import type { StreamReader } from './binary/stream-reader.js';
import type { ExifSegment, ImageType } from './types.js';

/**
 * Whether each type may carry transparent pixels
 */
const HAS_ALPHA: Record<ImageType, boolean> = {
  gif: true,
  jpeg: false,
  'png-alpha': true,
  png: false,
  unknown: false,
};

/**
 * MIME types for each type
 */
const MIME_TYPES: Record<ImageType, string> = {
  gif: 'image/gif',
  jpeg: 'image/jpeg',
  'png-alpha': 'image/png',
  png: 'image/png',
  unknown: 'application/octet-stream',
};

/** Offset of the IHDR colour-type byte from the start of a PNG */
const PNG_COLOR_TYPE_OFFSET = 25;

export interface SniffResult {
  type: ImageType;
  /** First two bytes as a big-endian value, -1 for an empty stream */
  magicNumber: number;
  /** APP1 segment, only ever located for JPEG */
  exif: ExifSegment | null;
}

/**
 * Classify a stream from its first bytes. For JPEG the reader is handed on to
 * the segment walker so the Exif block is located in the same pass.
 */
export function sniffImageType(reader: StreamReader): SniffResult {
  const magicNumber = reader.readUint16();

  if (magicNumber === MAGIC.JPEG) {
    return { type: 'jpeg', magicNumber, exif: findExifSegment(reader) };
  }
  if (magicNumber < 0) {
    return { type: 'unknown', magicNumber, exif: null };
  }

  // A missing fourth byte reads as 0xFF, so a bare "GIF" still matches
  const third = reader.readUint8() & 0xff;
  const fourth = reader.readUint8() & 0xff;
  const firstFour = ((magicNumber << 16) | (third << 8) | fourth) >>> 0;

  if (firstFour === MAGIC.PNG) {
    reader.skip(PNG_COLOR_TYPE_OFFSET - 4);
    const colorType = reader.readUint8();
    // Indexed PNGs can carry a tRNS chunk, so 3 counts as alpha too
    return { type: colorType >= 3 ? 'png-alpha' : 'png', magicNumber, exif: null };
  }

  if (firstFour >>> 8 === MAGIC.GIF) {
    return { type: 'gif', magicNumber, exif: null };
  }

  logger.debug({ firstFour: firstFour.toString(16) }, 'unrecognised magic header');
  return { type: 'unknown', magicNumber, exif: null };
}

/**
 * Whether an image of this type may carry transparent pixels
 */
export function hasAlpha(type: ImageType): boolean {
  return HAS_ALPHA[type];
}

/**
 * Get MIME type for an image type
 */
export function getMimeType(type: ImageType): string {
  return MIME_TYPES[type];
}
