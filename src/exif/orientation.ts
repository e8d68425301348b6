/**
 * Exif orientation decoding.
 *
 * Walks IFD0 of the TIFF structure inside a JPEG APP1 payload looking for tag
 * 0x0112. Every failure mode (missing preamble, reads past the end, malformed
 * entries) yields -1.
 */

import { logger } from '../logger.js';
import { ExifView } from '../binary/exif-view.js';
import * as buffer from '../binary/buffer.js';
import { BufferOverflowError } from '../errors.js';
import { FILE_SIGNATURES, MAGIC } from '../signatures.js';
import type { IfdEntry, OrientationTransform } from '../types.js';

export const ORIENTATION_TAG = 0x0112;

/** Length of the "Exif\0\0" preamble; TIFF offsets are relative to its end */
const TIFF_HEADER_OFFSET = FILE_SIGNATURES.EXIF_PREAMBLE.length;

// ─── Format sizes ───────────────────────────────────────────────────────────

export const BYTES_PER_FORMAT: Record<number, number> = {
  1: 1,  // BYTE
  2: 1,  // ASCII
  3: 2,  // SHORT
  4: 4,  // LONG
  5: 8,  // RATIONAL
  6: 1,  // SBYTE
  7: 1,  // UNDEFINED
  8: 2,  // SSHORT
  9: 4,  // SLONG
  10: 8, // SRATIONAL
  11: 4, // FLOAT
  12: 8, // DOUBLE
};

const TRANSFORMS: Record<number, OrientationTransform> = {
  1: { rotation: 0, mirrored: false },
  2: { rotation: 0, mirrored: true },
  3: { rotation: 180, mirrored: false },
  4: { rotation: 180, mirrored: true },
  5: { rotation: 270, mirrored: true },
  6: { rotation: 90, mirrored: false },
  7: { rotation: 90, mirrored: true },
  8: { rotation: 270, mirrored: false },
};

/**
 * Whether orientation decoding applies to a stream with this magic number.
 *
 * The JPEG test is a bitmask rather than an equality check, so it also admits
 * other values with those bits set. Callers rely on this; keep it as is.
 */
export function handles(magicNumber: number): boolean {
  return (
    (magicNumber & MAGIC.JPEG) === MAGIC.JPEG ||
    magicNumber === MAGIC.TIFF_MOTOROLA ||
    magicNumber === MAGIC.TIFF_INTEL
  );
}

function entryOffset(ifdOffset: number, index: number): number {
  return ifdOffset + 2 + 12 * index;
}

function readEntry(view: ExifView, offset: number): IfdEntry {
  return {
    tag: view.readInt16(offset),
    format: view.readInt16(offset + 2),
    count: view.readInt32(offset + 4),
    valueOffset: offset + 8,
  };
}

function parseExifSegment(view: ExifView): number {
  const byteOrder = view.readInt16(TIFF_HEADER_OFFSET);
  if (byteOrder === MAGIC.TIFF_MOTOROLA) {
    view.order(false);
  } else if (byteOrder === MAGIC.TIFF_INTEL) {
    view.order(true);
  } else {
    logger.debug({ byteOrder }, 'unknown byte order, assuming big-endian');
    view.order(false);
  }

  const firstIfdOffset = view.readInt32(TIFF_HEADER_OFFSET + 4) + TIFF_HEADER_OFFSET;
  const tagCount = view.readInt16(firstIfdOffset);

  for (let i = 0; i < tagCount; i++) {
    const offset = entryOffset(firstIfdOffset, i);
    const tag = view.readInt16(offset);
    if (tag !== ORIENTATION_TAG) {
      continue;
    }

    const entry = readEntry(view, offset);

    // 12 is the highest format code
    if (entry.format < 1 || entry.format > 12) {
      logger.debug({ format: entry.format }, 'invalid format code');
      continue;
    }
    if (entry.count < 0) {
      logger.debug({ count: entry.count }, 'negative component count');
      continue;
    }

    // Summed, not multiplied. Existing callers depend on exactly this test.
    const byteCount = entry.count + (BYTES_PER_FORMAT[entry.format] ?? 0);
    if (byteCount > 4) {
      logger.debug({ format: entry.format, byteCount }, 'value stored out of line, skipping');
      continue;
    }

    if (entry.valueOffset < 0 || entry.valueOffset > view.length) {
      logger.debug({ valueOffset: entry.valueOffset }, 'illegal value offset');
      continue;
    }
    if (entry.valueOffset + byteCount > view.length) {
      logger.debug({ valueOffset: entry.valueOffset, byteCount }, 'value runs past end of segment');
      continue;
    }

    // A single SHORT component is the only layout seen in practice
    return view.readInt16(entry.valueOffset);
  }

  return -1;
}

/**
 * Decode the orientation tag from an Exif payload (the APP1 body, starting
 * with "Exif\0\0"). Returns -1 when the payload has no usable orientation.
 */
export function readOrientation(content: Uint8Array | null): number {
  if (
    content === null ||
    content.length <= TIFF_HEADER_OFFSET ||
    !buffer.startsWith(content, FILE_SIGNATURES.EXIF_PREAMBLE)
  ) {
    return -1;
  }

  try {
    return parseExifSegment(new ExifView(content));
  } catch (err) {
    if (err instanceof BufferOverflowError) {
      logger.debug({ requested: err.requested, available: err.available }, 'Exif payload truncated');
      return -1;
    }
    throw err;
  }
}

/**
 * Orientation for a stream with the given magic number and Exif payload
 */
export function getOrientation(magicNumber: number, content: Uint8Array | null): number {
  return handles(magicNumber) ? readOrientation(content) : -1;
}

/**
 * How to display an image carrying this orientation value, or null if the
 * value is outside 1–8. The image is mirrored horizontally before rotating.
 */
export function describeOrientation(orientation: number): OrientationTransform | null {
  return TRANSFORMS[orientation] ?? null;
}
