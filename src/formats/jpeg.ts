import { logger } from '../logger.js';
import * as dataview from '../binary/dataview.js';
import type { StreamReader } from '../binary/stream-reader.js';
import type { ExifSegment } from '../types.js';

/**
 * JPEG marker bytes (the byte following 0xFF)
 */
export const MARKERS = {
  SEGMENT_START: 0xff,
  EOI: 0xd9, // End of Image
  SOS: 0xda, // Start of Scan (image data follows)
  APP1: 0xe1, // EXIF, XMP
} as const;

/**
 * Walk the marker segments that follow SOI and return the first APP1 segment.
 *
 * Expects the two SOI bytes to have been consumed already. The APP1 payload is
 * not checked for the Exif preamble; whichever APP1 comes first is returned.
 * Returns null when SOS or EOI is reached first, when a byte other than 0xFF
 * appears where a marker should be, or when the stream ends early.
 */
export function findExifSegment(reader: StreamReader): ExifSegment | null {
  let offset = 2;

  for (;;) {
    const segmentId = reader.readUint8();
    if (segmentId !== MARKERS.SEGMENT_START) {
      logger.debug({ segmentId, offset }, 'unknown segment id');
      return null;
    }

    const segmentType = reader.readUint8();
    if (segmentType === MARKERS.SOS) {
      return null;
    }
    if (segmentType === MARKERS.EOI) {
      logger.debug({ offset }, 'reached EOI before any APP1 segment');
      return null;
    }

    // The length field counts its own two bytes
    const length = reader.readUint16();
    if (length < 2) {
      logger.debug({ segmentType, length, offset }, 'invalid segment length');
      return null;
    }
    const payloadLength = length - 2;

    if (segmentType !== MARKERS.APP1) {
      const skipped = reader.skip(payloadLength);
      if (skipped !== payloadLength) {
        logger.debug(
          { segmentType, wanted: payloadLength, skipped },
          'unable to skip enough data',
        );
        return null;
      }
      offset += 4 + payloadLength;
      continue;
    }

    const payload = new Uint8Array(payloadLength);
    const read = reader.read(payload);
    if (read !== payloadLength) {
      logger.debug({ length: payloadLength, read }, 'APP1 segment truncated');
    }

    const block = new Uint8Array(4 + read);
    block[0] = MARKERS.SEGMENT_START;
    block[1] = MARKERS.APP1;
    dataview.writeUint16BE(block, 2, read + 2);
    block.set(payload.subarray(0, read), 4);

    return { block, offset };
  }
}

export const jpeg = {
  MARKERS,
  findExifSegment,
};

export default jpeg;
