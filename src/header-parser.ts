import { logger } from './logger.js';
import { ByteArraySource } from './binary/byte-source.js';
import { StreamReader } from './binary/stream-reader.js';
import { sniffImageType, hasAlpha, getMimeType, type SniffResult } from './detect.js';
import { getOrientation } from './exif/orientation.js';
import type { ByteSource, ExifSegment, ImageType } from './types.js';

/**
 * Parses an image header in a single forward pass during construction.
 *
 * Classifies the container (GIF, JPEG, PNG with or without alpha) and, for
 * JPEG, extracts the first APP1 segment together with its stream offset.
 * Malformed input never throws; it yields type 'unknown' or no Exif block.
 *
 * A ByteSource passed in stays owned by the caller and is not closed.
 *
 * ```ts
 * const parser = new ImageHeaderParser(bytes);
 * if (parser.type === 'jpeg') {
 *   console.log(parser.exifStartOffset, parser.getOrientation());
 * }
 * ```
 */
export class ImageHeaderParser {
  readonly type: ImageType;
  /** First two bytes as a big-endian value, -1 for an empty stream */
  readonly magicNumber: number;
  private readonly exif: ExifSegment | null;

  constructor(input: Uint8Array | ByteSource) {
    const source = input instanceof Uint8Array ? new ByteArraySource(input) : input;
    const result = parse(new StreamReader(source));
    this.type = result.type;
    this.magicNumber = result.magicNumber;
    this.exif = result.exif;
  }

  get hasAlpha(): boolean {
    return hasAlpha(this.type);
  }

  get mimeType(): string {
    return getMimeType(this.type);
  }

  /**
   * Copy of the APP1 block, `[0xFF, 0xE1, lenHi, lenLo, payload...]`
   */
  get exifBlock(): Uint8Array | null {
    return this.exif ? this.exif.block.slice() : null;
  }

  /**
   * Stream offset of the APP1 block's 0xFF byte
   */
  get exifStartOffset(): number | null {
    return this.exif ? this.exif.offset : null;
  }

  /**
   * APP1 payload without the marker and length bytes. The final byte of the
   * block is left out as well; getOrientation reads this view.
   */
  get exifContent(): Uint8Array | null {
    if (!this.exif || this.exif.block.length <= 4) {
      return null;
    }
    return this.exif.block.slice(4, this.exif.block.length - 1);
  }

  /**
   * Exif orientation, or -1 when not present or not decodable
   */
  getOrientation(): number {
    return getOrientation(this.magicNumber, this.exifContent);
  }
}

function parse(reader: StreamReader): SniffResult {
  try {
    return sniffImageType(reader);
  } catch (err) {
    logger.debug({ err }, 'header sniffing failed');
    return { type: 'unknown', magicNumber: -1, exif: null };
  }
}
