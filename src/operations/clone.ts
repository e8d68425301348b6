/**
 * cloneExif(): carry the Exif APP1 segment of one JPEG over to another,
 * typically a recompressed copy that lost its metadata on the way.
 */

import { logger } from '../logger.js';
import { ImageHeaderParser } from '../header-parser.js';
import * as buffer from '../binary/buffer.js';
import { InvalidFormatError } from '../errors.js';
import { FILE_SIGNATURES } from '../signatures.js';
import type { ImageInput } from '../types.js';

/** Length of the SOI marker the new segment is placed after */
const SOI_LENGTH = FILE_SIGNATURES.JPEG_SOI.length;

/**
 * Normalize input to Uint8Array. Exported for use by read.ts.
 */
export function normalizeInput(input: ImageInput): Uint8Array {
  if (typeof input === 'string') {
    if (input.startsWith('data:')) {
      const commaIndex = input.indexOf(',');
      if (commaIndex === -1) {
        throw new InvalidFormatError('Invalid data URL format');
      }
      const base64Data = input.slice(commaIndex + 1);
      const binaryString = atob(base64Data);
      const data = new Uint8Array(binaryString.length);
      for (let i = 0; i < binaryString.length; i++) {
        data[i] = binaryString.charCodeAt(i);
      }
      return data;
    }
    throw new InvalidFormatError('String input must be a data URL');
  }
  if (input instanceof ArrayBuffer) {
    return new Uint8Array(input);
  }
  return input;
}

/**
 * Copy the Exif segment of `src` into `dest`.
 *
 * - Either input missing or empty: returns null.
 * - `src` without an Exif block (or with an empty payload): returns `dest` as is.
 * - `dest` with an Exif block: that block is replaced in place.
 * - `dest` without one: the source block is inserted right after SOI.
 *
 * Neither input is modified; a spliced result is always a new array.
 */
export function cloneExif(
  src: Uint8Array | null | undefined,
  dest: Uint8Array | null | undefined,
): Uint8Array | null {
  if (!src || src.length === 0 || !dest || dest.length === 0) {
    return null;
  }

  const srcExifBlock = new ImageHeaderParser(src).exifBlock;
  if (!srcExifBlock || srcExifBlock.length <= 4) {
    return dest;
  }

  logger.debug({ srcSize: src.length, destSize: dest.length, srcExif: srcExifBlock.length }, 'cloning Exif');

  const destParser = new ImageHeaderParser(dest);
  const destExifBlock = destParser.exifBlock;
  const destStartOffset = destParser.exifStartOffset;

  let result: Uint8Array;
  if (destExifBlock && destExifBlock.length > 0 && destStartOffset !== null) {
    logger.debug({ destExif: destExifBlock.length, offset: destStartOffset }, 'replacing existing Exif');
    result = buffer.concat(
      dest.subarray(0, destStartOffset),
      srcExifBlock,
      dest.subarray(destStartOffset + destExifBlock.length),
    );
  } else {
    result = buffer.concat(dest.subarray(0, SOI_LENGTH), srcExifBlock, dest.subarray(SOI_LENGTH));
  }

  logger.debug({ outputSize: result.length }, 'Exif cloned');
  return result;
}

/**
 * Asynchronous variant of cloneExif that also accepts Blobs, ArrayBuffers and
 * base64 data URLs.
 */
export async function cloneExifAsync(
  src: ImageInput | Blob,
  dest: ImageInput | Blob,
): Promise<Uint8Array | null> {
  const [srcData, destData] = await Promise.all([toBytes(src), toBytes(dest)]);
  return cloneExif(srcData, destData);
}

async function toBytes(input: ImageInput | Blob): Promise<Uint8Array> {
  if (input instanceof Blob) {
    return new Uint8Array(await input.arrayBuffer());
  }
  return normalizeInput(input);
}
