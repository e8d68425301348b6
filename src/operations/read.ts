/**
 * readHeader(): classify an image and report its Exif block and orientation
 * without modifying it.
 */

import { ImageHeaderParser } from '../header-parser.js';
import { normalizeInput } from './clone.js';
import type { HeaderInfo, ImageInput } from '../types.js';

/**
 * Summarise a parsed header
 */
export function toHeaderInfo(parser: ImageHeaderParser): HeaderInfo {
  return {
    type: parser.type,
    hasAlpha: parser.hasAlpha,
    mimeType: parser.mimeType,
    exifBlock: parser.exifBlock,
    exifStartOffset: parser.exifStartOffset,
    orientation: parser.getOrientation(),
  };
}

/**
 * Inspect the header of an image.
 *
 * @param input  Uint8Array, ArrayBuffer, or data URL (base64)
 */
export function readHeader(input: ImageInput): HeaderInfo {
  return toHeaderInfo(new ImageHeaderParser(normalizeInput(input)));
}
