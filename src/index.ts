/**
 * exif-carry - JPEG Exif segment extraction and splicing
 *
 * Sniff GIF/JPEG/PNG headers, pull the Exif APP1 segment out of a JPEG,
 * carry it over to a recompressed copy, and read its orientation tag.
 *
 * @packageDocumentation
 */

// Main API
export { cloneExif, cloneExifAsync, normalizeInput } from './operations/clone.js';
export { readHeader } from './operations/read.js';
export { ImageHeaderParser } from './header-parser.js';

// Format detection
export { sniffImageType, hasAlpha, getMimeType } from './detect.js';
export type { SniffResult } from './detect.js';

// Orientation
export {
  getOrientation,
  readOrientation,
  describeOrientation,
  handles,
  ORIENTATION_TAG,
} from './exif/orientation.js';

// Types
export type {
  ImageType,
  ImageInput,
  ByteSource,
  ExifSegment,
  IfdEntry,
  HeaderInfo,
  OrientationTransform,
  CloneFileOptions,
  CloneFileResult,
} from './types.js';

// Error classes
export {
  ExifCarryError,
  InvalidFormatError,
  BufferOverflowError,
  UnsupportedFormatError,
  MissingExifError,
} from './errors.js';

// Format-specific exports for advanced usage
export { jpeg } from './formats/jpeg.js';

// Binary utilities for advanced usage
export { StreamReader } from './binary/stream-reader.js';
export { ByteArraySource } from './binary/byte-source.js';
export { ExifView } from './binary/exif-view.js';
export * as buffer from './binary/buffer.js';
export * as dataview from './binary/dataview.js';

// Magic numbers and signatures
export { MAGIC, FILE_SIGNATURES } from './signatures.js';

// Default export for convenience
import { cloneExif } from './operations/clone.js';
export default cloneExif;
