/**
 * Container types recognised from the magic header
 */
export type ImageType = 'gif' | 'jpeg' | 'png-alpha' | 'png' | 'unknown';

/**
 * Synchronous pull source of bytes.
 *
 * `read` returns the number of bytes copied into `target`, 0 once the source
 * is exhausted. `skip` may skip fewer bytes than asked, including none.
 */
export interface ByteSource {
  read(target: Uint8Array, offset: number, length: number): number;
  skip(count: number): number;
}

/**
 * A JPEG APP1 segment located by the segment walker.
 */
export interface ExifSegment {
  /** `[0xFF, 0xE1, lenHi, lenLo, payload...]` */
  block: Uint8Array;
  /** Offset of the segment's 0xFF from the first byte of the stream */
  offset: number;
}

/**
 * One 12-byte TIFF image file directory entry
 */
export interface IfdEntry {
  tag: number;
  format: number;
  count: number;
  /** Offset of the 4-byte value-or-offset field */
  valueOffset: number;
}

export interface OrientationTransform {
  /** Clockwise rotation in degrees needed to display the image upright */
  rotation: 0 | 90 | 180 | 270;
  /** Whether the image must be mirrored horizontally before rotating */
  mirrored: boolean;
}

/**
 * Result returned by `readHeader`.
 */
export interface HeaderInfo {
  type: ImageType;
  hasAlpha: boolean;
  mimeType: string;
  /** Normalised APP1 block, `null` when the stream has none. */
  exifBlock: Uint8Array | null;
  /** Stream offset of the APP1 marker, `null` when `exifBlock` is `null`. */
  exifStartOffset: number | null;
  /** Exif orientation (1–8), or -1 when absent or undecodable. */
  orientation: number;
}

/**
 * Input accepted by the buffer-level API: raw bytes, an ArrayBuffer or a base64 data URL
 */
export type ImageInput = Uint8Array | ArrayBuffer | string;

/**
 * Options for cloneExifFile
 */
export interface CloneFileOptions {
  /** Overwrite the destination file */
  inPlace?: boolean;
  /** Suffix for output filename (default: '-exif') */
  suffix?: string;
  /** Explicit output path (overrides suffix and inPlace) */
  outputPath?: string;
  /** Fail with MissingExifError instead of copying the destination unchanged */
  strict?: boolean;
}

/**
 * Result returned by `cloneExifFile`.
 */
export interface CloneFileResult {
  sourcePath: string;
  destPath: string;
  outputPath: string;
  /** Size of the APP1 block taken from the source (0 when it had none). */
  sourceExifSize: number;
  /** Size of the APP1 block the destination carried before (0 when none). */
  replacedExifSize: number;
  originalSize: number;
  outputSize: number;
}
