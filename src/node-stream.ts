/**
 * Node.js Transform stream wrapper for exif-carry.
 *
 * Buffers the entire piped JPEG before splicing, because the segment to
 * replace can sit anywhere ahead of the scan data.
 *
 * Import from `exif-carry/stream`:
 * ```ts
 * import { createExifCloneStream } from 'exif-carry/stream';
 * import { createReadStream, createWriteStream, readFileSync } from 'node:fs';
 *
 * const original = readFileSync('photo.jpg');
 * createReadStream('photo-small.jpg')
 *   .pipe(createExifCloneStream(original))
 *   .pipe(createWriteStream('photo-small-exif.jpg'));
 * ```
 */

import { Transform, type TransformOptions } from 'node:stream';
import { spliceJpegExif } from './node.js';

/**
 * Transform stream that buffers a destination JPEG, splices in the source
 * Exif, and emits the result. Without a source Exif segment the input is
 * emitted unchanged; empty input produces no output. A destination that is
 * not a JPEG fails the stream with UnsupportedFormatError.
 *
 * Instantiated via `createExifCloneStream(source)` rather than directly.
 */
export class ExifCloneTransform extends Transform {
  private readonly _source: Uint8Array;
  private _chunks: Buffer[] = [];

  constructor(source: Uint8Array, streamOptions?: TransformOptions) {
    super(streamOptions);
    this._source = source;
  }

  override _transform(
    chunk: Buffer | Uint8Array | string,
    _encoding: BufferEncoding,
    callback: (err?: Error | null) => void
  ): void {
    this._chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk));
    callback();
  }

  override _flush(callback: (err?: Error | null) => void): void {
    try {
      const combined = Buffer.concat(this._chunks);
      const dest = new Uint8Array(combined.buffer, combined.byteOffset, combined.byteLength);
      if (dest.length > 0) {
        const { output } = spliceJpegExif(this._source, dest);
        this.push(Buffer.from(output.buffer, output.byteOffset, output.byteLength));
      }
      callback();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
    } finally {
      this._chunks = [];
    }
  }
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Create a Node.js Transform stream that copies the Exif segment of `source`
 * into the JPEG piped through it.
 *
 * @param source  Bytes of the JPEG whose Exif segment should be carried over.
 */
export function createExifCloneStream(
  source: Uint8Array,
  streamOptions?: TransformOptions,
): ExifCloneTransform {
  return new ExifCloneTransform(source, streamOptions);
}
