import { closeSync, openSync } from 'node:fs';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { resolve, dirname, basename, extname, join } from 'node:path';
import { ImageHeaderParser } from './header-parser.js';
import { FileSource } from './binary/byte-source.js';
import { cloneExif } from './operations/clone.js';
import { toHeaderInfo } from './operations/read.js';
import { MissingExifError, UnsupportedFormatError } from './errors.js';
import type { CloneFileOptions, CloneFileResult, HeaderInfo } from './types.js';

export interface SpliceOptions {
  /** Fail with MissingExifError when the source carries no Exif block */
  strict?: boolean | undefined;
  /** Name of the source used in error messages */
  sourceName?: string | undefined;
}

export interface SpliceResult {
  output: Uint8Array;
  sourceExifSize: number;
  replacedExifSize: number;
}

/**
 * cloneExif with the preconditions the file, stdin and stream surfaces share:
 * the destination must be a JPEG, and in strict mode the source must carry
 * an Exif block.
 */
export function spliceJpegExif(
  src: Uint8Array,
  dest: Uint8Array,
  options: SpliceOptions = {},
): SpliceResult {
  const destParser = new ImageHeaderParser(dest);
  if (destParser.type !== 'jpeg') {
    throw new UnsupportedFormatError(destParser.type);
  }

  const srcExif = new ImageHeaderParser(src).exifBlock;
  const sourceExifSize = srcExif && srcExif.length > 4 ? srcExif.length : 0;
  if (options.strict && sourceExifSize === 0) {
    throw new MissingExifError(options.sourceName ?? 'source');
  }

  return {
    // dest is a JPEG, so it is non-empty; src may be empty
    output: cloneExif(src, dest) ?? dest,
    sourceExifSize,
    replacedExifSize: destParser.exifBlock?.length ?? 0,
  };
}

/**
 * Copy the Exif segment of `sourcePath` into the JPEG at `destPath` and write
 * the result next to the destination (`photo.jpg` → `photo-exif.jpg`), over it
 * with `inPlace`, or to `outputPath`.
 */
export async function cloneExifFile(
  sourcePath: string,
  destPath: string,
  options: CloneFileOptions = {},
): Promise<CloneFileResult> {
  const absSource = resolve(sourcePath);
  const absDest = resolve(destPath);
  const [srcData, destData] = await Promise.all([
    readFile(absSource).then(b => new Uint8Array(b)),
    readFile(absDest).then(b => new Uint8Array(b)),
  ]);

  const { output, sourceExifSize, replacedExifSize } = spliceJpegExif(srcData, destData, {
    strict: options.strict,
    sourceName: absSource,
  });

  // Determine output path
  let absOutput: string;
  if (options.outputPath) {
    absOutput = resolve(options.outputPath);
  } else if (options.inPlace) {
    absOutput = absDest;
  } else {
    const ext = extname(absDest);
    const name = basename(absDest, ext);
    const suffix = options.suffix ?? '-exif';
    absOutput = join(dirname(absDest), `${name}${suffix}${ext}`);
  }

  await mkdir(dirname(absOutput), { recursive: true });
  await writeFile(absOutput, output);

  return {
    sourcePath: absSource,
    destPath: absDest,
    outputPath: absOutput,
    sourceExifSize,
    replacedExifSize,
    originalSize: destData.length,
    outputSize: output.length,
  };
}

/**
 * Parse a file's header without reading the whole file. Only the bytes up to
 * the APP1 segment (JPEG) or the colour-type byte (PNG) are read.
 */
export function readHeaderFile(path: string): HeaderInfo {
  const fd = openSync(resolve(path), 'r');
  try {
    return toHeaderInfo(new ImageHeaderParser(new FileSource(fd)));
  } finally {
    closeSync(fd);
  }
}

/**
 * Collect a stream of chunks (a Readable, process.stdin, …) into one array
 */
export async function readStreamToBytes(
  stream: AsyncIterable<Uint8Array | string>,
): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : Buffer.from(chunk));
  }
  const combined = Buffer.concat(chunks);
  return new Uint8Array(combined.buffer, combined.byteOffset, combined.byteLength);
}
