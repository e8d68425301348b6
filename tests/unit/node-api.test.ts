import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { cloneExifFile, readHeaderFile, readStreamToBytes, spliceJpegExif } from '../../src/node.js';
import { ImageHeaderParser } from '../../src/header-parser.js';
import { MissingExifError, UnsupportedFormatError } from '../../src/errors.js';
import { JFIF_APP0, exifSegment, gif, jpeg, orientationTiff, png } from '../helpers/create-test-jpeg.js';

// 2 + 18 + 36 + 15 = 71 bytes, Exif block of 36 bytes at offset 20
const ORIGINAL = jpeg(JFIF_APP0, exifSegment(orientationTiff(6)));
// 2 + 18 + 15 = 35 bytes
const RECOMPRESSED = jpeg(JFIF_APP0);

let tmpDir: string;

function writeFixture(name: string, data: Uint8Array): string {
  const path = join(tmpDir, name);
  writeFileSync(path, data);
  return path;
}

describe('spliceJpegExif', () => {
  it('should splice and report block sizes', () => {
    const result = spliceJpegExif(ORIGINAL, RECOMPRESSED);

    expect(result.output.length).toBe(71);
    expect(result.sourceExifSize).toBe(36);
    expect(result.replacedExifSize).toBe(0);
  });

  it('should report the replaced block size', () => {
    const result = spliceJpegExif(ORIGINAL, ORIGINAL);

    expect(result.output.length).toBe(71);
    expect(result.replacedExifSize).toBe(36);
  });

  it('should throw UnsupportedFormatError for PNG and GIF destinations', () => {
    expect(() => spliceJpegExif(ORIGINAL, png(2))).toThrow('Unsupported format: png');
    expect(() => spliceJpegExif(ORIGINAL, gif())).toThrow(UnsupportedFormatError);
  });

  it('should throw for an empty destination', () => {
    expect(() => spliceJpegExif(ORIGINAL, new Uint8Array())).toThrow('Unsupported format: unknown');
  });

  it('should name the source in strict mode', () => {
    expect(() => spliceJpegExif(RECOMPRESSED, RECOMPRESSED, { strict: true, sourceName: 'a.jpg' }))
      .toThrow('No Exif segment found in a.jpg');
    expect(() => spliceJpegExif(RECOMPRESSED, RECOMPRESSED, { strict: true }))
      .toThrow(MissingExifError);
  });

  it('should return the destination unchanged without strict when the source has no Exif', () => {
    const result = spliceJpegExif(RECOMPRESSED, RECOMPRESSED);

    expect(result.output).toBe(RECOMPRESSED);
    expect(result.sourceExifSize).toBe(0);
  });
});

describe('cloneExifFile', () => {
  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'exif-carry-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write output next to the destination with -exif suffix', async () => {
    const sourcePath = writeFixture('original.jpg', ORIGINAL);
    const destPath = writeFixture('small.jpg', RECOMPRESSED);

    const result = await cloneExifFile(sourcePath, destPath);

    expect(result.sourcePath).toBe(sourcePath);
    expect(result.destPath).toBe(destPath);
    expect(result.outputPath).toBe(join(tmpDir, 'small-exif.jpg'));
    expect(result.sourceExifSize).toBe(36);
    expect(result.replacedExifSize).toBe(0);
    expect(result.originalSize).toBe(35);
    expect(result.outputSize).toBe(71);

    const output = new Uint8Array(readFileSync(result.outputPath));
    expect(output.length).toBe(71);
    expect(new ImageHeaderParser(output).getOrientation()).toBe(6);
    // Destination untouched
    expect(readFileSync(destPath).length).toBe(35);
  });

  it('should overwrite the destination with inPlace option', async () => {
    const sourcePath = writeFixture('original.jpg', ORIGINAL);
    const destPath = writeFixture('small.jpg', RECOMPRESSED);

    const result = await cloneExifFile(sourcePath, destPath, { inPlace: true });

    expect(result.outputPath).toBe(destPath);
    expect(readFileSync(destPath).length).toBe(71);
    expect(existsSync(join(tmpDir, 'small-exif.jpg'))).toBe(false);
  });

  it('should use custom suffix', async () => {
    const sourcePath = writeFixture('original.jpg', ORIGINAL);
    const destPath = writeFixture('small.jpg', RECOMPRESSED);

    const result = await cloneExifFile(sourcePath, destPath, { suffix: '_tagged' });

    expect(result.outputPath).toBe(join(tmpDir, 'small_tagged.jpg'));
    expect(existsSync(result.outputPath)).toBe(true);
  });

  it('should write to outputPath, creating directories', async () => {
    const sourcePath = writeFixture('original.jpg', ORIGINAL);
    const destPath = writeFixture('small.jpg', RECOMPRESSED);
    const outputPath = join(tmpDir, 'out', 'nested', 'result.jpg');

    const result = await cloneExifFile(sourcePath, destPath, { outputPath });

    expect(result.outputPath).toBe(outputPath);
    expect(readFileSync(outputPath).length).toBe(71);
  });

  it('should copy the destination unchanged when the source has no Exif', async () => {
    const sourcePath = writeFixture('original.jpg', RECOMPRESSED);
    const destPath = writeFixture('small.jpg', RECOMPRESSED);

    const result = await cloneExifFile(sourcePath, destPath);

    expect(result.sourceExifSize).toBe(0);
    expect(Array.from(readFileSync(result.outputPath))).toEqual(Array.from(RECOMPRESSED));
  });

  it('should throw MissingExifError in strict mode when the source has no Exif', async () => {
    const sourcePath = writeFixture('original.jpg', RECOMPRESSED);
    const destPath = writeFixture('small.jpg', RECOMPRESSED);

    await expect(cloneExifFile(sourcePath, destPath, { strict: true }))
      .rejects.toThrow(MissingExifError);
    expect(existsSync(join(tmpDir, 'small-exif.jpg'))).toBe(false);
  });

  it('should throw UnsupportedFormatError for a non-JPEG destination', async () => {
    const sourcePath = writeFixture('original.jpg', ORIGINAL);
    const destPath = writeFixture('small.png', png(2));

    await expect(cloneExifFile(sourcePath, destPath))
      .rejects.toThrow('Unsupported format: png');
    await expect(cloneExifFile(sourcePath, destPath))
      .rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it('should reject when a file does not exist', async () => {
    const destPath = writeFixture('small.jpg', RECOMPRESSED);

    await expect(cloneExifFile(join(tmpDir, 'missing.jpg'), destPath)).rejects.toThrow();
  });
});

describe('readHeaderFile', () => {
  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'exif-carry-'));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should report type, Exif block and orientation of a JPEG', () => {
    const info = readHeaderFile(writeFixture('original.jpg', ORIGINAL));

    expect(info.type).toBe('jpeg');
    expect(info.mimeType).toBe('image/jpeg');
    expect(info.hasAlpha).toBe(false);
    expect(info.exifStartOffset).toBe(20);
    expect(info.exifBlock?.length).toBe(36);
    expect(Array.from(info.exifBlock ?? []).slice(0, 4)).toEqual([0xff, 0xe1, 0x00, 0x22]);
    expect(info.orientation).toBe(6);
  });

  it('should classify a PNG with alpha', () => {
    const info = readHeaderFile(writeFixture('icon.png', png(6)));

    expect(info.type).toBe('png-alpha');
    expect(info.hasAlpha).toBe(true);
    expect(info.exifBlock).toBeNull();
    expect(info.exifStartOffset).toBeNull();
    expect(info.orientation).toBe(-1);
  });

  it('should classify an empty file as unknown', () => {
    const info = readHeaderFile(writeFixture('empty.bin', new Uint8Array(0)));

    expect(info.type).toBe('unknown');
    expect(info.mimeType).toBe('application/octet-stream');
  });
});

describe('readStreamToBytes', () => {
  it('should join binary and string chunks', async () => {
    const stream = Readable.from([new Uint8Array([0xff, 0xd8]), Buffer.from([0x01]), 'ab']);

    const bytes = await readStreamToBytes(stream);

    expect(Array.from(bytes)).toEqual([0xff, 0xd8, 0x01, 0x61, 0x62]);
  });

  it('should return an empty array for an empty stream', async () => {
    const bytes = await readStreamToBytes(Readable.from([]));

    expect(bytes.length).toBe(0);
  });
});
