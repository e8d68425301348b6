import { describe, it, expect } from 'vitest';
import {
  describeOrientation,
  getOrientation,
  handles,
  readOrientation,
} from '../../src/exif/orientation.js';
import { ImageHeaderParser } from '../../src/header-parser.js';
import {
  JFIF_APP0,
  ascii,
  exifSegment,
  jpeg,
  orientationTiff,
  png,
  tiff,
  u16,
  u32,
} from '../helpers/create-test-jpeg.js';

/** Payload as getOrientation sees it: preamble + TIFF, last byte dropped */
function content(tiffBytes: number[]): Uint8Array {
  const payload = [...ascii('Exif\0\0'), ...tiffBytes];
  return new Uint8Array(payload.slice(0, payload.length - 1));
}

describe('handles', () => {
  it('should accept JPEG and both TIFF byte-order marks', () => {
    expect(handles(0xffd8)).toBe(true);
    expect(handles(0x4d4d)).toBe(true);
    expect(handles(0x4949)).toBe(true);
  });

  it('should accept any magic with all JPEG bits set', () => {
    expect(handles(0xffd9)).toBe(true);
    expect(handles(0xfffe)).toBe(true);
  });

  it('should reject PNG and GIF magics', () => {
    expect(handles(0x8950)).toBe(false);
    expect(handles(0x4749)).toBe(false);
  });
});

describe('readOrientation', () => {
  it('should read a big-endian orientation', () => {
    expect(readOrientation(content(orientationTiff(6)))).toBe(6);
  });

  it('should read a little-endian orientation', () => {
    expect(readOrientation(content(orientationTiff(8, true)))).toBe(8);
  });

  it('should assume big-endian for an unknown byte-order mark', () => {
    const bytes = orientationTiff(3);
    bytes[0] = 0x58;
    bytes[1] = 0x58;
    expect(readOrientation(content(bytes))).toBe(3);
  });

  it('should return -1 without the Exif preamble', () => {
    const payload = [...ascii('Exif\0\x01'), ...orientationTiff(6)];
    expect(readOrientation(new Uint8Array(payload))).toBe(-1);
  });

  it('should return -1 for a payload of only the preamble', () => {
    expect(readOrientation(new Uint8Array(ascii('Exif\0\0')))).toBe(-1);
    expect(readOrientation(null)).toBe(-1);
  });

  it('should return -1 when IFD0 points past the end', () => {
    const bytes = [0x4d, 0x4d, ...u16(42), ...u32(0x1000), 0x00, 0x00];
    expect(readOrientation(content(bytes))).toBe(-1);
  });

  it('should return -1 when the orientation tag is absent', () => {
    const bytes = tiff([{ tag: 0x010f, format: 2, count: 4, value: 0x4142 }]);
    expect(readOrientation(content(bytes))).toBe(-1);
  });

  it('should skip entries with an invalid format code and keep scanning', () => {
    const bytes = tiff([
      { tag: 0x0112, format: 0, count: 1, value: 2 },
      { tag: 0x0112, format: 13, count: 1, value: 4 },
      { tag: 0x0112, format: 3, count: 1, value: 5 },
    ]);
    expect(readOrientation(content(bytes))).toBe(5);
  });

  it('should skip entries with a negative component count', () => {
    const bytes = tiff([
      { tag: 0x0112, format: 3, count: 0xffffffff, value: 2 },
      { tag: 0x0112, format: 3, count: 1, value: 7 },
    ]);
    expect(readOrientation(content(bytes))).toBe(7);
  });

  it('should size values as component count plus format size', () => {
    // 1 + 4 > 4, although a single LONG would fit inline
    const long = tiff([{ tag: 0x0112, format: 4, count: 1, value: 6 }]);
    expect(readOrientation(content(long))).toBe(-1);

    // 2 + 2 = 4 is accepted
    const shorts = tiff([{ tag: 0x0112, format: 3, count: 2, value: 6 }]);
    expect(readOrientation(content(shorts))).toBe(6);
  });

  it('should return -1 when the value runs past the end of the payload', () => {
    // TIFF cut off two bytes into the value field
    const bytes = orientationTiff(6).slice(0, 20);
    const payload = new Uint8Array([...ascii('Exif\0\0'), ...bytes]);
    expect(readOrientation(payload.slice(0, payload.length - 1))).toBe(-1);
  });

  it('should return the first qualifying entry', () => {
    const bytes = tiff([
      { tag: 0x0112, format: 3, count: 1, value: 2 },
      { tag: 0x0112, format: 3, count: 1, value: 8 },
    ]);
    expect(readOrientation(content(bytes))).toBe(2);
  });
});

describe('getOrientation', () => {
  it('should return -1 for magics it does not handle', () => {
    expect(getOrientation(0x8950, content(orientationTiff(6)))).toBe(-1);
  });

  it('should decode through the header parser', () => {
    expect(new ImageHeaderParser(jpeg(JFIF_APP0, exifSegment(orientationTiff(6)))).getOrientation()).toBe(6);
    expect(new ImageHeaderParser(jpeg(exifSegment(orientationTiff(3, true)))).getOrientation()).toBe(3);
  });

  it('should return -1 for images without Exif', () => {
    expect(new ImageHeaderParser(jpeg(JFIF_APP0)).getOrientation()).toBe(-1);
    expect(new ImageHeaderParser(png(6)).getOrientation()).toBe(-1);
  });
});

describe('describeOrientation', () => {
  it('should describe all eight orientations', () => {
    expect(describeOrientation(1)).toEqual({ rotation: 0, mirrored: false });
    expect(describeOrientation(2)).toEqual({ rotation: 0, mirrored: true });
    expect(describeOrientation(3)).toEqual({ rotation: 180, mirrored: false });
    expect(describeOrientation(4)).toEqual({ rotation: 180, mirrored: true });
    expect(describeOrientation(5)).toEqual({ rotation: 270, mirrored: true });
    expect(describeOrientation(6)).toEqual({ rotation: 90, mirrored: false });
    expect(describeOrientation(7)).toEqual({ rotation: 90, mirrored: true });
    expect(describeOrientation(8)).toEqual({ rotation: 270, mirrored: false });
  });

  it('should return null outside 1-8', () => {
    expect(describeOrientation(-1)).toBeNull();
    expect(describeOrientation(0)).toBeNull();
    expect(describeOrientation(9)).toBeNull();
  });
});
