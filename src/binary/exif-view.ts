import * as dataview from './dataview.js';

/**
 * Random-access signed reads over an extracted Exif payload, in a byte order
 * chosen after the TIFF header has been inspected. Big-endian until told
 * otherwise. Out-of-range reads throw BufferOverflowError.
 */
export class ExifView {
  private readonly data: Uint8Array;
  private littleEndian = false;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get length(): number {
    return this.data.length;
  }

  order(littleEndian: boolean): void {
    this.littleEndian = littleEndian;
  }

  readInt16(offset: number): number {
    return dataview.readInt16(this.data, offset, this.littleEndian);
  }

  readInt32(offset: number): number {
    return dataview.readInt32(this.data, offset, this.littleEndian);
  }
}
