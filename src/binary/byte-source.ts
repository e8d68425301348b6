import { fstatSync, readSync } from 'node:fs';
import type { ByteSource } from '../types.js';

/**
 * Forward-only cursor over an in-memory byte array
 */
export class ByteArraySource implements ByteSource {
  private readonly data: Uint8Array;
  private position = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  read(target: Uint8Array, offset: number, length: number): number {
    const count = Math.min(length, this.data.length - this.position);
    if (count <= 0) {
      return 0;
    }
    target.set(this.data.subarray(this.position, this.position + count), offset);
    this.position += count;
    return count;
  }

  skip(count: number): number {
    const skipped = Math.max(0, Math.min(count, this.data.length - this.position));
    this.position += skipped;
    return skipped;
  }
}

/**
 * Positioned reads from an open regular file.
 *
 * The descriptor belongs to the caller; this source never closes it.
 */
export class FileSource implements ByteSource {
  private readonly fd: number;
  private readonly size: number;
  private position: number;

  constructor(fd: number, position = 0) {
    this.fd = fd;
    this.size = fstatSync(fd).size;
    this.position = position;
  }

  read(target: Uint8Array, offset: number, length: number): number {
    const count = readSync(this.fd, target, offset, length, this.position);
    this.position += count;
    return count;
  }

  skip(count: number): number {
    const skipped = Math.max(0, Math.min(count, this.size - this.position));
    this.position += skipped;
    return skipped;
  }
}
