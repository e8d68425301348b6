import { logger } from '../logger.js';
import type { ByteSource } from '../types.js';

/**
 * Sequential big-endian reader over a ByteSource.
 *
 * Reads never throw: a source that fails or runs dry is treated as exhausted,
 * and the single-value reads return -1 from then on.
 */
export class StreamReader {
  private readonly source: ByteSource;
  private readonly single = new Uint8Array(1);
  private exhausted = false;

  constructor(source: ByteSource) {
    this.source = source;
  }

  /**
   * Two bytes, big-endian. -1 at end of data.
   */
  readUint16(): number {
    const high = this.readUint8();
    const low = this.readUint8();
    if (high < 0 || low < 0) {
      return -1;
    }
    return (high << 8) | low;
  }

  /**
   * One byte. -1 at end of data.
   */
  readUint8(): number {
    return this.pull(this.single, 0, 1) === 1 ? this.single[0]! : -1;
  }

  /**
   * Skip up to `total` bytes and return how many were skipped. The count is
   * short only when the source is exhausted.
   */
  skip(total: number): number {
    if (total <= 0) {
      return 0;
    }

    let toSkip = total;
    while (toSkip > 0) {
      const skipped = this.skipOnce(toSkip);
      if (skipped > 0) {
        toSkip -= skipped;
        continue;
      }
      // A source may skip nothing without being finished; one real read
      // tells the two cases apart.
      if (this.readUint8() === -1) {
        break;
      }
      toSkip--;
    }
    return total - toSkip;
  }

  /**
   * Fill `buffer` from the source and return the number of bytes read.
   */
  read(buffer: Uint8Array): number {
    let total = 0;
    while (total < buffer.length) {
      const count = this.pull(buffer, total, buffer.length - total);
      if (count === 0) {
        break;
      }
      total += count;
    }
    return total;
  }

  private pull(target: Uint8Array, offset: number, length: number): number {
    if (this.exhausted) {
      return 0;
    }
    try {
      const count = this.source.read(target, offset, length);
      if (count <= 0) {
        this.exhausted = true;
        return 0;
      }
      return count;
    } catch (err) {
      logger.debug({ err }, 'byte source read failed, treating as end of data');
      this.exhausted = true;
      return 0;
    }
  }

  private skipOnce(count: number): number {
    if (this.exhausted) {
      return 0;
    }
    try {
      return Math.max(0, this.source.skip(count));
    } catch (err) {
      logger.debug({ err }, 'byte source skip failed, treating as end of data');
      this.exhausted = true;
      return 0;
    }
  }
}
