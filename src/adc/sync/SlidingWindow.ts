/**
 * Sliding history window for resolving ADC back-references
 *
 * Fixed-size ring buffer. Distance 0 is the most recently written byte.
 * The default capacity (65536) is one more than the largest offset the
 * format can encode, so a valid reference is never evicted.
 */

import { allocBuffer } from 'extract-base-iterator';
import { kWindowSize } from '../types.ts';

export class SlidingWindow {
  private buffer: Buffer;
  private windowSize: number;
  private pos: number;
  private filled: number;

  constructor(windowSize: number = kWindowSize) {
    if (!(windowSize > 0)) {
      throw new Error(`Invalid window size: ${windowSize}`);
    }
    this.buffer = allocBuffer(windowSize);
    this.windowSize = windowSize;
    this.pos = 0;
    this.filled = 0;
  }

  get capacity(): number {
    return this.windowSize;
  }

  /** Bytes of history currently held */
  get length(): number {
    return this.filled;
  }

  putByte(b: number): void {
    this.buffer[this.pos++] = b;
    if (this.pos >= this.windowSize) this.pos = 0;
    if (this.filled < this.windowSize) this.filled++;
  }

  /**
   * Append bytes as the newest history. Longer inputs than the window keep only their tail.
   */
  extend(data: Buffer | Uint8Array, start = 0, end: number = data.length): void {
    const count = end - start;
    if (count <= 0) return;

    if (count >= this.windowSize) {
      this.buffer.set(data.subarray(end - this.windowSize, end), 0);
      this.pos = 0;
      this.filled = this.windowSize;
      return;
    }

    const firstPart = Math.min(count, this.windowSize - this.pos);
    this.buffer.set(data.subarray(start, start + firstPart), this.pos);
    if (firstPart < count) {
      // Wrap around
      this.buffer.set(data.subarray(start + firstPart, end), 0);
    }
    this.pos = (this.pos + count) % this.windowSize;
    this.filled = Math.min(this.filled + count, this.windowSize);
  }

  /**
   * Byte at a back-distance, or null when that much history is not held
   */
  get(distance: number): number | null {
    if (distance < 0 || distance >= this.filled) return null;
    let pos = this.pos - distance - 1;
    if (pos < 0) {
      pos += this.windowSize;
    }
    return this.buffer[pos];
  }

  /**
   * Copy `length` bytes from `distance` back into `output`, feeding each byte
   * back into the window before the next lookup so overlapping runs repeat.
   *
   * @returns Bytes copied; less than `length` when history ran out
   */
  copyBlock(distance: number, output: Buffer, outputOffset: number, length: number): number {
    for (let i = 0; i < length; i++) {
      const b = this.get(distance);
      if (b === null) return i;
      output[outputOffset + i] = b;
      this.putByte(b);
    }
    return length;
  }
}
