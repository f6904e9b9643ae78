/**
 * Sequential byte sources for the pull-based decoder
 */

import type { BufferLike } from 'extract-base-iterator';
import { createCodedError, ErrorCode } from '../types.ts';

/**
 * Abstract sequential byte source.
 *
 * `read` copies at most `length` bytes into `target` starting at `offset` and
 * returns the number copied. It returns 0 only at the clean end of the stream
 * and throws when the underlying read fails.
 */
export interface ByteSource {
  read(target: Buffer, offset: number, length: number): number;
}

/**
 * Byte source over an in-memory Buffer or BufferList
 */
export class BufferSource implements ByteSource {
  private input: BufferLike;
  private pos: number;

  constructor(input: BufferLike) {
    this.input = input;
    this.pos = 0;
  }

  /** Bytes not yet read */
  get remaining(): number {
    return this.input.length - this.pos;
  }

  read(target: Buffer, offset: number, length: number): number {
    const count = Math.min(length, this.remaining);
    if (count <= 0) return 0;

    const input = this.input;
    if (Buffer.isBuffer(input)) {
      input.copy(target, offset, this.pos, this.pos + count);
    } else {
      for (let i = 0; i < count; i++) {
        target[offset + i] = input.readByte(this.pos + i);
      }
    }
    this.pos += count;
    return count;
  }
}

/**
 * Read exactly `length` bytes, looping over short reads.
 * Throws TRUNCATED_INPUT if the source ends first.
 */
export function readFully(source: ByteSource, target: Buffer, offset: number, length: number, what: string): void {
  let filled = 0;
  while (filled < length) {
    const count = source.read(target, offset + filled, length - filled);
    if (count === 0) {
      throw createCodedError(`Truncated ADC ${what}: expected ${length} bytes, got ${filled}`, ErrorCode.TRUNCATED_INPUT);
    }
    filled += count;
  }
}
