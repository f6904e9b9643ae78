/**
 * ADC Chunk Parser
 *
 * Shared parsing logic for ADC chunk headers.
 * `readAdcChunk` pulls a header from a ByteSource (synchronous decoder);
 * `parseAdcChunkHeader` / `hasCompleteChunk` peek into a buffer (Transform stream).
 *
 * ADC header byte ranges:
 * 0x00-0x3F    = Two-byte run chunk (1 offset byte follows)
 * 0x40-0x7F    = Three-byte run chunk (2 offset bytes follow, big-endian)
 * 0x80-0xFF    = Plain chunk (literal payload follows)
 */

import { allocBufferUnsafe, type BufferLike } from 'extract-base-iterator';
import { type ByteSource, readFully } from '../sync/ByteSource.ts';
import { type AdcChunk, createChunk, headerSizeOf } from '../types.ts';

/**
 * Result of parsing attempt
 */
export type ParseResult = { success: true; chunk: AdcChunk } | { success: false; needBytes: number };

/** Result type for hasCompleteChunk with totalSize included on success */
export type CompleteChunkResult = { success: true; chunk: AdcChunk; totalSize: number } | { success: false; needBytes: number };

function byteAt(input: BufferLike, offset: number): number {
  return Buffer.isBuffer(input) ? input[offset] : input.readByte(offset);
}

/**
 * Parse an ADC chunk header from a buffer
 *
 * @param input - Input buffer
 * @param offset - Offset to start parsing
 * @returns Parsed chunk info or number of bytes needed
 */
export function parseAdcChunkHeader(input: BufferLike, offset: number): ParseResult {
  if (offset >= input.length) {
    return { success: false, needBytes: 1 };
  }

  const control = byteAt(input, offset);
  const headerSize = headerSizeOf(control);

  if (offset + headerSize > input.length) {
    return { success: false, needBytes: headerSize - (input.length - offset) };
  }

  const next1 = headerSize > 1 ? byteAt(input, offset + 1) : 0;
  const next2 = headerSize > 2 ? byteAt(input, offset + 2) : 0;
  return { success: true, chunk: createChunk(control, next1, next2) };
}

/**
 * Check if we have enough data for the complete chunk.
 * Plain chunks need their literal payload; run chunks only their header.
 */
export function hasCompleteChunk(input: BufferLike, offset: number): CompleteChunkResult {
  const result = parseAdcChunkHeader(input, offset);

  if (result.success === false) {
    return { success: false, needBytes: result.needBytes };
  }

  const { chunk } = result;
  const totalSize = chunk.headerSize + (chunk.type === 'plain' ? chunk.size : 0);

  if (offset + totalSize > input.length) {
    return { success: false, needBytes: totalSize - (input.length - offset) };
  }

  return { success: true, chunk, totalSize };
}

/**
 * Pull the next chunk header from a byte source
 *
 * @returns The parsed chunk, or null at the clean end of the stream
 * @throws TRUNCATED_INPUT when the stream ends inside a multi-byte header
 */
export function readAdcChunk(source: ByteSource, scratch: Buffer = allocBufferUnsafe(3)): AdcChunk | null {
  if (source.read(scratch, 0, 1) === 0) return null;

  const control = scratch[0];
  const headerSize = headerSizeOf(control);
  if (headerSize > 1) {
    readFully(source, scratch, 1, headerSize - 1, 'chunk header');
  }

  return createChunk(control, headerSize > 1 ? scratch[1] : 0, headerSize > 2 ? scratch[2] : 0);
}
