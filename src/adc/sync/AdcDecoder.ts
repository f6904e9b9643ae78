/**
 * Synchronous ADC Decoder
 *
 * Pull-based decoder: each produce() call fills part of a caller buffer from
 * the active chunk, parsing the next chunk header only when the previous one
 * is exhausted. Memory is bounded by the 64 KiB history window.
 */

import { allocBufferUnsafe, type BufferLike, bufferConcat, bufferFrom, canAllocateBufferSize } from 'extract-base-iterator';
import { readAdcChunk } from '../lib/AdcChunkParser.ts';
import { type AdcChunk, createCodedError, ErrorCode, type OutputSink } from '../types.ts';
import { BufferSource, type ByteSource, readFully } from './ByteSource.ts';
import { SlidingWindow } from './SlidingWindow.ts';

// Block size used when the output size is unknown
const kBlockSize = 0x10000;

/**
 * Synchronous ADC decoder
 */
export class AdcDecoder {
  private source: ByteSource;
  private window: SlidingWindow;
  private header: Buffer;

  // Active chunk and the output it still owes
  private chunk: AdcChunk | null;
  private remaining: number;

  private finished: boolean;
  private failure: Error | null;

  constructor(source: ByteSource) {
    this.source = source;
    this.window = new SlidingWindow();
    this.header = allocBufferUnsafe(3);
    this.chunk = null;
    this.remaining = 0;
    this.finished = false;
    this.failure = null;
  }

  /**
   * True once the end of the compressed stream has been reached
   */
  get ended(): boolean {
    return this.finished;
  }

  /**
   * Decode up to `length` bytes into `output` at `offset`
   *
   * Never returns more than the active chunk still owes, so a call may return
   * fewer bytes than requested. Returns 0 only at the end of the stream (or
   * when `length` is 0). After an error the decoder rethrows it on every call.
   *
   * @returns Bytes written
   */
  produce(output: Buffer, offset = 0, length: number = output.length - offset): number {
    if (this.finished) return 0;
    if (this.failure) throw this.failure;
    if (length <= 0) return 0;

    try {
      return this.produceChunk(output, offset, length);
    } catch (err) {
      this.failure = err instanceof Error ? err : new Error(String(err));
      throw this.failure;
    }
  }

  private produceChunk(output: Buffer, offset: number, length: number): number {
    let chunk = this.chunk;
    if (chunk === null) {
      chunk = readAdcChunk(this.source, this.header);
      if (chunk === null) {
        this.finished = true;
        return 0;
      }
      this.chunk = chunk;
      this.remaining = chunk.size;
    }

    const n = Math.min(this.remaining, length);

    if (chunk.type === 'plain') {
      readFully(this.source, output, offset, n, 'literal data');
      this.window.extend(output, offset, offset + n);
    } else {
      const copied = this.window.copyBlock(chunk.offset, output, offset, n);
      if (copied < n) {
        throw createCodedError(`Invalid ADC offset ${chunk.offset}: only ${this.window.length} bytes of history`, ErrorCode.INVALID_OFFSET);
      }
    }

    this.remaining -= n;
    if (this.remaining === 0) {
      this.chunk = null;
    }
    return n;
  }

  /**
   * Fill `output` completely
   * @throws BUFFER_TOO_SMALL if the stream ends before the buffer is full
   */
  readExact(output: Buffer): void {
    let pos = 0;
    while (pos < output.length) {
      const count = this.produce(output, pos);
      if (count === 0) {
        throw createCodedError(`ADC stream ended after ${pos} of ${output.length} bytes`, ErrorCode.BUFFER_TOO_SMALL);
      }
      pos += count;
    }
  }

  /**
   * Decode the rest of the stream into `output`
   * @returns Bytes written
   * @throws BUFFER_TOO_SMALL if the stream holds more output than fits
   */
  decompressInto(output: Buffer): number {
    let pos = 0;
    while (pos < output.length) {
      const count = this.produce(output, pos);
      if (count === 0) return pos;
      pos += count;
    }

    if (!this.finished && this.produce(allocBufferUnsafe(1)) > 0) {
      throw createCodedError(`Output buffer too small: ADC stream exceeds ${output.length} bytes`, ErrorCode.BUFFER_TOO_SMALL);
    }
    return pos;
  }

  /**
   * Decode the rest of the stream, writing each block to a sink
   * @returns Total bytes written to sink
   */
  decodeWithSink(sink: OutputSink): number {
    const block = allocBufferUnsafe(kBlockSize);
    let totalBytes = 0;
    let pos = 0;

    while (true) {
      const count = this.produce(block, pos);
      pos += count;
      if (pos === block.length || (count === 0 && pos > 0)) {
        // Use bufferFrom to create a COPY, not a view - the block is reused
        sink.write(bufferFrom(block.slice(0, pos)));
        totalBytes += pos;
        pos = 0;
      }
      if (count === 0) break;
    }

    return totalBytes;
  }

  /**
   * Decode the rest of the stream
   * @param unpackSize - Expected output size (optional, for pre-allocation)
   * @returns Decompressed data
   */
  decode(unpackSize?: number): Buffer {
    // Pre-allocate output buffer if size is known and safe for this Node version
    if (unpackSize && unpackSize > 0 && canAllocateBufferSize(unpackSize)) {
      const outputBuffer = allocBufferUnsafe(unpackSize);
      const outputPos = this.decompressInto(outputBuffer);
      return outputPos < outputBuffer.length ? outputBuffer.slice(0, outputPos) : outputBuffer;
    }

    const outputChunks: Buffer[] = [];
    this.decodeWithSink({
      write(buffer: Buffer): void {
        outputChunks.push(buffer);
      },
    });
    if (outputChunks.length === 0) return allocBufferUnsafe(0);
    if (outputChunks.length === 1) return outputChunks[0];
    // Use bufferConcat which handles large buffers safely via pairwise combination
    return bufferConcat(outputChunks);
  }
}

/**
 * Decode ADC data synchronously
 * @param input - ADC compressed data (Buffer or BufferList)
 * @param unpackSize - Expected output size (optional, autodetects if not provided)
 * @param outputSink - Optional output sink receiving decoded blocks
 * @returns Decompressed data (or bytes written if outputSink provided)
 */
export function decodeAdc(input: BufferLike, unpackSize?: number): Buffer;
export function decodeAdc(input: BufferLike, unpackSize: number | undefined, outputSink: OutputSink): number;
export function decodeAdc(input: BufferLike, unpackSize?: number, outputSink?: OutputSink): Buffer | number {
  const decoder = new AdcDecoder(new BufferSource(input));
  if (outputSink) return decoder.decodeWithSink(outputSink);
  return decoder.decode(unpackSize);
}
