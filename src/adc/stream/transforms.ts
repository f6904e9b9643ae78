/**
 * ADC Transform Stream Wrapper
 *
 * Push-based counterpart of the pull-based AdcDecoder. Input is buffered only
 * until the next chunk is complete (at most 129 bytes for a plain chunk, 3 for
 * a run), then decoded against a history window that persists across writes.
 * Memory usage is O(window size) regardless of stream length.
 */

import { allocBufferUnsafe, bufferConcat, bufferFrom, Transform } from 'extract-base-iterator';
import { hasCompleteChunk } from '../lib/AdcChunkParser.ts';
import { SlidingWindow } from '../sync/SlidingWindow.ts';
import { createCodedError, ErrorCode } from '../types.ts';

/**
 * Create an ADC decoder Transform stream
 *
 * @returns Transform stream that decompresses ADC data
 */
export function createAdcDecoder(): InstanceType<typeof Transform> {
  const window = new SlidingWindow();

  // Buffer for incomplete chunk data
  let pending: Buffer | null = null;
  let totalOut = 0;

  return new Transform({
    transform: function (this: InstanceType<typeof Transform>, chunk: Buffer, _encoding: string, callback: (err?: Error | null) => void) {
      // Combine with pending data
      let input: Buffer;
      if (pending && pending.length > 0) {
        input = Buffer.concat([pending, chunk]);
        pending = null;
      } else {
        input = chunk;
      }

      const outputs: Buffer[] = [];
      let offset = 0;

      try {
        while (offset < input.length) {
          const result = hasCompleteChunk(input, offset);

          if (!result.success) {
            // Need more data
            pending = bufferFrom(input.slice(offset));
            break;
          }

          const { chunk: chunkInfo, totalSize } = result;
          const dataOffset = offset + chunkInfo.headerSize;

          if (chunkInfo.type === 'plain') {
            const literal = bufferFrom(input.slice(dataOffset, dataOffset + chunkInfo.size));
            window.extend(literal);
            outputs.push(literal);
          } else {
            const run = allocBufferUnsafe(chunkInfo.size);
            if (window.copyBlock(chunkInfo.offset, run, 0, chunkInfo.size) < chunkInfo.size) {
              throw createCodedError(`Invalid ADC offset ${chunkInfo.offset} at output byte ${totalOut}`, ErrorCode.INVALID_OFFSET);
            }
            outputs.push(run);
          }

          totalOut += chunkInfo.size;
          offset += totalSize;
        }
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
        return;
      }

      if (outputs.length > 0) this.push(outputs.length === 1 ? outputs[0] : bufferConcat(outputs));
      callback(null);
    },

    flush: function (this: InstanceType<typeof Transform>, callback: (err?: Error | null) => void) {
      if (pending && pending.length > 0) {
        callback(createCodedError(`Truncated ADC stream: ${pending.length} bytes of an incomplete chunk`, ErrorCode.TRUNCATED_INPUT));
      } else {
        callback(null);
      }
    },
  });
}
