/**
 * High-Level Async Decoder
 *
 * Runs the synchronous ADC decoder off the current stack and reports through
 * a Node-style callback, or a Promise when no callback is given.
 */

import type { BufferLike } from 'extract-base-iterator';
import { decodeAdc } from './adc/sync/AdcDecoder.ts';
import { type DecodeCallback, runDecode, runSync } from './utils/runDecode.ts';

/** Callback invoked when an async ADC decode completes */
export type AdcDecodeCallback = DecodeCallback<Buffer>;

export function decodeAdcAsync(input: BufferLike, callback: AdcDecodeCallback): void;
export function decodeAdcAsync(input: BufferLike, unpackSize: number | undefined, callback: AdcDecodeCallback): void;
export function decodeAdcAsync(input: BufferLike, unpackSize?: number): Promise<Buffer>;
/**
 * Decompress ADC data asynchronously
 */
export function decodeAdcAsync(input: BufferLike, unpackSize?: number | AdcDecodeCallback, callback?: AdcDecodeCallback): Promise<Buffer> | void {
  const size = typeof unpackSize === 'function' ? undefined : unpackSize;
  const done = typeof unpackSize === 'function' ? unpackSize : callback;

  return runDecode<Buffer>((cb) => runSync(() => decodeAdc(input, size), cb), done);
}
