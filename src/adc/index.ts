/**
 * ADC Decoder Module
 *
 * Provides both synchronous and streaming ADC decoders.
 *
 * Synchronous API: pull-based AdcDecoder over any ByteSource, plus decodeAdc for complete buffers
 * Streaming API: Transform stream for push-based decompression with bounded memory
 */

export { type CompleteChunkResult, hasCompleteChunk, type ParseResult, parseAdcChunkHeader, readAdcChunk } from './lib/AdcChunkParser.ts';
// Streaming decoder (Transform stream)
export { createAdcDecoder } from './stream/transforms.ts';
// Synchronous decoders
export { AdcDecoder, decodeAdc } from './sync/AdcDecoder.ts';
export { BufferSource, type ByteSource, readFully } from './sync/ByteSource.ts';
export { SlidingWindow } from './sync/SlidingWindow.ts';
// Type exports
export * from './types.ts';
