/**
 * ADC Stream: Apple Data Compression Decoder
 *
 * Pure JavaScript, streaming-first decoder for the ADC run-length format.
 * Output is produced on demand against a bounded 64 KiB history window.
 */

// ============================================================================
// High-Level APIs (Recommended)
// ============================================================================

// Whole-buffer decode, sync and async
export { type AdcDecodeCallback, decodeAdcAsync } from './decode.ts';
export { createAdcDecoder, decodeAdc } from './adc/index.ts';

// ============================================================================
// Low-Level APIs
// ============================================================================

// Pull-based decoder and its collaborators
export { AdcDecoder, BufferSource, type ByteSource, hasCompleteChunk, parseAdcChunkHeader, readAdcChunk, SlidingWindow } from './adc/index.ts';

// ============================================================================
// Supporting APIs
// ============================================================================

export { type AdcChunk, type AdcChunkType, type AdcErrorCode, type CodedError, createCodedError, ErrorCode, isCodedError, kWindowSize, type OutputSink } from './adc/types.ts';

// Callback type used by async decoders
export type { DecodeCallback } from './utils/runDecode.ts';
