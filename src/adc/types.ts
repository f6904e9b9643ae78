/**
 * ADC Types and Constants
 *
 * Shared types, wire constants, header classification and error codes for
 * Apple Data Compression decoding.
 *
 * ADC header byte layout:
 * 1xxxxxxx            = Plain chunk, (x + 1) literal bytes follow
 * 01xxxxxx hhhhhhhh llllllll = Three-byte run, (x + 4) bytes from 16-bit offset
 * 00xxxxoo oooooooo   = Two-byte run, (x + 3) bytes from 10-bit offset
 */

// Window constants
export const kMaxOffset = 0xffff;
export const kWindowSize = kMaxOffset + 1; // 65536

// Header bit masks
export const kPlainFlag = 0x80;
export const kThreeByteFlag = 0x40;
export const kPlainSizeMask = 0x7f;
export const kRunSizeMask = 0x3f;
export const kTwoByteOffsetHighMask = 0x03;

// Size bias per chunk type
export const kPlainMinSize = 1;
export const kTwoByteMinSize = 3;
export const kThreeByteMinSize = 4;

export const kPlainMaxSize = kPlainSizeMask + kPlainMinSize; // 128
export const kTwoByteMaxSize = (kRunSizeMask >> 2) + kTwoByteMinSize; // 18
export const kThreeByteMaxSize = kRunSizeMask + kThreeByteMinSize; // 67

export type AdcChunkType = 'plain' | 'twoByte' | 'threeByte';

/**
 * Parsed ADC chunk header
 */
export interface AdcChunk {
  type: AdcChunkType;
  /** Total bytes consumed by header (including control byte) */
  headerSize: number;
  /** Uncompressed bytes this chunk yields */
  size: number;
  /** Back-distance for run chunks (0 = previous byte), always 0 for plain chunks */
  offset: number;
}

/**
 * Classify a chunk by the two high bits of its header byte
 */
export function chunkTypeOf(control: number): AdcChunkType {
  if (control & kPlainFlag) return 'plain';
  if (control & kThreeByteFlag) return 'threeByte';
  return 'twoByte';
}

/**
 * Header length implied by a header byte
 */
export function headerSizeOf(control: number): number {
  const type = chunkTypeOf(control);
  if (type === 'plain') return 1;
  return type === 'twoByte' ? 2 : 3;
}

/**
 * Build a chunk from its header byte and the (optional) trailing header bytes.
 * `next1`/`next2` are ignored for chunk types that do not use them.
 */
export function createChunk(control: number, next1: number, next2: number): AdcChunk {
  const type = chunkTypeOf(control);

  switch (type) {
    case 'plain':
      return { type, headerSize: 1, size: (control & kPlainSizeMask) + kPlainMinSize, offset: 0 };
    case 'twoByte':
      return {
        type,
        headerSize: 2,
        size: ((control & kRunSizeMask) >> 2) + kTwoByteMinSize,
        offset: ((control & kTwoByteOffsetHighMask) << 8) | next1,
      };
    default:
      return {
        type,
        headerSize: 3,
        size: (control & kRunSizeMask) + kThreeByteMinSize,
        offset: (next1 << 8) | next2,
      };
  }
}

// Error codes
export const ErrorCode = {
  TRUNCATED_INPUT: 'TRUNCATED_INPUT',
  INVALID_OFFSET: 'INVALID_OFFSET',
  BUFFER_TOO_SMALL: 'BUFFER_TOO_SMALL',
} as const;

export type AdcErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Error with code property
export interface CodedError extends Error {
  code: AdcErrorCode;
}

/**
 * Create an error with a code property
 */
export function createCodedError(message: string, code: AdcErrorCode): CodedError {
  return Object.assign(new Error(message), { code });
}

/**
 * Check whether an unknown error came from the decoder (optionally with a specific code)
 */
export function isCodedError(err: unknown, code?: AdcErrorCode): err is CodedError {
  if (!(err instanceof Error) || !('code' in err)) return false;
  const value = err.code;
  if (code !== undefined) return value === code;
  return value === ErrorCode.TRUNCATED_INPUT || value === ErrorCode.INVALID_OFFSET || value === ErrorCode.BUFFER_TOO_SMALL;
}

/**
 * Output sink interface for streaming decode
 */
export interface OutputSink {
  write(buffer: Buffer): void;
}
