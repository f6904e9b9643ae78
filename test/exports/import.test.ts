import assert from 'assert';
import { AdcDecoder, BufferSource, createAdcDecoder, decodeAdc, decodeAdcAsync, ErrorCode, hasCompleteChunk, isCodedError, kWindowSize, parseAdcChunkHeader, readAdcChunk, SlidingWindow } from 'adc-stream';

describe('exports .ts', () => {
  it('signature', () => {
    assert.ok(AdcDecoder);
    assert.ok(BufferSource);
    assert.ok(SlidingWindow);
    assert.ok(createAdcDecoder);
    assert.ok(decodeAdc);
    assert.ok(decodeAdcAsync);
    assert.ok(parseAdcChunkHeader);
    assert.ok(hasCompleteChunk);
    assert.ok(readAdcChunk);
    assert.ok(isCodedError);
    assert.equal(kWindowSize, 65536);
    assert.deepEqual(Object.keys(ErrorCode).sort(), ['BUFFER_TOO_SMALL', 'INVALID_OFFSET', 'TRUNCATED_INPUT']);
  });
});
