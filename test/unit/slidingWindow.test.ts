import assert from 'assert';
import { allocBuffer, bufferFrom } from 'extract-base-iterator';
import { SlidingWindow } from '../../src/adc/sync/SlidingWindow.ts';

function history(window: SlidingWindow, count: number): Array<number | null> {
  const result: Array<number | null> = [];
  for (let d = 0; d < count; d++) result.push(window.get(d));
  return result;
}

describe('SlidingWindow', () => {
  it('should default to a 64 KiB window', () => {
    const window = new SlidingWindow();
    assert.equal(window.capacity, 65536);
    assert.equal(window.length, 0);
    assert.equal(window.get(0), null);
  });

  it('should reject an empty window', () => {
    assert.throws(() => new SlidingWindow(0), /Invalid window size/);
  });

  it('should address bytes newest first', () => {
    const window = new SlidingWindow();
    window.extend(bufferFrom([1, 2, 3]));
    window.putByte(4);
    assert.deepEqual(history(window, 5), [4, 3, 2, 1, null]);
    assert.equal(window.length, 4);
  });

  it('should extend from a sub-range', () => {
    const window = new SlidingWindow();
    window.extend(bufferFrom([9, 8, 7, 6, 5]), 1, 3);
    assert.deepEqual(history(window, 3), [7, 8, null]);
  });

  it('should evict the oldest bytes when wrapping', () => {
    const window = new SlidingWindow(4);
    window.extend(bufferFrom([1, 2, 3]));
    window.extend(bufferFrom([4, 5, 6]));
    assert.deepEqual(history(window, 5), [6, 5, 4, 3, null]);
    window.putByte(7);
    assert.deepEqual(history(window, 5), [7, 6, 5, 4, null]);
  });

  it('should keep only the tail of an extension longer than the window', () => {
    const window = new SlidingWindow(4);
    window.putByte(0xff);
    window.extend(bufferFrom([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]));
    assert.equal(window.length, 4);
    assert.deepEqual(history(window, 5), [10, 9, 8, 7, null]);
    window.extend(bufferFrom([11]));
    assert.deepEqual(history(window, 4), [11, 10, 9, 8]);
  });

  it('should copy overlapping runs', () => {
    const window = new SlidingWindow();
    window.extend(bufferFrom([0xab, 0xcd]));
    const output = allocBuffer(5);
    assert.equal(window.copyBlock(1, output, 0, 5), 5);
    assert.deepEqual([...output], [0xab, 0xcd, 0xab, 0xcd, 0xab]);
    assert.equal(window.get(0), 0xab);
    assert.equal(window.length, 7);
  });

  it('should repeat the last byte for distance 0', () => {
    const window = new SlidingWindow();
    window.putByte(0x42);
    const output = allocBuffer(6);
    assert.equal(window.copyBlock(0, output, 2, 4), 4);
    assert.deepEqual([...output], [0, 0, 0x42, 0x42, 0x42, 0x42]);
  });

  it('should stop copying when history runs out', () => {
    const window = new SlidingWindow();
    window.extend(bufferFrom([1, 2]));
    const output = allocBuffer(3);
    assert.equal(window.copyBlock(2, output, 0, 3), 0);
    assert.equal(window.length, 2);
  });

  it('should reach back the full window after wrapping', () => {
    const window = new SlidingWindow();
    const data = allocBuffer(70000);
    for (let i = 0; i < data.length; i++) data[i] = i % 251;
    window.extend(data);
    assert.equal(window.get(65535), (70000 - 65536) % 251);
    assert.equal(window.get(65536), null);
  });
});
