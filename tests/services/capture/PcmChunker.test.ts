import { describe, expect, it } from 'vitest';
import { PcmChunker } from '../../../src/services/capture/PcmChunker';
import { float32ToLeBuffer } from '../../../src/services/process/framing';

describe('PcmChunker', () => {
  it('carries partial samples across pushes', () => {
    const chunker = new PcmChunker(2);
    const bytes = float32ToLeBuffer(Float32Array.of(0.5, 1, -0.5, 0.25));

    const first = chunker.push(bytes.subarray(0, 10));
    const second = chunker.push(bytes.subarray(10));

    expect(first.map((chunk) => Array.from(chunk))).toEqual([[0.5, 1]]);
    expect(second.map((chunk) => Array.from(chunk))).toEqual([[-0.5, 0.25]]);
    expect(chunker.flush()).toBeUndefined();
  });

  it('flushes the remaining whole samples', () => {
    const chunker = new PcmChunker(2);
    const tail = Buffer.alloc(6);
    tail.writeFloatLE(0.75, 0);

    expect(chunker.push(tail)).toEqual([]);
    expect(Array.from(chunker.flush() ?? [])).toEqual([0.75]);
    expect(chunker.flush()).toBeUndefined();
  });

  it('sizes chunks from a duration', () => {
    const chunker = PcmChunker.forDuration(250, 16);

    expect(chunker.push(Buffer.alloc(16 * 4)).map((chunk) => chunk.length)).toEqual([4, 4, 4, 4]);
  });

  it('rejects a non-positive chunk size', () => {
    expect(() => new PcmChunker(0)).toThrow(RangeError);
    expect(() => new PcmChunker(1.5)).toThrow('samplesPerChunk must be a positive integer, got 1.5');
  });
});
