import { leBufferToFloat32 } from '../process/framing';

const BYTES_PER_SAMPLE = 4;

/**
 * Cuts a raw f32le byte stream into fixed-size sample chunks, carrying
 * partial samples and partial chunks over between pushes.
 */
export class PcmChunker {
  private pendingBytes = Buffer.alloc(0);

  public constructor(private readonly samplesPerChunk: number) {
    if (!Number.isInteger(samplesPerChunk) || samplesPerChunk <= 0) {
      throw new RangeError(`samplesPerChunk must be a positive integer, got ${samplesPerChunk}`);
    }
  }

  public static forDuration(chunkMs: number, sampleRate: number): PcmChunker {
    return new PcmChunker(Math.max(1, Math.floor((sampleRate * chunkMs) / 1000)));
  }

  public push(bytes: Buffer): Float32Array[] {
    this.pendingBytes =
      this.pendingBytes.length === 0 ? Buffer.from(bytes) : Buffer.concat([this.pendingBytes, bytes]);

    const chunkBytes = this.samplesPerChunk * BYTES_PER_SAMPLE;
    const chunks: Float32Array[] = [];

    while (this.pendingBytes.length >= chunkBytes) {
      chunks.push(leBufferToFloat32(this.pendingBytes.subarray(0, chunkBytes)));
      this.pendingBytes = this.pendingBytes.subarray(chunkBytes);
    }

    return chunks;
  }

  /** Whatever whole samples remain; a trailing partial sample is dropped. */
  public flush(): Float32Array | undefined {
    const wholeBytes = this.pendingBytes.length - (this.pendingBytes.length % BYTES_PER_SAMPLE);
    const remainder = wholeBytes > 0 ? leBufferToFloat32(this.pendingBytes.subarray(0, wholeBytes)) : undefined;
    this.pendingBytes = Buffer.alloc(0);
    return remainder;
  }
}
