import type { AudioChunk } from '../types';
import { WakeSignal } from './WakeSignal';

/**
 * Unbounded FIFO of submitted audio. `push` is the only method callers use;
 * draining belongs to the inference worker.
 */
export class AudioQueue {
  private chunks: AudioChunk[] = [];
  private queuedSamples = 0;
  private nextChunkId = 1;

  public constructor(private readonly signal: WakeSignal = new WakeSignal()) {}

  /** Returns the assigned chunk id, or 0 when `samples` is empty and nothing was queued. */
  public push(samples: ArrayLike<number>): number {
    if (samples.length === 0) {
      return 0;
    }

    const chunk: AudioChunk = {
      id: this.nextChunkId++,
      samples: Float32Array.from(samples),
      submittedAtMs: Date.now()
    };

    this.chunks.push(chunk);
    this.queuedSamples += chunk.samples.length;
    this.signal.notify();

    return chunk.id;
  }

  public pop(): AudioChunk | undefined {
    const chunk = this.chunks.shift();
    if (chunk) {
      this.queuedSamples -= chunk.samples.length;
    }

    return chunk;
  }

  public drainAll(): AudioChunk[] {
    const drained = this.chunks;
    this.chunks = [];
    this.queuedSamples = 0;
    return drained;
  }

  /** Resolves once at least one chunk is queued, or when `signal` is notified for another reason. */
  public async waitForChunks(): Promise<void> {
    if (this.chunks.length > 0) {
      return;
    }

    await this.signal.wait();
  }

  public wake(): void {
    this.signal.notify();
  }

  public clear(): void {
    this.chunks = [];
    this.queuedSamples = 0;
  }

  public get size(): number {
    return this.chunks.length;
  }

  public get sampleCount(): number {
    return this.queuedSamples;
  }

  public peekNextId(): number {
    return this.nextChunkId;
  }
}
