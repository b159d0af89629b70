import { DEFAULT_MAX_DURATION_SEC, DEFAULT_SAMPLE_RATE } from '../config';
import { PipelineError } from '../errors';
import type { AudioChunk, PipelineMode } from '../types';
import type { AudioQueue } from './AudioQueue';

/** Minimum buffered audio, in seconds, before a windowed buffer is worth an engine call. */
export const MIN_INFERENCE_SECONDS = 1;

export interface InferenceJob {
  chunkId: number;
  samples: Float32Array;
  isPartial: boolean;
  firstSubmittedAtMs: number;
}

/**
 * Decides what the worker feeds the engine. Each cycle the worker dequeues
 * through `take` and hands the chunks, in submission order, to `admit`.
 */
export interface AccumulationPolicy {
  readonly mode: PipelineMode;
  take(queue: AudioQueue): AudioChunk[];
  admit(chunks: AudioChunk[], forceFinal: boolean): InferenceJob[];
  /** Jobs for the pass that runs once the worker has been told to stop. */
  finalJobs(queue: AudioQueue): InferenceJob[];
  setMaxDuration(durationSec: number, sampleRate?: number): void;
  bufferedSamples(): number;
  reset(): void;
}

/**
 * One chunk per cycle, so a stop takes effect after the chunk in flight.
 * Chunks still queued at that point wait for the next session.
 */
export class ImmediatePolicy implements AccumulationPolicy {
  public readonly mode = 'immediate';

  public take(queue: AudioQueue): AudioChunk[] {
    const chunk = queue.pop();
    return chunk ? [chunk] : [];
  }

  /** Every job is already final, so `forceFinal` changes nothing here. */
  public admit(chunks: AudioChunk[], _forceFinal = false): InferenceJob[] {
    return chunks.map((chunk) => ({
      chunkId: chunk.id,
      samples: chunk.samples,
      isPartial: false,
      firstSubmittedAtMs: chunk.submittedAtMs
    }));
  }

  public finalJobs(_queue?: AudioQueue): InferenceJob[] {
    return [];
  }

  public setMaxDuration(_durationSec: number, _sampleRate?: number): void {
    throw new PipelineError('unsupported_mode', 'setMaxDuration is only supported in windowed mode');
  }

  public bufferedSamples(): number {
    return 0;
  }

  public reset(): void {}
}

export interface WindowedPolicyOptions {
  maxDurationSec?: number;
  sampleRate?: number;
}

const toSampleCount = (durationSec: number, sampleRate: number): number => {
  if (!Number.isFinite(durationSec) || durationSec <= 0) {
    throw new PipelineError('invalid_argument', `maxDurationSec must be a positive number, got ${durationSec}`);
  }

  if (!Number.isInteger(sampleRate) || sampleRate <= 0) {
    throw new PipelineError('invalid_argument', `sampleRate must be a positive integer, got ${sampleRate}`);
  }

  return Math.floor(durationSec * sampleRate);
};

/**
 * Grows a buffer across cycles and re-transcribes all of it each time, so
 * partial results carry full context. The buffer resets once it reaches
 * `maxSamples` or on the forced-final shutdown pass.
 */
export class WindowedPolicy implements AccumulationPolicy {
  public readonly mode = 'windowed';

  private pieces: Float32Array[] = [];
  private length = 0;
  private lastChunkId = 0;
  private firstSubmittedAtMs = 0;
  private maxSamples: number;
  private minSamples: number;

  public constructor(options: WindowedPolicyOptions = {}) {
    const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    this.maxSamples = toSampleCount(options.maxDurationSec ?? DEFAULT_MAX_DURATION_SEC, sampleRate);
    this.minSamples = MIN_INFERENCE_SECONDS * sampleRate;
  }

  public take(queue: AudioQueue): AudioChunk[] {
    return queue.drainAll();
  }

  public admit(chunks: AudioChunk[], forceFinal: boolean): InferenceJob[] {
    for (const chunk of chunks) {
      if (this.length === 0) {
        this.firstSubmittedAtMs = chunk.submittedAtMs;
      }

      this.pieces.push(chunk.samples);
      this.length += chunk.samples.length;
      this.lastChunkId = chunk.id;
    }

    if (this.length < this.minSamples) {
      return [];
    }

    const job: InferenceJob = {
      chunkId: this.lastChunkId,
      samples: this.snapshot(),
      isPartial: true,
      firstSubmittedAtMs: this.firstSubmittedAtMs
    };

    if (forceFinal || this.length >= this.maxSamples) {
      job.isPartial = false;
      this.reset();
    }

    return [job];
  }

  public setMaxDuration(durationSec: number, sampleRate: number = DEFAULT_SAMPLE_RATE): void {
    this.maxSamples = toSampleCount(durationSec, sampleRate);
    this.minSamples = MIN_INFERENCE_SECONDS * sampleRate;
  }

  /** Folds in whatever is still queued and flushes the window as one final result. */
  public finalJobs(queue: AudioQueue): InferenceJob[] {
    return this.admit(queue.drainAll(), true);
  }

  public bufferedSamples(): number {
    return this.length;
  }

  public reset(): void {
    this.pieces = [];
    this.length = 0;
  }

  private snapshot(): Float32Array {
    if (this.pieces.length === 1) {
      return this.pieces[0].slice();
    }

    const merged = new Float32Array(this.length);
    let offset = 0;
    for (const piece of this.pieces) {
      merged.set(piece, offset);
      offset += piece.length;
    }

    // Keep one contiguous piece so the next snapshot copies once.
    this.pieces = [merged];
    return merged.slice();
  }
}

export const createPolicy = (mode: PipelineMode, options: WindowedPolicyOptions = {}): AccumulationPolicy =>
  mode === 'immediate' ? new ImmediatePolicy() : new WindowedPolicy(options);
