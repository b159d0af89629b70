import { InferenceError, describeError } from '../errors';
import type { Logger } from '../logging/StructuredLogger';
import type { LatencyTracker } from '../perf/LatencyTracker';
import type { SpeechEngine } from '../services/engine/SpeechEngine';
import type { Segment, TranscriptionResult } from '../types';
import type { AccumulationPolicy, InferenceJob } from './AccumulationPolicy';
import type { AudioQueue } from './AudioQueue';

export interface ResultSink {
  enqueue(result: TranscriptionResult): void;
}

export interface InferenceWorkerOptions {
  queue: AudioQueue;
  policy: AccumulationPolicy;
  engine: SpeechEngine;
  results: ResultSink;
  sampleRate: number;
  logger?: Logger;
  latencyTracker?: LatencyTracker;
  onInferenceError?: (error: InferenceError, chunkId: number) => void;
}

export interface WorkerCounters {
  inferenceCalls: number;
  failedInferences: number;
  emptyInferences: number;
}

/**
 * Owns the engine for a session. One loop, one awaited engine call at a time.
 */
export class InferenceWorker {
  private active = false;
  private loopPromise: Promise<void> | undefined;
  private readonly counters: WorkerCounters = {
    inferenceCalls: 0,
    failedInferences: 0,
    emptyInferences: 0
  };

  public constructor(private readonly options: InferenceWorkerOptions) {}

  public getCounters(): WorkerCounters {
    return { ...this.counters };
  }

  public start(): void {
    if (this.loopPromise) {
      return;
    }

    this.active = true;
    this.loopPromise = this.run();
  }

  /** Resolves after the shutdown pass has run and every job it produced has finished. */
  public async stop(): Promise<void> {
    this.active = false;
    this.options.queue.wake();

    const current = this.loopPromise;
    if (!current) {
      return;
    }

    try {
      await current;
    } finally {
      this.loopPromise = undefined;
    }
  }

  private async run(): Promise<void> {
    const { queue, policy } = this.options;

    while (this.active) {
      if (queue.size === 0) {
        await queue.waitForChunks();
        continue;
      }

      await this.runJobs(policy.admit(policy.take(queue), false));
    }

    this.options.logger?.debug('Inference worker shutdown pass', {
      mode: policy.mode,
      queuedChunks: queue.size,
      bufferedSamples: policy.bufferedSamples()
    });
    await this.runJobs(policy.finalJobs(queue));
  }

  private async runJobs(jobs: InferenceJob[]): Promise<void> {
    for (const job of jobs) {
      await this.runJob(job);
    }
  }

  private async runJob(job: InferenceJob): Promise<void> {
    const { engine, logger } = this.options;
    const startedAt = Date.now();
    const queueMs = Math.max(0, startedAt - job.firstSubmittedAtMs);
    this.counters.inferenceCalls += 1;

    let segments: Segment[];
    try {
      segments = await engine.transcribe(job.samples);
    } catch (error) {
      this.counters.failedInferences += 1;
      const failure =
        error instanceof InferenceError
          ? error
          : new InferenceError(`Engine inference failed: ${describeError(error)}`, error);
      logger?.warn('Inference failed; skipping cycle', {
        chunkId: job.chunkId,
        samples: job.samples.length,
        detail: failure.message
      });
      this.options.onInferenceError?.(failure, job.chunkId);
      return;
    }

    const engineMs = Date.now() - startedAt;
    const audioMs = (job.samples.length / this.options.sampleRate) * 1000;
    this.options.latencyTracker?.push({ queueMs, audioMs, engineMs });

    if (segments.length === 0) {
      this.counters.emptyInferences += 1;
      logger?.debug('Inference produced no segments', { chunkId: job.chunkId, engineMs });
      return;
    }

    this.options.results.enqueue({
      chunkId: job.chunkId,
      segments,
      isPartial: job.isPartial
    });

    logger?.debug('Inference completed', {
      chunkId: job.chunkId,
      isPartial: job.isPartial,
      segments: segments.length,
      audioMs: Math.round(audioMs),
      engineMs,
      queueMs
    });
  }
}
