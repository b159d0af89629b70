import { EventEmitter } from 'node:events';
import { DEFAULT_MAX_DURATION_SEC, DEFAULT_RESULT_CHECK_INTERVAL_MS, DEFAULT_SAMPLE_RATE } from '../config';
import { CallbackError, EngineInitError, InferenceError, PipelineError, describeError } from '../errors';
import type { Logger } from '../logging/StructuredLogger';
import { LatencyTracker } from '../perf/LatencyTracker';
import type { EngineLoader, SpeechEngine } from '../services/engine/SpeechEngine';
import type { PipelineMode, PipelineState, PipelineStats, ResultCallback } from '../types';
import { type AccumulationPolicy, createPolicy } from './AccumulationPolicy';
import { AudioQueue } from './AudioQueue';
import { InferenceWorker } from './InferenceWorker';
import { ResultDispatcher } from './ResultDispatcher';

export interface TranscriptionPipelineOptions {
  mode?: PipelineMode;
  maxDurationSec?: number;
  sampleRate?: number;
  logger?: Logger;
}

export declare interface TranscriptionPipeline {
  on(event: 'stateChanged', listener: (state: PipelineState) => void): this;
  on(event: 'inferenceError', listener: (error: InferenceError, chunkId: number) => void): this;
  on(event: 'callbackError', listener: (error: CallbackError) => void): this;
}

/**
 * Streaming front end for a speech engine. Callers `submit` audio from
 * anywhere; a worker loop decides when to run the engine and a dispatcher
 * loop hands text to the callback given to `start`.
 */
export class TranscriptionPipeline extends EventEmitter {
  private state: PipelineState = 'stopped';
  private closed = false;
  private stopPromise: Promise<void> | undefined;
  private readonly queue = new AudioQueue();
  private readonly policy: AccumulationPolicy;
  private readonly worker: InferenceWorker;
  private readonly dispatcher: ResultDispatcher;
  private readonly latencyTracker = new LatencyTracker();
  private readonly logger?: Logger;

  /** Loads the engine first; a loader failure surfaces here as `EngineInitError`. */
  public static async open(
    loader: EngineLoader,
    options: TranscriptionPipelineOptions = {}
  ): Promise<TranscriptionPipeline> {
    let engine: SpeechEngine;

    try {
      engine = await loader();
    } catch (error) {
      if (error instanceof EngineInitError) {
        throw error;
      }

      throw new EngineInitError(`Failed to load speech engine: ${describeError(error)}`, undefined, error);
    }

    options.logger?.info('Speech engine loaded', { mode: options.mode ?? 'windowed' });
    return new TranscriptionPipeline(engine, options);
  }

  public constructor(
    private readonly engine: SpeechEngine,
    options: TranscriptionPipelineOptions = {}
  ) {
    super();
    const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    this.logger = options.logger;
    this.policy = createPolicy(options.mode ?? 'windowed', {
      maxDurationSec: options.maxDurationSec ?? DEFAULT_MAX_DURATION_SEC,
      sampleRate
    });
    this.dispatcher = new ResultDispatcher({
      logger: this.logger,
      onCallbackError: (error) => {
        this.emitSafely('callbackError', error);
      }
    });
    this.worker = new InferenceWorker({
      queue: this.queue,
      policy: this.policy,
      engine: this.engine,
      results: this.dispatcher,
      sampleRate,
      logger: this.logger,
      latencyTracker: this.latencyTracker,
      onInferenceError: (error, chunkId) => {
        this.emitSafely('inferenceError', error, chunkId);
      }
    });
  }

  public getState(): PipelineState {
    return this.state;
  }

  public getMode(): PipelineMode {
    return this.policy.mode;
  }

  /** Queues audio and returns its chunk id; 0 means the input was empty and nothing was queued. */
  public submit(samples: ArrayLike<number>): number {
    this.assertOpen();
    return this.queue.push(samples);
  }

  public start(callback: ResultCallback, resultCheckIntervalMs = DEFAULT_RESULT_CHECK_INTERVAL_MS): void {
    this.assertOpen();

    if (!Number.isFinite(resultCheckIntervalMs) || resultCheckIntervalMs <= 0) {
      throw new PipelineError(
        'invalid_argument',
        `resultCheckIntervalMs must be a positive number, got ${resultCheckIntervalMs}`
      );
    }

    if (this.state === 'running') {
      return;
    }

    this.dispatcher.start(callback, resultCheckIntervalMs);
    this.worker.start();
    this.setState('running');
    this.logger?.info('Pipeline started', {
      mode: this.policy.mode,
      resultCheckIntervalMs,
      queuedChunks: this.queue.size
    });
  }

  /**
   * Drains the session: the worker's shutdown pass runs, then the dispatcher
   * delivers what is left. No callback runs after this resolves.
   */
  public async stop(): Promise<void> {
    if (this.stopPromise) {
      await this.stopPromise;
      return;
    }

    if (this.state === 'stopped') {
      return;
    }

    this.stopPromise = this.shutdownSession();

    try {
      await this.stopPromise;
    } finally {
      this.stopPromise = undefined;
    }
  }

  public setMaxDuration(durationSec: number, sampleRate = DEFAULT_SAMPLE_RATE): void {
    this.policy.setMaxDuration(durationSec, sampleRate);
    this.logger?.info('Accumulation window changed', { durationSec, sampleRate });
  }

  public getStats(): PipelineStats {
    const workerCounters = this.worker.getCounters();
    const dispatcherCounters = this.dispatcher.getCounters();

    return {
      state: this.state,
      mode: this.policy.mode,
      nextChunkId: this.queue.peekNextId(),
      queuedChunks: this.queue.size,
      queuedSamples: this.queue.sampleCount,
      bufferedSamples: this.policy.bufferedSamples(),
      pendingResults: this.dispatcher.pendingCount,
      ...workerCounters,
      ...dispatcherCounters
    };
  }

  /** Stops the session if one is running and releases the engine. */
  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    await this.stop();
    this.closed = true;
    this.queue.clear();
    await this.engine.close();
    this.logger?.info('Pipeline closed');
  }

  private async shutdownSession(): Promise<void> {
    await this.worker.stop();
    await this.dispatcher.finish();
    this.policy.reset();
    this.setState('stopped');

    this.logger?.info('Pipeline stopped', {
      ...this.getStats(),
      latencySummary: this.latencyTracker.summarize()
    });
    this.latencyTracker.reset();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new PipelineError('closed', 'Pipeline has been closed');
    }
  }

  private setState(next: PipelineState): void {
    this.state = next;
    this.emitSafely('stateChanged', next);
  }

  /** Listeners run inside the worker and dispatcher loops; a throwing one must not end them. */
  private emitSafely(event: 'stateChanged' | 'inferenceError' | 'callbackError', ...args: unknown[]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.logger?.error('Pipeline event listener failed', { event, detail: describeError(error) });
    }
  }
}
