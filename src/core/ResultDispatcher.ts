import { DEFAULT_RESULT_CHECK_INTERVAL_MS } from '../config';
import { CallbackError } from '../errors';
import type { Logger } from '../logging/StructuredLogger';
import type { ResultCallback, Segment, TranscriptionResult } from '../types';
import { WakeSignal } from './WakeSignal';

export const formatResultText = (segments: Segment[]): string =>
  segments
    .map((segment) => segment.text)
    .join('')
    .trim();

export interface DispatcherCounters {
  deliveredResults: number;
  suppressedResults: number;
  callbackErrors: number;
}

export interface ResultDispatcherOptions {
  logger?: Logger;
  signal?: WakeSignal;
  onCallbackError?: (error: CallbackError) => void;
}

/**
 * Sole caller of the result callback. Wakes on new results or every
 * `checkIntervalMs`, whichever comes first.
 */
export class ResultDispatcher {
  private pending: TranscriptionResult[] = [];
  private readonly signal: WakeSignal;
  private active = false;
  private loopPromise: Promise<void> | undefined;
  private readonly counters: DispatcherCounters = {
    deliveredResults: 0,
    suppressedResults: 0,
    callbackErrors: 0
  };

  public constructor(private readonly options: ResultDispatcherOptions = {}) {
    this.signal = options.signal ?? new WakeSignal();
  }

  public enqueue(result: TranscriptionResult): void {
    this.pending.push(result);
    this.signal.notify();
  }

  public get pendingCount(): number {
    return this.pending.length;
  }

  public getCounters(): DispatcherCounters {
    return { ...this.counters };
  }

  public start(callback: ResultCallback, checkIntervalMs = DEFAULT_RESULT_CHECK_INTERVAL_MS): void {
    if (this.loopPromise) {
      return;
    }

    this.active = true;
    this.loopPromise = this.run(callback, checkIntervalMs);
  }

  /** Lets the loop deliver everything still queued, then resolves once it has exited. */
  public async finish(): Promise<void> {
    this.active = false;
    this.signal.notify();

    const current = this.loopPromise;
    if (!current) {
      return;
    }

    try {
      await current;
    } finally {
      this.loopPromise = undefined;
      this.signal.reset();
    }
  }

  private async run(callback: ResultCallback, checkIntervalMs: number): Promise<void> {
    while (true) {
      if (this.pending.length === 0) {
        if (!this.active) {
          break;
        }

        await this.signal.wait(checkIntervalMs);
        continue;
      }

      const batch = this.pending;
      this.pending = [];

      for (const result of batch) {
        await this.deliver(result, callback);
      }
    }
  }

  private async deliver(result: TranscriptionResult, callback: ResultCallback): Promise<void> {
    const text = formatResultText(result.segments);
    if (!text) {
      this.counters.suppressedResults += 1;
      this.options.logger?.debug('Suppressed empty transcription', { chunkId: result.chunkId });
      return;
    }

    try {
      await callback(result.chunkId, text, result.isPartial, result.segments);
      this.counters.deliveredResults += 1;
    } catch (error) {
      this.counters.callbackErrors += 1;
      const failure = new CallbackError(result.chunkId, error);
      this.options.logger?.error('Result callback failed', {
        chunkId: result.chunkId,
        isPartial: result.isPartial,
        detail: failure.message
      });
      this.options.onCallbackError?.(failure);
    }
  }
}
