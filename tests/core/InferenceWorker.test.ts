import { describe, expect, it, vi } from 'vitest';
import { ImmediatePolicy, WindowedPolicy } from '../../src/core/AccumulationPolicy';
import { AudioQueue } from '../../src/core/AudioQueue';
import { InferenceWorker } from '../../src/core/InferenceWorker';
import { InferenceError } from '../../src/errors';
import { LatencyTracker } from '../../src/perf/LatencyTracker';
import type { TranscriptionResult } from '../../src/types';
import { FakeEngine, RecordingLogger, segment } from '../helpers/fakes';

describe('InferenceWorker', () => {
  it('skips failed and empty inferences and keeps going', async () => {
    const queue = new AudioQueue();
    const results: TranscriptionResult[] = [];
    const failures: Array<[string, number]> = [];
    const logger = new RecordingLogger();
    const latencyTracker = new LatencyTracker();
    const engine = new FakeEngine((samples) => {
      if (samples[0] === 1) {
        throw new Error('boom');
      }
      return samples[0] === 2 ? [] : [segment(' fine')];
    });
    const worker = new InferenceWorker({
      queue,
      policy: new ImmediatePolicy(),
      engine,
      results: { enqueue: (result) => results.push(result) },
      sampleRate: 16000,
      logger,
      latencyTracker,
      onInferenceError: (error, chunkId) => {
        failures.push([error.message, chunkId]);
      }
    });

    worker.start();
    queue.push([1]);
    queue.push([2]);
    queue.push([3]);
    await vi.waitFor(() => expect(engine.calls).toHaveLength(3));
    await worker.stop();

    expect(engine.calls).toEqual([1, 1, 1]);
    expect(results).toEqual([{ chunkId: 3, segments: [segment(' fine')], isPartial: false }]);
    expect(failures).toEqual([['Engine inference failed: boom', 1]]);
    expect(worker.getCounters()).toEqual({ inferenceCalls: 3, failedInferences: 1, emptyInferences: 1 });
    expect(latencyTracker.summarize().inferences).toBe(2);
    expect(logger.at('warn')).toEqual([
      {
        level: 'warn',
        message: 'Inference failed; skipping cycle',
        context: { chunkId: 1, samples: 1, detail: 'Engine inference failed: boom' }
      }
    ]);
  });

  it('passes engine InferenceErrors through unwrapped', async () => {
    const queue = new AudioQueue();
    const original = new InferenceError('decoder crashed');
    const seen: InferenceError[] = [];
    const worker = new InferenceWorker({
      queue,
      policy: new ImmediatePolicy(),
      engine: new FakeEngine(() => {
        throw original;
      }),
      results: { enqueue: () => undefined },
      sampleRate: 16000,
      onInferenceError: (error) => {
        seen.push(error);
      }
    });

    queue.push([0.5]);
    worker.start();
    await worker.stop();

    expect(seen).toEqual([original]);
  });

  it('runs a forced-final pass over the window on stop', async () => {
    const queue = new AudioQueue();
    const results: TranscriptionResult[] = [];
    const engine = new FakeEngine();
    const worker = new InferenceWorker({
      queue,
      policy: new WindowedPolicy({ maxDurationSec: 10, sampleRate: 16000 }),
      engine,
      results: { enqueue: (result) => results.push(result) },
      sampleRate: 16000
    });

    queue.push(new Float32Array(20000));
    worker.start();
    await worker.stop();

    expect(engine.calls).toEqual([20000, 20000]);
    expect(results.map((result) => [result.chunkId, result.isPartial])).toEqual([
      [1, true],
      [1, false]
    ]);
  });

  it('leaves queued chunks for the next session when stopped in immediate mode', async () => {
    const queue = new AudioQueue();
    const results: TranscriptionResult[] = [];
    const engine = new FakeEngine(async (samples) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return [segment(`heard ${samples[0]}`)];
    });
    const logger = new RecordingLogger();
    const worker = new InferenceWorker({
      queue,
      policy: new ImmediatePolicy(),
      engine,
      results: { enqueue: (result) => results.push(result) },
      sampleRate: 16000,
      logger
    });

    queue.push([1]);
    queue.push([2]);
    queue.push([3]);
    worker.start();
    await worker.stop();

    expect(engine.calls).toEqual([1]);
    expect(results.map((result) => result.chunkId)).toEqual([1]);
    expect(queue.size).toBe(2);
    expect(logger.entries.find((entry) => entry.message === 'Inference worker shutdown pass')).toEqual({
      level: 'debug',
      message: 'Inference worker shutdown pass',
      context: { mode: 'immediate', queuedChunks: 2, bufferedSamples: 0 }
    });

    worker.start();
    await vi.waitFor(() => expect(engine.calls).toHaveLength(3));
    await worker.stop();

    expect(results.map((result) => result.chunkId)).toEqual([1, 2, 3]);
    expect(queue.size).toBe(0);
  });

  it('folds still-queued chunks into the final window on stop', async () => {
    const queue = new AudioQueue();
    const results: TranscriptionResult[] = [];
    const engine = new FakeEngine(async (samples) => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      return [segment(`heard ${samples.length}`)];
    });
    const worker = new InferenceWorker({
      queue,
      policy: new WindowedPolicy({ maxDurationSec: 10, sampleRate: 16000 }),
      engine,
      results: { enqueue: (result) => results.push(result) },
      sampleRate: 16000
    });

    queue.push(new Float32Array(16000));
    worker.start();
    queue.push(new Float32Array(4000));
    await worker.stop();

    expect(engine.calls).toEqual([16000, 20000]);
    expect(results.map((result) => [result.chunkId, result.isPartial])).toEqual([
      [1, true],
      [2, false]
    ]);
    expect(queue.size).toBe(0);
  });

  it('stops cleanly when it was never started', async () => {
    const worker = new InferenceWorker({
      queue: new AudioQueue(),
      policy: new ImmediatePolicy(),
      engine: new FakeEngine(),
      results: { enqueue: () => undefined },
      sampleRate: 16000
    });

    await expect(worker.stop()).resolves.toBeUndefined();
    expect(worker.getCounters().inferenceCalls).toBe(0);
  });
});
