import { describe, expect, it, vi } from 'vitest';
import { ResultDispatcher, formatResultText } from '../../src/core/ResultDispatcher';
import { WakeSignal } from '../../src/core/WakeSignal';
import { CallbackError } from '../../src/errors';
import { RecordingLogger, segment } from '../helpers/fakes';

describe('formatResultText', () => {
  it('joins segment texts and trims the ends', () => {
    expect(formatResultText([segment(' Hello'), segment(' world ')])).toBe('Hello world');
  });

  it('returns an empty string for whitespace-only segments', () => {
    expect(formatResultText([segment('  '), segment('\n')])).toBe('');
    expect(formatResultText([])).toBe('');
  });
});

/** Drops every notify, as if each one landed just before the loop started waiting. */
class DeafSignal extends WakeSignal {
  public notify(): void {}
}

describe('ResultDispatcher', () => {
  it('picks up a result whose wake-up was missed on the next interval tick', async () => {
    const dispatcher = new ResultDispatcher({ signal: new DeafSignal() });
    const callback = vi.fn();
    dispatcher.start(callback, 20);

    dispatcher.enqueue({ chunkId: 1, segments: [segment(' late')], isPartial: false });
    await vi.waitFor(() => expect(callback).toHaveBeenCalledTimes(1));
    await dispatcher.finish();

    expect(callback).toHaveBeenCalledWith(1, 'late', false, [segment(' late')]);
    expect(dispatcher.pendingCount).toBe(0);
  });

  it('delivers queued results in order before finishing', async () => {
    const dispatcher = new ResultDispatcher();
    const delivered: Array<[number, string, boolean]> = [];
    dispatcher.enqueue({ chunkId: 1, segments: [segment(' one')], isPartial: true });
    dispatcher.enqueue({ chunkId: 2, segments: [segment(' two')], isPartial: false });

    dispatcher.start((chunkId, text, isPartial) => {
      delivered.push([chunkId, text, isPartial]);
    }, 5);
    await dispatcher.finish();

    expect(delivered).toEqual([
      [1, 'one', true],
      [2, 'two', false]
    ]);
    expect(dispatcher.pendingCount).toBe(0);
    expect(dispatcher.getCounters()).toEqual({ deliveredResults: 2, suppressedResults: 0, callbackErrors: 0 });
  });

  it('passes the raw segments through to the callback', async () => {
    const dispatcher = new ResultDispatcher();
    const callback = vi.fn();
    const segments = [segment(' a'), segment(' b')];
    dispatcher.enqueue({ chunkId: 7, segments, isPartial: false });

    dispatcher.start(callback, 5);
    await dispatcher.finish();

    expect(callback).toHaveBeenCalledWith(7, 'a b', false, segments);
  });

  it('suppresses results whose text is empty', async () => {
    const dispatcher = new ResultDispatcher();
    const callback = vi.fn();
    dispatcher.enqueue({ chunkId: 1, segments: [segment('   ')], isPartial: false });
    dispatcher.enqueue({ chunkId: 2, segments: [segment('kept')], isPartial: false });

    dispatcher.start(callback, 5);
    await dispatcher.finish();

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(2, 'kept', false, [segment('kept')]);
    expect(dispatcher.getCounters().suppressedResults).toBe(1);
  });

  it('waits for an async callback before delivering the next result', async () => {
    const dispatcher = new ResultDispatcher();
    const events: string[] = [];
    dispatcher.enqueue({ chunkId: 1, segments: [segment('a')], isPartial: false });
    dispatcher.enqueue({ chunkId: 2, segments: [segment('b')], isPartial: false });

    dispatcher.start(async (chunkId) => {
      events.push(`start ${chunkId}`);
      await new Promise<void>((resolve) => setTimeout(resolve, 15));
      events.push(`end ${chunkId}`);
    }, 5);
    await dispatcher.finish();

    expect(events).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('picks up results enqueued while running', async () => {
    const dispatcher = new ResultDispatcher();
    const callback = vi.fn();
    dispatcher.start(callback, 1000);

    dispatcher.enqueue({ chunkId: 3, segments: [segment('late')], isPartial: true });
    await vi.waitFor(() => {
      expect(callback).toHaveBeenCalledWith(3, 'late', true, [segment('late')]);
    });

    await dispatcher.finish();
  });

  it('keeps delivering after a callback throws', async () => {
    const logger = new RecordingLogger();
    const failures: CallbackError[] = [];
    const dispatcher = new ResultDispatcher({
      logger,
      onCallbackError: (error) => {
        failures.push(error);
      }
    });
    const delivered: number[] = [];
    dispatcher.enqueue({ chunkId: 1, segments: [segment('bad')], isPartial: false });
    dispatcher.enqueue({ chunkId: 2, segments: [segment('good')], isPartial: false });

    dispatcher.start((chunkId) => {
      if (chunkId === 1) {
        throw new Error('listener exploded');
      }
      delivered.push(chunkId);
    }, 5);
    await dispatcher.finish();

    expect(delivered).toEqual([2]);
    expect(failures).toHaveLength(1);
    expect(failures[0].chunkId).toBe(1);
    expect(failures[0].message).toBe('Result callback failed for chunk 1: listener exploded');
    expect(logger.at('error')).toEqual([
      {
        level: 'error',
        message: 'Result callback failed',
        context: { chunkId: 1, isPartial: false, detail: 'Result callback failed for chunk 1: listener exploded' }
      }
    ]);
    expect(dispatcher.getCounters()).toEqual({ deliveredResults: 1, suppressedResults: 0, callbackErrors: 1 });
  });

  it('finishes immediately when never started', async () => {
    const dispatcher = new ResultDispatcher();

    await expect(dispatcher.finish()).resolves.toBeUndefined();
  });
});
