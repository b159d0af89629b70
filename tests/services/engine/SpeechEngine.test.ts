import { describe, expect, it } from 'vitest';
import { transcribeOnce } from '../../../src/services/engine/SpeechEngine';
import { FakeEngine } from '../../helpers/fakes';

describe('transcribeOnce', () => {
  it('returns no segments for empty audio without calling the engine', async () => {
    const engine = new FakeEngine();

    await expect(transcribeOnce(engine, [])).resolves.toEqual([]);
    expect(engine.calls).toEqual([]);
  });

  it('accepts plain number arrays', async () => {
    const engine = new FakeEngine();

    const segments = await transcribeOnce(engine, [0, 0.5, 1]);

    expect(segments.map((segment) => segment.text)).toEqual(['heard 3']);
    expect(engine.calls).toEqual([3]);
  });
});
