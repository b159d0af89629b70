import { describe, expect, it } from 'vitest';
import { createEngineLogSink } from '../../../src/services/engine/engineLogSink';
import { RecordingLogger } from '../../helpers/fakes';

describe('createEngineLogSink', () => {
  it('logs each non-empty line at debug with its engine level', () => {
    const logger = new RecordingLogger();
    const sink = createEngineLogSink(logger);

    sink('info', 'whisper_model_load: loading\n\n  n_vocab = 51864  \n');

    expect(logger.entries).toEqual([
      { level: 'debug', message: 'Engine log', context: { source: 'whisper', level: 'info', detail: 'whisper_model_load: loading' } },
      { level: 'debug', message: 'Engine log', context: { source: 'whisper', level: 'info', detail: 'n_vocab = 51864' } }
    ]);
  });

  it('keeps warnings and errors at their own level', () => {
    const logger = new RecordingLogger();
    const sink = createEngineLogSink(logger, 'test-engine');

    sink('warn', 'slow decode');
    sink('error', 'out of memory');

    expect(logger.entries).toEqual([
      { level: 'warn', message: 'Engine log', context: { source: 'test-engine', detail: 'slow decode' } },
      { level: 'error', message: 'Engine log', context: { source: 'test-engine', detail: 'out of memory' } }
    ]);
  });
});
