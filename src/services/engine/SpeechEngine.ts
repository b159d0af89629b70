import type { Segment } from '../../types';

export type EngineLogLevel = 'none' | 'info' | 'warn' | 'error' | 'debug' | 'cont';

/** Receives the engine's own diagnostic output. */
export type EngineLogSink = (level: EngineLogLevel, message: string) => void;

/**
 * Speech-to-text primitive behind the pipeline. Samples are mono float32 at the
 * rate the engine was opened with; a rejected `transcribe` is an inference failure.
 */
export interface SpeechEngine {
  transcribe(samples: Float32Array): Promise<Segment[]>;
  close(): Promise<void>;
}

export type EngineLoader = () => Promise<SpeechEngine>;

/** One-shot transcription outside of a streaming session. */
export const transcribeOnce = async (engine: SpeechEngine, samples: ArrayLike<number>): Promise<Segment[]> => {
  if (samples.length === 0) {
    return [];
  }

  return engine.transcribe(samples instanceof Float32Array ? samples : Float32Array.from(samples));
};
