export { TranscriptionPipeline } from './core/TranscriptionPipeline';
export type { TranscriptionPipelineOptions } from './core/TranscriptionPipeline';
export {
  ImmediatePolicy,
  WindowedPolicy,
  createPolicy,
  MIN_INFERENCE_SECONDS
} from './core/AccumulationPolicy';
export type { AccumulationPolicy, InferenceJob, WindowedPolicyOptions } from './core/AccumulationPolicy';
export { formatResultText } from './core/ResultDispatcher';
export { transcribeOnce } from './services/engine/SpeechEngine';
export type { EngineLoader, EngineLogLevel, EngineLogSink, SpeechEngine } from './services/engine/SpeechEngine';
export { WhisperProcessEngine, openWhisperEngine, parseTranscribeResult } from './services/engine/WhisperProcessEngine';
export type { TransportFactory, TransportHandlers, WhisperEngineOptions } from './services/engine/WhisperProcessEngine';
export { createEngineLogSink } from './services/engine/engineLogSink';
export { StructuredLogger } from './logging/StructuredLogger';
export type { Logger, LogContext } from './logging/StructuredLogger';
export { resolveConfig, validateConfig, DEFAULT_SAMPLE_RATE, DEFAULT_MAX_DURATION_SEC } from './config';
export { CallbackError, EngineInitError, InferenceError, PipelineError } from './errors';
export type { PipelineErrorCode } from './errors';
export type {
  AppConfig,
  AudioChunk,
  PipelineMode,
  PipelineState,
  PipelineStats,
  ResultCallback,
  Segment,
  Token,
  TranscriptionResult
} from './types';
