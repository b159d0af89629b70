import path from 'node:path';
import type { AppConfig, LogLevelName, PipelineMode } from './types';

export const DEFAULT_SAMPLE_RATE = 16000;
export const DEFAULT_MAX_DURATION_SEC = 10;
export const DEFAULT_RESULT_CHECK_INTERVAL_MS = 100;

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseFloatOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseBoolOrDefault = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }

  return value.toLowerCase() === 'true';
};

const resolveMode = (value: string | undefined): PipelineMode => {
  if (value === 'immediate') {
    return 'immediate';
  }

  return 'windowed';
};

const resolveLogLevel = (value: string | undefined): LogLevelName => {
  if (value === 'debug' || value === 'warn' || value === 'error' || value === 'info') {
    return value;
  }

  return 'info';
};

export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const rootDir = path.resolve(__dirname, '..');

  return {
    modelPath: env.STREAMSCRIBE_MODEL_PATH ?? path.join(rootDir, 'models', 'ggml-base.en.bin'),
    engineBin:
      env.STREAMSCRIBE_ENGINE_BIN ??
      path.join(rootDir, 'native', 'whisper_worker', 'target', 'release', 'streamscribe-whisper-worker'),
    useGpu: parseBoolOrDefault(env.STREAMSCRIBE_USE_GPU, false),
    engineThreads: parseIntOrDefault(env.STREAMSCRIBE_ENGINE_THREADS, 4),
    mode: resolveMode(env.STREAMSCRIBE_MODE),
    maxDurationSec: parseFloatOrDefault(env.STREAMSCRIBE_MAX_DURATION_SEC, DEFAULT_MAX_DURATION_SEC),
    sampleRate: parseIntOrDefault(env.STREAMSCRIBE_SAMPLE_RATE, DEFAULT_SAMPLE_RATE),
    resultCheckIntervalMs: parseIntOrDefault(
      env.STREAMSCRIBE_RESULT_CHECK_INTERVAL_MS,
      DEFAULT_RESULT_CHECK_INTERVAL_MS
    ),
    chunkMs: parseIntOrDefault(env.STREAMSCRIBE_CHUNK_MS, 500),
    inferenceTimeoutMs: parseIntOrDefault(env.STREAMSCRIBE_INFERENCE_TIMEOUT_MS, 0),
    logDir: env.STREAMSCRIBE_LOG_DIR ?? path.join(rootDir, 'logs'),
    logLevel: resolveLogLevel(env.STREAMSCRIBE_LOG_LEVEL)
  };
};

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!['immediate', 'windowed'].includes(config.mode)) {
    errors.push('STREAMSCRIBE_MODE must be one of: immediate, windowed.');
  }

  if (!config.modelPath.trim()) {
    errors.push('STREAMSCRIBE_MODEL_PATH must not be empty.');
  }

  if (!config.engineBin.trim()) {
    errors.push('STREAMSCRIBE_ENGINE_BIN must not be empty.');
  }

  if (config.engineThreads < 1 || config.engineThreads > 64) {
    errors.push('STREAMSCRIBE_ENGINE_THREADS must be between 1 and 64.');
  }

  if (config.maxDurationSec <= 0 || config.maxDurationSec > 600) {
    errors.push('STREAMSCRIBE_MAX_DURATION_SEC must be greater than 0 and at most 600 seconds.');
  }

  if (config.sampleRate < 8000 || config.sampleRate > 48000) {
    errors.push('STREAMSCRIBE_SAMPLE_RATE must be between 8000 and 48000 Hz.');
  }

  if (config.resultCheckIntervalMs < 1 || config.resultCheckIntervalMs > 10000) {
    errors.push('STREAMSCRIBE_RESULT_CHECK_INTERVAL_MS must be between 1 and 10000 milliseconds.');
  }

  if (config.chunkMs < 20 || config.chunkMs > 30000) {
    errors.push('STREAMSCRIBE_CHUNK_MS must be between 20 and 30000 milliseconds.');
  }

  if (config.inferenceTimeoutMs < 0) {
    errors.push('STREAMSCRIBE_INFERENCE_TIMEOUT_MS must be 0 (no timeout) or a positive number.');
  }

  if (config.mode === 'windowed' && config.maxDurationSec < 1) {
    errors.push(
      'STREAMSCRIBE_MAX_DURATION_SEC below 1 second makes every windowed result final; use immediate mode instead.'
    );
  }

  return errors;
};
