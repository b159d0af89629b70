export type PipelineMode = 'immediate' | 'windowed';
export type PipelineState = 'stopped' | 'running';
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface Token {
  id: number;
  logProb: number;
  startTicks: number;
  endTicks: number;
  text: string;
}

export interface Segment {
  text: string;
  startTicks: number;
  endTicks: number;
  tokens: Token[];
}

export interface AudioChunk {
  readonly id: number;
  readonly samples: Float32Array;
  readonly submittedAtMs: number;
}

/**
 * Outcome of one engine call. `chunkId` names the last submitted chunk folded
 * into the call, so several chunks may share one result.
 */
export interface TranscriptionResult {
  chunkId: number;
  segments: Segment[];
  isPartial: boolean;
}

export type ResultCallback = (
  chunkId: number,
  text: string,
  isPartial: boolean,
  segments: Segment[]
) => void | Promise<void>;

export interface PipelineStats {
  state: PipelineState;
  mode: PipelineMode;
  nextChunkId: number;
  queuedChunks: number;
  queuedSamples: number;
  bufferedSamples: number;
  pendingResults: number;
  inferenceCalls: number;
  failedInferences: number;
  emptyInferences: number;
  deliveredResults: number;
  suppressedResults: number;
  callbackErrors: number;
}

export interface AppConfig {
  modelPath: string;
  engineBin: string;
  useGpu: boolean;
  engineThreads: number;
  mode: PipelineMode;
  maxDurationSec: number;
  sampleRate: number;
  resultCheckIntervalMs: number;
  chunkMs: number;
  inferenceTimeoutMs: number;
  logDir: string;
  logLevel: LogLevelName;
}
