export type PipelineErrorCode = 'invalid_argument' | 'unsupported_mode' | 'closed';

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** The engine could not be loaded. Fatal to pipeline construction. */
export class EngineInitError extends Error {
  public constructor(
    message: string,
    public readonly modelPath?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'EngineInitError';
  }
}

/** A single engine call failed. The worker recovers and moves on to the next chunk. */
export class InferenceError extends Error {
  public constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'InferenceError';
  }
}

export class CallbackError extends Error {
  public constructor(
    public readonly chunkId: number,
    public readonly cause: unknown
  ) {
    super(`Result callback failed for chunk ${chunkId}: ${describeError(cause)}`);
    this.name = 'CallbackError';
  }
}

export class PipelineError extends Error {
  public constructor(
    public readonly code: PipelineErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
