import { z } from 'zod';
import { DEFAULT_SAMPLE_RATE } from '../../config';
import { EngineInitError, InferenceError, describeError } from '../../errors';
import type { Logger } from '../../logging/StructuredLogger';
import type { Segment } from '../../types';
import { type FramedTransport, PersistentFramedWorker, type WorkerFrame } from '../process/PersistentFramedWorker';
import { float32ToLeBuffer } from '../process/framing';
import type { EngineLogLevel, EngineLogSink, SpeechEngine } from './SpeechEngine';

// Wire names follow whisper.cpp's token and segment fields.
const tokenSchema = z.object({
  id: z.number().int(),
  p: z.number(),
  t0: z.number(),
  t1: z.number(),
  text: z.string()
});

const segmentSchema = z.object({
  text: z.string(),
  start: z.number(),
  end: z.number(),
  tokens: z.array(tokenSchema).default([])
});

const transcribeResultSchema = z.object({
  segments: z.array(segmentSchema)
});

const engineLogLevelSchema = z.enum(['none', 'info', 'warn', 'error', 'debug', 'cont']);

export interface WhisperEngineOptions {
  binaryPath: string;
  modelPath: string;
  useGpu?: boolean;
  threads?: number;
  sampleRate?: number;
  /** 0 or undefined means an engine call may take as long as it needs. */
  inferenceTimeoutMs?: number;
  loadTimeoutMs?: number;
  logSink?: EngineLogSink;
  logger?: Logger;
}

export const parseTranscribeResult = (value: unknown): Segment[] => {
  const parsed = transcribeResultSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new InferenceError(`Engine returned an invalid transcription payload (${detail})`);
  }

  return parsed.data.segments.map((segment) => ({
    text: segment.text,
    startTicks: segment.start,
    endTicks: segment.end,
    tokens: segment.tokens.map((token) => ({
      id: token.id,
      logProb: token.p,
      startTicks: token.t0,
      endTicks: token.t1,
      text: token.text
    }))
  }));
};

export interface TransportHandlers {
  onEvent: (frame: WorkerFrame) => void;
  onStderr: (text: string) => void;
  onExit: (code: number | null, signal: NodeJS.Signals | null) => void;
}

export type TransportFactory = (options: WhisperEngineOptions, handlers: TransportHandlers) => FramedTransport;

const spawnWhisperWorker: TransportFactory = (options, handlers) =>
  new PersistentFramedWorker({
    name: 'whisper',
    command: options.binaryPath,
    args: [
      '--model',
      options.modelPath,
      '--threads',
      String(options.threads ?? 4),
      ...(options.useGpu ? ['--gpu'] : []),
      '--serve'
    ],
    logger: options.logger,
    onEvent: handlers.onEvent,
    onStderr: handlers.onStderr,
    onExit: handlers.onExit
  });

/**
 * whisper.cpp served by a long-lived native worker over the framed
 * stdin/stdout protocol. The worker loads the model on `load`; a worker
 * that exits mid-session is respawned and reloaded on the next `transcribe`.
 */
export class WhisperProcessEngine implements SpeechEngine {
  private readonly transport: FramedTransport;
  private readonly sampleRate: number;
  private loaded = false;
  private needsReload = false;

  public constructor(
    private readonly options: WhisperEngineOptions,
    createTransport: TransportFactory = spawnWhisperWorker
  ) {
    this.sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    this.transport = createTransport(options, {
      onEvent: (frame) => {
        this.handleEvent(frame);
      },
      onStderr: (text) => {
        this.forwardLog('info', text);
      },
      onExit: (code, signal) => {
        this.handleWorkerExit(code, signal);
      }
    });
  }

  public async load(): Promise<void> {
    if (this.loaded) {
      return;
    }

    try {
      await this.sendLoad();
    } catch (error) {
      await this.transport.stop().catch((stopError: unknown) => {
        this.options.logger?.debug('Failed to stop whisper worker after load failure', {
          detail: describeError(stopError)
        });
      });
      throw new EngineInitError(
        `Failed to load whisper model '${this.options.modelPath}': ${describeError(error)}`,
        this.options.modelPath,
        error
      );
    }

    this.loaded = true;
    this.options.logger?.info('Whisper model loaded', {
      modelPath: this.options.modelPath,
      useGpu: this.options.useGpu ?? false,
      sampleRate: this.sampleRate
    });
  }

  public async transcribe(samples: Float32Array): Promise<Segment[]> {
    if (samples.length === 0) {
      return [];
    }

    if (this.needsReload) {
      await this.reload();
    }

    if (!this.loaded) {
      throw new InferenceError('Whisper engine is not loaded');
    }

    let response: unknown;
    try {
      response = await this.transport.request(
        { action: 'transcribe', sampleRate: this.sampleRate, samples: samples.length },
        this.options.inferenceTimeoutMs,
        float32ToLeBuffer(samples)
      );
    } catch (error) {
      throw new InferenceError(`Whisper inference failed: ${describeError(error)}`, error);
    }

    return parseTranscribeResult(response);
  }

  public async close(): Promise<void> {
    this.loaded = false;
    this.needsReload = false;
    await this.transport.stop();
  }

  private async sendLoad(): Promise<void> {
    await this.transport.start();
    await this.transport.request(
      { action: 'load', sampleRate: this.sampleRate, useGpu: this.options.useGpu ?? false },
      this.options.loadTimeoutMs ?? 60000
    );
  }

  private async reload(): Promise<void> {
    this.options.logger?.warn('Reloading whisper model after worker restart', {
      modelPath: this.options.modelPath
    });

    try {
      await this.sendLoad();
    } catch (error) {
      throw new InferenceError(`Failed to reload whisper model: ${describeError(error)}`, error);
    }

    this.needsReload = false;
    this.loaded = true;
  }

  private handleWorkerExit(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.loaded) {
      return;
    }

    this.loaded = false;
    this.needsReload = true;
    this.options.logger?.warn('Whisper worker exited; model will be reloaded', { code, signal });
  }

  private handleEvent(frame: WorkerFrame): void {
    if (frame.event !== 'log' || frame.message === undefined) {
      this.options.logger?.debug('Ignoring whisper worker event', { event: frame.event });
      return;
    }

    const level = engineLogLevelSchema.safeParse(frame.level);
    this.forwardLog(level.success ? level.data : 'info', frame.message);
  }

  private forwardLog(level: EngineLogLevel, message: string): void {
    this.options.logSink?.(level, message);
  }
}

export const openWhisperEngine = async (
  options: WhisperEngineOptions,
  createTransport?: TransportFactory
): Promise<WhisperProcessEngine> => {
  const engine = new WhisperProcessEngine(options, createTransport);
  await engine.load();
  return engine;
};
