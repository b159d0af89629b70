import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process';
import { z } from 'zod';
import type { Logger } from '../../logging/StructuredLogger';
import { ResponseFrameDecoder, encodeRequestFrame } from './framing';

const workerFrameSchema = z.object({
  id: z.string().optional(),
  ok: z.boolean().optional(),
  result: z.unknown().optional(),
  error: z.string().optional(),
  event: z.string().optional(),
  level: z.string().optional(),
  message: z.string().optional()
});

export type WorkerFrame = z.infer<typeof workerFrameSchema>;

interface PendingRequest {
  resolve: (value: unknown) => void;
  reject: (reason?: unknown) => void;
  timeoutHandle: NodeJS.Timeout | undefined;
}

export interface PersistentFramedWorkerOptions {
  name: string;
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Frames the worker sends without a request id, such as log events. */
  onEvent?: (frame: WorkerFrame) => void;
  onStderr?: (text: string) => void;
  /** Unexpected exits only; a `stop()` does not report here. */
  onExit?: (code: number | null, signal: NodeJS.Signals | null) => void;
}

/** What the engine needs from a worker process; tests substitute an in-process fake. */
export interface FramedTransport {
  start(): Promise<void>;
  request(payload: Record<string, unknown>, timeoutMs?: number, binaryData?: Buffer): Promise<unknown>;
  stop(): Promise<void>;
}

const STOP_GRACE_MS = 1500;

export class PersistentFramedWorker implements FramedTransport {
  private child: ChildProcessWithoutNullStreams | undefined;
  private startPromise: Promise<void> | undefined;
  private stopping = false;
  private nextRequestId = 0;
  private stderrBuffer = '';
  private readonly decoder = new ResponseFrameDecoder();
  private pending = new Map<string, PendingRequest>();
  private stdinWriteQueue: Promise<void> = Promise.resolve();

  public constructor(private readonly options: PersistentFramedWorkerOptions) {}

  public async start(): Promise<void> {
    if (this.child) {
      return;
    }

    if (this.startPromise) {
      await this.startPromise;
      return;
    }

    this.startPromise = this.spawnWorker();

    try {
      await this.startPromise;
    } finally {
      this.startPromise = undefined;
    }
  }

  /** `timeoutMs` of 0 or undefined waits for as long as the worker takes. */
  public async request(
    payload: Record<string, unknown>,
    timeoutMs?: number,
    binaryData?: Buffer
  ): Promise<unknown> {
    await this.start();

    const current = this.child;
    if (!current) {
      throw new Error(`${this.options.name} worker is not running`);
    }

    const requestId = `${Date.now()}-${++this.nextRequestId}`;
    const parts = encodeRequestFrame({ ...payload, id: requestId }, binaryData);

    return new Promise<unknown>((resolve, reject) => {
      const timeoutHandle =
        timeoutMs && timeoutMs > 0
          ? setTimeout(() => {
              this.pending.delete(requestId);
              reject(new Error(`${this.options.name} worker request timed out after ${timeoutMs}ms`));
            }, timeoutMs)
          : undefined;

      this.pending.set(requestId, { resolve, reject, timeoutHandle });

      this.stdinWriteQueue = this.stdinWriteQueue
        .then(async () => {
          for (const part of parts) {
            await new Promise<void>((writeResolve, writeReject) => {
              current.stdin.write(part, (error) => {
                if (error) {
                  writeReject(error);
                  return;
                }

                writeResolve();
              });
            });
          }
        })
        .catch((error) => {
          const pending = this.pending.get(requestId);
          if (!pending) {
            return;
          }

          clearTimeout(pending.timeoutHandle);
          this.pending.delete(requestId);
          pending.reject(error);
        });
    });
  }

  public async stop(): Promise<void> {
    this.stopping = true;

    const current = this.child;
    if (!current) {
      return;
    }

    await new Promise<void>((resolve) => {
      let settled = false;
      let graceHandle: NodeJS.Timeout | undefined;

      const finish = (): void => {
        if (settled) {
          return;
        }

        settled = true;
        clearTimeout(graceHandle);
        resolve();
      };

      current.once('close', () => {
        finish();
      });

      graceHandle = setTimeout(() => {
        if (!settled) {
          current.kill('SIGKILL');
          finish();
        }
      }, STOP_GRACE_MS);

      current.kill('SIGTERM');
    });

    this.child = undefined;
  }

  private async spawnWorker(): Promise<void> {
    this.stopping = false;

    await new Promise<void>((resolve, reject) => {
      const child = spawn(this.options.command, this.options.args, {
        env: this.options.env,
        stdio: 'pipe'
      });

      const onError = (error: Error): void => {
        this.child = undefined;
        reject(error);
      };

      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);
        child.on('error', (error) => {
          this.options.logger?.warn(`${this.options.name} worker process error`, { detail: error.message });
          this.rejectAllPending(error);
        });

        // EPIPE from a worker that died mid-write lands here.
        child.stdin.on('error', (error) => {
          this.options.logger?.warn(`${this.options.name} worker stdin closed`, { detail: error.message });
          this.rejectAllPending(error);
        });

        this.child = child;
        this.decoder.reset();
        this.stderrBuffer = '';
        this.stdinWriteQueue = Promise.resolve();

        child.stdout.on('data', (chunk: Buffer) => {
          this.handleStdoutChunk(chunk);
        });

        child.stderr.on('data', (chunk: Buffer) => {
          const text = chunk.toString();
          this.stderrBuffer = this.tailString(`${this.stderrBuffer}${text}`, 4000);
          this.options.onStderr?.(text);
        });

        child.on('close', (code, signal) => {
          if (this.stopping) {
            this.options.logger?.info(`${this.options.name} worker stopped`, {
              code,
              signal
            });
          } else {
            this.options.logger?.warn(`${this.options.name} worker exited`, {
              code,
              signal,
              stderr: this.stderrBuffer.trim()
            });
          }

          const unexpected = !this.stopping;
          this.child = undefined;
          this.rejectAllPending(
            new Error(`${this.options.name} worker exited (code=${code}, signal=${signal ?? 'none'})`)
          );

          if (unexpected) {
            this.options.onExit?.(code, signal);
          }
        });

        this.options.logger?.info(`${this.options.name} worker started`, {
          command: this.options.command
        });

        resolve();
      });
    });
  }

  private handleStdoutChunk(chunk: Buffer): void {
    for (const frame of this.decoder.push(chunk)) {
      if (frame.kind === 'invalid_length') {
        this.options.logger?.warn(`${this.options.name} framed worker produced invalid response length`, {
          jsonLength: frame.jsonLength
        });
        continue;
      }

      this.handleFrame(frame.json);
    }
  }

  private handleFrame(responseJson: string): void {
    let raw: unknown;
    try {
      raw = JSON.parse(responseJson);
    } catch {
      this.options.logger?.debug(`${this.options.name} worker emitted invalid framed JSON`, {
        responseJson
      });
      return;
    }

    const parsed = workerFrameSchema.safeParse(raw);
    if (!parsed.success) {
      this.options.logger?.debug(`${this.options.name} worker emitted malformed frame`, {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
      return;
    }

    const frame = parsed.data;
    if (!frame.id) {
      if (frame.event) {
        this.options.onEvent?.(frame);
        return;
      }

      this.options.logger?.debug(`${this.options.name} worker response missing id`, {
        responseJson
      });
      return;
    }

    const pending = this.pending.get(frame.id);
    if (!pending) {
      this.options.logger?.debug(`${this.options.name} worker response for unknown request`, {
        responseId: frame.id
      });
      return;
    }

    clearTimeout(pending.timeoutHandle);
    this.pending.delete(frame.id);

    if (frame.ok === false) {
      pending.reject(new Error(frame.error ?? `${this.options.name} worker request failed`));
      return;
    }

    pending.resolve(frame.result);
  }

  private rejectAllPending(error: Error): void {
    const entries = Array.from(this.pending.values());
    this.pending.clear();

    for (const entry of entries) {
      clearTimeout(entry.timeoutHandle);
      entry.reject(error);
    }
  }

  private tailString(value: string, maxLength: number): string {
    if (value.length <= maxLength) {
      return value;
    }

    return value.slice(value.length - maxLength);
  }
}
