import fs from 'node:fs/promises';
import path from 'node:path';
import type { LogLevelName } from '../types';

export type LogLevel = LogLevelName;

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

export interface StructuredLoggerOptions {
  level?: LogLevel;
  console?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const CONSOLE_PREFIX = '[streamscribe]';

interface LogSink {
  filePath: string | undefined;
  writeQueue: Promise<void>;
}

export class StructuredLogger implements Logger {
  private constructor(
    private readonly sink: LogSink,
    private readonly minLevel: LogLevel,
    private readonly mirrorToConsole: boolean,
    private readonly boundContext: LogContext
  ) {}

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `streamscribe-${datePrefix}.log`);

    return new StructuredLogger(
      { filePath, writeQueue: Promise.resolve() },
      options.level ?? 'info',
      options.console ?? true,
      {}
    );
  }

  /** Console-only logger, for embedding the pipeline without a log directory. */
  public static console(level: LogLevel = 'info'): StructuredLogger {
    return new StructuredLogger({ filePath: undefined, writeQueue: Promise.resolve() }, level, true, {});
  }

  public getLogPath(): string | undefined {
    return this.sink.filePath;
  }

  /** Children share the parent's file and write queue, so lines stay in order. */
  public child(context: LogContext): StructuredLogger {
    return new StructuredLogger(this.sink, this.minLevel, this.mirrorToConsole, {
      ...this.boundContext,
      ...context
    });
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  public async flush(): Promise<void> {
    await this.sink.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const merged = { ...this.boundContext, ...context };
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...merged
    };

    if (this.sink.filePath) {
      this.append(`${JSON.stringify(entry)}\n`);
    }

    if (!this.mirrorToConsole) {
      return;
    }

    if (level === 'error') {
      console.error(`${CONSOLE_PREFIX} ${message}`, merged);
      return;
    }

    if (level === 'warn') {
      console.warn(`${CONSOLE_PREFIX} ${message}`, merged);
      return;
    }

    console.log(`${CONSOLE_PREFIX} ${message}`, merged);
  }

  private append(line: string): void {
    const filePath = this.sink.filePath;
    if (!filePath) {
      return;
    }

    this.sink.writeQueue = this.sink.writeQueue
      .then(async () => {
        await fs.appendFile(filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`${CONSOLE_PREFIX} Failed to write log file: ${detail}`);
      });
  }
}
