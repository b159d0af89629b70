#!/usr/bin/env node
import fs from 'node:fs';
import type { Readable } from 'node:stream';
import { setTimeout as sleep } from 'node:timers/promises';
import dotenv from 'dotenv';
import { runStartupChecks } from '../bootstrap/startupChecks';
import { resolveConfig, validateConfig } from '../config';
import { formatResultText } from '../core/ResultDispatcher';
import { TranscriptionPipeline } from '../core/TranscriptionPipeline';
import { StructuredLogger } from '../logging/StructuredLogger';
import { PcmChunker } from '../services/capture/PcmChunker';
import { transcribeOnce } from '../services/engine/SpeechEngine';
import { openWhisperEngine, type WhisperEngineOptions } from '../services/engine/WhisperProcessEngine';
import { leBufferToFloat32 } from '../services/process/framing';
import { createEngineLogSink } from '../services/engine/engineLogSink';
import type { AppConfig, PipelineStats } from '../types';

interface CliArgs {
  inputPath?: string;
  once: boolean;
  realtime: boolean;
  skipChecks: boolean;
  help: boolean;
}

const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = { once: false, realtime: false, skipChecks: false, help: false };

  for (const arg of argv) {
    if (arg === '--once') {
      args.once = true;
    } else if (arg === '--realtime') {
      args.realtime = true;
    } else if (arg === '--skip-checks') {
      args.skipChecks = true;
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      args.inputPath = arg;
    }
  }

  return args;
};

const printHelp = (): void => {
  process.stdout.write('\n');
  process.stdout.write('Usage: streamscribe [options] [input.f32]\n');
  process.stdout.write('\n');
  process.stdout.write('Reads raw mono float32 little-endian PCM from a file or stdin.\n');
  process.stdout.write('\n');
  process.stdout.write('Options:\n');
  process.stdout.write('  --once          Transcribe the whole input in one engine call\n');
  process.stdout.write('  --realtime      Pace submissions at the chunk duration\n');
  process.stdout.write('  --skip-checks   Skip model and worker binary checks\n');
  process.stdout.write('  --help          Show this message\n');
  process.stdout.write('\n');
};

const engineOptions = (config: AppConfig, logger: StructuredLogger): WhisperEngineOptions => ({
  binaryPath: config.engineBin,
  modelPath: config.modelPath,
  useGpu: config.useGpu,
  threads: config.engineThreads,
  sampleRate: config.sampleRate,
  inferenceTimeoutMs: config.inferenceTimeoutMs,
  logSink: createEngineLogSink(logger.child({ component: 'engine' })),
  logger
});

const readAll = async (input: Readable): Promise<Buffer> => {
  const parts: Buffer[] = [];
  for await (const chunk of input) {
    parts.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  return Buffer.concat(parts);
};

const runOnce = async (config: AppConfig, logger: StructuredLogger, input: Readable): Promise<void> => {
  const engine = await openWhisperEngine(engineOptions(config, logger));

  try {
    const samples = leBufferToFloat32(await readAll(input));
    const segments = await transcribeOnce(engine, samples);
    process.stdout.write(`${formatResultText(segments)}\n`);
  } finally {
    await engine.close();
  }
};

const runStreaming = async (
  config: AppConfig,
  logger: StructuredLogger,
  input: Readable,
  realtime: boolean
): Promise<void> => {
  const pipeline = await TranscriptionPipeline.open(() => openWhisperEngine(engineOptions(config, logger)), {
    mode: config.mode,
    maxDurationSec: config.maxDurationSec,
    sampleRate: config.sampleRate,
    logger: logger.child({ component: 'pipeline' })
  });

  pipeline.on('callbackError', (error) => {
    process.stderr.write(`\n[callback-error] ${error.message}\n`);
  });

  pipeline.start((chunkId, text, isPartial) => {
    process.stdout.write(`[${isPartial ? 'partial' : 'final'} #${chunkId}] ${text}\n`);
  }, config.resultCheckIntervalMs);

  let interrupted = false;
  const onSigint = (): void => {
    interrupted = true;
    input.destroy();
  };
  process.once('SIGINT', onSigint);

  const chunker = PcmChunker.forDuration(config.chunkMs, config.sampleRate);

  try {
    for await (const data of input) {
      const bytes = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      for (const samples of chunker.push(bytes)) {
        pipeline.submit(samples);
        if (realtime) {
          await sleep(config.chunkMs);
        }
      }
    }
  } catch (error) {
    if (!interrupted) {
      await pipeline.close();
      throw error;
    }
  } finally {
    process.off('SIGINT', onSigint);
  }

  const tail = chunker.flush();
  if (tail && !interrupted) {
    pipeline.submit(tail);
  }

  try {
    await pipeline.stop();
    printSessionStats(pipeline.getStats());
  } finally {
    await pipeline.close();
  }
};

const printSessionStats = (stats: PipelineStats): void => {
  process.stdout.write('\n--- session stats ---\n');
  process.stdout.write(`chunks submitted: ${stats.nextChunkId - 1}\n`);
  process.stdout.write(`engine calls: ${stats.inferenceCalls} (failed ${stats.failedInferences})\n`);
  process.stdout.write(`results delivered: ${stats.deliveredResults} (suppressed ${stats.suppressedResults})\n`);
  process.stdout.write('---------------------\n');
};

const main = async (): Promise<void> => {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = resolveConfig();
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, { level: config.logLevel, console: false });
  process.stderr.write(`Logging to ${logger.getLogPath() ?? 'console'}\n`);

  try {
    if (!args.skipChecks) {
      await runStartupChecks(config, logger);
    }

    const input: Readable = args.inputPath ? fs.createReadStream(args.inputPath) : process.stdin;

    if (args.once) {
      await runOnce(config, logger, input);
    } else {
      await runStreaming(config, logger, input, args.realtime);
    }
  } finally {
    await logger.flush();
  }
};

main().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
