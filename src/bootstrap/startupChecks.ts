import fs from 'node:fs';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import type { Logger } from '../logging/StructuredLogger';
import { runCommand } from '../services/process/runCommand';
import type { AppConfig } from '../types';

const assertPathExists = (absolutePath: string, label: string): void => {
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`${label} not found at '${absolutePath}'. Update your streamscribe env config.`);
  }
};

const assertExecutable = (absolutePath: string, label: string): void => {
  try {
    fs.accessSync(absolutePath, fsConstants.X_OK);
  } catch {
    throw new Error(`${label} at '${absolutePath}' is not executable.`);
  }
};

export const runStartupChecks = async (
  config: Pick<AppConfig, 'modelPath' | 'engineBin'>,
  logger?: Logger
): Promise<void> => {
  logger?.info('Running startup checks');

  const modelPath = path.resolve(config.modelPath);
  assertPathExists(modelPath, 'Whisper model file');
  if (!fs.statSync(modelPath).isFile()) {
    throw new Error(`Whisper model path '${modelPath}' is not a file.`);
  }

  const engineBin = path.resolve(config.engineBin);
  assertPathExists(engineBin, 'Whisper worker binary');
  assertExecutable(engineBin, 'Whisper worker binary');

  const healthcheck = await runCommand(engineBin, ['--healthcheck'], { timeoutMs: 8000 });

  logger?.info('Startup checks completed successfully', {
    modelPath,
    engineBin,
    healthcheckMs: healthcheck.durationMs
  });
};
