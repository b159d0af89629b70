import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runStartupChecks } from '../../src/bootstrap/startupChecks';

describe('runStartupChecks', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'streamscribe-checks-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('fails when the model file is missing', async () => {
    const modelPath = path.join(dir, 'missing.bin');

    await expect(runStartupChecks({ modelPath, engineBin: path.join(dir, 'worker') })).rejects.toThrow(
      `Whisper model file not found at '${modelPath}'. Update your streamscribe env config.`
    );
  });

  it('fails when the model path is a directory', async () => {
    await expect(runStartupChecks({ modelPath: dir, engineBin: path.join(dir, 'worker') })).rejects.toThrow(
      `Whisper model path '${dir}' is not a file.`
    );
  });

  it('fails when the worker binary is missing', async () => {
    const modelPath = path.join(dir, 'model.bin');
    await fs.writeFile(modelPath, 'not really a model');
    const engineBin = path.join(dir, 'worker');

    await expect(runStartupChecks({ modelPath, engineBin })).rejects.toThrow(
      `Whisper worker binary not found at '${engineBin}'. Update your streamscribe env config.`
    );
  });

  it('fails when the worker binary is not executable', async () => {
    const modelPath = path.join(dir, 'model.bin');
    const engineBin = path.join(dir, 'worker');
    await fs.writeFile(modelPath, 'not really a model');
    await fs.writeFile(engineBin, 'plain text', { mode: 0o644 });

    await expect(runStartupChecks({ modelPath, engineBin })).rejects.toThrow(
      `Whisper worker binary at '${engineBin}' is not executable.`
    );
  });
});
