import { spawn } from 'node:child_process';

interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  durationMs: number;
}

/** Runs a short-lived command to completion; non-zero exit codes reject with stderr attached. */
export const runCommand = (
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const settle = (error: Error | undefined): void => {
      if (settled) {
        return;
      }

      settled = true;
      clearTimeout(timeoutHandle);

      if (error) {
        reject(error);
        return;
      }

      resolve({ stdout, stderr, durationMs: Date.now() - startedAt });
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        settle(new Error(`Command timed out after ${options.timeoutMs}ms: ${command}`));
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      settle(error);
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : '';
        settle(new Error(`Command failed (${code}): ${command}${suffix}`));
        return;
      }

      settle(undefined);
    });
  });
