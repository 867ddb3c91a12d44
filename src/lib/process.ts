import { spawn } from 'node:child_process';
import { PipelineError } from '@/lib/errors';

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  signal?: AbortSignal;
  cwd?: string;
}

export type CommandRunner = (
  bin: string,
  args: string[],
  opts?: CommandOptions
) => Promise<CommandResult>;

export const spawnCommand: CommandRunner = (bin, args, opts = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(bin, args, {
      cwd: opts.cwd,
      signal: opts.signal,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(
          new PipelineError({
            code: 'DEPENDENCY_MISSING',
            message: `${bin} is not installed or not on PATH.`,
            cause: error
          })
        );
        return;
      }

      if (error.name === 'AbortError') {
        reject(new PipelineError({ code: 'CANCELLED', message: `${bin} was aborted.`, cause: error }));
        return;
      }

      reject(error);
    });

    child.on('close', (exitCode, signal) => {
      resolve({ exitCode, signal, stdout, stderr });
    });
  });
