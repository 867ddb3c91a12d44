import { env } from '@/config/env';
import { PipelineError } from '@/lib/errors';
import { spawnCommand, type CommandResult, type CommandRunner } from '@/lib/process';

let commandRunner: CommandRunner = spawnCommand;

export function setCommandRunnerForTests(runner?: CommandRunner): void {
  commandRunner = runner ?? spawnCommand;
}

export function getCommandRunner(): CommandRunner {
  return commandRunner;
}

export function buildBaseArgs(): string[] {
  const args = ['--no-warnings', '--no-progress'];
  const cookieFile = env.ytDlpCookieFile;
  if (cookieFile) {
    args.push('--cookies', cookieFile);
  }
  return args;
}

function includesAny(haystack: string, needles: string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

/** Maps yt-dlp stderr to the pipeline error taxonomy. */
export function classifyYtDlpError(stderr: string, subject: string): PipelineError {
  const lower = stderr.toLowerCase();
  const excerpt = stderr.trim().split('\n').slice(-3).join(' ').slice(0, 300);

  if (
    includesAny(lower, [
      'urlopen error',
      'connection reset',
      'connection refused',
      'connection aborted',
      'remote end closed connection',
      'timed out',
      'network is unreachable',
      'temporary failure in name resolution',
      'http error 429',
      'too many requests',
      'http error 5',
      'try again later'
    ])
  ) {
    return new PipelineError({
      code: 'NETWORK_ERROR',
      message: `yt-dlp could not reach YouTube for ${subject}: ${excerpt}`
    });
  }

  if (
    includesAny(lower, [
      'video unavailable',
      'this video is unavailable',
      'video is private',
      'this video is no longer available',
      'video has been removed',
      'does not exist',
      'http error 404',
      'incomplete youtube id',
      'is not a valid url'
    ])
  ) {
    return new PipelineError({
      code: 'NOT_FOUND',
      message: `${subject} is unavailable: ${excerpt}`
    });
  }

  return new PipelineError({
    code: 'NETWORK_ERROR',
    message: `yt-dlp failed for ${subject}: ${excerpt || 'no output'}`,
    retryable: false
  });
}

export async function runYtDlp(
  args: string[],
  subject: string,
  signal?: AbortSignal
): Promise<CommandResult> {
  const result = await commandRunner(env.ytDlpBin, [...buildBaseArgs(), ...args], { signal });
  if (result.exitCode !== 0) {
    throw classifyYtDlpError(result.stderr, subject);
  }
  return result;
}

export async function runYtDlpJson(
  args: string[],
  subject: string,
  signal?: AbortSignal
): Promise<unknown> {
  const result = await runYtDlp(['-J', ...args], subject, signal);
  try {
    const parsed: unknown = JSON.parse(result.stdout);
    return parsed;
  } catch (error) {
    throw new PipelineError({
      code: 'NETWORK_ERROR',
      message: `yt-dlp returned malformed JSON for ${subject}.`,
      retryable: false,
      cause: error
    });
  }
}
