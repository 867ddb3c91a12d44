import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { env } from '@/config/env';
import { PipelineError, isPipelineError } from '@/lib/errors';
import type { CommandResult } from '@/lib/process';
import { asArray, asMaybeNumber, asRecord, asString } from '@/lib/raw';
import { buildWatchUrl } from '@/lib/video-url';
import type { RawTranscript } from '@/services/extraction/types';
import { getCommandRunner, runYtDlp } from '@/services/youtube/yt-dlp';
import type { TranscriptSegment, VideoRef, WhisperModelSize } from '@/types/video';

const AUDIO_EXTENSIONS = new Set(['.mp3', '.m4a', '.webm', '.opus', '.ogg', '.wav']);

const MEMORY_PATTERNS = [/out of memory/i, /memoryerror/i, /cannot allocate memory/i, /killed/i];

export function classifyWhisperFailure(result: CommandResult, videoId: string): PipelineError {
  const excerpt = result.stderr.trim().split('\n').slice(-3).join(' ').slice(0, 300);

  if (result.signal === 'SIGKILL' || MEMORY_PATTERNS.some((pattern) => pattern.test(result.stderr))) {
    return new PipelineError({
      code: 'RESOURCE_EXHAUSTED',
      message: `Whisper ran out of resources transcribing ${videoId}: ${excerpt || 'process killed'}`,
      retryable: false
    });
  }

  return new PipelineError({
    code: 'MODEL_ERROR',
    message: `Whisper failed for ${videoId} (exit ${result.exitCode ?? 'unknown'}): ${excerpt || 'no output'}`,
    retryable: false
  });
}

export function parseWhisperOutput(payload: unknown, fallbackLanguage: string): RawTranscript {
  const record = asRecord(payload);
  if (!record) {
    throw new PipelineError({ code: 'MODEL_ERROR', message: 'Whisper output is not a JSON object.' });
  }

  const segments: TranscriptSegment[] = [];
  for (const item of asArray(record.segments)) {
    const segment = asRecord(item);
    if (!segment) {
      continue;
    }
    const start = asMaybeNumber(segment.start);
    const end = asMaybeNumber(segment.end);
    if (start === null || end === null) {
      continue;
    }
    segments.push({ start, end, text: asString(segment.text) });
  }

  return {
    segments,
    language: asString(record.language) || fallbackLanguage
  };
}

async function findAudioFile(dir: string): Promise<string> {
  const files = await readdir(dir);
  const audio = files.find((file) => AUDIO_EXTENSIONS.has(path.extname(file).toLowerCase()));
  if (!audio) {
    throw new PipelineError({
      code: 'NETWORK_ERROR',
      message: 'yt-dlp finished without producing an audio file.',
      retryable: false
    });
  }
  return path.join(dir, audio);
}

async function downloadAudio(ref: VideoRef, dir: string, signal?: AbortSignal): Promise<string> {
  await runYtDlp(
    [
      '-f',
      'bestaudio/best',
      '-x',
      '--audio-format',
      'mp3',
      '-o',
      path.join(dir, '%(id)s.%(ext)s'),
      buildWatchUrl(ref.videoId)
    ],
    `audio of ${ref.videoId}`,
    signal
  );
  return findAudioFile(dir);
}

async function runWhisper(
  audioPath: string,
  dir: string,
  ref: VideoRef,
  modelSize: WhisperModelSize,
  language: string | undefined,
  signal?: AbortSignal
): Promise<RawTranscript> {
  const args = [
    audioPath,
    '--model',
    modelSize,
    '--output_format',
    'json',
    '--output_dir',
    dir,
    '--verbose',
    'False'
  ];
  if (language) {
    args.push('--language', language);
  }

  const result = await getCommandRunner()(env.whisperBin, args, { signal });
  if (result.exitCode !== 0) {
    throw classifyWhisperFailure(result, ref.videoId);
  }

  const outputPath = path.join(dir, `${path.parse(audioPath).name}.json`);
  let payload: unknown;
  try {
    payload = JSON.parse(await readFile(outputPath, 'utf8'));
  } catch (error) {
    throw new PipelineError({
      code: 'MODEL_ERROR',
      message: `Whisper output for ${ref.videoId} could not be read.`,
      cause: error
    });
  }

  return parseWhisperOutput(payload, language ?? 'en');
}

/** Downloads the audio track with yt-dlp and transcribes it with the Whisper CLI. */
export async function transcribeAudio(
  ref: VideoRef,
  modelSize: WhisperModelSize,
  language: string | undefined,
  signal?: AbortSignal
): Promise<RawTranscript> {
  const dir = await mkdtemp(path.join(os.tmpdir(), `video-notes-${ref.videoId}-`));

  try {
    const audioPath = await downloadAudio(ref, dir, signal);
    return await runWhisper(audioPath, dir, ref, modelSize, language, signal);
  } catch (error) {
    if (isPipelineError(error)) {
      throw error;
    }
    throw new PipelineError({
      code: 'MODEL_ERROR',
      message: `Audio transcription failed for ${ref.videoId}: ${
        error instanceof Error ? error.message : 'unknown error'
      }`,
      cause: error
    });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
