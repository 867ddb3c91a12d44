import { asRecord } from '@/lib/raw';
import { extractVideoId, toPlaylistRef } from '@/lib/video-url';
import type { ExportFormat, RunRequestOptions } from '@/types/run';
import type { ExtractionMode } from '@/types/video';

const EXPORT_FORMATS: readonly ExportFormat[] = ['markdown', 'json', 'pdf'];
const MODES: readonly ExtractionMode[] = ['captions', 'audio'];
const MAX_CONCURRENCY = 16;

export class PayloadValidationError extends Error {
  constructor(
    message: string,
    readonly details?: unknown
  ) {
    super(message);
  }
}

export type ParsedPayload =
  | { kind: 'urls'; videoIds: string[]; options: RunRequestOptions }
  | { kind: 'playlist'; url: string; options: RunRequestOptions };

function parseOptions(input: unknown): RunRequestOptions {
  if (input === undefined) {
    return {};
  }

  const body = asRecord(input);
  if (!body) {
    throw new PayloadValidationError('options must be an object when provided.');
  }

  const options: RunRequestOptions = {};

  if (body.language !== undefined) {
    if (typeof body.language !== 'string' || !/^[a-zA-Z]{2,3}(-[a-zA-Z0-9]{2,8})?$/.test(body.language.trim())) {
      throw new PayloadValidationError('options.language must be a language code such as "en" or "pt-BR".');
    }
    options.language = body.language.trim();
  }

  if (body.mode !== undefined) {
    const mode = MODES.find((candidate) => candidate === body.mode);
    if (!mode) {
      throw new PayloadValidationError('options.mode must be "captions" or "audio".');
    }
    options.mode = mode;
  }

  if (body.concurrency !== undefined) {
    const value = body.concurrency;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0 || value > MAX_CONCURRENCY) {
      throw new PayloadValidationError(
        `options.concurrency must be an integer between 1 and ${MAX_CONCURRENCY}.`
      );
    }
    options.concurrency = value;
  }

  if (body.ai !== undefined) {
    if (typeof body.ai !== 'boolean') {
      throw new PayloadValidationError('options.ai must be a boolean when provided.');
    }
    options.ai = body.ai;
  }

  if (body.exports !== undefined) {
    if (!Array.isArray(body.exports)) {
      throw new PayloadValidationError('options.exports must be an array.');
    }
    const formats: ExportFormat[] = [];
    for (const value of body.exports) {
      const format = EXPORT_FORMATS.find((candidate) => candidate === value);
      if (!format) {
        throw new PayloadValidationError('options.exports may only contain "markdown", "json" and "pdf".');
      }
      if (!formats.includes(format)) {
        formats.push(format);
      }
    }
    options.exports = formats;
  }

  return options;
}

export function parseRunPayload(input: unknown): ParsedPayload {
  const body = asRecord(input);
  if (!body) {
    throw new PayloadValidationError('Payload must be an object.');
  }

  const hasUrls = body.urls !== undefined;
  const hasPlaylist = body.playlistUrl !== undefined;
  if (hasUrls === hasPlaylist) {
    throw new PayloadValidationError('Provide exactly one of urls or playlistUrl.');
  }

  const options = parseOptions(body.options);

  if (hasPlaylist) {
    if (typeof body.playlistUrl !== 'string' || !toPlaylistRef(body.playlistUrl)) {
      throw new PayloadValidationError('playlistUrl must be a YouTube playlist URL.');
    }
    return { kind: 'playlist', url: body.playlistUrl.trim(), options };
  }

  if (!Array.isArray(body.urls) || body.urls.length === 0) {
    throw new PayloadValidationError('urls must be a non-empty array of strings.');
  }

  const videoIds: string[] = [];
  const invalid: string[] = [];
  for (const value of body.urls) {
    const videoId = typeof value === 'string' ? extractVideoId(value) : null;
    if (videoId) {
      videoIds.push(videoId);
    } else {
      invalid.push(String(value));
    }
  }

  if (invalid.length > 0) {
    throw new PayloadValidationError('Some urls are not YouTube video URLs or ids.', { invalid });
  }

  return { kind: 'urls', videoIds, options };
}
