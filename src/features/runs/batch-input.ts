import { createVideoRef, extractVideoId } from '@/lib/video-url';
import type { ExtractionMode, VideoRef } from '@/types/video';

export interface InvalidBatchLine {
  line: number;
  value: string;
}

export interface ParsedBatchInput {
  refs: VideoRef[];
  invalid: InvalidBatchLine[];
}

/** One URL or id per line; blank lines and `#` comments are skipped. Line numbers are 1-based. */
export function parseBatchInput(
  text: string,
  opts: { language?: string; mode?: ExtractionMode } = {}
): ParsedBatchInput {
  const refs: VideoRef[] = [];
  const invalid: InvalidBatchLine[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const value = rawLine.trim();
    if (!value || value.startsWith('#')) {
      return;
    }

    const videoId = extractVideoId(value);
    if (videoId) {
      refs.push(createVideoRef(videoId, opts));
    } else {
      invalid.push({ line: index + 1, value });
    }
  });

  return { refs, invalid };
}

export function formatInvalidLines(invalid: readonly InvalidBatchLine[]): string {
  const shown = invalid.slice(0, 3).map(({ line, value }) => `line ${line} (${value})`);
  const more = invalid.length > shown.length ? ` and ${invalid.length - shown.length} more` : '';
  return `Not a YouTube video URL or id: ${shown.join(', ')}${more}.`;
}
