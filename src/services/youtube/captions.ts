import { getSubtitles } from 'youtube-caption-extractor';
import { PipelineError } from '@/lib/errors';
import type { RawTranscript } from '@/services/extraction/types';
import type { TranscriptSegment, VideoRef } from '@/types/video';

export interface RawSubtitle {
  start: string;
  dur: string;
  text: string;
}

export type SubtitleFetcher = (opts: { videoID: string; lang?: string }) => Promise<RawSubtitle[]>;

let subtitleFetcher: SubtitleFetcher = getSubtitles;

export function setSubtitleFetcherForTests(fetcher?: SubtitleFetcher): void {
  subtitleFetcher = fetcher ?? getSubtitles;
}

const NETWORK_PATTERNS = [
  /fetch failed/i,
  /econnreset/i,
  /econnrefused/i,
  /etimedout/i,
  /enotfound/i,
  /socket hang up/i,
  /\b429\b/,
  /too many requests/i,
  /\b5\d\d\b/
];

export function decodeCaptionText(text: string): string {
  return text
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}

export function toTranscriptSegments(subtitles: readonly RawSubtitle[]): TranscriptSegment[] {
  return subtitles.map((item) => {
    const start = Number.parseFloat(item.start) || 0;
    const duration = Number.parseFloat(item.dur) || 0;
    return {
      start,
      end: start + duration,
      text: decodeCaptionText(item.text)
    };
  });
}

export async function fetchCaptions(
  ref: VideoRef,
  language: string,
  signal?: AbortSignal
): Promise<RawTranscript> {
  if (signal?.aborted) {
    throw new PipelineError({ code: 'CANCELLED', message: `Caption fetch for ${ref.videoId} was aborted.` });
  }

  let subtitles: RawSubtitle[];
  try {
    subtitles = await subtitleFetcher({ videoID: ref.videoId, lang: language });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (NETWORK_PATTERNS.some((pattern) => pattern.test(message))) {
      throw new PipelineError({
        code: 'NETWORK_ERROR',
        message: `Caption request for ${ref.videoId} failed: ${message}`,
        cause: error
      });
    }

    throw new PipelineError({
      code: 'NO_CAPTIONS',
      message: `No ${language} captions for ${ref.videoId}: ${message}`,
      cause: error
    });
  }

  const segments = toTranscriptSegments(subtitles).filter((segment) => segment.text.length > 0);
  if (segments.length === 0) {
    throw new PipelineError({
      code: 'NO_CAPTIONS',
      message: `No ${language} captions for ${ref.videoId}.`
    });
  }

  return { segments, language };
}
