import { PipelineError } from '@/lib/errors';
import {
  asArray,
  asMaybeString,
  asNonNegativeNumber,
  asRecord,
  asString,
  asStringArray,
  type RawRecord
} from '@/lib/raw';
import { buildWatchUrl } from '@/lib/video-url';
import { runYtDlpJson } from '@/services/youtube/yt-dlp';
import type { VideoChapter, VideoMetadata, VideoRef } from '@/types/video';

/** yt-dlp reports `upload_date` as YYYYMMDD. */
export function formatUploadDate(raw: string | undefined): string | undefined {
  const match = raw?.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!match) {
    return undefined;
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

function parseChapters(value: unknown): VideoChapter[] {
  const chapters: VideoChapter[] = [];

  for (const item of asArray(value)) {
    const record = asRecord(item);
    if (!record) {
      continue;
    }

    const startSec = asNonNegativeNumber(record.start_time);
    const endSec = asNonNegativeNumber(record.end_time);
    chapters.push({
      title: asString(record.title) || `Chapter ${chapters.length + 1}`,
      startSec,
      endSec: Math.max(endSec, startSec)
    });
  }

  return chapters.sort((a, b) => a.startSec - b.startSec);
}

export function parseVideoMetadata(videoId: string, raw: RawRecord): VideoMetadata {
  return {
    videoId: asString(raw.id) || videoId,
    title: asString(raw.title) || 'Unknown',
    channel: asString(raw.uploader) || asString(raw.channel) || 'Unknown',
    publishedAt: formatUploadDate(asMaybeString(raw.upload_date)),
    duration: asNonNegativeNumber(raw.duration),
    viewCount: asNonNegativeNumber(raw.view_count),
    likeCount: asNonNegativeNumber(raw.like_count),
    tags: asStringArray(raw.tags),
    chapters: parseChapters(raw.chapters),
    description: asMaybeString(raw.description),
    thumbnailUrl: asMaybeString(raw.thumbnail),
    language: asMaybeString(raw.language),
    url: asMaybeString(raw.webpage_url) ?? buildWatchUrl(videoId)
  };
}

export async function fetchVideoMetadata(
  ref: VideoRef,
  signal?: AbortSignal
): Promise<VideoMetadata> {
  const subject = `video ${ref.videoId}`;
  const payload = await runYtDlpJson(
    ['--skip-download', buildWatchUrl(ref.videoId)],
    subject,
    signal
  );

  const record = asRecord(payload);
  if (!record) {
    throw new PipelineError({
      code: 'NOT_FOUND',
      message: `yt-dlp returned no metadata for ${subject}.`
    });
  }

  return parseVideoMetadata(ref.videoId, record);
}
