import { PipelineError, isPipelineError } from '@/lib/errors';
import { asArray, asRecord, asString } from '@/lib/raw';
import { isValidVideoId } from '@/lib/video-url';
import { runYtDlpJson } from '@/services/youtube/yt-dlp';
import type { PlaylistEntry, PlaylistRef } from '@/types/video';

const UNAVAILABLE_TITLES = new Set(['[private video]', '[deleted video]', '[unavailable video]']);

export function parsePlaylistEntries(payload: unknown): PlaylistEntry[] {
  const record = asRecord(payload);
  if (!record) {
    return [];
  }

  const entries: PlaylistEntry[] = [];
  for (const item of asArray(record.entries)) {
    const entry = asRecord(item);
    if (!entry) {
      continue;
    }

    const videoId = asString(entry.id);
    const title = asString(entry.title);
    const availability = asString(entry.availability).toLowerCase();

    let unavailableReason: string | undefined;
    if (!isValidVideoId(videoId)) {
      unavailableReason = videoId ? `Invalid video id "${videoId}"` : 'Entry has no video id';
    } else if (UNAVAILABLE_TITLES.has(title.toLowerCase())) {
      unavailableReason = title.slice(1, -1);
    } else if (availability === 'private' || availability === 'needs_auth') {
      unavailableReason = `Video is ${availability.replace('_', ' ')}`;
    }

    entries.push({
      videoId,
      title: title || videoId,
      ...(unavailableReason ? { unavailableReason } : {})
    });
  }

  return entries;
}

export async function expandPlaylist(
  playlist: PlaylistRef,
  signal?: AbortSignal
): Promise<PlaylistEntry[]> {
  try {
    const payload = await runYtDlpJson(
      ['--flat-playlist', playlist.url],
      `playlist ${playlist.playlistId}`,
      signal
    );
    return parsePlaylistEntries(payload);
  } catch (error) {
    if (isPipelineError(error) && error.code === 'CANCELLED') {
      throw error;
    }

    throw new PipelineError({
      code: 'PLAYLIST_RESOLUTION_FAILED',
      message: `Could not resolve playlist ${playlist.playlistId}: ${
        error instanceof Error ? error.message : 'unknown error'
      }`,
      retryable: isPipelineError(error) ? error.retryable : false,
      cause: error
    });
  }
}
