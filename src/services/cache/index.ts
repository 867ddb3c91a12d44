import { env } from '@/config/env';
import { FileTranscriptCache } from '@/services/cache/file-store';
import type { Clock, TranscriptCache } from '@/services/cache/types';

export { CACHE_SCOPES, buildCacheKey, cacheKeyForRef, isCacheScope, metadataCacheKey } from '@/services/cache/cache-key';
export { FileTranscriptCache } from '@/services/cache/file-store';
export { MemoryTranscriptCache } from '@/services/cache/memory-store';
export type * from '@/services/cache/types';

export function createTranscriptCache(opts: { dir?: string; now?: Clock } = {}): TranscriptCache {
  return new FileTranscriptCache(opts.dir ?? env.cacheDir, opts.now);
}

const DAY_MS = 24 * 60 * 60 * 1000;

/** Builds the predicate used by the cache management surface. */
export function buildClearPredicate(
  opts: { olderThanDays?: number; videoId?: string },
  now: number
): ((entry: { createdAt: number; key: { videoId: string } }) => boolean) | undefined {
  const { olderThanDays, videoId } = opts;
  if (olderThanDays === undefined && videoId === undefined) {
    return undefined;
  }

  return (entry) =>
    (videoId === undefined || entry.key.videoId === videoId) &&
    (olderThanDays === undefined || now - entry.createdAt > olderThanDays * DAY_MS);
}
