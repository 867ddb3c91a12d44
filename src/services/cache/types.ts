import type { ExtractionMode, TranscriptResult, VideoMetadata } from '@/types/video';

export type Clock = () => number;

export interface CacheKeyParts {
  videoId: string;
  /** Requested language or "auto". */
  language: string;
  mode: ExtractionMode | 'auto';
  schemaVersion: string;
}

export interface CacheKey extends CacheKeyParts {
  /** Hex digest of the parts; identical parts always give the same id. */
  id: string;
}

/** Video metadata is cached per video, independent of language and mode. */
export interface MetadataCacheKey {
  videoId: string;
  schemaVersion: string;
  id: string;
}

/** What a clear predicate sees of either kind of entry. */
export interface CacheEntryInfo {
  key: { videoId: string };
  /** Epoch milliseconds. */
  createdAt: number;
  expiresAt: number;
}

export interface CacheEntry extends CacheEntryInfo {
  key: CacheKey;
  payload: TranscriptResult;
}

export interface MetadataCacheEntry extends CacheEntryInfo {
  key: MetadataCacheKey;
  payload: VideoMetadata;
}

export type CacheScope = 'all' | 'transcripts' | 'metadata';

export interface CacheStats {
  /** Unexpired transcript entries. */
  entryCount: number;
  /** Unexpired video metadata entries. */
  metadataEntryCount: number;
  /** Every stored file, expired or not. */
  totalSizeBytes: number;
  /** Age of the oldest unexpired transcript entry; null when there is none. */
  oldestEntryAgeMs: number | null;
}

export type CacheEntryPredicate = (entry: CacheEntryInfo) => boolean;

export interface TranscriptCache {
  /** Present and unexpired entries only. An expired entry is evicted and reported as a miss. */
  get(key: CacheKey): Promise<CacheEntry | undefined>;
  /** Throws STORAGE_UNAVAILABLE when the entry cannot be persisted. */
  put(key: CacheKey, payload: TranscriptResult): Promise<CacheEntry>;
  getMetadata(key: MetadataCacheKey): Promise<MetadataCacheEntry | undefined>;
  putMetadata(key: MetadataCacheKey, payload: VideoMetadata): Promise<MetadataCacheEntry>;
  stats(): Promise<CacheStats>;
  /**
   * Removes matching entries of the given scope (default `all`), or every entry
   * of that scope without a predicate. Returns the removed count.
   */
  clear(predicate?: CacheEntryPredicate, scope?: CacheScope): Promise<number>;
}
