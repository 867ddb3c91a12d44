import { createHash } from 'node:crypto';
import { CACHE_SCHEMA_VERSION, CACHE_TTL_MS } from '@/config/pipeline';
import { asArray, asRecord } from '@/lib/raw';
import type {
  CacheEntry,
  CacheEntryInfo,
  CacheKey,
  CacheKeyParts,
  CacheScope,
  MetadataCacheEntry,
  MetadataCacheKey
} from '@/services/cache/types';
import type { VideoRef } from '@/types/video';

export const CACHE_SCOPES: readonly CacheScope[] = ['all', 'transcripts', 'metadata'];

export function isCacheScope(value: string): value is CacheScope {
  return CACHE_SCOPES.some((scope) => scope === value);
}

export function buildCacheKey(parts: CacheKeyParts): CacheKey {
  const normalized: CacheKeyParts = {
    videoId: parts.videoId,
    language: parts.language.toLowerCase(),
    mode: parts.mode,
    schemaVersion: parts.schemaVersion
  };
  const id = createHash('sha256').update(JSON.stringify(normalized)).digest('hex');
  return { ...normalized, id };
}

export function cacheKeyForRef(ref: VideoRef, schemaVersion = CACHE_SCHEMA_VERSION): CacheKey {
  return buildCacheKey({
    videoId: ref.videoId,
    language: ref.language ?? 'auto',
    mode: ref.mode ?? 'auto',
    schemaVersion
  });
}

export function metadataCacheKey(videoId: string, schemaVersion = CACHE_SCHEMA_VERSION): MetadataCacheKey {
  const id = createHash('sha256').update(JSON.stringify({ kind: 'metadata', videoId, schemaVersion })).digest('hex');
  return { videoId, schemaVersion, id };
}

export function createEntry<K, P>(
  key: K,
  payload: P,
  now: number
): { key: K; payload: P; createdAt: number; expiresAt: number } {
  return {
    key,
    payload,
    createdAt: now,
    expiresAt: now + CACHE_TTL_MS
  };
}

export function isEntryValid(entry: CacheEntryInfo, now: number): boolean {
  return now < entry.expiresAt;
}

export function isCacheEntry(value: unknown): value is CacheEntry {
  const record = asRecord(value);
  if (!record) {
    return false;
  }

  const key = asRecord(record.key);
  const payload = asRecord(record.payload);
  return (
    key !== null &&
    typeof key.id === 'string' &&
    typeof key.videoId === 'string' &&
    payload !== null &&
    Array.isArray(payload.segments) &&
    asArray(payload.segments).every((segment) => asRecord(segment) !== null) &&
    asRecord(payload.metadata) !== null &&
    typeof record.createdAt === 'number' &&
    typeof record.expiresAt === 'number'
  );
}

export function isMetadataCacheEntry(value: unknown): value is MetadataCacheEntry {
  const record = asRecord(value);
  if (!record) {
    return false;
  }

  const key = asRecord(record.key);
  const payload = asRecord(record.payload);
  return (
    key !== null &&
    typeof key.id === 'string' &&
    typeof key.videoId === 'string' &&
    payload !== null &&
    typeof payload.videoId === 'string' &&
    typeof payload.title === 'string' &&
    Array.isArray(payload.chapters) &&
    typeof record.createdAt === 'number' &&
    typeof record.expiresAt === 'number'
  );
}
