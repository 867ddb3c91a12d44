import { createEntry, isEntryValid } from '@/services/cache/cache-key';
import type {
  CacheEntry,
  CacheEntryInfo,
  CacheEntryPredicate,
  CacheKey,
  CacheScope,
  CacheStats,
  Clock,
  MetadataCacheEntry,
  MetadataCacheKey,
  TranscriptCache
} from '@/services/cache/types';
import type { TranscriptResult, VideoMetadata } from '@/types/video';

/** In-process cache with the same contract as the file store. Nothing survives a restart. */
export class MemoryTranscriptCache implements TranscriptCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly metadata = new Map<string, MetadataCacheEntry>();

  constructor(private readonly now: Clock = Date.now) {}

  private readValid<E extends CacheEntryInfo>(store: Map<string, E>, id: string): E | undefined {
    const entry = store.get(id);
    if (!entry) {
      return undefined;
    }

    if (!isEntryValid(entry, this.now())) {
      store.delete(id);
      return undefined;
    }

    return entry;
  }

  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    return this.readValid(this.entries, key.id);
  }

  async put(key: CacheKey, payload: TranscriptResult): Promise<CacheEntry> {
    const entry = Object.freeze(createEntry(key, payload, this.now()));
    this.entries.set(key.id, entry);
    return entry;
  }

  async getMetadata(key: MetadataCacheKey): Promise<MetadataCacheEntry | undefined> {
    return this.readValid(this.metadata, key.id);
  }

  async putMetadata(key: MetadataCacheKey, payload: VideoMetadata): Promise<MetadataCacheEntry> {
    const entry = Object.freeze(createEntry(key, payload, this.now()));
    this.metadata.set(key.id, entry);
    return entry;
  }

  async stats(): Promise<CacheStats> {
    const now = this.now();
    let entryCount = 0;
    let metadataEntryCount = 0;
    let totalSizeBytes = 0;
    let oldestCreatedAt: number | null = null;

    for (const entry of this.entries.values()) {
      totalSizeBytes += Buffer.byteLength(JSON.stringify(entry), 'utf8');
      if (!isEntryValid(entry, now)) {
        continue;
      }
      entryCount += 1;
      if (oldestCreatedAt === null || entry.createdAt < oldestCreatedAt) {
        oldestCreatedAt = entry.createdAt;
      }
    }

    for (const entry of this.metadata.values()) {
      totalSizeBytes += Buffer.byteLength(JSON.stringify(entry), 'utf8');
      if (isEntryValid(entry, now)) {
        metadataEntryCount += 1;
      }
    }

    return {
      entryCount,
      metadataEntryCount,
      totalSizeBytes,
      oldestEntryAgeMs: oldestCreatedAt === null ? null : now - oldestCreatedAt
    };
  }

  async clear(predicate?: CacheEntryPredicate, scope: CacheScope = 'all'): Promise<number> {
    let removed = 0;
    const stores: Array<Map<string, CacheEntryInfo>> = [];
    if (scope !== 'metadata') {
      stores.push(this.entries);
    }
    if (scope !== 'transcripts') {
      stores.push(this.metadata);
    }

    for (const store of stores) {
      for (const [id, entry] of store) {
        if (!predicate || predicate(entry)) {
          store.delete(id);
          removed += 1;
        }
      }
    }
    return removed;
  }
}
