import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { PipelineError } from '@/lib/errors';
import {
  isMissingFileError,
  removeJsonFile,
  withPathLock,
  writeJsonFile
} from '@/lib/json-store';
import { createEntry, isCacheEntry, isEntryValid, isMetadataCacheEntry } from '@/services/cache/cache-key';
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

interface StoredFile<E> {
  filePath: string;
  sizeBytes: number;
  entry: E | undefined;
}

type EntryGuard<E> = (value: unknown) => value is E;

function parseJson(content: string): unknown {
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * One JSON document per key. Transcripts live directly under `dir`, video
 * metadata under `dir/metadata`. Writes for the same key run in call order;
 * different keys are written concurrently. Unreadable files are misses.
 */
export class FileTranscriptCache implements TranscriptCache {
  constructor(
    private readonly dir: string,
    private readonly now: Clock = Date.now
  ) {}

  private get metadataDir(): string {
    return path.join(this.dir, 'metadata');
  }

  private async readStored<E>(filePath: string, isEntry: EntryGuard<E>): Promise<StoredFile<E> | undefined> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      console.warn(
        `[cache] unable to read ${path.basename(filePath)}: ${
          error instanceof Error ? error.message : 'unknown error'
        }`
      );
      return undefined;
    }

    const sizeBytes = Buffer.byteLength(content, 'utf8');
    const parsed = parseJson(content);
    if (isEntry(parsed)) {
      return { filePath, sizeBytes, entry: parsed };
    }

    console.warn(`[cache] ignoring corrupt entry ${path.basename(filePath)}`);
    return { filePath, sizeBytes, entry: undefined };
  }

  private async listStored<E>(dir: string, isEntry: EntryGuard<E>): Promise<StoredFile<E>[]> {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw new PipelineError({
        code: 'STORAGE_UNAVAILABLE',
        message: `Cache directory ${dir} cannot be listed.`,
        cause: error
      });
    }

    const stored = await Promise.all(
      names
        .filter((name) => name.endsWith('.json'))
        .map((name) => this.readStored(path.join(dir, name), isEntry))
    );
    return stored.filter((item): item is StoredFile<E> => item !== undefined);
  }

  private async readValid<E extends CacheEntryInfo>(
    filePath: string,
    isEntry: EntryGuard<E>
  ): Promise<E | undefined> {
    const stored = await this.readStored(filePath, isEntry);
    const entry = stored?.entry;
    if (!entry) {
      return undefined;
    }

    if (!isEntryValid(entry, this.now())) {
      await withPathLock(filePath, async () => {
        // A concurrent put may have replaced the stale entry while we waited.
        const current = await this.readStored(filePath, isEntry);
        if (current?.entry && !isEntryValid(current.entry, this.now())) {
          await removeJsonFile(filePath);
        }
      });
      return undefined;
    }

    return entry;
  }

  private async writeEntry<K extends { id: string }, P>(
    filePath: string,
    key: K,
    payload: P
  ): Promise<{ key: K; payload: P; createdAt: number; expiresAt: number }> {
    return withPathLock(filePath, async () => {
      const entry = createEntry(key, payload, this.now());
      try {
        await writeJsonFile(filePath, entry);
      } catch (error) {
        throw new PipelineError({
          code: 'STORAGE_UNAVAILABLE',
          message: `Cache entry ${key.id} could not be written: ${
            error instanceof Error ? error.message : 'unknown error'
          }`,
          cause: error
        });
      }
      return entry;
    });
  }

  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    return this.readValid(path.join(this.dir, `${key.id}.json`), isCacheEntry);
  }

  async put(key: CacheKey, payload: TranscriptResult): Promise<CacheEntry> {
    return this.writeEntry(path.join(this.dir, `${key.id}.json`), key, payload);
  }

  async getMetadata(key: MetadataCacheKey): Promise<MetadataCacheEntry | undefined> {
    return this.readValid(path.join(this.metadataDir, `${key.id}.json`), isMetadataCacheEntry);
  }

  async putMetadata(key: MetadataCacheKey, payload: VideoMetadata): Promise<MetadataCacheEntry> {
    return this.writeEntry(path.join(this.metadataDir, `${key.id}.json`), key, payload);
  }

  async stats(): Promise<CacheStats> {
    const [transcripts, metadata] = await Promise.all([
      this.listStored(this.dir, isCacheEntry),
      this.listStored(this.metadataDir, isMetadataCacheEntry)
    ]);
    const now = this.now();
    let entryCount = 0;
    let totalSizeBytes = 0;
    let oldestCreatedAt: number | null = null;

    for (const item of transcripts) {
      totalSizeBytes += item.sizeBytes;
      if (!item.entry || !isEntryValid(item.entry, now)) {
        continue;
      }
      entryCount += 1;
      if (oldestCreatedAt === null || item.entry.createdAt < oldestCreatedAt) {
        oldestCreatedAt = item.entry.createdAt;
      }
    }

    let metadataEntryCount = 0;
    for (const item of metadata) {
      totalSizeBytes += item.sizeBytes;
      if (item.entry && isEntryValid(item.entry, now)) {
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
    if (scope !== 'metadata') {
      removed += await this.clearStored(await this.listStored(this.dir, isCacheEntry), predicate);
    }
    if (scope !== 'transcripts') {
      removed += await this.clearStored(await this.listStored(this.metadataDir, isMetadataCacheEntry), predicate);
    }
    return removed;
  }

  private async clearStored<E extends CacheEntryInfo>(
    stored: StoredFile<E>[],
    predicate: CacheEntryPredicate | undefined
  ): Promise<number> {
    let removed = 0;

    for (const item of stored) {
      const { entry } = item;
      // Corrupt files only go on a full clear.
      const matches = predicate ? entry !== undefined && predicate(entry) : true;
      if (!matches) {
        continue;
      }

      const didRemove = await withPathLock(item.filePath, () => removeJsonFile(item.filePath));
      if (didRemove && entry) {
        removed += 1;
      }
    }

    return removed;
  }
}
