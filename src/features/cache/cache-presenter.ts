import { formatDuration } from '@/lib/timestamps';
import type { CacheStats } from '@/services/cache';

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

export function formatOldestEntry(stats: Pick<CacheStats, 'oldestEntryAgeMs'>): string {
  if (stats.oldestEntryAgeMs === null) return 'n/a';
  const days = Math.floor(stats.oldestEntryAgeMs / (24 * 60 * 60 * 1000));
  if (days >= 1) return days === 1 ? '1 day ago' : `${days} days ago`;
  return `${formatDuration(Math.floor(stats.oldestEntryAgeMs / 1000))} ago`;
}
