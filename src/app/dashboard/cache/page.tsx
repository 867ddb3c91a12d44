import React from 'react';
import { env } from '@/config/env';
import { getErrorMessage } from '@/lib/errors';
import { formatBytes, formatOldestEntry } from '@/features/cache/cache-presenter';
import type { CacheStats } from '@/services/cache';
import { getTranscriptCache } from '@/workflows/runtime';
import { ClearCacheForm } from './clear-cache-form';

export const dynamic = 'force-dynamic';

export default async function CachePage() {
  let stats: CacheStats | null = null;
  let error: string | null = null;
  try {
    stats = await getTranscriptCache().stats();
  } catch (caught) {
    error = getErrorMessage(caught);
  }

  return (
    <main className="container">
      <section className="card">
        <h1>Transcript Cache</h1>
        <p className="small">Directory: {env.cacheDir}</p>
        {error ? (
          <p className="runs-error">Cache unavailable: {error}</p>
        ) : stats ? (
          <dl>
            <dt>Entries</dt>
            <dd>{stats.entryCount}</dd>
            <dt>Video metadata</dt>
            <dd>{stats.metadataEntryCount}</dd>
            <dt>Size</dt>
            <dd>{formatBytes(stats.totalSizeBytes)}</dd>
            <dt>Oldest entry</dt>
            <dd>{formatOldestEntry(stats)}</dd>
          </dl>
        ) : null}
      </section>
      <ClearCacheForm />
    </main>
  );
}
