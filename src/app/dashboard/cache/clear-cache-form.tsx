'use client';

import React, { useState } from 'react';
import { asNonNegativeNumber, asRecord, asString } from '@/lib/raw';
import type { CacheScope } from '@/services/cache';

const SCOPE_OPTIONS: ReadonlyArray<{ value: CacheScope; label: string }> = [
  { value: 'all', label: 'Everything' },
  { value: 'transcripts', label: 'Transcripts' },
  { value: 'metadata', label: 'Video metadata' }
];

export function buildClearQuery(olderThanDays: string, videoId: string, scope: CacheScope = 'all'): string {
  const params = new URLSearchParams();
  if (olderThanDays.trim()) params.set('olderThanDays', olderThanDays.trim());
  if (videoId.trim()) params.set('videoId', videoId.trim());
  if (scope !== 'all') params.set('scope', scope);
  const query = params.toString();
  return query ? `?${query}` : '';
}

export function ClearCacheForm() {
  const [olderThanDays, setOlderThanDays] = useState('');
  const [videoId, setVideoId] = useState('');
  const [scope, setScope] = useState<CacheScope>('all');
  const [message, setMessage] = useState<string | null>(null);
  const [isSubmitting, setIsSubmitting] = useState(false);

  async function onSubmit(event: React.FormEvent<HTMLFormElement>) {
    event.preventDefault();
    setIsSubmitting(true);
    try {
      const response = await fetch(`/api/cache${buildClearQuery(olderThanDays, videoId, scope)}`, { method: 'DELETE' });
      const body = asRecord(await response.json()) ?? {};
      setMessage(
        response.ok
          ? `Removed ${asNonNegativeNumber(body.removed)} entries.`
          : asString(body.error) || 'Failed to clear cache.'
      );
    } catch (error) {
      setMessage(error instanceof Error ? error.message : 'Failed to clear cache.');
    } finally {
      setIsSubmitting(false);
    }
  }

  return (
    <form onSubmit={onSubmit} className="card">
      <h2>Clear Cache</h2>
      <p className="small">Leave both fields blank to remove every entry of the chosen kind.</p>
      <div className="grid cols-2">
        <label>
          <div className="small">Kind</div>
          <select
            value={scope}
            onChange={(e) => {
              const next = SCOPE_OPTIONS.find((option) => option.value === e.target.value);
              if (next) setScope(next.value);
            }}
          >
            {SCOPE_OPTIONS.map((option) => (
              <option key={option.value} value={option.value}>
                {option.label}
              </option>
            ))}
          </select>
        </label>
        <label>
          <div className="small">Older than (days)</div>
          <input type="number" min={0} value={olderThanDays} onChange={(e) => setOlderThanDays(e.target.value)} />
        </label>
        <label>
          <div className="small">Video id</div>
          <input value={videoId} onChange={(e) => setVideoId(e.target.value)} />
        </label>
      </div>
      <button type="submit" disabled={isSubmitting}>
        {isSubmitting ? 'Clearing...' : 'Clear'}
      </button>
      {message && (
        <p role="status" className="small">
          {message}
        </p>
      )}
    </form>
  );
}
