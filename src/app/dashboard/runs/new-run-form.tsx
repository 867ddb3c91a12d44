'use client';

import React from 'react';
import { useState } from 'react';
import { formatInvalidLines, parseBatchInput } from '@/features/runs/batch-input';
import { asRecord, asString } from '@/lib/raw';
import type { ExportFormat, RunCreatePayload } from '@/types/run';

type RequestStatus =
  | { type: 'idle' }
  | { type: 'success'; message: string; runId: string }
  | { type: 'error'; message: string };

type SourceKind = 'urls' | 'playlist';

export function buildRunPayload(input: {
  sourceKind: SourceKind;
  urls: string;
  playlistUrl: string;
  language: string;
  mode: '' | 'captions' | 'audio';
  concurrency: string;
  ai: boolean;
  exports: ExportFormat[];
}): RunCreatePayload {
  const concurrency = Number.parseInt(input.concurrency, 10);
  const options: RunCreatePayload['options'] = {
    ai: input.ai,
    exports: input.exports,
    ...(input.language.trim() ? { language: input.language.trim() } : {}),
    ...(input.mode ? { mode: input.mode } : {}),
    ...(Number.isInteger(concurrency) && concurrency > 0 ? { concurrency } : {})
  };

  return input.sourceKind === 'playlist'
    ? { playlistUrl: input.playlistUrl.trim(), options }
    : { urls: parseBatchInput(input.urls).refs.map((ref) => ref.videoId), options };
}

export function NewRunForm() {
  const [sourceKind, setSourceKind] = useState<SourceKind>('urls');
  const [urls, setUrls] = useState('');
  const [playlistUrl, setPlaylistUrl] = useState('');
  const [language, setLanguage] = useState('');
  const [mode, setMode] = useState<'' | 'captions' | 'audio'>('');
  const [concurrency, setConcurrency] = useState('3');
  const [ai, setAi] = useState(true);
  const [markdown, setMarkdown] = useState(true);
  const [json, setJson] = useState(false);
  const [pdf, setPdf] = useState(false);
  const [isSubmitting, setIsSubmitting] = useState(false);
  const [status, setStatus] = useState<RequestStatus>({ type: 'idle' });

  const parsedUrls = parseBatchInput(urls);
  const hasSource =
    sourceKind === 'urls'
      ? parsedUrls.refs.length + parsedUrls.invalid.length > 0
      : playlistUrl.trim().length > 0;
  const canSubmit = hasSource && !isSubmitting;

  async function onSubmit(event: React.FormEvent<HTMLFormElement>) {
    event.preventDefault();
    if (!hasSource) {
      setStatus({ type: 'error', message: 'Add at least one video URL or a playlist URL.' });
      return;
    }
    if (sourceKind === 'urls' && parsedUrls.invalid.length > 0) {
      setStatus({ type: 'error', message: formatInvalidLines(parsedUrls.invalid) });
      return;
    }

    setIsSubmitting(true);
    setStatus({ type: 'idle' });

    const exports: ExportFormat[] = [];
    if (markdown) exports.push('markdown');
    if (json) exports.push('json');
    if (pdf) exports.push('pdf');

    try {
      const response = await fetch('/api/runs', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(
          buildRunPayload({ sourceKind, urls, playlistUrl, language, mode, concurrency, ai, exports })
        )
      });

      const body = asRecord(await response.json()) ?? {};
      const runId = asString(body.runId);
      if (!response.ok || !runId) {
        const message = [asString(body.error), asString(body.code)].filter(Boolean).join(' | ');
        throw new Error(message || 'Failed to create run.');
      }

      setStatus({ type: 'success', runId, message: `Run ${runId} started.` });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to create run.';
      setStatus({ type: 'error', message });
    } finally {
      setIsSubmitting(false);
    }
  }

  return (
    <form onSubmit={onSubmit} className="card runs-form">
      <h2>New Run</h2>

      <div className="runs-options">
        <label>
          <input
            type="radio"
            name="source"
            checked={sourceKind === 'urls'}
            onChange={() => setSourceKind('urls')}
          />{' '}
          Video URLs
        </label>
        <label>
          <input
            type="radio"
            name="source"
            checked={sourceKind === 'playlist'}
            onChange={() => setSourceKind('playlist')}
          />{' '}
          Playlist
        </label>
      </div>

      {sourceKind === 'urls' ? (
        <label className="runs-field">
          <div className="small">One URL or video id per line</div>
          <textarea value={urls} onChange={(e) => setUrls(e.target.value)} rows={5} />
        </label>
      ) : (
        <label className="runs-field">
          <div className="small">Playlist URL</div>
          <input
            value={playlistUrl}
            onChange={(e) => setPlaylistUrl(e.target.value)}
            placeholder="https://www.youtube.com/playlist?list=..."
          />
        </label>
      )}

      <div className="grid cols-2">
        <label className="runs-field">
          <div className="small">Language (blank for auto)</div>
          <input value={language} onChange={(e) => setLanguage(e.target.value)} placeholder="en" />
        </label>
        <label className="runs-field">
          <div className="small">Mode</div>
          <select
            value={mode}
            onChange={(e) => {
              const next = e.target.value;
              setMode(next === 'captions' || next === 'audio' ? next : '');
            }}
          >
            <option value="">Auto (captions, then audio)</option>
            <option value="captions">Captions only</option>
            <option value="audio">Audio only</option>
          </select>
        </label>
        <label className="runs-field">
          <div className="small">Concurrency</div>
          <input type="number" min={1} max={16} value={concurrency} onChange={(e) => setConcurrency(e.target.value)} />
        </label>
      </div>

      <div className="runs-options">
        <label>
          <input type="checkbox" checked={ai} onChange={(e) => setAi(e.target.checked)} /> AI summary
        </label>
        <label>
          <input type="checkbox" checked={markdown} onChange={(e) => setMarkdown(e.target.checked)} /> Markdown
          notes
        </label>
        <label>
          <input type="checkbox" checked={json} onChange={(e) => setJson(e.target.checked)} /> JSON export
        </label>
        <label>
          <input type="checkbox" checked={pdf} onChange={(e) => setPdf(e.target.checked)} /> PDF notes
        </label>
      </div>

      <button type="submit" disabled={!canSubmit}>
        {isSubmitting ? 'Starting...' : 'Start Run'}
      </button>

      {status.type !== 'idle' && (
        <p role="status" aria-live="polite" className={`small runs-status-${status.type}`}>
          {status.message}{' '}
          {status.type === 'success' ? <a href={`/dashboard/runs/${status.runId}`}>Open run</a> : null}
        </p>
      )}
    </form>
  );
}
