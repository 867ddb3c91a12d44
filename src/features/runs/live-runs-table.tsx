'use client';

import React, { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import Link from 'next/link';
import { RefreshCw } from 'lucide-react';
import type { RunRecord } from '@/types/run';
import { formatTime, getItemSymbol, getProgressSummary, getSourceLabel, groupRunsByDay } from './runs-presenter';
import { getNextPollDelayMs, shouldApplyPollResult } from './live-runs-polling';

type LiveRunsTableProps = {
  initialRuns: RunRecord[];
};

export function LiveRunsTable({ initialRuns }: LiveRunsTableProps) {
  const [runs, setRuns] = useState(initialRuns);
  const [isRefreshing, setIsRefreshing] = useState(false);
  const [isPollingError, setIsPollingError] = useState(false);
  const [lastUpdatedAt, setLastUpdatedAt] = useState<string | null>(null);

  const runsRef = useRef(initialRuns);
  const requestSeqRef = useRef(0);
  const timeoutIdRef = useRef<number | null>(null);
  const activeControllerRef = useRef<AbortController | null>(null);
  const pollRef = useRef<((scheduleNext: boolean) => Promise<void>) | null>(null);

  const groupedRuns = useMemo(() => groupRunsByDay(runs), [runs]);

  useEffect(() => {
    let cancelled = false;

    const clearScheduledPoll = () => {
      if (timeoutIdRef.current !== null) {
        window.clearTimeout(timeoutIdRef.current);
        timeoutIdRef.current = null;
      }
    };

    const scheduleNextPoll = () => {
      if (cancelled) return;
      clearScheduledPoll();
      const isDocumentHidden = typeof document !== 'undefined' && document.visibilityState === 'hidden';
      timeoutIdRef.current = window.setTimeout(() => {
        void pollRef.current?.(true);
      }, getNextPollDelayMs(isDocumentHidden, runsRef.current));
    };

    const poll = async (scheduleNext: boolean) => {
      const responseSeq = ++requestSeqRef.current;
      setIsRefreshing(true);
      activeControllerRef.current?.abort();
      const controller = new AbortController();
      activeControllerRef.current = controller;

      try {
        const response = await fetch('/api/runs', { cache: 'no-store', signal: controller.signal });
        if (!response.ok) {
          if (!controller.signal.aborted) setIsPollingError(true);
          return;
        }

        const payload = (await response.json()) as RunRecord[];
        if (
          shouldApplyPollResult({
            cancelled,
            activeRequestSeq: requestSeqRef.current,
            responseSeq,
            aborted: controller.signal.aborted
          })
        ) {
          runsRef.current = payload;
          setRuns(payload);
          setIsPollingError(false);
          setLastUpdatedAt(new Date().toISOString());
        }
      } catch {
        if (!controller.signal.aborted) setIsPollingError(true);
      } finally {
        if (responseSeq === requestSeqRef.current) setIsRefreshing(false);
        if (scheduleNext && !cancelled) scheduleNextPoll();
      }
    };

    pollRef.current = poll;
    scheduleNextPoll();

    return () => {
      cancelled = true;
      pollRef.current = null;
      clearScheduledPoll();
      activeControllerRef.current?.abort();
    };
  }, []);

  const handleRefreshNow = useCallback(() => {
    void pollRef.current?.(false);
  }, []);

  let liveStatus = 'Auto-updating';
  if (isPollingError) liveStatus = 'Auto-update retrying after a network error.';
  else if (isRefreshing) liveStatus = 'Updating runs...';
  else if (lastUpdatedAt) liveStatus = `Auto-updating · Last update ${formatTime(lastUpdatedAt)}`;

  return (
    <section className="card runs-card">
      <div className="runs-card-header">
        <h2>Runs</h2>
        <div className="runs-refresh">
          <span className="small" role="status" aria-live="polite">
            {liveStatus}
          </span>
          <button type="button" onClick={handleRefreshNow} disabled={isRefreshing}>
            <RefreshCw className="icon" aria-hidden="true" />
            Refresh now
          </button>
        </div>
      </div>

      {runs.length === 0 ? (
        <p className="small">No runs yet. Submit videos or a playlist to start one.</p>
      ) : (
        groupedRuns.map((group) => (
          <section key={group.dayKey} className="runs-day-group">
            <h3>{group.dayLabel}</h3>
            <table className="table">
              <thead>
                <tr>
                  <th>Time</th>
                  <th>Source</th>
                  <th>Items</th>
                  <th>Progress</th>
                </tr>
              </thead>
              <tbody>
                {group.runs.map((run) => (
                  <tr key={run.id}>
                    <td>{formatTime(run.createdAt)}</td>
                    <td>{getSourceLabel(run)}</td>
                    <td>
                      {run.items.map((item, index) => (
                        <span
                          key={`${run.id}-${index}`}
                          className={`runs-item-dot runs-item-dot-${item.status}`}
                          title={`${item.videoId}: ${item.status}`}
                        >
                          {getItemSymbol(item.status)}
                        </span>
                      ))}
                    </td>
                    <td>
                      <p className={`runs-progress runs-progress-${run.status}`}>{getProgressSummary(run)}</p>
                      <Link href={`/dashboard/runs/${run.id}`}>Open</Link>
                    </td>
                  </tr>
                ))}
              </tbody>
            </table>
          </section>
        ))
      )}
    </section>
  );
}
