import { env } from '@/config/env';
import { createId } from '@/lib/id';
import { readJsonFile, updateJsonFile } from '@/lib/json-store';
import type {
  BatchCounts,
  ErrorDetail,
  PipelineOutcome,
  RunItemRecord,
  RunRecord,
  RunRequestOptions,
  RunsDb,
  RunStatus
} from '@/types/run';

const EMPTY_DB: RunsDb = { runs: [] };

const EMPTY_COUNTS: BatchCounts = { total: 0, completed: 0, succeeded: 0, partial: 0, failed: 0 };

async function loadDb(): Promise<RunsDb> {
  return readJsonFile(env.runsDbPath, EMPTY_DB);
}

export async function listRuns(): Promise<RunRecord[]> {
  const db = await loadDb();
  return [...db.runs].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export async function getRunById(id: string): Promise<RunRecord | undefined> {
  const db = await loadDb();
  return db.runs.find((run) => run.id === id);
}

export async function createRun(opts: {
  source: RunRecord['source'];
  options: RunRequestOptions;
  videoIds?: string[];
}): Promise<RunRecord> {
  const now = new Date().toISOString();
  const items = (opts.videoIds ?? []).map<RunItemRecord>((videoId) => ({
    videoId,
    status: 'pending',
    artifacts: {}
  }));
  const run: RunRecord = {
    id: createId('run'),
    source: opts.source,
    options: opts.options,
    status: 'pending',
    counts: { ...EMPTY_COUNTS, total: items.length },
    items,
    createdAt: now,
    updatedAt: now
  };

  await updateJsonFile(env.runsDbPath, EMPTY_DB, (db) => ({
    runs: [...db.runs, run]
  }));

  return run;
}

export async function mutateRun(
  runId: string,
  mutator: (run: RunRecord) => RunRecord
): Promise<RunRecord | undefined> {
  let updated: RunRecord | undefined;

  await updateJsonFile(env.runsDbPath, EMPTY_DB, (db) => {
    const runs = db.runs.map((run) => {
      if (run.id !== runId) {
        return run;
      }
      updated = mutator(run);
      return updated;
    });
    return { runs };
  });

  return updated;
}

export async function setRunStatus(
  runId: string,
  status: RunStatus,
  opts: { error?: ErrorDetail } = {}
): Promise<void> {
  await mutateRun(runId, (run) => {
    const now = new Date().toISOString();
    const terminal = status === 'completed' || status === 'failed' || status === 'cancelled';
    return {
      ...run,
      status,
      startedAt: run.startedAt ?? (status === 'running' ? now : run.startedAt),
      completedAt: terminal ? now : run.completedAt,
      error: opts.error ?? run.error,
      updatedAt: now
    };
  });
}

/** Moves a pending run to running. Returns false when the run is missing or no longer pending. */
export async function claimPendingRun(runId: string): Promise<boolean> {
  let claimed = false;
  await mutateRun(runId, (run) => {
    if (run.status !== 'pending') {
      return run;
    }
    claimed = true;
    const now = new Date().toISOString();
    return { ...run, status: 'running', startedAt: run.startedAt ?? now, updatedAt: now };
  });
  return claimed;
}

/** Replaces the item list once the input is known, e.g. after playlist expansion. */
export async function setRunItems(runId: string, videoIds: string[]): Promise<void> {
  await mutateRun(runId, (run) => ({
    ...run,
    items: videoIds.map<RunItemRecord>((videoId) => ({ videoId, status: 'pending', artifacts: {} })),
    counts: { ...EMPTY_COUNTS, total: videoIds.length },
    updatedAt: new Date().toISOString()
  }));
}

function updateItem(
  run: RunRecord,
  index: number,
  update: (item: RunItemRecord) => RunItemRecord
): RunItemRecord[] {
  return run.items.map((item, itemIndex) => (itemIndex === index ? update(item) : item));
}

export async function markItemStarted(runId: string, index: number): Promise<void> {
  await mutateRun(runId, (run) => {
    const now = new Date().toISOString();
    return {
      ...run,
      items: updateItem(run, index, (item) => ({ ...item, status: 'running', startedAt: now })),
      updatedAt: now
    };
  });
}

export async function recordItemOutcome(
  runId: string,
  index: number,
  outcome: PipelineOutcome,
  counts: BatchCounts
): Promise<void> {
  await mutateRun(runId, (run) => ({
    ...run,
    counts,
    items: updateItem(run, index, (item) => ({
      ...item,
      status: outcome.status,
      title: outcome.transcript?.metadata.title ?? item.title,
      channel: outcome.transcript?.metadata.channel ?? item.channel,
      publishedAt: outcome.transcript?.metadata.publishedAt ?? item.publishedAt,
      sourceMode: outcome.transcript?.sourceMode,
      cacheHit: outcome.cacheHit,
      error: outcome.error,
      artifacts: { ...item.artifacts, ...outcome.artifacts },
      startedAt: item.startedAt ?? outcome.startedAt,
      completedAt: outcome.completedAt
    })),
    updatedAt: new Date().toISOString()
  }));
}
