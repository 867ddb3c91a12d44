import { createId } from '@/lib/id';
import { runPool } from '@/lib/concurrency';
import { PipelineError, cancelledError, hasErrorCode, toErrorDetail } from '@/lib/errors';
import { deepFreeze } from '@/lib/freeze';
import { createVideoRef } from '@/lib/video-url';
import type { PlaylistResolver } from '@/services/extraction/types';
import type { NotesPipeline, ProcessVideoOptions } from '@/workflows/video-notes';
import { notifyReporter, type ProgressReporter } from '@/workflows/reporter';
import type { BatchRun, ErrorDetail, OutcomeStatus, PipelineOutcome } from '@/types/run';
import type { ExtractionMode, PlaylistEntry, PlaylistRef, VideoRef } from '@/types/video';

export type BatchInput =
  | { refs: VideoRef[] }
  | { playlist: PlaylistRef; language?: string; mode?: ExtractionMode };

export interface BatchDeps {
  pipeline: NotesPipeline;
  playlists: PlaylistResolver;
}

export interface BatchOptions {
  concurrency: number;
  runId?: string;
  /** Stops dispatch: unstarted items get CANCELLED outcomes, running items finish. */
  signal?: AbortSignal;
  reporter?: ProgressReporter;
  /** Caps the number of playlist entries taken. */
  maxItems?: number;
  item?: Omit<ProcessVideoOptions, 'runId' | 'signal'>;
  now?: () => Date;
}

function failedOutcome(ref: VideoRef, error: ErrorDetail, at: string): PipelineOutcome {
  const outcome: PipelineOutcome = {
    videoRef: ref,
    status: 'failed',
    error,
    cacheHit: false,
    sharedExtraction: false,
    artifacts: {},
    stages: [],
    startedAt: at,
    completedAt: at
  };
  return deepFreeze(outcome);
}

async function expandInput(
  deps: BatchDeps,
  input: BatchInput,
  options: BatchOptions
): Promise<{ items: VideoRef[]; unavailable: Map<number, string> }> {
  if ('refs' in input) {
    return { items: [...input.refs], unavailable: new Map() };
  }

  let entries: PlaylistEntry[];
  try {
    entries = await deps.playlists.expand(input.playlist, options.signal);
  } catch (error) {
    if (hasErrorCode(error, 'PLAYLIST_RESOLUTION_FAILED') || hasErrorCode(error, 'CANCELLED')) {
      throw error;
    }
    throw new PipelineError({
      code: 'PLAYLIST_RESOLUTION_FAILED',
      message: `Could not resolve playlist ${input.playlist.playlistId}.`,
      cause: error
    });
  }

  const limited = options.maxItems !== undefined ? entries.slice(0, options.maxItems) : entries;
  const unavailable = new Map<number, string>();
  const items = limited.map((entry, index) => {
    if (entry.unavailableReason) {
      unavailable.set(index, entry.unavailableReason);
    }
    return createVideoRef(entry.videoId, { language: input.language, mode: input.mode });
  });

  return { items, unavailable };
}

/**
 * Runs the pipeline over every item with bounded concurrency. Resolves with
 * exactly one outcome per input position; only playlist resolution and an
 * invalid concurrency reject.
 */
export async function runBatch(
  deps: BatchDeps,
  input: BatchInput,
  options: BatchOptions
): Promise<BatchRun> {
  if (!Number.isInteger(options.concurrency) || options.concurrency <= 0) {
    throw new PipelineError({
      code: 'INVALID_INPUT',
      message: `concurrency must be a positive integer, got ${options.concurrency}.`
    });
  }

  const now = options.now ?? (() => new Date());
  const reporter = options.reporter ?? {};
  const runId = options.runId ?? createId('run');
  const { items, unavailable } = await expandInput(deps, input, options);

  const run: BatchRun = {
    id: runId,
    items,
    outcomes: items.map(() => undefined),
    counts: { total: items.length, completed: 0, succeeded: 0, partial: 0, failed: 0 },
    cancelled: false,
    startedAt: now().toISOString()
  };

  await notifyReporter('onItemsResolved', () => reporter.onItemsResolved?.(items, runId));

  const countKey: Record<OutcomeStatus, 'succeeded' | 'partial' | 'failed'> = {
    success: 'succeeded',
    partial: 'partial',
    failed: 'failed'
  };

  async function record(index: number, outcome: PipelineOutcome): Promise<void> {
    run.outcomes[index] = outcome;
    run.counts.completed += 1;
    run.counts[countKey[outcome.status]] += 1;

    const ref = items[index] ?? outcome.videoRef;
    const progress = { runId, index, counts: { ...run.counts } };
    await notifyReporter('onItemCompleted', () => reporter.onItemCompleted?.(ref, outcome, progress));
  }

  async function processItem(ref: VideoRef, index: number): Promise<void> {
    const unavailableReason = unavailable.get(index);
    if (unavailableReason) {
      await record(
        index,
        failedOutcome(
          ref,
          toErrorDetail(
            new PipelineError({
              code: 'NOT_FOUND',
              message: `${ref.videoId} is unavailable: ${unavailableReason}.`,
              retryable: false
            }),
            'batch'
          ),
          now().toISOString()
        )
      );
      return;
    }

    await notifyReporter('onItemStarted', () => reporter.onItemStarted?.(ref, index, runId));

    let outcome: PipelineOutcome;
    try {
      outcome = await deps.pipeline.process(ref, { ...options.item, runId });
    } catch (error) {
      outcome = failedOutcome(ref, toErrorDetail(error, 'batch'), now().toISOString());
    }
    await record(index, outcome);
  }

  const notStarted = await runPool(items, processItem, {
    concurrency: options.concurrency,
    signal: options.signal
  });

  for (const index of notStarted) {
    const ref = items[index];
    if (ref) {
      await record(index, failedOutcome(ref, toErrorDetail(cancelledError(), 'batch'), now().toISOString()));
    }
  }

  run.cancelled = options.signal?.aborted ?? false;
  run.completedAt = now().toISOString();
  await notifyReporter('onBatchCompleted', () => reporter.onBatchCompleted?.(run));

  return run;
}
