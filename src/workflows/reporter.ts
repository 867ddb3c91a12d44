import { markItemStarted, recordItemOutcome, setRunItems, setRunStatus } from '@/data/run-store';
import { getErrorMessage } from '@/lib/errors';
import type { BatchCounts, BatchRun, PipelineOutcome } from '@/types/run';
import type { VideoRef } from '@/types/video';

export interface BatchProgress {
  runId: string;
  index: number;
  counts: BatchCounts;
}

/** Observer for batch progress. The coordinator never reads anything back from it. */
export interface ProgressReporter {
  /** Called once the item list is known, before any item starts. */
  onItemsResolved?(items: readonly VideoRef[], runId: string): void | Promise<void>;
  onItemStarted?(ref: VideoRef, index: number, runId: string): void | Promise<void>;
  onItemCompleted?(ref: VideoRef, outcome: PipelineOutcome, progress: BatchProgress): void | Promise<void>;
  onBatchCompleted?(run: BatchRun): void | Promise<void>;
}

export function createConsoleReporter(
  log: Pick<Console, 'info' | 'warn'> = console
): ProgressReporter {
  return {
    onItemStarted(ref, index, runId) {
      log.info(`[batch][${runId}] #${index + 1} ${ref.videoId} started`);
    },
    onItemCompleted(ref, outcome, progress) {
      const { counts } = progress;
      const line = `[batch][${progress.runId}] ${counts.completed}/${counts.total} ${ref.videoId} ${outcome.status}${
        outcome.cacheHit ? ' (cached)' : ''
      }`;
      if (outcome.status === 'success') {
        log.info(line);
      } else {
        log.warn(`${line}: ${outcome.error?.message ?? 'no detail'}`);
      }
    },
    onBatchCompleted(run) {
      const { counts } = run;
      log.info(
        `[batch][${run.id}] ${run.cancelled ? 'cancelled' : 'completed'}: ${counts.succeeded} succeeded, ${counts.partial} partial, ${counts.failed} failed`
      );
    }
  };
}

export function combineReporters(...reporters: ProgressReporter[]): ProgressReporter {
  return {
    async onItemsResolved(items, runId) {
      for (const reporter of reporters) {
        await notifyReporter('onItemsResolved', () => reporter.onItemsResolved?.(items, runId));
      }
    },
    async onItemStarted(ref, index, runId) {
      for (const reporter of reporters) {
        await notifyReporter('onItemStarted', () => reporter.onItemStarted?.(ref, index, runId));
      }
    },
    async onItemCompleted(ref, outcome, progress) {
      for (const reporter of reporters) {
        await notifyReporter('onItemCompleted', () => reporter.onItemCompleted?.(ref, outcome, progress));
      }
    },
    async onBatchCompleted(run) {
      for (const reporter of reporters) {
        await notifyReporter('onBatchCompleted', () => reporter.onBatchCompleted?.(run));
      }
    }
  };
}

/** Runs one reporter callback; failures are logged and never reach the caller. */
export async function notifyReporter(
  event: keyof ProgressReporter,
  callback: () => void | Promise<void>
): Promise<void> {
  try {
    await callback();
  } catch (error) {
    console.error(`[batch][reporter] ${event} handler failed: ${getErrorMessage(error)}`);
  }
}

/** Mirrors batch progress into the run store so the dashboard can poll it. */
export function createRunStoreReporter(runId: string): ProgressReporter {
  return {
    async onItemsResolved(items) {
      await setRunItems(
        runId,
        items.map((ref) => ref.videoId)
      );
    },
    async onItemStarted(_ref, index) {
      await markItemStarted(runId, index);
    },
    async onItemCompleted(_ref, outcome, progress) {
      await recordItemOutcome(runId, progress.index, outcome, progress.counts);
    },
    async onBatchCompleted(run) {
      await setRunStatus(runId, run.cancelled ? 'cancelled' : 'completed');
    }
  };
}
