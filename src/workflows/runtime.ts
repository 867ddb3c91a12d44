import { env } from '@/config/env';
import { claimPendingRun, getRunById, setRunStatus } from '@/data/run-store';
import { toErrorDetail } from '@/lib/errors';
import type { ErrorDetail } from '@/types/run';
import { createVideoRef, toPlaylistRef } from '@/lib/video-url';
import { createTranscriptCache } from '@/services/cache';
import type { TranscriptCache } from '@/services/cache/types';
import { createExtractionStrategy } from '@/services/extraction/strategy';
import { fileArtifactStore } from '@/services/storage';
import { createSummarizer } from '@/services/summarizer';
import { createTextProcessor } from '@/services/text-processing';
import {
  whisperAudioTranscriber,
  youtubeCaptionSource,
  youtubeMetadataSource,
  youtubePlaylistResolver
} from '@/services/youtube';
import { runBatch, type BatchDeps, type BatchInput } from '@/workflows/batch';
import {
  combineReporters,
  createConsoleReporter,
  createRunStoreReporter
} from '@/workflows/reporter';
import { createNotesPipeline } from '@/workflows/video-notes';

let depsOverride: BatchDeps | undefined;
let cacheOverride: TranscriptCache | undefined;
let defaultDeps: BatchDeps | undefined;

const activeRuns = new Map<string, AbortController>();

export function setRuntimeForTests(opts?: { deps?: BatchDeps; cache?: TranscriptCache }): void {
  depsOverride = opts?.deps;
  cacheOverride = opts?.cache;
  defaultDeps = undefined;
}

export function getTranscriptCache(): TranscriptCache {
  return cacheOverride ?? createTranscriptCache();
}

/** Production collaborators, built from the environment once per process. */
export function getBatchDeps(): BatchDeps {
  if (depsOverride) {
    return depsOverride;
  }

  defaultDeps ??= {
    pipeline: createNotesPipeline({
      metadata: youtubeMetadataSource,
      cache: getTranscriptCache(),
      strategy: createExtractionStrategy({
        captions: youtubeCaptionSource,
        audio: whisperAudioTranscriber,
        whisperModel: env.whisperModel,
        timeouts: { captions: env.collaboratorTimeoutMs, audio: env.audioTimeoutMs }
      }),
      textProcessor: createTextProcessor(),
      summarizer: createSummarizer(),
      artifacts: fileArtifactStore,
      metadataTimeoutMs: env.collaboratorTimeoutMs
    }),
    playlists: youtubePlaylistResolver
  };
  return defaultDeps;
}

export function isRunActive(runId: string): boolean {
  return activeRuns.has(runId);
}

/** Aborts dispatch for an active run. Returns false when the run is not running in this process. */
export function cancelRun(runId: string): boolean {
  const controller = activeRuns.get(runId);
  if (!controller) {
    return false;
  }
  controller.abort();
  return true;
}

/** Run-level failure detail. Errors that carry no pipeline code are reported as INTERNAL_ERROR. */
export function toRunFailure(error: unknown): ErrorDetail {
  return toErrorDetail(error, 'batch', 'INTERNAL_ERROR');
}

/**
 * Runs a pending run to completion. The controller is registered before the
 * first await so a cancel arriving during start-up is seen here.
 */
export async function startRun(runId: string): Promise<void> {
  if (activeRuns.has(runId)) {
    return;
  }
  const controller = new AbortController();
  activeRuns.set(runId, controller);

  try {
    const run = await getRunById(runId);
    if (!run || run.status !== 'pending') {
      return;
    }

    const { language, mode } = run.options;
    let input: BatchInput;
    if (run.source.kind === 'playlist') {
      const playlist = toPlaylistRef(run.source.url);
      if (!playlist) {
        await setRunStatus(runId, 'failed', {
          error: {
            code: 'INVALID_INPUT',
            message: `Not a playlist URL: ${run.source.url}`,
            stage: 'batch',
            retryable: false
          }
        });
        return;
      }
      input = { playlist, language, mode };
    } else {
      input = { refs: run.items.map((item) => createVideoRef(item.videoId, { language, mode })) };
    }

    if (controller.signal.aborted) {
      console.info(`[runs][${runId}] cancelled before start`);
      await setRunStatus(runId, 'cancelled');
      return;
    }
    if (!(await claimPendingRun(runId))) {
      return;
    }

    await runBatch(getBatchDeps(), input, {
      runId,
      concurrency: run.options.concurrency ?? env.batchConcurrency,
      signal: controller.signal,
      reporter: combineReporters(createConsoleReporter(), createRunStoreReporter(runId)),
      item: { ai: run.options.ai, exports: run.options.exports }
    });
  } catch (error) {
    const detail = toRunFailure(error);
    console.error(`[runs][${runId}] run failed: ${detail.message}`);
    await setRunStatus(runId, detail.code === 'CANCELLED' ? 'cancelled' : 'failed', { error: detail });
  } finally {
    activeRuns.delete(runId);
  }
}
