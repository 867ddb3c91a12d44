import { EXTRACTION_RETRY_DEFAULTS } from '@/config/pipeline';
import {
  PipelineError,
  getErrorMessage,
  hasErrorCode,
  toErrorDetail,
  toPipelineError
} from '@/lib/errors';
import { withRetry, type RetryPolicy } from '@/lib/retry';
import { withTimeout } from '@/lib/timeout';
import { buildTranscriptResult } from '@/services/extraction/segments';
import type {
  AudioTranscriber,
  CaptionSource,
  ExtractionRequest,
  ExtractionResult,
  ExtractionState,
  ExtractionTrailEntry,
  RawTranscript
} from '@/services/extraction/types';
import type { WhisperModelSize } from '@/types/video';

type WorkingState = Extract<ExtractionState, 'captions' | 'audio'>;

export interface ExtractionStrategyDeps {
  captions: CaptionSource;
  audio: AudioTranscriber;
  whisperModel: WhisperModelSize;
  timeouts: Record<WorkingState, number>;
  /** Per-state overrides of the extraction retry defaults. */
  retry?: Partial<Record<WorkingState, Partial<RetryPolicy>>>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ExtractionStrategy {
  extract(request: ExtractionRequest): Promise<ExtractionResult>;
}

/**
 * Captions first, audio transcription as fallback.
 *
 *   init ──start──▶ captions ──succeed──▶ succeeded
 *                      │ fallback (no captions, or transient errors exhausted)
 *                      ▼
 *   init ──start──▶ audio ──succeed──▶ succeeded
 *                      └──fail──▶ failed
 *
 * `mode: 'captions'` removes the fallback edge; `mode: 'audio'` starts in audio.
 * Each state retries transient errors with its own policy, and every attempt
 * runs under that state's timeout.
 */
export function createExtractionStrategy(deps: ExtractionStrategyDeps): ExtractionStrategy {
  function policyFor(state: WorkingState): RetryPolicy {
    return { ...EXTRACTION_RETRY_DEFAULTS, ...deps.retry?.[state] };
  }

  async function runState(
    state: WorkingState,
    request: ExtractionRequest,
    trail: ExtractionTrailEntry[],
    onAttempt: (attempt: number) => void
  ): Promise<RawTranscript> {
    const label = `${state} extraction for ${request.ref.videoId}`;

    return withRetry(
      (attempt) => {
        onAttempt(attempt);
        return withTimeout(
          label,
          deps.timeouts[state],
          (signal) =>
            state === 'captions'
              ? deps.captions.fetch(request.ref, request.language, signal)
              : deps.audio.transcribe(
                  request.ref,
                  deps.whisperModel,
                  request.requestedLanguage,
                  signal
                ),
          request.signal
        );
      },
      {
        ...policyFor(state),
        signal: request.signal,
        sleep: deps.sleep,
        onRetry: (attempt, error) => {
          trail.push({
            from: state,
            to: state,
            transition: 'retry',
            attempt: attempt + 1,
            reason: getErrorMessage(error)
          });
        }
      }
    );
  }

  async function extract(request: ExtractionRequest): Promise<ExtractionResult> {
    const trail: ExtractionTrailEntry[] = [];
    const fallbackAllowed = request.mode !== 'captions';
    let state: WorkingState = request.mode === 'audio' ? 'audio' : 'captions';
    let attempt = 0;
    const trackAttempt = (value: number) => {
      attempt = value;
    };

    trail.push({ from: 'init', to: state, transition: 'start', attempt: 0 });

    const fail = (error: unknown): ExtractionResult => {
      trail.push({
        from: state,
        to: 'failed',
        transition: 'fail',
        attempt,
        reason: getErrorMessage(error)
      });
      return { state: 'failed', error: toErrorDetail(error, 'extraction', 'EXTRACTION_FAILED'), trail };
    };

    if (state === 'captions') {
      try {
        const raw = await runState('captions', request, trail, trackAttempt);
        trail.push({ from: 'captions', to: 'succeeded', transition: 'succeed', attempt });
        return {
          state: 'succeeded',
          transcript: buildTranscriptResult({
            segments: raw.segments,
            sourceMode: 'captions',
            language: raw.language,
            metadata: request.metadata
          }),
          trail
        };
      } catch (error) {
        if (hasErrorCode(error, 'CANCELLED') || !fallbackAllowed) {
          return fail(error);
        }

        trail.push({
          from: 'captions',
          to: 'audio',
          transition: 'fallback',
          attempt,
          reason: getErrorMessage(error)
        });
        state = 'audio';
        attempt = 0;
      }
    }

    try {
      const raw = await runState('audio', request, trail, trackAttempt);
      trail.push({ from: 'audio', to: 'succeeded', transition: 'succeed', attempt });
      return {
        state: 'succeeded',
        transcript: buildTranscriptResult({
          segments: raw.segments,
          sourceMode: 'audio',
          language: raw.language,
          metadata: request.metadata
        }),
        trail
      };
    } catch (error) {
      if (hasErrorCode(error, 'CANCELLED')) {
        return fail(error);
      }

      const cause = toPipelineError(error, 'MODEL_ERROR');
      return fail(
        new PipelineError({
          code: 'EXTRACTION_FAILED',
          message: `Audio transcription failed for ${request.ref.videoId} (${cause.code}): ${cause.message}`,
          operatorHint: cause.operatorHint,
          retryable: cause.retryable,
          cause
        })
      );
    }
  }

  return { extract };
}
