import type { ErrorDetail, PipelineErrorCode, PipelineStageName } from '@/types/run';

const TRANSIENT_CODES: ReadonlySet<PipelineErrorCode> = new Set([
  'NETWORK_ERROR',
  'TIMEOUT'
]);

const DEFAULT_HINTS: Partial<Record<PipelineErrorCode, string>> = {
  NOT_FOUND: 'Check that the video exists and is public, then retry.',
  NO_CAPTIONS: 'Captions are unavailable; audio transcription is used instead.',
  NETWORK_ERROR: 'Check connectivity to YouTube and the AI provider, then retry.',
  TIMEOUT: 'Raise COLLABORATOR_TIMEOUT_MS or AUDIO_TIMEOUT_MS if the source is slow.',
  RESOURCE_EXHAUSTED: 'Choose a smaller WHISPER_MODEL or free memory before retrying.',
  DEPENDENCY_MISSING: 'Install yt-dlp and Whisper, or set YT_DLP_BIN / WHISPER_BIN.',
  QUOTA_EXCEEDED: 'The AI provider quota is exhausted; retry later or switch AI_PROVIDER.',
  STORAGE_UNAVAILABLE: 'Check that CACHE_DIR is writable.',
  PLAYLIST_RESOLUTION_FAILED: 'Check that the playlist URL is correct and public.',
  INTERNAL_ERROR: 'Unexpected failure; the server log has the stack trace.'
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly operatorHint?: string;
  readonly retryable: boolean;

  constructor(opts: {
    code: PipelineErrorCode;
    message: string;
    operatorHint?: string;
    retryable?: boolean;
    cause?: unknown;
  }) {
    super(opts.message);
    this.name = 'PipelineError';
    this.code = opts.code;
    this.operatorHint = opts.operatorHint ?? DEFAULT_HINTS[opts.code];
    this.retryable = opts.retryable ?? TRANSIENT_CODES.has(opts.code);
    if (opts.cause !== undefined) {
      this.cause = opts.cause;
    }
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

export function hasErrorCode(value: unknown, code: PipelineErrorCode): boolean {
  return isPipelineError(value) && value.code === code;
}

export function isTransientError(value: unknown): boolean {
  return isPipelineError(value) && value.retryable;
}

export function getErrorMessage(error: unknown, fallback = 'Unknown failure'): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message.trim();
  }
  if (typeof error === 'string' && error.trim()) {
    return error.trim();
  }
  return fallback;
}

export function toPipelineError(
  error: unknown,
  fallbackCode: PipelineErrorCode,
  message?: string
): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }

  return new PipelineError({
    code: fallbackCode,
    message: message ?? getErrorMessage(error),
    cause: error
  });
}

export function toErrorDetail(
  error: unknown,
  stage: ErrorDetail['stage'],
  fallbackCode: PipelineErrorCode = 'PROCESSING_FAILED'
): ErrorDetail {
  const normalized = toPipelineError(error, fallbackCode);
  return {
    code: normalized.code,
    message: normalized.message,
    stage,
    operatorHint: normalized.operatorHint,
    retryable: normalized.retryable
  };
}

export function cancelledError(stage: PipelineStageName | 'batch' = 'batch'): PipelineError {
  return new PipelineError({
    code: 'CANCELLED',
    message: `Cancelled before ${stage === 'batch' ? 'the item started' : `stage ${stage}`}.`,
    retryable: false
  });
}
