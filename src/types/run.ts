import type { ExtractionMode, TranscriptResult, VideoRef } from '@/types/video';

export type OutcomeStatus = 'success' | 'partial' | 'failed';

export type RunStatus = 'pending' | 'running' | 'completed' | 'cancelled' | 'failed';

export type StageStatus = 'completed' | 'failed' | 'skipped';

export type PipelineStageName =
  | 'metadata'
  | 'cache_lookup'
  | 'extraction'
  | 'processing'
  | 'summarization'
  | 'export';

export type ExportFormat = 'markdown' | 'json' | 'pdf';

export type PipelineErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_INPUT'
  | 'NO_CAPTIONS'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'RESOURCE_EXHAUSTED'
  | 'MODEL_ERROR'
  | 'DEPENDENCY_MISSING'
  | 'EXTRACTION_FAILED'
  | 'PROCESSING_FAILED'
  | 'PROVIDER_ERROR'
  | 'QUOTA_EXCEEDED'
  | 'STORAGE_UNAVAILABLE'
  | 'PLAYLIST_RESOLUTION_FAILED'
  | 'EXPORT_FAILED'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export interface ErrorDetail {
  code: PipelineErrorCode;
  message: string;
  stage: PipelineStageName | 'batch';
  operatorHint?: string;
  retryable: boolean;
}

export interface StageRecord {
  stage: PipelineStageName;
  status: StageStatus;
  startedAt: string;
  finishedAt: string;
  error?: string;
}

export interface TextStatistics {
  wordCount: number;
  characterCount: number;
  characterCountNoSpaces: number;
  sentenceCount: number;
  readingTimeMinutes: {
    fast: number;
    average: number;
    slow: number;
  };
  speakingRateWpm?: number;
}

export interface KeywordScore {
  keyword: string;
  count: number;
}

export interface ProcessedText {
  paragraphs: string[];
  text: string;
  keywords: KeywordScore[];
  keyPoints: string[];
  statistics: TextStatistics;
}

export interface SentimentAnalysis {
  analysis: string;
}

export interface SummaryResult {
  provider: string;
  model: string;
  summary: string;
  keyPoints: string[];
  sentiment?: SentimentAnalysis;
  questions?: string[];
}

export interface PipelineOutcome {
  videoRef: VideoRef;
  status: OutcomeStatus;
  transcript?: TranscriptResult;
  processedText?: ProcessedText;
  summary?: SummaryResult;
  error?: ErrorDetail;
  cacheHit: boolean;
  sharedExtraction: boolean;
  artifacts: Record<string, string>;
  stages: StageRecord[];
  startedAt: string;
  completedAt: string;
}

export interface BatchCounts {
  total: number;
  completed: number;
  succeeded: number;
  partial: number;
  failed: number;
}

export interface BatchRun {
  id: string;
  items: VideoRef[];
  /** Index-aligned with `items`; a slot is filled once that item's outcome is terminal. */
  outcomes: Array<PipelineOutcome | undefined>;
  counts: BatchCounts;
  cancelled: boolean;
  startedAt: string;
  completedAt?: string;
}

export interface RunRequestOptions {
  language?: string;
  mode?: ExtractionMode;
  concurrency?: number;
  ai?: boolean;
  exports?: ExportFormat[];
}

export interface RunCreatePayload {
  urls?: string[];
  playlistUrl?: string;
  options?: RunRequestOptions;
}

export interface RunItemRecord {
  videoId: string;
  status: OutcomeStatus | 'pending' | 'running';
  title?: string;
  channel?: string;
  publishedAt?: string;
  sourceMode?: ExtractionMode;
  cacheHit?: boolean;
  error?: ErrorDetail;
  artifacts: Record<string, string>;
  startedAt?: string;
  completedAt?: string;
}

export interface RunRecord {
  id: string;
  source: { kind: 'urls'; count: number } | { kind: 'playlist'; url: string };
  options: RunRequestOptions;
  status: RunStatus;
  counts: BatchCounts;
  items: RunItemRecord[];
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  error?: ErrorDetail;
}

export interface RunsDb {
  runs: RunRecord[];
}
