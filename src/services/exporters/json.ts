import type { PipelineOutcome } from '@/types/run';

export const JSON_EXPORT_VERSION = 1;

export interface JsonExportDocument {
  version: number;
  exportedAt: string;
  videoId: string;
  status: PipelineOutcome['status'];
  metadata: NonNullable<PipelineOutcome['transcript']>['metadata'];
  transcript: {
    sourceMode: NonNullable<PipelineOutcome['transcript']>['sourceMode'];
    language: string;
    segments: NonNullable<PipelineOutcome['transcript']>['segments'];
  };
  processedText: PipelineOutcome['processedText'] | null;
  summary: PipelineOutcome['summary'] | null;
  error: PipelineOutcome['error'] | null;
}

export function buildJsonExport(outcome: PipelineOutcome, exportedAt = new Date()): JsonExportDocument {
  const transcript = outcome.transcript;
  if (!transcript) {
    throw new Error(`Outcome for ${outcome.videoRef.videoId} has no transcript to export.`);
  }

  return {
    version: JSON_EXPORT_VERSION,
    exportedAt: exportedAt.toISOString(),
    videoId: outcome.videoRef.videoId,
    status: outcome.status,
    metadata: transcript.metadata,
    transcript: {
      sourceMode: transcript.sourceMode,
      language: transcript.language,
      segments: transcript.segments
    },
    processedText: outcome.processedText ?? null,
    summary: outcome.summary ?? null,
    error: outcome.error ?? null
  };
}

export function renderJson(outcome: PipelineOutcome, exportedAt?: Date): string {
  return `${JSON.stringify(buildJsonExport(outcome, exportedAt), null, 2)}\n`;
}
