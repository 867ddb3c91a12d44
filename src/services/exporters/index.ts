import { sanitizeFileName } from '@/lib/timestamps';
import { renderJson } from '@/services/exporters/json';
import { renderMarkdown } from '@/services/exporters/markdown';
import { renderPdf } from '@/services/exporters/pdf';
import type { ExportFormat, PipelineOutcome } from '@/types/run';

export interface ExportDocument {
  format: ExportFormat;
  fileName: string;
  /** Text for markdown and json, bytes for pdf. */
  content: string | Uint8Array;
}

const EXTENSIONS: Record<ExportFormat, string> = {
  markdown: 'md',
  json: 'json',
  pdf: 'pdf'
};

export function exportFileName(outcome: PipelineOutcome, format: ExportFormat): string {
  const title = outcome.transcript?.metadata.title ?? '';
  const base = title ? `${outcome.videoRef.videoId}-${sanitizeFileName(title, 80)}` : outcome.videoRef.videoId;
  return `${base}.${EXTENSIONS[format]}`;
}

async function renderContent(
  outcome: PipelineOutcome,
  format: ExportFormat,
  generatedAt?: Date
): Promise<string | Uint8Array> {
  switch (format) {
    case 'markdown':
      return renderMarkdown(outcome, { generatedAt });
    case 'json':
      return renderJson(outcome, generatedAt);
    case 'pdf':
      return renderPdf(outcome, { generatedAt });
  }
}

export async function renderExport(
  outcome: PipelineOutcome,
  format: ExportFormat,
  generatedAt?: Date
): Promise<ExportDocument> {
  const content = await renderContent(outcome, format, generatedAt);
  return { format, fileName: exportFileName(outcome, format), content };
}
