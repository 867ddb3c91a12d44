import type {
  ExtractionMode,
  TranscriptResult,
  TranscriptSegment,
  VideoMetadata
} from '@/types/video';

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Sorts by start, drops empty text, merges cues sharing a start and clamps
 * overlaps so every segment ends at or before the next one starts.
 */
export function normalizeSegments(raw: readonly TranscriptSegment[]): TranscriptSegment[] {
  const sorted = raw
    .map((segment) => ({
      start: Math.max(0, segment.start),
      end: Math.max(0, segment.end),
      text: collapseWhitespace(segment.text)
    }))
    .filter((segment) => segment.text.length > 0 && Number.isFinite(segment.start))
    .sort((a, b) => a.start - b.start);

  const merged: TranscriptSegment[] = [];
  for (const segment of sorted) {
    const previous = merged.at(-1);
    if (previous && previous.start === segment.start) {
      previous.text = `${previous.text} ${segment.text}`;
      previous.end = Math.max(previous.end, segment.end);
      continue;
    }
    merged.push({ ...segment, end: Math.max(segment.end, segment.start) });
  }

  for (let index = 0; index < merged.length - 1; index += 1) {
    const current = merged[index];
    const next = merged[index + 1];
    if (current && next && current.end > next.start) {
      current.end = next.start;
    }
  }

  return merged;
}

export function buildTranscriptResult(opts: {
  segments: readonly TranscriptSegment[];
  sourceMode: ExtractionMode;
  language: string;
  metadata: VideoMetadata;
}): TranscriptResult {
  const segments = normalizeSegments(opts.segments);
  const lastEnd = segments.at(-1)?.end ?? 0;

  return {
    segments,
    sourceMode: opts.sourceMode,
    language: opts.language,
    metadata: {
      ...opts.metadata,
      duration: Math.max(opts.metadata.duration, lastEnd)
    }
  };
}

export function transcriptText(segments: readonly TranscriptSegment[]): string {
  return segments.map((segment) => segment.text).join(' ');
}
