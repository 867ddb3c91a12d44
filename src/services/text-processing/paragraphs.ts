import { PARAGRAPH_MIN_PAUSE_SEC } from '@/config/pipeline';
import type { TranscriptSegment, VideoChapter } from '@/types/video';

export interface ChapterGroup {
  chapter?: VideoChapter;
  segments: TranscriptSegment[];
}

/** Starts a new paragraph wherever the gap to the next segment is at least `minPauseSec`. */
export function detectParagraphs(
  segments: readonly TranscriptSegment[],
  minPauseSec = PARAGRAPH_MIN_PAUSE_SEC
): string[] {
  const paragraphs: string[] = [];
  let current: string[] = [];

  segments.forEach((segment, index) => {
    current.push(segment.text.trim());
    const next = segments[index + 1];
    if (!next || next.start - segment.end >= minPauseSec) {
      paragraphs.push(current.join(' '));
      current = [];
    }
  });

  return paragraphs;
}

function chapterEnd(chapters: readonly VideoChapter[], index: number): number {
  const chapter = chapters[index];
  if (!chapter) {
    return Number.POSITIVE_INFINITY;
  }
  if (chapter.endSec > chapter.startSec) {
    return chapter.endSec;
  }
  return chapters[index + 1]?.startSec ?? Number.POSITIVE_INFINITY;
}

/**
 * Groups segments under the chapter their start falls in. Segments before the
 * first chapter form a leading group without a chapter.
 */
export function groupByChapter(
  segments: readonly TranscriptSegment[],
  chapters: readonly VideoChapter[]
): ChapterGroup[] {
  if (chapters.length === 0) {
    return segments.length > 0 ? [{ segments: [...segments] }] : [];
  }

  const groups: ChapterGroup[] = [];
  for (const segment of segments) {
    const chapterIndex = chapters.findIndex(
      (chapter, index) => segment.start >= chapter.startSec && segment.start < chapterEnd(chapters, index)
    );
    const chapter = chapterIndex >= 0 ? chapters[chapterIndex] : undefined;
    const last = groups.at(-1);

    if (last && last.chapter === chapter) {
      last.segments.push(segment);
    } else {
      groups.push({ ...(chapter ? { chapter } : {}), segments: [segment] });
    }
  }

  return groups;
}

/** Buckets segments into fixed windows of `windowSec` seconds, keyed by window start. */
export function groupByTimeWindow(
  segments: readonly TranscriptSegment[],
  windowSec: number
): Array<{ startSec: number; segments: TranscriptSegment[] }> {
  const groups: Array<{ startSec: number; segments: TranscriptSegment[] }> = [];
  for (const segment of segments) {
    const startSec = Math.floor(segment.start / windowSec) * windowSec;
    const last = groups.at(-1);
    if (last && last.startSec === startSec) {
      last.segments.push(segment);
    } else {
      groups.push({ startSec, segments: [segment] });
    }
  }
  return groups;
}
