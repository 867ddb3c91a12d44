import { formatDuration, formatTimestamp } from '@/lib/timestamps';
import { buildTimestampedUrl } from '@/lib/video-url';
import { groupByChapter, groupByTimeWindow } from '@/services/text-processing/paragraphs';
import { cleanText } from '@/services/text-processing/cleanup';
import type { PipelineOutcome } from '@/types/run';
import type { TranscriptSegment } from '@/types/video';

export interface MarkdownOptions {
  includeTimestamps?: boolean;
  clickableTimestamps?: boolean;
  /** Seconds per transcript section; 0 lists segments one by one. */
  groupBySeconds?: number;
  includeThumbnail?: boolean;
  includeDescription?: boolean;
  includeTags?: boolean;
  includeStatistics?: boolean;
  includeToc?: boolean;
  cleanTranscript?: boolean;
  generatedAt?: Date;
}

const numberFormat = new Intl.NumberFormat('en-US');

function timestampLabel(
  videoId: string,
  seconds: number,
  opts: Required<Pick<MarkdownOptions, 'clickableTimestamps'>>
): string {
  const label = formatTimestamp(seconds);
  return opts.clickableTimestamps ? `[${label}](${buildTimestampedUrl(videoId, seconds)})` : label;
}

function segmentText(text: string, clean: boolean): string {
  return clean ? cleanText(text, { removeFillers: false }) : text;
}

function renderSequential(
  videoId: string,
  segments: readonly TranscriptSegment[],
  opts: Required<Pick<MarkdownOptions, 'includeTimestamps' | 'clickableTimestamps' | 'cleanTranscript'>>
): string[] {
  return segments.map((segment) => {
    const text = segmentText(segment.text, opts.cleanTranscript);
    return opts.includeTimestamps
      ? `**${timestampLabel(videoId, segment.start, opts)}** ${text}`
      : text;
  });
}

function renderGrouped(
  videoId: string,
  segments: readonly TranscriptSegment[],
  windowSec: number,
  opts: Required<Pick<MarkdownOptions, 'includeTimestamps' | 'clickableTimestamps' | 'cleanTranscript'>>
): string[] {
  const lines: string[] = [];
  for (const group of groupByTimeWindow(segments, windowSec)) {
    if (opts.includeTimestamps) {
      lines.push(`### ${timestampLabel(videoId, group.startSec, opts)}`);
    }
    lines.push(segmentText(group.segments.map((segment) => segment.text).join(' '), opts.cleanTranscript));
  }
  return lines;
}

/** Renders a successful or partial outcome as a Markdown study note. */
export function renderMarkdown(outcome: PipelineOutcome, options: MarkdownOptions = {}): string {
  const transcript = outcome.transcript;
  if (!transcript) {
    throw new Error(`Outcome for ${outcome.videoRef.videoId} has no transcript to export.`);
  }

  const opts = {
    includeTimestamps: options.includeTimestamps ?? true,
    clickableTimestamps: options.clickableTimestamps ?? true,
    groupBySeconds: options.groupBySeconds ?? 0,
    includeThumbnail: options.includeThumbnail ?? true,
    includeDescription: options.includeDescription ?? true,
    includeTags: options.includeTags ?? false,
    includeStatistics: options.includeStatistics ?? true,
    includeToc: options.includeToc ?? true,
    cleanTranscript: options.cleanTranscript ?? true
  };
  const { metadata } = transcript;
  const lines: string[] = [`# ${metadata.title}`, ''];

  const summary = outcome.summary;
  if (summary?.summary) {
    lines.push('## Summary', '', summary.summary, '');
    if (summary.keyPoints.length > 0) {
      lines.push('### Key Points', '', ...summary.keyPoints.map((point) => `- ${point}`), '');
    }
  }

  lines.push('## Video Information', '');
  lines.push(`- **Channel**: ${metadata.channel}`);
  lines.push(`- **Upload Date**: ${metadata.publishedAt ?? 'Unknown'}`);
  if (metadata.duration > 0) {
    lines.push(`- **Duration**: ${formatDuration(metadata.duration)}`);
  }
  if (metadata.viewCount > 0) {
    lines.push(`- **Views**: ${numberFormat.format(metadata.viewCount)}`);
  }
  if (metadata.likeCount > 0) {
    lines.push(`- **Likes**: ${numberFormat.format(metadata.likeCount)}`);
  }
  lines.push(`- **Transcript Source**: ${transcript.sourceMode} (${transcript.language})`);
  lines.push(`- **URL**: [${metadata.url}](${metadata.url})`);

  if (opts.includeTags && metadata.tags.length > 0) {
    lines.push('', `**Tags**: ${metadata.tags.slice(0, 10).join(', ')}`);
  }
  if (opts.includeThumbnail && metadata.thumbnailUrl) {
    lines.push('', `![Video Thumbnail](${metadata.thumbnailUrl})`);
  }

  const statistics = outcome.processedText?.statistics;
  if (opts.includeStatistics && statistics) {
    lines.push('', '## Statistics', '');
    lines.push(`- **Word Count**: ${numberFormat.format(statistics.wordCount)}`);
    lines.push(`- **Character Count**: ${numberFormat.format(statistics.characterCount)}`);
    lines.push(`- **Estimated Reading Time**: ${statistics.readingTimeMinutes.average} minutes`);
    if (statistics.speakingRateWpm !== undefined) {
      lines.push(`- **Speaking Rate**: ${statistics.speakingRateWpm} words/minute`);
    }
  }

  if (opts.includeToc && metadata.chapters.length > 0) {
    lines.push('', '## Table of Contents', '');
    metadata.chapters.forEach((chapter, index) => {
      lines.push(`${index + 1}. ${timestampLabel(metadata.videoId, chapter.startSec, opts)} - ${chapter.title}`);
    });
  }

  if (opts.includeDescription && metadata.description) {
    lines.push('', '## Description', '', metadata.description);
  }

  lines.push('', '## Transcript', '');
  if (opts.groupBySeconds > 0) {
    lines.push(renderGrouped(metadata.videoId, transcript.segments, opts.groupBySeconds, opts).join('\n\n'));
  } else if (metadata.chapters.length > 0) {
    for (const group of groupByChapter(transcript.segments, metadata.chapters)) {
      if (group.chapter) {
        lines.push(`### ${group.chapter.title}`, '');
      }
      lines.push(renderSequential(metadata.videoId, group.segments, opts).join('\n\n'), '');
    }
  } else {
    lines.push(renderSequential(metadata.videoId, transcript.segments, opts).join('\n\n'));
  }

  const generatedAt = (options.generatedAt ?? new Date()).toISOString();
  lines.push('', '---', `*Notes generated ${generatedAt}*`, '');

  return lines.join('\n');
}
