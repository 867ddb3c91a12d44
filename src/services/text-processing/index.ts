import { PARAGRAPH_MIN_PAUSE_SEC } from '@/config/pipeline';
import {
  calculateStatistics,
  extractKeyPoints,
  extractKeywords
} from '@/services/text-processing/analysis';
import { cleanText } from '@/services/text-processing/cleanup';
import { detectParagraphs } from '@/services/text-processing/paragraphs';
import type { ProcessedText } from '@/types/run';
import type { TranscriptResult } from '@/types/video';

export interface TextProcessingOptions {
  removeFillers?: boolean;
  minPauseSec?: number;
  keywordCount?: number;
  keyPointCount?: number;
}

export interface TextProcessor {
  process(transcript: TranscriptResult): ProcessedText | Promise<ProcessedText>;
}

export function processTranscript(
  transcript: TranscriptResult,
  opts: TextProcessingOptions = {}
): ProcessedText {
  const paragraphs = detectParagraphs(
    transcript.segments,
    opts.minPauseSec ?? PARAGRAPH_MIN_PAUSE_SEC
  )
    .map((paragraph) => cleanText(paragraph, { removeFillers: opts.removeFillers }))
    .filter((paragraph) => paragraph.length > 0);

  const text = paragraphs.join('\n\n');

  return {
    paragraphs,
    text,
    keywords: extractKeywords(text, opts.keywordCount),
    keyPoints: extractKeyPoints(text, opts.keyPointCount),
    statistics: calculateStatistics(text, transcript.metadata.duration)
  };
}

export function createTextProcessor(opts: TextProcessingOptions = {}): TextProcessor {
  return {
    process: (transcript) => processTranscript(transcript, opts)
  };
}
