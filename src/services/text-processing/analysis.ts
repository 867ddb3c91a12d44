import { READING_SPEED_WPM } from '@/config/pipeline';
import stopWordList from '@/config/stop-words.json';
import type { KeywordScore, TextStatistics } from '@/types/run';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

export function calculateStatistics(text: string, durationSec?: number): TextStatistics {
  const wordCount = text.split(/\s+/).filter(Boolean).length;
  const statistics: TextStatistics = {
    wordCount,
    characterCount: text.length,
    characterCountNoSpaces: text.replace(/\s/g, '').length,
    sentenceCount: splitSentences(text).length,
    readingTimeMinutes: {
      fast: roundOne(wordCount / READING_SPEED_WPM.fast),
      average: roundOne(wordCount / READING_SPEED_WPM.average),
      slow: roundOne(wordCount / READING_SPEED_WPM.slow)
    }
  };

  if (durationSec && durationSec > 0) {
    statistics.speakingRateWpm = roundOne((wordCount / durationSec) * 60);
  }

  return statistics;
}

/** Most frequent words longer than three letters, ties kept in first-seen order. */
export function extractKeywords(text: string, topN = 10): KeywordScore[] {
  const counts = new Map<string, number>();
  const words = text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .split(/\s+/)
    .filter((word) => word.length > 3 && !STOP_WORDS.has(word));

  for (const word of words) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([keyword, count]) => ({ keyword, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, topN);
}

/** Evenly spaced sentences longer than 20 characters. */
export function extractKeyPoints(text: string, count = 5): string[] {
  const sentences = splitSentences(text).filter((sentence) => sentence.length > 20);
  if (sentences.length <= count) {
    return sentences;
  }

  const step = sentences.length / count;
  const points: string[] = [];
  for (let index = 0; index < count; index += 1) {
    const sentence = sentences[Math.floor(index * step)];
    if (sentence) {
      points.push(sentence);
    }
  }
  return points;
}
