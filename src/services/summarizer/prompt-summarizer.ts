import type { AiProviderName } from '@/config/env';
import type { SummarizerSettings } from '@/config/ai-models';
import type { CompletionRequest, Summarizer, SummarizerCallOptions } from '@/services/summarizer/types';

const SYSTEM_PROMPT = 'You write accurate, concise study notes from video transcripts.';

export function truncateInput(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}...`;
}

/** Reads numbered or bulleted lines from a model reply, dropping the markers. */
export function parseListResponse(content: string, limit: number): string[] {
  const items: string[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.trim();
    if (!/^(\d+[.)]|[-*•])/.test(line)) {
      continue;
    }
    const item = line.replace(/^(\d+[.)]|[-*•])\s*/, '').trim();
    if (item) {
      items.push(item);
    }
  }
  return items.slice(0, limit);
}

/**
 * Shared prompt layer. Providers only supply `complete`; prompts, input
 * truncation and list parsing live here.
 */
export abstract class PromptSummarizer implements Summarizer {
  abstract readonly provider: AiProviderName;

  constructor(protected readonly settings: SummarizerSettings) {}

  get model(): string {
    return this.settings.model;
  }

  protected abstract complete(request: CompletionRequest): Promise<string>;

  private input(text: string): string {
    return truncateInput(text, this.settings.maxInputChars);
  }

  async summarize(
    text: string,
    opts: SummarizerCallOptions & { maxWords?: number } = {}
  ): Promise<string> {
    const maxWords = opts.maxWords ?? 300;
    const reply = await this.complete({
      system: SYSTEM_PROMPT,
      prompt: [
        `Provide a concise summary of the following video transcript in approximately ${maxWords} words.`,
        'Focus on the main ideas and key takeaways.',
        '',
        'Transcript:',
        this.input(text)
      ].join('\n'),
      maxTokens: this.settings.maxTokensSummary,
      signal: opts.signal
    });
    return reply.trim();
  }

  async extractKeyPoints(
    text: string,
    opts: SummarizerCallOptions & { count?: number } = {}
  ): Promise<string[]> {
    const count = opts.count ?? 5;
    const reply = await this.complete({
      system: SYSTEM_PROMPT,
      prompt: [
        `Extract exactly ${count} key points or main ideas from the following video transcript.`,
        'Return only a numbered list, one point per line.',
        '',
        'Transcript:',
        this.input(text)
      ].join('\n'),
      maxTokens: this.settings.maxTokensKeyPoints,
      signal: opts.signal
    });
    return parseListResponse(reply, count);
  }

  async analyzeSentiment(text: string, opts: SummarizerCallOptions = {}): Promise<string> {
    const reply = await this.complete({
      system: SYSTEM_PROMPT,
      prompt: [
        'Describe the overall sentiment, tone, and intended audience of the following transcript in a short paragraph.',
        '',
        'Transcript:',
        this.input(text)
      ].join('\n'),
      maxTokens: this.settings.maxTokensAnalysis,
      signal: opts.signal
    });
    return reply.trim();
  }

  async generateQuestions(
    text: string,
    opts: SummarizerCallOptions & { count?: number } = {}
  ): Promise<string[]> {
    const count = opts.count ?? 5;
    const reply = await this.complete({
      system: SYSTEM_PROMPT,
      prompt: [
        `Write ${count} discussion questions about the following transcript.`,
        'Return only a numbered list, one question per line.',
        '',
        'Transcript:',
        this.input(text)
      ].join('\n'),
      maxTokens: this.settings.maxTokensAnalysis,
      signal: opts.signal
    });
    return parseListResponse(reply, count);
  }
}
