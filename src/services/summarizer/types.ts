import type { AiProviderName } from '@/config/env';

export interface SummarizerCallOptions {
  signal?: AbortSignal;
}

/** Capability set shared by every AI provider. Failures throw PROVIDER_ERROR or QUOTA_EXCEEDED. */
export interface Summarizer {
  readonly provider: AiProviderName;
  readonly model: string;
  summarize(text: string, opts?: SummarizerCallOptions & { maxWords?: number }): Promise<string>;
  extractKeyPoints(
    text: string,
    opts?: SummarizerCallOptions & { count?: number }
  ): Promise<string[]>;
  analyzeSentiment(text: string, opts?: SummarizerCallOptions): Promise<string>;
  generateQuestions(
    text: string,
    opts?: SummarizerCallOptions & { count?: number }
  ): Promise<string[]>;
}

export interface CompletionRequest {
  system: string;
  prompt: string;
  maxTokens: number;
  signal?: AbortSignal;
}
