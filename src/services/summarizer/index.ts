import { env, hasAiProviderKey, type AiProviderName } from '@/config/env';
import { getErrorMessage } from '@/lib/errors';
import { ClaudeSummarizer } from '@/services/summarizer/claude';
import { OpenRouterSummarizer } from '@/services/summarizer/openrouter';
import type { Summarizer } from '@/services/summarizer/types';
import type { SummaryResult } from '@/types/run';

export type { Summarizer } from '@/services/summarizer/types';

/** Returns undefined when AI is disabled or the selected provider has no key. */
export function createSummarizer(
  provider: AiProviderName = env.aiProvider
): Summarizer | undefined {
  if (!env.aiEnabled || !hasAiProviderKey(provider)) {
    return undefined;
  }

  return provider === 'claude'
    ? new ClaudeSummarizer({ apiKey: env.anthropicApiKey })
    : new OpenRouterSummarizer({ apiKey: env.openRouterApiKey });
}

/**
 * Summary and key points are required; sentiment and questions are extras
 * whose failures are logged and left out of the result.
 */
export async function summarizeTranscript(
  summarizer: Summarizer,
  text: string,
  opts: { signal?: AbortSignal; keyPointCount?: number; questionCount?: number } = {}
): Promise<SummaryResult> {
  const summary = await summarizer.summarize(text, { signal: opts.signal });
  const keyPoints = await summarizer.extractKeyPoints(text, {
    signal: opts.signal,
    count: opts.keyPointCount
  });

  const result: SummaryResult = {
    provider: summarizer.provider,
    model: summarizer.model,
    summary,
    keyPoints
  };

  try {
    result.sentiment = { analysis: await summarizer.analyzeSentiment(text, { signal: opts.signal }) };
  } catch (error) {
    console.warn(`[summarizer][${summarizer.provider}] sentiment skipped: ${getErrorMessage(error)}`);
  }

  try {
    result.questions = await summarizer.generateQuestions(text, {
      signal: opts.signal,
      count: opts.questionCount
    });
  } catch (error) {
    console.warn(`[summarizer][${summarizer.provider}] questions skipped: ${getErrorMessage(error)}`);
  }

  return result;
}
