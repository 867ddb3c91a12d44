import Anthropic from '@anthropic-ai/sdk';
import { getClaudeSettings, type SummarizerSettings } from '@/config/ai-models';
import { PipelineError, getErrorMessage } from '@/lib/errors';
import { PromptSummarizer } from '@/services/summarizer/prompt-summarizer';
import type { CompletionRequest } from '@/services/summarizer/types';

export interface ClaudeCompletionParams {
  model: string;
  maxTokens: number;
  temperature: number;
  system: string;
  prompt: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ClaudeCompletion = (params: ClaudeCompletionParams) => Promise<string>;

export function createSdkCompletion(apiKey: string, baseUrl?: string): ClaudeCompletion {
  const client = new Anthropic({ apiKey, ...(baseUrl ? { baseURL: baseUrl } : {}) });

  return async (params) => {
    const message = await client.messages.create(
      {
        model: params.model,
        max_tokens: params.maxTokens,
        temperature: params.temperature,
        system: params.system,
        messages: [{ role: 'user', content: params.prompt }]
      },
      { signal: params.signal, timeout: params.timeoutMs, maxRetries: 0 }
    );

    return message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();
  };
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }
  return typeof error.status === 'number' ? error.status : undefined;
}

export function mapClaudeError(error: unknown, signal?: AbortSignal): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const message = getErrorMessage(error, 'Claude request failed.');
  if (signal?.aborted) {
    return new PipelineError({ code: 'CANCELLED', message: 'Claude request was cancelled.', cause: error });
  }

  const status = readStatus(error);
  const lower = message.toLowerCase();
  if (status === 429 || lower.includes('rate limit') || lower.includes('credit balance')) {
    return new PipelineError({
      code: 'QUOTA_EXCEEDED',
      message: `Claude quota or rate limit reached: ${message}`,
      retryable: status === 429,
      cause: error
    });
  }

  return new PipelineError({
    code: 'PROVIDER_ERROR',
    message: `Claude request failed${status ? ` (${status})` : ''}: ${message}`,
    retryable: status !== undefined && status >= 500,
    cause: error
  });
}

export class ClaudeSummarizer extends PromptSummarizer {
  readonly provider = 'claude' as const;

  private readonly completion: ClaudeCompletion;

  constructor(opts: {
    apiKey: string;
    settings?: SummarizerSettings & { baseUrl?: string };
    completion?: ClaudeCompletion;
  }) {
    const settings = opts.settings ?? getClaudeSettings();
    super(settings);
    this.completion = opts.completion ?? createSdkCompletion(opts.apiKey, settings.baseUrl);
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    try {
      const text = await this.completion({
        model: this.settings.model,
        maxTokens: request.maxTokens,
        temperature: this.settings.temperature,
        system: request.system,
        prompt: request.prompt,
        timeoutMs: this.settings.timeoutMs,
        signal: request.signal
      });
      if (!text) {
        throw new PipelineError({ code: 'PROVIDER_ERROR', message: 'Claude returned an empty reply.' });
      }
      return text;
    } catch (error) {
      throw mapClaudeError(error, request.signal);
    }
  }
}
