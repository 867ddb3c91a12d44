import { getOpenRouterSettings, type SummarizerSettings } from '@/config/ai-models';
import { PipelineError } from '@/lib/errors';
import { asArray, asRecord, asString } from '@/lib/raw';
import { PromptSummarizer } from '@/services/summarizer/prompt-summarizer';
import type { CompletionRequest } from '@/services/summarizer/types';

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OpenRouterOptions {
  apiKey: string;
  settings?: SummarizerSettings & { baseUrl: string; appName: string; siteUrl?: string };
  fetchImpl?: FetchLike;
}

export function extractMessageContent(payload: unknown): string {
  const choice = asRecord(asArray(asRecord(payload)?.choices)[0]);
  const content = asRecord(choice?.message)?.content;

  if (typeof content === 'string' && content.trim()) {
    return content;
  }

  const text = asArray(content)
    .map((item) => asString(asRecord(item)?.text))
    .join('')
    .trim();
  if (text) {
    return text;
  }

  throw new PipelineError({
    code: 'PROVIDER_ERROR',
    message: 'OpenRouter response did not include message content.'
  });
}

export function classifyOpenRouterStatus(status: number, detail: string): PipelineError {
  const message = `OpenRouter request failed (${status}): ${detail}`;
  if (status === 402 || status === 429) {
    return new PipelineError({ code: 'QUOTA_EXCEEDED', message, retryable: status === 429 });
  }
  return new PipelineError({ code: 'PROVIDER_ERROR', message, retryable: status >= 500 });
}

export class OpenRouterSummarizer extends PromptSummarizer {
  readonly provider = 'openrouter' as const;

  private readonly apiKey: string;
  private readonly endpoint: NonNullable<OpenRouterOptions['settings']>;
  private readonly fetchImpl: FetchLike;

  constructor(opts: OpenRouterOptions) {
    const settings = opts.settings ?? getOpenRouterSettings();
    super(settings);
    this.apiKey = opts.apiKey;
    this.endpoint = settings;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.endpoint.timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(this.endpoint.baseUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          ...(this.endpoint.siteUrl ? { 'HTTP-Referer': this.endpoint.siteUrl } : {}),
          'X-Title': this.endpoint.appName
        },
        body: JSON.stringify({
          model: this.endpoint.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt }
          ],
          temperature: this.endpoint.temperature,
          max_tokens: request.maxTokens
        }),
        signal: controller.signal
      });

      if (!response.ok) {
        const detail = await response.text();
        throw classifyOpenRouterStatus(response.status, detail || response.statusText);
      }

      const payload: unknown = await response.json();
      return extractMessageContent(payload);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new PipelineError({
          code: request.signal?.aborted ? 'CANCELLED' : 'TIMEOUT',
          message: request.signal?.aborted
            ? 'OpenRouter request was cancelled.'
            : 'OpenRouter request timed out.',
          cause: error
        });
      }

      throw new PipelineError({
        code: 'PROVIDER_ERROR',
        message: error instanceof Error ? error.message : 'OpenRouter request failed.',
        cause: error
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
