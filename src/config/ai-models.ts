import { readPositiveIntEnv, readStringEnv } from '@/config/env';

const DEFAULT_OPENROUTER_MODEL = 'openai/gpt-4o-mini';
const DEFAULT_OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1/chat/completions';
const DEFAULT_CLAUDE_MODEL = 'claude-3-5-sonnet-20241022';

export interface SummarizerSettings {
  model: string;
  temperature: number;
  maxTokensSummary: number;
  maxTokensKeyPoints: number;
  maxTokensAnalysis: number;
  /** Transcript characters sent to the provider; longer inputs are truncated. */
  maxInputChars: number;
  timeoutMs: number;
}

function readSharedSettings(): Omit<SummarizerSettings, 'model'> {
  return {
    temperature: 0.2,
    maxTokensSummary: readPositiveIntEnv('SUMMARY_MAX_TOKENS', 1024),
    maxTokensKeyPoints: readPositiveIntEnv('KEY_POINTS_MAX_TOKENS', 1024),
    maxTokensAnalysis: readPositiveIntEnv('ANALYSIS_MAX_TOKENS', 512),
    maxInputChars: readPositiveIntEnv('SUMMARY_MAX_INPUT_CHARS', 15_000),
    timeoutMs: readPositiveIntEnv('AI_TIMEOUT_MS', 60_000)
  };
}

export function getOpenRouterSettings(): SummarizerSettings & {
  baseUrl: string;
  appName: string;
  siteUrl?: string;
} {
  return {
    ...readSharedSettings(),
    model: readStringEnv('OPENROUTER_MODEL') ?? DEFAULT_OPENROUTER_MODEL,
    baseUrl: readStringEnv('OPENROUTER_BASE_URL') ?? DEFAULT_OPENROUTER_BASE_URL,
    appName: readStringEnv('OPENROUTER_APP_NAME') ?? 'video-notes',
    siteUrl: readStringEnv('OPENROUTER_SITE_URL')
  };
}

export function getClaudeSettings(): SummarizerSettings & { baseUrl?: string } {
  return {
    ...readSharedSettings(),
    model: readStringEnv('CLAUDE_MODEL') ?? DEFAULT_CLAUDE_MODEL,
    baseUrl: readStringEnv('ANTHROPIC_BASE_URL')
  };
}
