import type { WhisperModelSize } from '@/types/video';

export type AiProviderName = 'openrouter' | 'claude';

const WHISPER_MODEL_SIZES: readonly WhisperModelSize[] = [
  'tiny',
  'base',
  'small',
  'medium',
  'large'
];

export function readStringEnv(key: string): string | undefined {
  const raw = process.env[key];
  if (typeof raw !== 'string') {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function readPositiveIntEnv(key: string, fallback: number): number {
  const raw = readStringEnv(key);
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

function readBooleanEnv(key: string, fallback: boolean): boolean {
  const raw = readStringEnv(key)?.toLowerCase();
  if (raw === 'true' || raw === '1' || raw === 'yes') {
    return true;
  }
  if (raw === 'false' || raw === '0' || raw === 'no') {
    return false;
  }
  return fallback;
}

function getAiProvider(): AiProviderName {
  return readStringEnv('AI_PROVIDER')?.toLowerCase() === 'claude' ? 'claude' : 'openrouter';
}

function getWhisperModel(): WhisperModelSize {
  const raw = readStringEnv('WHISPER_MODEL')?.toLowerCase();
  const match = WHISPER_MODEL_SIZES.find((size) => size === raw);
  return match ?? 'base';
}

// Getters so tests and long-lived processes see the current environment.
export const env = {
  get nodeEnv(): string {
    return readStringEnv('NODE_ENV') ?? 'development';
  },
  get cacheDir(): string {
    return readStringEnv('CACHE_DIR') ?? '.data/cache';
  },
  get runsDbPath(): string {
    return readStringEnv('RUNS_DB_PATH') ?? '.data/runs.json';
  },
  get artifactRootPath(): string {
    return readStringEnv('ARTIFACT_ROOT_PATH') ?? '.data/artifacts';
  },
  get batchConcurrency(): number {
    return readPositiveIntEnv('BATCH_CONCURRENCY', 3);
  },
  get collaboratorTimeoutMs(): number {
    return readPositiveIntEnv('COLLABORATOR_TIMEOUT_MS', 30_000);
  },
  get audioTimeoutMs(): number {
    return readPositiveIntEnv('AUDIO_TIMEOUT_MS', 30 * 60 * 1000);
  },
  get whisperModel(): WhisperModelSize {
    return getWhisperModel();
  },
  get whisperBin(): string {
    return readStringEnv('WHISPER_BIN') ?? 'whisper';
  },
  get ytDlpBin(): string {
    return readStringEnv('YT_DLP_BIN') ?? 'yt-dlp';
  },
  get ytDlpCookieFile(): string | undefined {
    return readStringEnv('YT_DLP_COOKIE_FILE');
  },
  get aiEnabled(): boolean {
    return readBooleanEnv('AI_ENABLED', true);
  },
  get aiProvider(): AiProviderName {
    return getAiProvider();
  },
  get openRouterApiKey(): string {
    return readStringEnv('OPENROUTER_API_KEY') ?? '';
  },
  get anthropicApiKey(): string {
    return readStringEnv('ANTHROPIC_API_KEY') ?? '';
  }
};

export function hasAiProviderKey(provider: AiProviderName = env.aiProvider): boolean {
  return provider === 'claude' ? env.anthropicApiKey.length > 0 : env.openRouterApiKey.length > 0;
}

export function getRuntimeWarnings(): string[] {
  const warnings: string[] = [];

  if (env.aiEnabled && !hasAiProviderKey()) {
    const key = env.aiProvider === 'claude' ? 'ANTHROPIC_API_KEY' : 'OPENROUTER_API_KEY';
    warnings.push(`${key} is not configured; AI summaries are disabled.`);
  }

  if (env.nodeEnv === 'production' && !readStringEnv('CACHE_DIR')) {
    warnings.push('CACHE_DIR is not configured in production mode; using .data/cache.');
  }

  return warnings;
}
