export const CACHE_TTL_MS = 30 * 24 * 60 * 60 * 1000;

/** Bump when the cached TranscriptResult shape changes; old entries stop matching. */
export const CACHE_SCHEMA_VERSION = 'v1';

export const EXTRACTION_RETRY_DEFAULTS = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
  backoffFactor: 2
} as const;

export const PARAGRAPH_MIN_PAUSE_SEC = 2;

export const READING_SPEED_WPM = {
  fast: 250,
  average: 225,
  slow: 200
} as const;

export const FILLER_WORDS = [
  'um',
  'uh',
  'ah',
  'er',
  'like',
  'you know',
  'I mean',
  'sort of',
  'kind of',
  'basically',
  'actually',
  'literally'
];

export const CAPTION_ARTIFACTS = ['[Music]', '[Applause]', '[Laughter]'];
