import { PipelineError } from '../../src/lib/errors';
import type {
  AudioTranscriber,
  CaptionSource,
  MetadataSource,
  PlaylistResolver,
  RawTranscript
} from '../../src/services/extraction/types';
import type { ArtifactContent, ArtifactStore } from '../../src/services/storage';
import type { Summarizer } from '../../src/services/summarizer';
import type { PlaylistEntry, TranscriptSegment, VideoMetadata, VideoRef } from '../../src/types/video';

export function makeMetadata(videoId: string, overrides: Partial<VideoMetadata> = {}): VideoMetadata {
  return {
    videoId,
    title: `Video ${videoId}`,
    channel: 'Test Channel',
    publishedAt: '2024-01-15',
    duration: 60,
    viewCount: 1234,
    likeCount: 56,
    tags: [],
    chapters: [],
    url: `https://www.youtube.com/watch?v=${videoId}`,
    ...overrides
  };
}

export const SAMPLE_SEGMENTS: TranscriptSegment[] = [
  { start: 0, end: 4, text: 'welcome to the channel' },
  { start: 4, end: 9, text: 'today we talk about caching' },
  { start: 12, end: 18, text: 'caching keeps repeated work cheap' }
];

export function rawTranscript(language = 'en', segments = SAMPLE_SEGMENTS): RawTranscript {
  return { segments: segments.map((segment) => ({ ...segment })), language };
}

export class StubMetadataSource implements MetadataSource {
  calls: string[] = [];
  failures = new Map<string, PipelineError>();

  async resolve(ref: VideoRef): Promise<VideoMetadata> {
    this.calls.push(ref.videoId);
    const failure = this.failures.get(ref.videoId);
    if (failure) {
      throw failure;
    }
    return makeMetadata(ref.videoId);
  }
}

type CaptionBehavior = (ref: VideoRef, language: string, signal?: AbortSignal) => Promise<RawTranscript>;

export class StubCaptionSource implements CaptionSource {
  calls: Array<{ videoId: string; language: string }> = [];

  constructor(private behavior: CaptionBehavior = async (_ref, language) => rawTranscript(language)) {}

  setBehavior(behavior: CaptionBehavior): void {
    this.behavior = behavior;
  }

  async fetch(ref: VideoRef, language: string, signal?: AbortSignal): Promise<RawTranscript> {
    this.calls.push({ videoId: ref.videoId, language });
    return this.behavior(ref, language, signal);
  }
}

type AudioBehavior = (ref: VideoRef, language: string | undefined) => Promise<RawTranscript>;

export class StubAudioTranscriber implements AudioTranscriber {
  calls: Array<{ videoId: string; modelSize: string; language: string | undefined }> = [];

  constructor(private behavior: AudioBehavior = async (_ref, language) => rawTranscript(language ?? 'en')) {}

  setBehavior(behavior: AudioBehavior): void {
    this.behavior = behavior;
  }

  async transcribe(
    ref: VideoRef,
    modelSize: string,
    language: string | undefined
  ): Promise<RawTranscript> {
    this.calls.push({ videoId: ref.videoId, modelSize, language });
    return this.behavior(ref, language);
  }
}

export class StubPlaylistResolver implements PlaylistResolver {
  constructor(private readonly result: PlaylistEntry[] | Error) {}

  async expand(): Promise<PlaylistEntry[]> {
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export class MemoryArtifactStore implements ArtifactStore {
  readonly files = new Map<string, string>();
  readonly binaries = new Map<string, Uint8Array>();

  async store(runId: string, artifactName: string, content: ArtifactContent): Promise<string> {
    if (typeof content === 'string') {
      this.files.set(`${runId}/${artifactName}`, content);
    } else {
      this.binaries.set(`${runId}/${artifactName}`, content);
    }
    return `/api/artifacts/${runId}/${artifactName}`;
  }
}

export class StubSummarizer implements Summarizer {
  readonly provider = 'openrouter';
  readonly model = 'test-model';
  failSummary: Error | undefined;
  failSentiment: Error | undefined;

  async summarize(): Promise<string> {
    if (this.failSummary) {
      throw this.failSummary;
    }
    return 'A short summary.';
  }

  async extractKeyPoints(): Promise<string[]> {
    return ['First point', 'Second point'];
  }

  async analyzeSentiment(): Promise<string> {
    if (this.failSentiment) {
      throw this.failSentiment;
    }
    return 'Positive and upbeat.';
  }

  async generateQuestions(): Promise<string[]> {
    return ['What is caching?'];
  }
}

/** A promise plus the functions that settle it. */
export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const noSleep = async (): Promise<void> => {};
