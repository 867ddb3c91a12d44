import { CACHE_SCHEMA_VERSION, EXTRACTION_RETRY_DEFAULTS } from '@/config/pipeline';
import { getErrorMessage, hasErrorCode, toErrorDetail } from '@/lib/errors';
import { deepFreeze } from '@/lib/freeze';
import { withRetry, type RetryPolicy } from '@/lib/retry';
import { SingleFlight } from '@/lib/single-flight';
import { withTimeout } from '@/lib/timeout';
import { cacheKeyForRef, metadataCacheKey } from '@/services/cache/cache-key';
import type { CacheEntry, CacheKey, MetadataCacheKey, TranscriptCache } from '@/services/cache/types';
import { renderExport } from '@/services/exporters';
import { transcriptText } from '@/services/extraction/segments';
import type { ExtractionStrategy } from '@/services/extraction/strategy';
import type { ExtractionResult, MetadataSource } from '@/services/extraction/types';
import type { ArtifactStore } from '@/services/storage';
import { summarizeTranscript, type Summarizer } from '@/services/summarizer';
import type { TextProcessor } from '@/services/text-processing';
import type {
  ErrorDetail,
  ExportFormat,
  PipelineOutcome,
  PipelineStageName,
  ProcessedText,
  StageRecord,
  SummaryResult
} from '@/types/run';
import type { TranscriptResult, VideoMetadata, VideoRef } from '@/types/video';

export interface NotesPipelineDeps {
  metadata: MetadataSource;
  cache: TranscriptCache;
  strategy: ExtractionStrategy;
  textProcessor: TextProcessor;
  summarizer?: Summarizer;
  artifacts?: ArtifactStore;
  metadataTimeoutMs: number;
  metadataRetry?: Partial<RetryPolicy>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  schemaVersion?: string;
  now?: () => Date;
}

export interface ProcessVideoOptions {
  /** Defaults to true; has no effect without a configured summarizer. */
  ai?: boolean;
  exports?: ExportFormat[];
  /** Namespace for stored exports. Exports are skipped without it. */
  runId?: string;
  signal?: AbortSignal;
}

export interface NotesPipeline {
  process(ref: VideoRef, opts?: ProcessVideoOptions): Promise<PipelineOutcome>;
}

type FlightValue =
  | { kind: 'cached'; entry: CacheEntry }
  | { kind: 'extracted'; result: ExtractionResult };

type StageResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Per-video stage sequence: metadata, cache lookup, extraction, processing,
 * summarization, export. Every path resolves to a frozen outcome; nothing
 * here throws for a collaborator failure.
 */
export function createNotesPipeline(deps: NotesPipelineDeps): NotesPipeline {
  const flights = new SingleFlight<FlightValue>();
  const now = deps.now ?? (() => new Date());
  const schemaVersion = deps.schemaVersion ?? CACHE_SCHEMA_VERSION;

  async function readCache(key: CacheKey): Promise<CacheEntry | undefined> {
    try {
      return await deps.cache.get(key);
    } catch (error) {
      console.warn(`[pipeline][cache] lookup failed for ${key.videoId}, treating as miss: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  async function writeCache(key: CacheKey, transcript: TranscriptResult): Promise<void> {
    try {
      await deps.cache.put(key, transcript);
    } catch (error) {
      const reason = hasErrorCode(error, 'STORAGE_UNAVAILABLE') ? 'storage unavailable' : 'write failed';
      console.warn(`[pipeline][cache] ${reason} for ${key.videoId}, continuing without cache: ${getErrorMessage(error)}`);
    }
  }

  async function readMetadataCache(key: MetadataCacheKey): Promise<VideoMetadata | undefined> {
    try {
      return (await deps.cache.getMetadata(key))?.payload;
    } catch (error) {
      console.warn(`[pipeline][cache] metadata lookup failed for ${key.videoId}, resolving: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  async function writeMetadataCache(key: MetadataCacheKey, metadata: VideoMetadata): Promise<void> {
    try {
      await deps.cache.putMetadata(key, metadata);
    } catch (error) {
      console.warn(`[pipeline][cache] metadata for ${key.videoId} not cached: ${getErrorMessage(error)}`);
    }
  }

  function extractOnce(
    key: CacheKey,
    ref: VideoRef,
    metadata: VideoMetadata,
    signal?: AbortSignal
  ): Promise<{ value: FlightValue; shared: boolean }> {
    return flights.run(key.id, async (flightSignal) => {
      const cached = await readCache(key);
      if (cached) {
        return { kind: 'cached', entry: cached };
      }

      const result = await deps.strategy.extract({
        ref,
        metadata,
        language: ref.language ?? metadata.language ?? 'en',
        requestedLanguage: ref.language,
        mode: ref.mode,
        signal: flightSignal
      });

      if (result.state === 'succeeded') {
        await writeCache(key, result.transcript);
      }
      return { kind: 'extracted', result };
    }, signal);
  }

  async function process(ref: VideoRef, opts: ProcessVideoOptions = {}): Promise<PipelineOutcome> {
    const startedAt = now().toISOString();
    const stages: StageRecord[] = [];
    const artifacts: Record<string, string> = {};
    let cacheHit = false;
    let sharedExtraction = false;
    let error: ErrorDetail | undefined;

    async function runStage<T>(
      stage: PipelineStageName,
      task: () => Promise<T> | T
    ): Promise<StageResult<T>> {
      const stageStartedAt = now().toISOString();
      try {
        const value = await task();
        stages.push({ stage, status: 'completed', startedAt: stageStartedAt, finishedAt: now().toISOString() });
        return { ok: true, value };
      } catch (stageError) {
        stages.push({
          stage,
          status: 'failed',
          startedAt: stageStartedAt,
          finishedAt: now().toISOString(),
          error: getErrorMessage(stageError)
        });
        return { ok: false, error: stageError };
      }
    }

    function skipStage(stage: PipelineStageName): void {
      const at = now().toISOString();
      stages.push({ stage, status: 'skipped', startedAt: at, finishedAt: at });
    }

    function finish(
      status: PipelineOutcome['status'],
      extra: { transcript?: TranscriptResult; processedText?: ProcessedText; summary?: SummaryResult } = {}
    ): PipelineOutcome {
      if (status === 'failed') {
        console.error(`[pipeline] ${ref.videoId} failed at ${error?.stage ?? 'unknown'}: ${error?.message ?? 'unknown error'}`);
      }

      const outcome: PipelineOutcome = {
        videoRef: ref,
        status,
        ...extra,
        ...(error ? { error } : {}),
        cacheHit,
        sharedExtraction,
        artifacts,
        stages,
        startedAt,
        completedAt: now().toISOString()
      };
      return deepFreeze(outcome);
    }

    // 1. metadata, served from the cache when a fresh copy exists
    const metadataKey = metadataCacheKey(ref.videoId, schemaVersion);
    const metadataResult = await runStage('metadata', async () => {
      const cachedMetadata = await readMetadataCache(metadataKey);
      if (cachedMetadata) {
        return cachedMetadata;
      }

      const resolved = await withRetry(
        () =>
          withTimeout(
            `metadata for ${ref.videoId}`,
            deps.metadataTimeoutMs,
            (signal) => deps.metadata.resolve(ref, signal),
            opts.signal
          ),
        {
          ...EXTRACTION_RETRY_DEFAULTS,
          ...deps.metadataRetry,
          signal: opts.signal,
          sleep: deps.sleep
        }
      );
      await writeMetadataCache(metadataKey, resolved);
      return resolved;
    });
    if (!metadataResult.ok) {
      error = toErrorDetail(metadataResult.error, 'metadata', 'NETWORK_ERROR');
      return finish('failed');
    }
    const metadata = metadataResult.value;

    // 2. cache lookup
    const key = cacheKeyForRef(ref, schemaVersion);
    const lookup = await runStage('cache_lookup', () => readCache(key));
    const hit = lookup.ok ? lookup.value : undefined;

    // 3. extraction
    let transcript: TranscriptResult;
    if (hit) {
      cacheHit = true;
      transcript = hit.payload;
      skipStage('extraction');
    } else {
      const extraction = await runStage('extraction', async () => {
        const flight = await extractOnce(key, ref, metadata, opts.signal);
        sharedExtraction = flight.shared;
        if (flight.value.kind === 'cached') {
          cacheHit = true;
          return flight.value.entry.payload;
        }

        const { result } = flight.value;
        if (result.state === 'failed') {
          error = result.error;
          throw new Error(result.error.message);
        }
        return result.transcript;
      });

      if (!extraction.ok) {
        error ??= toErrorDetail(extraction.error, 'extraction', 'EXTRACTION_FAILED');
        return finish('failed');
      }
      transcript = extraction.value;
    }

    // 4. processing
    const processing = await runStage('processing', () => deps.textProcessor.process(transcript));
    const processedText = processing.ok ? processing.value : undefined;
    if (!processing.ok) {
      error = toErrorDetail(processing.error, 'processing', 'PROCESSING_FAILED');
      console.warn(`[pipeline] ${ref.videoId} processing failed, keeping transcript: ${error.message}`);
    }

    // 5. summarization
    let summary: SummaryResult | undefined;
    const summarizer = deps.summarizer;
    if ((opts.ai ?? true) && summarizer) {
      const text = processedText?.text || transcriptText(transcript.segments);
      const summarization = await runStage('summarization', () =>
        summarizeTranscript(summarizer, text, { signal: opts.signal })
      );
      if (summarization.ok) {
        summary = summarization.value;
      } else {
        error ??= toErrorDetail(summarization.error, 'summarization', 'PROVIDER_ERROR');
        console.warn(`[pipeline][ai] ${ref.videoId} summary unavailable: ${getErrorMessage(summarization.error)}`);
      }
    } else {
      skipStage('summarization');
    }

    // 6. export
    const formats = opts.exports ?? [];
    const { artifacts: artifactStore } = deps;
    const runId = opts.runId;
    if (formats.length > 0 && artifactStore && runId) {
      const draft: PipelineOutcome = {
        videoRef: ref,
        status: error ? 'partial' : 'success',
        transcript,
        processedText,
        summary,
        error,
        cacheHit,
        sharedExtraction,
        artifacts: {},
        stages: [],
        startedAt,
        completedAt: startedAt
      };
      const exported = await runStage('export', async () => {
        for (const format of formats) {
          const document = await renderExport(draft, format, now());
          artifacts[format] = await artifactStore.store(runId, document.fileName, document.content);
        }
      });
      if (!exported.ok) {
        error ??= toErrorDetail(exported.error, 'export', 'EXPORT_FAILED');
        console.warn(`[pipeline][export] ${ref.videoId} export failed: ${getErrorMessage(exported.error)}`);
      }
    } else {
      skipStage('export');
    }

    return finish(error ? 'partial' : 'success', {
      transcript,
      ...(processedText ? { processedText } : {}),
      ...(summary ? { summary } : {})
    });
  }

  return { process };
}
