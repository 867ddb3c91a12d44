import assert from 'node:assert/strict';
import test from 'node:test';
import { CACHE_TTL_MS } from '../src/config/pipeline';
import { PipelineError } from '../src/lib/errors';
import { createVideoRef } from '../src/lib/video-url';
import { MemoryTranscriptCache, cacheKeyForRef } from '../src/services/cache';
import type { CacheEntry, CacheKey, TranscriptCache } from '../src/services/cache';
import { createExtractionStrategy } from '../src/services/extraction/strategy';
import { createTextProcessor } from '../src/services/text-processing';
import { createNotesPipeline, type NotesPipelineDeps } from '../src/workflows/video-notes';
import type { TranscriptResult } from '../src/types/video';
import {
  MemoryArtifactStore,
  StubAudioTranscriber,
  StubCaptionSource,
  StubMetadataSource,
  StubSummarizer,
  deferred,
  noSleep,
  rawTranscript
} from './helpers/fixtures';

const T0 = Date.UTC(2024, 0, 1);

function setup(overrides: Partial<NotesPipelineDeps> = {}) {
  const metadata = new StubMetadataSource();
  const captions = new StubCaptionSource();
  const audio = new StubAudioTranscriber();
  const cache = new MemoryTranscriptCache(() => T0);
  const artifacts = new MemoryArtifactStore();
  const deps: NotesPipelineDeps = {
    metadata,
    cache,
    strategy: createExtractionStrategy({
      captions,
      audio,
      whisperModel: 'base',
      timeouts: { captions: 1_000, audio: 1_000 },
      sleep: noSleep
    }),
    textProcessor: createTextProcessor(),
    artifacts,
    metadataTimeoutMs: 1_000,
    sleep: noSleep,
    now: () => new Date(T0),
    ...overrides
  };
  return { metadata, captions, audio, cache, artifacts, pipeline: createNotesPipeline(deps) };
}

class FailingCache implements TranscriptCache {
  async get(): Promise<CacheEntry | undefined> {
    throw new PipelineError({ code: 'STORAGE_UNAVAILABLE', message: 'disk gone' });
  }

  async put(): Promise<CacheEntry> {
    throw new PipelineError({ code: 'STORAGE_UNAVAILABLE', message: 'disk gone' });
  }

  async getMetadata(): Promise<undefined> {
    throw new PipelineError({ code: 'STORAGE_UNAVAILABLE', message: 'disk gone' });
  }

  async putMetadata(): Promise<never> {
    throw new PipelineError({ code: 'STORAGE_UNAVAILABLE', message: 'disk gone' });
  }

  async stats(): Promise<never> {
    throw new PipelineError({ code: 'STORAGE_UNAVAILABLE', message: 'disk gone' });
  }

  async clear(): Promise<number> {
    return 0;
  }
}

test('sample video with captions disabled is transcribed from audio and cached for 30 days', async () => {
  const { captions, audio, cache, pipeline } = setup();
  captions.setBehavior(async () => {
    throw new PipelineError({ code: 'NO_CAPTIONS', message: 'Captions disabled.' });
  });
  const ref = createVideoRef('abc123', { language: 'en' });

  const outcome = await pipeline.process(ref);

  assert.equal(outcome.status, 'success');
  assert.equal(outcome.transcript?.sourceMode, 'audio');
  assert.equal(audio.calls.length, 1);
  assert.equal(outcome.cacheHit, false);

  const entry = await cache.get(cacheKeyForRef(ref));
  assert.ok(entry);
  assert.equal(entry.createdAt, T0);
  assert.equal(entry.expiresAt, entry.createdAt + 30 * 24 * 60 * 60 * 1000);
  assert.equal(entry.expiresAt - entry.createdAt, CACHE_TTL_MS);
});

test('a repeated request is served from the cache with the same transcript', async () => {
  const { captions, pipeline } = setup();
  const ref = createVideoRef('vid00000001', { language: 'en' });

  const first = await pipeline.process(ref);
  const second = await pipeline.process(ref);

  assert.equal(first.cacheHit, false);
  assert.equal(second.cacheHit, true);
  assert.equal(captions.calls.length, 1);
  assert.deepEqual(second.transcript, first.transcript);
  assert.deepEqual(
    second.stages.map((stage) => `${stage.stage}:${stage.status}`),
    [
      'metadata:completed',
      'cache_lookup:completed',
      'extraction:skipped',
      'processing:completed',
      'summarization:skipped',
      'export:skipped'
    ]
  );
});

test('outcomes are deeply frozen', async () => {
  const { pipeline } = setup();
  const outcome = await pipeline.process(createVideoRef('vid00000001'));

  assert.equal(Object.isFrozen(outcome), true);
  assert.equal(Object.isFrozen(outcome.transcript?.segments), true);
  assert.equal(Object.isFrozen(outcome.stages), true);
});

test('a metadata NOT_FOUND fails the item at the metadata stage', async () => {
  const { metadata, captions, pipeline } = setup();
  metadata.failures.set('missing0001', new PipelineError({ code: 'NOT_FOUND', message: 'Video unavailable.' }));

  const outcome = await pipeline.process(createVideoRef('missing0001'));

  assert.equal(outcome.status, 'failed');
  assert.equal(outcome.error?.code, 'NOT_FOUND');
  assert.equal(outcome.error?.stage, 'metadata');
  assert.equal(outcome.transcript, undefined);
  assert.equal(captions.calls.length, 0);
  assert.equal(metadata.calls.length, 1);
});

test('extraction failure yields a failed outcome with the extraction error', async () => {
  const { captions, pipeline } = setup();
  captions.setBehavior(async () => {
    throw new PipelineError({ code: 'NO_CAPTIONS', message: 'none' });
  });

  const outcome = await pipeline.process(createVideoRef('vid00000001', { mode: 'captions' }));

  assert.equal(outcome.status, 'failed');
  assert.equal(outcome.error?.code, 'NO_CAPTIONS');
  assert.equal(outcome.error?.stage, 'extraction');
  assert.equal(outcome.stages.at(-1)?.stage, 'extraction');
  assert.equal(outcome.stages.at(-1)?.status, 'failed');
});

test('an AI summary failure degrades the outcome to partial and keeps the transcript', async () => {
  const summarizer = new StubSummarizer();
  summarizer.failSummary = new PipelineError({ code: 'QUOTA_EXCEEDED', message: 'Out of credits.' });
  const { pipeline } = setup({ summarizer });

  const outcome = await pipeline.process(createVideoRef('vid00000001'));

  assert.equal(outcome.status, 'partial');
  assert.equal(outcome.error?.code, 'QUOTA_EXCEEDED');
  assert.equal(outcome.error?.stage, 'summarization');
  assert.ok(outcome.transcript);
  assert.ok(outcome.processedText);
  assert.equal(outcome.summary, undefined);
});

test('sentiment failures are left out without degrading the outcome', async () => {
  const summarizer = new StubSummarizer();
  summarizer.failSentiment = new Error('sentiment offline');
  const { pipeline } = setup({ summarizer });

  const outcome = await pipeline.process(createVideoRef('vid00000001'));

  assert.equal(outcome.status, 'success');
  assert.equal(outcome.summary?.summary, 'A short summary.');
  assert.deepEqual(outcome.summary?.keyPoints, ['First point', 'Second point']);
  assert.equal(outcome.summary?.sentiment, undefined);
  assert.deepEqual(outcome.summary?.questions, ['What is caching?']);
});

test('ai: false skips summarization even with a summarizer configured', async () => {
  const { pipeline } = setup({ summarizer: new StubSummarizer() });
  const outcome = await pipeline.process(createVideoRef('vid00000001'), { ai: false });

  assert.equal(outcome.summary, undefined);
  assert.equal(outcome.stages.find((stage) => stage.stage === 'summarization')?.status, 'skipped');
});

test('a processing failure is partial and summarization still runs on the raw transcript', async () => {
  const summarizer = new StubSummarizer();
  const { pipeline } = setup({
    summarizer,
    textProcessor: {
      process: () => {
        throw new Error('tokenizer crashed');
      }
    }
  });

  const outcome = await pipeline.process(createVideoRef('vid00000001'));

  assert.equal(outcome.status, 'partial');
  assert.equal(outcome.error?.code, 'PROCESSING_FAILED');
  assert.equal(outcome.error?.message, 'tokenizer crashed');
  assert.equal(outcome.processedText, undefined);
  assert.equal(outcome.summary?.summary, 'A short summary.');
});

test('an unusable cache degrades to uncached processing', async () => {
  const { captions, pipeline } = setup({ cache: new FailingCache() });
  const ref = createVideoRef('vid00000001');

  const first = await pipeline.process(ref);
  const second = await pipeline.process(ref);

  assert.equal(first.status, 'success');
  assert.equal(second.status, 'success');
  assert.equal(second.cacheHit, false);
  assert.equal(captions.calls.length, 2);
});

test('exports are rendered and stored under the run id', async () => {
  const { artifacts, pipeline } = setup();
  const outcome = await pipeline.process(createVideoRef('vid00000001'), {
    runId: 'run_test',
    exports: ['markdown', 'json']
  });

  assert.equal(outcome.status, 'success');
  assert.deepEqual(outcome.artifacts, {
    markdown: '/api/artifacts/run_test/vid00000001-Video_vid00000001.md',
    json: '/api/artifacts/run_test/vid00000001-Video_vid00000001.json'
  });
  const markdown = artifacts.files.get('run_test/vid00000001-Video_vid00000001.md') ?? '';
  assert.match(markdown, /^# Video vid00000001\n/);
});

test('exports are skipped without a run id', async () => {
  const { artifacts, pipeline } = setup();
  const outcome = await pipeline.process(createVideoRef('vid00000001'), { exports: ['markdown'] });

  assert.deepEqual(outcome.artifacts, {});
  assert.equal(artifacts.files.size, 0);
  assert.equal(outcome.stages.at(-1)?.status, 'skipped');
});

test('concurrent requests for one key share a single extraction', async () => {
  const { captions, cache, pipeline } = setup();
  const gate = deferred<void>();
  let started = 0;
  captions.setBehavior(async (_ref, language) => {
    started += 1;
    await gate.promise;
    return rawTranscript(language);
  });
  const ref = createVideoRef('racevideo01', { language: 'en' });

  const first = pipeline.process(ref);
  const second = pipeline.process(ref);
  while (started === 0) {
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
  gate.resolve();
  const outcomes = await Promise.all([first, second]);

  assert.equal(captions.calls.length, 1);
  assert.deepEqual(
    outcomes.map((outcome) => outcome.status),
    ['success', 'success']
  );
  assert.deepEqual(
    outcomes.map((outcome) => outcome.sharedExtraction).sort(),
    [false, true]
  );
  assert.equal((await cache.stats()).entryCount, 1);
  const key: CacheKey = cacheKeyForRef(ref);
  const entry = await cache.get(key);
  const transcript: TranscriptResult | undefined = entry?.payload;
  assert.deepEqual(transcript, outcomes[0]?.transcript);
});

test('cancelling one caller does not cancel another caller sharing its extraction', async () => {
  const { captions, pipeline } = setup();
  const gate = deferred<void>();
  let captionSignal: AbortSignal | undefined;
  captions.setBehavior(async (_ref, language, signal) => {
    captionSignal = signal;
    await gate.promise;
    return rawTranscript(language);
  });
  const ref = createVideoRef('sharedvid01', { language: 'en' });
  const runA = new AbortController();

  const first = pipeline.process(ref, { signal: runA.signal });
  const second = pipeline.process(ref);
  while (captions.calls.length === 0) {
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
  runA.abort();
  gate.resolve();
  const [a, b] = await Promise.all([first, second]);

  assert.equal(a.status, 'failed');
  assert.equal(a.error?.code, 'CANCELLED');
  assert.equal(a.error?.stage, 'extraction');
  assert.equal(b.status, 'success');
  assert.equal(b.sharedExtraction, true);
  assert.equal(captionSignal?.aborted, false);
  assert.equal(captions.calls.length, 1);
});

test('video metadata is cached and reused until the metadata scope is cleared', async () => {
  const { metadata, cache, pipeline } = setup();
  const ref = createVideoRef('vid00000001', { language: 'en' });

  await pipeline.process(ref);
  const warm = await pipeline.process(ref);

  assert.deepEqual(metadata.calls, ['vid00000001']);
  assert.equal(warm.transcript?.metadata.title, 'Video vid00000001');
  assert.equal(warm.stages[0]?.status, 'completed');
  const stats = await cache.stats();
  assert.equal(stats.entryCount, 1);
  assert.equal(stats.metadataEntryCount, 1);

  assert.equal(await cache.clear(undefined, 'metadata'), 1);
  assert.equal((await cache.stats()).entryCount, 1);

  const refreshed = await pipeline.process(ref);
  assert.equal(metadata.calls.length, 2);
  assert.equal(refreshed.cacheHit, true);
});
