import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import test from 'node:test';
import { DELETE as deleteCache, GET as getCacheStats } from '../src/app/api/cache/route';
import { GET as getArtifact } from '../src/app/api/artifacts/[runId]/[...artifact]/route';
import { DELETE as deleteRun, GET as getRun } from '../src/app/api/runs/[id]/route';
import { GET as listRunsRoute, POST as createRunRoute } from '../src/app/api/runs/route';
import { createRun, getRunById, setRunStatus } from '../src/data/run-store';
import { PipelineError } from '../src/lib/errors';
import { asRecord } from '../src/lib/raw';
import { MemoryTranscriptCache, cacheKeyForRef, metadataCacheKey } from '../src/services/cache';
import { createExtractionStrategy } from '../src/services/extraction/strategy';
import { createTextProcessor } from '../src/services/text-processing';
import type { RunStatus } from '../src/types/run';
import type { PlaylistEntry } from '../src/types/video';
import { setRuntimeForTests, startRun, toRunFailure } from '../src/workflows/runtime';
import { createNotesPipeline } from '../src/workflows/video-notes';
import {
  MemoryArtifactStore,
  SAMPLE_SEGMENTS,
  StubAudioTranscriber,
  StubCaptionSource,
  StubMetadataSource,
  StubPlaylistResolver,
  makeMetadata,
  noSleep
} from './helpers/fixtures';
import { waitFor, withTempDataEnv } from './helpers/temp-env';

function installRuntime(playlist: PlaylistEntry[] = []) {
  const captions = new StubCaptionSource();
  const cache = new MemoryTranscriptCache();
  const artifacts = new MemoryArtifactStore();
  const pipeline = createNotesPipeline({
    metadata: new StubMetadataSource(),
    cache,
    strategy: createExtractionStrategy({
      captions,
      audio: new StubAudioTranscriber(),
      whisperModel: 'tiny',
      timeouts: { captions: 1_000, audio: 1_000 },
      sleep: noSleep
    }),
    textProcessor: createTextProcessor(),
    artifacts,
    metadataTimeoutMs: 1_000,
    sleep: noSleep
  });
  setRuntimeForTests({ deps: { pipeline, playlists: new StubPlaylistResolver(playlist) }, cache });
  return { captions, cache, artifacts };
}

function postRuns(body: unknown): Request {
  return new Request('http://localhost/api/runs', {
    method: 'POST',
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body)
  });
}

async function readJson(response: Response): Promise<Record<string, unknown>> {
  const parsed: unknown = await response.json();
  return asRecord(parsed) ?? {};
}

function idContext(id: string) {
  return { params: Promise.resolve({ id }) };
}

async function waitForStatus(runId: string, status: RunStatus): Promise<void> {
  await waitFor(async () => (await getRunById(runId))?.status === status);
}

test('POST /api/runs accepts urls and the run completes in the background', async () => {
  await withTempDataEnv('runs-post', async () => {
    const { artifacts } = installRuntime();
    try {
      const response = await createRunRoute(
        postRuns({
          urls: ['https://www.youtube.com/watch?v=vid00000001', 'vid00000002'],
          options: { language: 'en', exports: ['markdown', 'markdown'] }
        })
      );
      assert.equal(response.status, 202);
      const body = await readJson(response);
      assert.equal(body.status, 'pending');
      const runId = String(body.runId);

      await waitForStatus(runId, 'completed');
      const run = await getRunById(runId);
      assert.deepEqual(run?.options, { language: 'en', exports: ['markdown'] });
      assert.deepEqual(run?.source, { kind: 'urls', count: 2 });
      assert.deepEqual(
        run?.items.map((item) => `${item.videoId}:${item.status}:${item.sourceMode}`),
        ['vid00000001:success:captions', 'vid00000002:success:captions']
      );
      assert.deepEqual(run?.counts, { total: 2, completed: 2, succeeded: 2, partial: 0, failed: 0 });
      assert.equal(
        run?.items[0]?.artifacts.markdown,
        `/api/artifacts/${runId}/vid00000001-Video_vid00000001.md`
      );
      assert.equal(artifacts.files.size, 2);

      const listed: unknown = await (await listRunsRoute()).json();
      assert.ok(Array.isArray(listed));
      assert.equal(listed.length, 1);
    } finally {
      setRuntimeForTests();
    }
  });
});

test('POST /api/runs rejects malformed payloads with 400', async () => {
  await withTempDataEnv('runs-invalid', async () => {
    const invalidJson = await createRunRoute(postRuns('{"urls": ['));
    assert.equal(invalidJson.status, 400);
    assert.deepEqual(await readJson(invalidJson), {
      error: 'Request body must be valid JSON.',
      code: 'INVALID_INPUT'
    });

    const both = await createRunRoute(
      postRuns({ urls: ['vid00000001'], playlistUrl: 'https://www.youtube.com/playlist?list=PLtest000001' })
    );
    assert.equal(both.status, 400);
    assert.equal((await readJson(both)).error, 'Provide exactly one of urls or playlistUrl.');

    const badUrls = await createRunRoute(postRuns({ urls: ['vid00000001', 'not a url'] }));
    assert.equal(badUrls.status, 400);
    assert.deepEqual((await readJson(badUrls)).details, { invalid: ['not a url'] });

    const badConcurrency = await createRunRoute(postRuns({ urls: ['vid00000001'], options: { concurrency: 0 } }));
    assert.equal(badConcurrency.status, 400);
    assert.equal(
      (await readJson(badConcurrency)).error,
      'options.concurrency must be an integer between 1 and 16.'
    );

    const runs: unknown = await (await listRunsRoute()).json();
    assert.deepEqual(runs, []);
  });
});

test('a playlist run records the expanded items', async () => {
  await withTempDataEnv('runs-playlist', async () => {
    installRuntime([
      { videoId: 'vid00000001', title: 'One' },
      { videoId: 'private0001', title: '[Private video]', unavailableReason: 'Private video' }
    ]);
    try {
      const response = await createRunRoute(
        postRuns({ playlistUrl: 'https://www.youtube.com/playlist?list=PLtest000001' })
      );
      const runId = String((await readJson(response)).runId);

      await waitForStatus(runId, 'completed');
      const run = await getRunById(runId);
      assert.deepEqual(
        run?.items.map((item) => `${item.videoId}:${item.status}`),
        ['vid00000001:success', 'private0001:failed']
      );
      assert.equal(run?.items[1]?.error?.code, 'NOT_FOUND');
    } finally {
      setRuntimeForTests();
    }
  });
});

test('a stored playlist run with a bad URL fails without starting', async () => {
  await withTempDataEnv('runs-bad-playlist', async () => {
    const run = await createRun({ source: { kind: 'playlist', url: 'https://example.com/list' }, options: {} });

    await startRun(run.id);

    const stored = await getRunById(run.id);
    assert.equal(stored?.status, 'failed');
    assert.equal(stored?.error?.code, 'INVALID_INPUT');
    assert.ok(stored?.completedAt);
  });
});

test('a cancel that arrives while a run is starting leaves it cancelled', async () => {
  await withTempDataEnv('runs-cancel-starting', async () => {
    const { captions } = installRuntime();
    try {
      const run = await createRun({ source: { kind: 'urls', count: 1 }, options: {}, videoIds: ['vid00000001'] });

      const starting = startRun(run.id);
      const response = await deleteRun(new Request('http://localhost'), idContext(run.id));
      assert.equal(response.status, 202);
      await starting;

      assert.equal((await getRunById(run.id))?.status, 'cancelled');
      assert.equal(captions.calls.length, 0);
    } finally {
      setRuntimeForTests();
    }
  });
});

test('run failures without a pipeline code are reported as internal errors', () => {
  const internal = toRunFailure(new TypeError('boom'));
  assert.equal(internal.code, 'INTERNAL_ERROR');
  assert.equal(internal.message, 'boom');
  assert.equal(internal.stage, 'batch');
  assert.equal(internal.operatorHint, 'Unexpected failure; the server log has the stack trace.');

  const playlist = toRunFailure(
    new PipelineError({ code: 'PLAYLIST_RESOLUTION_FAILED', message: 'Could not resolve playlist PLx.' })
  );
  assert.equal(playlist.code, 'PLAYLIST_RESOLUTION_FAILED');
});

test('GET and DELETE /api/runs/[id] report missing and finished runs', async () => {
  await withTempDataEnv('runs-id', async () => {
    const missing = await getRun(new Request('http://localhost/api/runs/nope'), idContext('nope'));
    assert.equal(missing.status, 404);
    assert.equal((await deleteRun(new Request('http://localhost'), idContext('nope'))).status, 404);

    const run = await createRun({ source: { kind: 'urls', count: 1 }, options: {}, videoIds: ['vid00000001'] });
    const found = await getRun(new Request('http://localhost'), idContext(run.id));
    assert.equal(found.status, 200);
    assert.equal((await readJson(found)).id, run.id);

    await setRunStatus(run.id, 'completed');
    const finished = await deleteRun(new Request('http://localhost'), idContext(run.id));
    assert.equal(finished.status, 409);
    assert.deepEqual(await readJson(finished), { error: 'Run is already completed.', status: 'completed' });
  });
});

test('DELETE /api/runs/[id] cancels a pending run with no live controller', async () => {
  await withTempDataEnv('runs-cancel-pending', async () => {
    const run = await createRun({ source: { kind: 'urls', count: 1 }, options: {}, videoIds: ['vid00000001'] });

    const response = await deleteRun(new Request('http://localhost'), idContext(run.id));

    assert.equal(response.status, 202);
    assert.deepEqual(await readJson(response), { runId: run.id, cancelled: true });
    assert.equal((await getRunById(run.id))?.status, 'cancelled');
  });
});

test('DELETE /api/runs/[id] stops dispatch of a running run', async () => {
  await withTempDataEnv('runs-cancel-running', async () => {
    const { captions } = installRuntime();
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    captions.setBehavior(async (_ref, language) => {
      await gate;
      return { segments: SAMPLE_SEGMENTS.map((segment) => ({ ...segment })), language };
    });

    try {
      const response = await createRunRoute(
        postRuns({ urls: ['vid00000001', 'vid00000002', 'vid00000003'], options: { concurrency: 1 } })
      );
      const runId = String((await readJson(response)).runId);
      await waitFor(async () => captions.calls.length === 1);

      const cancelled = await deleteRun(new Request('http://localhost'), idContext(runId));
      assert.equal(cancelled.status, 202);
      release();

      await waitForStatus(runId, 'cancelled');
      const run = await getRunById(runId);
      assert.deepEqual(
        run?.items.map((item) => item.status),
        ['success', 'failed', 'failed']
      );
      assert.equal(run?.items[2]?.error?.code, 'CANCELLED');
      assert.equal(captions.calls.length, 1);
    } finally {
      setRuntimeForTests();
    }
  });
});

test('cache routes report stats and clear by video id', async () => {
  await withTempDataEnv('cache-routes', async () => {
    const cache = new MemoryTranscriptCache();
    setRuntimeForTests({ cache });
    try {
      await cache.put(cacheKeyForRef({ videoId: 'vid00000001' }), {
        segments: SAMPLE_SEGMENTS,
        sourceMode: 'captions',
        language: 'en',
        metadata: makeMetadata('vid00000001')
      });

      const stats = await readJson(await getCacheStats());
      assert.equal(stats.entryCount, 1);

      const invalid = await deleteCache(new Request('http://localhost/api/cache?olderThanDays=abc', { method: 'DELETE' }));
      assert.equal(invalid.status, 400);
      const badScope = await deleteCache(new Request('http://localhost/api/cache?scope=audio', { method: 'DELETE' }));
      assert.equal(badScope.status, 400);

      await cache.putMetadata(metadataCacheKey('vid00000001'), makeMetadata('vid00000001'));
      const metadataOnly = await deleteCache(
        new Request('http://localhost/api/cache?scope=metadata&videoId=vid00000001', { method: 'DELETE' })
      );
      assert.deepEqual(await readJson(metadataOnly), { removed: 1 });

      const other = await deleteCache(new Request('http://localhost/api/cache?videoId=other', { method: 'DELETE' }));
      assert.deepEqual(await readJson(other), { removed: 0 });

      const removed = await deleteCache(
        new Request('http://localhost/api/cache?videoId=vid00000001', { method: 'DELETE' })
      );
      assert.deepEqual(await readJson(removed), { removed: 1 });
    } finally {
      setRuntimeForTests();
    }
  });
});

test('artifact route serves stored files and rejects traversal', async () => {
  await withTempDataEnv('artifact-route', async ({ artifactRootPath }) => {
    await mkdir(path.join(artifactRootPath, 'run_1'), { recursive: true });
    await writeFile(path.join(artifactRootPath, 'run_1', 'notes.md'), '# Notes\n', 'utf8');
    const context = (runId: string, artifact: string[]) => ({ params: Promise.resolve({ runId, artifact }) });
    const request = new Request('http://localhost');

    const found = await getArtifact(request, context('run_1', ['notes.md']));
    assert.equal(found.status, 200);
    assert.equal(found.headers.get('Content-Type'), 'text/markdown; charset=utf-8');
    assert.equal(await found.text(), '# Notes\n');

    await writeFile(path.join(artifactRootPath, 'run_1', 'notes.pdf'), new Uint8Array([37, 80, 68, 70, 0, 255]));
    const pdf = await getArtifact(request, context('run_1', ['notes.pdf']));
    assert.equal(pdf.headers.get('Content-Type'), 'application/pdf');
    assert.deepEqual([...new Uint8Array(await pdf.arrayBuffer())], [37, 80, 68, 70, 0, 255]);

    assert.equal((await getArtifact(request, context('run_1', ['missing.md']))).status, 404);
    assert.equal((await getArtifact(request, context('run_1', ['..', 'secret']))).status, 400);
    assert.equal((await getArtifact(request, context('run_1', []))).status, 400);
  });
});
