import assert from 'node:assert/strict';
import test from 'node:test';
import { PipelineError } from '../src/lib/errors';
import { createVideoRef } from '../src/lib/video-url';
import { MemoryTranscriptCache } from '../src/services/cache';
import { createExtractionStrategy } from '../src/services/extraction/strategy';
import { createTextProcessor } from '../src/services/text-processing';
import { runBatch, type BatchDeps } from '../src/workflows/batch';
import { createConsoleReporter, type ProgressReporter } from '../src/workflows/reporter';
import { createNotesPipeline, type NotesPipeline } from '../src/workflows/video-notes';
import type { PlaylistEntry, VideoRef } from '../src/types/video';
import {
  StubAudioTranscriber,
  StubCaptionSource,
  StubMetadataSource,
  StubPlaylistResolver,
  deferred,
  noSleep
} from './helpers/fixtures';

const PLAYLIST = { playlistId: 'PLtest000001', url: 'https://www.youtube.com/playlist?list=PLtest000001' };

function createDeps(playlist: PlaylistEntry[] | Error = []) {
  const metadata = new StubMetadataSource();
  const captions = new StubCaptionSource();
  const pipeline = createNotesPipeline({
    metadata,
    cache: new MemoryTranscriptCache(),
    strategy: createExtractionStrategy({
      captions,
      audio: new StubAudioTranscriber(),
      whisperModel: 'tiny',
      timeouts: { captions: 1_000, audio: 1_000 },
      sleep: noSleep
    }),
    textProcessor: createTextProcessor(),
    metadataTimeoutMs: 1_000,
    sleep: noSleep
  });
  const deps: BatchDeps = { pipeline, playlists: new StubPlaylistResolver(playlist) };
  return { deps, metadata, captions };
}

function refs(...ids: string[]): VideoRef[] {
  return ids.map((id) => createVideoRef(id));
}

for (const concurrency of [1, 2, 5]) {
  test(`batch returns one index-aligned outcome per input at concurrency ${concurrency}`, async () => {
    const { deps } = createDeps();
    const input = refs('video000001', 'video000002', 'video000001', 'video000003', 'video000002');

    const run = await runBatch(deps, { refs: input }, { concurrency });

    assert.equal(run.outcomes.length, 5);
    assert.deepEqual(
      run.outcomes.map((outcome) => outcome?.videoRef.videoId),
      ['video000001', 'video000002', 'video000001', 'video000003', 'video000002']
    );
    assert.deepEqual(run.counts, { total: 5, completed: 5, succeeded: 5, partial: 0, failed: 0 });
    assert.equal(run.cancelled, false);
    assert.ok(run.completedAt);
  });
}

test('one failing item does not stop the rest of the batch', async () => {
  const { deps, metadata } = createDeps();
  metadata.failures.set('broken00001', new PipelineError({ code: 'NOT_FOUND', message: 'Video unavailable.' }));

  const run = await runBatch(deps, { refs: refs('video000001', 'broken00001', 'video000002') }, { concurrency: 2 });

  assert.deepEqual(
    run.outcomes.map((outcome) => outcome?.status),
    ['success', 'failed', 'success']
  );
  assert.equal(run.outcomes[1]?.error?.code, 'NOT_FOUND');
  assert.equal(run.counts.failed, 1);
  assert.equal(run.counts.succeeded, 2);
});

test('a pipeline that throws is isolated as a failed batch outcome', async () => {
  const throwing: NotesPipeline = {
    async process(ref) {
      throw new Error(`exploded on ${ref.videoId}`);
    }
  };

  const run = await runBatch(
    { pipeline: throwing, playlists: new StubPlaylistResolver([]) },
    { refs: refs('video000001') },
    { concurrency: 1 }
  );

  assert.equal(run.outcomes[0]?.status, 'failed');
  assert.equal(run.outcomes[0]?.error?.stage, 'batch');
  assert.equal(run.outcomes[0]?.error?.message, 'exploded on video000001');
});

test('invalid concurrency is rejected before any work starts', async () => {
  const { deps, metadata } = createDeps();
  await assert.rejects(
    runBatch(deps, { refs: refs('video000001') }, { concurrency: 0 }),
    (error: unknown) => error instanceof PipelineError && error.code === 'INVALID_INPUT'
  );
  assert.equal(metadata.calls.length, 0);
});

test('playlist entries are expanded and unavailable ones become failed items', async () => {
  const { deps, metadata } = createDeps([
    { videoId: 'video000001', title: 'One' },
    { videoId: 'private0001', title: '[Private video]', unavailableReason: 'Private video' },
    { videoId: 'video000002', title: 'Two' }
  ]);

  const run = await runBatch(deps, { playlist: PLAYLIST, language: 'en' }, { concurrency: 2 });

  assert.deepEqual(
    run.items.map((item) => item.videoId),
    ['video000001', 'private0001', 'video000002']
  );
  assert.equal(run.items[0]?.language, 'en');
  assert.deepEqual(
    run.outcomes.map((outcome) => outcome?.status),
    ['success', 'failed', 'success']
  );
  assert.equal(run.outcomes[1]?.error?.code, 'NOT_FOUND');
  assert.equal(run.outcomes[1]?.error?.message, 'private0001 is unavailable: Private video.');
  assert.ok(!metadata.calls.includes('private0001'));
});

test('maxItems caps the playlist expansion', async () => {
  const { deps } = createDeps([
    { videoId: 'video000001', title: 'One' },
    { videoId: 'video000002', title: 'Two' },
    { videoId: 'video000003', title: 'Three' }
  ]);

  const run = await runBatch(deps, { playlist: PLAYLIST }, { concurrency: 1, maxItems: 2 });
  assert.equal(run.items.length, 2);
  assert.equal(run.counts.total, 2);
});

test('playlist resolution failure rejects the batch', async () => {
  const { deps } = createDeps(new Error('yt-dlp exploded'));

  await assert.rejects(
    runBatch(deps, { playlist: PLAYLIST }, { concurrency: 1 }),
    (error: unknown) => error instanceof PipelineError && error.code === 'PLAYLIST_RESOLUTION_FAILED'
  );
});

test('cancelling stops dispatch while running items finish', async () => {
  const { deps, captions } = createDeps();
  const controller = new AbortController();
  const gate = deferred<void>();
  let started = 0;
  captions.setBehavior(async (ref, language) => {
    started += 1;
    await gate.promise;
    return { segments: [{ start: 0, end: 1, text: `hello from ${ref.videoId}` }], language };
  });

  const pending = runBatch(
    deps,
    { refs: refs('video000001', 'video000002', 'video000003', 'video000004') },
    { concurrency: 2, signal: controller.signal }
  );
  while (started < 2) {
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
  controller.abort();
  gate.resolve();
  const run = await pending;

  assert.equal(run.cancelled, true);
  assert.deepEqual(
    run.outcomes.map((outcome) => outcome?.status),
    ['success', 'success', 'failed', 'failed']
  );
  assert.equal(run.outcomes[2]?.error?.code, 'CANCELLED');
  assert.equal(run.outcomes[3]?.error?.code, 'CANCELLED');
  assert.equal(captions.calls.length, 2);
  assert.equal(run.counts.completed, 4);
});

test('reporter receives resolved, started, completed and batch events in order', async () => {
  const { deps } = createDeps();
  const events: string[] = [];
  const reporter: ProgressReporter = {
    onItemsResolved: (items) => {
      events.push(`resolved:${items.length}`);
    },
    onItemStarted: (ref, index) => {
      events.push(`started:${index}:${ref.videoId}`);
    },
    onItemCompleted: (_ref, outcome, progress) => {
      events.push(`completed:${progress.index}:${outcome.status}:${progress.counts.completed}/${progress.counts.total}`);
    },
    onBatchCompleted: (run) => {
      events.push(`batch:${run.counts.succeeded}`);
    }
  };

  await runBatch(deps, { refs: refs('video000001', 'video000002') }, { concurrency: 1, reporter, runId: 'run_events' });

  assert.deepEqual(events, [
    'resolved:2',
    'started:0:video000001',
    'completed:0:success:1/2',
    'started:1:video000002',
    'completed:1:success:2/2',
    'batch:2'
  ]);
});

test('a throwing reporter never breaks the batch', async () => {
  const { deps } = createDeps();
  const reporter: ProgressReporter = {
    onItemStarted: () => {
      throw new Error('dashboard offline');
    },
    onItemCompleted: async () => {
      throw new Error('dashboard offline');
    }
  };

  const run = await runBatch(deps, { refs: refs('video000001') }, { concurrency: 1, reporter });
  assert.equal(run.outcomes[0]?.status, 'success');
});

test('console reporter writes progress lines', async () => {
  const lines: string[] = [];
  const log = {
    info: (line: string) => {
      lines.push(`info ${line}`);
    },
    warn: (line: string) => {
      lines.push(`warn ${line}`);
    }
  };
  const { deps, metadata } = createDeps();
  metadata.failures.set('broken00001', new PipelineError({ code: 'NOT_FOUND', message: 'Video unavailable.' }));

  await runBatch(deps, { refs: refs('broken00001') }, { concurrency: 1, runId: 'run_log', reporter: createConsoleReporter(log) });

  assert.deepEqual(lines, [
    'info [batch][run_log] #1 broken00001 started',
    'warn [batch][run_log] 1/1 broken00001 failed: Video unavailable.',
    'info [batch][run_log] completed: 0 succeeded, 0 partial, 1 failed'
  ]);
});
