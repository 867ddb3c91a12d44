import assert from 'node:assert/strict';
import test from 'node:test';
import { calculateStatistics, extractKeyPoints, extractKeywords } from '../src/services/text-processing/analysis';
import { cleanText, repairPunctuation } from '../src/services/text-processing/cleanup';
import { processTranscript } from '../src/services/text-processing';
import { detectParagraphs, groupByChapter, groupByTimeWindow } from '../src/services/text-processing/paragraphs';
import { makeMetadata } from './helpers/fixtures';

test('cleanText strips caption cues and fillers and repairs sentences', () => {
  assert.equal(
    cleanText('[Music] um so this is   basically the intro.and it works'),
    'So this is the intro. And it works.'
  );
  assert.equal(cleanText('um hello', { removeFillers: false }), 'Um hello.');
  assert.equal(cleanText('[Applause]'), '');
});

test('repairPunctuation collapses repeated marks and spacing before them', () => {
  assert.equal(repairPunctuation('wait ... what !!'), 'wait. what!');
});

test('detectParagraphs breaks on pauses of at least the minimum gap', () => {
  const paragraphs = detectParagraphs(
    [
      { start: 0, end: 1, text: 'a' },
      { start: 1.5, end: 2, text: 'b' },
      { start: 5, end: 6, text: 'c' }
    ],
    2
  );
  assert.deepEqual(paragraphs, ['a b', 'c']);
});

test('groupByChapter places segments under the chapter their start falls in', () => {
  const intro = { title: 'Intro', startSec: 5, endSec: 10 };
  const main = { title: 'Main', startSec: 10, endSec: 10 };
  const groups = groupByChapter(
    [
      { start: 1, end: 2, text: 'before' },
      { start: 6, end: 7, text: 'intro' },
      { start: 12, end: 13, text: 'main one' },
      { start: 400, end: 401, text: 'main two' }
    ],
    [intro, main]
  );

  assert.deepEqual(
    groups.map((group) => [group.chapter?.title ?? null, group.segments.map((segment) => segment.text)]),
    [
      [null, ['before']],
      ['Intro', ['intro']],
      ['Main', ['main one', 'main two']]
    ]
  );
});

test('groupByTimeWindow buckets segments by window start', () => {
  const groups = groupByTimeWindow(
    [
      { start: 10, end: 11, text: 'x' },
      { start: 70, end: 71, text: 'y' },
      { start: 75, end: 76, text: 'z' }
    ],
    60
  );
  assert.deepEqual(
    groups.map((group) => [group.startSec, group.segments.length]),
    [
      [0, 1],
      [60, 2]
    ]
  );
});

test('calculateStatistics counts words, sentences and speaking rate', () => {
  assert.deepEqual(calculateStatistics('Hello world. This is a test!', 60), {
    wordCount: 6,
    characterCount: 28,
    characterCountNoSpaces: 23,
    sentenceCount: 2,
    readingTimeMinutes: { fast: 0, average: 0, slow: 0 },
    speakingRateWpm: 6
  });
  assert.equal(calculateStatistics('one two', 0).speakingRateWpm, undefined);
});

test('extractKeywords ranks frequent non-stop words', () => {
  assert.deepEqual(extractKeywords('Caching caching helps. Caching speeds pages, pages load.', 3), [
    { keyword: 'caching', count: 3 },
    { keyword: 'pages', count: 2 },
    { keyword: 'helps', count: 1 }
  ]);
});

test('extractKeyPoints samples long sentences evenly', () => {
  const text = [
    'First sentence is long enough here.',
    'Short one.',
    'Second sentence is long enough too.',
    'Third sentence is also long enough.',
    'Fourth sentence is long enough as well.'
  ].join(' ');

  assert.deepEqual(extractKeyPoints(text, 2), [
    'First sentence is long enough here',
    'Third sentence is also long enough'
  ]);
});

test('processTranscript builds cleaned paragraphs with keywords and statistics', () => {
  const processed = processTranscript({
    segments: [
      { start: 0, end: 2, text: 'um hello there' },
      { start: 2.5, end: 4, text: '[Music] welcome back' },
      { start: 10, end: 12, text: 'today we talk caching' }
    ],
    sourceMode: 'captions',
    language: 'en',
    metadata: makeMetadata('vid00000001', { duration: 60 })
  });

  assert.deepEqual(processed.paragraphs, ['Hello there welcome back.', 'Today we talk caching.']);
  assert.equal(processed.text, 'Hello there welcome back.\n\nToday we talk caching.');
  assert.deepEqual(
    processed.keywords.map((keyword) => keyword.keyword),
    ['hello', 'welcome', 'back', 'today', 'talk', 'caching']
  );
  assert.equal(processed.statistics.wordCount, 8);
  assert.equal(processed.statistics.speakingRateWpm, 8);
});
