import assert from 'node:assert/strict';
import { test } from 'node:test';
import { filterMoves, groupByBatch, groupSnapshotByEvent, rankBatch } from './moves_feed.js';
import { makeMove } from './testing.js';
import type { Snapshot, SnapshotEntry } from './types.js';

const T = 1_700_000_000_000;

test('rankBatch orders by move size, then by market volume', () => {
  const ranked = rankBatch([
    makeMove({ marketId: 'a', maxMove: 3.0, volume: 100 }),
    makeMove({ marketId: 'b', maxMove: 1.5, volume: 900 }),
    makeMove({ marketId: 'c', maxMove: 3.0, volume: 500 })
  ]);
  assert.deepEqual(ranked.map((m) => [m.maxMove, m.volume]), [[3.0, 500], [3.0, 100], [1.5, 900]]);
});

test('rankBatch leaves its input untouched', () => {
  const input = [makeMove({ marketId: 'a', maxMove: 1 }), makeMove({ marketId: 'b', maxMove: 2 })];
  rankBatch(input);
  assert.deepEqual(input.map((m) => m.marketId), ['a', 'b']);
});

test('filterMoves applies an inclusive threshold and a time window', () => {
  const moves = [
    makeMove({ marketId: 'a', tsMs: T, maxMove: 0.5 }),
    makeMove({ marketId: 'b', tsMs: T + 5000, maxMove: 1 }),
    makeMove({ marketId: 'c', tsMs: T + 10_000, maxMove: 2 })
  ];
  assert.deepEqual(filterMoves(moves, { minMove: 1 }).map((m) => m.marketId), ['b', 'c']);
  assert.deepEqual(filterMoves(moves, { sinceMs: T + 5000 }).map((m) => m.marketId), ['b', 'c']);
  assert.deepEqual(filterMoves(moves, { minMove: 1.5, sinceMs: T }).map((m) => m.marketId), ['c']);
  assert.equal(filterMoves(moves).length, 3);
});

test('groupByBatch groups by cycle timestamp, newest first', () => {
  const batches = groupByBatch([
    makeMove({ marketId: 'a', tsMs: T, maxMove: 0.8 }),
    makeMove({ marketId: 'b', tsMs: T + 5000, maxMove: 2 }),
    makeMove({ marketId: 'c', tsMs: T, maxMove: 4 }),
    makeMove({ marketId: 'd', tsMs: T + 5000, maxMove: 6 })
  ]);
  assert.deepEqual(
    batches.map((b) => [b.tsMs, b.peak, b.moves.map((m) => m.marketId)]),
    [
      [T + 5000, 6, ['d', 'b']],
      [T, 4, ['c', 'a']]
    ]
  );
  assert.deepEqual(groupByBatch([]), []);
});

function entry(marketId: string, eventId: string, volume: number, eventVolume: number): SnapshotEntry {
  return {
    marketId,
    eventId,
    eventTitle: `Event ${eventId}`,
    eventLink: `https://polymarket.com/event/${eventId}?tid=${eventId}`,
    question: `Question ${marketId}?`,
    yes: 50,
    no: 50,
    yesDelta: 0,
    noDelta: 0,
    maxMove: 0,
    volume,
    volume24hr: 0,
    liquidity: 0,
    eventVolume,
    eventVolume24hr: 0,
    eventLiquidity: 0
  };
}

test('groupSnapshotByEvent nests markets under their event by volume', () => {
  const snapshot: Snapshot = {
    m1: entry('m1', 'small', 10, 100),
    m2: entry('m2', 'big', 5, 9000),
    m3: entry('m3', 'big', 50, 9000),
    m4: entry('m4', 'small', 20, 100)
  };
  const events = groupSnapshotByEvent(snapshot);
  assert.deepEqual(
    events.map((e) => [e.id, e.title, e.volume, e.markets.map((m) => m.marketId)]),
    [
      ['big', 'Event big', 9000, ['m3', 'm2']],
      ['small', 'Event small', 100, ['m4', 'm1']]
    ]
  );
  assert.deepEqual(groupSnapshotByEvent({}), []);
});
