import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import type { TestContext } from 'node:test';
import { parseConfig } from '../server/lib/config.js';
import { FileStore } from '../server/lib/store.js';
import { StoreIOError } from './errors.js';
import { ScannerService } from './service.js';
import { fakeFetch, gammaEvent, jsonResponse, pagedEvents, silentLog } from './testing.js';
import type { FakeMarket } from './testing.js';
import type { Move } from './types.js';

const T1 = 1_700_000_000_000;
const config = parseConfig({ feeds: { gammaBaseUrl: 'https://gamma.test', pageSize: 2, retryBackoffMs: 0 } });

async function tempStore(t: TestContext) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-'));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  return new FileStore(dir, { retentionMs: 5 * 60_000, maxMoves: 500 });
}

// A mutable Gamma universe plus a clock the test advances.
function harness(store: FileStore) {
  let events: unknown[] = [];
  let failOffset: string | null = null;
  let clock = T1;

  const fake = fakeFetch((url) => {
    if (url.searchParams.get('offset') === failOffset) return jsonResponse('nope', 500);
    return pagedEvents(events)(url);
  });
  const service = new ScannerService({ config, store, log: silentLog, fetchFn: fake.fetchFn, now: () => clock });

  return {
    service,
    calls: fake.calls,
    setEvents: (next: unknown[]) => {
      events = next;
    },
    failAt: (offset: string | null) => {
      failOffset = offset;
    },
    tick: (ms: number) => {
      clock += ms;
    }
  };
}

function oneMarket(prices: FakeMarket['prices']) {
  return [gammaEvent('e1', [{ id: 'M1', prices }], { title: 'Macro', slug: 'macro' })];
}

test('first cycle records a baseline, second records the move and a sound trigger', async (t) => {
  const store = await tempStore(t);
  const h = harness(store);

  h.setEvents(oneMarket(['0.40', '0.60']));
  const first = await h.service.runCycle();
  assert.ok(first.ok);
  assert.deepEqual(first.moves, []);
  assert.equal(first.soundTrigger, undefined);
  assert.deepEqual(await store.getStatus(), {
    state: 'ok',
    message: 'Updated 1 events with markets',
    lastUpdateMs: T1,
    lastAttemptMs: T1,
    eventCount: 1,
    marketCount: 1,
    moveCount: 0
  });
  assert.deepEqual(await store.loadRecentMoves(), []);

  h.tick(5000);
  h.setEvents(oneMarket('["0.525","0.475"]'));
  const second = await h.service.runCycle();
  assert.ok(second.ok);
  assert.deepEqual(second.moves.map((m) => [m.marketId, m.yesDelta, m.noDelta, m.maxMove, m.tier]), [
    ['M1', 12.5, -12.5, 12.5, 'huge']
  ]);

  const status = await store.getStatus();
  assert.ok(status);
  assert.equal(status.state, 'ok');
  assert.equal(status.lastUpdateMs, T1 + 5000);
  assert.equal(status.moveCount, 1);
  assert.deepEqual(status.soundTrigger, { magnitude: 12.5, level: 'high', tier: 'huge' });

  const snapshot = await store.loadSnapshot();
  assert.ok(snapshot);
  assert.equal(snapshot.M1.yes, 52.5);
  assert.equal(snapshot.M1.no, 47.5);

  const moves = await store.loadRecentMoves(undefined, T1 + 5000);
  assert.deepEqual(moves?.map((m) => m.id), [`M1:${T1 + 5000}`]);
});

test('a page that exhausts its retries leaves snapshot and moves untouched', async (t) => {
  const store = await tempStore(t);
  const h = harness(store);
  const universe = (m3: [string, string]) =>
    [1, 2, 3, 4, 5].map((n) => gammaEvent(`e${n}`, [{ id: `m${n}`, prices: n === 3 ? m3 : ['0.5', '0.5'] }]));

  h.setEvents(universe(['0.5', '0.5']));
  assert.ok((await h.service.runCycle()).ok);
  h.tick(5000);
  h.setEvents(universe(['0.6', '0.4']));
  assert.ok((await h.service.runCycle()).ok);

  const snapshotBefore = await store.loadSnapshot();
  const movesBefore = await store.loadRecentMoves(undefined, T1 + 5000);
  assert.equal(movesBefore?.length, 1);

  h.tick(5000);
  h.setEvents(universe(['0.7', '0.3']));
  h.failAt('2');
  const callsBefore = h.calls.length;
  const failed = await h.service.runCycle();

  assert.ok(!failed.ok);
  assert.equal(failed.stage, 'fetch');
  assert.match(failed.error, /offset 2 after 3 attempts/);
  // offset 0 once, offset 2 three times
  assert.equal(h.calls.length - callsBefore, 4);

  assert.deepEqual(await store.loadSnapshot(), snapshotBefore);
  assert.deepEqual(await store.loadRecentMoves(undefined, T1 + 10_000), movesBefore);

  const status = await store.getStatus();
  assert.ok(status);
  assert.equal(status.state, 'error');
  assert.equal(status.lastUpdateMs, T1 + 5000);
  assert.equal(status.lastAttemptMs, T1 + 10_000);
  assert.equal(status.eventCount, 5);
  assert.equal(status.moveCount, 1);
  assert.equal(status.message, `Scan error: ${failed.error.slice(0, 100)}`);
  assert.equal(status.error, failed.error);

  // the next cycle diffs against the last persisted snapshot
  h.tick(5000);
  h.failAt(null);
  const recovered = await h.service.runCycle();
  assert.ok(recovered.ok);
  assert.deepEqual(recovered.moves.map((m) => [m.marketId, m.yesDelta]), [['m3', 10]]);
  assert.equal((await store.loadRecentMoves(undefined, T1 + 15_000))?.length, 2);
  assert.equal((await store.getStatus())?.state, 'ok');

  const state = h.service.getState();
  assert.equal(state.cycles, 4);
  assert.equal(state.failures, 1);
});

test('a market with malformed prices keeps its last valid entry', async (t) => {
  const store = await tempStore(t);
  const h = harness(store);

  h.setEvents([gammaEvent('e1', [{ id: 'M1', prices: ['0.2', '0.8'] }, { id: 'M2', prices: ['0.3', '0.7'] }])]);
  await h.service.runCycle();

  h.tick(5000);
  h.setEvents([gammaEvent('e1', [{ id: 'M1', prices: ['0.25', '0.75'] }, { id: 'M2', prices: 'oops' }])]);
  const out = await h.service.runCycle();
  assert.ok(out.ok);
  assert.deepEqual(out.moves.map((m) => m.marketId), ['M1']);
  assert.equal(out.marketCount, 2);

  const snapshot = await store.loadSnapshot();
  assert.ok(snapshot);
  assert.equal(snapshot.M2.yes, 30);
  assert.equal(snapshot.M2.maxMove, 0);
});

test('runCycle shares an in-flight cycle', async (t) => {
  const store = await tempStore(t);
  const h = harness(store);
  h.setEvents(oneMarket(['0.5', '0.5']));

  const a = h.service.runCycle();
  const b = h.service.runCycle();
  assert.equal(a, b);
  assert.equal(h.service.getState().phase, 'scanning');
  await a;
  assert.equal(h.calls.length, 1);
  assert.equal(h.service.getState().phase, 'idle');
});

test('start writes a starting status and stop cancels the pending tick', async (t) => {
  const store = await tempStore(t);
  const h = harness(store);

  await h.service.start();
  await h.service.stop();

  assert.equal(h.calls.length, 0);
  assert.equal(h.service.getState().running, false);
  assert.deepEqual(await store.getStatus(), {
    state: 'starting',
    message: 'Starting scan',
    lastUpdateMs: null,
    lastAttemptMs: T1,
    eventCount: 0,
    marketCount: 0,
    moveCount: 0
  });
});

test('start runs a cycle and stop waits for it to settle', async (t) => {
  const store = await tempStore(t);
  let onCall: () => void = () => {};
  const called = new Promise<void>((resolve) => {
    onCall = resolve;
  });
  const serve = pagedEvents(oneMarket(['0.5', '0.5']));
  const fake = fakeFetch((url) => {
    onCall();
    return serve(url);
  });
  const service = new ScannerService({ config, store, log: silentLog, fetchFn: fake.fetchFn, now: () => T1 });

  await service.start();
  await called;
  await service.stop();

  assert.equal(fake.calls.length, 1);
  assert.equal(service.getState().cycles, 1);
  assert.equal((await store.getStatus())?.state, 'ok');
});

class FlakyMoveStore extends FileStore {
  failAppend = false;

  override async appendMoves(moves: Move[], nowMs?: number): Promise<Move[]> {
    if (this.failAppend) throw new StoreIOError('write', 'moves.json', new Error('disk full'));
    return super.appendMoves(moves, nowMs);
  }
}

test('a failed moves write reports persist and keeps the previous baseline', async (t) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-'));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  const store = new FlakyMoveStore(dir, { retentionMs: 5 * 60_000, maxMoves: 500 });
  const h = harness(store);

  h.setEvents(oneMarket(['0.40', '0.60']));
  assert.ok((await h.service.runCycle()).ok);

  h.tick(5000);
  h.setEvents(oneMarket(['0.525', '0.475']));
  store.failAppend = true;
  const failed = await h.service.runCycle();
  assert.ok(!failed.ok);
  assert.equal(failed.stage, 'persist');
  assert.equal(failed.error, 'store write failed for moves.json: disk full');

  const status = await store.getStatus();
  assert.ok(status);
  assert.equal(status.state, 'error');
  assert.equal(status.lastUpdateMs, T1);
  assert.equal(status.lastAttemptMs, T1 + 5000);
  assert.equal(status.error, failed.error);
  assert.deepEqual(await store.loadRecentMoves(undefined, T1 + 5000), []);

  // same prices again: still a move, since the failed cycle never became the baseline
  h.tick(5000);
  store.failAppend = false;
  const recovered = await h.service.runCycle();
  assert.ok(recovered.ok);
  assert.deepEqual(recovered.moves.map((m) => [m.marketId, m.yesDelta, m.tsMs]), [['M1', 12.5, T1 + 10_000]]);
  assert.equal((await store.getStatus())?.lastUpdateMs, T1 + 10_000);
});

test('start still schedules scanning when the stored status cannot be read', async (t) => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scanner-'));
  t.after(() => fs.rm(dir, { recursive: true, force: true }));
  await fs.writeFile(path.join(dir, 'status.json'), '{"state":');
  const store = new FileStore(dir, { retentionMs: 5 * 60_000, maxMoves: 500 });

  let onCall: () => void = () => {};
  const called = new Promise<void>((resolve) => {
    onCall = resolve;
  });
  const serve = pagedEvents(oneMarket(['0.5', '0.5']));
  const fake = fakeFetch((url) => {
    onCall();
    return serve(url);
  });
  const service = new ScannerService({ config, store, log: silentLog, fetchFn: fake.fetchFn, now: () => T1 });

  await service.start();
  assert.equal(service.getState().running, true);
  await called;
  await service.stop();

  assert.equal(service.getState().cycles, 1);
  assert.equal((await store.getStatus())?.state, 'ok');
});
