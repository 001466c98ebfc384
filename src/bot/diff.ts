import type { EventRecord } from './gamma_events.js';
import { round2 } from './gamma_events.js';
import { classifyMagnitude } from './tiers.js';
import type { Direction, Move, Snapshot, SnapshotEntry } from './types.js';

export function direction(delta: number): Direction {
  if (delta > 0) return 'UP';
  if (delta < 0) return 'DOWN';
  return 'FLAT';
}

export type DiffResult = {
  snapshot: Snapshot;
  moves: Move[];
  // markets seen for the first time this cycle
  added: number;
  // markets with malformed prices that kept their previous entry
  retained: number;
};

/**
 * Compares the fetched markets against the previous snapshot.
 *
 * A market seen for the first time gets a baseline entry and no move. Markets
 * absent from `events` are dropped; markets present but with malformed prices
 * keep their last valid entry so their recovery does not read as a jump.
 * Every move carries the same `tsMs` so a batch can be grouped downstream.
 */
export function diffSnapshot(opts: {
  events: EventRecord[];
  previous: Snapshot;
  tsMs: number;
  minMove?: number;
}): DiffResult {
  const minMove = opts.minMove ?? 0;
  const snapshot: Snapshot = {};
  const moves: Move[] = [];
  let added = 0;
  let retained = 0;

  for (const ev of opts.events) {
    for (const m of ev.markets) {
      const prev = opts.previous[m.id];

      const entry: SnapshotEntry = {
        marketId: m.id,
        eventId: ev.id,
        eventTitle: ev.title,
        eventLink: ev.link,
        question: m.question,
        yes: m.yes,
        no: m.no,
        yesDelta: 0,
        noDelta: 0,
        maxMove: 0,
        volume: m.volume,
        volume24hr: m.volume24hr,
        liquidity: m.liquidity,
        eventVolume: ev.volume,
        eventVolume24hr: ev.volume24hr,
        eventLiquidity: ev.liquidity
      };

      if (!prev) {
        added++;
        snapshot[m.id] = entry;
        continue;
      }

      entry.yesDelta = round2(m.yes - prev.yes);
      entry.noDelta = round2(m.no - prev.no);
      entry.maxMove = Math.max(Math.abs(entry.yesDelta), Math.abs(entry.noDelta));
      snapshot[m.id] = entry;

      if (entry.maxMove > minMove) {
        moves.push({
          id: `${m.id}:${opts.tsMs}`,
          tsMs: opts.tsMs,
          marketId: m.id,
          eventId: ev.id,
          eventTitle: ev.title,
          eventLink: ev.link,
          question: m.question,
          yes: m.yes,
          no: m.no,
          yesDelta: entry.yesDelta,
          noDelta: entry.noDelta,
          yesDir: direction(entry.yesDelta),
          noDir: direction(entry.noDelta),
          maxMove: entry.maxMove,
          tier: classifyMagnitude(entry.maxMove),
          volume: m.volume,
          volume24hr: m.volume24hr,
          liquidity: m.liquidity,
          eventVolume: ev.volume
        });
      }
    }

    for (const bad of ev.skipped) {
      const prev = opts.previous[bad.marketId];
      if (!prev || snapshot[bad.marketId]) continue;
      snapshot[bad.marketId] = { ...prev, yesDelta: 0, noDelta: 0, maxMove: 0 };
      retained++;
    }
  }

  return { snapshot, moves, added, retained };
}
