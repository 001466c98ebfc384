import type { Move, Snapshot, SnapshotEntry } from './types.js';

export type MoveBatch = {
  tsMs: number;
  peak: number;
  moves: Move[];
};

// Largest move first; equal moves by market volume.
export function rankBatch(moves: ReadonlyArray<Move>): Move[] {
  return [...moves].sort((a, b) => b.maxMove - a.maxMove || b.volume - a.volume);
}

export function filterMoves(moves: ReadonlyArray<Move>, opts: { minMove?: number; sinceMs?: number } = {}): Move[] {
  const minMove = opts.minMove ?? 0;
  const sinceMs = opts.sinceMs ?? -Infinity;
  return moves.filter((m) => m.maxMove >= minMove && m.tsMs >= sinceMs);
}

/** Groups moves by their cycle timestamp, newest batch first, each batch ranked. */
export function groupByBatch(moves: ReadonlyArray<Move>): MoveBatch[] {
  const byTs = new Map<number, Move[]>();
  for (const m of moves) {
    const list = byTs.get(m.tsMs);
    if (list) list.push(m);
    else byTs.set(m.tsMs, [m]);
  }

  return Array.from(byTs.entries())
    .sort((a, b) => b[0] - a[0])
    .map(([tsMs, list]) => {
      const ranked = rankBatch(list);
      return { tsMs, peak: ranked[0]?.maxMove ?? 0, moves: ranked };
    });
}

export type EventView = {
  id: string;
  title: string;
  link: string;
  volume: number;
  volume24hr: number;
  liquidity: number;
  markets: SnapshotEntry[];
};

/** Snapshot regrouped by event, biggest events and markets first. */
export function groupSnapshotByEvent(snapshot: Snapshot): EventView[] {
  const byEvent = new Map<string, EventView>();
  for (const entry of Object.values(snapshot)) {
    let ev = byEvent.get(entry.eventId);
    if (!ev) {
      ev = {
        id: entry.eventId,
        title: entry.eventTitle,
        link: entry.eventLink,
        volume: entry.eventVolume,
        volume24hr: entry.eventVolume24hr,
        liquidity: entry.eventLiquidity,
        markets: []
      };
      byEvent.set(entry.eventId, ev);
    }
    ev.markets.push(entry);
  }
  const events = Array.from(byEvent.values());
  for (const ev of events) ev.markets.sort((a, b) => b.volume - a.volume);
  return events.sort((a, b) => b.volume - a.volume);
}
