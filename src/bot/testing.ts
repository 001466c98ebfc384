// In-process stand-ins for the Gamma API, shared by the tests.
import type { Move } from './types.js';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

export function fakeFetch(handler: (url: URL, call: number) => Response | Promise<Response>) {
  const calls: URL[] = [];
  const fetchFn: typeof fetch = async (input) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    calls.push(url);
    return handler(url, calls.length - 1);
  };
  return { fetchFn, calls };
}

export type FakeMarket = {
  id: string;
  // probabilities in [0, 1], as Gamma sends them
  prices?: unknown;
  question?: string;
  volume?: string | number;
  volume24hr?: string | number;
  liquidity?: string | number;
};

export function gammaEvent(
  id: string,
  markets: FakeMarket[],
  extra: { title?: string; slug?: string; volume?: number; volume24hr?: number; liquidity?: number } = {}
): Record<string, unknown> {
  return {
    id,
    title: extra.title ?? `Event ${id}`,
    slug: extra.slug,
    volume: extra.volume ?? 1000,
    volume24hr: extra.volume24hr,
    liquidity: extra.liquidity,
    markets: markets.map((m) => ({
      id: m.id,
      question: m.question ?? `Question ${m.id}?`,
      outcomePrices: m.prices,
      volume: m.volume ?? '100',
      volume24hr: m.volume24hr,
      liquidity: m.liquidity
    }))
  };
}

// Serves `events` in pages according to the request's limit/offset.
export function pagedEvents(events: unknown[]) {
  return (url: URL) => {
    const limit = Number(url.searchParams.get('limit'));
    const offset = Number(url.searchParams.get('offset'));
    return jsonResponse(events.slice(offset, offset + limit));
  };
}

export const silentLog = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

export function makeMove(over: Partial<Move> & Pick<Move, 'marketId'>): Move {
  const tsMs = over.tsMs ?? 1_700_000_000_000;
  return {
    id: `${over.marketId}:${tsMs}`,
    tsMs,
    eventId: 'e1',
    eventTitle: 'Event e1',
    eventLink: 'https://polymarket.com/event/event-e1?tid=e1',
    question: `Question ${over.marketId}?`,
    yes: 50,
    no: 50,
    yesDelta: 1,
    noDelta: -1,
    yesDir: 'UP',
    noDir: 'DOWN',
    maxMove: 1,
    tier: 'notable',
    volume: 100,
    volume24hr: 0,
    liquidity: 0,
    eventVolume: 1000,
    ...over
  };
}
