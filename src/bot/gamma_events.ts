import { z } from 'zod';
import { FetchFailure, MalformedPriceError, TransientFetchError } from './errors.js';
import { makeEventUrl } from './event_url.js';
import { RetryExhausted, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type { MarketQuote } from './types.js';

export type GammaEventRaw = Record<string, unknown>;

export type EventRecord = {
  id: string;
  title: string;
  slug?: string;
  link: string;
  // event totals
  volume: number;
  volume24hr: number;
  liquidity: number;
  markets: MarketQuote[];
  skipped: MalformedPriceError[];
};

const idField = z.union([z.string().min(1), z.number()]).transform(String);
const numField = z.union([z.string(), z.number()]).nullish();

const GammaMarketSchema = z.object({
  id: idField,
  question: z.string().nullish(),
  outcomePrices: z.unknown().optional(),
  volume: numField,
  volume24hr: numField,
  liquidity: numField
});

const GammaEventSchema = z.object({
  id: idField,
  title: z.string().nullish(),
  slug: z.string().nullish(),
  volume: numField,
  volume24hr: numField,
  liquidity: numField,
  markets: z.array(z.unknown()).nullish()
});

function num(v: string | number | null | undefined): number {
  if (v == null) return 0;
  const n = typeof v === 'number' ? v : Number(String(v).trim());
  return Number.isFinite(n) ? n : 0;
}

export function round2(n: number): number {
  // `|| 0` folds -0 into 0
  return Math.round(n * 100) / 100 || 0;
}

/**
 * Decodes Gamma `outcomePrices` (a JSON-encoded string or an array of two
 * probabilities in [0, 1]) into `[yes, no]` percentages with two decimals.
 */
export function parseOutcomePrices(marketId: string, raw: unknown): [number, number] {
  let value = raw;
  if (typeof value === 'string') {
    try {
      value = JSON.parse(value);
    } catch {
      throw new MalformedPriceError(marketId, raw, 'invalid JSON');
    }
  }
  if (!Array.isArray(value)) throw new MalformedPriceError(marketId, raw, 'not an array');
  if (value.length < 2) throw new MalformedPriceError(marketId, raw, `expected 2 prices, got ${value.length}`);

  const pair = value.slice(0, 2).map((x) => (typeof x === 'number' || typeof x === 'string') && String(x).trim() !== '' ? Number(x) : NaN);
  for (const p of pair) {
    if (!Number.isFinite(p) || p < 0 || p > 1) throw new MalformedPriceError(marketId, raw, 'price outside [0, 1]');
  }
  return [round2(pair[0] * 100), round2(pair[1] * 100)];
}

/**
 * Typed view of one raw Gamma event. Returns null when the event itself is
 * unusable (no id); individual markets with bad prices land in `skipped`.
 */
export function decodeEvent(raw: GammaEventRaw, siteBaseUrl?: string): EventRecord | null {
  const parsed = GammaEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  const ev = parsed.data;

  const title = ev.title?.trim() || ev.slug?.trim() || ev.id;
  const markets: MarketQuote[] = [];
  const skipped: MalformedPriceError[] = [];

  for (const m of ev.markets ?? []) {
    const pm = GammaMarketSchema.safeParse(m);
    if (!pm.success) continue;
    try {
      const [yes, no] = parseOutcomePrices(pm.data.id, pm.data.outcomePrices);
      markets.push({
        id: pm.data.id,
        question: pm.data.question ?? title,
        yes,
        no,
        volume: num(pm.data.volume),
        volume24hr: num(pm.data.volume24hr),
        liquidity: num(pm.data.liquidity)
      });
    } catch (e) {
      if (!(e instanceof MalformedPriceError)) throw e;
      skipped.push(e);
    }
  }

  return {
    id: ev.id,
    title,
    slug: ev.slug ?? undefined,
    link: makeEventUrl({ id: ev.id, slug: ev.slug, title }, siteBaseUrl),
    volume: num(ev.volume),
    volume24hr: num(ev.volume24hr),
    liquidity: num(ev.liquidity),
    markets,
    skipped
  };
}

export function decodeEvents(raw: GammaEventRaw[], siteBaseUrl?: string): EventRecord[] {
  const out: EventRecord[] = [];
  for (const r of raw) {
    const ev = decodeEvent(r, siteBaseUrl);
    if (ev) out.push(ev);
  }
  return out;
}

function isRecord(v: unknown): v is GammaEventRaw {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// Rejects with the abort reason once `signal` fires, even if `p` never settles.
function untilAborted<T>(p: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void p.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

// The timeout covers the whole exchange, body included.
async function fetchPage(url: string, opts: { timeoutMs: number; fetchFn: typeof fetch }): Promise<unknown[]> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), opts.timeoutMs);
  const failed = (what: string, e: unknown) => {
    const reason = controller.signal.aborted ? `timeout after ${opts.timeoutMs}ms` : String(e);
    return new TransientFetchError(`Gamma events ${what} failed: ${reason}`, { cause: e });
  };

  try {
    let res: Response;
    try {
      res = await opts.fetchFn(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal
      });
    } catch (e) {
      throw failed('request', e);
    }

    if (!res.ok) {
      let txt = '';
      try {
        txt = await untilAborted(res.text(), controller.signal);
      } catch (e) {
        if (controller.signal.aborted) throw failed('request', e);
      }
      throw new TransientFetchError(`Gamma events failed: ${res.status} ${txt}`.trim(), { status: res.status });
    }

    let body: unknown;
    try {
      body = await untilAborted(res.json(), controller.signal);
    } catch (e) {
      if (controller.signal.aborted) throw failed('body read', e);
      throw new TransientFetchError('Gamma events returned invalid JSON', { cause: e });
    }
    if (!Array.isArray(body)) throw new TransientFetchError('Gamma events returned non-array');
    return body;
  } finally {
    clearTimeout(t);
  }
}

// Client errors other than timeouts and rate limits will not go away on retry.
export function isRetryableFetchError(e: unknown): boolean {
  if (!(e instanceof TransientFetchError) || e.status === undefined) return true;
  return e.status >= 500 || e.status === 408 || e.status === 429;
}

export type FetchEventsOpts = {
  gammaBaseUrl: string;
  pageSize: number;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  params?: Record<string, string>;
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
  onRetry?: (e: unknown, offset: number, attempt: number, delayMs: number) => void;
};

/**
 * Pages through `/events` until a short or empty page. Any page that runs out
 * of retries, or fails with a client error, aborts the whole fetch with a
 * FetchFailure: callers never get a partial universe of markets.
 */
export async function fetchAllEvents(opts: FetchEventsOpts): Promise<GammaEventRaw[]> {
  const fetchFn = opts.fetchFn ?? fetch;
  const params = opts.params ?? { active: 'true', closed: 'false', archived: 'false' };
  const out: GammaEventRaw[] = [];

  for (let offset = 0; ; offset += opts.pageSize) {
    const url = new URL(opts.gammaBaseUrl.replace(/\/+$/, '') + '/events');
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
    url.searchParams.set('limit', String(opts.pageSize));
    url.searchParams.set('offset', String(offset));

    let page: unknown[];
    let attempts = 0;
    try {
      page = await withRetry(
        (attempt) => {
          attempts = attempt + 1;
          return fetchPage(url.toString(), { timeoutMs: opts.requestTimeoutMs, fetchFn });
        },
        opts.retry,
        {
          isRetryable: isRetryableFetchError,
          sleep: opts.sleep,
          onRetry: (e, attempt, delayMs) => opts.onRetry?.(e, offset, attempt, delayMs)
        }
      );
    } catch (e) {
      if (e instanceof RetryExhausted) {
        throw new FetchFailure({ offset, attempts: e.attempts, partial: out.slice(), cause: e.cause });
      }
      if (e instanceof TransientFetchError) {
        throw new FetchFailure({ offset, attempts, partial: out.slice(), cause: e });
      }
      throw e;
    }

    out.push(...page.filter(isRecord));
    if (page.length < opts.pageSize) break;
  }

  return out;
}
