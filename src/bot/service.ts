import type { AppConfig } from '../server/lib/config.js';
import type { MoveStore } from '../server/lib/store.js';
import { diffSnapshot } from './diff.js';
import { errorMessage } from './errors.js';
import { decodeEvents, fetchAllEvents } from './gamma_events.js';
import type { EventRecord } from './gamma_events.js';
import { exponentialBackoff, fixedBackoff } from './retry.js';
import type { RetryPolicy } from './retry.js';
import { soundTriggerFor } from './tiers.js';
import type { Move, Snapshot, SoundTrigger, Status } from './types.js';

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export type CycleResult =
  | {
      ok: true;
      tsMs: number;
      eventCount: number;
      marketCount: number;
      moves: Move[];
      soundTrigger?: SoundTrigger;
    }
  | {
      ok: false;
      tsMs: number;
      stage: 'fetch' | 'persist';
      error: string;
    };

export type ScannerState = {
  running: boolean;
  phase: 'idle' | 'scanning';
  cycles: number;
  failures: number;
  baselineMarkets: number | null;
  lastCycle: CycleResult | null;
};

export function retryPolicyFromConfig(feeds: AppConfig['feeds']): RetryPolicy {
  return feeds.backoff === 'exponential'
    ? exponentialBackoff(feeds.maxRetries, feeds.retryBackoffMs)
    : fixedBackoff(feeds.maxRetries, feeds.retryBackoffMs);
}

/**
 * Drives fetch → diff → persist on a fixed interval.
 *
 * Owns the baseline snapshot between cycles. The next tick is scheduled only
 * after the current cycle settles, so at most one cycle runs at a time and a
 * failing upstream never turns into a tight loop.
 */
export class ScannerService {
  private config: AppConfig;
  private store: MoveStore;
  private log: Logger;
  private fetchFn?: typeof fetch;
  private sleep?: (ms: number) => Promise<unknown>;
  private now: () => number;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CycleResult> | null = null;

  // last snapshot that was successfully persisted; null until loaded
  private baseline: Snapshot | null = null;
  private lastUpdateMs: number | null = null;
  private lastCounts = { eventCount: 0, marketCount: 0, moveCount: 0 };
  private cycles = 0;
  private failures = 0;
  private lastCycle: CycleResult | null = null;

  constructor(opts: {
    config: AppConfig;
    store: MoveStore;
    log?: Logger;
    fetchFn?: typeof fetch;
    sleep?: (ms: number) => Promise<unknown>;
    now?: () => number;
  }) {
    this.config = opts.config;
    this.store = opts.store;
    this.log = opts.log ?? console;
    this.fetchFn = opts.fetchFn;
    this.sleep = opts.sleep;
    this.now = opts.now ?? Date.now;
  }

  getState(): ScannerState {
    return {
      running: this.running,
      phase: this.inFlight ? 'scanning' : 'idle',
      cycles: this.cycles,
      failures: this.failures,
      baselineMarkets: this.baseline ? Object.keys(this.baseline).length : null,
      lastCycle: this.lastCycle
    };
  }

  async start() {
    if (this.running) return;
    this.running = true;

    // An unreadable status does not stop the loop; the first cycle rewrites it.
    try {
      const existing = await this.store.getStatus();
      this.lastUpdateMs = existing?.lastUpdateMs ?? null;
      if (!existing) {
        await this.store.setStatus({
          state: 'starting',
          message: 'Starting scan',
          lastUpdateMs: null,
          lastAttemptMs: this.now(),
          eventCount: 0,
          marketCount: 0,
          moveCount: 0
        });
      }
    } catch (e) {
      this.log.error(`[scanner] could not read or seed status: ${errorMessage(e)}`);
    }

    this.log.info(`[scanner] started, interval ${this.config.scanner.intervalMs}ms`);
    this.schedule(0);
  }

  async stop() {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (this.inFlight) await this.inFlight;
    this.log.info('[scanner] stopped');
  }

  private schedule(delayMs: number) {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runCycle()
        .catch((e) => this.log.error('[scanner] cycle crashed', e))
        .finally(() => this.schedule(this.config.scanner.intervalMs));
    }, delayMs);
  }

  /**
   * Runs one cycle now. Calls made while a cycle is in flight share its
   * result instead of starting another.
   */
  runCycle(): Promise<CycleResult> {
    if (this.inFlight) return this.inFlight;
    const p = this.cycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = p;
    return p;
  }

  private async cycle(): Promise<CycleResult> {
    const tsMs = this.now();
    const { feeds, scanner } = this.config;

    let previous: Snapshot;
    try {
      previous = await this.loadBaseline();
    } catch (e) {
      return this.fail('persist', tsMs, e);
    }

    let events: EventRecord[];
    try {
      const raw = await fetchAllEvents({
        gammaBaseUrl: feeds.gammaBaseUrl,
        pageSize: feeds.pageSize,
        retry: retryPolicyFromConfig(feeds),
        requestTimeoutMs: feeds.requestTimeoutMs,
        fetchFn: this.fetchFn,
        sleep: this.sleep,
        onRetry: (e, offset, attempt, delayMs) =>
          this.log.warn(
            `[scanner] page offset=${offset} attempt ${attempt + 1}/${feeds.maxRetries} failed: ${errorMessage(e)}; retrying in ${delayMs}ms`
          )
      });
      events = decodeEvents(raw, feeds.siteBaseUrl);
    } catch (e) {
      return this.fail('fetch', tsMs, e);
    }

    const skipped = events.reduce((n, ev) => n + ev.skipped.length, 0);
    if (skipped) this.log.warn(`[scanner] skipped ${skipped} markets with malformed prices`);

    const diff = diffSnapshot({ events, previous, tsMs, minMove: scanner.minMove });

    // snapshot first: a reader that sees this batch of moves also sees the snapshot behind it
    try {
      await this.store.saveSnapshot(diff.snapshot);
      await this.store.appendMoves(diff.moves, tsMs);
    } catch (e) {
      return this.fail('persist', tsMs, e);
    }
    this.baseline = diff.snapshot;
    this.lastUpdateMs = tsMs;

    const eventCount = events.filter((ev) => ev.markets.length > 0).length;
    const marketCount = Object.keys(diff.snapshot).length;
    this.lastCounts = { eventCount, marketCount, moveCount: diff.moves.length };

    const soundTrigger = soundTriggerFor(diff.moves);
    const status: Status = {
      state: 'ok',
      message: `Updated ${eventCount} events with markets`,
      lastUpdateMs: tsMs,
      lastAttemptMs: tsMs,
      ...this.lastCounts,
      ...(soundTrigger ? { soundTrigger } : {})
    };
    try {
      await this.store.setStatus(status);
    } catch (e) {
      return this.fail('persist', tsMs, e);
    }

    this.cycles++;
    this.log.info(`[scanner] scanned ${eventCount} events, ${marketCount} markets, found ${diff.moves.length} moves`);
    const result: CycleResult = { ok: true, tsMs, eventCount, marketCount, moves: diff.moves, soundTrigger };
    this.lastCycle = result;
    return result;
  }

  private async loadBaseline(): Promise<Snapshot> {
    if (!this.baseline) this.baseline = (await this.store.loadSnapshot()) ?? {};
    return this.baseline;
  }

  private async fail(stage: 'fetch' | 'persist', tsMs: number, e: unknown): Promise<CycleResult> {
    const error = errorMessage(e);
    this.cycles++;
    this.failures++;
    this.log.error(`[scanner] ${stage} failed: ${error}`);

    try {
      await this.store.setStatus({
        state: 'error',
        message: `Scan error: ${error.slice(0, 100)}`,
        lastUpdateMs: this.lastUpdateMs,
        lastAttemptMs: tsMs,
        ...this.lastCounts,
        error
      });
    } catch (statusErr) {
      this.log.error(`[scanner] could not record error status: ${errorMessage(statusErr)}`);
    }

    const result: CycleResult = { ok: false, tsMs, stage, error };
    this.lastCycle = result;
    return result;
  }
}
