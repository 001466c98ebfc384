import express from 'express';
import type { Request, Response } from 'express';
import { errorMessage } from '../bot/errors.js';
import { filterMoves, groupByBatch, groupSnapshotByEvent } from '../bot/moves_feed.js';
import type { ScannerService } from '../bot/service.js';
import type { SoundTrigger, Status } from '../bot/types.js';
import type { AppConfig } from './lib/config.js';
import type { MoveStore } from './lib/store.js';

export type StatusView = {
  // waiting: nothing scanned yet; stale: last scan failed or is too old; fresh: current data
  view: 'waiting' | 'stale' | 'fresh';
  stale: boolean;
  state: Status['state'] | 'waiting';
  message: string;
  lastUpdateMs: number | null;
  ageSeconds: number | null;
  soundTrigger: SoundTrigger | null;
  error: string | null;
};

export function toStatusView(status: Status | null, nowMs: number, intervalMs: number): StatusView {
  if (!status) {
    return {
      view: 'waiting',
      stale: false,
      state: 'waiting',
      message: 'Waiting for data',
      lastUpdateMs: null,
      ageSeconds: null,
      soundTrigger: null,
      error: null
    };
  }

  const ageMs = status.lastUpdateMs == null ? null : Math.max(0, nowMs - status.lastUpdateMs);
  let view: StatusView['view'] = 'fresh';
  if (ageMs == null && status.state !== 'error') view = 'waiting';
  else if (status.state === 'error' || ageMs == null || ageMs > intervalMs * 3) view = 'stale';

  return {
    view,
    stale: view === 'stale',
    state: status.state,
    message: status.message,
    lastUpdateMs: status.lastUpdateMs,
    ageSeconds: ageMs == null ? null : Math.round(ageMs / 1000),
    soundTrigger: status.soundTrigger ?? null,
    error: status.error ?? null
  };
}

function queryNumber(v: unknown): number | undefined {
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(name: string, fn: Handler) {
  return (req: Request, res: Response) => {
    fn(req, res).catch((e) => {
      console.error(`[server] ${name} failed`, e);
      res.status(500).json({ error: errorMessage(e) });
    });
  };
}

export function createApp(opts: {
  config: AppConfig;
  store: MoveStore;
  scanner?: ScannerService;
  now?: () => number;
}) {
  const { config, store, scanner } = opts;
  const now = opts.now ?? Date.now;

  const BUILD = {
    version: process.env.npm_package_version ?? '0.1.0',
    startedAtIso: new Date(now()).toISOString()
  };

  const app = express();
  app.use(express.json());

  app.get('/api/build', (_req, res) => {
    res.json(BUILD);
  });

  app.get('/api/status', route('status', async (_req, res) => {
    const status = await store.getStatus();
    res.json(toStatusView(status, now(), config.scanner.intervalMs));
  }));

  // Whole retained history unless ?minutes= narrows it.
  app.get('/api/moves', route('moves', async (req, res) => {
    const minutes = queryNumber(req.query.minutes);
    const moves = await store.loadRecentMoves(minutes == null ? undefined : minutes * 60, now());
    res.json({ waiting: moves == null, items: moves ?? [] });
  }));

  app.get('/api/moves/batches', route('batches', async (req, res) => {
    const moves = await store.loadRecentMoves(undefined, now());
    const minMove = queryNumber(req.query.minMove) ?? 0;
    res.json({ waiting: moves == null, batches: groupByBatch(filterMoves(moves ?? [], { minMove })) });
  }));

  app.get('/api/snapshot', route('snapshot', async (_req, res) => {
    const snapshot = await store.loadSnapshot();
    res.json({ waiting: snapshot == null, events: snapshot ? groupSnapshotByEvent(snapshot) : [] });
  }));

  app.get('/api/debug', route('debug', async (_req, res) => {
    res.json({
      store: await store.describe(),
      scanner: scanner ? scanner.getState() : null
    });
  }));

  // Manual trigger; joins the running cycle if there is one.
  app.post('/api/scan', route('scan', async (_req, res) => {
    if (!scanner) {
      res.status(503).json({ error: 'scanner_disabled' });
      return;
    }
    const result = await scanner.runCycle();
    if (result.ok) {
      res.json({ ok: true, tsMs: result.tsMs, moves: result.moves.length, soundTrigger: result.soundTrigger ?? null });
    } else {
      res.status(502).json({ ok: false, tsMs: result.tsMs, stage: result.stage, error: result.error });
    }
  }));

  return app;
}
