import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { StoreIOError } from '../../bot/errors.js';
import { MoveSchema, SnapshotSchema, StatusSchema } from '../../bot/types.js';
import type { Move, Snapshot, Status } from '../../bot/types.js';

export type RetentionOpts = {
  retentionMs: number;
  maxMoves: number;
};

export type StoreInfo = {
  kind: 'file' | 'sqlite';
  location: string;
  snapshotMarkets: number | null;
  moves: number | null;
  hasStatus: boolean;
};

/**
 * Shared state between the scanner (single writer) and the HTTP layer.
 * Every mutation is published atomically; readers see the previous or the
 * new state, never a mix. `null` from a read means nothing was written yet.
 */
export interface MoveStore {
  loadSnapshot(): Promise<Snapshot | null>;
  saveSnapshot(snapshot: Snapshot): Promise<void>;
  appendMoves(moves: Move[], nowMs?: number): Promise<Move[]>;
  loadRecentMoves(windowSeconds?: number, nowMs?: number): Promise<Move[] | null>;
  setStatus(status: Status): Promise<void>;
  getStatus(): Promise<Status | null>;
  describe(): Promise<StoreInfo>;
  close(): Promise<void>;
}

/** Drops records outside the retention window, then keeps the newest `maxMoves`. */
export function pruneMoves(moves: Move[], nowMs: number, opts: RetentionOpts): Move[] {
  const cutoff = nowMs - opts.retentionMs;
  const kept = moves.filter((m) => m.tsMs >= cutoff);
  return kept.length > opts.maxMoves ? kept.slice(-opts.maxMoves) : kept;
}

export function windowMoves(moves: Move[], windowSeconds: number | undefined, nowMs: number): Move[] {
  if (windowSeconds == null) return moves;
  const cutoff = nowMs - windowSeconds * 1000;
  return moves.filter((m) => m.tsMs >= cutoff);
}

const MovesSchema = z.array(MoveSchema);

function isNotFound(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

/**
 * JSON files in one directory. Writes go to a unique temp file beside the
 * target and are published with rename(2), which replaces the target in one
 * step on the same filesystem.
 */
export class FileStore implements MoveStore {
  public dir: string;
  private snapshotPath: string;
  private movesPath: string;
  private statusPath: string;
  private retention: RetentionOpts;

  constructor(dir: string, retention: RetentionOpts) {
    this.dir = dir;
    this.retention = retention;
    this.snapshotPath = path.join(dir, 'snapshot.json');
    this.movesPath = path.join(dir, 'moves.json');
    this.statusPath = path.join(dir, 'status.json');
  }

  private async readJson<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (e) {
      if (isNotFound(e)) return null;
      throw new StoreIOError('read', filePath, e);
    }
    try {
      return schema.parse(JSON.parse(raw));
    } catch (e) {
      throw new StoreIOError('decode', filePath, e);
    }
  }

  private async publishJson(filePath: string, value: unknown): Promise<void> {
    const tmp = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await fs.writeFile(tmp, JSON.stringify(value));
      await fs.rename(tmp, filePath);
    } catch (e) {
      await fs.rm(tmp, { force: true }).catch(() => undefined);
      throw new StoreIOError('write', filePath, e);
    }
  }

  loadSnapshot(): Promise<Snapshot | null> {
    return this.readJson(this.snapshotPath, SnapshotSchema);
  }

  saveSnapshot(snapshot: Snapshot): Promise<void> {
    return this.publishJson(this.snapshotPath, snapshot);
  }

  async appendMoves(moves: Move[], nowMs = Date.now()): Promise<Move[]> {
    const current = (await this.readJson(this.movesPath, MovesSchema)) ?? [];
    const next = pruneMoves([...current, ...moves], nowMs, this.retention);
    await this.publishJson(this.movesPath, next);
    return next;
  }

  async loadRecentMoves(windowSeconds?: number, nowMs = Date.now()): Promise<Move[] | null> {
    const moves = await this.readJson(this.movesPath, MovesSchema);
    return moves ? windowMoves(moves, windowSeconds, nowMs) : null;
  }

  setStatus(status: Status): Promise<void> {
    return this.publishJson(this.statusPath, status);
  }

  getStatus(): Promise<Status | null> {
    return this.readJson(this.statusPath, StatusSchema);
  }

  async describe(): Promise<StoreInfo> {
    const [snapshot, moves, status] = await Promise.all([
      this.loadSnapshot(),
      this.loadRecentMoves(),
      this.getStatus()
    ]);
    return {
      kind: 'file',
      location: this.dir,
      snapshotMarkets: snapshot ? Object.keys(snapshot).length : null,
      moves: moves ? moves.length : null,
      hasStatus: status != null
    };
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
