import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { StoreIOError } from '../../bot/errors.js';
import { MoveSchema, SnapshotEntrySchema, StatusSchema } from '../../bot/types.js';
import type { Move, Snapshot, Status } from '../../bot/types.js';
import type { MoveStore, RetentionOpts, StoreInfo } from './store.js';
import { windowMoves } from './store.js';

export type Db = Database.Database;

export function createDb(sqlitePath: string): Db {
  if (sqlitePath !== ':memory:') {
    const dir = path.dirname(sqlitePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(sqlitePath);
  // WAL: readers keep seeing the last committed state while a write is open
  db.pragma('journal_mode = WAL');

  db.exec(`
    create table if not exists snapshot (
      marketId text primary key,
      entryJson text not null
    );

    create table if not exists moves (
      id integer primary key autoincrement,
      tsMs integer not null,
      moveJson text not null
    );
    create index if not exists moves_ts on moves (tsMs);

    create table if not exists status (
      id integer primary key check (id = 1),
      statusJson text not null
    );

    -- which record sets have been written at least once
    create table if not exists meta (
      key text primary key,
      value text not null
    );
  `);

  return db;
}

function openDb(sqlitePath: string): Db {
  try {
    return createDb(sqlitePath);
  } catch (e) {
    throw new StoreIOError('open', sqlitePath, e);
  }
}

const EntryRow = z.object({ entryJson: z.string() });
const MoveRow = z.object({ moveJson: z.string() });
const StatusRow = z.object({ statusJson: z.string() });
const CountRow = z.object({ n: z.number() });

export class SqliteStore implements MoveStore {
  private db: Db;
  private location: string;
  private retention: RetentionOpts;

  constructor(sqlitePath: string, retention: RetentionOpts) {
    this.location = sqlitePath;
    this.retention = retention;
    this.db = openDb(sqlitePath);
  }

  private run<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof StoreIOError) throw e;
      throw new StoreIOError(op, this.location, e);
    }
  }

  private written(key: string): boolean {
    return this.db.prepare('select 1 from meta where key = ?').get(key) !== undefined;
  }

  private markWritten(key: string) {
    this.db.prepare('insert or replace into meta (key, value) values (?, ?)').run(key, String(Date.now()));
  }

  async loadSnapshot(): Promise<Snapshot | null> {
    return this.run('loadSnapshot', () => {
      if (!this.written('snapshot')) return null;
      const out: Snapshot = {};
      for (const row of this.db.prepare('select entryJson from snapshot').all()) {
        const entry = SnapshotEntrySchema.parse(JSON.parse(EntryRow.parse(row).entryJson));
        out[entry.marketId] = entry;
      }
      return out;
    });
  }

  async saveSnapshot(snapshot: Snapshot): Promise<void> {
    this.run('saveSnapshot', () => {
      const insert = this.db.prepare('insert into snapshot (marketId, entryJson) values (?, ?)');
      const tx = this.db.transaction((entries: Snapshot) => {
        this.db.prepare('delete from snapshot').run();
        for (const [marketId, entry] of Object.entries(entries)) insert.run(marketId, JSON.stringify(entry));
        this.markWritten('snapshot');
      });
      tx(snapshot);
    });
  }

  async appendMoves(moves: Move[], nowMs = Date.now()): Promise<Move[]> {
    this.run('appendMoves', () => {
      const insert = this.db.prepare('insert into moves (tsMs, moveJson) values (?, ?)');
      const tx = this.db.transaction((batch: Move[]) => {
        for (const m of batch) insert.run(m.tsMs, JSON.stringify(m));
        this.db.prepare('delete from moves where tsMs < ?').run(nowMs - this.retention.retentionMs);
        this.db
          .prepare('delete from moves where id not in (select id from moves order by id desc limit ?)')
          .run(this.retention.maxMoves);
        this.markWritten('moves');
      });
      tx(moves);
    });
    return (await this.loadRecentMoves(undefined, nowMs)) ?? [];
  }

  async loadRecentMoves(windowSeconds?: number, nowMs = Date.now()): Promise<Move[] | null> {
    return this.run('loadRecentMoves', () => {
      if (!this.written('moves')) return null;
      const rows = this.db.prepare('select moveJson from moves order by id').all();
      const moves = rows.map((row) => MoveSchema.parse(JSON.parse(MoveRow.parse(row).moveJson)));
      return windowMoves(moves, windowSeconds, nowMs);
    });
  }

  async setStatus(status: Status): Promise<void> {
    this.run('setStatus', () => {
      this.db.prepare('insert or replace into status (id, statusJson) values (1, ?)').run(JSON.stringify(status));
    });
  }

  async getStatus(): Promise<Status | null> {
    return this.run('getStatus', () => {
      const row = this.db.prepare('select statusJson from status where id = 1').get();
      if (row === undefined) return null;
      return StatusSchema.parse(JSON.parse(StatusRow.parse(row).statusJson));
    });
  }

  async describe(): Promise<StoreInfo> {
    return this.run<StoreInfo>('describe', () => {
      const count = (sql: string) => CountRow.parse(this.db.prepare(sql).get()).n;
      return {
        kind: 'sqlite',
        location: this.location,
        snapshotMarkets: this.written('snapshot') ? count('select count(*) as n from snapshot') : null,
        moves: this.written('moves') ? count('select count(*) as n from moves') : null,
        hasStatus: this.db.prepare('select 1 from status where id = 1').get() !== undefined
      };
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
