import path from 'node:path';
import type { AppConfig } from './config.js';
import { SqliteStore } from './db.js';
import { FileStore } from './store.js';
import type { MoveStore, RetentionOpts } from './store.js';

export function retentionFromConfig(config: AppConfig): RetentionOpts {
  return {
    retentionMs: Math.round(config.scanner.historyMinutes * 60_000),
    maxMoves: config.scanner.maxMoves
  };
}

export function openStore(config: AppConfig, cwd: string): MoveStore {
  const dir = path.resolve(cwd, config.storage.dir);
  const retention = retentionFromConfig(config);
  if (config.storage.kind === 'sqlite') {
    return new SqliteStore(path.join(dir, config.storage.sqliteFile), retention);
  }
  return new FileStore(dir, retention);
}
