import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const ConfigSchema = z.object({
  ui: z.object({
    port: z.number().int().nonnegative().default(5000),
    bind: z.string().default('0.0.0.0')
  }).default({}),
  feeds: z.object({
    gammaBaseUrl: z.string().url().default('https://gamma-api.polymarket.com'),
    siteBaseUrl: z.string().url().default('https://polymarket.com'),
    pageSize: z.number().int().positive().max(500).default(100),
    // total attempts per page
    maxRetries: z.number().int().positive().default(3),
    retryBackoffMs: z.number().int().nonnegative().default(2000),
    backoff: z.enum(['fixed', 'exponential']).default('fixed'),
    requestTimeoutMs: z.number().int().positive().default(30_000)
  }).default({}),
  scanner: z.object({
    intervalMs: z.number().int().positive().default(5000),
    // moves at or below this are not recorded
    minMove: z.number().nonnegative().default(0),
    historyMinutes: z.number().positive().default(5),
    maxMoves: z.number().int().positive().default(500),
    autostart: z.boolean().default(true)
  }).default({}),
  storage: z.object({
    kind: z.enum(['file', 'sqlite']).default('file'),
    dir: z.string().default('./data'),
    sqliteFile: z.string().default('scanner.sqlite')
  }).default({})
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw == null || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`config: ${key} must be a number, got "${raw}"`);
  return n;
}

function envString(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const cur = root[key];
  const next = isObject(cur) ? { ...cur } : {};
  root[key] = next;
  return next;
}

function setIfDefined(target: Record<string, unknown>, key: string, value: unknown) {
  if (value !== undefined) target[key] = value;
}

/** Environment overrides on top of config.json. SCAN_INTERVAL is in seconds. */
export function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const out = { ...raw };
  const feeds = section(out, 'feeds');
  const scanner = section(out, 'scanner');
  const ui = section(out, 'ui');
  const storage = section(out, 'storage');

  setIfDefined(feeds, 'gammaBaseUrl', envString(env, 'API_BASE'));
  setIfDefined(feeds, 'pageSize', envNumber(env, 'PAGE_SIZE'));
  setIfDefined(feeds, 'maxRetries', envNumber(env, 'MAX_RETRIES'));

  const intervalSec = envNumber(env, 'SCAN_INTERVAL');
  setIfDefined(scanner, 'intervalMs', intervalSec === undefined ? undefined : Math.round(intervalSec * 1000));
  setIfDefined(scanner, 'historyMinutes', envNumber(env, 'HISTORY_MINUTES'));
  setIfDefined(scanner, 'maxMoves', envNumber(env, 'MAX_MOVES'));

  setIfDefined(ui, 'port', envNumber(env, 'PORT'));
  setIfDefined(ui, 'bind', envString(env, 'BIND'));

  setIfDefined(storage, 'dir', envString(env, 'DATA_DIR'));
  setIfDefined(storage, 'kind', envString(env, 'STORAGE_KIND'));

  return out;
}

export function parseConfig(raw: unknown, env: Env = {}): AppConfig {
  return ConfigSchema.parse(applyEnv(isObject(raw) ? raw : {}, env));
}

export function loadConfig(cwd: string, env: Env = process.env): AppConfig {
  const configPath = path.join(cwd, 'config.json');
  let parsed: unknown = {};
  if (fs.existsSync(configPath)) {
    parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  }
  return parseConfig(parsed, env);
}
