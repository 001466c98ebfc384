import 'dotenv/config';
import blessed from 'blessed';
import { z } from 'zod';
import { MoveSchema, SoundTriggerSchema } from '../bot/types.js';
import type { Move, SoundTrigger, Tier } from '../bot/types.js';
import { loadConfig } from '../server/lib/config.js';

const config = loadConfig(process.cwd());
const API = process.env.TUI_API ?? `http://127.0.0.1:${config.ui.port}`;

const StatusViewSchema = z.object({
  view: z.enum(['waiting', 'stale', 'fresh']),
  stale: z.boolean(),
  state: z.string(),
  message: z.string(),
  lastUpdateMs: z.number().nullable(),
  ageSeconds: z.number().nullable(),
  soundTrigger: SoundTriggerSchema.nullable(),
  error: z.string().nullable()
});

const BatchesSchema = z.object({
  waiting: z.boolean(),
  batches: z.array(z.object({ tsMs: z.number(), peak: z.number(), moves: z.array(MoveSchema) }))
});

async function getJson<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const res = await fetch(API + path);
  if (!res.ok) throw new Error(`${res.status} ${res.statusText}`);
  return schema.parse(await res.json());
}

// blessed tag escaping
function esc(text: string) {
  return text.replace(/[{}]/g, (ch) => (ch === '{' ? '{open}' : '{close}'));
}

let minMove = 0;

const screen = blessed.screen({ smartCSR: true, title: 'Market moves' });

// hotkeys
screen.key(['escape', 'q', 'C-c'], () => process.exit(0));
screen.key(['0'], () => { minMove = 0; });
screen.key(['1'], () => { minMove = 1; });
screen.key(['5'], () => { minMove = 5; });

const header = blessed.box({
  parent: screen,
  top: 0,
  left: 0,
  width: '100%',
  height: 4,
  label: ' Status (keys: 0/1/5 min move, q quit) ',
  tags: true,
  border: 'line',
  style: { border: { fg: 'cyan' } }
});

const table = blessed.listtable({
  parent: screen,
  top: 4,
  left: 0,
  width: '100%',
  height: '100%-4',
  label: ' Moves (newest batch first, largest first) ',
  tags: true,
  border: 'line',
  align: 'left',
  style: {
    border: { fg: 'cyan' },
    header: { fg: 'cyan', bold: true },
    cell: { fg: 'white' }
  }
});

const TIER_COLOR: Record<Tier, string> = {
  none: 'white',
  minor: 'yellow',
  notable: 'cyan',
  major: 'magenta',
  huge: 'red',
  extreme: 'red'
};

function signed(n: number) {
  return `${n > 0 ? '+' : ''}${n.toFixed(2)}`;
}

function dirCell(delta: number) {
  if (delta > 0) return `{green-fg}${signed(delta)}{/green-fg}`;
  if (delta < 0) return `{red-fg}${signed(delta)}{/red-fg}`;
  return signed(delta);
}

function compactVolume(v: number) {
  if (v >= 1e6) return `${(v / 1e6).toFixed(1)}M`;
  if (v >= 1e3) return `${(v / 1e3).toFixed(1)}K`;
  return v.toFixed(0);
}

function row(m: Move): string[] {
  const color = TIER_COLOR[m.tier];
  return [
    new Date(m.tsMs).toLocaleTimeString(),
    `{${color}-fg}${m.maxMove.toFixed(2)}{/${color}-fg}`,
    m.yes.toFixed(2),
    dirCell(m.yesDelta),
    m.no.toFixed(2),
    dirCell(m.noDelta),
    compactVolume(m.volume),
    esc(`${m.eventTitle} · ${m.question}`.slice(0, 70))
  ];
}

// one bell per new cycle, more rings for louder moves
let lastRungMs: number | null = null;
function ring(trigger: SoundTrigger | null, lastUpdateMs: number | null) {
  if (!trigger || lastUpdateMs == null || lastUpdateMs === lastRungMs) return;
  lastRungMs = lastUpdateMs;
  const times = trigger.level === 'high' ? 3 : trigger.level === 'medium' ? 2 : 1;
  process.stdout.write('\x07'.repeat(times));
}

async function tick() {
  const status = await getJson('/api/status', StatusViewSchema);
  const feed = await getJson(`/api/moves/batches?minMove=${minMove}`, BatchesSchema);

  const age = status.ageSeconds == null ? '—' : `${status.ageSeconds}s ago`;
  const viewTag = status.stale ? 'red-fg' : status.view === 'fresh' ? 'green-fg' : 'yellow-fg';
  const trigger = status.soundTrigger
    ? `{bold}Peak:{/bold} ${status.soundTrigger.magnitude.toFixed(2)} (${status.soundTrigger.tier})`
    : '{bold}Peak:{/bold} —';

  header.setContent(
    `{bold}Feed:{/bold} {${viewTag}}${status.view.toUpperCase()}{/${viewTag}}  ` +
    `{bold}State:{/bold} ${status.state}  {bold}Updated:{/bold} ${age}  ${trigger}  {bold}Min move:{/bold} ${minMove}\n` +
    esc(status.error ? `Error: ${status.error}` : status.message)
  );
  ring(status.soundTrigger, status.lastUpdateMs);

  const rows: string[][] = [];
  for (const batch of feed.batches) {
    for (const m of batch.moves) rows.push(row(m));
    if (rows.length >= 200) break;
  }

  table.setData([
    ['Time', 'Max', 'Yes', 'ΔYes', 'No', 'ΔNo', 'Vol', 'Event · Market'],
    ...(rows.length ? rows : [[feed.waiting ? 'waiting for data' : 'no moves', '', '', '', '', '', '', '']])
  ]);

  screen.render();
}

async function loop() {
  try {
    await tick();
  } catch (e) {
    header.setContent(`{red-fg}Error:{/red-fg} ${esc(e instanceof Error ? e.message : String(e))}`);
    screen.render();
  } finally {
    setTimeout(() => void loop(), 1000);
  }
}

void loop();
