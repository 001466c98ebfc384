import type { Move, SoundTrigger, Tier } from './types.js';

// Lower bounds in percentage points, inclusive, highest first.
export const MAGNITUDE_TIERS: ReadonlyArray<readonly [Tier, number]> = [
  ['extreme', 20],
  ['huge', 10],
  ['major', 5],
  ['notable', 1],
  ['minor', 0.5]
];

// Sound fires only above this.
export const SOUND_ALERT_THRESHOLD = 0.3;

export function classifyMagnitude(maxMove: number): Tier {
  for (const [tier, min] of MAGNITUDE_TIERS) {
    if (maxMove >= min) return tier;
  }
  return 'none';
}

export function soundLevel(magnitude: number): SoundTrigger['level'] | undefined {
  if (magnitude > 5) return 'high';
  if (magnitude > 1) return 'medium';
  if (magnitude > SOUND_ALERT_THRESHOLD) return 'low';
  return undefined;
}

/** Peak magnitude of the batch just recorded, if loud enough to alert on. */
export function soundTriggerFor(moves: ReadonlyArray<Pick<Move, 'maxMove'>>): SoundTrigger | undefined {
  let peak = 0;
  for (const m of moves) peak = Math.max(peak, m.maxMove);
  const level = soundLevel(peak);
  if (!level) return undefined;
  return { magnitude: peak, level, tier: classifyMagnitude(peak) };
}
