import { z } from 'zod';

export const DirectionSchema = z.enum(['UP', 'DOWN', 'FLAT']);
export type Direction = z.infer<typeof DirectionSchema>;

export const TierSchema = z.enum(['none', 'minor', 'notable', 'major', 'huge', 'extreme']);
export type Tier = z.infer<typeof TierSchema>;

export type MarketQuote = {
  id: string;
  question: string;
  // percentage points, 0-100, two decimals
  yes: number;
  no: number;
  volume: number;
  volume24hr: number;
  liquidity: number;
};

// older records lack these and decode as 0
const laterNumber = z.number().default(0);

export const SnapshotEntrySchema = z.object({
  marketId: z.string(),
  eventId: z.string(),
  eventTitle: z.string(),
  eventLink: z.string(),
  question: z.string(),
  yes: z.number(),
  no: z.number(),
  yesDelta: z.number(),
  noDelta: z.number(),
  maxMove: z.number().nonnegative(),
  volume: z.number(),
  volume24hr: laterNumber,
  liquidity: laterNumber,
  eventVolume: z.number(),
  eventVolume24hr: laterNumber,
  eventLiquidity: laterNumber
});
export type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;

export const SnapshotSchema = z.record(z.string(), SnapshotEntrySchema);
export type Snapshot = z.infer<typeof SnapshotSchema>;

export const MoveSchema = z.object({
  id: z.string(),
  tsMs: z.number().int(),
  marketId: z.string(),
  eventId: z.string(),
  eventTitle: z.string(),
  eventLink: z.string(),
  question: z.string(),
  yes: z.number(),
  no: z.number(),
  yesDelta: z.number(),
  noDelta: z.number(),
  yesDir: DirectionSchema,
  noDir: DirectionSchema,
  maxMove: z.number().nonnegative(),
  tier: TierSchema,
  volume: z.number(),
  volume24hr: laterNumber,
  liquidity: laterNumber,
  eventVolume: z.number()
});
export type Move = z.infer<typeof MoveSchema>;

export const SoundTriggerSchema = z.object({
  magnitude: z.number(),
  level: z.enum(['low', 'medium', 'high']),
  tier: TierSchema
});
export type SoundTrigger = z.infer<typeof SoundTriggerSchema>;

export const StatusSchema = z.object({
  state: z.enum(['starting', 'ok', 'error']),
  message: z.string(),
  // last successful scan
  lastUpdateMs: z.number().nullable(),
  lastAttemptMs: z.number(),
  eventCount: z.number().int().nonnegative(),
  marketCount: z.number().int().nonnegative(),
  moveCount: z.number().int().nonnegative(),
  soundTrigger: SoundTriggerSchema.optional(),
  error: z.string().optional()
});
export type Status = z.infer<typeof StatusSchema>;
