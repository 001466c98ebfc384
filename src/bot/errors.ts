import type { GammaEventRaw } from './gamma_events.js';

// One page request failed (network, timeout, non-2xx, unexpected body). Retried.
export class TransientFetchError extends Error {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'TransientFetchError';
    this.status = opts.status;
  }
}

// Whole fetch aborted after a page exhausted its retries or hit a client error.
export class FetchFailure extends Error {
  readonly offset: number;
  readonly partial: GammaEventRaw[];

  constructor(opts: { offset: number; attempts: number; partial: GammaEventRaw[]; cause: unknown }) {
    const reason = opts.cause instanceof Error ? opts.cause.message : String(opts.cause);
    super(`fetch aborted at offset ${opts.offset} after ${opts.attempts} attempts: ${reason}`, { cause: opts.cause });
    this.name = 'FetchFailure';
    this.offset = opts.offset;
    this.partial = opts.partial;
  }
}

export class MalformedPriceError extends Error {
  readonly marketId: string;
  readonly raw: unknown;

  constructor(marketId: string, raw: unknown, detail: string) {
    super(`market ${marketId}: malformed outcomePrices (${detail})`);
    this.name = 'MalformedPriceError';
    this.marketId = marketId;
    this.raw = raw;
  }
}

export class StoreIOError extends Error {
  readonly op: string;
  readonly target: string;

  constructor(op: string, target: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`store ${op} failed for ${target}: ${reason}`, { cause });
    this.name = 'StoreIOError';
    this.op = op;
    this.target = target;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
