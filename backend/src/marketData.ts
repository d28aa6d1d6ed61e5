import fetch from 'node-fetch';
import type { Candle, Timeframe } from './types.js';

export interface ListInstrumentsOptions {
  quote: string;
  activeOnly: boolean;
}

export interface MarketDataProvider {
  readonly name: string;
  /** Unified `BASE/QUOTE:SETTLE` keys, exchange order preserved. */
  listInstruments(opts: ListInstrumentsOptions): Promise<string[]>;
  /** Oldest first, at most `limit` candles. */
  fetchCandles(instrument: string, timeframe: Timeframe, limit: number): Promise<Candle[]>;
}

/** Venue asked us to slow down. Worth retrying after a pause. */
export class RateLimitError extends Error {
  readonly retryAfterMs?: number;
  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** Network failure, timeout, bad status or malformed payload. Skip and move on. */
export class TransientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Numbers arrive as strings from most venues. NaN for anything unusable. */
export function toNum(v: unknown): number {
  if (typeof v === 'number') return v;
  if (typeof v === 'string' && v.trim() !== '') return Number(v);
  return Number.NaN;
}

export function unifiedKey(base: string, quote: string, settle: string): string {
  return `${base}/${quote}:${settle}`;
}

function retryAfterFrom(header: string | null): number | undefined {
  if (!header) return undefined;
  const secs = Number(header);
  return Number.isFinite(secs) && secs >= 0 ? secs * 1000 : undefined;
}

export async function getJson(url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await fetch(url, { signal: controller.signal });
    } catch (e) {
      throw new TransientError(`request failed: ${String(e)}`, { cause: e });
    }
    if (res.status === 429 || res.status === 418) {
      throw new RateLimitError(`HTTP ${res.status}`, retryAfterFrom(res.headers.get('retry-after')));
    }
    if (!res.ok) throw new TransientError(`HTTP ${res.status}`);
    try {
      return await res.json();
    } catch (e) {
      throw new TransientError('malformed JSON response', { cause: e });
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

