import {
  getJson,
  isRecord,
  RateLimitError,
  toNum,
  TransientError,
  unifiedKey,
  type ListInstrumentsOptions,
  type MarketDataProvider,
} from './marketData.js';
import type { Candle, Timeframe } from './types.js';

const DEFAULT_BASE = process.env.BYBIT_BASE || 'https://api.bybit.com';
const RATE_LIMIT_CODES = new Set([10006, 10018]);

const INTERVALS: Record<Timeframe, string> = {
  '1m': '1',
  '3m': '3',
  '5m': '5',
  '15m': '15',
  '30m': '30',
  '1h': '60',
};

export type ProviderOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  rosterTtlMs?: number;
  now?: () => number;
};

// v5 wraps every payload in { retCode, retMsg, result }
function unwrap(json: unknown, what: string): Record<string, unknown> {
  if (!isRecord(json)) throw new TransientError(`${what}: unexpected payload`);
  const code = toNum(json.retCode);
  if (RATE_LIMIT_CODES.has(code)) throw new RateLimitError(`${what}: ${String(json.retMsg)}`);
  if (code !== 0) throw new TransientError(`${what}: retCode ${String(json.retCode)} ${String(json.retMsg)}`);
  if (!isRecord(json.result)) throw new TransientError(`${what}: missing result`);
  return json.result;
}

export function createBybitProvider(opts: ProviderOptions = {}): MarketDataProvider {
  const base = opts.baseUrl ?? DEFAULT_BASE;
  const timeoutMs = opts.timeoutMs ?? 10_000;
  const rosterTtlMs = opts.rosterTtlMs ?? 5 * 60 * 1000;
  const now = opts.now ?? Date.now;

  // unified key -> exchange symbol, refreshed with the roster
  const symbols = new Map<string, string>();
  let roster: { key: string; keys: string[]; ts: number } | null = null;

  async function listInstruments({ quote, activeOnly }: ListInstrumentsOptions): Promise<string[]> {
    const cacheKey = `${quote}|${activeOnly}`;
    if (roster && roster.key === cacheKey && now() - roster.ts < rosterTtlMs) return roster.keys;

    const keys: string[] = [];
    let cursor = '';
    do {
      const url = `${base}/v5/market/instruments-info?category=linear&limit=1000${cursor ? `&cursor=${encodeURIComponent(cursor)}` : ''}`;
      const result = unwrap(await getJson(url, timeoutMs), 'instruments-info');
      const rows = Array.isArray(result.list) ? result.list : [];
      for (const row of rows) {
        if (!isRecord(row)) continue;
        const symbol = String(row.symbol ?? '');
        const baseCoin = String(row.baseCoin ?? '');
        const quoteCoin = String(row.quoteCoin ?? '');
        const settleCoin = String(row.settleCoin ?? '');
        if (!symbol || !baseCoin) continue;
        if (row.contractType !== 'LinearPerpetual') continue;
        if (quoteCoin !== quote || settleCoin !== quote) continue;
        if (activeOnly && row.status !== 'Trading') continue;
        const key = unifiedKey(baseCoin, quoteCoin, settleCoin);
        symbols.set(key, symbol);
        keys.push(key);
      }
      cursor = typeof result.nextPageCursor === 'string' ? result.nextPageCursor : '';
    } while (cursor);

    roster = { key: cacheKey, keys, ts: now() };
    return keys;
  }

  async function fetchCandles(instrument: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const symbol = symbols.get(instrument) ?? instrument.replace(/:.*$/, '').replace('/', '');
    const url = `${base}/v5/market/kline?category=linear&symbol=${encodeURIComponent(symbol)}&interval=${INTERVALS[timeframe]}&limit=${limit}`;
    const result = unwrap(await getJson(url, timeoutMs), `kline ${symbol}`);
    if (!Array.isArray(result.list)) throw new TransientError(`kline ${symbol}: missing list`);

    const out: Candle[] = [];
    for (const row of result.list) {
      if (!Array.isArray(row) || row.length < 7) throw new TransientError(`kline ${symbol}: malformed row`);
      out.push({
        openTime: toNum(row[0]),
        open: toNum(row[1]),
        high: toNum(row[2]),
        low: toNum(row[3]),
        close: toNum(row[4]),
        volume: toNum(row[5]),
        quoteVolume: toNum(row[6]),
      });
    }
    // newest first on the wire
    return out.reverse();
  }

  return { name: 'bybit', listInstruments, fetchCandles };
}
