import {
  getJson,
  isRecord,
  toNum,
  TransientError,
  unifiedKey,
  type ListInstrumentsOptions,
  type MarketDataProvider,
} from './marketData.js';
import type { ProviderOptions } from './bybit.js';
import type { Candle, Timeframe } from './types.js';

// USD-M futures
const DEFAULT_BASE = process.env.BINANCE_FUTURES_BASE || 'https://fapi.binance.com';

export function createBinanceProvider(opts: ProviderOptions = {}): MarketDataProvider {
  const base = opts.baseUrl ?? DEFAULT_BASE;
  const timeoutMs = opts.timeoutMs ?? 10_000;
  const rosterTtlMs = opts.rosterTtlMs ?? 5 * 60 * 1000;
  const now = opts.now ?? Date.now;

  const symbols = new Map<string, string>();
  let roster: { key: string; keys: string[]; ts: number } | null = null;

  async function listInstruments({ quote, activeOnly }: ListInstrumentsOptions): Promise<string[]> {
    const cacheKey = `${quote}|${activeOnly}`;
    if (roster && roster.key === cacheKey && now() - roster.ts < rosterTtlMs) return roster.keys;

    const json = await getJson(`${base}/fapi/v1/exchangeInfo`, timeoutMs);
    if (!isRecord(json) || !Array.isArray(json.symbols)) throw new TransientError('exchangeInfo: unexpected payload');

    const keys: string[] = [];
    for (const s of json.symbols) {
      if (!isRecord(s)) continue;
      const symbol = String(s.symbol ?? '');
      const baseAsset = String(s.baseAsset ?? '');
      const quoteAsset = String(s.quoteAsset ?? '');
      const marginAsset = String(s.marginAsset ?? quoteAsset);
      if (!symbol || !baseAsset) continue;
      if (s.contractType !== 'PERPETUAL') continue;
      if (quoteAsset !== quote) continue;
      if (activeOnly && s.status !== 'TRADING') continue;
      const key = unifiedKey(baseAsset, quoteAsset, marginAsset);
      symbols.set(key, symbol);
      keys.push(key);
    }

    roster = { key: cacheKey, keys, ts: now() };
    return keys;
  }

  async function fetchCandles(instrument: string, timeframe: Timeframe, limit: number): Promise<Candle[]> {
    const symbol = symbols.get(instrument) ?? instrument.replace(/:.*$/, '').replace('/', '');
    const url = `${base}/fapi/v1/klines?symbol=${encodeURIComponent(symbol)}&interval=${timeframe}&limit=${limit}`;
    const json = await getJson(url, timeoutMs);
    if (!Array.isArray(json)) throw new TransientError(`klines ${symbol}: unexpected payload`);

    return json.map((k): Candle => {
      if (!Array.isArray(k) || k.length < 8) throw new TransientError(`klines ${symbol}: malformed row`);
      return {
        openTime: toNum(k[0]),
        open: toNum(k[1]),
        high: toNum(k[2]),
        low: toNum(k[3]),
        close: toNum(k[4]),
        volume: toNum(k[5]),
        quoteVolume: toNum(k[7]),
      };
    });
  }

  return { name: 'binance', listInstruments, fetchCandles };
}
