import crypto from 'crypto';
import type { Env, ScannerConfig } from './config.js';

export const CONFIG_ENV_KEYS = [
  'SCANNER_PRESET',
  'PRICE_CHANGE_THRESHOLD',
  'PRICE_CHANGE_LAG',
  'VOLUME_SPIKE_THRESHOLD',
  'VOLUME_ZSCORE_PERIOD',
  'MIN_ABSOLUTE_VOLUME',
  'REQUIRE_VOLUME_CONFIRMATION',
  'VOLUME_GROWTH_FILTER',
  'VOLUME_GROWTH_THRESHOLD',
  'RSI_FILTER',
  'RSI_PERIOD',
  'RSI_HIGH_CUTOFF',
  'RSI_LOW_CUTOFF',
  'STRONG_MOVE_PCT',
  'MEDIUM_MOVE_PCT',
  'CANDLE_TIMEFRAME',
  'CANDLE_LIMIT',
  'MIN_CANDLES',
  'POLL_INTERVAL_SEC',
  'SIGNAL_COOLDOWN_MIN',
  'COOLDOWN_RETENTION_MULT',
  'MARKET_PROVIDER',
  'QUOTE_CURRENCY',
  'MAX_INSTRUMENTS',
];

const SECRET_ENV_RE = /(TOKEN|KEY|SECRET|PASS|URL)/i;

export function parseEnvValue(raw: string): string | number | boolean {
  const v = String(raw).trim();
  if (!v) return v;
  if (v.toLowerCase() === 'true') return true;
  if (v.toLowerCase() === 'false') return false;
  const n = Number(v);
  if (Number.isFinite(n)) return n;
  return v;
}

/** Env overrides that are set, minus anything that looks like a credential. */
export function safeEnvSnapshot(env: Env = process.env, keys: string[] = CONFIG_ENV_KEYS) {
  const out: Record<string, string | number | boolean> = {};
  for (const key of keys) {
    const raw = env[key];
    if (raw === undefined) continue;
    if (SECRET_ENV_RE.test(key)) continue;
    out[key] = parseEnvValue(raw);
  }
  return out;
}

export function buildConfigSnapshot(config: ScannerConfig, env: Env = process.env) {
  return {
    preset: config.preset,
    env: safeEnvSnapshot(env),
    detection: config.detection,
    scan: {
      provider: config.provider,
      timeframe: config.timeframe,
      candleLimit: config.candleLimit,
      pollIntervalMs: config.pollIntervalMs,
      cooldownMs: config.cooldownMs,
      quoteCurrency: config.quoteCurrency,
    },
  };
}

export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') return JSON.stringify(obj) ?? 'null';
  if (Array.isArray(obj)) return `[${obj.map(stableStringify).join(',')}]`;
  const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

export function computeConfigHash(snapshot: { preset: string; detection: unknown; scan: unknown }) {
  const payload = {
    preset: snapshot.preset,
    detection: snapshot.detection,
    scan: snapshot.scan,
  };
  const stable = stableStringify(payload);
  return crypto.createHash('sha256').update(stable).digest('hex');
}
