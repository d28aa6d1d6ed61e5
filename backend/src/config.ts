// backend/src/config.ts
import type { DetectionConfig } from './logic.js';
import type { Timeframe } from './types.js';
import { parseEnvValue } from './configSnapshot.js';

export type Preset = 'CONSERVATIVE' | 'PERMISSIVE';
export type ProviderName = 'bybit' | 'binance';
export type Env = Record<string, string | undefined>;

export const TIMEFRAMES: readonly Timeframe[] = ['1m', '3m', '5m', '15m', '30m', '1h'];
const PRESETS: readonly Preset[] = ['CONSERVATIVE', 'PERMISSIVE'];
const PROVIDERS: readonly ProviderName[] = ['bybit', 'binance'];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ScannerConfig {
  preset: Preset;
  detection: DetectionConfig;
  timeframe: Timeframe;
  candleLimit: number;
  pollIntervalMs: number;
  cooldownMs: number;
  cooldownRetentionMs: number;
  rateLimitBackoffMs: number;
  rateLimitRetries: number;
  errorBackoffMs: number;
  symbolDelayMs: number;
  provider: ProviderName;
  quoteCurrency: string;
  maxInstruments: number; // 0 = whole roster
  httpTimeoutMs: number;
}

export interface EmailConfig {
  enabled: boolean;
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
  fromName: string;
  fromAddress: string;
  recipients: string[];
}

export interface NotifyConfig {
  telegramBotToken: string;
  telegramChatIds: string[];
  email: EmailConfig;
  /** Refuse to start when no channel is configured. */
  required: boolean;
}

export interface AppConfig {
  scanner: ScannerConfig;
  notify: NotifyConfig;
  port: number;
}

const CONFIDENCE = { STRONG: 90, MEDIUM: 80, WEAK: 70 } as const;

export function detectionForPreset(preset: Preset): DetectionConfig {
  switch (preset) {
    case 'PERMISSIVE':
      return {
        priceChangeThresholdPct: 3.0,
        priceChangeLag: 2, // 10 minutes on 5m candles
        minCandles: 30,
        volumeZScoreThreshold: 2.5,
        volumeZScorePeriod: 20,
        minQuoteVolume: 50_000,
        requireVolumeConfirmation: true,
        volumeGrowth: { enabled: true, threshold: 1.8, recentBars: 3, baselineBars: 10 },
        rsiFilter: { enabled: true, period: 14, high: 85, low: 15 },
        tiers: { strongPct: 6, mediumPct: 4.5, confidence: { ...CONFIDENCE } },
      };
    case 'CONSERVATIVE':
    default:
      return {
        priceChangeThresholdPct: 5.0,
        priceChangeLag: 1,
        minCandles: 25,
        volumeZScoreThreshold: 3.0,
        volumeZScorePeriod: 20,
        minQuoteVolume: 75_000,
        requireVolumeConfirmation: true,
        volumeGrowth: { enabled: false, threshold: 1.8, recentBars: 3, baselineBars: 10 },
        rsiFilter: { enabled: false, period: 14, high: 85, low: 15 },
        tiers: { strongPct: 6, mediumPct: 5.5, confidence: { ...CONFIDENCE } },
      };
  }
}

export function candleLimitForPreset(preset: Preset): number {
  return preset === 'PERMISSIVE' ? 50 : 25;
}

/** Shortest window that covers every active lookback. */
export function requiredCandles(d: DetectionConfig): number {
  return Math.max(
    2,
    d.priceChangeLag + 1,
    d.volumeZScorePeriod + 1,
    d.rsiFilter.enabled ? d.rsiFilter.period + 1 : 0,
    d.volumeGrowth.enabled ? d.volumeGrowth.recentBars + d.volumeGrowth.baselineBars : 0
  );
}

// ---- env readers ----------------------------------------------------
function raw(env: Env, key: string): string | undefined {
  const v = env[key];
  if (v == null) return undefined;
  const t = v.trim();
  return t === '' ? undefined : t;
}

function num(env: Env, key: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const v = raw(env, key);
  if (v === undefined) return fallback;
  const parsed = parseEnvValue(v);
  if (typeof parsed !== 'number') throw new ConfigError(`${key} must be a number, got "${v}"`);
  if (opts.integer && !Number.isInteger(parsed)) throw new ConfigError(`${key} must be an integer, got "${v}"`);
  if (opts.min !== undefined && parsed < opts.min) throw new ConfigError(`${key} must be >= ${opts.min}, got ${parsed}`);
  return parsed;
}

function bool(env: Env, key: string, fallback: boolean): boolean {
  const v = raw(env, key);
  if (v === undefined) return fallback;
  const parsed = parseEnvValue(v);
  if (typeof parsed === 'boolean') return parsed;
  if (parsed === 1 || parsed === 0) return parsed === 1;
  throw new ConfigError(`${key} must be true or false, got "${v}"`);
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T, normalize: (s: string) => string): T {
  const v = raw(env, key);
  if (v === undefined) return fallback;
  const n = normalize(v);
  const hit = allowed.find(a => a === n);
  if (!hit) throw new ConfigError(`${key} must be one of ${allowed.join(', ')}, got "${v}"`);
  return hit;
}

function list(env: Env, key: string): string[] {
  return (raw(env, key) ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}
// ---------------------------------------------------------------------

export function loadDetectionConfig(env: Env, preset: Preset): DetectionConfig {
  const base = detectionForPreset(preset);
  const d: DetectionConfig = {
    priceChangeThresholdPct: num(env, 'PRICE_CHANGE_THRESHOLD', base.priceChangeThresholdPct, { min: 0 }),
    priceChangeLag: num(env, 'PRICE_CHANGE_LAG', base.priceChangeLag, { min: 1, integer: true }),
    minCandles: num(env, 'MIN_CANDLES', base.minCandles, { min: 2, integer: true }),
    volumeZScoreThreshold: num(env, 'VOLUME_SPIKE_THRESHOLD', base.volumeZScoreThreshold),
    volumeZScorePeriod: num(env, 'VOLUME_ZSCORE_PERIOD', base.volumeZScorePeriod, { min: 2, integer: true }),
    minQuoteVolume: num(env, 'MIN_ABSOLUTE_VOLUME', base.minQuoteVolume, { min: 0 }),
    requireVolumeConfirmation: bool(env, 'REQUIRE_VOLUME_CONFIRMATION', base.requireVolumeConfirmation),
    volumeGrowth: {
      enabled: bool(env, 'VOLUME_GROWTH_FILTER', base.volumeGrowth.enabled),
      threshold: num(env, 'VOLUME_GROWTH_THRESHOLD', base.volumeGrowth.threshold, { min: 0 }),
      recentBars: base.volumeGrowth.recentBars,
      baselineBars: base.volumeGrowth.baselineBars,
    },
    rsiFilter: {
      enabled: bool(env, 'RSI_FILTER', base.rsiFilter.enabled),
      period: num(env, 'RSI_PERIOD', base.rsiFilter.period, { min: 1, integer: true }),
      high: num(env, 'RSI_HIGH_CUTOFF', base.rsiFilter.high, { min: 0 }),
      low: num(env, 'RSI_LOW_CUTOFF', base.rsiFilter.low, { min: 0 }),
    },
    tiers: {
      strongPct: num(env, 'STRONG_MOVE_PCT', base.tiers.strongPct, { min: 0 }),
      mediumPct: num(env, 'MEDIUM_MOVE_PCT', base.tiers.mediumPct, { min: 0 }),
      confidence: base.tiers.confidence,
    },
  };

  if (d.rsiFilter.low >= d.rsiFilter.high) {
    throw new ConfigError(`RSI_LOW_CUTOFF (${d.rsiFilter.low}) must be below RSI_HIGH_CUTOFF (${d.rsiFilter.high})`);
  }
  if (d.tiers.mediumPct > d.tiers.strongPct) {
    throw new ConfigError(`MEDIUM_MOVE_PCT (${d.tiers.mediumPct}) must not exceed STRONG_MOVE_PCT (${d.tiers.strongPct})`);
  }
  const need = requiredCandles(d);
  if (d.minCandles < need) {
    throw new ConfigError(`MIN_CANDLES (${d.minCandles}) is shorter than the longest active lookback (${need})`);
  }
  return d;
}

export function loadScannerConfig(env: Env = process.env): ScannerConfig {
  const preset = oneOf(env, 'SCANNER_PRESET', PRESETS, 'CONSERVATIVE', s => s.toUpperCase());
  const detection = loadDetectionConfig(env, preset);
  const candleLimit = num(env, 'CANDLE_LIMIT', Math.max(candleLimitForPreset(preset), detection.minCandles), { min: 2, integer: true });
  if (candleLimit < detection.minCandles) {
    throw new ConfigError(`CANDLE_LIMIT (${candleLimit}) must be >= MIN_CANDLES (${detection.minCandles})`);
  }
  const cooldownMs = num(env, 'SIGNAL_COOLDOWN_MIN', 15, { min: 0 }) * 60_000;
  return {
    preset,
    detection,
    timeframe: oneOf(env, 'CANDLE_TIMEFRAME', TIMEFRAMES, '5m', s => s.toLowerCase()),
    candleLimit,
    pollIntervalMs: num(env, 'POLL_INTERVAL_SEC', 30, { min: 0 }) * 1000,
    cooldownMs,
    cooldownRetentionMs: cooldownMs * num(env, 'COOLDOWN_RETENTION_MULT', 2, { min: 1 }),
    rateLimitBackoffMs: num(env, 'RATE_LIMIT_BACKOFF_MS', 2000, { min: 0 }),
    rateLimitRetries: num(env, 'RATE_LIMIT_RETRIES', 1, { min: 0, integer: true }),
    errorBackoffMs: num(env, 'ERROR_BACKOFF_SEC', 10, { min: 0 }) * 1000,
    symbolDelayMs: num(env, 'SYMBOL_DELAY_MS', 0, { min: 0 }),
    provider: oneOf(env, 'MARKET_PROVIDER', PROVIDERS, 'bybit', s => s.toLowerCase()),
    quoteCurrency: (raw(env, 'QUOTE_CURRENCY') ?? 'USDT').toUpperCase(),
    maxInstruments: num(env, 'MAX_INSTRUMENTS', 0, { min: 0, integer: true }),
    httpTimeoutMs: num(env, 'HTTP_TIMEOUT_MS', 10_000, { min: 1 }),
  };
}

export function loadNotifyConfig(env: Env = process.env): NotifyConfig {
  const smtpUser = raw(env, 'SMTP_USER') ?? '';
  return {
    telegramBotToken: raw(env, 'TELEGRAM_BOT_TOKEN') ?? '',
    telegramChatIds: list(env, 'TELEGRAM_CHAT_IDS'),
    email: {
      enabled: bool(env, 'EMAIL_ENABLED', false),
      host: raw(env, 'SMTP_HOST') ?? '',
      port: num(env, 'SMTP_PORT', 587, { min: 1, integer: true }),
      secure: bool(env, 'SMTP_SECURE', false),
      user: smtpUser,
      pass: raw(env, 'SMTP_PASS') ?? '',
      fromName: raw(env, 'EMAIL_FROM_NAME') ?? 'Pump Dump Scanner',
      fromAddress: raw(env, 'EMAIL_FROM_ADDRESS') ?? (smtpUser || 'no-reply@localhost'),
      recipients: list(env, 'ALERT_EMAILS'),
    },
    required: bool(env, 'NOTIFY_REQUIRED', true),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const notify = loadNotifyConfig(env);
  if (notify.email.enabled && !notify.email.host) {
    throw new ConfigError('EMAIL_ENABLED=true needs SMTP_HOST');
  }
  return {
    scanner: loadScannerConfig(env),
    notify,
    port: num(env, 'PORT', 0, { min: 0, integer: true }),
  };
}
