// backend/src/logic.ts
import { priceChangePct, rsi, volumeGrowthRatio, volumeZScore } from './indicators.js';
import type { Candle, Direction, SeverityTier, Signal } from './types.js';

export interface DetectionConfig {
  priceChangeThresholdPct: number; // e.g. 5.0  => ±5% move
  priceChangeLag: number;          // candles back for the reference close
  minCandles: number;              // shorter windows get no opinion
  volumeZScoreThreshold: number;   // e.g. 3.0  => 3σ above recent volume
  volumeZScorePeriod: number;      // history bars for the z-score
  minQuoteVolume: number;          // current bar turnover, quote currency
  requireVolumeConfirmation: boolean;
  /** Heuristic: OR-ed into volume confirmation when enabled. */
  volumeGrowth: { enabled: boolean; threshold: number; recentBars: number; baselineBars: number };
  /** Heuristic: skip moves that start from an overbought/oversold regime. */
  rsiFilter: { enabled: boolean; period: number; high: number; low: number };
  tiers: { strongPct: number; mediumPct: number; confidence: Record<SeverityTier, number> };
}

function quoteVolumeOf(c: Candle): number {
  return c.quoteVolume ?? c.volume * c.close;
}

export function severityFor(changePct: number, tiers: DetectionConfig['tiers']): SeverityTier {
  const abs = Math.abs(changePct);
  if (abs >= tiers.strongPct) return 'STRONG';
  if (abs >= tiers.mediumPct) return 'MEDIUM';
  return 'WEAK';
}

function detect(instrument: string, window: Candle[], cfg: DetectionConfig, now: number): Signal | null {
  if (window.length < cfg.minCandles || window.length < 2) return null;

  const closes = window.map(c => c.close);
  const volumes = window.map(c => c.volume);
  const last = window[window.length - 1];

  const change = priceChangePct(closes, cfg.priceChangeLag);
  if (!Number.isFinite(change)) return null;

  let direction: Direction;
  if (change >= cfg.priceChangeThresholdPct) direction = 'PUMP';
  else if (change <= -cfg.priceChangeThresholdPct) direction = 'DUMP';
  else return null;

  const z = volumeZScore(volumes.slice(0, -1), last.volume, cfg.volumeZScorePeriod);
  if (!Number.isFinite(z)) return null;

  const quoteVolume = quoteVolumeOf(last);
  if (!Number.isFinite(quoteVolume) || quoteVolume < cfg.minQuoteVolume) return null;

  let growth: number | undefined;
  if (cfg.volumeGrowth.enabled) {
    growth = volumeGrowthRatio(volumes, cfg.volumeGrowth.recentBars, cfg.volumeGrowth.baselineBars);
    if (!Number.isFinite(growth)) return null;
  }

  if (cfg.requireVolumeConfirmation) {
    const zOk = z >= cfg.volumeZScoreThreshold;
    const growthOk = growth !== undefined && growth >= cfg.volumeGrowth.threshold;
    if (!zOk && !growthOk) return null;
  }

  let rsiNow: number | undefined;
  if (cfg.rsiFilter.enabled) {
    rsiNow = rsi(closes, cfg.rsiFilter.period);
    if (!Number.isFinite(rsiNow)) return null;
    if (rsiNow > cfg.rsiFilter.high || rsiNow < cfg.rsiFilter.low) return null;
  }

  const severity = severityFor(change, cfg.tiers);

  const signal: Signal = {
    instrument,
    direction,
    price: last.close,
    priceChangePct: change,
    volumeZScore: z,
    volumeUsdt: quoteVolume,
    ...(rsiNow !== undefined ? { rsi: rsiNow } : {}),
    ...(growth !== undefined ? { volumeGrowthRatio: growth } : {}),
    severity,
    confidence: cfg.tiers.confidence[severity],
    detectedAt: now,
  };
  return Object.freeze(signal);
}

/** ------------------------- Main analyzer --------------------------- */
export function classify(
  instrument: string,
  window: Candle[],
  config: DetectionConfig,
  now: number = Date.now()
): Signal | null {
  try {
    return detect(instrument, window, config, now);
  } catch (e) {
    console.warn('[logic] analysis failed', { instrument, error: String(e) });
    return null;
  }
}
