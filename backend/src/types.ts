export type Timeframe = '1m' | '3m' | '5m' | '15m' | '30m' | '1h';

export type Candle = {
  readonly openTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
  readonly quoteVolume?: number; // turnover in quote currency, when the venue reports it
};

export type Direction = 'PUMP' | 'DUMP';
export type SeverityTier = 'WEAK' | 'MEDIUM' | 'STRONG';

export interface Signal {
  readonly instrument: string;
  readonly direction: Direction;
  readonly price: number;
  readonly priceChangePct: number;
  readonly volumeZScore: number;
  readonly volumeUsdt: number;
  readonly rsi?: number;
  readonly volumeGrowthRatio?: number;
  readonly severity: SeverityTier;
  readonly confidence: number;
  readonly detectedAt: number;
}
