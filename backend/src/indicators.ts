// Indicator formulas used by the pump/dump classifier. All pure.

// Population mean
export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

// Population standard deviation (divides by N, not N-1)
export function stddev(values: number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let acc = 0;
  for (const v of values) acc += (v - m) * (v - m);
  return Math.sqrt(acc / values.length);
}

/**
 * How many standard deviations the current bar's volume sits above the
 * last `period` bars of history. `history` must not contain the current bar.
 * Short history or a flat history both read as "no spike" (0).
 */
export function volumeZScore(history: number[], current: number, period: number): number {
  if (period <= 0 || history.length < period) return 0;
  const window = history.slice(-period);
  const sd = stddev(window);
  if (sd === 0) return 0;
  return (current - mean(window)) / sd;
}

// % change of the last close vs the close `lag` bars earlier
export function priceChangePct(closes: number[], lag: number = 1): number {
  if (lag < 1 || closes.length < lag + 1) return 0;
  const current = closes[closes.length - 1];
  const reference = closes[closes.length - 1 - lag];
  if (reference === 0) return 0;
  return ((current - reference) / reference) * 100;
}

/**
 * Wilder RSI of the whole series, reported for the last bar.
 * Fewer than period+1 closes gives the neutral 50.
 */
export function rsi(closes: number[], period: number = 14): number {
  if (period < 1 || closes.length < period + 1) return 50;

  let avgGain = 0;
  let avgLoss = 0;
  for (let i = 1; i <= period; i++) {
    const ch = closes[i] - closes[i - 1];
    if (ch > 0) avgGain += ch;
    else avgLoss -= ch;
  }
  avgGain /= period;
  avgLoss /= period;

  for (let i = period + 1; i < closes.length; i++) {
    const ch = closes[i] - closes[i - 1];
    const gain = ch > 0 ? ch : 0;
    const loss = ch < 0 ? -ch : 0;
    avgGain = (avgGain * (period - 1) + gain) / period;
    avgLoss = (avgLoss * (period - 1) + loss) / period;
  }

  if (avgLoss === 0) return 100;
  return 100 - 100 / (1 + avgGain / avgLoss);
}

/**
 * Mean of the last `recentBars` volumes (current bar included) over the mean
 * of the `baselineBars` before them. Missing or zero baseline -> 1.0.
 */
export function volumeGrowthRatio(volumes: number[], recentBars: number = 3, baselineBars: number = 10): number {
  if (recentBars < 1 || volumes.length < recentBars) return 1;
  const recent = mean(volumes.slice(-recentBars));
  const baselineSlice = volumes.slice(Math.max(0, volumes.length - recentBars - baselineBars), volumes.length - recentBars);
  let baseline = baselineSlice.length < baselineBars ? recent : mean(baselineSlice);
  if (baseline === 0) baseline = recent;
  if (baseline === 0) return 1;
  return recent / baseline;
}
