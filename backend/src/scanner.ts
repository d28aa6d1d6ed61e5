// backend/src/scanner.ts
import type { ScannerConfig } from './config.js';
import type { CooldownTracker } from './cooldown.js';
import { classify } from './logic.js';
import { RateLimitError, TransientError, type MarketDataProvider } from './marketData.js';
import { fmtPct, formatSignalMessage } from './messageTemplates.js';
import { broadcast, type NotificationChannel } from './notifier.js';
import type { ScanRun, ScanStore } from './scanStore.js';
import type { Candle, Signal } from './types.js';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface ScanContext {
  config: ScannerConfig;
  provider: MarketDataProvider;
  channels: NotificationChannel[];
  tracker: CooldownTracker;
  store: ScanStore;
  log?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type InstrumentOutcome =
  | { kind: 'signal'; signal: Signal }
  | { kind: 'quiet' }
  | { kind: 'skip'; reason: string }
  | { kind: 'retry'; retryAfterMs: number; reason: string };

const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/** Fetch one window and classify it. Never throws. */
export async function processInstrument(ctx: ScanContext, instrument: string): Promise<InstrumentOutcome> {
  const { config } = ctx;
  const now = ctx.now ?? Date.now;

  let candles: Candle[];
  try {
    candles = await ctx.provider.fetchCandles(instrument, config.timeframe, config.candleLimit);
  } catch (e) {
    if (e instanceof RateLimitError) {
      return { kind: 'retry', retryAfterMs: e.retryAfterMs ?? config.rateLimitBackoffMs, reason: e.message };
    }
    if (e instanceof TransientError) return { kind: 'skip', reason: e.message };
    return { kind: 'skip', reason: `unexpected: ${String(e)}` };
  }

  const signal = classify(instrument, candles, config.detection, now());
  return signal ? { kind: 'signal', signal } : { kind: 'quiet' };
}

async function emit(ctx: ScanContext, signal: Signal, log: Logger) {
  const { config, store } = ctx;
  // cooldown is keyed to detection, not to delivery
  ctx.tracker.record(signal.instrument, signal.detectedAt);
  store.recordSignal(signal);
  log.log(
    `[scan] 🎯 signal #${store.signalCount}: ${signal.instrument} | ${signal.direction} | ${fmtPct(signal.priceChangePct)} | volume Z=${signal.volumeZScore.toFixed(1)} | ${signal.severity}`
  );
  const text = formatSignalMessage(signal, config.timeframe, config.detection.priceChangeLag, config.quoteCurrency);
  const report = await broadcast(ctx.channels, text, log);
  if (report.failed > 0) log.warn('[notify] partial delivery', { instrument: signal.instrument, ...report });
}

export async function scanOnce(ctx: ScanContext): Promise<ScanRun> {
  const { config, tracker, store } = ctx;
  const log = ctx.log ?? console;
  const now = ctx.now ?? Date.now;
  const sleep = ctx.sleep ?? defaultSleep;

  const startedAt = now();
  const run: Omit<ScanRun, 'runId'> = {
    preset: config.preset,
    status: 'FINISHED',
    startedAt,
    finishedAt: startedAt,
    durationMs: 0,
    instruments: 0,
    scanned: 0,
    cooledDown: 0,
    signals: 0,
    skipped: 0,
    rateLimited: 0,
    errors: [],
    errorMessage: null,
  };

  let instruments: string[];
  try {
    instruments = await ctx.provider.listInstruments({ quote: config.quoteCurrency, activeOnly: true });
  } catch (e) {
    const finishedAt = now();
    store.recordScanRun({ ...run, status: 'FAILED', finishedAt, durationMs: finishedAt - startedAt, errorMessage: String(e) });
    throw e;
  }
  if (config.maxInstruments > 0) instruments = instruments.slice(0, config.maxInstruments);
  run.instruments = instruments.length;

  log.log(`[scan] ⏱️ scanning ${instruments.length} instruments (${config.timeframe}) | signals so far: ${store.signalCount}`);

  for (const instrument of instruments) {
    if (!tracker.isCooledDown(instrument, now(), config.cooldownMs)) {
      run.cooledDown++;
      continue;
    }

    run.scanned++;
    let outcome = await processInstrument(ctx, instrument);
    let attempts = 0;
    while (outcome.kind === 'retry') {
      run.rateLimited++;
      if (attempts >= config.rateLimitRetries) break;
      log.warn('[scan] rate limited, backing off', { instrument, backoffMs: outcome.retryAfterMs, reason: outcome.reason });
      await sleep(outcome.retryAfterMs);
      attempts++;
      outcome = await processInstrument(ctx, instrument);
    }

    switch (outcome.kind) {
      case 'signal':
        run.signals++;
        await emit(ctx, outcome.signal, log);
        break;
      case 'skip':
        run.skipped++;
        run.errors.push(`${instrument}: ${outcome.reason}`);
        log.warn('[scan] skipped', { instrument, reason: outcome.reason });
        break;
      case 'retry':
        run.skipped++;
        run.errors.push(`${instrument}: still rate limited (${outcome.reason})`);
        break;
      case 'quiet':
        break;
    }

    if (config.symbolDelayMs > 0) await sleep(config.symbolDelayMs);
  }

  const swept = tracker.sweep(now(), config.cooldownRetentionMs);
  const finishedAt = now();
  const stored = store.recordScanRun({ ...run, finishedAt, durationMs: finishedAt - startedAt });
  log.log('[scan] cycle done', {
    scanned: stored.scanned,
    signals: stored.signals,
    cooledDown: stored.cooledDown,
    skipped: stored.skipped,
    rateLimited: stored.rateLimited,
    swept,
    durationMs: stored.durationMs,
  });
  return stored;
}

export type LoopHandle = { stop(): void };

/** Back-to-back cycles, `pollIntervalMs` apart. One cycle at a time. */
export function startLoop(ctx: ScanContext, onUpdate?: (run: ScanRun) => void): LoopHandle {
  const log = ctx.log ?? console;
  let stopped = false;
  let timer: NodeJS.Timeout | null = null;

  const loop = async () => {
    timer = null;
    if (stopped) return;
    let delay = ctx.config.pollIntervalMs;
    try {
      const run = await scanOnce(ctx);
      onUpdate && onUpdate(run);
    } catch (e) {
      log.error('[scan] 💥 cycle error', String(e));
      delay += ctx.config.errorBackoffMs;
    }
    if (stopped) return;
    log.log(`[scan] ⏰ next cycle in ${Math.round(delay / 1000)}s`);
    timer = setTimeout(() => void loop(), delay);
  };
  void loop();

  return {
    stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
    },
  };
}
