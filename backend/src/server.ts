import 'dotenv/config';
import type { Server } from 'http';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { buildConfigSnapshot, computeConfigHash } from './configSnapshot.js';
import { CooldownTracker } from './cooldown.js';
import { formatStartupMessage } from './messageTemplates.js';
import { broadcast } from './notifier.js';
import { checkNotifySetup, createChannels, createProvider } from './runtime.js';
import { startLoop, type ScanContext } from './scanner.js';
import { ScanStore } from './scanStore.js';
import { createStatusApp } from './statusApp.js';

async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`[config] ❌ ${e.message}`);
      process.exitCode = 1;
      return;
    }
    throw e;
  }

  const channels = createChannels(config.notify, config.scanner.httpTimeoutMs);
  const setup = checkNotifySetup(config.notify, channels);
  if (!setup.ok) {
    console.error(`[notify] ❌ ${setup.message}`);
    process.exitCode = 1;
    return;
  }
  if (setup.degraded) console.warn('[notify] alerts disabled (NOTIFY_REQUIRED=false); scanning only');

  const scanner = config.scanner;
  const configHash = computeConfigHash(buildConfigSnapshot(scanner));
  const provider = createProvider(scanner);
  const tracker = new CooldownTracker();
  const store = new ScanStore();
  const ctx: ScanContext = { config: scanner, provider, channels, tracker, store };

  console.log('[boot] 🚀 pump/dump scanner', {
    preset: scanner.preset,
    provider: provider.name,
    timeframe: scanner.timeframe,
    thresholdPct: scanner.detection.priceChangeThresholdPct,
    lag: scanner.detection.priceChangeLag,
    cooldownMin: scanner.cooldownMs / 60_000,
    channels: channels.map(c => c.name),
    configHash,
  });

  try {
    const roster = await provider.listInstruments({ quote: scanner.quoteCurrency, activeOnly: true });
    console.log(`[boot] 🔍 instruments found: ${roster.length}`);
    await broadcast(channels, formatStartupMessage({
      provider: provider.name,
      timeframe: scanner.timeframe,
      preset: scanner.preset,
      instruments: scanner.maxInstruments > 0 ? Math.min(roster.length, scanner.maxInstruments) : roster.length,
    }));
  } catch (e) {
    // the loop retries the roster every cycle
    console.error('[boot] roster fetch failed', String(e));
  }

  const handle = startLoop(ctx);

  let server: Server | null = null;
  if (config.port > 0) {
    const app = createStatusApp({
      config: scanner,
      configHash,
      store,
      tracker,
      provider: provider.name,
      channels: channels.map(c => c.name),
      startedAt: Date.now(),
    });
    server = app.listen(config.port, () => console.log(`[http] status on http://localhost:${config.port}`));
  }

  const shutdown = () => {
    console.log('[boot] ⏹️ scanner stopped');
    handle.stop();
    if (server) server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  console.error('[boot] 💥 fatal', err);
  process.exit(1);
});
