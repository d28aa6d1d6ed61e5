import 'dotenv/config';
import { loadConfig, type Env } from './config.js';
import { CooldownTracker } from './cooldown.js';
import { fmtPct, formatSignalMessage } from './messageTemplates.js';
import { broadcast } from './notifier.js';
import { createChannels, createProvider } from './runtime.js';
import { scanOnce } from './scanner.js';
import { ScanStore } from './scanStore.js';
import type { Signal } from './types.js';

function getArgValue(name: string): string | undefined {
  const idx = process.argv.indexOf(name);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function envWithArgs(): Env {
  const env: Env = { ...process.env };
  const preset = getArgValue('--preset');
  const limit = getArgValue('--limit');
  if (preset) env.SCANNER_PRESET = preset;
  if (limit) env.MAX_INSTRUMENTS = limit;
  return env;
}

// One cycle, printed to stdout, nothing delivered
async function scanOnceCommand() {
  const config = loadConfig(envWithArgs()).scanner;
  const store = new ScanStore();
  const run = await scanOnce({
    config,
    provider: createProvider(config),
    channels: [],
    tracker: new CooldownTracker(),
    store,
  });
  for (const s of store.listRecentSignals(run.signals).reverse()) {
    console.log(`${s.instrument}\t${s.direction}\t${fmtPct(s.priceChangePct)}\tZ=${s.volumeZScore.toFixed(1)}\t${s.severity}`);
  }
  console.log('[cli] scan finished', { instruments: run.instruments, signals: run.signals, skipped: run.skipped });
}

async function testNotifyCommand() {
  const config = loadConfig(envWithArgs());
  const channels = createChannels(config.notify, config.scanner.httpTimeoutMs);
  if (channels.length === 0) throw new Error('no notification channel configured');
  const sample: Signal = {
    instrument: 'DEMO/USDT:USDT',
    direction: 'PUMP',
    price: 1.2345,
    priceChangePct: 6.2,
    volumeZScore: 4.1,
    volumeUsdt: 182_000,
    severity: 'STRONG',
    confidence: 90,
    detectedAt: Date.now(),
  };
  const text = formatSignalMessage(sample, config.scanner.timeframe, config.scanner.detection.priceChangeLag, config.scanner.quoteCurrency);
  const report = await broadcast(channels, `🧪 test alert\n\n${text}`);
  console.log('[cli] test notification', report);
}

async function main() {
  const command = process.argv[2];
  switch (command) {
    case 'scan-once':
      return scanOnceCommand();
    case 'test-notify':
      return testNotifyCommand();
    default:
      console.log('usage: cli <scan-once [--preset CONSERVATIVE|PERMISSIVE] [--limit N] | test-notify>');
      process.exitCode = command ? 1 : 0;
  }
}

main().catch((err) => {
  console.error('[cli] failed', err instanceof Error ? err.message : err);
  process.exit(1);
});
