import express from 'express';
import cors from 'cors';
import type { ScannerConfig } from './config.js';
import type { CooldownTracker } from './cooldown.js';
import type { ScanStore } from './scanStore.js';

export type StatusDeps = {
  config: ScannerConfig;
  configHash: string;
  store: ScanStore;
  tracker: CooldownTracker;
  provider: string;
  channels: string[];
  startedAt: number;
};

function limitParam(v: unknown, fallback: number, max: number): number {
  const n = typeof v === 'string' ? parseInt(v, 10) : NaN;
  if (!Number.isFinite(n) || n < 1) return fallback;
  return Math.min(n, max);
}

// Read-only view of the running scanner
export function createStatusApp(deps: StatusDeps) {
  const app = express();
  app.use(cors());

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.get('/api/status', (_req, res) => {
    const [lastRun] = deps.store.getLatestScanRuns(1);
    res.json({
      preset: deps.config.preset,
      configHash: deps.configHash,
      provider: deps.provider,
      timeframe: deps.config.timeframe,
      channels: deps.channels,
      startedAt: deps.startedAt,
      signalCount: deps.store.signalCount,
      cooldownEntries: deps.tracker.size,
      lastRun: lastRun ?? null,
    });
  });

  app.get('/api/runs', (req, res) => {
    res.json({ runs: deps.store.getLatestScanRuns(limitParam(req.query.limit, 10, 50)) });
  });

  app.get('/api/signals', (req, res) => {
    res.json({ signals: deps.store.listRecentSignals(limitParam(req.query.limit, 50, 200)) });
  });

  app.get('/api/cooldowns', (_req, res) => {
    const cooldownMs = deps.config.cooldownMs;
    const entries = deps.tracker.entries().map(e => ({ ...e, cooledDownAt: e.lastSignalAt + cooldownMs }));
    res.json({ cooldownMs, entries });
  });

  return app;
}
