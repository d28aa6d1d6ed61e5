import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import type { Server } from 'node:http'
import { loadScannerConfig } from '../backend/src/config.js'
import { CooldownTracker } from '../backend/src/cooldown.js'
import { ScanStore } from '../backend/src/scanStore.js'
import { createStatusApp } from '../backend/src/statusApp.js'
import type { Signal } from '../backend/src/types.js'

const T0 = 1_700_000_000_000

function signal(instrument: string, detectedAt: number): Signal {
  return {
    instrument,
    direction: 'PUMP',
    price: 1,
    priceChangePct: 6,
    volumeZScore: 4,
    volumeUsdt: 100_000,
    severity: 'STRONG',
    confidence: 90,
    detectedAt,
  }
}

describe('status api', () => {
  const config = loadScannerConfig({})
  const store = new ScanStore()
  const tracker = new CooldownTracker()
  let server: Server
  let base = ''

  beforeAll(async () => {
    for (let i = 0; i < 3; i++) {
      store.recordScanRun({
        preset: 'CONSERVATIVE',
        status: 'FINISHED',
        startedAt: T0 + i * 30_000,
        finishedAt: T0 + i * 30_000 + 500,
        durationMs: 500,
        instruments: 10,
        scanned: 10,
        cooledDown: 0,
        signals: i,
        skipped: 0,
        rateLimited: 0,
        errors: [],
        errorMessage: null,
      })
    }
    store.recordSignal(signal('AAA/USDT:USDT', T0))
    store.recordSignal(signal('BBB/USDT:USDT', T0 + 1))
    tracker.record('BBB/USDT:USDT', T0 + 1)

    const app = createStatusApp({
      config,
      configHash: 'abc123',
      store,
      tracker,
      provider: 'bybit',
      channels: ['telegram'],
      startedAt: T0,
    })
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s))
    })
    const address = server.address()
    if (address === null || typeof address === 'string') throw new Error('status server has no port')
    base = `http://127.0.0.1:${address.port}`
  })

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()))
  })

  it('answers health checks', async () => {
    const res = await fetch(`${base}/api/health`)
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
  })

  it('summarises the running scanner', async () => {
    const body = await (await fetch(`${base}/api/status`)).json()
    expect(body).toMatchObject({
      preset: 'CONSERVATIVE',
      configHash: 'abc123',
      provider: 'bybit',
      timeframe: '5m',
      channels: ['telegram'],
      startedAt: T0,
      signalCount: 2,
      cooldownEntries: 1,
      lastRun: { runId: 3, status: 'FINISHED', signals: 2 },
    })
  })

  it('lists runs and signals newest first', async () => {
    const runs = await (await fetch(`${base}/api/runs?limit=2`)).json()
    expect(runs).toMatchObject({ runs: [{ runId: 3 }, { runId: 2 }] })

    const signals = await (await fetch(`${base}/api/signals?limit=junk`)).json()
    expect(signals).toMatchObject({ signals: [{ instrument: 'BBB/USDT:USDT' }, { instrument: 'AAA/USDT:USDT' }] })
  })

  it('shows when each instrument cools down', async () => {
    const body = await (await fetch(`${base}/api/cooldowns`)).json()
    expect(body).toEqual({
      cooldownMs: 900_000,
      entries: [{ instrument: 'BBB/USDT:USDT', lastSignalAt: T0 + 1, cooledDownAt: T0 + 1 + 900_000 }],
    })
  })
})
