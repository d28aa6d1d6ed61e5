import { describe, it, expect, vi } from 'vitest'
import { loadScannerConfig, type ScannerConfig } from '../backend/src/config.js'
import { CooldownTracker } from '../backend/src/cooldown.js'
import { RateLimitError, TransientError, type MarketDataProvider } from '../backend/src/marketData.js'
import type { NotificationChannel } from '../backend/src/notifier.js'
import { processInstrument, scanOnce, startLoop, type ScanContext } from '../backend/src/scanner.js'
import { ScanStore } from '../backend/src/scanStore.js'
import type { Candle } from '../backend/src/types.js'
import { flatThen, makeWindow, spikeVolumes } from './helpers/candles.js'

const AAA = 'AAA/USDT:USDT'
const BBB = 'BBB/USDT:USDT'
const CCC = 'CCC/USDT:USDT'
const T0 = 1_700_000_000_000

const pump = makeWindow(flatThen(25, 106), spikeVolumes(25, 50), 100_000)
const quiet = makeWindow(flatThen(25, 100), spikeVolumes(25, 10))

type WindowSource = Candle[] | (() => Candle[])

function fakeProvider(windows: Record<string, WindowSource>, roster?: Error) {
  const calls: string[] = []
  const provider: MarketDataProvider = {
    name: 'fake',
    async listInstruments() {
      if (roster) throw roster
      return Object.keys(windows)
    },
    async fetchCandles(instrument) {
      calls.push(instrument)
      const w = windows[instrument]
      if (!w) throw new TransientError(`unknown ${instrument}`)
      return typeof w === 'function' ? w() : w
    },
  }
  return { provider, calls }
}

function fakeChannel(fail = false) {
  const sent: Array<{ to: string; text: string }> = []
  const channel: NotificationChannel = {
    name: 'fake',
    async discoverRecipients() {
      return ['chat-1', 'chat-2']
    },
    async send(to, text) {
      if (fail) throw new Error('boom')
      sent.push({ to, text })
    },
  }
  return { channel, sent }
}

function makeCtx(provider: MarketDataProvider, channels: NotificationChannel[], overrides: Partial<ScannerConfig> = {}) {
  let clock = T0
  const sleeps: number[] = []
  const log = { log: vi.fn(), warn: vi.fn(), error: vi.fn() }
  const ctx: ScanContext = {
    config: { ...loadScannerConfig({}), ...overrides },
    provider,
    channels,
    tracker: new CooldownTracker(),
    store: new ScanStore(),
    log,
    now: () => clock,
    sleep: async (ms: number) => {
      sleeps.push(ms)
    },
  }
  return { ctx, log, sleeps, advance: (ms: number) => { clock += ms } }
}

describe('scanOnce', () => {
  it('emits, notifies and isolates per-instrument failures', async () => {
    const { provider } = fakeProvider({
      [AAA]: pump,
      [BBB]: quiet,
      [CCC]: () => { throw new TransientError('timeout') },
    })
    const { channel, sent } = fakeChannel()
    const { ctx } = makeCtx(provider, [channel])

    const run = await scanOnce(ctx)

    expect(run.status).toBe('FINISHED')
    expect(run.instruments).toBe(3)
    expect(run.scanned).toBe(3)
    expect(run.signals).toBe(1)
    expect(run.skipped).toBe(1)
    expect(run.errors).toEqual(['CCC/USDT:USDT: timeout'])

    expect(sent.map(s => s.to)).toEqual(['chat-1', 'chat-2'])
    expect(sent[0].text.split('\n')[2]).toBe('🟢 <b>AAA</b> | UP @ 106.00')

    expect(ctx.tracker.lastSignalAt(AAA)).toBe(T0)
    expect(ctx.store.listRecentSignals(5).map(s => s.instrument)).toEqual([AAA])
  })

  it('skips instruments still in cooldown on the next cycle', async () => {
    const { provider, calls } = fakeProvider({ [AAA]: pump, [BBB]: quiet })
    const { channel, sent } = fakeChannel()
    const { ctx, advance } = makeCtx(provider, [channel])

    await scanOnce(ctx)
    advance(60_000)
    const second = await scanOnce(ctx)

    expect(second.cooledDown).toBe(1)
    expect(second.signals).toBe(0)
    expect(calls).toEqual([AAA, BBB, BBB])
    expect(sent).toHaveLength(2)

    advance(15 * 60_000)
    const third = await scanOnce(ctx)
    expect(third.signals).toBe(1)
  })

  it('backs off and retries after a rate limit', async () => {
    let hits = 0
    const { provider } = fakeProvider({
      [AAA]: () => {
        if (hits++ === 0) throw new RateLimitError('HTTP 429', 500)
        return pump
      },
    })
    const { ctx, sleeps } = makeCtx(provider, [])

    const run = await scanOnce(ctx)

    expect(sleeps).toEqual([500])
    expect(run.rateLimited).toBe(1)
    expect(run.signals).toBe(1)
  })

  it('gives up on an instrument that stays rate limited', async () => {
    const { provider } = fakeProvider({
      [AAA]: () => { throw new RateLimitError('HTTP 429') },
      [BBB]: quiet,
    })
    const { ctx, sleeps } = makeCtx(provider, [])

    const run = await scanOnce(ctx)

    expect(sleeps).toEqual([2000])
    expect(run.rateLimited).toBe(2)
    expect(run.skipped).toBe(1)
    expect(run.errors).toEqual(['AAA/USDT:USDT: still rate limited (HTTP 429)'])
    expect(run.scanned).toBe(2)
  })

  it('does not pause when no retries are allowed', async () => {
    const { provider, calls } = fakeProvider({
      [AAA]: () => { throw new RateLimitError('HTTP 429') },
    })
    const { ctx, sleeps } = makeCtx(provider, [], { rateLimitRetries: 0 })

    const run = await scanOnce(ctx)

    expect(sleeps).toEqual([])
    expect(calls).toEqual([AAA])
    expect(run.rateLimited).toBe(1)
    expect(run.skipped).toBe(1)
  })

  it('keeps the cooldown when delivery fails', async () => {
    const { provider } = fakeProvider({ [AAA]: pump })
    const { channel } = fakeChannel(true)
    const { ctx, log } = makeCtx(provider, [channel])

    const run = await scanOnce(ctx)

    expect(run.signals).toBe(1)
    expect(ctx.tracker.lastSignalAt(AAA)).toBe(T0)
    expect(log.error).toHaveBeenCalledTimes(2)
    expect(log.warn).toHaveBeenCalledWith('[notify] partial delivery', { instrument: AAA, delivered: 0, failed: 2 })
  })

  it('records a failed run when the roster cannot be loaded', async () => {
    const { provider } = fakeProvider({}, new Error('roster down'))
    const { ctx } = makeCtx(provider, [])

    await expect(scanOnce(ctx)).rejects.toThrow('roster down')
    const [last] = ctx.store.getLatestScanRuns(1)
    expect(last.status).toBe('FAILED')
    expect(last.errorMessage).toBe('Error: roster down')
  })

  it('sweeps stale cooldown entries at the end of a cycle', async () => {
    const { provider } = fakeProvider({ [BBB]: quiet })
    const { ctx } = makeCtx(provider, [])
    ctx.tracker.record('OLD/USDT:USDT', T0 - 2 * ctx.config.cooldownMs)
    ctx.tracker.record('RECENT/USDT:USDT', T0 - 1_000)

    await scanOnce(ctx)

    expect(ctx.tracker.lastSignalAt('OLD/USDT:USDT')).toBeUndefined()
    expect(ctx.tracker.lastSignalAt('RECENT/USDT:USDT')).toBe(T0 - 1_000)
  })

  it('honours maxInstruments and the pacing delay', async () => {
    const { provider, calls } = fakeProvider({ [AAA]: quiet, [BBB]: quiet, [CCC]: quiet })
    const { ctx, sleeps } = makeCtx(provider, [], { maxInstruments: 2, symbolDelayMs: 250 })

    const run = await scanOnce(ctx)

    expect(run.instruments).toBe(2)
    expect(calls).toEqual([AAA, BBB])
    expect(sleeps).toEqual([250, 250])
  })
})

describe('processInstrument', () => {
  it('maps provider failures to typed outcomes', async () => {
    const { provider } = fakeProvider({
      [AAA]: () => { throw new RateLimitError('slow down', 1234) },
      [BBB]: () => { throw new TransientError('HTTP 502') },
      [CCC]: () => { throw new Error('kaboom') },
    })
    const { ctx } = makeCtx(provider, [])

    expect(await processInstrument(ctx, AAA)).toEqual({ kind: 'retry', retryAfterMs: 1234, reason: 'slow down' })
    expect(await processInstrument(ctx, BBB)).toEqual({ kind: 'skip', reason: 'HTTP 502' })
    expect(await processInstrument(ctx, CCC)).toEqual({ kind: 'skip', reason: 'unexpected: Error: kaboom' })
  })

  it('reports quiet windows', async () => {
    const { provider } = fakeProvider({ [BBB]: quiet })
    const { ctx } = makeCtx(provider, [])
    expect(await processInstrument(ctx, BBB)).toEqual({ kind: 'quiet' })
  })
})

describe('startLoop', () => {
  it('runs a cycle and stops cleanly', async () => {
    const { provider } = fakeProvider({ [AAA]: pump })
    const { ctx } = makeCtx(provider, [])
    const runs: number[] = []

    const handle = startLoop(ctx, run => {
      runs.push(run.signals)
      handle.stop()
    })

    await vi.waitFor(() => expect(runs).toEqual([1]))
  })

  it('logs a failed cycle instead of crashing', async () => {
    const { provider } = fakeProvider({}, new Error('roster down'))
    const { ctx, log } = makeCtx(provider, [])

    const handle = startLoop(ctx)
    await vi.waitFor(() => expect(log.error).toHaveBeenCalledWith('[scan] 💥 cycle error', 'Error: roster down'))
    handle.stop()
  })
})
