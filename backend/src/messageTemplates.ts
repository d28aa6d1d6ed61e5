import type { Signal, SeverityTier, Timeframe } from './types.js';

const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
  '1m': 1,
  '3m': 3,
  '5m': 5,
  '15m': 15,
  '30m': 30,
  '1h': 60,
};

const TIER_LABEL: Record<SeverityTier, string> = {
  STRONG: '💥 STRONG',
  MEDIUM: '🚨 MEDIUM',
  WEAK: '📈 WEAK',
};

export function escapeHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function tickerOf(instrument: string): string {
  return instrument.split('/')[0] || instrument;
}

export function fmtPct(v: number): string {
  return `${v >= 0 ? '+' : ''}${v.toFixed(1)}%`;
}

export function fmtVolume(v: number): string {
  const a = Math.abs(v);
  if (a >= 1e9) return `${(v / 1e9).toFixed(1)}B`;
  if (a >= 1e6) return `${(v / 1e6).toFixed(1)}M`;
  if (a >= 1e3) return `${(v / 1e3).toFixed(1)}K`;
  return v.toFixed(0);
}

function fmtPrice(v: number) {
  if (!Number.isFinite(v)) return '-';
  return v >= 100 ? v.toFixed(2) : v >= 1 ? v.toFixed(4) : v.toFixed(6);
}

function hhmmss(ms: number): string {
  return new Date(ms).toISOString().slice(11, 19);
}

/** Span covered by the price change, e.g. "10m" for lag 2 on 5m candles. */
export function moveWindow(timeframe: Timeframe, lag: number): string {
  const minutes = TIMEFRAME_MINUTES[timeframe] * lag;
  return minutes % 60 === 0 ? `${minutes / 60}h` : `${minutes}m`;
}

export function formatSignalMessage(signal: Signal, timeframe: Timeframe, lag: number, quote = 'USDT'): string {
  const pump = signal.direction === 'PUMP';
  const emoji = pump ? '🚀' : '💥';
  const color = pump ? '🟢' : '🔴';
  const window = moveWindow(timeframe, lag);

  const lines = [
    `${emoji} <b>${signal.direction} SIGNAL (${timeframe})</b> ${emoji}`,
    '',
    `${color} <b>${escapeHtml(tickerOf(signal.instrument))}</b> | ${pump ? 'UP' : 'DOWN'} @ ${fmtPrice(signal.price)}`,
    `📊 Change: <b>${fmtPct(signal.priceChangePct)}</b> over ${window}`,
    `📈 Volume: <b>Z=${signal.volumeZScore.toFixed(1)}</b> · ${fmtVolume(signal.volumeUsdt)} ${escapeHtml(quote)}`,
  ];
  if (signal.volumeGrowthRatio !== undefined) lines.push(`📦 Volume growth: <b>${signal.volumeGrowthRatio.toFixed(2)}x</b>`);
  if (signal.rsi !== undefined) lines.push(`📉 RSI: <b>${signal.rsi.toFixed(1)}</b>`);
  lines.push(
    `💪 Strength: <b>${TIER_LABEL[signal.severity]}</b> (${signal.confidence})`,
    '',
    `⏰ Time: ${hhmmss(signal.detectedAt)} UTC`
  );
  return lines.join('\n');
}

export function formatStartupMessage(opts: { provider: string; timeframe: Timeframe; instruments: number; preset: string }): string {
  return `🤖 Pump/dump scanner started | ${opts.provider} ${opts.timeframe} | ${opts.preset} | instruments: ${opts.instruments}`;
}

// ---- e-mail rendering of the same message ---------------------------

export function stripTags(html: string): string {
  return html
    .replace(/<[^>]*>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}

export function subjectFor(text: string): string {
  const first = stripTags(text.split('\n')[0] ?? '').trim();
  return first || 'Scanner alert';
}

export function htmlFor(text: string): string {
  const body = text.split('\n').join('<br>');
  return `
  <div style="font-family:Inter,Segoe UI,Arial,sans-serif;max-width:560px;margin:auto;border:1px solid #eee;border-radius:12px;overflow:hidden">
    <div style="background:#111;color:#fff;padding:14px 16px;font-size:16px"><strong>Pump/Dump Scanner</strong></div>
    <div style="padding:16px;font-size:14px;line-height:1.5;color:#111">${body}</div>
    <div style="background:#fafafa;color:#888;padding:10px 16px;font-size:12px">Informational only, not financial advice.</div>
  </div>`;
}

export function textFor(text: string): string {
  return stripTags(text);
}
