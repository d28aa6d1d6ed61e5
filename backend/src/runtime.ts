import { createBinanceProvider } from './binance.js';
import { createBybitProvider } from './bybit.js';
import type { NotifyConfig, ScannerConfig } from './config.js';
import { createEmailChannel } from './emailNotifier.js';
import type { MarketDataProvider } from './marketData.js';
import type { NotificationChannel } from './notifier.js';
import { createTelegramChannel } from './telegram.js';

export function createProvider(cfg: ScannerConfig): MarketDataProvider {
  const opts = { timeoutMs: cfg.httpTimeoutMs };
  return cfg.provider === 'binance' ? createBinanceProvider(opts) : createBybitProvider(opts);
}

export function createChannels(notify: NotifyConfig, timeoutMs: number): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (notify.telegramBotToken) {
    channels.push(createTelegramChannel({ token: notify.telegramBotToken, chatIds: notify.telegramChatIds, timeoutMs }));
  }
  if (notify.email.enabled) {
    if (notify.email.recipients.length === 0) console.warn('[email] EMAIL_ENABLED=true but ALERT_EMAILS is empty');
    else channels.push(createEmailChannel(notify.email));
  }
  return channels;
}

export type NotifySetup =
  | { ok: true; degraded: boolean }
  | { ok: false; message: string };

/** Missing channels stop startup unless scan-only mode was asked for. */
export function checkNotifySetup(notify: NotifyConfig, channels: NotificationChannel[]): NotifySetup {
  if (channels.length > 0) return { ok: true, degraded: false };
  if (!notify.required) return { ok: true, degraded: true };
  return {
    ok: false,
    message: 'no notification channel configured: set TELEGRAM_BOT_TOKEN (or EMAIL_ENABLED with SMTP_HOST and ALERT_EMAILS), or NOTIFY_REQUIRED=false to scan without alerts',
  };
}
