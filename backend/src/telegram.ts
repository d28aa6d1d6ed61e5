import fetch from 'node-fetch';
import { isRecord } from './marketData.js';
import type { NotificationChannel } from './notifier.js';

const API_BASE = process.env.TELEGRAM_API_BASE || 'https://api.telegram.org';

export type TelegramOptions = {
  token: string;
  /** Always included, on top of chats found through getUpdates. */
  chatIds?: string[];
  timeoutMs?: number;
  baseUrl?: string;
};

async function call(url: string, timeoutMs: number, body?: unknown): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, body === undefined
      ? { signal: controller.signal }
      : {
          method: 'POST',
          headers: { 'content-type': 'application/json' },
          body: JSON.stringify(body),
          signal: controller.signal,
        });
    const json: unknown = await res.json();
    if (!isRecord(json) || json.ok !== true) {
      const description = isRecord(json) ? String(json.description ?? '') : '';
      throw new Error(`telegram HTTP ${res.status} ${description}`.trim());
    }
    return json.result;
  } finally {
    clearTimeout(timeoutId);
  }
}

function chatIdOf(update: unknown): string | null {
  if (!isRecord(update)) return null;
  const msg = isRecord(update.message) ? update.message : isRecord(update.channel_post) ? update.channel_post : null;
  if (!msg || !isRecord(msg.chat)) return null;
  const id = msg.chat.id;
  return typeof id === 'number' || typeof id === 'string' ? String(id) : null;
}

export function createTelegramChannel(opts: TelegramOptions): NotificationChannel {
  const base = `${opts.baseUrl ?? API_BASE}/bot${opts.token}`;
  const timeoutMs = opts.timeoutMs ?? 10_000;
  // getUpdates only returns the last 24h; remember every chat we have seen
  const known = new Set<string>(opts.chatIds ?? []);

  async function discoverRecipients(): Promise<string[]> {
    let result: unknown;
    try {
      result = await call(`${base}/getUpdates`, timeoutMs);
    } catch (e) {
      if (known.size === 0) throw e;
      // 409 while a webhook or another poller holds the bot; keep alerting known chats
      console.warn('[telegram] getUpdates failed', { known: known.size, error: String(e) });
      return Array.from(known);
    }
    if (Array.isArray(result)) {
      for (const update of result) {
        const id = chatIdOf(update);
        if (id) known.add(id);
      }
    }
    return Array.from(known);
  }

  async function send(chatId: string, text: string): Promise<void> {
    await call(`${base}/sendMessage`, timeoutMs, {
      chat_id: chatId,
      text,
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  }

  return { name: 'telegram', discoverRecipients, send };
}
