// backend/src/notifier.ts

export interface NotificationChannel {
  readonly name: string;
  /** Who should get alerts right now. May change between calls. */
  discoverRecipients(): Promise<string[]>;
  /** `text` uses the Telegram HTML subset (<b>, <i>, <code>). */
  send(recipient: string, text: string): Promise<void>;
}

export type DeliveryReport = { delivered: number; failed: number };

type ErrorLog = Pick<Console, 'error'>;

/** Best-effort fan-out. Never throws. */
export async function broadcast(channels: NotificationChannel[], text: string, log: ErrorLog = console): Promise<DeliveryReport> {
  const report: DeliveryReport = { delivered: 0, failed: 0 };
  for (const channel of channels) {
    let recipients: string[];
    try {
      recipients = await channel.discoverRecipients();
    } catch (e) {
      log.error(`[notify] ${channel.name} recipient discovery failed`, String(e));
      report.failed++;
      continue;
    }
    for (const r of recipients) {
      try {
        await channel.send(r, text);
        report.delivered++;
      } catch (e) {
        log.error(`[notify] ${channel.name} send failed`, { recipient: r, error: String(e) });
        report.failed++;
      }
    }
  }
  return report;
}
