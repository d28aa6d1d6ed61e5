// src/emailNotifier.ts
import type { EmailConfig } from './config.js';
import { createMailer, type Mailer } from './mailer.js';
import { htmlFor, subjectFor, textFor } from './messageTemplates.js';
import type { NotificationChannel } from './notifier.js';

export function createEmailChannel(cfg: EmailConfig, mailer: Mailer = createMailer(cfg)): NotificationChannel {
  console.log('[email] boot', { recipients: cfg.recipients.length, host: cfg.host, port: cfg.port });

  return {
    name: 'email',
    async discoverRecipients() {
      return cfg.recipients;
    },
    async send(to: string, text: string) {
      const subject = subjectFor(text);
      const info = await mailer.sendMail({ to, subject, html: htmlFor(text), text: textFor(text) });
      console.log('[email] sent', { to, subject, messageId: info.messageId });
    },
  };
}
