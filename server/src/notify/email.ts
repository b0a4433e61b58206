import nodemailer from 'nodemailer';
import type { Logger } from 'pino';

export type MailMessage = {
  from: string;
  to: string;
  subject: string;
  text: string;
};

/** What the notifier needs from a nodemailer transport. */
export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type EmailNotifierOptions = {
  smtpHost: string;
  smtpPort: number;
  user: string;
  password: string;
  recipients: string[];
  logger: Logger;
  transport?: MailTransport;
};

export interface Notifier {
  notifyReady(accessUrl: string, localUrl: string): Promise<{ ok: boolean; error?: string }>;
}

export function buildReadyMessage(accessUrl: string, localUrl: string): { subject: string; text: string } {
  return {
    subject: 'Rover control panel ready',
    text:
      `The rover control panel is accessible at:\n${accessUrl}\n\n` +
      `If that is a tunnel URL and it stops working, try the local address (same network only):\n${localUrl}\n`
  };
}

export class EmailNotifier implements Notifier {
  private readonly options: EmailNotifierOptions;
  private transport: MailTransport | null;

  constructor(options: EmailNotifierOptions) {
    this.options = options;
    this.transport = options.transport ?? null;
  }

  isConfigured(): boolean {
    const { user, password, recipients } = this.options;
    return Boolean(user && password && recipients.length > 0);
  }

  async notifyReady(accessUrl: string, localUrl: string): Promise<{ ok: boolean; error?: string }> {
    const { logger, user, recipients } = this.options;
    if (!this.isConfigured()) {
      logger.warn('email credentials or recipients not set, skipping notification');
      return { ok: false, error: 'not_configured' };
    }

    const { subject, text } = buildReadyMessage(accessUrl, localUrl);
    try {
      await this.getTransport().sendMail({ from: user, to: recipients.join(', '), subject, text });
      logger.info({ recipients }, 'notification email sent');
      return { ok: true };
    } catch (error) {
      logger.error({ err: error }, 'failed to send notification email');
      return { ok: false, error: error instanceof Error ? error.message : 'unknown_error' };
    }
  }

  private getTransport(): MailTransport {
    if (!this.transport) {
      const { smtpHost, smtpPort, user, password } = this.options;
      this.transport = nodemailer.createTransport({
        host: smtpHost,
        port: smtpPort,
        secure: smtpPort === 465,
        auth: { user, pass: password }
      });
    }
    return this.transport;
  }
}
