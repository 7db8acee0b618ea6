import { logger } from '@fieldwork/shared';
import { EmailConfig } from './email-config';
import { LoggingMailer } from './mailers';
import type { Mailer } from './mailers';
import { createSmtpMailer } from './get-mailer';
import type { MailerConfig } from './get-mailer';

/**
 * Sends a quick message to the experiment owner, with from/to addresses taken
 * from configuration.
 */
export abstract class AdminNotifier {
  readonly fromAddress: string;
  readonly toAddress: string;

  constructor(
    settings: EmailConfig,
    protected readonly mailer: Mailer,
  ) {
    this.fromAddress = settings.platformEmailAddress ?? '';
    this.toAddress = settings.contactEmailOnError ?? '';
  }

  abstract send(subject: string, body: string): Promise<void>;
}

/** Emails the experiment owner. */
export class EmailAdminNotifier extends AdminNotifier {
  async send(subject: string, body: string): Promise<void> {
    await this.mailer.send(subject, this.fromAddress, [this.toAddress], body);
  }
}

/** Debug mode: logs the message and keeps a record of it. */
export class LogAdminNotifier extends AdminNotifier {
  private readonly _sent: string[] = [];

  get sent(): string[] {
    return [...this._sent];
  }

  async send(subject: string, body: string): Promise<void> {
    this._sent.push(`${subject}: ${body}`);
    await this.mailer.send(subject, this.fromAddress, [this.toAddress], body);
  }
}

export function adminNotifier(config: MailerConfig): AdminNotifier {
  const settings = new EmailConfig(config);
  if (config.mode === 'debug') {
    return new LogAdminNotifier(settings, new LoggingMailer());
  }
  const problems = settings.validate();
  if (problems) {
    logger.info(`${problems} Will log errors instead of emailing them.`);
    return new LogAdminNotifier(settings, new LoggingMailer());
  }
  return new EmailAdminNotifier(settings, createSmtpMailer(settings));
}
