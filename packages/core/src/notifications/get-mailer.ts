import { InvalidEmailConfigError, logger } from '@fieldwork/shared';
import type { PlatformConfig } from '@fieldwork/shared';
import { EmailConfig } from './email-config';
import type { EmailSettingsSource } from './email-config';
import { LoggingMailer, SmtpMailer } from './mailers';
import type { Mailer } from './mailers';

export type MailerConfig = EmailSettingsSource & Pick<PlatformConfig, 'mode'>;

export interface GetMailerOptions {
  /** Throw instead of falling back to the logging mailer when settings are invalid. */
  strict?: boolean;
}

/**
 * Returns the mailer this configuration supports.
 *
 * Debug mode, or email settings that are missing or still placeholders, get
 * a LoggingMailer that writes messages to the log instead of sending them.
 */
export function getMailer(config: MailerConfig, options: GetMailerOptions = {}): Mailer {
  if (config.mode === 'debug') {
    return new LoggingMailer();
  }

  const settings = new EmailConfig(config);
  const problems = settings.validate();
  if (problems) {
    if (options.strict) {
      throw new InvalidEmailConfigError(problems);
    }
    logger.info(`${problems} Will log errors instead of emailing them.`);
    return new LoggingMailer();
  }

  return createSmtpMailer(settings);
}

export function createSmtpMailer(settings: EmailConfig): SmtpMailer {
  const { smtpHost, smtpUsername, smtpPassword } = settings;
  if (!smtpHost || !smtpUsername || !smtpPassword) {
    throw new InvalidEmailConfigError(settings.validate() ?? 'SMTP settings are incomplete');
  }
  return new SmtpMailer(smtpHost, smtpUsername, smtpPassword);
}
