import type { PlatformConfig } from '@fieldwork/shared';

export const CONFIG_PLACEHOLDER = '???';

export type EmailSettingsSource = Pick<
  PlatformConfig,
  'smtpHost' | 'smtpUsername' | 'smtpPassword' | 'contactEmailOnError' | 'platformEmailAddress'
>;

const MAIL_CONFIG_KEYS = [
  'smtpHost',
  'smtpUsername',
  'smtpPassword',
  'contactEmailOnError',
  'platformEmailAddress',
] as const;

type MailConfigKey = (typeof MAIL_CONFIG_KEYS)[number];

// Names operators see in problem reports: the environment variable spelling.
const ENV_NAMES: Record<MailConfigKey, string> = {
  smtpHost: 'SMTP_HOST',
  smtpUsername: 'SMTP_USERNAME',
  smtpPassword: 'SMTP_PASSWORD',
  contactEmailOnError: 'CONTACT_EMAIL_ON_ERROR',
  platformEmailAddress: 'PLATFORM_EMAIL_ADDRESS',
};

/** Extracts and validates email-related values from the platform config. */
export class EmailConfig {
  readonly smtpHost?: string;
  readonly smtpUsername?: string;
  readonly smtpPassword?: string;
  readonly contactEmailOnError?: string;
  readonly platformEmailAddress?: string;

  constructor(config: EmailSettingsSource) {
    this.smtpHost = config.smtpHost;
    this.smtpUsername = config.smtpUsername;
    this.smtpPassword = config.smtpPassword;
    this.contactEmailOnError = config.contactEmailOnError;
    this.platformEmailAddress = config.platformEmailAddress;
  }

  /** Safe to log: the password keeps only its first three and last characters. */
  asDict(): Record<MailConfigKey, string | undefined> {
    const password = this.smtpPassword;
    return {
      smtpHost: this.smtpHost,
      smtpUsername: this.smtpUsername,
      smtpPassword:
        password && password !== CONFIG_PLACEHOLDER
          ? `${password.slice(0, 3)}......${password.slice(-1)}`
          : password,
      contactEmailOnError: this.contactEmailOnError,
      platformEmailAddress: this.platformEmailAddress,
    };
  }

  /** Could this config be used to send a real email? Returns the problems, or null. */
  validate(): string | null {
    const missing = MAIL_CONFIG_KEYS.filter((key) => {
      const value = this[key];
      return !value || value === CONFIG_PLACEHOLDER;
    }).map((key) => ENV_NAMES[key]);

    if (missing.length === 0) return null;
    return `Missing or invalid config values: ${missing.sort().join(', ')}`;
  }
}
