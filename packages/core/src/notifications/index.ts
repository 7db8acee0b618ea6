export { EmailConfig, CONFIG_PLACEHOLDER } from './email-config';
export type { EmailSettingsSource } from './email-config';
export {
  SmtpMailer,
  LoggingMailer,
  buildEmailMessage,
  parseSmtpHost,
  SMTP_CONNECT_TIMEOUT_MS,
} from './mailers';
export type { Mailer } from './mailers';
export { getMailer, createSmtpMailer } from './get-mailer';
export type { MailerConfig, GetMailerOptions } from './get-mailer';
export { AdminNotifier, EmailAdminNotifier, LogAdminNotifier, adminNotifier } from './admin-notifier';
