export {
  InMemoryMessageBus,
  getMessageBus,
  setMessageBus,
  getSessionRegistry,
  setSessionRegistry,
  runScoped,
  withScopedSession,
  runSerialized,
  serialized,
  queueMessage,
  shutdownDataLayer,
} from './events';
export type { AppSession, MessageHandler } from './events';
export {
  EmailConfig,
  CONFIG_PLACEHOLDER,
  SmtpMailer,
  LoggingMailer,
  buildEmailMessage,
  parseSmtpHost,
  SMTP_CONNECT_TIMEOUT_MS,
  getMailer,
  createSmtpMailer,
  AdminNotifier,
  EmailAdminNotifier,
  LogAdminNotifier,
  adminNotifier,
} from './notifications';
export type { EmailSettingsSource, Mailer, MailerConfig, GetMailerOptions } from './notifications';
