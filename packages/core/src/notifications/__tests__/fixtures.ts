import type { MailerConfig } from '../get-mailer';

export const fullMailConfig: MailerConfig = {
  mode: 'live',
  smtpHost: 'smtp.example.org',
  smtpUsername: 'mailer',
  smtpPassword: 'test-secret',
  contactEmailOnError: 'owner@example.org',
  platformEmailAddress: 'platform@example.org',
};
