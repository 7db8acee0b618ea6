import { describe, it, expect } from 'vitest';
import { EmailConfig } from '../email-config';
import { fullMailConfig } from './fixtures';

describe('EmailConfig.validate', () => {
  it('accepts a complete configuration', () => {
    expect(new EmailConfig(fullMailConfig).validate()).toBeNull();
  });

  it('lists every missing value by its environment name, sorted', () => {
    expect(new EmailConfig({}).validate()).toBe(
      'Missing or invalid config values: CONTACT_EMAIL_ON_ERROR, PLATFORM_EMAIL_ADDRESS, SMTP_HOST, SMTP_PASSWORD, SMTP_USERNAME',
    );
  });

  it('treats the ??? placeholder as missing', () => {
    const config = new EmailConfig({ ...fullMailConfig, smtpPassword: '???', smtpHost: '???' });

    expect(config.validate()).toBe('Missing or invalid config values: SMTP_HOST, SMTP_PASSWORD');
  });
});

describe('EmailConfig.asDict', () => {
  it('masks the password', () => {
    expect(new EmailConfig(fullMailConfig).asDict()).toEqual({
      smtpHost: 'smtp.example.org',
      smtpUsername: 'mailer',
      smtpPassword: 'tes......t',
      contactEmailOnError: 'owner@example.org',
      platformEmailAddress: 'platform@example.org',
    });
  });

  it('leaves an absent password absent', () => {
    expect(new EmailConfig({}).asDict().smtpPassword).toBeUndefined();
  });
});
