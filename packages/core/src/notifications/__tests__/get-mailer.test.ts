import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InvalidEmailConfigError } from '@fieldwork/shared';

const { mockCreateTransport } = vi.hoisted(() => ({
  mockCreateTransport: vi.fn(() => ({ sendMail: vi.fn() })),
}));

vi.mock('nodemailer', () => ({
  default: { createTransport: mockCreateTransport },
}));

import { getMailer } from '../get-mailer';
import { LoggingMailer, SmtpMailer } from '../mailers';
import { fullMailConfig } from './fixtures';

beforeEach(() => {
  mockCreateTransport.mockClear();
  vi.spyOn(process.stdout, 'write').mockReturnValue(true);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('getMailer', () => {
  it('logs instead of sending in debug mode without SMTP settings', async () => {
    const mailer = getMailer({ mode: 'debug' });

    expect(mailer).toBeInstanceOf(LoggingMailer);
    await mailer.send('Hello', 'platform@example.org', ['owner@example.org'], 'body');
    if (mailer instanceof LoggingMailer) {
      expect(mailer.sent).toHaveLength(1);
    }
    expect(mockCreateTransport).not.toHaveBeenCalled();
  });

  it('logs in debug mode even with complete SMTP settings', () => {
    expect(getMailer({ ...fullMailConfig, mode: 'debug' })).toBeInstanceOf(LoggingMailer);
  });

  it('returns the SMTP mailer for complete settings outside debug mode', () => {
    const mailer = getMailer(fullMailConfig);

    expect(mailer).toBeInstanceOf(SmtpMailer);
    if (mailer instanceof SmtpMailer) {
      expect(mailer.host).toBe('smtp.example.org');
      expect(mailer.username).toBe('mailer');
    }
  });

  it('falls back to logging when settings are incomplete', () => {
    const mailer = getMailer({ ...fullMailConfig, mode: 'sandbox', smtpPassword: undefined });

    expect(mailer).toBeInstanceOf(LoggingMailer);
  });

  it('throws on incomplete settings in strict mode', () => {
    expect(() =>
      getMailer({ ...fullMailConfig, smtpUsername: '???', smtpPassword: undefined }, { strict: true }),
    ).toThrow(new InvalidEmailConfigError('Missing or invalid config values: SMTP_PASSWORD, SMTP_USERNAME'));
  });
});
