import nodemailer from 'nodemailer';
import type { SendMailOptions, Transporter } from 'nodemailer';
import { MessengerError, logger } from '@fieldwork/shared';

export interface Mailer {
  send(subject: string, sender: string, recipients: string[], body: string): Promise<void>;
}

export const SMTP_CONNECT_TIMEOUT_MS = 8_000;
const DEFAULT_SMTP_PORT = 587;

// nodemailer tags protocol-level failures with these codes
const SMTP_ERROR_CODES = new Set([
  'EAUTH',
  'ECONNECTION',
  'EENVELOPE',
  'EMESSAGE',
  'EPROTOCOL',
  'ESOCKET',
  'ETIMEDOUT',
  'ETLS',
]);

export function buildEmailMessage(
  subject: string,
  sender: string,
  recipients: string[],
  body: string,
): SendMailOptions {
  return { subject, from: sender, to: recipients, text: body };
}

/** Splits `host[:port]`; the port defaults to the submission port. */
export function parseSmtpHost(host: string): { host: string; port: number } {
  const match = /^(.+):(\d+)$/.exec(host);
  if (!match?.[1] || !match[2]) {
    return { host, port: DEFAULT_SMTP_PORT };
  }
  return { host: match[1], port: Number(match[2]) };
}

function isSmtpError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if ('responseCode' in err && typeof err.responseCode === 'number') return true;
  return 'code' in err && typeof err.code === 'string' && SMTP_ERROR_CODES.has(err.code);
}

/**
 * Relays messages through an SMTP server with STARTTLS and login. Transport
 * failures surface as a single MessengerError; nothing is retried.
 */
export class SmtpMailer implements Mailer {
  private transporter: Transporter | null = null;
  private readonly _sent: SendMailOptions[] = [];

  constructor(
    readonly host: string,
    readonly username: string,
    private readonly password: string,
  ) {}

  get sent(): SendMailOptions[] {
    return [...this._sent];
  }

  async send(subject: string, sender: string, recipients: string[], body: string): Promise<void> {
    const message = buildEmailMessage(subject, sender, recipients, body);
    try {
      await this.getTransporter().sendMail(message);
    } catch (err) {
      logger.error('Failed to relay notification email', {
        subject,
        error: { message: err instanceof Error ? err.message : String(err) },
      });
      if (isSmtpError(err)) {
        throw new MessengerError('SMTP error sending notification email.', err);
      }
      throw new MessengerError('Unknown error sending notification email.', err);
    }
    this._sent.push(message);
  }

  private getTransporter(): Transporter {
    if (!this.transporter) {
      const { host, port } = parseSmtpHost(this.host);
      this.transporter = nodemailer.createTransport({
        host,
        port,
        secure: port === 465,
        requireTLS: port !== 465,
        connectionTimeout: SMTP_CONNECT_TIMEOUT_MS,
        auth: { user: this.username, pass: this.password },
      });
    }
    return this.transporter;
  }
}

/** Writes messages to the log instead of sending them. */
export class LoggingMailer implements Mailer {
  private readonly _sent: string[] = [];

  get sent(): string[] {
    return [...this._sent];
  }

  async send(subject: string, sender: string, recipients: string[], body: string): Promise<void> {
    const message = [
      `${this.constructor.name}:`,
      `Subject: ${subject}`,
      `Sender: ${sender}`,
      `Recipients: ${recipients.join(', ')}`,
      'Body:',
      body,
    ].join('\n');

    logger.info(message);
    this._sent.push(message);
  }
}
