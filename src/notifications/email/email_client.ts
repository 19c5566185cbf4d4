import nodemailer from 'nodemailer';
import { config, isEmailConfigured } from '../../config/secrets';
import { moduleLogger } from '../../infra/logging';

export type EmailAddress = string | string[];

export interface EmailSendParams {
  to: EmailAddress;
  subject: string;
  text: string;
  html?: string;
  fromName?: string;
}

export interface EmailClient {
  configured: boolean;
  send(payload: EmailSendParams): Promise<void>;
}

const log = moduleLogger('email');

const warnOnce = createOnceLogger('Email not configured; notifications skipped');

function createOnceLogger(message: string) {
  let warned = false;
  return () => {
    if (!warned) {
      log.warn(message);
      warned = true;
    }
  };
}

export function normalizeRecipients(to: EmailAddress): string[] {
  const arr = Array.isArray(to) ? to : [to];
  return arr.map((item) => item.trim()).filter((item) => item.length > 0);
}

function fromHeader(payload: EmailSendParams): string {
  const address = config.email.fromAddress || config.email.smtp.user || 'no-reply@localhost';
  const name = payload.fromName || config.email.fromName;
  return name ? `${name} <${address}>` : address;
}

export class NoopEmailClient implements EmailClient {
  configured = false;
  async send(_payload: EmailSendParams): Promise<void> {
    warnOnce();
  }
}

export class SmtpEmailClient implements EmailClient {
  configured: boolean;
  private transporter: nodemailer.Transporter | null = null;

  constructor() {
    this.configured = isEmailConfigured();
  }

  private getTransporter(): nodemailer.Transporter {
    if (!this.transporter) {
      this.transporter = nodemailer.createTransport({
        host: config.email.smtp.host,
        port: config.email.smtp.port,
        secure: config.email.smtp.secure,
        auth: {
          user: config.email.smtp.user,
          pass: config.email.smtp.password
        }
      });
    }
    return this.transporter;
  }

  async send(payload: EmailSendParams): Promise<void> {
    if (!this.configured) {
      warnOnce();
      return;
    }
    const to = normalizeRecipients(payload.to);
    if (to.length === 0) return;
    await this.getTransporter().sendMail({
      from: fromHeader(payload),
      to,
      subject: payload.subject,
      text: payload.text,
      html: payload.html
    });
  }
}

function createClient(): EmailClient {
  if (!isEmailConfigured()) return new NoopEmailClient();
  return new SmtpEmailClient();
}

let cachedClient: EmailClient | null = null;

export function getEmailClient(): EmailClient {
  if (!cachedClient) cachedClient = createClient();
  return cachedClient;
}

export function resetEmailClientForTests() {
  cachedClient = null;
}
