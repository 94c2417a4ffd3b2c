/**
 * Tender Watch — Email Delivery
 *
 * Sends tender alerts via email using configurable providers.
 * Supports Resend, SendGrid, SMTP, or printing to the console.
 */

import { createTransport, type SendMailOptions } from 'nodemailer';
import { z } from 'zod';
import type { TenderMessage } from '../types';
import { ChannelSendFailed, errorMessage } from '../lib/errors';
import { logger, printLines } from '../lib/logger';
import { httpFailure, providerFetch, type NotificationChannel } from './channel';

// ============================================================
// TYPES
// ============================================================

export type EmailProvider = 'resend' | 'sendgrid' | 'smtp' | 'console';

export interface EmailConfig {
  provider: EmailProvider;
  from: string;
  replyTo?: string;
  // Provider-specific config
  resendApiKey?: string;
  sendgridApiKey?: string;
  smtpHost?: string;
  smtpPort?: number;
  smtpUser?: string;
  smtpPass?: string;
}

/**
 * The part of a nodemailer transport the channel uses.
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
}

export interface EmailMessage {
  to: string;
  subject: string;
  text: string;
  html: string;
}

const EMAIL_ADDRESS = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const ResendResponseSchema = z.object({ id: z.string() });

export function isEmailAddress(value: string): boolean {
  return EMAIL_ADDRESS.test(value.trim());
}

// ============================================================
// EMAIL PROVIDERS
// ============================================================

async function sendViaResend(
  channel: string,
  config: EmailConfig,
  message: EmailMessage,
  signal: AbortSignal
): Promise<string> {
  const res = await providerFetch(channel, 'https://api.resend.com/emails', {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${config.resendApiKey ?? ''}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      from: config.from,
      to: [message.to],
      subject: message.subject,
      text: message.text,
      html: message.html,
      reply_to: config.replyTo,
    }),
    signal,
  });

  if (!res.ok) {
    throw httpFailure(channel, res.status, `Resend API error: ${await res.text()}`);
  }

  const data = ResendResponseSchema.safeParse(await res.json());
  if (!data.success) {
    throw new ChannelSendFailed(channel, 'unexpected response from Resend', { retryable: false });
  }

  return data.data.id;
}

async function sendViaSendGrid(
  channel: string,
  config: EmailConfig,
  message: EmailMessage,
  signal: AbortSignal
): Promise<string> {
  const res = await providerFetch(channel, 'https://api.sendgrid.com/v3/mail/send', {
    method: 'POST',
    headers: {
      'Authorization': `Bearer ${config.sendgridApiKey ?? ''}`,
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      personalizations: [{ to: [{ email: message.to }] }],
      from: { email: config.from },
      reply_to: config.replyTo ? { email: config.replyTo } : undefined,
      subject: message.subject,
      content: [
        { type: 'text/plain', value: message.text },
        { type: 'text/html', value: message.html },
      ],
    }),
    signal,
  });

  if (!res.ok) {
    throw httpFailure(channel, res.status, `SendGrid API error: ${await res.text()}`);
  }

  // SendGrid answers 202 with an empty body
  return res.headers.get('x-message-id') ?? `sendgrid-${Date.now()}`;
}

// Connection-level failures; anything else without an SMTP reply code is final
const RETRYABLE_SMTP_ERRORS = new Set(['ECONNECTION', 'ETIMEDOUT', 'ESOCKET', 'EDNS']);

function smtpFailure(channel: string, error: unknown): ChannelSendFailed {
  const code = error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  const responseCode =
    error instanceof Error && 'responseCode' in error && typeof error.responseCode === 'number'
      ? error.responseCode
      : undefined;

  // 4xx replies are temporary, 5xx permanent
  const retryable =
    responseCode !== undefined ? responseCode < 500 : code !== undefined && RETRYABLE_SMTP_ERRORS.has(code);

  return new ChannelSendFailed(
    channel,
    `SMTP error: ${errorMessage(error)}${code ? ` (code: ${code})` : ''}`,
    { retryable, status: responseCode, cause: error }
  );
}

async function sendViaSmtp(
  channel: string,
  config: EmailConfig,
  transport: MailTransport,
  message: EmailMessage
): Promise<string> {
  try {
    const info = await transport.sendMail({
      from: config.from,
      to: message.to,
      replyTo: config.replyTo,
      subject: message.subject,
      text: message.text,
      html: message.html,
    });
    return info.messageId;
  } catch (error) {
    throw smtpFailure(channel, error);
  }
}

async function sendViaConsole(message: EmailMessage): Promise<string> {
  // Console provider for development/testing
  printLines([
    '='.repeat(60),
    'EMAIL (Console Provider)',
    '='.repeat(60),
    `To: ${message.to}`,
    `Subject: ${message.subject}`,
    '-'.repeat(40),
    message.text,
    '='.repeat(60),
  ]);

  return `console-${Date.now()}`;
}

// ============================================================
// CHANNEL
// ============================================================

export class EmailChannel implements NotificationChannel {
  readonly kind = 'email' as const;
  readonly name: string;

  private transport?: MailTransport;

  constructor(
    private readonly config: EmailConfig,
    transport?: MailTransport
  ) {
    this.name = `email:${config.provider}`;
    this.transport = transport;
  }

  async send(message: TenderMessage, destination: string, signal: AbortSignal): Promise<string> {
    if (!isEmailAddress(destination)) {
      throw new ChannelSendFailed(this.name, `invalid email address: ${destination}`, {
        retryable: false,
      });
    }

    const email: EmailMessage = {
      to: destination.trim(),
      subject: message.subject,
      text: message.text,
      html: message.html,
    };

    logger.debug('Sending email', {
      provider: this.config.provider,
      subject: email.subject,
    });

    switch (this.config.provider) {
      case 'resend':
        return sendViaResend(this.name, this.config, email, signal);
      case 'sendgrid':
        return sendViaSendGrid(this.name, this.config, email, signal);
      case 'smtp':
        // nodemailer takes no abort signal; the notifier's send timeout bounds it
        signal.throwIfAborted();
        return sendViaSmtp(this.name, this.config, this.smtpTransport(), email);
      case 'console':
        return sendViaConsole(email);
    }
  }

  private smtpTransport(): MailTransport {
    if (this.transport) return this.transport;

    const { smtpHost, smtpPort = 587, smtpUser, smtpPass } = this.config;
    if (!smtpHost) {
      throw new ChannelSendFailed(this.name, 'SMTP_HOST not configured', { retryable: false });
    }

    this.transport = createTransport({
      host: smtpHost,
      port: smtpPort,
      // Implicit TLS on 465, STARTTLS upgrade elsewhere
      secure: smtpPort === 465,
      auth: smtpUser && smtpPass ? { user: smtpUser, pass: smtpPass } : undefined,
    });
    return this.transport;
  }
}
