/**
 * Tender Watch — WhatsApp Delivery
 *
 * Push-message channel over the Twilio Messages API.
 * Numbers are E.164; the whatsapp: prefix is added when missing.
 */

import { z } from 'zod';
import type { TenderMessage } from '../types';
import { ChannelSendFailed } from '../lib/errors';
import { logger, printLines } from '../lib/logger';
import { httpFailure, isRetryableStatus, providerFetch, type NotificationChannel } from './channel';

const TWILIO_API_BASE = 'https://api.twilio.com/2010-04-01';
const WHATSAPP_NUMBER = /^(whatsapp:)?\+\d{7,15}$/;
const MAX_BODY_LENGTH = 1600;

export interface TwilioCredentials {
  accountSid: string;
  authToken: string;
  from: string;
}

const TwilioMessageSchema = z.object({
  sid: z.string(),
  status: z.string().optional(),
});

const TwilioErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string(),
});

// ============================================================
// FORMATTING
// ============================================================

export function isWhatsAppNumber(value: string): boolean {
  return WHATSAPP_NUMBER.test(value.replace(/\s+/g, ''));
}

export function toWhatsAppAddress(value: string): string {
  const number = value.replace(/\s+/g, '');
  return number.startsWith('whatsapp:') ? number : `whatsapp:${number}`;
}

/**
 * WhatsApp body with bold labels. Twilio rejects bodies over 1600 chars.
 */
export function renderWhatsAppBody(message: TenderMessage): string {
  const lines = [`*${message.heading}*`, ''];
  for (const field of message.fields) {
    lines.push(`*${field.label}:* ${field.value}`);
  }

  // Counted in code points so an emoji is never split
  const characters = Array.from(lines.join('\n'));
  if (characters.length <= MAX_BODY_LENGTH) return characters.join('');
  return `${characters.slice(0, MAX_BODY_LENGTH - 1).join('')}…`;
}

// ============================================================
// CHANNELS
// ============================================================

export class TwilioWhatsAppChannel implements NotificationChannel {
  readonly kind = 'push' as const;
  readonly name = 'whatsapp:twilio';

  constructor(private readonly credentials: TwilioCredentials) {}

  async send(message: TenderMessage, destination: string, signal: AbortSignal): Promise<string> {
    if (!isWhatsAppNumber(destination)) {
      throw new ChannelSendFailed(this.name, `invalid WhatsApp number: ${destination}`, {
        retryable: false,
      });
    }

    const { accountSid, authToken, from } = this.credentials;
    const form = new URLSearchParams({
      To: toWhatsAppAddress(destination),
      From: toWhatsAppAddress(from),
      Body: renderWhatsAppBody(message),
    });

    const res = await providerFetch(this.name, `${TWILIO_API_BASE}/Accounts/${accountSid}/Messages.json`, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${Buffer.from(`${accountSid}:${authToken}`).toString('base64')}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: form.toString(),
      signal,
    });

    if (!res.ok) {
      throw twilioFailure(this.name, res.status, await res.text());
    }

    const data = TwilioMessageSchema.safeParse(await res.json());
    if (!data.success) {
      throw new ChannelSendFailed(this.name, 'unexpected response from Twilio', { retryable: false });
    }

    return data.data.sid;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function twilioFailure(channel: string, status: number, body: string): ChannelSendFailed {
  const parsed = TwilioErrorSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    return httpFailure(channel, status, body);
  }

  const code = parsed.data.code !== undefined ? ` (Code: ${parsed.data.code})` : '';
  return new ChannelSendFailed(channel, `Twilio API error: ${parsed.data.message}${code}`, {
    retryable: isRetryableStatus(status),
    status,
  });
}

/**
 * Prints messages instead of sending them. For local runs.
 */
export class ConsoleWhatsAppChannel implements NotificationChannel {
  readonly kind = 'push' as const;
  readonly name = 'whatsapp:console';

  async send(message: TenderMessage, destination: string, _signal?: AbortSignal): Promise<string> {
    if (!isWhatsAppNumber(destination)) {
      throw new ChannelSendFailed(this.name, `invalid WhatsApp number: ${destination}`, {
        retryable: false,
      });
    }

    printLines([
      '='.repeat(60),
      'WHATSAPP (Console Provider)',
      '='.repeat(60),
      `To: ${toWhatsAppAddress(destination)}`,
      '-'.repeat(40),
      renderWhatsAppBody(message),
      '='.repeat(60),
    ]);

    logger.debug('WhatsApp message printed', { identity: message.identity });
    return `console-${Date.now()}`;
  }
}
