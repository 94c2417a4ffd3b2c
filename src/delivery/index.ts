/**
 * Tender Watch — Delivery Module
 *
 * Formats tender alerts and sends them over WhatsApp and email.
 */

import {
  enabledChannels,
  type ChannelConfig,
  type EmailChannelConfig,
  type MonitorConfig,
  type PushChannelConfig,
} from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import type { NotificationChannel } from './channel';
import { EmailChannel } from './email';
import type { ChannelBinding } from './notifier';
import { ConsoleWhatsAppChannel, TwilioWhatsAppChannel } from './whatsapp';

export {
  formatTenderMessage,
  messageFields,
  deliverablesNote,
  escapeHtml,
  PLACEHOLDER,
  ALERT_HEADING,
} from './format';
export {
  isRetryableStatus,
  httpFailure,
  providerFetch,
  type NotificationChannel,
} from './channel';
export {
  TwilioWhatsAppChannel,
  ConsoleWhatsAppChannel,
  isWhatsAppNumber,
  toWhatsAppAddress,
  renderWhatsAppBody,
  type TwilioCredentials,
} from './whatsapp';
export {
  EmailChannel,
  isEmailAddress,
  type EmailConfig,
  type EmailProvider,
  type EmailMessage,
  type MailTransport,
} from './email';
export {
  Notifier,
  emptyTallies,
  CANCELLED_REASON,
  type ChannelBinding,
  type NotifierOptions,
  type SendOptions,
} from './notifier';

// ============================================================
// CHANNEL FACTORY
// ============================================================

function createPushChannel(config: PushChannelConfig): NotificationChannel {
  if (config.provider === 'console') {
    return new ConsoleWhatsAppChannel();
  }

  const { accountSid, authToken, from } = config.credentials;
  if (!accountSid || !authToken || !from) {
    throw new ConfigurationError(
      'WhatsApp via Twilio requires TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN and TWILIO_WHATSAPP_FROM'
    );
  }

  return new TwilioWhatsAppChannel({ accountSid, authToken, from });
}

function createEmailChannel(config: EmailChannelConfig): NotificationChannel {
  const { credentials } = config;

  if (config.provider === 'resend' && !credentials.resendApiKey) {
    throw new ConfigurationError('RESEND_API_KEY not configured');
  }
  if (config.provider === 'sendgrid' && !credentials.sendgridApiKey) {
    throw new ConfigurationError('SENDGRID_API_KEY not configured');
  }
  if (config.provider === 'smtp' && !credentials.smtpHost) {
    throw new ConfigurationError('SMTP_HOST not configured');
  }

  return new EmailChannel({
    provider: config.provider,
    from: credentials.from,
    replyTo: credentials.replyTo,
    resendApiKey: credentials.resendApiKey,
    sendgridApiKey: credentials.sendgridApiKey,
    smtpHost: credentials.smtpHost,
    smtpPort: credentials.smtpPort,
    smtpUser: credentials.smtpUser,
    smtpPass: credentials.smtpPass,
  });
}

export function createChannel(config: ChannelConfig): NotificationChannel {
  return config.kind === 'push' ? createPushChannel(config) : createEmailChannel(config);
}

/**
 * Channels enabled for this run, each with its destination.
 *
 * @throws ConfigurationError when no channel is enabled or one lacks credentials
 */
export function createChannelBindings(config: MonitorConfig): ChannelBinding[] {
  return enabledChannels(config).map(channelConfig => ({
    channel: createChannel(channelConfig),
    destination: channelConfig.destination,
  }));
}
