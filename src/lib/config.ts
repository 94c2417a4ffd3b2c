/**
 * Tender Watch — Configuration
 *
 * Validates the environment (usually loaded from .env by dotenv) and
 * merges explicit command-line overrides on top of it.
 */

import { z } from 'zod';
import type { ChannelKind } from '../types';
import { ConfigurationError } from './errors';

// ============================================================
// ENVIRONMENT SCHEMA
// ============================================================

const optionalText = z
  .string()
  .optional()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(value => {
      if (value === undefined || value.trim() === '') return fallback;
      return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
    });

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

export const EnvironmentSchema = z.object({
  TENDER_SCOPE: optionalText,
  LISTING_URL: optionalText.pipe(z.string().url().optional()),
  LISTING_SCOPE_PARAM: optionalText,

  STORE_BACKEND: z.enum(['file', 'supabase']).default('file'),
  STORE_PATH: z.string().default('data/tenders.json'),
  SUPABASE_URL: optionalText,
  SUPABASE_SERVICE_ROLE_KEY: optionalText,
  SUPABASE_TABLE: z.string().default('tenders'),

  PUSH_ENABLED: flag(true),
  PUSH_PROVIDER: z.enum(['twilio', 'console']).default('twilio'),
  TWILIO_ACCOUNT_SID: optionalText,
  TWILIO_AUTH_TOKEN: optionalText,
  TWILIO_WHATSAPP_FROM: optionalText,
  TWILIO_WHATSAPP_TO: optionalText,

  EMAIL_ENABLED: flag(true),
  EMAIL_PROVIDER: z.enum(['resend', 'sendgrid', 'smtp', 'console']).default('console'),
  EMAIL_FROM: z.string().default('tender-alerts@example.com'),
  EMAIL_REPLY_TO: optionalText,
  EMAIL_TO: optionalText,
  RESEND_API_KEY: optionalText,
  SENDGRID_API_KEY: optionalText,
  SMTP_HOST: optionalText,
  SMTP_PORT: positiveInt(587),
  SMTP_USER: optionalText,
  SMTP_PASS: optionalText,

  SEND_INTERVAL_MS: nonNegativeInt(1000),
  THROTTLE_THRESHOLD: nonNegativeInt(3),
  SEND_CONCURRENCY: positiveInt(1),
  SEND_RETRIES: nonNegativeInt(3),
  SEND_TIMEOUT_MS: positiveInt(15_000),

  COLLECT_TIMEOUT_MS: positiveInt(120_000),
  STORE_TIMEOUT_MS: positiveInt(30_000),

  LOG_DIR: z.string().default('logs'),
});

export type Environment = z.infer<typeof EnvironmentSchema>;

// ============================================================
// CONFIG
// ============================================================

export type StoreConfig =
  | { backend: 'file'; path: string }
  | { backend: 'supabase'; url: string; serviceRoleKey: string; table: string };

export interface PushChannelConfig {
  kind: 'push';
  enabled: boolean;
  destination?: string;
  provider: 'twilio' | 'console';
  credentials: {
    accountSid?: string;
    authToken?: string;
    from?: string;
  };
}

export interface EmailChannelConfig {
  kind: 'email';
  enabled: boolean;
  destination?: string;
  provider: 'resend' | 'sendgrid' | 'smtp' | 'console';
  credentials: {
    from: string;
    replyTo?: string;
    resendApiKey?: string;
    sendgridApiKey?: string;
    smtpHost?: string;
    smtpPort: number;
    smtpUser?: string;
    smtpPass?: string;
  };
}

export type ChannelConfig = PushChannelConfig | EmailChannelConfig;

export interface DispatchConfig {
  minSendIntervalMs: number;
  throttleThreshold: number;
  concurrency: number;
  retries: number;
  sendTimeoutMs: number;
}

export interface MonitorConfig {
  scope: string | null;
  listing: {
    url?: string;
    scopeParam?: string;
  };
  store: StoreConfig;
  channels: {
    push: PushChannelConfig;
    email: EmailChannelConfig;
  };
  dispatch: DispatchConfig;
  collectTimeoutMs: number;
  storeTimeoutMs: number;
  logDir: string;
}

/**
 * Values given explicitly on the command line.
 */
export interface ConfigOverrides {
  scope?: string;
  pushTo?: string;
  emailTo?: string;
  storePath?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`).join('; ');
}

function buildStoreConfig(env: Environment, overrides: ConfigOverrides): StoreConfig {
  if (env.STORE_BACKEND === 'file') {
    return { backend: 'file', path: overrides.storePath ?? env.STORE_PATH };
  }

  if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
    throw new ConfigurationError(
      'STORE_BACKEND=supabase requires SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY'
    );
  }

  return {
    backend: 'supabase',
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    table: env.SUPABASE_TABLE,
  };
}

/**
 * Load configuration from an environment map.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): MonitorConfig {
  const parsed = EnvironmentSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }

  const env = parsed.data;
  const pushTo = overrides.pushTo?.trim() || env.TWILIO_WHATSAPP_TO;
  const emailTo = overrides.emailTo?.trim() || env.EMAIL_TO;

  return {
    scope: overrides.scope?.trim() || env.TENDER_SCOPE || null,
    listing: {
      url: env.LISTING_URL,
      scopeParam: env.LISTING_SCOPE_PARAM,
    },
    store: buildStoreConfig(env, overrides),
    channels: {
      push: {
        kind: 'push',
        enabled: env.PUSH_ENABLED && pushTo !== undefined,
        destination: pushTo,
        provider: env.PUSH_PROVIDER,
        credentials: {
          accountSid: env.TWILIO_ACCOUNT_SID,
          authToken: env.TWILIO_AUTH_TOKEN,
          from: env.TWILIO_WHATSAPP_FROM,
        },
      },
      email: {
        kind: 'email',
        enabled: env.EMAIL_ENABLED && emailTo !== undefined,
        destination: emailTo,
        provider: env.EMAIL_PROVIDER,
        credentials: {
          from: env.EMAIL_FROM,
          replyTo: env.EMAIL_REPLY_TO,
          resendApiKey: env.RESEND_API_KEY,
          sendgridApiKey: env.SENDGRID_API_KEY,
          smtpHost: env.SMTP_HOST,
          smtpPort: env.SMTP_PORT,
          smtpUser: env.SMTP_USER,
          smtpPass: env.SMTP_PASS,
        },
      },
    },
    dispatch: {
      minSendIntervalMs: env.SEND_INTERVAL_MS,
      throttleThreshold: env.THROTTLE_THRESHOLD,
      concurrency: env.SEND_CONCURRENCY,
      retries: env.SEND_RETRIES,
      sendTimeoutMs: env.SEND_TIMEOUT_MS,
    },
    collectTimeoutMs: env.COLLECT_TIMEOUT_MS,
    storeTimeoutMs: env.STORE_TIMEOUT_MS,
    logDir: env.LOG_DIR,
  };
}

/**
 * Channel configs that are switched on, in a stable order.
 * At least one is required for a run to be meaningful.
 */
export function enabledChannels(config: MonitorConfig): ChannelConfig[] {
  const channels: ChannelConfig[] = [config.channels.push, config.channels.email].filter(
    channel => channel.enabled
  );

  if (channels.length === 0) {
    throw new ConfigurationError(
      'At least one notification channel (push or email) must be configured with a destination'
    );
  }

  return channels;
}

export function channelLabel(kind: ChannelKind): string {
  return kind === 'push' ? 'WhatsApp' : 'Email';
}
