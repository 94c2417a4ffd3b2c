/**
 * Tender Watch — Notification Channel Contract
 *
 * A channel delivers one rendered message to one destination. Delivery
 * problems are thrown as ChannelSendFailed, tagged retryable or terminal;
 * the notifier turns them into SendResults.
 */

import type { ChannelKind, TenderMessage } from '../types';
import { ChannelSendFailed, errorMessage } from '../lib/errors';

export interface NotificationChannel {
  readonly kind: ChannelKind;
  /** e.g. "whatsapp:twilio", "email:resend" */
  readonly name: string;

  /**
   * Send a message and return the provider's receipt id.
   *
   * @throws ChannelSendFailed
   */
  send(message: TenderMessage, destination: string, signal: AbortSignal): Promise<string>;
}

// ============================================================
// HTTP HELPERS
// ============================================================

/**
 * Server errors, rate limiting and request timeouts are worth retrying.
 * Any other 4xx (bad credentials, rejected destination) is not.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 429 || status === 408;
}

export function httpFailure(channel: string, status: number, detail: string): ChannelSendFailed {
  return new ChannelSendFailed(channel, `HTTP ${status}${detail ? ` - ${detail}` : ''}`, {
    retryable: isRetryableStatus(status),
    status,
  });
}

/**
 * fetch() for provider APIs. Network errors become retryable send
 * failures; an abort is passed through untouched.
 */
export async function providerFetch(
  channel: string,
  url: string,
  init: RequestInit & { signal: AbortSignal }
): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (error) {
    if (init.signal.aborted) throw error;
    throw new ChannelSendFailed(channel, `network error: ${errorMessage(error)}`, {
      retryable: true,
      cause: error,
    });
  }
}
