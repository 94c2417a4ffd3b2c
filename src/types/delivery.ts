/**
 * Tender Watch — Delivery Types
 *
 * Messages, per-send results and the dispatch report shared by the
 * notifier, the channels and the pipeline summary.
 */

// ============================================================
// CHANNELS
// ============================================================

export type ChannelKind = 'push' | 'email';

export const CHANNEL_KINDS: readonly ChannelKind[] = ['push', 'email'];

// ============================================================
// MESSAGE
// ============================================================

export interface MessageField {
  label: string;
  value: string;
}

/**
 * A rendered tender alert. Every channel receives the same message
 * and picks the representation it needs.
 */
export interface TenderMessage {
  identity: string;
  subject: string;
  heading: string;
  /** Fixed order, always present, placeholder for missing values */
  fields: MessageField[];
  text: string;
  html: string;
}

// ============================================================
// SEND RESULTS
// ============================================================

export interface SendSucceeded {
  status: 'sent';
  receiptId: string;
  attempts: number;
}

export interface SendFailed {
  status: 'failed';
  reason: string;
  retryable: boolean;
  attempts: number;
}

export type SendResult = SendSucceeded | SendFailed;

export interface ChannelOutcome {
  kind: ChannelKind;
  channel: string;
  destination: string;
  result: SendResult;
}

/**
 * delivered: every enabled channel succeeded
 * partial:   at least one succeeded and at least one failed
 * failed:    every enabled channel failed
 */
export type RecordDeliveryStatus = 'delivered' | 'partial' | 'failed';

export interface RecordDelivery {
  identity: string;
  title: string;
  outcomes: ChannelOutcome[];
  status: RecordDeliveryStatus;
}

export interface ChannelTally {
  sent: number;
  failed: number;
}

export interface DispatchReport {
  records: RecordDelivery[];
  channels: Record<ChannelKind, ChannelTally>;
  delivered: number;
  partial: number;
  failed: number;
  cancelled: boolean;
  durationMs: number;
}
