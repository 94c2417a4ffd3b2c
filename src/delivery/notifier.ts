/**
 * Tender Watch — Notifier
 *
 * Sends every new tender over every enabled channel. Each send is
 * independent: a failure is recorded in the DispatchReport and the next
 * channel and the next tender are still attempted.
 */

import pLimit from 'p-limit';
import pRetry, { AbortError } from 'p-retry';
import type {
  ChannelKind,
  ChannelOutcome,
  ChannelTally,
  DispatchReport,
  RecordDelivery,
  RecordDeliveryStatus,
  SendResult,
  TenderMessage,
  TenderRecord,
} from '../types';
import type { DispatchConfig } from '../lib/config';
import { channelLabel } from '../lib/config';
import {
  ChannelSendFailed,
  ConfigurationError,
  OperationTimeout,
  errorMessage,
} from '../lib/errors';
import { logger } from '../lib/logger';
import { createSendThrottle, withTimeout, type SendThrottle } from '../lib/timing';
import type { NotificationChannel } from './channel';
import { formatTenderMessage } from './format';

const log = logger.child({ component: 'notifier' });

export const CANCELLED_REASON = 'cancelled';

/**
 * A channel paired with the destination it delivers to for this run.
 */
export interface ChannelBinding {
  channel: NotificationChannel;
  destination?: string;
}

export interface NotifierOptions extends DispatchConfig {
  /** Backoff before the first retry */
  retryMinTimeoutMs?: number;
  retryMaxTimeoutMs?: number;
}

export interface SendOptions {
  signal?: AbortSignal;
  throttle?: SendThrottle;
}

interface Failure {
  reason: string;
  retryable: boolean;
}

/**
 * Anything a channel throws that is not a tagged send failure is
 * recorded as terminal: retrying a bug does not fix it.
 */
function toFailure(error: unknown): Failure {
  if (error instanceof ChannelSendFailed) {
    return { reason: error.message, retryable: error.retryable };
  }
  return { reason: errorMessage(error), retryable: false };
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function recordStatus(outcomes: ChannelOutcome[]): RecordDeliveryStatus {
  const sent = outcomes.filter(outcome => outcome.result.status === 'sent').length;
  if (sent === outcomes.length) return 'delivered';
  return sent === 0 ? 'failed' : 'partial';
}

export function emptyTallies(): Record<ChannelKind, ChannelTally> {
  return {
    push: { sent: 0, failed: 0 },
    email: { sent: 0, failed: 0 },
  };
}

export class Notifier {
  private readonly options: Required<NotifierOptions>;

  constructor(options: NotifierOptions) {
    this.options = {
      retryMinTimeoutMs: 1000,
      retryMaxTimeoutMs: 10_000,
      ...options,
    };
  }

  /**
   * Render the alert for a tender.
   */
  format(record: TenderRecord): TenderMessage {
    return formatTenderMessage(record);
  }

  /**
   * Send one message over one channel.
   *
   * Never throws for a delivery failure: retryable failures are retried
   * with backoff, terminal ones stop at once, and either way the outcome
   * comes back as a SendResult. Only a ConfigurationError escapes.
   */
  async send(
    channel: NotificationChannel,
    message: TenderMessage,
    destination: string,
    options: SendOptions = {}
  ): Promise<SendResult> {
    const { signal, throttle } = options;
    let attempts = 0;

    if (signal?.aborted) {
      return { status: 'failed', reason: CANCELLED_REASON, retryable: true, attempts };
    }

    try {
      const receiptId = await pRetry(
        async () => {
          attempts++;
          try {
            if (throttle) await throttle(signal);

            return await withTimeout(attemptSignal => channel.send(message, destination, attemptSignal), {
              timeoutMs: this.options.sendTimeoutMs,
              label: `${channel.name} send`,
              signal,
            });
          } catch (error) {
            if (signal?.aborted) throw new AbortError(CANCELLED_REASON);
            if (error instanceof OperationTimeout) {
              throw new ChannelSendFailed(channel.name, error.message, { retryable: true, cause: error });
            }
            if (error instanceof ChannelSendFailed && error.retryable) throw error;
            throw new AbortError(asError(error));
          }
        },
        {
          retries: this.options.retries,
          factor: 2,
          minTimeout: this.options.retryMinTimeoutMs,
          maxTimeout: this.options.retryMaxTimeoutMs,
          signal,
          onFailedAttempt: error => {
            if (error.retriesLeft > 0 && !signal?.aborted) {
              log.warn('Send attempt failed, retrying', {
                channel: channel.name,
                identity: message.identity,
                attempt: error.attemptNumber,
                retriesLeft: error.retriesLeft,
                error: error.message,
              });
            }
          },
        }
      );

      log.info('Notification sent', {
        channel: channel.name,
        identity: message.identity,
        receiptId,
        attempts,
      });

      return { status: 'sent', receiptId, attempts };
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;

      if (signal?.aborted) {
        return { status: 'failed', reason: CANCELLED_REASON, retryable: true, attempts };
      }

      const failure = toFailure(error);
      log.error('Notification failed', {
        channel: channel.name,
        identity: message.identity,
        attempts,
        retryable: failure.retryable,
        error: failure.reason,
      });

      return { status: 'failed', ...failure, attempts };
    }
  }

  /**
   * Notify every record over every bound channel, in snapshot order.
   *
   * Bindings are checked before anything is sent: an enabled channel
   * without a destination is a ConfigurationError. When the batch is
   * larger than the throttle threshold, successive send attempts are
   * spaced by at least minSendIntervalMs across the whole pool.
   */
  async dispatch(
    records: readonly TenderRecord[],
    bindings: readonly ChannelBinding[],
    signal?: AbortSignal
  ): Promise<DispatchReport> {
    const startTime = Date.now();

    if (bindings.length === 0) {
      throw new ConfigurationError('No notification channel is enabled');
    }

    const targets = bindings.map(binding => {
      const destination = binding.destination?.trim();
      if (!destination) {
        throw new ConfigurationError(
          `${channelLabel(binding.channel.kind)} channel (${binding.channel.name}) has no destination`
        );
      }
      return { channel: binding.channel, destination };
    });

    const { concurrency, throttleThreshold, minSendIntervalMs } = this.options;
    const throttle =
      records.length > throttleThreshold && minSendIntervalMs > 0
        ? createSendThrottle(minSendIntervalMs)
        : undefined;
    const limit = pLimit(concurrency);

    log.info('Dispatching notifications', {
      records: records.length,
      channels: targets.map(target => target.channel.name),
      throttled: throttle !== undefined,
      concurrency,
    });

    const tasks = records.map((record, index) => {
      const message = this.format(record);

      return targets.map(target =>
        limit(async (): Promise<ChannelOutcome> => {
          if (target === targets[0]) {
            log.info(`[${index + 1}/${records.length}] Sending notifications`, {
              identity: record.identity,
              title: record.title,
            });
          }

          const result = await this.send(target.channel, message, target.destination, {
            signal,
            throttle,
          });

          return {
            kind: target.channel.kind,
            channel: target.channel.name,
            destination: target.destination,
            result,
          };
        })
      );
    });

    let outcomes: ChannelOutcome[][];
    try {
      outcomes = await Promise.all(tasks.map(recordTasks => Promise.all(recordTasks)));
    } catch (error) {
      limit.clearQueue();
      throw error;
    }

    return this.buildReport(records, outcomes, signal?.aborted ?? false, Date.now() - startTime);
  }

  private buildReport(
    records: readonly TenderRecord[],
    outcomes: ChannelOutcome[][],
    cancelled: boolean,
    durationMs: number
  ): DispatchReport {
    const channels = emptyTallies();
    const deliveries: RecordDelivery[] = records.map((record, index) => {
      const recordOutcomes = outcomes[index] ?? [];

      for (const outcome of recordOutcomes) {
        const tally = channels[outcome.kind];
        if (outcome.result.status === 'sent') {
          tally.sent++;
        } else {
          tally.failed++;
        }
      }

      return {
        identity: record.identity,
        title: record.title,
        outcomes: recordOutcomes,
        status: recordStatus(recordOutcomes),
      };
    });

    const report: DispatchReport = {
      records: deliveries,
      channels,
      delivered: deliveries.filter(delivery => delivery.status === 'delivered').length,
      partial: deliveries.filter(delivery => delivery.status === 'partial').length,
      failed: deliveries.filter(delivery => delivery.status === 'failed').length,
      cancelled,
      durationMs,
    };

    log.info('Dispatch completed', {
      delivered: report.delivered,
      partial: report.partial,
      failed: report.failed,
      cancelled,
      durationMs,
    });

    return report;
  }
}
