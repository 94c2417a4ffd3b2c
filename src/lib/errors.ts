/**
 * Tender Watch — Error Taxonomy
 *
 * Stage-fatal errors (collection, store, commit, configuration) abort a run.
 * ChannelSendFailed is per notification and is always turned into a
 * SendResult by the notifier before it can reach the pipeline.
 */

import type { ActiveStage } from '../types';

/**
 * Base class. The failed stage of a run is tracked by the pipeline, not
 * carried on the error.
 */
export class MonitorError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
  }
}

/** Source unreachable or structurally unreadable. */
export class CollectionFailed extends MonitorError {
  constructor(detail: string, cause?: unknown) {
    super(`Collection failed: ${detail}`, { cause });
  }
}

/** Seen-store backing medium exists but cannot be read. */
export class StoreUnavailable extends MonitorError {
  constructor(detail: string, cause?: unknown) {
    super(`Store unavailable: ${detail}`, { cause });
  }
}

/** Commit could not be made durable. Nothing of the commit is visible. */
export class CommitFailed extends MonitorError {
  constructor(detail: string, cause?: unknown) {
    super(`Commit failed: ${detail}`, { cause });
  }
}

export class ChannelSendFailed extends MonitorError {
  readonly channel: string;
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    channel: string,
    detail: string,
    options: { retryable: boolean; status?: number; cause?: unknown }
  ) {
    super(`${channel}: ${detail}`, { cause: options.cause });
    this.channel = channel;
    this.retryable = options.retryable;
    this.status = options.status;
  }
}

/** Missing destination, missing credentials, no channel enabled. */
export class ConfigurationError extends MonitorError {}

export class OperationTimeout extends MonitorError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class RunCancelled extends MonitorError {
  constructor(stage: ActiveStage) {
    super(`Run cancelled during ${stage}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
