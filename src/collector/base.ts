/**
 * Tender Watch — Collector Base
 *
 * A collector produces the full current snapshot of active tenders for
 * an optional scope (e.g. a city). The pipeline only depends on the
 * RawTender[] contract; page layout is entirely the collector's problem.
 */

import type { RawTender } from '../types';
import { logger, type Logger } from '../lib/logger';
import { CollectionFailed, errorMessage } from '../lib/errors';
import { withTimeout } from '../lib/timing';

export interface CollectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Abstract base class for tender collectors.
 */
export abstract class TenderCollector {
  abstract readonly name: string;

  protected logger: Logger = logger.child({ collector: this.constructor.name });

  /**
   * Fetch every active tender for the scope.
   * An empty array is a valid answer; throw when no snapshot can be produced.
   */
  abstract collect(scope: string | null, signal: AbortSignal): Promise<RawTender[]>;

  /**
   * Execute collect with a deadline, logging and error wrapping.
   * Any failure, including a timeout, becomes CollectionFailed.
   */
  async collectSnapshot(scope: string | null, options: CollectOptions): Promise<RawTender[]> {
    const startTime = Date.now();
    this.logger.info('Starting collection', { scope: scope ?? 'all' });

    try {
      const tenders = await withTimeout(signal => this.collect(scope, signal), {
        timeoutMs: options.timeoutMs,
        label: `${this.name} collection`,
        signal: options.signal,
      });

      this.logger.info('Collection completed', {
        tendersFound: tenders.length,
        durationMs: Date.now() - startTime,
      });

      return tenders;
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }

      this.logger.error('Collection failed', {
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      });

      if (error instanceof CollectionFailed) {
        throw error;
      }
      throw new CollectionFailed(errorMessage(error), error);
    }
  }
}

/**
 * Case-insensitive scope match against any of the given texts.
 * A null scope matches everything.
 */
export function matchesScope(scope: string | null, texts: Array<string | null | undefined>): boolean {
  if (!scope) return true;
  const needle = scope.trim().toLowerCase();
  return texts.some(text => (text ?? '').toLowerCase().includes(needle));
}
