/**
 * Tender Watch — Timeouts, Delays and Send Throttling
 */

import { setTimeout as sleep } from 'timers/promises';
import { OperationTimeout } from './errors';

/**
 * Run an operation with a deadline.
 *
 * The operation receives a signal that aborts on timeout or when the
 * parent signal aborts, so collaborators can stop their own I/O. The
 * returned promise settles at the deadline or the abort even when the
 * operation ignores its signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: { timeoutMs: number; label: string; signal?: AbortSignal }
): Promise<T> {
  const controller = new AbortController();
  const { timeoutMs, label, signal } = options;

  let rejectDeadline: (reason: unknown) => void = () => undefined;
  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject;
  });

  const timer = setTimeout(() => {
    const error = new OperationTimeout(label, timeoutMs);
    controller.abort(error);
    rejectDeadline(error);
  }, timeoutMs);

  const onParentAbort = () => {
    controller.abort(signal?.reason);
    rejectDeadline(signal?.reason);
  };

  if (signal?.aborted) {
    onParentAbort();
  } else {
    signal?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onParentAbort);
  }
}

/**
 * Sleep that ends early (with a rejection) when the signal aborts.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  await sleep(ms, undefined, { signal });
}

export type SendThrottle = (signal?: AbortSignal) => Promise<void>;

/**
 * Global spacing between successive send attempts.
 *
 * Every caller reserves the next free slot before waiting, so the cap
 * holds across all workers of a pool rather than per worker.
 */
export function createSendThrottle(intervalMs: number): SendThrottle {
  let nextSlot = 0;

  return async (signal?: AbortSignal) => {
    const now = Date.now();
    const slot = Math.max(now, nextSlot);
    nextSlot = slot + intervalMs;
    await delay(slot - now, signal);
  };
}
