/**
 * In-process stand-ins for the collector, seen-store and channels.
 */

import { TenderCollector, matchesScope } from '../../src/collector';
import type { SeenStore } from '../../src/store';
import { delay } from '../../src/lib/timing';
import type { NotificationChannel, NotifierOptions } from '../../src/delivery';
import type { ChannelKind, RawTender, TenderMessage, TenderRecord } from '../../src/types';

export const SCRAPED_AT = '2026-10-19T06:00:00.000Z';

// ============================================================
// DATA
// ============================================================

export function rawTender(identity: string, overrides: Partial<RawTender> = {}): RawTender {
  return {
    identity,
    title: `Tender ${identity}`,
    category: 'Works',
    department: 'Public Health Engineering',
    closingDate: '25/10/2026',
    advertisedDate: '10/10/2026',
    links: [`https://tenders.example.gov/docs/${identity}.pdf`],
    scrapedAt: SCRAPED_AT,
    ...overrides,
  };
}

export function tenderRecord(identity: string, overrides: Partial<TenderRecord> = {}): TenderRecord {
  return {
    identity,
    title: `Tender ${identity}`,
    category: 'Works',
    department: 'Public Health Engineering',
    closingDate: '25/10/2026',
    closingDateParsed: '2026-10-25',
    advertisedDate: '10/10/2026',
    links: [`https://tenders.example.gov/docs/${identity}.pdf`],
    scrapedAt: SCRAPED_AT,
    ...overrides,
  };
}

// ============================================================
// COLLECTOR
// ============================================================

export class StaticCollector extends TenderCollector {
  readonly name = 'static';
  calls = 0;

  constructor(private readonly result: RawTender[] | Error) {
    super();
  }

  async collect(scope: string | null): Promise<RawTender[]> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result.filter(tender =>
      matchesScope(scope, [tender.title, tender.category, tender.department])
    );
  }
}

// ============================================================
// SEEN-STORE
// ============================================================

export class MemorySeenStore implements SeenStore {
  readonly name = 'memory';
  readonly identities: Set<string>;
  readonly commits: string[][] = [];
  loads = 0;
  closed = false;
  loadError?: Error;
  commitError?: Error;
  /** Time a commit takes before its write lands */
  commitDelayMs = 0;
  /** When false, a slow commit ignores its signal and lands anyway */
  commitStopsOnAbort = true;
  /** Commit and close calls, in the order they finished */
  readonly events: string[] = [];

  constructor(initial: string[] = []) {
    this.identities = new Set(initial);
  }

  async load(): Promise<Set<string>> {
    this.loads++;
    if (this.loadError) throw this.loadError;
    return new Set(this.identities);
  }

  async commit(records: readonly TenderRecord[], signal?: AbortSignal): Promise<void> {
    if (this.commitError) throw this.commitError;
    if (this.commitDelayMs > 0) {
      try {
        await delay(this.commitDelayMs, this.commitStopsOnAbort ? signal : undefined);
      } catch (error) {
        this.events.push('commit stopped');
        throw error;
      }
    }

    const identities = records.map(record => record.identity);
    this.commits.push(identities);
    for (const identity of identities) {
      this.identities.add(identity);
    }
    this.events.push('commit written');
  }

  async close(): Promise<void> {
    this.closed = true;
    this.events.push('closed');
  }
}

// ============================================================
// CHANNELS
// ============================================================

export interface FakeSend {
  identity: string;
  destination: string;
  /** Attempt number for this identity on this channel */
  attempt: number;
  at: number;
  signal: AbortSignal;
}

/** Return a receipt id, or an Error to throw */
export type FakeBehaviour = (send: FakeSend) => string | Error | Promise<string>;

export class FakeChannel implements NotificationChannel {
  readonly sends: FakeSend[] = [];
  private readonly attempts = new Map<string, number>();

  constructor(
    readonly kind: ChannelKind,
    readonly name: string,
    private readonly behaviour: FakeBehaviour = send => `${send.identity}@${send.attempt}`
  ) {}

  async send(message: TenderMessage, destination: string, signal: AbortSignal): Promise<string> {
    const attempt = (this.attempts.get(message.identity) ?? 0) + 1;
    this.attempts.set(message.identity, attempt);

    const send: FakeSend = { identity: message.identity, destination, attempt, at: Date.now(), signal };
    this.sends.push(send);

    const result = await this.behaviour(send);
    if (result instanceof Error) throw result;
    return result;
  }

  identities(): string[] {
    return this.sends.map(send => send.identity);
  }
}

/** Never settles unless the send is aborted */
export function hang(send: FakeSend): Promise<string> {
  return new Promise((_, reject) => {
    send.signal.addEventListener('abort', () => reject(send.signal.reason), { once: true });
  });
}

export function fastNotifierOptions(overrides: Partial<NotifierOptions> = {}): NotifierOptions {
  return {
    minSendIntervalMs: 0,
    throttleThreshold: 3,
    concurrency: 1,
    retries: 2,
    sendTimeoutMs: 1000,
    retryMinTimeoutMs: 1,
    retryMaxTimeoutMs: 5,
    ...overrides,
  };
}
