/**
 * Tender Watch — Seen-Store Contract
 *
 * The only state that survives between runs. The pipeline opens one store
 * per run, owns it for the run's duration and closes it on every path.
 */

import type { TenderRecord } from '../types';

export interface SeenStore {
  readonly name: string;

  /**
   * Every identity committed so far, in its stored spelling.
   * A missing file or table is an empty set, not an error.
   *
   * @throws StoreUnavailable when the medium exists but cannot be read
   */
  load(signal?: AbortSignal): Promise<Set<string>>;

  /**
   * Append tenders. Either all of them become visible or none do.
   * Identities already stored are left untouched (first write wins).
   * When the signal aborts before the write is made visible, nothing is
   * written and the commit rejects.
   *
   * @throws CommitFailed
   */
  commit(records: readonly TenderRecord[], signal?: AbortSignal): Promise<void>;

  close(): Promise<void>;
}

/**
 * Row shape persisted by every backend.
 */
export interface StoredTender {
  identity: string;
  title: string;
  category: string;
  department: string;
  closing_date: string;
  closing_date_parsed: string | null;
  advertised_date: string;
  links: string[];
  scraped_at: string;
  committed_at: string;
}

export function toStoredTender(record: TenderRecord, committedAt: string): StoredTender {
  return {
    identity: record.identity,
    title: record.title,
    category: record.category,
    department: record.department,
    closing_date: record.closingDate,
    closing_date_parsed: record.closingDateParsed,
    advertised_date: record.advertisedDate,
    links: [...record.links],
    scraped_at: record.scrapedAt,
    committed_at: committedAt,
  };
}
