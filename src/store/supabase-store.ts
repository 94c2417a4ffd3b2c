/**
 * Tender Watch — Supabase Seen-Store
 *
 * Keeps committed tenders in a Postgres table with a unique `identity`
 * column. A commit is one upsert statement, so Postgres applies it
 * entirely or not at all.
 *
 *   create table tenders (
 *     identity text primary key,
 *     title text not null default '',
 *     category text not null default '',
 *     department text not null default '',
 *     closing_date text not null default '',
 *     closing_date_parsed date,
 *     advertised_date text not null default '',
 *     links jsonb not null default '[]',
 *     scraped_at timestamptz not null,
 *     committed_at timestamptz not null default now()
 *   );
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { TenderRecord } from '../types';
import { CommitFailed, StoreUnavailable, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { toStoredTender, type SeenStore } from './seen-store';

const PAGE_SIZE = 1000;

// undefined_table from Postgres, and PostgREST's schema cache miss
const MISSING_TABLE_CODES = new Set(['42P01', 'PGRST205']);

const IdentityRowsSchema = z.array(z.object({ identity: z.string() }));

export interface SupabaseSeenStoreOptions {
  url: string;
  serviceRoleKey: string;
  table: string;
  /** Custom fetch for the underlying client */
  fetch?: typeof fetch;
}

/**
 * Consistent message for PostgREST errors.
 */
function supabaseErrorMessage(error: { message: string; code?: string }): string {
  return `Supabase error: ${error.message}${error.code ? ` (code: ${error.code})` : ''}`;
}

export class SupabaseSeenStore implements SeenStore {
  readonly name = 'supabase';

  private readonly client: SupabaseClient;
  private readonly table: string;
  private readonly log = logger.child({ store: 'supabase' });

  constructor(options: SupabaseSeenStoreOptions) {
    this.table = options.table;
    this.client = createClient(options.url, options.serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      global: options.fetch ? { fetch: options.fetch } : undefined,
    });
  }

  async load(signal?: AbortSignal): Promise<Set<string>> {
    const identities = new Set<string>();

    for (let from = 0; ; from += PAGE_SIZE) {
      const query = this.client
        .from(this.table)
        .select('identity')
        .order('identity', { ascending: true })
        .range(from, from + PAGE_SIZE - 1);

      const { data, error } = await (signal ? query.abortSignal(signal) : query);

      if (error) {
        if (MISSING_TABLE_CODES.has(error.code)) {
          this.log.warn('Seen-store table does not exist yet, starting empty', { table: this.table });
          return identities;
        }
        throw new StoreUnavailable(supabaseErrorMessage(error), error);
      }

      const rows = IdentityRowsSchema.safeParse(data);
      if (!rows.success) {
        throw new StoreUnavailable(`unexpected row shape in ${this.table}`);
      }

      for (const row of rows.data) {
        identities.add(row.identity);
      }

      if (rows.data.length < PAGE_SIZE) break;
    }

    this.log.debug('Seen-set loaded', { table: this.table, identities: identities.size });
    return identities;
  }

  async commit(records: readonly TenderRecord[], signal?: AbortSignal): Promise<void> {
    if (records.length === 0) return;
    if (signal?.aborted) {
      throw new CommitFailed(errorMessage(signal.reason), signal.reason);
    }

    const committedAt = new Date().toISOString();
    const rows = records.map(record => toStoredTender(record, committedAt));

    let failure: { message: string; code?: string } | null;
    try {
      const query = this.client
        .from(this.table)
        .upsert(rows, { onConflict: 'identity', ignoreDuplicates: true });
      const { error } = await (signal ? query.abortSignal(signal) : query);
      failure = error;
    } catch (error) {
      throw new CommitFailed(errorMessage(error), error);
    }

    if (failure && signal?.aborted) {
      throw new CommitFailed(errorMessage(signal.reason), failure);
    }
    if (failure) {
      throw new CommitFailed(supabaseErrorMessage(failure), failure);
    }

    this.log.info('Tenders committed', { table: this.table, rows: rows.length });
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }
}
