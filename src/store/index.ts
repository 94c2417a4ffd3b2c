/**
 * Tender Watch — Seen-Store Module
 *
 * Durable record of every tender already announced.
 */

import type { StoreConfig } from '../lib/config';
import { JsonFileSeenStore } from './json-file-store';
import { SupabaseSeenStore } from './supabase-store';
import type { SeenStore } from './seen-store';

export { diffSnapshot, uniqueByIdentity, type DiffResult } from './dedup';
export { toStoredTender, type SeenStore, type StoredTender } from './seen-store';
export { JsonFileSeenStore, nodeFileSystem, type StoreFileSystem } from './json-file-store';
export { SupabaseSeenStore, type SupabaseSeenStoreOptions } from './supabase-store';

/**
 * Open the store a run will own.
 */
export function createSeenStore(config: StoreConfig): SeenStore {
  switch (config.backend) {
    case 'file':
      return new JsonFileSeenStore(config.path);
    case 'supabase':
      return new SupabaseSeenStore({
        url: config.url,
        serviceRoleKey: config.serviceRoleKey,
        table: config.table,
      });
  }
}
