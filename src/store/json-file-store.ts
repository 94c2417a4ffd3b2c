/**
 * Tender Watch — JSON File Seen-Store
 *
 * Keeps committed tenders as a JSON array on disk. A commit writes the
 * complete new array to a temporary file beside the target, flushes it,
 * then renames it over the target, so a reader only ever sees the old
 * array or the new one.
 */

import { mkdir, open, readFile, rename, unlink } from 'fs/promises';
import { dirname } from 'path';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import { identityKey, type TenderRecord } from '../types';
import { CommitFailed, StoreUnavailable, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { toStoredTender, type SeenStore, type StoredTender } from './seen-store';

// ============================================================
// FILE SYSTEM
// ============================================================

/**
 * The file operations the store needs. Swappable so tests can fail a
 * write part-way through.
 */
export interface StoreFileSystem {
  readFile(path: string, signal?: AbortSignal): Promise<string>;
  /** Must not resolve before the data is flushed to disk */
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  unlink(path: string): Promise<void>;
}

export const nodeFileSystem: StoreFileSystem = {
  readFile: (path, signal) => readFile(path, { encoding: 'utf-8', signal }),

  async writeFile(path, data) {
    const handle = await open(path, 'w');
    try {
      await handle.writeFile(data, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  },

  rename: (from, to) => rename(from, to),

  async mkdir(path) {
    await mkdir(path, { recursive: true });
  },

  unlink: path => unlink(path),
};

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================
// STORE
// ============================================================

function entryIdentity(entry: { identity?: string; tender_number?: string | number }): string {
  return String(entry.identity ?? entry.tender_number ?? '').trim();
}

// Older exports keyed tenders by tender_number, sometimes as a number
const StoredEntrySchema = z
  .object({
    identity: z.string().optional(),
    tender_number: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough()
  .refine(entry => Boolean(entryIdentity(entry)), {
    message: 'entry has no identity',
  });

const StoredFileSchema = z.array(StoredEntrySchema);

type StoredEntry = z.infer<typeof StoredEntrySchema>;

export class JsonFileSeenStore implements SeenStore {
  readonly name = 'json_file';

  private readonly log = logger.child({ store: 'json_file' });

  constructor(
    private readonly path: string,
    private readonly fs: StoreFileSystem = nodeFileSystem
  ) {}

  async load(signal?: AbortSignal): Promise<Set<string>> {
    const entries = await this.readEntries(signal);
    const identities = new Set(entries.map(entryIdentity));

    this.log.debug('Seen-set loaded', { path: this.path, identities: identities.size });
    return identities;
  }

  async commit(records: readonly TenderRecord[], signal?: AbortSignal): Promise<void> {
    if (records.length === 0) return;

    let entries: StoredEntry[];
    try {
      entries = await this.readEntries();
    } catch (error) {
      throw new CommitFailed(errorMessage(error), error);
    }

    const keys = new Set(entries.map(entry => identityKey(entryIdentity(entry))));
    const committedAt = new Date().toISOString();
    const additions: StoredTender[] = [];

    for (const record of records) {
      const key = identityKey(record.identity);
      if (keys.has(key)) continue;
      keys.add(key);
      additions.push(toStoredTender(record, committedAt));
    }

    if (additions.length === 0) return;

    const tempPath = `${this.path}.${nanoid(8)}.tmp`;
    const content = JSON.stringify([...entries, ...additions], null, 2) + '\n';

    try {
      await this.fs.mkdir(dirname(this.path));
      await this.fs.writeFile(tempPath, content);
      // Last point at which the commit can stop without becoming visible
      signal?.throwIfAborted();
      await this.fs.rename(tempPath, this.path);
    } catch (error) {
      await this.discard(tempPath);
      throw new CommitFailed(`${this.path}: ${errorMessage(error)}`, error);
    }

    this.log.info('Tenders committed', {
      path: this.path,
      added: additions.length,
      total: entries.length + additions.length,
    });
  }

  async close(): Promise<void> {
    // Nothing held open between operations
  }

  private async readEntries(signal?: AbortSignal): Promise<StoredEntry[]> {
    let content: string;
    try {
      content = await this.fs.readFile(this.path, signal);
    } catch (error) {
      if (isNotFound(error)) return [];
      if (signal?.aborted) throw error;
      throw new StoreUnavailable(`cannot read ${this.path}: ${errorMessage(error)}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new StoreUnavailable(`${this.path} is not valid JSON`, error);
    }

    const parsed = StoredFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new StoreUnavailable(
        `${this.path} is not a tender array: ${parsed.error.issues[0]?.message ?? 'invalid'}`
      );
    }

    return parsed.data;
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await this.fs.unlink(tempPath);
    } catch (error) {
      if (isNotFound(error)) return;
      this.log.warn('Could not remove temporary store file', {
        path: tempPath,
        error: errorMessage(error),
      });
    }
  }
}
