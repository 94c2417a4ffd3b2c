/**
 * Tests for JSON File Seen-Store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  JsonFileSeenStore,
  SupabaseSeenStore,
  createSeenStore,
  nodeFileSystem,
  type StoreFileSystem,
} from '../../src/store';
import { CommitFailed, StoreUnavailable } from '../../src/lib/errors';
import { tenderRecord } from '../helpers/fakes';

describe('JSON File Seen-Store', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tender-watch-store-'));
    path = join(dir, 'data', 'tenders.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function readStored(): Promise<unknown> {
    return JSON.parse(await readFile(path, 'utf-8'));
  }

  describe('load', () => {
    it('should treat a missing file as an empty store', async () => {
      const store = new JsonFileSeenStore(path);

      expect(await store.load()).toEqual(new Set());
    });

    it('should accept entries keyed by tender_number', async () => {
      const legacyPath = join(dir, 'legacy.json');
      await writeFile(legacyPath, JSON.stringify([{ tender_number: 'OLD-1', tender_title: 'Old tender' }]));
      const store = new JsonFileSeenStore(legacyPath);

      expect(await store.load()).toEqual(new Set(['OLD-1']));
    });

    it('should accept numeric tender numbers', async () => {
      const legacyPath = join(dir, 'legacy.json');
      await writeFile(legacyPath, JSON.stringify([{ tender_number: 4021 }, { tender_number: 'OLD-1' }]));
      const store = new JsonFileSeenStore(legacyPath);

      expect(await store.load()).toEqual(new Set(['4021', 'OLD-1']));
    });

    it('should fail on invalid JSON', async () => {
      const brokenPath = join(dir, 'broken.json');
      await writeFile(brokenPath, '[{"identity": "T1"');
      const store = new JsonFileSeenStore(brokenPath);

      const error = await store.load().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreUnavailable);
      expect(error).toHaveProperty('message', `Store unavailable: ${brokenPath} is not valid JSON`);
    });

    it('should fail when an entry has no identity', async () => {
      const badPath = join(dir, 'bad.json');
      await writeFile(badPath, JSON.stringify([{ title: 'No number' }]));
      const store = new JsonFileSeenStore(badPath);

      await expect(store.load()).rejects.toThrow(
        `Store unavailable: ${badPath} is not a tender array: entry has no identity`
      );
    });

    it('should fail when the file cannot be read', async () => {
      const fs: StoreFileSystem = {
        ...nodeFileSystem,
        readFile: async () => {
          throw Object.assign(new Error('permission denied'), { code: 'EACCES' });
        },
      };
      const store = new JsonFileSeenStore(path, fs);

      await expect(store.load()).rejects.toThrow(
        `Store unavailable: cannot read ${path}: permission denied`
      );
    });
  });

  describe('commit', () => {
    it('should create the file and its directory', async () => {
      const store = new JsonFileSeenStore(path);

      await store.commit([tenderRecord('T1'), tenderRecord('T2')]);

      expect(await store.load()).toEqual(new Set(['T1', 'T2']));
      expect(await readStored()).toEqual([
        expect.objectContaining({
          identity: 'T1',
          title: 'Tender T1',
          closing_date: '25/10/2026',
          closing_date_parsed: '2026-10-25',
          links: ['https://tenders.example.gov/docs/T1.pdf'],
          committed_at: expect.any(String),
        }),
        expect.objectContaining({ identity: 'T2' }),
      ]);
    });

    it('should append and leave stored identities untouched', async () => {
      const store = new JsonFileSeenStore(path);
      await store.commit([tenderRecord('T1', { title: 'Original' })]);

      await store.commit([tenderRecord('t1', { title: 'Relisted' }), tenderRecord('T2')]);

      const stored = await readStored();
      expect(stored).toEqual([
        expect.objectContaining({ identity: 'T1', title: 'Original' }),
        expect.objectContaining({ identity: 'T2' }),
      ]);
    });

    it('should keep legacy entries when appending', async () => {
      const legacyPath = join(dir, 'legacy.json');
      await writeFile(legacyPath, JSON.stringify([{ tender_number: 'OLD-1', tender_title: 'Old tender' }]));
      const store = new JsonFileSeenStore(legacyPath);

      await store.commit([tenderRecord('OLD-1'), tenderRecord('NEW-1')]);

      expect(JSON.parse(await readFile(legacyPath, 'utf-8'))).toEqual([
        { tender_number: 'OLD-1', tender_title: 'Old tender' },
        expect.objectContaining({ identity: 'NEW-1' }),
      ]);
    });

    it('should not create a file for an empty commit', async () => {
      const store = new JsonFileSeenStore(path);

      await store.commit([]);

      await expect(readFile(path, 'utf-8')).rejects.toThrow();
    });

    it('should leave the previous file intact when the rename fails', async () => {
      const store = new JsonFileSeenStore(path);
      await store.commit([tenderRecord('T1')]);
      const before = await readFile(path, 'utf-8');

      const failing = new JsonFileSeenStore(path, {
        ...nodeFileSystem,
        rename: async () => {
          throw new Error('disk full');
        },
      });

      const error = await failing.commit([tenderRecord('T2')]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommitFailed);
      expect(error).toHaveProperty('message', `Commit failed: ${path}: disk full`);
      expect(await readFile(path, 'utf-8')).toBe(before);
      expect(await readdir(join(dir, 'data'))).toEqual(['tenders.json']);
    });

    it('should leave the previous file intact when a write stops part-way', async () => {
      const store = new JsonFileSeenStore(path);
      await store.commit([tenderRecord('T1')]);
      const before = await readFile(path, 'utf-8');

      const failing = new JsonFileSeenStore(path, {
        ...nodeFileSystem,
        writeFile: async (target, data) => {
          await writeFile(target, data.slice(0, 10), 'utf-8');
          throw new Error('process killed');
        },
      });

      await expect(failing.commit([tenderRecord('T2')])).rejects.toThrow(CommitFailed);

      expect(await readFile(path, 'utf-8')).toBe(before);
      expect(await store.load()).toEqual(new Set(['T1']));
      expect(await readdir(join(dir, 'data'))).toEqual(['tenders.json']);
    });

    it('should keep numeric tender numbers as written when appending', async () => {
      const legacyPath = join(dir, 'legacy.json');
      await writeFile(legacyPath, JSON.stringify([{ tender_number: 4021 }]));
      const store = new JsonFileSeenStore(legacyPath);

      await store.commit([tenderRecord('4021'), tenderRecord('NEW-1')]);

      expect(JSON.parse(await readFile(legacyPath, 'utf-8'))).toEqual([
        { tender_number: 4021 },
        expect.objectContaining({ identity: 'NEW-1' }),
      ]);
    });

    it('should not replace the file once the signal has aborted', async () => {
      const store = new JsonFileSeenStore(path);
      await store.commit([tenderRecord('T1')]);
      const before = await readFile(path, 'utf-8');
      const controller = new AbortController();

      const slow = new JsonFileSeenStore(path, {
        ...nodeFileSystem,
        writeFile: async (target, data) => {
          await nodeFileSystem.writeFile(target, data);
          controller.abort(new Error('deadline passed'));
        },
      });

      const error = await slow.commit([tenderRecord('T2')], controller.signal).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommitFailed);
      expect(error).toHaveProperty('message', `Commit failed: ${path}: deadline passed`);
      expect(await readFile(path, 'utf-8')).toBe(before);
      expect(await readdir(join(dir, 'data'))).toEqual(['tenders.json']);
    });

    it('should report an unreadable existing file as a failed commit', async () => {
      await writeFile(join(dir, 'broken.json'), 'not json');
      const store = new JsonFileSeenStore(join(dir, 'broken.json'));

      await expect(store.commit([tenderRecord('T1')])).rejects.toThrow(CommitFailed);
    });
  });
});

describe('createSeenStore', () => {
  it('should open the configured backend', () => {
    expect(createSeenStore({ backend: 'file', path: 'data/tenders.json' })).toBeInstanceOf(
      JsonFileSeenStore
    );
    expect(
      createSeenStore({
        backend: 'supabase',
        url: 'https://project.supabase.example',
        serviceRoleKey: 'test-secret',
        table: 'tenders',
      })
    ).toBeInstanceOf(SupabaseSeenStore);
  });
});
