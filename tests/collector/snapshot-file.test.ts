/**
 * Tests for Snapshot File Collector and collector selection
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  HtmlTableCollector,
  SnapshotFileCollector,
  createCollector,
} from '../../src/collector';
import { loadConfig } from '../../src/lib/config';
import { CollectionFailed, ConfigurationError } from '../../src/lib/errors';

describe('Snapshot File Collector', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tender-watch-snapshot-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeSnapshot(content: string): Promise<string> {
    const path = join(dir, 'listing.json');
    await writeFile(path, content, 'utf-8');
    return path;
  }

  it('should read both export keys and record keys', async () => {
    const path = await writeSnapshot(
      JSON.stringify([
        {
          tender_number: 'PHE-2026-101',
          tender_title: 'Construction of water tank',
          category: 'Works',
          department_owner: 'PHE Chakwal',
          closing_date: '25/10/2026',
          start_date: '10/10/2026',
          pdf_links: ['https://tenders.example.gov/docs/phe-101.pdf'],
        },
        { identity: 'HD-2026-7', title: 'Supply of medicines', department: 'Health Jhelum' },
      ])
    );
    const collector = new SnapshotFileCollector(path);

    const tenders = await collector.collectSnapshot(null, { timeoutMs: 1000 });

    expect(tenders).toHaveLength(2);
    expect(tenders[0]).toEqual({
      identity: 'PHE-2026-101',
      title: 'Construction of water tank',
      category: 'Works',
      department: 'PHE Chakwal',
      closingDate: '25/10/2026',
      advertisedDate: '10/10/2026',
      links: ['https://tenders.example.gov/docs/phe-101.pdf'],
      scrapedAt: undefined,
    });
    expect(tenders[1]?.identity).toBe('HD-2026-7');
  });

  it('should filter by scope', async () => {
    const path = await writeSnapshot(
      JSON.stringify([
        { identity: 'A-1', title: 'Water tank', department: 'PHE Chakwal' },
        { identity: 'B-2', title: 'Medicines', department: 'Health Jhelum' },
      ])
    );
    const collector = new SnapshotFileCollector(path);

    const tenders = await collector.collectSnapshot('Jhelum', { timeoutMs: 1000 });

    expect(tenders.map(tender => tender.identity)).toEqual(['B-2']);
  });

  it('should fail when the file is missing', async () => {
    const collector = new SnapshotFileCollector(join(dir, 'missing.json'));

    const error = await collector.collectSnapshot(null, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollectionFailed);
    expect(error).toHaveProperty(
      'message',
      expect.stringContaining(`cannot read snapshot ${join(dir, 'missing.json')}`)
    );
  });

  it('should fail on invalid JSON', async () => {
    const path = await writeSnapshot('[{"identity": ');
    const collector = new SnapshotFileCollector(path);

    await expect(collector.collectSnapshot(null, { timeoutMs: 1000 })).rejects.toThrow(
      `Collection failed: snapshot ${path} is not valid JSON`
    );
  });

  it('should fail when the file is not an array', async () => {
    const path = await writeSnapshot('{"tenders": []}');
    const collector = new SnapshotFileCollector(path);

    await expect(collector.collectSnapshot(null, { timeoutMs: 1000 })).rejects.toThrow(
      `Collection failed: snapshot ${path} is not an array of tenders`
    );
  });
});

describe('createCollector', () => {
  it('should prefer a snapshot file when one is given', () => {
    const config = loadConfig({ LISTING_URL: 'https://tenders.example.gov/active' });

    expect(createCollector(config, 'data/listing.json')).toBeInstanceOf(SnapshotFileCollector);
    expect(createCollector(config)).toBeInstanceOf(HtmlTableCollector);
  });

  it('should require a listing URL without a snapshot', () => {
    const config = loadConfig({});

    expect(() => createCollector(config)).toThrow(ConfigurationError);
  });
});
