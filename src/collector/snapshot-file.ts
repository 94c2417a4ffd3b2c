/**
 * Tender Watch — Snapshot File Collector
 *
 * Replays a saved listing export (a JSON array of tenders). Used for
 * offline runs and for re-sending a known snapshot. Both the camelCase
 * record shape and the listing's export keys (tender_number, pdf_links...)
 * are accepted.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TenderCollector, matchesScope } from './base';
import { CollectionFailed, errorMessage } from '../lib/errors';
import type { RawTender } from '../types';

const text = z.string().nullish();

const SnapshotEntrySchema = z
  .object({
    identity: text,
    tender_number: text,
    title: text,
    tender_title: text,
    category: text,
    department: text,
    department_owner: text,
    closingDate: text,
    closing_date: text,
    advertisedDate: text,
    start_date: text,
    links: z.array(z.string()).nullish(),
    pdf_links: z.array(z.string()).nullish(),
    scrapedAt: text,
    scraped_at: text,
  })
  .passthrough();

const SnapshotSchema = z.array(SnapshotEntrySchema);

type SnapshotEntry = z.infer<typeof SnapshotEntrySchema>;

function toRawTender(entry: SnapshotEntry): RawTender {
  return {
    identity: entry.identity ?? entry.tender_number,
    title: entry.title ?? entry.tender_title,
    category: entry.category,
    department: entry.department ?? entry.department_owner,
    closingDate: entry.closingDate ?? entry.closing_date,
    advertisedDate: entry.advertisedDate ?? entry.start_date,
    links: entry.links ?? entry.pdf_links,
    scrapedAt: entry.scrapedAt ?? entry.scraped_at,
  };
}

export class SnapshotFileCollector extends TenderCollector {
  readonly name = 'snapshot_file';

  constructor(private readonly path: string) {
    super();
  }

  async collect(scope: string | null, signal: AbortSignal): Promise<RawTender[]> {
    let content: string;
    try {
      content = await readFile(this.path, { encoding: 'utf-8', signal });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new CollectionFailed(`cannot read snapshot ${this.path}: ${errorMessage(error)}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new CollectionFailed(`snapshot ${this.path} is not valid JSON`, error);
    }

    const parsed = SnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new CollectionFailed(`snapshot ${this.path} is not an array of tenders`);
    }

    return parsed.data
      .map(toRawTender)
      .filter(tender => matchesScope(scope, [tender.title, tender.category, tender.department]));
  }
}
