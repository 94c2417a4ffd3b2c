/**
 * Tender Watch — Tender Record Types
 *
 * One record per tender on the public listing.
 * Records are built fresh by a collector on every run and only
 * become durable once the pipeline commits them to the seen-store.
 */

import { z } from 'zod';

// ============================================================
// RAW TENDER (collector output)
// ============================================================

/**
 * A tender as extracted by a collector, before validation.
 * Every field may be missing or blank at this point.
 */
export interface RawTender {
  identity?: string | null;
  title?: string | null;
  category?: string | null;
  department?: string | null;
  closingDate?: string | null;
  advertisedDate?: string | null;
  links?: string[] | null;
  scrapedAt?: string | null;
}

// ============================================================
// TENDER RECORD
// ============================================================

const displayText = z
  .string()
  .nullish()
  .transform(value => (value ?? '').trim());

export const TenderRecordSchema = z.object({
  /** External tender number, the deduplication key */
  identity: z.string().trim().min(1, 'identity must not be empty'),
  title: displayText,
  category: displayText,
  department: displayText,
  /** Closing date exactly as the source shows it */
  closingDate: displayText,
  /** ISO date (YYYY-MM-DD) when the closing date could be parsed */
  closingDateParsed: z.string().nullable(),
  advertisedDate: displayText,
  links: z
    .array(z.string())
    .nullish()
    .transform(value => (value ?? []).map(link => link.trim()).filter(link => link.length > 0)),
  /** Extraction timestamp assigned by the collector */
  scrapedAt: z.string().datetime(),
});

export type TenderRecord = Readonly<z.infer<typeof TenderRecordSchema>>;

/**
 * Comparison key for identities. The source is not consistent about
 * case or surrounding whitespace in tender numbers.
 */
export function identityKey(identity: string): string {
  return identity.trim().toLowerCase();
}
