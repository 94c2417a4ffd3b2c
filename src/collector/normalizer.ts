/**
 * Tender Watch — Tender Normalizer
 *
 * Converts raw collector output into validated TenderRecords.
 * Records without an identity cannot be deduplicated and are rejected here,
 * before they can reach the seen-store.
 */

import { TenderRecordSchema, type RawTender, type TenderRecord } from '../types';
import { logger } from '../lib/logger';

// ============================================================
// DETAILS TEXT
// ============================================================

export interface TenderDetails {
  title: string;
  category: string;
  department: string;
}

const CATEGORY_LABEL = /\bcategory\s*[:\-]\s*(.+)$/i;
const DEPARTMENT_LABEL = /\b(?:department|dept|owner|organi[sz]ation|org)\.?\s*[:\-]\s*(.+)$/i;

/**
 * Split the free-text details cell of a listing row.
 *
 * The first line is the title. Labelled lines ("Category: ...",
 * "Department - ...", "Org: ...") fill category and department; when a label
 * is missing, the next unlabelled lines are used in order.
 */
export function parseTenderDetails(text: string): TenderDetails {
  const details: TenderDetails = { title: '', category: '', department: '' };

  const lines = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (lines.length === 0) return details;

  details.title = lines[0] ?? '';

  const unlabelled: string[] = [];

  for (const line of lines.slice(1)) {
    const category = CATEGORY_LABEL.exec(line);
    if (category?.[1]) {
      if (!details.category) details.category = category[1].trim();
      continue;
    }

    const department = DEPARTMENT_LABEL.exec(line);
    if (department?.[1]) {
      if (!details.department) details.department = department[1].trim();
      continue;
    }

    unlabelled.push(line);
  }

  if (!details.category && unlabelled.length > 0) {
    details.category = unlabelled.shift() ?? '';
  }
  if (!details.department && unlabelled.length > 0) {
    details.department = unlabelled.shift() ?? '';
  }

  return details;
}

// ============================================================
// DATES
// ============================================================

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function toIsoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

function monthNumber(name: string): number | undefined {
  return MONTHS[name.slice(0, 3).toLowerCase()];
}

/**
 * Best-effort parse of a closing date into YYYY-MM-DD.
 * The listing format is not stable, so null is an ordinary answer.
 */
export function parseClosingDate(text: string): string | null {
  const value = text.trim();
  if (!value) return null;

  // 2026-10-25, 2026-10-25T11:00
  let match = /^(\d{4})-(\d{1,2})-(\d{1,2})/.exec(value);
  if (match) {
    return toIsoDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  // 25/10/2026, 25-10-2026, 25.10.2026 (day first)
  match = /^(\d{1,2})[/.\-](\d{1,2})[/.\-](\d{4})/.exec(value);
  if (match) {
    return toIsoDate(Number(match[3]), Number(match[2]), Number(match[1]));
  }

  // 25 Oct, 2026 / 25 October 2026 / 25-Oct-2026
  match = /^(\d{1,2})[\s\-]+([A-Za-z]{3,9})[\s,\-]+(\d{4})/.exec(value);
  if (match) {
    const month = monthNumber(match[2] ?? '');
    return month ? toIsoDate(Number(match[3]), month, Number(match[1])) : null;
  }

  // Oct 25, 2026 / October 25 2026
  match = /^([A-Za-z]{3,9})\s+(\d{1,2}),?\s+(\d{4})/.exec(value);
  if (match) {
    const month = monthNumber(match[1] ?? '');
    return month ? toIsoDate(Number(match[3]), month, Number(match[2])) : null;
  }

  return null;
}

// ============================================================
// RECORDS
// ============================================================

function resolveScrapedAt(value: string | null | undefined, fallback: string): string {
  if (!value) return fallback;
  const timestamp = Date.parse(value);
  return Number.isNaN(timestamp) ? fallback : new Date(timestamp).toISOString();
}

/**
 * Validate one raw tender. Returns null when it cannot become a record.
 */
export function normalizeTender(
  raw: RawTender,
  scrapedAt: string = new Date().toISOString()
): TenderRecord | null {
  const parsed = TenderRecordSchema.safeParse({
    identity: raw.identity ?? '',
    title: raw.title,
    category: raw.category,
    department: raw.department,
    closingDate: raw.closingDate,
    closingDateParsed: parseClosingDate(raw.closingDate ?? ''),
    advertisedDate: raw.advertisedDate,
    links: raw.links,
    scrapedAt: resolveScrapedAt(raw.scrapedAt, scrapedAt),
  });

  if (!parsed.success) return null;

  return Object.freeze(parsed.data);
}

export interface NormalizeResult {
  records: TenderRecord[];
  rejected: number;
}

/**
 * Normalize a whole snapshot, preserving order.
 */
export function normalizeTenders(
  raws: RawTender[],
  scrapedAt: string = new Date().toISOString()
): NormalizeResult {
  const records: TenderRecord[] = [];
  let rejected = 0;

  raws.forEach((raw, index) => {
    const record = normalizeTender(raw, scrapedAt);
    if (record) {
      records.push(record);
    } else {
      rejected++;
      logger.warn('Rejected tender without a usable identity', {
        index,
        title: raw.title ?? '',
      });
    }
  });

  return { records, rejected };
}
