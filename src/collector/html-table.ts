/**
 * Tender Watch — HTML Table Collector
 *
 * Reads the active-tenders listing page and extracts one RawTender per
 * table row. Expected columns:
 *   Sr No | Tender No | Tender Details | Downloads | Advertised | Closing
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { TenderCollector, matchesScope } from './base';
import { parseTenderDetails } from './normalizer';
import { CollectionFailed } from '../lib/errors';
import type { RawTender } from '../types';

const USER_AGENT = 'Mozilla/5.0 (compatible; TenderWatch/1.0)';
const HEADER_WORDS = ['sr no', 'tender no', 'tender details', 'downloads', 'advertisement', 'closing'];
const MIN_CELLS = 5;

export interface HtmlTableCollectorOptions {
  url: string;
  /** Query parameter the listing accepts for server-side scope filtering */
  scopeParam?: string;
}

export class HtmlTableCollector extends TenderCollector {
  readonly name = 'html_table';

  private readonly url: string;
  private readonly scopeParam?: string;

  constructor(options: HtmlTableCollectorOptions) {
    super();
    this.url = options.url;
    this.scopeParam = options.scopeParam;
  }

  async collect(scope: string | null, signal: AbortSignal): Promise<RawTender[]> {
    const url = new URL(this.url);
    if (scope && this.scopeParam) {
      url.searchParams.set(this.scopeParam, scope);
    }

    const response = await fetch(url, {
      headers: { 'User-Agent': USER_AGENT, Accept: 'text/html' },
      signal,
    });

    if (!response.ok) {
      throw new CollectionFailed(`listing returned HTTP ${response.status}`);
    }

    const html = await response.text();
    const tenders = extractTenders(cheerio.load(html), url.toString());

    // Without a server-side filter the scope is matched against the row text
    if (scope && !this.scopeParam) {
      return tenders.filter(tender =>
        matchesScope(scope, [tender.title, tender.category, tender.department])
      );
    }

    return tenders;
  }
}

// ============================================================
// EXTRACTION
// ============================================================

/**
 * Cell text with line breaks kept, so the details cell can be split.
 */
function cellText($: CheerioAPI, cell: Cheerio<Element>): string {
  const copy = cell.clone();
  copy.find('br').replaceWith('\n');
  copy.find('p, div, li').each((_, el) => {
    $(el).append('\n');
  });

  return copy
    .text()
    .split('\n')
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');
}

function isHeaderRow(rowText: string): boolean {
  return HEADER_WORDS.some(word => rowText.includes(word)) && !/\d/.test(rowText);
}

function resolveLink(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch {
    return null;
  }
}

/**
 * Extract tenders from a parsed listing page.
 * Throws CollectionFailed when the page has no table at all.
 */
export function extractTenders($: CheerioAPI, baseUrl: string): RawTender[] {
  if ($('table').length === 0) {
    throw new CollectionFailed('no tender table found on the listing page');
  }

  const scrapedAt = new Date().toISOString();
  const tenders: RawTender[] = [];

  $('table tr').each((_, row) => {
    const rowText = $(row).text().replace(/\s+/g, ' ').trim().toLowerCase();
    if (!rowText) return;
    if (rowText.includes('no record') || rowText.includes('no data')) return;
    if (isHeaderRow(rowText)) return;

    const cells = $(row).children('td');
    if (cells.length < MIN_CELLS) return;

    // A row without a tender number is kept so the normalizer counts it as rejected
    const identity = cellText($, cells.eq(1));
    const details = parseTenderDetails(cellText($, cells.eq(2)));

    const links: string[] = [];
    cells
      .eq(3)
      .find('a[href]')
      .each((_, anchor) => {
        const href = $(anchor).attr('href');
        const resolved = href ? resolveLink(href, baseUrl) : null;
        if (resolved) links.push(resolved);
      });

    tenders.push({
      identity,
      title: details.title,
      category: details.category,
      department: details.department,
      advertisedDate: cellText($, cells.eq(4)),
      closingDate: cells.length > 5 ? cellText($, cells.eq(5)) : '',
      links,
      scrapedAt,
    });
  });

  return tenders;
}
