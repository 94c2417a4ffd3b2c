/**
 * Tender Watch — Collector Module
 *
 * Produces the current snapshot of active tenders.
 */

import { HtmlTableCollector } from './html-table';
import { SnapshotFileCollector } from './snapshot-file';
import type { TenderCollector } from './base';
import type { MonitorConfig } from '../lib/config';
import { ConfigurationError } from '../lib/errors';

export { TenderCollector, matchesScope, type CollectOptions } from './base';
export { HtmlTableCollector, extractTenders, type HtmlTableCollectorOptions } from './html-table';
export { SnapshotFileCollector } from './snapshot-file';
export {
  parseTenderDetails,
  parseClosingDate,
  normalizeTender,
  normalizeTenders,
  type TenderDetails,
  type NormalizeResult,
} from './normalizer';

/**
 * Pick the collector for a run: a saved snapshot when one is given,
 * otherwise the live listing.
 */
export function createCollector(config: MonitorConfig, snapshotPath?: string): TenderCollector {
  if (snapshotPath) {
    return new SnapshotFileCollector(snapshotPath);
  }

  if (!config.listing.url) {
    throw new ConfigurationError('LISTING_URL is required unless a snapshot file is given');
  }

  return new HtmlTableCollector({
    url: config.listing.url,
    scopeParam: config.listing.scopeParam,
  });
}
