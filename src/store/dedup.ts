/**
 * Tender Watch — Snapshot Diff
 *
 * Splits a snapshot into tenders never seen before and duplicates.
 * Pure: the same snapshot and known-set always give the same partition.
 */

import { identityKey, type TenderRecord } from '../types';

/**
 * Result of diffing a snapshot against the seen-set.
 */
export interface DiffResult {
  /** Unseen tenders in snapshot order */
  newRecords: TenderRecord[];
  /** Already-known tenders plus repeats within the snapshot */
  duplicateCount: number;
  totalProcessed: number;
}

/**
 * Diff a snapshot against known identities.
 * Within the snapshot the first occurrence of an identity wins.
 */
export function diffSnapshot(
  snapshot: readonly TenderRecord[],
  known: ReadonlySet<string>
): DiffResult {
  const knownKeys = new Set<string>();
  for (const identity of known) {
    knownKeys.add(identityKey(identity));
  }

  const seen = new Set<string>();
  const newRecords: TenderRecord[] = [];
  let duplicateCount = 0;

  for (const record of snapshot) {
    const key = identityKey(record.identity);

    if (knownKeys.has(key) || seen.has(key)) {
      duplicateCount++;
      continue;
    }

    seen.add(key);
    newRecords.push(record);
  }

  return {
    newRecords,
    duplicateCount,
    totalProcessed: snapshot.length,
  };
}

/**
 * Drop repeated identities from a snapshot, keeping the first occurrence.
 */
export function uniqueByIdentity(snapshot: readonly TenderRecord[]): TenderRecord[] {
  return diffSnapshot(snapshot, new Set()).newRecords;
}
