/**
 * Tender Watch — Pipeline Run Types
 */

import type { ChannelKind, ChannelTally } from './delivery';

// ============================================================
// STATE MACHINE
// ============================================================

/**
 * Idle → Collecting → Diffing → Notifying → Committing → Done,
 * with Failed reachable from every active stage.
 */
export type RunStage =
  | 'idle'
  | 'collecting'
  | 'diffing'
  | 'notifying'
  | 'committing'
  | 'done'
  | 'failed';

export type ActiveStage = Extract<RunStage, 'collecting' | 'diffing' | 'notifying' | 'committing'>;

export type RunMode = 'monitor' | 'dry_delivery';

/**
 * What an operator needs to tell apart at a glance.
 */
export type RunOutcome =
  | 'nothing_new'
  | 'all_delivered'
  | 'delivery_failures'
  | 'pipeline_failed'
  | 'cancelled';

// ============================================================
// SUMMARY
// ============================================================

export interface RunSummary {
  runId: string;
  mode: RunMode;
  scope: string | null;
  outcome: RunOutcome;
  /** Records returned by the collector, before validation */
  scraped: number;
  /** Records dropped for an empty identity */
  rejected: number;
  newCount: number;
  duplicates: number;
  channels: Record<ChannelKind, ChannelTally>;
  delivery: {
    delivered: number;
    partial: number;
    failed: number;
  };
  committed: boolean;
  failedStage?: ActiveStage;
  error?: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}
