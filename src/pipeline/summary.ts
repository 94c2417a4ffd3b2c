/**
 * Tender Watch — Run Summary
 *
 * The end-of-run report printed to the console and appended to the run log.
 */

import type { ActiveStage, ChannelKind, DispatchReport, RunMode, RunOutcome, RunSummary } from '../types';
import { CHANNEL_KINDS } from '../types';
import { channelLabel } from '../lib/config';
import { emptyTallies } from '../delivery';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CANCELLED = 130;

const OUTCOME_LABELS: Record<RunOutcome, string> = {
  nothing_new: 'Nothing new',
  all_delivered: 'All notifications delivered',
  delivery_failures: 'New tenders found, some notifications failed',
  pipeline_failed: 'Pipeline failed',
  cancelled: 'Cancelled',
};

export interface SummaryInput {
  runId: string;
  mode: RunMode;
  scope: string | null;
  scraped: number;
  rejected: number;
  newCount: number;
  duplicates: number;
  report?: DispatchReport;
  committed: boolean;
  cancelled: boolean;
  failedStage?: ActiveStage;
  error?: string;
  startedAt: Date;
  finishedAt: Date;
}

function resolveOutcome(input: SummaryInput): RunOutcome {
  if (input.cancelled) return 'cancelled';
  if (input.failedStage) return 'pipeline_failed';
  if (input.newCount === 0) return 'nothing_new';
  return input.report && input.report.delivered === input.newCount
    ? 'all_delivered'
    : 'delivery_failures';
}

export function buildSummary(input: SummaryInput): RunSummary {
  const { report } = input;

  return {
    runId: input.runId,
    mode: input.mode,
    scope: input.scope,
    outcome: resolveOutcome(input),
    scraped: input.scraped,
    rejected: input.rejected,
    newCount: input.newCount,
    duplicates: input.duplicates,
    channels: report?.channels ?? emptyTallies(),
    delivery: {
      delivered: report?.delivered ?? 0,
      partial: report?.partial ?? 0,
      failed: report?.failed ?? 0,
    },
    committed: input.committed,
    failedStage: input.failedStage,
    error: input.error,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    durationMs: input.finishedAt.getTime() - input.startedAt.getTime(),
  };
}

/**
 * 0 when the run got through its last stage, whatever happened to
 * individual notifications.
 */
export function exitCodeFor(summary: RunSummary): number {
  switch (summary.outcome) {
    case 'cancelled':
      return EXIT_CANCELLED;
    case 'pipeline_failed':
      return EXIT_FAILED;
    default:
      return EXIT_OK;
  }
}

function storedLabel(summary: RunSummary): string {
  if (summary.mode === 'dry_delivery') return 'skipped (dry delivery)';
  if (summary.committed) return 'yes';
  if (summary.outcome === 'nothing_new') return 'nothing to store';
  return 'no';
}

function line(label: string, value: string | number): string {
  return `${`${label}:`.padEnd(14)}${value}`;
}

function channelLine(summary: RunSummary, kind: ChannelKind): string {
  const tally = summary.channels[kind];
  return line(channelLabel(kind), `${tally.sent} sent, ${tally.failed} failed`);
}

/**
 * Render the summary as console lines.
 */
export function renderSummary(summary: RunSummary): string[] {
  const rule = '='.repeat(60);
  const title = summary.mode === 'dry_delivery' ? 'DRY DELIVERY SUMMARY' : 'RUN SUMMARY';

  const lines = [
    rule,
    title,
    rule,
    line('Run ID', summary.runId),
    line('Scope', summary.scope ?? 'all'),
    line('Outcome', OUTCOME_LABELS[summary.outcome]),
    line('Scraped', summary.scraped),
    line('Rejected', summary.rejected),
    line('New', summary.newCount),
    line('Duplicates', summary.duplicates),
    ...CHANNEL_KINDS.map(kind => channelLine(summary, kind)),
    line(
      'Delivery',
      `${summary.delivery.delivered} delivered, ${summary.delivery.partial} partial, ${summary.delivery.failed} failed`
    ),
    line('Stored', storedLabel(summary)),
  ];

  if (summary.failedStage) {
    lines.push(line('Failed stage', summary.failedStage));
  }
  if (summary.error) {
    lines.push(line('Error', summary.error));
  }

  lines.push(line('Duration', `${(summary.durationMs / 1000).toFixed(1)}s`), rule);
  return lines;
}
