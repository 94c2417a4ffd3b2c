/**
 * Tests for Run Summary
 */

import { describe, it, expect } from 'vitest';
import {
  EXIT_CANCELLED,
  EXIT_FAILED,
  EXIT_OK,
  buildSummary,
  exitCodeFor,
  renderSummary,
  type SummaryInput,
} from '../../src/pipeline/summary';
import type { DispatchReport } from '../../src/types';

const RULE = '='.repeat(60);

const report: DispatchReport = {
  records: [],
  channels: {
    push: { sent: 2, failed: 0 },
    email: { sent: 1, failed: 1 },
  },
  delivered: 1,
  partial: 1,
  failed: 0,
  cancelled: false,
  durationMs: 10,
};

function input(overrides: Partial<SummaryInput> = {}): SummaryInput {
  return {
    runId: 'run-test',
    mode: 'monitor',
    scope: 'Chakwal',
    scraped: 3,
    rejected: 0,
    newCount: 2,
    duplicates: 1,
    report,
    committed: true,
    cancelled: false,
    startedAt: new Date('2026-10-19T06:00:00.000Z'),
    finishedAt: new Date('2026-10-19T06:00:02.500Z'),
    ...overrides,
  };
}

describe('Run Summary', () => {
  describe('buildSummary', () => {
    it('should report delivery failures when not every new tender was delivered', () => {
      const summary = buildSummary(input());

      expect(summary.outcome).toBe('delivery_failures');
      expect(summary.durationMs).toBe(2500);
      expect(summary.startedAt).toBe('2026-10-19T06:00:00.000Z');
      expect(exitCodeFor(summary)).toBe(EXIT_OK);
    });

    it('should report all delivered when every new tender was delivered', () => {
      const summary = buildSummary(input({ report: { ...report, delivered: 2, partial: 0 } }));

      expect(summary.outcome).toBe('all_delivered');
    });

    it('should report nothing new without a dispatch', () => {
      const summary = buildSummary(
        input({ newCount: 0, duplicates: 3, report: undefined, committed: false })
      );

      expect(summary.outcome).toBe('nothing_new');
      expect(summary.channels).toEqual({
        push: { sent: 0, failed: 0 },
        email: { sent: 0, failed: 0 },
      });
      expect(exitCodeFor(summary)).toBe(EXIT_OK);
    });

    it('should exit 1 for a failed stage', () => {
      const summary = buildSummary(
        input({ failedStage: 'committing', error: 'Commit failed: disk full', committed: false })
      );

      expect(summary.outcome).toBe('pipeline_failed');
      expect(exitCodeFor(summary)).toBe(EXIT_FAILED);
    });

    it('should put cancellation ahead of the failed stage', () => {
      const summary = buildSummary(
        input({ cancelled: true, failedStage: 'notifying', committed: false })
      );

      expect(summary.outcome).toBe('cancelled');
      expect(exitCodeFor(summary)).toBe(EXIT_CANCELLED);
    });
  });

  describe('renderSummary', () => {
    it('should render a completed run', () => {
      expect(renderSummary(buildSummary(input()))).toEqual([
        RULE,
        'RUN SUMMARY',
        RULE,
        'Run ID:       run-test',
        'Scope:        Chakwal',
        'Outcome:      New tenders found, some notifications failed',
        'Scraped:      3',
        'Rejected:     0',
        'New:          2',
        'Duplicates:   1',
        'WhatsApp:     2 sent, 0 failed',
        'Email:        1 sent, 1 failed',
        'Delivery:     1 delivered, 1 partial, 0 failed',
        'Stored:       yes',
        'Duration:     2.5s',
        RULE,
      ]);
    });

    it('should include the failed stage and error', () => {
      const lines = renderSummary(
        buildSummary(
          input({
            cancelled: true,
            failedStage: 'notifying',
            error: 'Run cancelled during notifying',
            committed: false,
          })
        )
      );

      expect(lines).toContain('Outcome:      Cancelled');
      expect(lines).toContain('Stored:       no');
      expect(lines).toContain('Failed stage: notifying');
      expect(lines).toContain('Error:        Run cancelled during notifying');
    });

    it('should label a run with nothing new', () => {
      const lines = renderSummary(
        buildSummary(input({ scope: null, newCount: 0, report: undefined, committed: false }))
      );

      expect(lines).toContain('Scope:        all');
      expect(lines).toContain('Outcome:      Nothing new');
      expect(lines).toContain('Stored:       nothing to store');
    });

    it('should title a dry delivery and never report it as stored', () => {
      const lines = renderSummary(buildSummary(input({ mode: 'dry_delivery', committed: false })));

      expect(lines[1]).toBe('DRY DELIVERY SUMMARY');
      expect(lines).toContain('Stored:       skipped (dry delivery)');
    });
  });
});
