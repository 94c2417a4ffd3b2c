/**
 * Tender Watch — Pipeline Orchestrator
 *
 * One run: collect → diff → notify → commit.
 *
 *   idle → collecting → diffing → notifying → committing → done
 *                 ↘          ↘           ↘            ↘
 *                                 failed
 *
 * Notifications go out before the commit. A crash between the two means
 * the next run notifies those tenders again; it never drops one. Every
 * new tender is committed whatever happened to its notifications.
 */

import { nanoid } from 'nanoid';
import type {
  ActiveStage,
  DispatchReport,
  RunMode,
  RunStage,
  RunSummary,
  TenderRecord,
} from '../types';
import type { TenderCollector } from '../collector';
import { normalizeTenders } from '../collector';
import { diffSnapshot, uniqueByIdentity, type SeenStore } from '../store';
import type { ChannelBinding, Notifier } from '../delivery';
import {
  CommitFailed,
  MonitorError,
  OperationTimeout,
  RunCancelled,
  StoreUnavailable,
  errorMessage,
} from '../lib/errors';
import { logger, timeOperation, type Logger } from '../lib/logger';
import { withTimeout } from '../lib/timing';
import { buildSummary, exitCodeFor } from './summary';

// ============================================================
// TYPES
// ============================================================

export interface DryDeliveryDeps {
  collector: TenderCollector;
  notifier: Notifier;
  bindings: ChannelBinding[];
}

export interface MonitorDeps extends DryDeliveryDeps {
  store: SeenStore;
}

export interface RunOptions {
  scope: string | null;
  collectTimeoutMs: number;
  /** Deadline for each seen-store load or commit */
  storeTimeoutMs?: number;
  signal?: AbortSignal;
  runId?: string;
}

export interface RunResult {
  summary: RunSummary;
  exitCode: number;
  report?: DispatchReport;
  /** Every stage the run passed through, starting with idle */
  stages: RunStage[];
}

const DEFAULT_STORE_TIMEOUT_MS = 30_000;

const TRANSITIONS: Record<RunMode, Partial<Record<RunStage, RunStage[]>>> = {
  monitor: {
    idle: ['collecting'],
    collecting: ['diffing', 'failed'],
    diffing: ['notifying', 'done', 'failed'],
    notifying: ['committing', 'failed'],
    committing: ['done', 'failed'],
  },
  // No seen-store: the snapshot goes straight to the notifier
  dry_delivery: {
    idle: ['collecting'],
    collecting: ['notifying', 'done', 'failed'],
    notifying: ['done', 'failed'],
  },
};

function isActiveStage(stage: RunStage): stage is ActiveStage {
  return (
    stage === 'collecting' || stage === 'diffing' || stage === 'notifying' || stage === 'committing'
  );
}

// ============================================================
// RUN
// ============================================================

export class MonitorRun {
  readonly runId: string;

  private stage: RunStage = 'idle';
  private readonly stages: RunStage[] = ['idle'];
  private readonly log: Logger;
  private readonly storeTimeoutMs: number;

  private scraped = 0;
  private rejected = 0;
  private newCount = 0;
  private duplicates = 0;
  private report?: DispatchReport;
  private committed = false;

  constructor(
    readonly mode: RunMode,
    private readonly deps: DryDeliveryDeps & { store?: SeenStore },
    private readonly options: RunOptions
  ) {
    this.runId = options.runId ?? nanoid(10);
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS;
    this.log = logger.child({ runId: this.runId, mode });
  }

  get currentStage(): RunStage {
    return this.stage;
  }

  /**
   * Execute the run to a terminal stage. Stage failures are reported in
   * the result, not thrown.
   */
  async execute(): Promise<RunResult> {
    if (this.stage !== 'idle') {
      throw new Error(`Run ${this.runId} has already been executed`);
    }

    const startedAt = new Date();
    let failedStage: ActiveStage | undefined;
    let failure: string | undefined;
    let cancelled = false;

    this.log.info('Run started', { scope: this.options.scope ?? 'all' });

    try {
      if (this.mode === 'monitor') {
        await this.monitor();
      } else {
        await this.dryDelivery();
      }
    } catch (error) {
      const stage = isActiveStage(this.stage) ? this.stage : 'collecting';
      cancelled = error instanceof RunCancelled || this.options.signal?.aborted === true;

      failedStage = stage;
      failure = cancelled ? new RunCancelled(stage).message : errorMessage(error);
      this.transition('failed');

      this.log.error(cancelled ? 'Run cancelled' : 'Run failed', {
        stage,
        error: failure,
        errorType: error instanceof MonitorError ? error.name : 'Error',
      });
    } finally {
      await this.closeStore();
    }

    const summary = buildSummary({
      runId: this.runId,
      mode: this.mode,
      scope: this.options.scope,
      scraped: this.scraped,
      rejected: this.rejected,
      newCount: this.newCount,
      duplicates: this.duplicates,
      report: this.report,
      committed: this.committed,
      cancelled,
      failedStage,
      error: failure,
      startedAt,
      finishedAt: new Date(),
    });

    this.log.info('Run finished', {
      outcome: summary.outcome,
      stage: this.stage,
      durationMs: summary.durationMs,
    });

    return {
      summary,
      exitCode: exitCodeFor(summary),
      report: this.report,
      stages: [...this.stages],
    };
  }

  // ============================================================
  // MODES
  // ============================================================

  private async monitor(): Promise<void> {
    const snapshot = await this.collect();

    this.transition('diffing');
    const known = await this.loadSeen();
    const diff = diffSnapshot(snapshot, known);
    this.newCount = diff.newRecords.length;
    this.duplicates = diff.duplicateCount;

    this.log.info('Snapshot diffed', {
      known: known.size,
      new: this.newCount,
      duplicates: this.duplicates,
    });

    if (diff.newRecords.length === 0) {
      this.transition('done');
      return;
    }
    this.ensureNotCancelled();

    this.transition('notifying');
    await this.notify(diff.newRecords);

    this.transition('committing');
    await this.commit(diff.newRecords);

    this.transition('done');
  }

  private async dryDelivery(): Promise<void> {
    const snapshot = await this.collect();
    const records = uniqueByIdentity(snapshot);
    this.newCount = records.length;
    this.duplicates = snapshot.length - records.length;

    if (records.length === 0) {
      this.transition('done');
      return;
    }

    this.transition('notifying');
    await this.notify(records);

    this.transition('done');
  }

  // ============================================================
  // STAGES
  // ============================================================

  private async collect(): Promise<TenderRecord[]> {
    this.transition('collecting');

    const raw = await this.deps.collector.collectSnapshot(this.options.scope, {
      timeoutMs: this.options.collectTimeoutMs,
      signal: this.options.signal,
    });
    this.ensureNotCancelled();

    const { records, rejected } = normalizeTenders(raw);
    this.scraped = raw.length;
    this.rejected = rejected;

    return records;
  }

  private async loadSeen(): Promise<Set<string>> {
    const store = this.requireStore();

    try {
      return await timeOperation('Seen-set load', () =>
        withTimeout(signal => store.load(signal), {
          timeoutMs: this.storeTimeoutMs,
          label: `${store.name} load`,
          signal: this.options.signal,
        })
      );
    } catch (error) {
      if (this.options.signal?.aborted || error instanceof StoreUnavailable) throw error;
      throw new StoreUnavailable(errorMessage(error), error);
    }
  }

  private async notify(records: TenderRecord[]): Promise<void> {
    this.report = await this.deps.notifier.dispatch(records, this.deps.bindings, this.options.signal);
    this.ensureNotCancelled();
  }

  /**
   * Commit with a deadline. Not linked to the run's signal: a commit that
   * has started is only stopped by its deadline. The store is awaited even
   * past the deadline: `committed` matches what was written, and the store
   * is closed only after the write settles.
   */
  private async commit(records: TenderRecord[]): Promise<void> {
    const store = this.requireStore();
    const label = `${store.name} commit`;
    const deadline = new AbortController();
    const timer = setTimeout(
      () => deadline.abort(new OperationTimeout(label, this.storeTimeoutMs)),
      this.storeTimeoutMs
    );

    try {
      await store.commit(records, deadline.signal);
    } catch (error) {
      if (deadline.signal.aborted) {
        throw new CommitFailed(errorMessage(deadline.signal.reason), error);
      }
      if (error instanceof CommitFailed) throw error;
      throw new CommitFailed(errorMessage(error), error);
    } finally {
      clearTimeout(timer);
    }

    if (deadline.signal.aborted) {
      this.log.warn('Commit finished after its deadline', {
        store: store.name,
        timeoutMs: this.storeTimeoutMs,
      });
    }
    this.committed = true;
  }

  // ============================================================
  // HELPERS
  // ============================================================

  private transition(next: RunStage): void {
    const allowed = TRANSITIONS[this.mode][this.stage] ?? [];
    if (!allowed.includes(next)) {
      throw new Error(`Invalid run transition ${this.stage} → ${next}`);
    }

    this.log.debug('Stage transition', { from: this.stage, to: next });
    this.stage = next;
    this.stages.push(next);
  }

  private ensureNotCancelled(): void {
    if (this.options.signal?.aborted && isActiveStage(this.stage)) {
      throw new RunCancelled(this.stage);
    }
  }

  private requireStore(): SeenStore {
    if (!this.deps.store) {
      throw new Error(`A seen-store is required in ${this.mode} mode`);
    }
    return this.deps.store;
  }

  private async closeStore(): Promise<void> {
    if (!this.deps.store) return;

    try {
      await this.deps.store.close();
    } catch (error) {
      this.log.warn('Seen-store did not close cleanly', { error: errorMessage(error) });
    }
  }
}

// ============================================================
// ENTRY POINTS
// ============================================================

/**
 * Run the monitoring pipeline once.
 */
export function runMonitor(deps: MonitorDeps, options: RunOptions): Promise<RunResult> {
  return new MonitorRun('monitor', deps, options).execute();
}

/**
 * Send every active tender in scope, ignoring and never touching the
 * seen-store.
 */
export function runDryDelivery(deps: DryDeliveryDeps, options: RunOptions): Promise<RunResult> {
  return new MonitorRun('dry_delivery', deps, options).execute();
}
