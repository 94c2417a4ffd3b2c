/**
 * Tender Watch — Pipeline Module
 *
 * Runs collect → diff → notify → commit and reports the outcome.
 */

export {
  MonitorRun,
  runMonitor,
  runDryDelivery,
  type MonitorDeps,
  type DryDeliveryDeps,
  type RunOptions,
  type RunResult,
} from './orchestrator';

export {
  buildSummary,
  renderSummary,
  exitCodeFor,
  EXIT_OK,
  EXIT_FAILED,
  EXIT_CANCELLED,
  type SummaryInput,
} from './summary';
