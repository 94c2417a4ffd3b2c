/**
 * Tender Watch — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Tender records
export type { RawTender, TenderRecord } from './tender';
export { TenderRecordSchema, identityKey } from './tender';

// Delivery
export type {
  ChannelKind,
  MessageField,
  TenderMessage,
  SendSucceeded,
  SendFailed,
  SendResult,
  ChannelOutcome,
  RecordDeliveryStatus,
  RecordDelivery,
  ChannelTally,
  DispatchReport,
} from './delivery';
export { CHANNEL_KINDS } from './delivery';

// Pipeline
export type {
  RunStage,
  ActiveStage,
  RunMode,
  RunOutcome,
  RunSummary,
} from './pipeline';
