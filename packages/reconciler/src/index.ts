/**
 * @bondline/reconciler — Cross-chain reply correlation.
 *
 * Tracks what was dispatched and matches each asynchronous reply to it
 * by identifier. Reconciliation problems become discrepancies for
 * operator review instead of errors.
 */

export { TransferTracker } from "./transfer-tracker.js";
export type { NewTransfer, NewPendingReply } from "./transfer-tracker.js";

export { DiscrepancyLog } from "./discrepancy-log.js";

export type {
  TrackerErrorCode,
  DiscrepancyKind,
  DiscrepancySubject,
  DiscrepancyResolution,
  Discrepancy,
  NewDiscrepancy,
  DiscrepancyFilter,
  TrackedEntry,
  ReplyResolution,
  ReplyHandlers,
  SequenceListOptions,
  TrackerCheckpoint,
  ExportedTracker,
  ExportedDiscrepancies,
} from "./types.js";

export { TrackerError } from "./types.js";
