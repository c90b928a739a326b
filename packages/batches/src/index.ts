/**
 * @bondline/batches — Unstake ledger and batch lifecycle.
 *
 * Collects unstake requests into periodic settlement windows:
 * - One open batch at a time, ids strictly increasing
 * - Requests accumulate per requester; totals always match
 * - Closed batches await their unbonding transfer, then unlock claims
 */

export { BatchManager } from "./batch-manager.js";

export { recordUnstake, sumShares, markRedeemed } from "./unstake-ledger.js";

export type {
  BatchErrorCode,
  BatchManagerOptions,
  RecordResult,
  CloseResult,
  ClaimableEntry,
  BatchListOptions,
  BatchCheckpoint,
  ExportedBatches,
} from "./types.js";

export { BatchError } from "./types.js";
