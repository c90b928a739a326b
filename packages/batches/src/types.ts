/**
 * @bondline/batches — Types for the unstake ledger and batch lifecycle.
 */

import type { Amount, Batch, LiquidUnstakeRequest } from "@bondline/types";

// =============================================================================
// Errors
// =============================================================================

export type BatchErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_OPTIONS"
  | "BELOW_MINIMUM"
  | "BATCH_NOT_FOUND"
  | "BATCH_NOT_PENDING"
  | "BATCH_NOT_SUBMITTED"
  | "BATCH_NOT_RECEIVED"
  | "EMPTY_BATCH"
  | "REQUEST_NOT_FOUND"
  | "ALREADY_REDEEMED"
  | "INVALID_SNAPSHOT";

export class BatchError extends Error {
  public readonly code: BatchErrorCode;

  constructor(code: BatchErrorCode, message: string) {
    super(message);
    this.name = "BatchError";
    this.code = code;
  }
}

// =============================================================================
// Manager configuration
// =============================================================================

export interface BatchManagerOptions {
  /** Seconds a batch stays open before it is due for submission. */
  readonly batchPeriod: number;

  /** Seconds between submission and expected unbonding maturity. */
  readonly unbondingPeriod: number;

  /** Smallest amount a single unstake may record. At least 1. */
  readonly minimumUnstake: Amount;
}

// =============================================================================
// Results
// =============================================================================

export interface RecordResult {
  /** The open batch after recording. */
  readonly batch: Batch;

  /** Whether the open batch's close time has been reached. */
  readonly due: boolean;
}

export interface CloseResult {
  readonly submitted: Batch;
  readonly opened: Batch;
}

/** A received batch holding an unredeemed request for some user. */
export interface ClaimableEntry {
  readonly batch: Batch;
  readonly request: LiquidUnstakeRequest;
}

export interface BatchListOptions {
  /** Only batches with an id strictly greater than this. */
  readonly startAfter?: number | undefined;
  readonly limit: number;
}

// =============================================================================
// Export / import
// =============================================================================

/** Opaque copy of manager state, used for rollback. */
export interface BatchCheckpoint {
  readonly batches: ReadonlyMap<number, Batch>;
  readonly pendingBatchId: number;
}

export interface ExportedBatches {
  readonly batches: readonly Batch[];
  readonly pendingBatchId: number;
}
