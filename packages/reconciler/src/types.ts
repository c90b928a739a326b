/**
 * @bondline/reconciler domain types.
 *
 * Correlation of cross-chain transfers and local instructions with their
 * asynchronous replies:
 * - In-flight transfers ↔ acknowledgement / failure / timeout
 * - Pending instructions ↔ completion callback
 *
 * Anything that cannot be applied is recorded as a Discrepancy for
 * operator review, never retried automatically.
 */

import type {
  Amount,
  Identity,
  InFlightTransfer,
  InstructionKind,
  MessageId,
  PendingReply,
  Timestamp,
  TransferPurpose,
} from "@bondline/types";

// =============================================================================
// Errors
// =============================================================================

export type TrackerErrorCode =
  | "DUPLICATE_IDENTIFIER"
  | "INVALID_AMOUNT"
  | "DISCREPANCY_NOT_FOUND"
  | "ALREADY_RESOLVED"
  | "INVALID_SNAPSHOT";

export class TrackerError extends Error {
  public readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string) {
    super(message);
    this.name = "TrackerError";
    this.code = code;
  }
}

// =============================================================================
// Discrepancies
// =============================================================================

export type DiscrepancyKind =
  | "failure"             // Remote side reported failure
  | "timeout"             // No acknowledgement before the deadline
  | "unknown-identifier"  // Reply for nothing we dispatched
  | "settlement-rejected" // Confirmed unbond could not be applied to its batch
  | "settlement-clamped"; // Settlement floored a pool total at zero

/** What the discrepancy concerns. */
export type DiscrepancySubject = TransferPurpose | InstructionKind | "unknown";

export interface DiscrepancyResolution {
  readonly resolvedBy: Identity;
  readonly note: string;
  readonly resolvedAt: Timestamp;
}

export interface Discrepancy {
  readonly id: string;
  readonly identifier?: MessageId | undefined;
  readonly kind: DiscrepancyKind;
  readonly subject: DiscrepancySubject;
  readonly amount?: Amount | undefined;
  readonly batchId?: number | undefined;
  readonly reason: string;
  readonly detectedAt: Timestamp;
  readonly resolution?: DiscrepancyResolution | undefined;
}

export type NewDiscrepancy = Omit<Discrepancy, "id" | "resolution">;

export type DiscrepancyFilter = "open" | "resolved" | "all";

// =============================================================================
// Reply resolution
// =============================================================================

/** The tracked record a reply was matched against. */
export type TrackedEntry =
  | { readonly type: "transfer"; readonly transfer: InFlightTransfer }
  | { readonly type: "reply"; readonly reply: PendingReply };

/**
 * Result of applying a reply. Replies never throw; every outcome is data.
 */
export type ReplyResolution =
  | {
      readonly kind: "settled";
      readonly identifier: MessageId;
      readonly entry: TrackedEntry;
      readonly receivedAmount: Amount;
    }
  | {
      readonly kind: "discrepancy";
      readonly identifier: MessageId;
      readonly entry?: TrackedEntry | undefined;
      readonly discrepancy: Discrepancy;
    };

/**
 * Side effects the tracker triggers on a successful reply.
 */
export interface ReplyHandlers {
  /**
   * A batch's unbonding transfer arrived. Throwing rejects the settlement;
   * the rejection is recorded as a discrepancy.
   */
  onUnbondReceived(batchId: number, received: Amount, at: Timestamp): void;
}

// =============================================================================
// Listing / export
// =============================================================================

export interface SequenceListOptions {
  /** Only entries with a sequence strictly greater than this. */
  readonly startAfter?: number | undefined;
  readonly limit: number;
}

export interface TrackerCheckpoint {
  readonly transfers: ReadonlyMap<MessageId, InFlightTransfer>;
  readonly replies: ReadonlyMap<MessageId, PendingReply>;
  readonly sequence: number;
}

export interface ExportedTracker {
  readonly transfers: readonly InFlightTransfer[];
  readonly replies: readonly PendingReply[];
  readonly sequence: number;
}

export interface ExportedDiscrepancies {
  readonly entries: readonly Discrepancy[];
  readonly counter: number;
}
