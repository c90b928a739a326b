/**
 * Cross-Chain Transfer Types
 *
 * Records of value dispatched to the remote chain and of local
 * instructions awaiting their completion callback.
 *
 * Rules:
 * - Entries are correlated by identifier only, never by arrival order
 * - A batch is referenced by id; the batch record stays authoritative
 */

import type { Amount, Identity, Timestamp } from "./staking.js";

/** Identifier assigned by the transport or custody layer at dispatch time. */
export type MessageId = string;

/** Why value is moving across chains. */
export type TransferPurpose = "stake" | "unbond";

/**
 * A cross-chain transfer dispatched but not yet acknowledged.
 */
export interface InFlightTransfer {
  readonly id: MessageId;

  /** Tracker-assigned dispatch order, used for listing. */
  readonly sequence: number;
  readonly purpose: TransferPurpose;
  readonly batchId?: number | undefined;
  readonly amount: Amount;
  readonly destination: Identity;
  readonly dispatchedAt: Timestamp;
}

/** The kind of local instruction awaiting a reply. */
export type InstructionKind = "mint" | "burn" | "payout" | "fee";

/**
 * A locally-originated instruction awaiting its completion callback.
 */
export interface PendingReply {
  readonly id: MessageId;
  readonly sequence: number;
  readonly kind: InstructionKind;
  readonly amount: Amount;
  readonly batchId?: number | undefined;
  readonly dispatchedAt: Timestamp;
}

/**
 * Outcome delivered with a reply.
 *
 * A success may carry the amount actually received on this side;
 * when absent the dispatched amount is assumed.
 */
export type ReplyOutcome =
  | { readonly kind: "success"; readonly receivedAmount?: Amount | undefined }
  | { readonly kind: "failure"; readonly reason: string }
  | { readonly kind: "timeout" };
