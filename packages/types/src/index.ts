/**
 * @bondline/types — Shared domain types for the Bondline stack.
 *
 * Used across all Bondline packages:
 * - Pool totals and settlement batches
 * - Cross-chain transfers and pending replies
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Staking types
export type {
  Amount,
  Identity,
  Timestamp,
  PoolState,
  LiquidUnstakeRequest,
  BatchStatus,
  Schedule,
  AmountSlot,
  Batch,
} from "./staking.js";

// Transfer types
export type {
  MessageId,
  TransferPurpose,
  InFlightTransfer,
  InstructionKind,
  PendingReply,
  ReplyOutcome,
} from "./transfer.js";
