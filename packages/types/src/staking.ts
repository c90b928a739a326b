/**
 * Staking Types
 *
 * Pool totals, unstake requests and settlement batches.
 *
 * Rules:
 * - Amounts are non-negative integers in base units (bigint)
 * - Timestamps are Unix seconds taken from the calling context
 * - Optional batch fields are explicit sum types, never null
 */

/** An integer token amount in base units. */
export type Amount = bigint;

/** A validated account identity (address string). */
export type Identity = string;

/** Unix time in seconds. */
export type Timestamp = number;

/**
 * Running totals of the staking pool.
 */
export interface PoolState {
  /** Native token backing the derivative supply. */
  readonly totalNativeToken: Amount;

  /** Derivative (liquid-stake) token in circulation. */
  readonly totalDerivativeToken: Amount;

  /** Gross rewards collected over the lifetime of the pool. */
  readonly totalRewardAmount: Amount;
}

/**
 * One requester's claim inside a batch.
 * Repeated unstakes in the same open batch accumulate into `shares`.
 */
export interface LiquidUnstakeRequest {
  readonly requester: Identity;
  readonly shares: Amount;
  readonly redeemed: boolean;
}

export type BatchStatus = "pending" | "submitted" | "received";

/** When the batch should next be acted on. */
export type Schedule =
  | { readonly kind: "unset" }
  | { readonly kind: "scheduled"; readonly at: Timestamp };

/** An amount that becomes known at a later lifecycle phase. */
export type AmountSlot =
  | { readonly kind: "unset" }
  | { readonly kind: "known"; readonly amount: Amount };

/**
 * A settlement window collecting unstake requests.
 *
 * Invariant: totalDerivative equals the sum of all request shares.
 */
export interface Batch {
  /** Monotonic id starting at 1, no gaps or reuse. */
  readonly id: number;
  readonly status: BatchStatus;

  /** Sum of derivative shares requested in this batch. */
  readonly totalDerivative: Amount;

  /** Native amount computed at submission. */
  readonly expectedNativeUnbond: AmountSlot;

  /** Native amount confirmed by the unbonding transfer. */
  readonly receivedNativeUnbond: AmountSlot;

  /** Close time while pending, unbonding maturity once submitted. */
  readonly nextActionTime: Schedule;

  readonly requests: ReadonlyMap<Identity, LiquidUnstakeRequest>;
}
