/**
 * @bondline/pool — Internal types for the pool engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid amounts throw, never silently succeed
 */

import type { Amount, PoolState } from "@bondline/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for pool operations. */
export type PoolErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_FEE"
  | "ZERO_MINT"
  | "DEPLETED_POOL"
  | "SETTLEMENT_UNDERFLOW";

/**
 * Structured error from the pool engine.
 * Always thrown — never returns error codes silently.
 */
export class PoolError extends Error {
  public readonly code: PoolErrorCode;

  constructor(code: PoolErrorCode, message: string) {
    super(message);
    this.name = "PoolError";
    this.code = code;
  }
}

// ─── Settlement ──────────────────────────────────────────────────────────

/**
 * What to do when a settlement would take a total below zero.
 *
 * - "fail": abort with SETTLEMENT_UNDERFLOW, state unchanged
 * - "clamp": floor the total at zero and report the shortfall
 */
export type UnderflowPolicy = "fail" | "clamp";

/**
 * Result of applying a batch settlement to the pool.
 */
export interface SettlementResult {
  readonly state: PoolState;
  /** Whether any total was floored at zero. */
  readonly clamped: boolean;
  /** Native amount that could not be deducted. */
  readonly nativeShortfall: Amount;
  /** Derivative amount that could not be deducted. */
  readonly derivativeShortfall: Amount;
}

/** A pool with nothing staked. */
export const EMPTY_POOL: PoolState = {
  totalNativeToken: 0n,
  totalDerivativeToken: 0n,
  totalRewardAmount: 0n,
};
