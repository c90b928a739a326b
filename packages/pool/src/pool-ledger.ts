/**
 * @bondline/pool — PoolLedger.
 *
 * Holds the pool's running totals. Every mutation of PoolState goes
 * through one of three paths:
 * - applyStake() — native in, derivative minted
 * - applySettlement() — native unbonded, derivative burned
 * - accrueRewards() — native grows, derivative unchanged
 *
 * Quotes are side-effect free; callers quote, emit their instructions,
 * then apply.
 */

import type { Amount, PoolState } from "@bondline/types";
import { assertNonNegative, assertPositive, saturatingSub } from "./amount-math.js";
import { computeMintAmount, computeUnbondAmount } from "./exchange-rate.js";
import type { SettlementResult, UnderflowPolicy } from "./types.js";
import { EMPTY_POOL, PoolError } from "./types.js";

export class PoolLedger {
  private _state: PoolState;

  constructor(initial: PoolState = EMPTY_POOL) {
    PoolLedger.assertValid(initial);
    this._state = initial;
  }

  get state(): PoolState {
    return this._state;
  }

  // ─── Quotes ──────────────────────────────────────────────────────────

  /**
   * Derivative shares a deposit would mint at the current rate.
   *
   * Throws ZERO_MINT when a non-zero deposit rounds down to nothing:
   * the deposit is too small for the current rate.
   */
  quoteStake(deposit: Amount): Amount {
    assertPositive(deposit, "Deposit");

    const minted = computeMintAmount(
      this._state.totalNativeToken,
      this._state.totalDerivativeToken,
      deposit,
    );

    if (minted === 0n) {
      throw new PoolError(
        "ZERO_MINT",
        `Deposit of ${deposit.toString()} mints zero shares at the current rate`,
      );
    }

    return minted;
  }

  /**
   * Native amount released for `shares` at the current rate.
   */
  quoteUnbond(shares: Amount): Amount {
    return computeUnbondAmount(
      this._state.totalNativeToken,
      this._state.totalDerivativeToken,
      shares,
    );
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  applyStake(deposit: Amount, minted: Amount): PoolState {
    assertPositive(deposit, "Deposit");
    assertPositive(minted, "Minted shares");

    this._state = {
      ...this._state,
      totalNativeToken: this._state.totalNativeToken + deposit,
      totalDerivativeToken: this._state.totalDerivativeToken + minted,
    };
    return this._state;
  }

  /**
   * Deduct a submitted batch from the pool.
   *
   * Under "fail" an underflow throws SETTLEMENT_UNDERFLOW and nothing
   * changes. Under "clamp" totals floor at zero and the shortfall is
   * reported in the result.
   */
  applySettlement(
    unbonded: Amount,
    burned: Amount,
    policy: UnderflowPolicy,
  ): SettlementResult {
    assertNonNegative(unbonded, "Unbond amount");
    assertNonNegative(burned, "Burn amount");

    const native = saturatingSub(this._state.totalNativeToken, unbonded);
    const derivative = saturatingSub(this._state.totalDerivativeToken, burned);
    const clamped = native.shortfall > 0n || derivative.shortfall > 0n;

    if (clamped && policy === "fail") {
      throw new PoolError(
        "SETTLEMENT_UNDERFLOW",
        `Settlement exceeds pool totals: unbond ${unbonded.toString()} of ${this._state.totalNativeToken.toString()} native, burn ${burned.toString()} of ${this._state.totalDerivativeToken.toString()} derivative`,
      );
    }

    this._state = {
      ...this._state,
      totalNativeToken: native.value,
      totalDerivativeToken: derivative.value,
    };

    return {
      state: this._state,
      clamped,
      nativeShortfall: native.shortfall,
      derivativeShortfall: derivative.shortfall,
    };
  }

  /**
   * Add collected rewards. `net` backs the derivative supply;
   * `gross` (before fees) is added to the lifetime reward total.
   */
  accrueRewards(net: Amount, gross: Amount): PoolState {
    assertNonNegative(net, "Net reward");
    assertPositive(gross, "Gross reward");
    if (net > gross) {
      throw new PoolError(
        "INVALID_AMOUNT",
        `Net reward ${net.toString()} exceeds gross reward ${gross.toString()}`,
      );
    }

    this._state = {
      ...this._state,
      totalNativeToken: this._state.totalNativeToken + net,
      totalRewardAmount: this._state.totalRewardAmount + gross,
    };
    return this._state;
  }

  // ─── Checkpoint ──────────────────────────────────────────────────────

  /**
   * Replace the current totals. Used to roll back an aborted operation
   * and to restore from a snapshot.
   */
  restore(state: PoolState): void {
    PoolLedger.assertValid(state);
    this._state = state;
  }

  private static assertValid(state: PoolState): void {
    assertNonNegative(state.totalNativeToken, "Total native");
    assertNonNegative(state.totalDerivativeToken, "Total derivative");
    assertNonNegative(state.totalRewardAmount, "Total reward");
  }
}
