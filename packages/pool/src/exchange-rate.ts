/**
 * Exchange-Rate Calculator
 *
 * Pure conversions between native amounts and derivative shares,
 * given the current pool totals. Every division floors, so rounding
 * never mints or releases more value than the pool backs.
 */

import type { Amount, PoolState } from "@bondline/types";
import { assertNonNegative, formatRatio } from "./amount-math.js";
import { PoolError } from "./types.js";

/** Fractional digits of the published redemption rate. */
export const RATE_DECIMALS = 18;

/** Fees are expressed in basis points of this denominator. */
export const BPS_DENOMINATOR = 10_000n;

/**
 * Derivative shares to mint for a native deposit.
 *
 * - Empty derivative supply: 1:1 bootstrap, returns `deposit`
 * - Otherwise: floor(deposit * totalDerivative / totalNative)
 *
 * A pool with derivative supply and no native backing cannot price
 * a deposit and throws DEPLETED_POOL.
 */
export function computeMintAmount(
  totalNative: Amount,
  totalDerivative: Amount,
  deposit: Amount,
): Amount {
  assertNonNegative(totalNative, "Total native");
  assertNonNegative(totalDerivative, "Total derivative");
  assertNonNegative(deposit, "Deposit");

  if (totalDerivative === 0n) {
    return deposit;
  }

  if (totalNative === 0n) {
    throw new PoolError(
      "DEPLETED_POOL",
      `Pool has ${totalDerivative.toString()} derivative outstanding and no native backing`,
    );
  }

  return (deposit * totalDerivative) / totalNative;
}

/**
 * Native amount released for redeemed derivative shares.
 *
 * floor(shares * totalNative / totalDerivative), or zero on an empty pool.
 */
export function computeUnbondAmount(
  totalNative: Amount,
  totalDerivative: Amount,
  shares: Amount,
): Amount {
  assertNonNegative(totalNative, "Total native");
  assertNonNegative(totalDerivative, "Total derivative");
  assertNonNegative(shares, "Shares");

  if (totalDerivative === 0n) {
    return 0n;
  }

  return (shares * totalNative) / totalDerivative;
}

/**
 * A requester's pro-rata part of a batch's received native amount.
 *
 * floor(shares * received / batchTotal). The sum over all requests of a
 * batch never exceeds `received`.
 */
export function computeClaimAmount(
  shares: Amount,
  received: Amount,
  batchTotal: Amount,
): Amount {
  assertNonNegative(shares, "Shares");
  assertNonNegative(received, "Received amount");
  assertNonNegative(batchTotal, "Batch total");

  if (batchTotal === 0n) {
    return 0n;
  }

  return (shares * received) / batchTotal;
}

/**
 * Protocol fee on collected rewards, floored.
 */
export function computeProtocolFee(amount: Amount, feeBps: number): Amount {
  assertNonNegative(amount, "Reward amount");

  if (!Number.isInteger(feeBps) || feeBps < 0 || BigInt(feeBps) > BPS_DENOMINATOR) {
    throw new PoolError(
      "INVALID_FEE",
      `Fee must be an integer between 0 and ${BPS_DENOMINATOR.toString()} bps, got ${String(feeBps)}`,
    );
  }

  return (amount * BigInt(feeBps)) / BPS_DENOMINATOR;
}

/**
 * Derivative tokens per native token, as a decimal string.
 * "0" while the pool holds no native token.
 */
export function computeRedemptionRate(state: PoolState): string {
  if (state.totalNativeToken === 0n) {
    return "0";
  }
  return formatRatio(state.totalDerivativeToken, state.totalNativeToken, RATE_DECIMALS);
}
