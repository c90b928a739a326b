/**
 * Unstake Ledger
 *
 * Pure functions over a batch's requester → request map. Each returns a
 * new Batch; the input is never mutated.
 *
 * Invariant: batch.totalDerivative === sumShares(batch.requests)
 */

import type { Amount, Batch, Identity, LiquidUnstakeRequest } from "@bondline/types";
import { BatchError } from "./types.js";

/**
 * Record an unstake of `amount` derivative shares for `requester`.
 *
 * Accumulates into an existing request or inserts a new one, and adds
 * `amount` to the batch total. The batch must be pending.
 */
export function recordUnstake(
  batch: Batch,
  requester: Identity,
  amount: Amount,
  minimum: Amount,
): Batch {
  if (amount <= 0n) {
    throw new BatchError(
      "INVALID_AMOUNT",
      `Unstake amount must be positive, got ${amount.toString()}`,
    );
  }
  if (amount < minimum) {
    throw new BatchError(
      "BELOW_MINIMUM",
      `Unstake amount ${amount.toString()} is below the minimum of ${minimum.toString()}`,
    );
  }
  if (batch.status !== "pending") {
    throw new BatchError(
      "BATCH_NOT_PENDING",
      `Batch ${String(batch.id)} is ${batch.status}, not pending`,
    );
  }

  const existing = batch.requests.get(requester);
  const request: LiquidUnstakeRequest = existing
    ? { ...existing, shares: existing.shares + amount }
    : { requester, shares: amount, redeemed: false };

  const requests = new Map(batch.requests);
  requests.set(requester, request);

  return {
    ...batch,
    requests,
    totalDerivative: batch.totalDerivative + amount,
  };
}

/**
 * Sum of all request shares.
 */
export function sumShares(
  requests: ReadonlyMap<Identity, LiquidUnstakeRequest>,
): Amount {
  let total = 0n;
  for (const request of requests.values()) {
    total += request.shares;
  }
  return total;
}

/**
 * Flip `redeemed` on the requester's entry.
 */
export function markRedeemed(batch: Batch, requester: Identity): Batch {
  const request = batch.requests.get(requester);
  if (!request) {
    throw new BatchError(
      "REQUEST_NOT_FOUND",
      `No request from '${requester}' in batch ${String(batch.id)}`,
    );
  }
  if (request.redeemed) {
    throw new BatchError(
      "ALREADY_REDEEMED",
      `Request from '${requester}' in batch ${String(batch.id)} is already redeemed`,
    );
  }

  const requests = new Map(batch.requests);
  requests.set(requester, { ...request, redeemed: true });
  return { ...batch, requests };
}
