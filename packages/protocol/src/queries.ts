/**
 * Read projections.
 *
 * JSON-ready views of protocol state: amounts as decimal strings, unset
 * slots as null, requests ordered by requester. The same views make up
 * the persisted snapshot.
 */

import type { Discrepancy } from "@bondline/reconciler";
import type {
  AmountSlot,
  Batch,
  BatchStatus,
  InFlightTransfer,
  InstructionKind,
  PendingReply,
  Schedule,
  TransferPurpose,
} from "@bondline/types";
import type { ProtocolConfig } from "./config.js";

// =============================================================================
// Pagination
// =============================================================================

export const DEFAULT_PAGE_LIMIT = 10;
export const MAX_PAGE_LIMIT = 30;

export interface PageOptions {
  readonly startAfter?: number | undefined;
  readonly limit?: number | undefined;
}

/**
 * Default 10, capped at 30, at least 1.
 */
export function resolveLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_PAGE_LIMIT;
  return Math.min(Math.max(Math.floor(limit), 1), MAX_PAGE_LIMIT);
}

// =============================================================================
// Views
// =============================================================================

export interface ConfigView {
  readonly protocolAddress: string;
  readonly owner: string;
  readonly nativeDenom: string;
  readonly derivativeDenom: string;
  readonly treasuryAddress: string;
  readonly stakerAddress: string;
  readonly operators: readonly string[];
  readonly validators: readonly string[];
  readonly batchPeriod: number;
  readonly unbondingPeriod: number;
  readonly protocolFeeBps: number;
  readonly minimumLiquidStakeAmount: string;
  readonly minimumLiquidUnstakeAmount: string;
  readonly minimumRewardsToCollect: string;
  readonly underflowPolicy: "fail" | "clamp";
}

export interface PoolStateView {
  readonly totalNativeToken: string;
  readonly totalDerivativeToken: string;
  readonly totalRewardAmount: string;
  /** Derivative per native token. */
  readonly redemptionRate: string;
  readonly pendingBatchId: number;
  readonly owner: string;
  readonly pendingOwner: string | null;
  readonly validators: readonly string[];
  readonly inFlightTransfers: number;
  readonly pendingReplies: number;
  readonly openDiscrepancies: number;
}

export interface UnstakeRequestView {
  readonly requester: string;
  readonly shares: string;
  readonly redeemed: boolean;
}

export interface BatchView {
  readonly id: number;
  readonly status: BatchStatus;
  readonly totalDerivative: string;
  readonly expectedNativeUnbond: string | null;
  readonly receivedNativeUnbond: string | null;
  readonly nextActionTime: number | null;
  readonly requests: readonly UnstakeRequestView[];
}

export interface TransferView {
  readonly id: string;
  readonly sequence: number;
  readonly purpose: TransferPurpose;
  readonly batchId: number | null;
  readonly amount: string;
  readonly destination: string;
  readonly dispatchedAt: number;
}

export interface ReplyView {
  readonly id: string;
  readonly sequence: number;
  readonly kind: InstructionKind;
  readonly batchId: number | null;
  readonly amount: string;
  readonly dispatchedAt: number;
}

export interface DiscrepancyView {
  readonly id: string;
  readonly identifier: string | null;
  readonly kind: Discrepancy["kind"];
  readonly subject: Discrepancy["subject"];
  readonly amount: string | null;
  readonly batchId: number | null;
  readonly reason: string;
  readonly detectedAt: number;
  readonly resolution: {
    readonly resolvedBy: string;
    readonly note: string;
    readonly resolvedAt: number;
  } | null;
}

export interface ClaimableView {
  readonly batchId: number;
  readonly shares: string;
  readonly receivedNativeUnbond: string;
  readonly claimAmount: string;
}

// =============================================================================
// Converters
// =============================================================================

function slot(value: AmountSlot): string | null {
  return value.kind === "known" ? value.amount.toString() : null;
}

function schedule(value: Schedule): number | null {
  return value.kind === "scheduled" ? value.at : null;
}

export function toConfigView(config: ProtocolConfig): ConfigView {
  return {
    protocolAddress: config.protocolAddress,
    owner: config.owner,
    nativeDenom: config.nativeDenom,
    derivativeDenom: config.derivativeDenom,
    treasuryAddress: config.treasuryAddress,
    stakerAddress: config.stakerAddress,
    operators: [...config.operators],
    validators: [...config.validators],
    batchPeriod: config.batchPeriod,
    unbondingPeriod: config.unbondingPeriod,
    protocolFeeBps: config.protocolFeeBps,
    minimumLiquidStakeAmount: config.minimumLiquidStakeAmount.toString(),
    minimumLiquidUnstakeAmount: config.minimumLiquidUnstakeAmount.toString(),
    minimumRewardsToCollect: config.minimumRewardsToCollect.toString(),
    underflowPolicy: config.underflowPolicy,
  };
}

export function toBatchView(batch: Batch): BatchView {
  const requests = [...batch.requests.values()]
    .sort((a, b) => (a.requester < b.requester ? -1 : a.requester > b.requester ? 1 : 0))
    .map((r) => ({ requester: r.requester, shares: r.shares.toString(), redeemed: r.redeemed }));

  return {
    id: batch.id,
    status: batch.status,
    totalDerivative: batch.totalDerivative.toString(),
    expectedNativeUnbond: slot(batch.expectedNativeUnbond),
    receivedNativeUnbond: slot(batch.receivedNativeUnbond),
    nextActionTime: schedule(batch.nextActionTime),
    requests,
  };
}

export function toTransferView(transfer: InFlightTransfer): TransferView {
  return {
    id: transfer.id,
    sequence: transfer.sequence,
    purpose: transfer.purpose,
    batchId: transfer.batchId ?? null,
    amount: transfer.amount.toString(),
    destination: transfer.destination,
    dispatchedAt: transfer.dispatchedAt,
  };
}

export function toReplyView(reply: PendingReply): ReplyView {
  return {
    id: reply.id,
    sequence: reply.sequence,
    kind: reply.kind,
    batchId: reply.batchId ?? null,
    amount: reply.amount.toString(),
    dispatchedAt: reply.dispatchedAt,
  };
}

export function toDiscrepancyView(discrepancy: Discrepancy): DiscrepancyView {
  return {
    id: discrepancy.id,
    identifier: discrepancy.identifier ?? null,
    kind: discrepancy.kind,
    subject: discrepancy.subject,
    amount: discrepancy.amount === undefined ? null : discrepancy.amount.toString(),
    batchId: discrepancy.batchId ?? null,
    reason: discrepancy.reason,
    detectedAt: discrepancy.detectedAt,
    resolution: discrepancy.resolution
      ? {
          resolvedBy: discrepancy.resolution.resolvedBy,
          note: discrepancy.resolution.note,
          resolvedAt: discrepancy.resolution.resolvedAt,
        }
      : null,
  };
}
