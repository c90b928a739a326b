/**
 * Request/Response DTOs.
 *
 * Request bodies and queries have a Zod schema and a derived type; route
 * handlers parse with these. Amounts travel as decimal strings (integers
 * are accepted on input).
 */

import { z } from "zod";
import { AmountSchema } from "@bondline/protocol";
import type { BatchView, DiscrepancyView, PoolStateView } from "@bondline/protocol";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PageQuerySchema = z.object({
  startAfter: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().optional(),
});

export type PageQuery = z.infer<typeof PageQuerySchema>;

export const IdentitySchema = z.string().min(1).max(128);

// =============================================================================
// Staking
// =============================================================================

export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export type AmountBody = z.infer<typeof AmountBodySchema>;

// =============================================================================
// Reconciliation
// =============================================================================

export const ReplyOutcomeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("success"), receivedAmount: AmountSchema.optional() }),
  z.object({ kind: z.literal("failure"), reason: z.string().min(1).max(1024) }),
  z.object({ kind: z.literal("timeout") }),
]);

export type ReplyOutcomeDto = z.infer<typeof ReplyOutcomeSchema>;

export const ListDiscrepanciesQuerySchema = z.object({
  status: z.enum(["open", "resolved", "all"]).default("all"),
});

export const ResolveDiscrepancySchema = z.object({
  note: z.string().min(1).max(1024),
});

// =============================================================================
// Admin
// =============================================================================

export const TransferOwnershipSchema = z.object({
  newOwner: IdentitySchema,
});

export const AddValidatorSchema = z.object({
  address: IdentitySchema,
});

// =============================================================================
// Responses
// =============================================================================

export interface StakeResponse {
  readonly deposit: string;
  readonly minted: string;
  readonly mintId: string;
  readonly transferId: string;
  readonly state: PoolStateView;
}

export interface SubmitResponse {
  readonly batch: BatchView;
  readonly nextBatchId: number;
  readonly unbondAmount: string;
  readonly burnId: string;
  readonly unbondTransferId: string;
  readonly clamped: DiscrepancyView | null;
}

export interface UnstakeResponse {
  readonly batch: BatchView;
  readonly submitted: SubmitResponse | null;
}

export interface ClaimResponse {
  readonly amount: string;
  readonly batchIds: readonly number[];
  readonly payoutId: string | null;
}

export interface RewardsResponse {
  readonly gross: string;
  readonly fee: string;
  readonly net: string;
  readonly feeId: string | null;
  readonly state: PoolStateView;
}

export type ReplyResponse =
  | { readonly kind: "settled"; readonly identifier: string; readonly receivedAmount: string }
  | { readonly kind: "discrepancy"; readonly identifier: string; readonly discrepancy: DiscrepancyView };

export interface InstructionView {
  readonly id: string;
  readonly type: string;
  readonly denom: string;
  readonly amount: string;
  readonly counterparty: string;
  readonly memo: string | null;
}
