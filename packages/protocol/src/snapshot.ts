/**
 * Protocol snapshots.
 *
 * A snapshot is the full persisted state as plain JSON: config, pool
 * totals, every batch (pending included), tracker maps, discrepancies
 * and admin state. The state hash is SHA-256 over its RFC 8785
 * canonical form, so equal state always hashes equally.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { ExportedBatches } from "@bondline/batches";
import type {
  Discrepancy,
  ExportedDiscrepancies,
  ExportedTracker,
} from "@bondline/reconciler";
import type { Batch, InFlightTransfer, PendingReply, PoolState } from "@bondline/types";
import type { AdminState } from "./admin.js";
import type { ProtocolConfig } from "./config.js";
import { parseProtocolConfig } from "./config.js";
import type {
  BatchView,
  ConfigView,
  DiscrepancyView,
  ReplyView,
  TransferView,
} from "./queries.js";
import { ProtocolError } from "./types.js";

export const SNAPSHOT_VERSION = 1;

export interface ProtocolSnapshot {
  readonly version: typeof SNAPSHOT_VERSION;
  readonly config: ConfigView;
  readonly pool: {
    readonly totalNativeToken: string;
    readonly totalDerivativeToken: string;
    readonly totalRewardAmount: string;
  };
  readonly batches: readonly BatchView[];
  readonly pendingBatchId: number;
  readonly tracker: {
    readonly transfers: readonly TransferView[];
    readonly replies: readonly ReplyView[];
    readonly sequence: number;
  };
  readonly discrepancies: {
    readonly entries: readonly DiscrepancyView[];
    readonly counter: number;
  };
  readonly admin: {
    readonly owner: string;
    readonly pendingOwner: string | null;
    readonly validators: readonly string[];
  };
}

/** Snapshot contents converted back into domain values. */
export interface RestoredState {
  readonly config: ProtocolConfig;
  readonly pool: PoolState;
  readonly batches: ExportedBatches;
  readonly tracker: ExportedTracker;
  readonly discrepancies: ExportedDiscrepancies;
  readonly admin: AdminState;
}

// =============================================================================
// Hashing
// =============================================================================

export function hashSnapshot(snapshot: ProtocolSnapshot): string {
  return createHash("sha256").update(canonicalize(snapshot)).digest("hex");
}

// =============================================================================
// Parsing
// =============================================================================

const amount = z.string().regex(/^\d+$/).transform((v) => BigInt(v));
const timestamp = z.number().int().nonnegative();
const batchId = z.number().int().positive();

const BatchSchema = z
  .object({
    id: batchId,
    status: z.enum(["pending", "submitted", "received"]),
    totalDerivative: amount,
    expectedNativeUnbond: amount.nullable(),
    receivedNativeUnbond: amount.nullable(),
    nextActionTime: timestamp.nullable(),
    requests: z.array(
      z.object({ requester: z.string().min(1), shares: amount, redeemed: z.boolean() }),
    ),
  })
  .refine((b) => new Set(b.requests.map((r) => r.requester)).size === b.requests.length, {
    message: "Requesters must be unique within a batch",
  })
  .transform(
    (b): Batch => ({
      id: b.id,
      status: b.status,
      totalDerivative: b.totalDerivative,
      expectedNativeUnbond:
        b.expectedNativeUnbond === null
          ? { kind: "unset" }
          : { kind: "known", amount: b.expectedNativeUnbond },
      receivedNativeUnbond:
        b.receivedNativeUnbond === null
          ? { kind: "unset" }
          : { kind: "known", amount: b.receivedNativeUnbond },
      nextActionTime:
        b.nextActionTime === null ? { kind: "unset" } : { kind: "scheduled", at: b.nextActionTime },
      requests: new Map(b.requests.map((r) => [r.requester, r] as const)),
    }),
  );

const TransferSchema = z
  .object({
    id: z.string().min(1),
    sequence: z.number().int().positive(),
    purpose: z.enum(["stake", "unbond"]),
    batchId: batchId.nullable(),
    amount,
    destination: z.string().min(1),
    dispatchedAt: timestamp,
  })
  .transform((t): InFlightTransfer => ({ ...t, batchId: t.batchId ?? undefined }));

const ReplySchema = z
  .object({
    id: z.string().min(1),
    sequence: z.number().int().positive(),
    kind: z.enum(["mint", "burn", "payout", "fee"]),
    batchId: batchId.nullable(),
    amount,
    dispatchedAt: timestamp,
  })
  .transform((r): PendingReply => ({ ...r, batchId: r.batchId ?? undefined }));

const DiscrepancySchema = z
  .object({
    id: z.string().min(1),
    identifier: z.string().nullable(),
    kind: z.enum([
      "failure",
      "timeout",
      "unknown-identifier",
      "settlement-rejected",
      "settlement-clamped",
    ]),
    subject: z.enum(["stake", "unbond", "mint", "burn", "payout", "fee", "unknown"]),
    amount: amount.nullable(),
    batchId: batchId.nullable(),
    reason: z.string(),
    detectedAt: timestamp,
    resolution: z
      .object({ resolvedBy: z.string().min(1), note: z.string(), resolvedAt: timestamp })
      .nullable(),
  })
  .transform(
    (d): Discrepancy => ({
      id: d.id,
      identifier: d.identifier ?? undefined,
      kind: d.kind,
      subject: d.subject,
      amount: d.amount ?? undefined,
      batchId: d.batchId ?? undefined,
      reason: d.reason,
      detectedAt: d.detectedAt,
      resolution: d.resolution ?? undefined,
    }),
  );

export const ProtocolSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  config: z.unknown(),
  pool: z.object({
    totalNativeToken: amount,
    totalDerivativeToken: amount,
    totalRewardAmount: amount,
  }),
  batches: z.array(BatchSchema),
  pendingBatchId: batchId,
  tracker: z.object({
    transfers: z.array(TransferSchema),
    replies: z.array(ReplySchema),
    sequence: z.number().int().nonnegative(),
  }),
  discrepancies: z.object({
    entries: z.array(DiscrepancySchema),
    counter: z.number().int().nonnegative(),
  }),
  admin: z.object({
    owner: z.string().min(1),
    pendingOwner: z.string().min(1).nullable(),
    validators: z.array(z.string().min(1)),
  }),
});

/**
 * Validate a snapshot and convert it to domain values. Cross-record
 * invariants (batch ids, totals, sequences) are checked when the
 * components import it.
 *
 * @throws {ProtocolError} INVALID_SNAPSHOT or INVALID_CONFIG
 */
export function parseSnapshot(input: unknown): RestoredState {
  const result = ProtocolSnapshotSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ProtocolError(
      "INVALID_SNAPSHOT",
      `Invalid snapshot: ${details.join("; ")}`,
      details,
    );
  }

  const data = result.data;
  return {
    config: parseProtocolConfig(data.config),
    pool: data.pool,
    batches: { batches: data.batches, pendingBatchId: data.pendingBatchId },
    tracker: data.tracker,
    discrepancies: data.discrepancies,
    admin: {
      owner: data.admin.owner,
      pendingOwner: data.admin.pendingOwner ?? undefined,
      validators: data.admin.validators,
    },
  };
}
