/**
 * @bondline/batches — Batch Lifecycle Manager.
 *
 * Owns the single open batch and the archive of closed ones.
 *
 * State machine:
 *   pending → submitted → received
 *
 * Rules:
 * - Exactly one batch is pending at any time
 * - Ids start at 1 and increase by one, never reused
 * - Empty batches are never submitted
 * - Submitted batches change only by the received transition and
 *   redeemed flags
 */

import type { Amount, Batch, Identity, Timestamp } from "@bondline/types";
import { markRedeemed, recordUnstake, sumShares } from "./unstake-ledger.js";
import type {
  BatchCheckpoint,
  BatchListOptions,
  BatchManagerOptions,
  ClaimableEntry,
  CloseResult,
  ExportedBatches,
  RecordResult,
} from "./types.js";
import { BatchError } from "./types.js";

export class BatchManager {
  private batches: Map<number, Batch>;
  private pendingBatchId: number;
  private readonly options: BatchManagerOptions;

  /**
   * Seed the manager with batch 1, due at `now + batchPeriod`.
   */
  constructor(options: BatchManagerOptions, now: Timestamp) {
    BatchManager.assertOptions(options);
    this.options = options;
    this.batches = new Map();
    this.pendingBatchId = 1;
    this.batches.set(1, BatchManager.openBatch(1, now + options.batchPeriod));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  get pending(): Batch {
    return this.get(this.pendingBatchId);
  }

  get(id: number): Batch {
    const batch = this.batches.get(id);
    if (!batch) {
      throw new BatchError("BATCH_NOT_FOUND", `Batch ${String(id)} not found`);
    }
    return batch;
  }

  find(id: number): Batch | undefined {
    return this.batches.get(id);
  }

  /**
   * Batches in ascending id order, the pending batch included.
   */
  list(options: BatchListOptions): readonly Batch[] {
    const startAfter = options.startAfter ?? 0;
    const result: Batch[] = [];
    for (let id = startAfter + 1; id <= this.pendingBatchId; id++) {
      if (result.length >= options.limit) break;
      const batch = this.batches.get(id);
      if (batch) result.push(batch);
    }
    return result;
  }

  get size(): number {
    return this.batches.size;
  }

  /**
   * Whether the open batch's close time has been reached.
   */
  isDue(now: Timestamp): boolean {
    const schedule = this.pending.nextActionTime;
    return schedule.kind === "scheduled" && now >= schedule.at;
  }

  /**
   * Received batches in which `user` holds an unredeemed request.
   */
  claimable(user: Identity): readonly ClaimableEntry[] {
    const entries: ClaimableEntry[] = [];
    for (const batch of this.batches.values()) {
      if (batch.status !== "received") continue;
      const request = batch.requests.get(user);
      if (request && !request.redeemed) {
        entries.push({ batch, request });
      }
    }
    return entries.sort((a, b) => a.batch.id - b.batch.id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Record an unstake in the open batch and report whether it is due.
   */
  record(requester: Identity, amount: Amount, now: Timestamp): RecordResult {
    const batch = recordUnstake(
      this.pending,
      requester,
      amount,
      this.options.minimumUnstake,
    );
    this.batches.set(batch.id, batch);
    return { batch, due: this.isDue(now) };
  }

  /**
   * Close the open batch and open the next one.
   *
   * The closed batch becomes `submitted` with its expected unbond amount
   * and a maturity of `now + unbondingPeriod`. The new batch is due at
   * `now + batchPeriod`.
   */
  close(batchId: number, expectedUnbond: Amount, now: Timestamp): CloseResult {
    if (batchId !== this.pendingBatchId) {
      const status = this.batches.get(batchId)?.status ?? "unknown";
      throw new BatchError(
        "BATCH_NOT_PENDING",
        `Batch ${String(batchId)} is not the open batch (status: ${status})`,
      );
    }

    const pending = this.pending;
    if (pending.requests.size === 0) {
      throw new BatchError(
        "EMPTY_BATCH",
        `Batch ${String(batchId)} has no unstake requests`,
      );
    }
    if (expectedUnbond < 0n) {
      throw new BatchError(
        "INVALID_AMOUNT",
        `Expected unbond must be non-negative, got ${expectedUnbond.toString()}`,
      );
    }

    const submitted: Batch = {
      ...pending,
      status: "submitted",
      expectedNativeUnbond: { kind: "known", amount: expectedUnbond },
      nextActionTime: { kind: "scheduled", at: now + this.options.unbondingPeriod },
    };
    const nextId = batchId + 1;
    const opened = BatchManager.openBatch(nextId, now + this.options.batchPeriod);

    this.batches.set(batchId, submitted);
    this.batches.set(nextId, opened);
    this.pendingBatchId = nextId;

    return { submitted, opened };
  }

  /**
   * Record the native amount confirmed for a submitted batch.
   */
  markReceived(batchId: number, received: Amount): Batch {
    const batch = this.get(batchId);
    if (batch.status !== "submitted") {
      throw new BatchError(
        "BATCH_NOT_SUBMITTED",
        `Batch ${String(batchId)} is ${batch.status}, not submitted`,
      );
    }
    if (received < 0n) {
      throw new BatchError(
        "INVALID_AMOUNT",
        `Received amount must be non-negative, got ${received.toString()}`,
      );
    }

    const updated: Batch = {
      ...batch,
      status: "received",
      receivedNativeUnbond: { kind: "known", amount: received },
    };
    this.batches.set(batchId, updated);
    return updated;
  }

  /**
   * Mark `user`'s request in a received batch as redeemed.
   */
  redeem(batchId: number, user: Identity): Batch {
    const batch = this.get(batchId);
    if (batch.status !== "received") {
      throw new BatchError(
        "BATCH_NOT_RECEIVED",
        `Batch ${String(batchId)} is ${batch.status}, not received`,
      );
    }
    const updated = markRedeemed(batch, user);
    this.batches.set(batchId, updated);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpoint / export
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): BatchCheckpoint {
    return { batches: new Map(this.batches), pendingBatchId: this.pendingBatchId };
  }

  rollback(checkpoint: BatchCheckpoint): void {
    this.batches = new Map(checkpoint.batches);
    this.pendingBatchId = checkpoint.pendingBatchId;
  }

  export(): ExportedBatches {
    return {
      batches: [...this.batches.values()].sort((a, b) => a.id - b.id),
      pendingBatchId: this.pendingBatchId,
    };
  }

  /**
   * Rebuild a manager from exported state, checking every batch invariant.
   */
  static fromExport(options: BatchManagerOptions, exported: ExportedBatches): BatchManager {
    const { batches, pendingBatchId } = exported;

    if (batches.length !== pendingBatchId) {
      throw new BatchError(
        "INVALID_SNAPSHOT",
        `Expected ${String(pendingBatchId)} batches, got ${String(batches.length)}`,
      );
    }

    const byId = new Map<number, Batch>();
    batches.forEach((batch, index) => {
      const expectedId = index + 1;
      if (batch.id !== expectedId) {
        throw new BatchError(
          "INVALID_SNAPSHOT",
          `Batch ids must run 1..${String(pendingBatchId)} without gaps; found ${String(batch.id)} at position ${String(expectedId)}`,
        );
      }
      const isLast = expectedId === pendingBatchId;
      if ((batch.status === "pending") !== isLast) {
        throw new BatchError(
          "INVALID_SNAPSHOT",
          `Only the last batch may be pending; batch ${String(batch.id)} is ${batch.status}`,
        );
      }
      if (sumShares(batch.requests) !== batch.totalDerivative) {
        throw new BatchError(
          "INVALID_SNAPSHOT",
          `Batch ${String(batch.id)} total does not match its requests`,
        );
      }
      byId.set(batch.id, batch);
    });

    const manager = new BatchManager(options, 0);
    manager.rollback({ batches: byId, pendingBatchId });
    return manager;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private static openBatch(id: number, dueAt: Timestamp): Batch {
    return {
      id,
      status: "pending",
      totalDerivative: 0n,
      expectedNativeUnbond: { kind: "unset" },
      receivedNativeUnbond: { kind: "unset" },
      nextActionTime: { kind: "scheduled", at: dueAt },
      requests: new Map(),
    };
  }

  private static assertOptions(options: BatchManagerOptions): void {
    const periods: readonly [string, number][] = [
      ["batchPeriod", options.batchPeriod],
      ["unbondingPeriod", options.unbondingPeriod],
    ];
    for (const [name, value] of periods) {
      if (!Number.isSafeInteger(value) || value < 0) {
        throw new BatchError(
          "INVALID_OPTIONS",
          `${name} must be a non-negative integer number of seconds, got ${String(value)}`,
        );
      }
    }
    if (options.minimumUnstake < 1n) {
      throw new BatchError(
        "INVALID_OPTIONS",
        `minimumUnstake must be at least 1, got ${options.minimumUnstake.toString()}`,
      );
    }
  }
}
