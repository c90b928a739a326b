/**
 * TransferTracker — correlates replies with what was dispatched.
 *
 * Two maps keyed by identifier:
 * - in-flight cross-chain transfers (stake deposits, batch unbonding)
 * - local instructions awaiting a completion callback (mint, burn, payout, fee)
 *
 * Correlation is by identifier only; replies may arrive in any order.
 * Dispatch never blocks. A reply removes its entry whatever the outcome,
 * and anything that cannot be applied lands in the DiscrepancyLog.
 */

import type {
  InFlightTransfer,
  MessageId,
  PendingReply,
  ReplyOutcome,
  Timestamp,
} from "@bondline/types";
import type { DiscrepancyLog } from "./discrepancy-log.js";
import type {
  ExportedTracker,
  NewDiscrepancy,
  ReplyHandlers,
  ReplyResolution,
  SequenceListOptions,
  TrackedEntry,
  TrackerCheckpoint,
} from "./types.js";
import { TrackerError } from "./types.js";

export type NewTransfer = Omit<InFlightTransfer, "sequence">;
export type NewPendingReply = Omit<PendingReply, "sequence">;

export class TransferTracker {
  private transfers: Map<MessageId, InFlightTransfer> = new Map();
  private replies: Map<MessageId, PendingReply> = new Map();
  private sequence = 0;
  private readonly discrepancies: DiscrepancyLog;

  constructor(discrepancies: DiscrepancyLog) {
    this.discrepancies = discrepancies;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Dispatch
  // ───────────────────────────────────────────────────────────────────────

  trackTransfer(input: NewTransfer): InFlightTransfer {
    this.assertFresh(input.id);
    TransferTracker.assertAmount(input.amount, input.id);

    const transfer: InFlightTransfer = { ...input, sequence: this.nextSequence() };
    this.transfers.set(transfer.id, transfer);
    return transfer;
  }

  trackReply(input: NewPendingReply): PendingReply {
    this.assertFresh(input.id);
    TransferTracker.assertAmount(input.amount, input.id);

    const reply: PendingReply = { ...input, sequence: this.nextSequence() };
    this.replies.set(reply.id, reply);
    return reply;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  getTransfer(id: MessageId): InFlightTransfer | undefined {
    return this.transfers.get(id);
  }

  getReply(id: MessageId): PendingReply | undefined {
    return this.replies.get(id);
  }

  /** In-flight transfers in dispatch order. */
  listTransfers(options: SequenceListOptions): readonly InFlightTransfer[] {
    return TransferTracker.page([...this.transfers.values()], options);
  }

  /** Pending replies in dispatch order. */
  listReplies(options: SequenceListOptions): readonly PendingReply[] {
    return TransferTracker.page([...this.replies.values()], options);
  }

  get inFlightCount(): number {
    return this.transfers.size;
  }

  get pendingReplyCount(): number {
    return this.replies.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Replies
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Apply a reply. Never throws for a reconciliation problem: unknown
   * identifiers, failures, timeouts and rejected settlements all come
   * back as a "discrepancy" resolution.
   */
  resolve(
    identifier: MessageId,
    outcome: ReplyOutcome,
    now: Timestamp,
    handlers: ReplyHandlers,
  ): ReplyResolution {
    const entry = this.take(identifier);

    if (!entry) {
      return this.discrepancy(identifier, undefined, {
        identifier,
        kind: "unknown-identifier",
        subject: "unknown",
        reason: `No in-flight transfer or pending reply with identifier '${identifier}'`,
        detectedAt: now,
      });
    }

    const dispatched = entry.type === "transfer" ? entry.transfer : entry.reply;
    const subject = entry.type === "transfer" ? entry.transfer.purpose : entry.reply.kind;

    if (outcome.kind !== "success") {
      return this.discrepancy(identifier, entry, {
        identifier,
        kind: outcome.kind,
        subject,
        amount: dispatched.amount,
        batchId: dispatched.batchId,
        reason:
          outcome.kind === "failure"
            ? outcome.reason
            : `No acknowledgement received for '${identifier}'`,
        detectedAt: now,
      });
    }

    const receivedAmount = outcome.receivedAmount ?? dispatched.amount;

    if (entry.type === "transfer" && entry.transfer.purpose === "unbond") {
      const batchId = entry.transfer.batchId;
      if (batchId === undefined) {
        return this.discrepancy(identifier, entry, {
          identifier,
          kind: "settlement-rejected",
          subject,
          amount: receivedAmount,
          reason: `Unbond transfer '${identifier}' carries no batch id`,
          detectedAt: now,
        });
      }

      try {
        handlers.onUnbondReceived(batchId, receivedAmount, now);
      } catch (err) {
        return this.discrepancy(identifier, entry, {
          identifier,
          kind: "settlement-rejected",
          subject,
          amount: receivedAmount,
          batchId,
          reason: err instanceof Error ? err.message : String(err),
          detectedAt: now,
        });
      }
    }

    return { kind: "settled", identifier, entry, receivedAmount };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Checkpoint / export
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): TrackerCheckpoint {
    return {
      transfers: new Map(this.transfers),
      replies: new Map(this.replies),
      sequence: this.sequence,
    };
  }

  rollback(checkpoint: TrackerCheckpoint): void {
    this.transfers = new Map(checkpoint.transfers);
    this.replies = new Map(checkpoint.replies);
    this.sequence = checkpoint.sequence;
  }

  export(): ExportedTracker {
    return {
      transfers: TransferTracker.page([...this.transfers.values()], {
        limit: Number.POSITIVE_INFINITY,
      }),
      replies: TransferTracker.page([...this.replies.values()], {
        limit: Number.POSITIVE_INFINITY,
      }),
      sequence: this.sequence,
    };
  }

  import(data: ExportedTracker): void {
    const transfers = new Map<MessageId, InFlightTransfer>();
    const replies = new Map<MessageId, PendingReply>();

    for (const transfer of data.transfers) {
      TransferTracker.assertImportable(transfer, data.sequence, transfers, replies);
      transfers.set(transfer.id, transfer);
    }
    for (const reply of data.replies) {
      TransferTracker.assertImportable(reply, data.sequence, transfers, replies);
      replies.set(reply.id, reply);
    }

    this.rollback({ transfers, replies, sequence: data.sequence });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private take(identifier: MessageId): TrackedEntry | undefined {
    const transfer = this.transfers.get(identifier);
    if (transfer) {
      this.transfers.delete(identifier);
      return { type: "transfer", transfer };
    }
    const reply = this.replies.get(identifier);
    if (reply) {
      this.replies.delete(identifier);
      return { type: "reply", reply };
    }
    return undefined;
  }

  private discrepancy(
    identifier: MessageId,
    entry: TrackedEntry | undefined,
    input: NewDiscrepancy,
  ): ReplyResolution {
    const discrepancy = this.discrepancies.record(input);
    return { kind: "discrepancy", identifier, entry, discrepancy };
  }

  private assertFresh(id: MessageId): void {
    if (this.transfers.has(id) || this.replies.has(id)) {
      throw new TrackerError(
        "DUPLICATE_IDENTIFIER",
        `Identifier '${id}' is already being tracked`,
      );
    }
  }

  private nextSequence(): number {
    this.sequence++;
    return this.sequence;
  }

  private static assertAmount(amount: bigint, id: MessageId): void {
    if (amount < 0n) {
      throw new TrackerError(
        "INVALID_AMOUNT",
        `Tracked amount for '${id}' must be non-negative, got ${amount.toString()}`,
      );
    }
  }

  private static assertImportable(
    entry: { readonly id: MessageId; readonly sequence: number },
    maxSequence: number,
    transfers: ReadonlyMap<MessageId, unknown>,
    replies: ReadonlyMap<MessageId, unknown>,
  ): void {
    if (transfers.has(entry.id) || replies.has(entry.id)) {
      throw new TrackerError("INVALID_SNAPSHOT", `Identifier '${entry.id}' appears twice`);
    }
    if (entry.sequence < 1 || entry.sequence > maxSequence) {
      throw new TrackerError(
        "INVALID_SNAPSHOT",
        `Sequence ${String(entry.sequence)} of '${entry.id}' is outside 1..${String(maxSequence)}`,
      );
    }
  }

  private static page<T extends { readonly sequence: number }>(
    entries: T[],
    options: SequenceListOptions,
  ): T[] {
    const startAfter = options.startAfter ?? 0;
    return entries
      .filter((e) => e.sequence > startAfter)
      .sort((a, b) => a.sequence - b.sequence)
      .slice(0, options.limit);
  }
}
