/**
 * StakingService — the protocol as the HTTP layer sees it.
 *
 * Owns the protocol aggregate and its in-memory outbox, stamps every call
 * with the injected clock and turns results into JSON-ready responses.
 */

import type { Logger } from "pino";
import {
  InMemoryOutbox,
  StakingProtocol,
  toBatchView,
  toDiscrepancyView,
} from "@bondline/protocol";
import type {
  BatchView,
  ClaimableView,
  ConfigView,
  DiscrepancyView,
  ExecutionContext,
  PageOptions,
  PoolStateView,
  ProtocolConfigInput,
  ProtocolSnapshot,
  ReplyView,
  SubmitResult,
  TransferView,
} from "@bondline/protocol";
import type { DiscrepancyFilter } from "@bondline/reconciler";
import type { Amount, Identity, ReplyOutcome, Timestamp } from "@bondline/types";
import type {
  ClaimResponse,
  InstructionView,
  ReplyResponse,
  RewardsResponse,
  StakeResponse,
  SubmitResponse,
  UnstakeResponse,
} from "../types/dto.js";

/** Current Unix time in seconds. */
export type Clock = () => Timestamp;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface StakingServiceOptions {
  readonly config: ProtocolConfigInput;
  readonly clock?: Clock | undefined;
  readonly logger?: Logger | undefined;
}

export interface ExportResponse {
  readonly snapshot: ProtocolSnapshot;
  readonly stateHash: string;
}

export class StakingService {
  readonly protocol: StakingProtocol;
  readonly outbox: InMemoryOutbox;
  private readonly clock: Clock;

  constructor(options: StakingServiceOptions) {
    this.clock = options.clock ?? systemClock;
    this.outbox = new InMemoryOutbox();
    this.protocol = new StakingProtocol(
      options.config,
      { custody: this.outbox, transport: this.outbox, logger: options.logger },
      this.clock(),
    );
  }

  // ─── Staking ──────────────────────────────────────────────────────

  stake(sender: Identity, amount: Amount): StakeResponse {
    const result = this.protocol.stake(amount, this.context(sender));
    return {
      deposit: result.deposit.toString(),
      minted: result.minted.toString(),
      mintId: result.mintId,
      transferId: result.transferId,
      state: this.protocol.getState(),
    };
  }

  unstake(sender: Identity, amount: Amount): UnstakeResponse {
    const result = this.protocol.unstake(amount, this.context(sender));
    return {
      batch: toBatchView(result.batch),
      submitted: result.submitted !== undefined ? toSubmitResponse(result.submitted) : null,
    };
  }

  /** Submit a batch on the protocol's own behalf. */
  submitBatch(batchId: number): SubmitResponse {
    const { protocolAddress } = this.protocol.getConfig();
    return toSubmitResponse(this.protocol.submitBatch(batchId, this.context(protocolAddress)));
  }

  claim(sender: Identity): ClaimResponse {
    const result = this.protocol.claim(this.context(sender));
    return {
      amount: result.amount.toString(),
      batchIds: result.batchIds,
      payoutId: result.payoutId ?? null,
    };
  }

  collectRewards(sender: Identity, amount: Amount): RewardsResponse {
    const result = this.protocol.collectRewards(amount, this.context(sender));
    return {
      gross: result.gross.toString(),
      fee: result.fee.toString(),
      net: result.net.toString(),
      feeId: result.feeId ?? null,
      state: this.protocol.getState(),
    };
  }

  // ─── Reconciliation ───────────────────────────────────────────────

  handleReply(identifier: string, outcome: ReplyOutcome): ReplyResponse {
    const resolution = this.protocol.handleReply(identifier, outcome, this.clock());
    if (resolution.kind === "settled") {
      return {
        kind: "settled",
        identifier: resolution.identifier,
        receivedAmount: resolution.receivedAmount.toString(),
      };
    }
    return {
      kind: "discrepancy",
      identifier: resolution.identifier,
      discrepancy: toDiscrepancyView(resolution.discrepancy),
    };
  }

  resolveDiscrepancy(sender: Identity, id: string, note: string): DiscrepancyView {
    return this.protocol.resolveDiscrepancy(id, note, this.context(sender));
  }

  /** Everything dispatched so far, oldest first. */
  instructions(): readonly InstructionView[] {
    return this.outbox.instructions.map((i) => ({
      id: i.id,
      type: i.type,
      denom: i.denom,
      amount: i.amount.toString(),
      counterparty: i.counterparty,
      memo: i.memo ?? null,
    }));
  }

  // ─── Admin ────────────────────────────────────────────────────────

  transferOwnership(sender: Identity, newOwner: Identity): PoolStateView {
    this.protocol.transferOwnership(newOwner, this.context(sender));
    return this.protocol.getState();
  }

  revokeOwnershipTransfer(sender: Identity): PoolStateView {
    this.protocol.revokeOwnershipTransfer(this.context(sender));
    return this.protocol.getState();
  }

  acceptOwnership(sender: Identity): PoolStateView {
    this.protocol.acceptOwnership(this.context(sender));
    return this.protocol.getState();
  }

  addValidator(sender: Identity, validator: Identity): PoolStateView {
    this.protocol.addValidator(validator, this.context(sender));
    return this.protocol.getState();
  }

  removeValidator(sender: Identity, validator: Identity): PoolStateView {
    this.protocol.removeValidator(validator, this.context(sender));
    return this.protocol.getState();
  }

  // ─── Queries ──────────────────────────────────────────────────────

  getConfig(): ConfigView {
    return this.protocol.getConfig();
  }

  getState(): PoolStateView {
    return this.protocol.getState();
  }

  getBatch(id: number): BatchView {
    return this.protocol.getBatch(id);
  }

  getPendingBatch(): BatchView {
    return this.protocol.getPendingBatch();
  }

  listBatches(options: PageOptions): readonly BatchView[] {
    return this.protocol.listBatches(options);
  }

  listTransfers(options: PageOptions): readonly TransferView[] {
    return this.protocol.listInFlightTransfers(options);
  }

  listReplies(options: PageOptions): readonly ReplyView[] {
    return this.protocol.listPendingReplies(options);
  }

  claimable(user: Identity): readonly ClaimableView[] {
    return this.protocol.claimable(user);
  }

  listDiscrepancies(filter: DiscrepancyFilter): readonly DiscrepancyView[] {
    return this.protocol.listDiscrepancies(filter);
  }

  export(): ExportResponse {
    const snapshot = this.protocol.snapshot();
    return { snapshot, stateHash: this.protocol.stateHash() };
  }

  private context(sender: Identity): ExecutionContext {
    return { sender, now: this.clock() };
  }
}

function toSubmitResponse(result: SubmitResult): SubmitResponse {
  return {
    batch: toBatchView(result.batch),
    nextBatchId: result.next.id,
    unbondAmount: result.unbondAmount.toString(),
    burnId: result.burnId,
    unbondTransferId: result.unbondTransferId,
    clamped: result.clamped !== undefined ? toDiscrepancyView(result.clamped) : null,
  };
}
