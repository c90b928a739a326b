/**
 * StakingProtocol — Top-level coordinator for the liquid-staking pool.
 *
 * Composes:
 * - PoolLedger: pool totals and the exchange rate
 * - BatchManager: unstake requests and settlement batches
 * - TransferTracker + DiscrepancyLog: cross-chain reply correlation
 * - AdminRegistry: ownership and validators
 *
 * Every operation runs to completion against the clock value in its
 * ExecutionContext. If any step throws, all component state is rolled
 * back to where it was before the call.
 */

import pino from "pino";
import type { Logger } from "pino";
import { BatchManager } from "@bondline/batches";
import type { BatchCheckpoint, BatchManagerOptions } from "@bondline/batches";
import {
  PoolLedger,
  computeClaimAmount,
  computeProtocolFee,
  computeRedemptionRate,
} from "@bondline/pool";
import { DiscrepancyLog, TransferTracker } from "@bondline/reconciler";
import type {
  Discrepancy,
  DiscrepancyFilter,
  ExportedDiscrepancies,
  ReplyResolution,
  TrackerCheckpoint,
} from "@bondline/reconciler";
import type {
  Amount,
  Batch,
  Identity,
  MessageId,
  PoolState,
  ReplyOutcome,
  Timestamp,
} from "@bondline/types";
import { AdminRegistry } from "./admin.js";
import type { AdminState } from "./admin.js";
import { parseProtocolConfig } from "./config.js";
import type { ProtocolConfig, ProtocolConfigInput } from "./config.js";
import { AddressShapeValidator } from "./identity.js";
import {
  resolveLimit,
  toBatchView,
  toConfigView,
  toDiscrepancyView,
  toReplyView,
  toTransferView,
} from "./queries.js";
import type {
  BatchView,
  ClaimableView,
  ConfigView,
  DiscrepancyView,
  PageOptions,
  PoolStateView,
  ReplyView,
  TransferView,
} from "./queries.js";
import { SNAPSHOT_VERSION, hashSnapshot, parseSnapshot } from "./snapshot.js";
import type { ProtocolSnapshot } from "./snapshot.js";
import type {
  CrossChainTransport,
  ExecutionContext,
  IdentityValidator,
  TokenCustody,
} from "./types.js";
import { ProtocolError } from "./types.js";

// =============================================================================
// Dependencies & results
// =============================================================================

export interface StakingProtocolDeps {
  readonly custody: TokenCustody;
  readonly transport: CrossChainTransport;
  /** Defaults to AddressShapeValidator. */
  readonly identity?: IdentityValidator | undefined;
  /** Defaults to a disabled logger. */
  readonly logger?: Logger | undefined;
}

export interface StakeResult {
  readonly deposit: Amount;
  readonly minted: Amount;
  readonly mintId: MessageId;
  readonly transferId: MessageId;
  readonly state: PoolState;
}

export interface SubmitResult {
  readonly batch: Batch;
  readonly next: Batch;
  readonly unbondAmount: Amount;
  readonly burnId: MessageId;
  readonly unbondTransferId: MessageId;
  /** Set when the settlement floored a pool total at zero. */
  readonly clamped?: Discrepancy | undefined;
}

export interface UnstakeResult {
  /** The batch the request was recorded in, as it stood after recording. */
  readonly batch: Batch;
  /** Present when the recording made the batch due and it was submitted. */
  readonly submitted?: SubmitResult | undefined;
}

export interface ClaimResult {
  readonly amount: Amount;
  readonly batchIds: readonly number[];
  /** Absent when every claimed batch paid out zero. */
  readonly payoutId?: MessageId | undefined;
}

export interface RewardsResult {
  readonly gross: Amount;
  readonly fee: Amount;
  readonly net: Amount;
  readonly feeId?: MessageId | undefined;
  readonly state: PoolState;
}

interface Checkpoint {
  readonly pool: PoolState;
  readonly batches: BatchCheckpoint;
  readonly tracker: TrackerCheckpoint;
  readonly discrepancies: ExportedDiscrepancies;
  readonly admin: AdminState;
}

// =============================================================================
// StakingProtocol
// =============================================================================

export class StakingProtocol {
  private readonly config: ProtocolConfig;
  private readonly custody: TokenCustody;
  private readonly transport: CrossChainTransport;
  private readonly identity: IdentityValidator;
  private readonly logger: Logger;

  private readonly pool: PoolLedger;
  private batches: BatchManager;
  private readonly discrepancies: DiscrepancyLog;
  private readonly tracker: TransferTracker;
  private readonly admin: AdminRegistry;

  /**
   * @param now - Opens batch 1, due at `now + batchPeriod`
   */
  constructor(config: ProtocolConfigInput, deps: StakingProtocolDeps, now: Timestamp) {
    this.config = parseProtocolConfig(config);
    this.custody = deps.custody;
    this.transport = deps.transport;
    this.identity = deps.identity ?? new AddressShapeValidator();
    this.logger = deps.logger ?? pino({ enabled: false });

    this.assertConfigIdentities();

    this.pool = new PoolLedger();
    this.batches = new BatchManager(this.batchOptions(), now);
    this.discrepancies = new DiscrepancyLog();
    this.tracker = new TransferTracker(this.discrepancies);
    this.admin = new AdminRegistry(
      { owner: this.config.owner, validators: this.config.validators },
      this.identity,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Staking
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Deposit native token and mint derivative shares at the current rate.
   * The deposit is forwarded to the remote staker account.
   */
  stake(deposit: Amount, ctx: ExecutionContext): StakeResult {
    return this.atomically(() => {
      this.assertIdentity(ctx.sender);
      if (deposit < this.config.minimumLiquidStakeAmount) {
        throw new ProtocolError(
          "BELOW_MINIMUM",
          `Stake of ${deposit.toString()} is below the minimum of ${this.config.minimumLiquidStakeAmount.toString()}`,
        );
      }

      const minted = this.pool.quoteStake(deposit);

      const transferId = this.transport.sendTransfer({
        denom: this.config.nativeDenom,
        amount: deposit,
        destination: this.config.stakerAddress,
        memo: `stake:${ctx.sender}`,
      });
      const mintId = this.custody.mint(this.config.derivativeDenom, minted, ctx.sender);

      this.tracker.trackTransfer({
        id: transferId,
        purpose: "stake",
        amount: deposit,
        destination: this.config.stakerAddress,
        dispatchedAt: ctx.now,
      });
      this.tracker.trackReply({ id: mintId, kind: "mint", amount: minted, dispatchedAt: ctx.now });

      const state = this.pool.applyStake(deposit, minted);

      this.logger.info(
        { sender: ctx.sender, deposit: deposit.toString(), minted: minted.toString(), mintId, transferId },
        "Stake accepted",
      );

      return { deposit, minted, mintId, transferId, state };
    });
  }

  /**
   * Queue derivative shares for redemption in the open batch. Submits the
   * batch when its close time has been reached.
   */
  unstake(amount: Amount, ctx: ExecutionContext): UnstakeResult {
    return this.atomically(() => {
      this.assertIdentity(ctx.sender);

      const { batch, due } = this.batches.record(ctx.sender, amount, ctx.now);

      this.logger.info(
        { sender: ctx.sender, amount: amount.toString(), batchId: batch.id, due },
        "Unstake recorded",
      );

      if (!due) {
        return { batch };
      }

      const submitted = this.submit(batch.id, ctx.now);
      return { batch, submitted };
    });
  }

  /**
   * Close the open batch: burn its shares, deduct its native value from
   * the pool and dispatch the unbonding transfer. Only the protocol's own
   * address may call this.
   */
  submitBatch(batchId: number, ctx: ExecutionContext): SubmitResult {
    return this.atomically(() => {
      if (ctx.sender !== this.config.protocolAddress) {
        throw new ProtocolError("UNAUTHORIZED", "Only the protocol address may submit batches");
      }
      return this.submit(batchId, ctx.now);
    });
  }

  /**
   * Pay the caller for every received batch holding an unredeemed request.
   */
  claim(ctx: ExecutionContext): ClaimResult {
    return this.atomically(() => {
      this.assertIdentity(ctx.sender);

      const entries = this.batches.claimable(ctx.sender);
      if (entries.length === 0) {
        throw new ProtocolError("NOTHING_TO_CLAIM", `Nothing to claim for '${ctx.sender}'`);
      }

      let amount = 0n;
      const batchIds: number[] = [];
      for (const { batch, request } of entries) {
        amount += computeClaimAmount(request.shares, received(batch), batch.totalDerivative);
        this.batches.redeem(batch.id, ctx.sender);
        batchIds.push(batch.id);
      }

      let payoutId: MessageId | undefined;
      if (amount > 0n) {
        payoutId = this.custody.transfer(this.config.nativeDenom, amount, ctx.sender);
        this.tracker.trackReply({ id: payoutId, kind: "payout", amount, dispatchedAt: ctx.now });
      }

      this.logger.info(
        { sender: ctx.sender, amount: amount.toString(), batchIds, payoutId },
        "Claim paid",
      );

      return { amount, batchIds, payoutId };
    });
  }

  /**
   * Add staking rewards to the pool, less the protocol fee paid to the
   * treasury. Operators and the owner only.
   */
  collectRewards(amount: Amount, ctx: ExecutionContext): RewardsResult {
    return this.atomically(() => {
      if (!this.admin.isOwner(ctx.sender) && !this.config.operators.includes(ctx.sender)) {
        throw new ProtocolError("UNAUTHORIZED", "Only operators or the owner may collect rewards");
      }
      if (amount < this.config.minimumRewardsToCollect) {
        throw new ProtocolError(
          "BELOW_MINIMUM",
          `Rewards of ${amount.toString()} are below the minimum of ${this.config.minimumRewardsToCollect.toString()}`,
        );
      }

      const fee = computeProtocolFee(amount, this.config.protocolFeeBps);
      const net = amount - fee;

      let feeId: MessageId | undefined;
      if (fee > 0n) {
        feeId = this.custody.transfer(this.config.nativeDenom, fee, this.config.treasuryAddress);
        this.tracker.trackReply({ id: feeId, kind: "fee", amount: fee, dispatchedAt: ctx.now });
      }

      const state = this.pool.accrueRewards(net, amount);

      this.logger.info(
        { sender: ctx.sender, gross: amount.toString(), fee: fee.toString(), feeId },
        "Rewards collected",
      );

      return { gross: amount, fee, net, feeId, state };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Replies
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Apply an asynchronous reply. Reconciliation problems come back as a
   * "discrepancy" resolution; nothing is thrown for them.
   */
  handleReply(identifier: MessageId, outcome: ReplyOutcome, now: Timestamp): ReplyResolution {
    return this.atomically(() => {
      const resolution = this.tracker.resolve(identifier, outcome, now, {
        onUnbondReceived: (batchId, amount) => {
          const batch = this.batches.markReceived(batchId, amount);
          this.logger.info(
            { batchId: batch.id, received: amount.toString() },
            "Batch unbonding received",
          );
        },
      });

      if (resolution.kind === "discrepancy") {
        const { discrepancy } = resolution;
        this.logger.warn(
          {
            identifier,
            discrepancyId: discrepancy.id,
            kind: discrepancy.kind,
            subject: discrepancy.subject,
            batchId: discrepancy.batchId,
          },
          `Reply discrepancy: ${discrepancy.reason}`,
        );
      } else {
        this.logger.info(
          { identifier, receivedAmount: resolution.receivedAmount.toString() },
          "Reply settled",
        );
      }

      return resolution;
    });
  }

  /**
   * Mark a discrepancy as reviewed. Owner only.
   */
  resolveDiscrepancy(id: string, note: string, ctx: ExecutionContext): DiscrepancyView {
    return this.atomically(() => {
      this.admin.requireOwner(ctx.sender, "resolve discrepancies");
      const resolved = this.discrepancies.resolve(id, ctx.sender, note, ctx.now);
      this.logger.info({ discrepancyId: id, resolvedBy: ctx.sender }, "Discrepancy resolved");
      return toDiscrepancyView(resolved);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  transferOwnership(newOwner: Identity, ctx: ExecutionContext): void {
    this.atomically(() => this.admin.transferOwnership(ctx.sender, newOwner));
    this.logger.info({ owner: ctx.sender, pendingOwner: newOwner }, "Ownership transfer proposed");
  }

  revokeOwnershipTransfer(ctx: ExecutionContext): void {
    this.atomically(() => this.admin.revokeOwnershipTransfer(ctx.sender));
    this.logger.info({ owner: ctx.sender }, "Ownership transfer revoked");
  }

  acceptOwnership(ctx: ExecutionContext): void {
    this.atomically(() => this.admin.acceptOwnership(ctx.sender));
    this.logger.info({ owner: ctx.sender }, "Ownership accepted");
  }

  addValidator(validator: Identity, ctx: ExecutionContext): void {
    this.atomically(() => this.admin.addValidator(ctx.sender, validator));
    this.logger.info({ validator }, "Validator added");
  }

  removeValidator(validator: Identity, ctx: ExecutionContext): void {
    this.atomically(() => this.admin.removeValidator(ctx.sender, validator));
    this.logger.info({ validator }, "Validator removed");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get poolState(): PoolState {
    return this.pool.state;
  }

  getConfig(): ConfigView {
    return toConfigView(this.config);
  }

  getState(): PoolStateView {
    const state = this.pool.state;
    return {
      totalNativeToken: state.totalNativeToken.toString(),
      totalDerivativeToken: state.totalDerivativeToken.toString(),
      totalRewardAmount: state.totalRewardAmount.toString(),
      redemptionRate: computeRedemptionRate(state),
      pendingBatchId: this.batches.pending.id,
      owner: this.admin.owner,
      pendingOwner: this.admin.pendingOwner ?? null,
      validators: [...this.admin.validators],
      inFlightTransfers: this.tracker.inFlightCount,
      pendingReplies: this.tracker.pendingReplyCount,
      openDiscrepancies: this.discrepancies.openCount,
    };
  }

  getBatch(id: number): BatchView {
    return toBatchView(this.batches.get(id));
  }

  getPendingBatch(): BatchView {
    return toBatchView(this.batches.pending);
  }

  listBatches(options: PageOptions = {}): readonly BatchView[] {
    return this.batches
      .list({ startAfter: options.startAfter, limit: resolveLimit(options.limit) })
      .map(toBatchView);
  }

  listInFlightTransfers(options: PageOptions = {}): readonly TransferView[] {
    return this.tracker
      .listTransfers({ startAfter: options.startAfter, limit: resolveLimit(options.limit) })
      .map(toTransferView);
  }

  listPendingReplies(options: PageOptions = {}): readonly ReplyView[] {
    return this.tracker
      .listReplies({ startAfter: options.startAfter, limit: resolveLimit(options.limit) })
      .map(toReplyView);
  }

  /** Received batches with an unredeemed request from `user`, and what each pays. */
  claimable(user: Identity): readonly ClaimableView[] {
    return this.batches.claimable(user).map(({ batch, request }) => ({
      batchId: batch.id,
      shares: request.shares.toString(),
      receivedNativeUnbond: received(batch).toString(),
      claimAmount: computeClaimAmount(request.shares, received(batch), batch.totalDerivative).toString(),
    }));
  }

  listDiscrepancies(filter: DiscrepancyFilter = "all"): readonly DiscrepancyView[] {
    return this.discrepancies.list(filter).map(toDiscrepancyView);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshots
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): ProtocolSnapshot {
    const pool = this.pool.state;
    const batches = this.batches.export();
    const tracker = this.tracker.export();
    const discrepancies = this.discrepancies.export();
    const admin = this.admin.export();

    return {
      version: SNAPSHOT_VERSION,
      config: toConfigView(this.config),
      pool: {
        totalNativeToken: pool.totalNativeToken.toString(),
        totalDerivativeToken: pool.totalDerivativeToken.toString(),
        totalRewardAmount: pool.totalRewardAmount.toString(),
      },
      batches: batches.batches.map(toBatchView),
      pendingBatchId: batches.pendingBatchId,
      tracker: {
        transfers: tracker.transfers.map(toTransferView),
        replies: tracker.replies.map(toReplyView),
        sequence: tracker.sequence,
      },
      discrepancies: {
        entries: discrepancies.entries.map(toDiscrepancyView),
        counter: discrepancies.counter,
      },
      admin: {
        owner: admin.owner,
        pendingOwner: admin.pendingOwner ?? null,
        validators: [...admin.validators],
      },
    };
  }

  /** SHA-256 over the canonical JSON of the snapshot. */
  stateHash(): string {
    return hashSnapshot(this.snapshot());
  }

  /**
   * Rebuild a protocol from a snapshot.
   *
   * @throws {ProtocolError} INVALID_SNAPSHOT when the snapshot is malformed
   *   or breaks a component invariant
   */
  static fromSnapshot(snapshot: unknown, deps: StakingProtocolDeps): StakingProtocol {
    const restored = parseSnapshot(snapshot);
    const protocol = new StakingProtocol(restored.config, deps, 0);

    try {
      protocol.pool.restore(restored.pool);
      protocol.batches = BatchManager.fromExport(protocol.batchOptions(), restored.batches);
      protocol.tracker.import(restored.tracker);
      protocol.discrepancies.import(restored.discrepancies);
      protocol.admin.import(restored.admin);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProtocolError("INVALID_SNAPSHOT", `Snapshot rejected: ${reason}`);
    }

    return protocol;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private submit(batchId: number, now: Timestamp): SubmitResult {
    const pending = this.batches.pending;
    const unbondAmount =
      pending.id === batchId ? this.pool.quoteUnbond(pending.totalDerivative) : 0n;

    const { submitted, opened } = this.batches.close(batchId, unbondAmount, now);
    const settlement = this.pool.applySettlement(
      unbondAmount,
      submitted.totalDerivative,
      this.config.underflowPolicy,
    );

    const burnId = this.custody.burn(
      this.config.derivativeDenom,
      submitted.totalDerivative,
      this.config.protocolAddress,
    );
    const unbondTransferId = this.transport.sendTransfer({
      denom: this.config.nativeDenom,
      amount: unbondAmount,
      destination: this.config.protocolAddress,
      memo: `batch:${String(submitted.id)}`,
    });

    this.tracker.trackReply({
      id: burnId,
      kind: "burn",
      amount: submitted.totalDerivative,
      batchId: submitted.id,
      dispatchedAt: now,
    });
    this.tracker.trackTransfer({
      id: unbondTransferId,
      purpose: "unbond",
      batchId: submitted.id,
      amount: unbondAmount,
      destination: this.config.protocolAddress,
      dispatchedAt: now,
    });

    let clamped: Discrepancy | undefined;
    if (settlement.clamped) {
      clamped = this.discrepancies.record({
        identifier: unbondTransferId,
        kind: "settlement-clamped",
        subject: "unbond",
        amount: unbondAmount,
        batchId: submitted.id,
        reason: `Settlement floored pool totals at zero: native shortfall ${settlement.nativeShortfall.toString()}, derivative shortfall ${settlement.derivativeShortfall.toString()}`,
        detectedAt: now,
      });
      this.logger.warn(
        {
          batchId: submitted.id,
          nativeShortfall: settlement.nativeShortfall.toString(),
          derivativeShortfall: settlement.derivativeShortfall.toString(),
          discrepancyId: clamped.id,
        },
        "Settlement clamped at zero",
      );
    }

    this.logger.info(
      {
        batchId: submitted.id,
        totalDerivative: submitted.totalDerivative.toString(),
        unbondAmount: unbondAmount.toString(),
        burnId,
        unbondTransferId,
        nextBatchId: opened.id,
      },
      "Batch submitted",
    );

    return { batch: submitted, next: opened, unbondAmount, burnId, unbondTransferId, clamped };
  }

  /**
   * Run `fn`, restoring every component if it throws. Instructions staged
   * with the collaborators are released only when `fn` returns.
   */
  private atomically<T>(fn: () => T): T {
    const checkpoint = this.checkpoint();
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this.custody.discard();
      this.transport.discard();
      this.rollback(checkpoint);
      throw err;
    }
    this.custody.commit();
    this.transport.commit();
    return result;
  }

  private checkpoint(): Checkpoint {
    return {
      pool: this.pool.state,
      batches: this.batches.checkpoint(),
      tracker: this.tracker.checkpoint(),
      discrepancies: this.discrepancies.export(),
      admin: this.admin.export(),
    };
  }

  private rollback(checkpoint: Checkpoint): void {
    this.pool.restore(checkpoint.pool);
    this.batches.rollback(checkpoint.batches);
    this.tracker.rollback(checkpoint.tracker);
    this.discrepancies.import(checkpoint.discrepancies);
    this.admin.import(checkpoint.admin);
  }

  private batchOptions(): BatchManagerOptions {
    return {
      batchPeriod: this.config.batchPeriod,
      unbondingPeriod: this.config.unbondingPeriod,
      minimumUnstake: this.config.minimumLiquidUnstakeAmount,
    };
  }

  private assertIdentity(identity: string): void {
    if (!this.identity.validate(identity)) {
      throw new ProtocolError("INVALID_IDENTITY", `Invalid identity: '${identity}'`);
    }
  }

  private assertConfigIdentities(): void {
    const { protocolAddress, owner, treasuryAddress, stakerAddress, operators } = this.config;
    for (const id of [protocolAddress, owner, treasuryAddress, stakerAddress, ...operators]) {
      this.assertIdentity(id);
    }
  }
}

function received(batch: Batch): Amount {
  return batch.receivedNativeUnbond.kind === "known" ? batch.receivedNativeUnbond.amount : 0n;
}
