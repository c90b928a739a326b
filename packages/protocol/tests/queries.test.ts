/**
 * Read projections and pagination.
 */

import { describe, it, expect } from "vitest";
import { resolveLimit } from "../src/queries.js";
import { ALICE, DAY, PROTOCOL, T0, codeOf, ctx, setup } from "./helpers.js";

describe("resolveLimit", () => {
  it("defaults to 10 and caps at 30", () => {
    expect(resolveLimit(undefined)).toBe(10);
    expect(resolveLimit(5)).toBe(5);
    expect(resolveLimit(100)).toBe(30);
    expect(resolveLimit(0)).toBe(1);
    expect(resolveLimit(Number.NaN)).toBe(10);
  });
});

describe("queries", () => {
  it("renders the configuration with string amounts", () => {
    const { protocol } = setup({ minimumLiquidStakeAmount: 250n });
    const config = protocol.getConfig();

    expect(config.minimumLiquidStakeAmount).toBe("250");
    expect(config.minimumLiquidUnstakeAmount).toBe("1");
    expect(config.protocolFeeBps).toBe(500);
    expect(config.underflowPolicy).toBe("fail");
  });

  it("reports an empty pool with a zero rate", () => {
    const { protocol } = setup();
    expect(protocol.getState()).toEqual({
      totalNativeToken: "0",
      totalDerivativeToken: "0",
      totalRewardAmount: "0",
      redemptionRate: "0",
      pendingBatchId: 1,
      owner: "owner1admin00",
      pendingOwner: null,
      validators: ["valoper1node0001"],
      inFlightTransfers: 0,
      pendingReplies: 0,
      openDiscrepancies: 0,
    });
  });

  it("renders the pending batch with unset slots as null", () => {
    const { protocol } = setup();
    expect(protocol.getPendingBatch()).toEqual({
      id: 1,
      status: "pending",
      totalDerivative: "0",
      expectedNativeUnbond: null,
      receivedNativeUnbond: null,
      nextActionTime: T0 + DAY,
      requests: [],
    });
  });

  it("reports unknown batches", () => {
    const { protocol } = setup();
    expect(codeOf(() => protocol.getBatch(5))).toBe("BATCH_NOT_FOUND");
  });

  it("pages through batches in ascending order", () => {
    const { protocol } = setup();
    protocol.stake(1_000_000n, ctx(ALICE, T0));
    for (let i = 0; i < 34; i++) {
      const now = T0 + i;
      protocol.unstake(1n, ctx(ALICE, now));
      protocol.submitBatch(protocol.getPendingBatch().id, ctx(PROTOCOL, now));
    }

    expect(protocol.listBatches().map((b) => b.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(protocol.listBatches({ limit: 100 })).toHaveLength(30);
    expect(protocol.listBatches({ startAfter: 30, limit: 30 }).map((b) => b.id)).toEqual([
      31, 32, 33, 34, 35,
    ]);
    expect(protocol.getPendingBatch().id).toBe(35);
  });
});
