/**
 * Snapshots and the canonical state hash.
 */

import { describe, it, expect } from "vitest";
import { InMemoryOutbox } from "../src/outbox.js";
import { StakingProtocol } from "../src/staking-protocol.js";
import type { ProtocolSnapshot } from "../src/snapshot.js";
import { ALICE, BOB, DAY, OWNER, PROTOCOL, T0, codeOf, ctx, setup } from "./helpers.js";

function busyProtocol(): StakingProtocol {
  const { protocol } = setup({ underflowPolicy: "clamp" });
  protocol.stake(1000n, ctx(ALICE, T0));
  protocol.stake(500n, ctx(BOB, T0 + 1));
  protocol.unstake(100n, ctx(ALICE, T0 + 2));
  protocol.unstake(50n, ctx(BOB, T0 + 3));
  const { unbondTransferId } = protocol.submitBatch(1, ctx(PROTOCOL, T0 + DAY));
  protocol.unstake(25n, ctx(BOB, T0 + DAY + 5));
  protocol.handleReply(unbondTransferId, { kind: "success" }, T0 + 30 * DAY);
  protocol.handleReply("ghost-1", { kind: "timeout" }, T0 + 30 * DAY + 2);
  protocol.transferOwnership("owner1next000", ctx(OWNER, T0 + 30 * DAY + 3));
  return protocol;
}

/** Round-trip through JSON text, as a persisted snapshot would. */
function reload(snapshot: ProtocolSnapshot): unknown {
  const parsed: unknown = JSON.parse(JSON.stringify(snapshot));
  return parsed;
}

describe("snapshots", () => {
  it("restores to the same state hash", () => {
    const protocol = busyProtocol();
    const outbox = new InMemoryOutbox("restored");
    const restored = StakingProtocol.fromSnapshot(reload(protocol.snapshot()), {
      custody: outbox,
      transport: outbox,
    });

    expect(restored.stateHash()).toBe(protocol.stateHash());
    expect(restored.getState()).toEqual(protocol.getState());
    expect(restored.getPendingBatch()).toEqual(protocol.getPendingBatch());
    expect(restored.listDiscrepancies()).toEqual(protocol.listDiscrepancies());
  });

  it("continues from where the snapshot left off", () => {
    const protocol = busyProtocol();
    const outbox = new InMemoryOutbox("restored");
    const restored = StakingProtocol.fromSnapshot(reload(protocol.snapshot()), {
      custody: outbox,
      transport: outbox,
    });

    const claim = restored.claim(ctx(ALICE, T0 + 31 * DAY));
    expect(claim.amount).toBe(100n);
    expect(claim.payoutId).toBe("restored-1");
    expect(restored.listPendingReplies({ limit: 30 }).at(-1)?.sequence).toBe(7);
    expect(restored.getPendingBatch().id).toBe(2);
  });

  it("produces a 64-character hex hash that tracks state changes", () => {
    const { protocol } = setup();
    const before = protocol.stateHash();
    expect(before).toMatch(/^[0-9a-f]{64}$/);

    protocol.stake(1000n, ctx(ALICE, T0));
    expect(protocol.stateHash()).not.toBe(before);
  });

  it("hashes independently of construction order", () => {
    const a = busyProtocol();
    const b = busyProtocol();
    expect(a.stateHash()).toBe(b.stateHash());
  });

  it("rejects malformed snapshots", () => {
    const outbox = new InMemoryOutbox();
    const deps = { custody: outbox, transport: outbox };

    expect(codeOf(() => StakingProtocol.fromSnapshot({ version: 2 }, deps))).toBe(
      "INVALID_SNAPSHOT",
    );
  });

  it("rejects a batch whose total disagrees with its requests", () => {
    const snapshot = busyProtocol().snapshot();
    const tampered = {
      ...snapshot,
      batches: snapshot.batches.map((b) => (b.id === 2 ? { ...b, totalDerivative: "26" } : b)),
    };
    const outbox = new InMemoryOutbox();

    expect(
      codeOf(() =>
        StakingProtocol.fromSnapshot(reload(tampered), { custody: outbox, transport: outbox }),
      ),
    ).toBe("INVALID_SNAPSHOT");
  });

  it("rejects negative-looking amounts", () => {
    const snapshot = busyProtocol().snapshot();
    const tampered = {
      ...snapshot,
      pool: { ...snapshot.pool, totalNativeToken: "-5" },
    };
    const outbox = new InMemoryOutbox();

    expect(
      codeOf(() =>
        StakingProtocol.fromSnapshot(reload(tampered), { custody: outbox, transport: outbox }),
      ),
    ).toBe("INVALID_SNAPSHOT");
  });
});
