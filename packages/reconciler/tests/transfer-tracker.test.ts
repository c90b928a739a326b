/**
 * TransferTracker tests
 *
 * Dispatch bookkeeping, reply correlation and the discrepancies that
 * come out of replies that cannot be applied.
 */
import { describe, it, expect, beforeEach } from "vitest";
import type { Amount } from "@bondline/types";
import { TransferTracker } from "../src/transfer-tracker.js";
import { DiscrepancyLog } from "../src/discrepancy-log.js";
import { TrackerError } from "../src/types.js";
import type { ReplyHandlers } from "../src/types.js";

const T0 = 1_700_000_000;

interface Received {
  readonly batchId: number;
  readonly amount: Amount;
  readonly at: number;
}

function recordingHandlers(received: Received[]): ReplyHandlers {
  return {
    onUnbondReceived(batchId, amount, at) {
      received.push({ batchId, amount, at });
    },
  };
}

const rejectingHandlers: ReplyHandlers = {
  onUnbondReceived(batchId) {
    throw new Error(`Batch ${String(batchId)} is received, not submitted`);
  },
};

describe("TransferTracker", () => {
  let log: DiscrepancyLog;
  let tracker: TransferTracker;
  let received: Received[];

  beforeEach(() => {
    log = new DiscrepancyLog();
    tracker = new TransferTracker(log);
    received = [];
  });

  describe("dispatch", () => {
    it("assigns increasing sequence numbers across both maps", () => {
      const a = tracker.trackTransfer({
        id: "msg-1",
        purpose: "stake",
        amount: 1000n,
        destination: "remote1staker0",
        dispatchedAt: T0,
      });
      const b = tracker.trackReply({ id: "msg-2", kind: "mint", amount: 1000n, dispatchedAt: T0 });
      const c = tracker.trackTransfer({
        id: "msg-3",
        purpose: "unbond",
        batchId: 1,
        amount: 150n,
        destination: "proto1contract",
        dispatchedAt: T0,
      });

      expect([a.sequence, b.sequence, c.sequence]).toEqual([1, 2, 3]);
      expect(tracker.inFlightCount).toBe(2);
      expect(tracker.pendingReplyCount).toBe(1);
    });

    it("rejects a duplicate identifier in either map", () => {
      tracker.trackReply({ id: "msg-1", kind: "mint", amount: 10n, dispatchedAt: T0 });

      let code: string | undefined;
      try {
        tracker.trackTransfer({
          id: "msg-1",
          purpose: "stake",
          amount: 10n,
          destination: "remote1staker0",
          dispatchedAt: T0,
        });
      } catch (err) {
        if (err instanceof TrackerError) code = err.code;
      }
      expect(code).toBe("DUPLICATE_IDENTIFIER");
      expect(tracker.inFlightCount).toBe(0);
    });

    it("lists entries in dispatch order after a sequence number", () => {
      for (let i = 1; i <= 5; i++) {
        tracker.trackReply({ id: `r-${String(i)}`, kind: "payout", amount: 1n, dispatchedAt: T0 });
      }

      expect(tracker.listReplies({ limit: 2 }).map((r) => r.id)).toEqual(["r-1", "r-2"]);
      expect(tracker.listReplies({ startAfter: 3, limit: 10 }).map((r) => r.id)).toEqual([
        "r-4",
        "r-5",
      ]);
    });
  });

  describe("successful replies", () => {
    beforeEach(() => {
      tracker.trackTransfer({
        id: "unbond-1",
        purpose: "unbond",
        batchId: 1,
        amount: 150n,
        destination: "proto1contract",
        dispatchedAt: T0,
      });
      tracker.trackReply({ id: "burn-1", kind: "burn", amount: 150n, batchId: 1, dispatchedAt: T0 });
    });

    it("settles an unbond transfer with the dispatched amount", () => {
      const result = tracker.resolve("unbond-1", { kind: "success" }, T0 + 5, recordingHandlers(received));

      expect(result.kind).toBe("settled");
      expect(received).toEqual([{ batchId: 1, amount: 150n, at: T0 + 5 }]);
      expect(tracker.getTransfer("unbond-1")).toBeUndefined();
    });

    it("passes on a reported received amount", () => {
      tracker.resolve(
        "unbond-1",
        { kind: "success", receivedAmount: 149n },
        T0 + 5,
        recordingHandlers(received),
      );
      expect(received[0]?.amount).toBe(149n);
    });

    it("settles replies out of order", () => {
      const first = tracker.resolve("burn-1", { kind: "success" }, T0 + 1, recordingHandlers(received));
      const second = tracker.resolve("unbond-1", { kind: "success" }, T0 + 2, recordingHandlers(received));

      expect(first.kind).toBe("settled");
      expect(second.kind).toBe("settled");
      expect(received).toHaveLength(1);
      expect(tracker.pendingReplyCount).toBe(0);
      expect(tracker.inFlightCount).toBe(0);
    });

    it("does not call the unbond handler for a pending instruction", () => {
      tracker.resolve("burn-1", { kind: "success" }, T0, recordingHandlers(received));
      expect(received).toEqual([]);
    });

    it("records a settlement-rejected discrepancy when the batch refuses", () => {
      const result = tracker.resolve("unbond-1", { kind: "success" }, T0 + 9, rejectingHandlers);

      expect(result.kind).toBe("discrepancy");
      if (result.kind !== "discrepancy") return;
      expect(result.discrepancy.kind).toBe("settlement-rejected");
      expect(result.discrepancy.batchId).toBe(1);
      expect(result.discrepancy.amount).toBe(150n);
      expect(result.discrepancy.reason).toBe("Batch 1 is received, not submitted");
      expect(tracker.getTransfer("unbond-1")).toBeUndefined();
    });
  });

  describe("failed replies", () => {
    beforeEach(() => {
      tracker.trackTransfer({
        id: "stake-1",
        purpose: "stake",
        amount: 500n,
        destination: "remote1staker0",
        dispatchedAt: T0,
      });
    });

    it("records a failure and drops the entry", () => {
      const result = tracker.resolve(
        "stake-1",
        { kind: "failure", reason: "channel closed" },
        T0 + 60,
        recordingHandlers(received),
      );

      expect(result.kind).toBe("discrepancy");
      if (result.kind !== "discrepancy") return;
      expect(result.discrepancy).toEqual({
        id: "disc-1",
        identifier: "stake-1",
        kind: "failure",
        subject: "stake",
        amount: 500n,
        batchId: undefined,
        reason: "channel closed",
        detectedAt: T0 + 60,
      });
      expect(tracker.inFlightCount).toBe(0);
    });

    it("records a timeout", () => {
      const result = tracker.resolve("stake-1", { kind: "timeout" }, T0 + 600, recordingHandlers(received));

      expect(result.kind).toBe("discrepancy");
      if (result.kind !== "discrepancy") return;
      expect(result.discrepancy.kind).toBe("timeout");
      expect(result.discrepancy.reason).toBe("No acknowledgement received for 'stake-1'");
    });

    it("does not retry: a second reply for the same id is unknown", () => {
      tracker.resolve("stake-1", { kind: "timeout" }, T0 + 600, recordingHandlers(received));
      const again = tracker.resolve("stake-1", { kind: "success" }, T0 + 700, recordingHandlers(received));

      expect(again.kind).toBe("discrepancy");
      if (again.kind !== "discrepancy") return;
      expect(again.discrepancy.kind).toBe("unknown-identifier");
      expect(log.list("open")).toHaveLength(2);
    });
  });

  describe("unknown identifiers", () => {
    it("records the reply without touching tracked entries", () => {
      tracker.trackReply({ id: "mint-1", kind: "mint", amount: 10n, dispatchedAt: T0 });

      const result = tracker.resolve("ghost-7", { kind: "success" }, T0, recordingHandlers(received));

      expect(result.kind).toBe("discrepancy");
      if (result.kind !== "discrepancy") return;
      expect(result.entry).toBeUndefined();
      expect(result.discrepancy.kind).toBe("unknown-identifier");
      expect(result.discrepancy.subject).toBe("unknown");
      expect(tracker.pendingReplyCount).toBe(1);
      expect(received).toEqual([]);
    });
  });

  describe("checkpoint and export", () => {
    it("rolls back entries and the sequence counter", () => {
      tracker.trackReply({ id: "mint-1", kind: "mint", amount: 10n, dispatchedAt: T0 });
      const checkpoint = tracker.checkpoint();

      tracker.trackReply({ id: "mint-2", kind: "mint", amount: 10n, dispatchedAt: T0 });
      tracker.rollback(checkpoint);

      expect(tracker.getReply("mint-2")).toBeUndefined();
      expect(tracker.trackReply({ id: "mint-3", kind: "mint", amount: 1n, dispatchedAt: T0 }).sequence).toBe(2);
    });

    it("imports what it exported", () => {
      tracker.trackTransfer({
        id: "stake-1",
        purpose: "stake",
        amount: 500n,
        destination: "remote1staker0",
        dispatchedAt: T0,
      });
      tracker.trackReply({ id: "mint-1", kind: "mint", amount: 500n, dispatchedAt: T0 });

      const copy = new TransferTracker(new DiscrepancyLog());
      copy.import(tracker.export());

      expect(copy.getTransfer("stake-1")?.sequence).toBe(1);
      expect(copy.getReply("mint-1")?.sequence).toBe(2);
      expect(copy.trackReply({ id: "mint-2", kind: "mint", amount: 1n, dispatchedAt: T0 }).sequence).toBe(3);
    });

    it("rejects an identifier present in both maps", () => {
      let code: string | undefined;
      try {
        tracker.import({
          transfers: [
            { id: "x", sequence: 1, purpose: "stake", amount: 1n, destination: "d1aaaaaa", dispatchedAt: T0 },
          ],
          replies: [{ id: "x", sequence: 2, kind: "mint", amount: 1n, dispatchedAt: T0 }],
          sequence: 2,
        });
      } catch (err) {
        if (err instanceof TrackerError) code = err.code;
      }
      expect(code).toBe("INVALID_SNAPSHOT");
    });
  });
});
