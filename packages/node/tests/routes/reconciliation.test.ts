/**
 * Tests for in-flight listings, relayer replies and the discrepancy log.
 */

import { describe, it, expect } from "vitest";
import {
  ALICE,
  OWNER,
  STAKER,
  T0,
  asRelayer,
  asSender,
  createTestApp,
  jsonRequest,
} from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";
import type { DiscrepancyView, ReplyView, TransferView } from "@bondline/protocol";
import type { InstructionView, ReplyResponse, SubmitResponse } from "../../src/types/dto.js";

async function stakedApp(): Promise<TestApp> {
  const t = createTestApp();
  await t.app.request(asSender(ALICE, "/api/v1/stake", "POST", { amount: "1000" }));
  return t;
}

async function failStakeTransfer(t: TestApp): Promise<void> {
  await t.app.request(
    asRelayer("/api/v1/relayer/replies/msg-1", "POST", { kind: "failure", reason: "channel closed" }),
  );
}

// =============================================================================
// Listings
// =============================================================================

describe("in-flight listings", () => {
  it("lists the stake transfer and the mint awaiting replies", async () => {
    const t = await stakedApp();

    const transfers = (await (await t.app.request("/api/v1/transfers")).json()) as {
      data: TransferView[];
    };
    expect(transfers.data).toEqual([
      {
        id: "msg-1",
        sequence: 1,
        purpose: "stake",
        batchId: null,
        amount: "1000",
        destination: STAKER,
        dispatchedAt: T0,
      },
    ]);

    const replies = (await (await t.app.request("/api/v1/replies")).json()) as {
      data: ReplyView[];
    };
    expect(replies.data).toEqual([
      { id: "msg-2", sequence: 2, kind: "mint", batchId: null, amount: "1000", dispatchedAt: T0 },
    ]);
  });

  it("shows every emitted instruction to the relayer", async () => {
    const t = await stakedApp();
    const res = await t.app.request(asRelayer("/api/v1/relayer/instructions", "GET"));

    expect(res.status).toBe(200);
    const { data } = (await res.json()) as { data: InstructionView[] };
    expect(data).toEqual([
      {
        id: "msg-1",
        type: "cross-chain",
        denom: "unative",
        amount: "1000",
        counterparty: STAKER,
        memo: `stake:${ALICE}`,
      },
      {
        id: "msg-2",
        type: "mint",
        denom: "ustnative",
        amount: "1000",
        counterparty: ALICE,
        memo: null,
      },
    ]);
  });
});

// =============================================================================
// Relayer replies
// =============================================================================

describe("POST /api/v1/relayer/replies/:id", () => {
  it("settles a mint acknowledgement", async () => {
    const t = await stakedApp();
    const res = await t.app.request(
      asRelayer("/api/v1/relayer/replies/msg-2", "POST", { kind: "success" }),
    );

    expect(await res.json()).toEqual({
      data: { kind: "settled", identifier: "msg-2", receivedAmount: "1000" },
    });
    expect(t.service.getState().pendingReplies).toBe(0);
  });

  it("records a failed transfer as a discrepancy", async () => {
    const t = await stakedApp();
    t.clock.now = T0 + 30;
    const res = await t.app.request(
      asRelayer("/api/v1/relayer/replies/msg-1", "POST", { kind: "failure", reason: "channel closed" }),
    );

    expect(res.status).toBe(200);
    const { data } = (await res.json()) as { data: ReplyResponse };
    expect(data).toEqual({
      kind: "discrepancy",
      identifier: "msg-1",
      discrepancy: {
        id: "disc-1",
        identifier: "msg-1",
        kind: "failure",
        subject: "stake",
        amount: "1000",
        batchId: null,
        reason: "channel closed",
        detectedAt: T0 + 30,
        resolution: null,
      },
    });
    expect(t.service.getState().inFlightTransfers).toBe(0);
  });

  it("records an unknown identifier", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      asRelayer("/api/v1/relayer/replies/msg-99", "POST", { kind: "timeout" }),
    );

    const { data } = (await res.json()) as { data: ReplyResponse };
    expect(data.kind).toBe("discrepancy");
    if (data.kind === "discrepancy") {
      expect(data.discrepancy.kind).toBe("unknown-identifier");
      expect(data.discrepancy.subject).toBe("unknown");
      expect(data.discrepancy.reason).toBe(
        "No in-flight transfer or pending reply with identifier 'msg-99'",
      );
    }
  });

  it("rejects an outcome of unknown kind", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      asRelayer("/api/v1/relayer/replies/msg-1", "POST", { kind: "bounced" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("relayer authentication", () => {
  it("requires credentials", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      jsonRequest("/api/v1/relayer/replies/msg-1", "POST", { kind: "timeout" }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Authentication required" });
  });

  it("rejects a wrong key", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      jsonRequest("/api/v1/relayer/replies/msg-1", "POST", { kind: "timeout" }, {
        "X-Api-Key": "not-the-key",
      }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });

  it("is closed to other roles", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      asSender(OWNER, "/api/v1/relayer/replies/msg-1", "POST", { kind: "timeout" }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "FORBIDDEN",
      message: "Role 'admin' lacks 'relay' permission",
    });
  });
});

// =============================================================================
// Batch submission
// =============================================================================

describe("POST /api/v1/relayer/batches/:id/submit", () => {
  it("submits the open batch before its close time", async () => {
    const t = await stakedApp();
    t.clock.now = T0 + 10;
    await t.app.request(asSender(ALICE, "/api/v1/unstake", "POST", { amount: "300" }));

    const res = await t.app.request(asRelayer("/api/v1/relayer/batches/1/submit"));

    expect(res.status).toBe(200);
    const { data } = (await res.json()) as { data: SubmitResponse };
    expect(data.batch.status).toBe("submitted");
    expect(data.unbondAmount).toBe("300");
    expect(data.burnId).toBe("msg-3");
    expect(data.unbondTransferId).toBe("msg-4");
    expect(data.nextBatchId).toBe(2);
  });

  it("refuses a batch that is no longer open", async () => {
    const t = await stakedApp();
    await t.app.request(asSender(ALICE, "/api/v1/unstake", "POST", { amount: "300" }));
    await t.app.request(asRelayer("/api/v1/relayer/batches/1/submit"));

    const res = await t.app.request(asRelayer("/api/v1/relayer/batches/1/submit"));

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("BATCH_NOT_PENDING");
  });

  it("refuses an empty batch", async () => {
    const t = createTestApp();
    const res = await t.app.request(asRelayer("/api/v1/relayer/batches/1/submit"));

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "EMPTY_BATCH",
      message: "Batch 1 has no unstake requests",
    });
  });
});

// =============================================================================
// Discrepancies
// =============================================================================

describe("discrepancy log", () => {
  it("filters by status and resolves as the owner", async () => {
    const t = await stakedApp();
    await failStakeTransfer(t);

    const open = (await (await t.app.request("/api/v1/discrepancies?status=open")).json()) as {
      data: DiscrepancyView[];
    };
    expect(open.data.map((d) => d.id)).toEqual(["disc-1"]);

    t.clock.now = T0 + 50;
    const res = await t.app.request(
      asSender(OWNER, "/api/v1/discrepancies/disc-1/resolve", "POST", { note: "refunded" }),
    );
    expect(res.status).toBe(200);
    const { data } = (await res.json()) as { data: DiscrepancyView };
    expect(data.resolution).toEqual({ resolvedBy: OWNER, note: "refunded", resolvedAt: T0 + 50 });

    const stillOpen = (await (await t.app.request("/api/v1/discrepancies?status=open")).json()) as {
      data: DiscrepancyView[];
    };
    expect(stillOpen.data).toEqual([]);

    const resolved = (await (await t.app.request("/api/v1/discrepancies?status=resolved")).json()) as {
      data: DiscrepancyView[];
    };
    expect(resolved.data.map((d) => d.id)).toEqual(["disc-1"]);
  });

  it("refuses a second resolution", async () => {
    const t = await stakedApp();
    await failStakeTransfer(t);
    await t.app.request(
      asSender(OWNER, "/api/v1/discrepancies/disc-1/resolve", "POST", { note: "refunded" }),
    );

    const res = await t.app.request(
      asSender(OWNER, "/api/v1/discrepancies/disc-1/resolve", "POST", { note: "again" }),
    );

    expect(res.status).toBe(409);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("ALREADY_RESOLVED");
  });

  it("is owner only", async () => {
    const t = await stakedApp();
    await failStakeTransfer(t);

    const res = await t.app.request(
      asSender(ALICE, "/api/v1/discrepancies/disc-1/resolve", "POST", { note: "mine" }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("FORBIDDEN");
  });

  it("answers 404 for an unknown discrepancy", async () => {
    const t = createTestApp();
    const res = await t.app.request(
      asSender(OWNER, "/api/v1/discrepancies/disc-9/resolve", "POST", { note: "n/a" }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("DISCREPANCY_NOT_FOUND");
  });

  it("rejects an unknown status filter", async () => {
    const t = createTestApp();
    const res = await t.app.request("/api/v1/discrepancies?status=stale");

    expect(res.status).toBe(400);
  });
});
