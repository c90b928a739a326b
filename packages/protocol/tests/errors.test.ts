/**
 * Error taxonomy.
 */

import { describe, it, expect } from "vitest";
import { BatchError } from "@bondline/batches";
import { PoolError } from "@bondline/pool";
import { TrackerError } from "@bondline/reconciler";
import { ProtocolError, classifyError } from "../src/types.js";

describe("classifyError", () => {
  it("places each package's errors in the taxonomy", () => {
    expect(classifyError(new PoolError("ZERO_MINT", "x"))).toEqual({
      code: "ZERO_MINT",
      category: "invariant",
    });
    expect(classifyError(new BatchError("BELOW_MINIMUM", "x"))?.category).toBe("validation");
    expect(classifyError(new BatchError("BATCH_NOT_PENDING", "x"))?.category).toBe("conflict");
    expect(classifyError(new TrackerError("DISCREPANCY_NOT_FOUND", "x"))?.category).toBe(
      "not-found",
    );
    expect(classifyError(new ProtocolError("UNAUTHORIZED", "x"))?.category).toBe(
      "authorization",
    );
    expect(classifyError(new PoolError("SETTLEMENT_UNDERFLOW", "x"))?.category).toBe(
      "invariant",
    );
  });

  it("ignores errors from outside the domain", () => {
    expect(classifyError(new Error("boom"))).toBeUndefined();
    expect(classifyError("boom")).toBeUndefined();
  });
});
