/**
 * Ownership and validator administration.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { StakingProtocol } from "../src/staking-protocol.js";
import { ALICE, OWNER, T0, codeOf, ctx, setup } from "./helpers.js";

const NEXT_OWNER = "owner1next000";

describe("administration", () => {
  let protocol: StakingProtocol;

  beforeEach(() => {
    ({ protocol } = setup());
  });

  describe("two-step ownership", () => {
    it("hands over ownership only once the nominee accepts", () => {
      protocol.transferOwnership(NEXT_OWNER, ctx(OWNER, T0));
      expect(protocol.getState().owner).toBe(OWNER);
      expect(protocol.getState().pendingOwner).toBe(NEXT_OWNER);

      protocol.acceptOwnership(ctx(NEXT_OWNER, T0 + 1));
      expect(protocol.getState().owner).toBe(NEXT_OWNER);
      expect(protocol.getState().pendingOwner).toBeNull();

      // The previous owner has lost its rights
      expect(codeOf(() => protocol.transferOwnership(ALICE, ctx(OWNER, T0 + 2)))).toBe(
        "UNAUTHORIZED",
      );
    });

    it("only lets the owner nominate", () => {
      expect(codeOf(() => protocol.transferOwnership(ALICE, ctx(ALICE, T0)))).toBe(
        "UNAUTHORIZED",
      );
    });

    it("validates the nominee", () => {
      expect(codeOf(() => protocol.transferOwnership("not an address", ctx(OWNER, T0)))).toBe(
        "INVALID_IDENTITY",
      );
    });

    it("overwrites an earlier nomination", () => {
      protocol.transferOwnership(ALICE, ctx(OWNER, T0));
      protocol.transferOwnership(NEXT_OWNER, ctx(OWNER, T0 + 1));

      expect(codeOf(() => protocol.acceptOwnership(ctx(ALICE, T0 + 2)))).toBe("UNAUTHORIZED");
      protocol.acceptOwnership(ctx(NEXT_OWNER, T0 + 2));
      expect(protocol.getState().owner).toBe(NEXT_OWNER);
    });

    it("rejects acceptance once the nomination is revoked", () => {
      protocol.transferOwnership(NEXT_OWNER, ctx(OWNER, T0));
      protocol.revokeOwnershipTransfer(ctx(OWNER, T0 + 1));

      expect(codeOf(() => protocol.acceptOwnership(ctx(NEXT_OWNER, T0 + 2)))).toBe(
        "NO_PENDING_OWNER",
      );
      expect(codeOf(() => protocol.revokeOwnershipTransfer(ctx(OWNER, T0 + 3)))).toBe(
        "NO_PENDING_OWNER",
      );
    });
  });

  describe("validators", () => {
    it("adds and removes validators", () => {
      protocol.addValidator("valoper1node0002", ctx(OWNER, T0));
      expect(protocol.getState().validators).toEqual(["valoper1node0001", "valoper1node0002"]);

      protocol.removeValidator("valoper1node0001", ctx(OWNER, T0 + 1));
      expect(protocol.getState().validators).toEqual(["valoper1node0002"]);
    });

    it("rejects duplicates and unknown validators", () => {
      expect(codeOf(() => protocol.addValidator("valoper1node0001", ctx(OWNER, T0)))).toBe(
        "DUPLICATE_VALIDATOR",
      );
      expect(codeOf(() => protocol.removeValidator("valoper1node0009", ctx(OWNER, T0)))).toBe(
        "VALIDATOR_NOT_FOUND",
      );
    });

    it("is owner only", () => {
      expect(codeOf(() => protocol.addValidator("valoper1node0002", ctx(ALICE, T0)))).toBe(
        "UNAUTHORIZED",
      );
    });
  });
});
