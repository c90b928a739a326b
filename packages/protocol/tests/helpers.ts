/**
 * Shared fixtures for protocol tests.
 */

import { classifyError } from "../src/types.js";
import type { ProtocolConfigInput } from "../src/config.js";
import type { ExecutionContext } from "../src/types.js";
import { InMemoryOutbox } from "../src/outbox.js";
import { StakingProtocol } from "../src/staking-protocol.js";

export const T0 = 1_700_000_000;
export const DAY = 86_400;
export const UNBONDING = 21 * DAY;

export const PROTOCOL = "proto1contract";
export const OWNER = "owner1admin00";
export const OPERATOR = "oper1ator000";
export const TREASURY = "treasury1fees00";
export const STAKER = "remote1staker0";
export const ALICE = "user1alice00";
export const BOB = "user1bobbb00";
export const CAROL = "user1carol00";

export const CONFIG: ProtocolConfigInput = {
  protocolAddress: PROTOCOL,
  owner: OWNER,
  nativeDenom: "unative",
  derivativeDenom: "ustnative",
  treasuryAddress: TREASURY,
  stakerAddress: STAKER,
  operators: [OPERATOR],
  validators: ["valoper1node0001"],
  batchPeriod: DAY,
  unbondingPeriod: UNBONDING,
  protocolFeeBps: 500,
};

export function ctx(sender: string, now: number): ExecutionContext {
  return { sender, now };
}

export function setup(overrides: Partial<ProtocolConfigInput> = {}): {
  protocol: StakingProtocol;
  outbox: InMemoryOutbox;
} {
  const outbox = new InMemoryOutbox();
  const protocol = new StakingProtocol(
    { ...CONFIG, ...overrides },
    { custody: outbox, transport: outbox },
    T0,
  );
  return { protocol, outbox };
}

/** The domain error code `fn` throws, or undefined if it returns. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    const classified = classifyError(err);
    if (classified) return classified.code;
    throw err;
  }
  return undefined;
}
