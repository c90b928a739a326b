/**
 * Test helpers for @bondline/node.
 *
 * Builds the app with every middleware and route but no HTTP server, on a
 * clock the test moves by hand.
 */

import type { ProtocolConfigInput } from "@bondline/protocol";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { AuthConfig } from "../src/middleware/auth.js";
import type { ApiKeyRecord } from "../src/types/auth.js";

export const T0 = 1_700_000_000;
export const DAY = 86_400;
export const UNBONDING = 21 * DAY;

export const RELAYER_KEY = "test-secret";
export const JWT_SECRET = "test-jwt-secret";

export const PROTOCOL = "proto1contract";
export const OWNER = "owner1admin00";
export const OPERATOR = "oper1ator000";
export const TREASURY = "treasury1fees00";
export const STAKER = "remote1staker0";
export const ALICE = "user1alice00";
export const BOB = "user1bobbb00";
export const RELAYER = "relayer1node00";

/** One key per test identity. "nobody" is not a valid address. */
export const API_KEYS: readonly ApiKeyRecord[] = [
  { key: "owner-key", role: "admin", identity: OWNER },
  { key: "operator-key", role: "operator", identity: OPERATOR },
  { key: "alice-key", role: "staker", identity: ALICE },
  { key: "bob-key", role: "staker", identity: BOB },
  { key: "nobody-key", role: "staker", identity: "nobody" },
  { key: RELAYER_KEY, role: "relayer", identity: RELAYER },
];

export function authConfig(keys: readonly ApiKeyRecord[] = API_KEYS): AuthConfig {
  return {
    apiKeys: new Map(keys.map((record) => [record.key, record])),
    jwtSecret: JWT_SECRET,
    jwtIssuer: "bondline",
  };
}

export function keyFor(identity: string): string {
  const record = API_KEYS.find((candidate) => candidate.identity === identity);
  if (record === undefined) {
    throw new Error(`No test key for ${identity}`);
  }
  return record.key;
}

export const PROTOCOL_CONFIG: ProtocolConfigInput = {
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

export interface TestClock {
  now: number;
}

export interface TestApp extends AppInstance {
  readonly clock: TestClock;
}

/**
 * Create a test app starting at T0. Options override the defaults.
 */
export function createTestApp(options: Partial<CreateAppOptions> = {}): TestApp {
  const clock: TestClock = { now: T0 };
  const instance = createApp({
    clock: () => clock.now,
    ...options,
    protocolConfig: options.protocolConfig ?? PROTOCOL_CONFIG,
    auth: options.auth ?? authConfig(),
  });
  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/** A request authenticated with the API key of `sender`. */
export function asSender(
  sender: string,
  path: string,
  method: string = "POST",
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Api-Key": keyFor(sender) });
}

/** A relayer request carrying the test key. */
export function asRelayer(path: string, method: string = "POST", body?: unknown): Request {
  return jsonRequest(path, method, body, { "X-Api-Key": RELAYER_KEY });
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
