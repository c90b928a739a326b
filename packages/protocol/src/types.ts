/**
 * @bondline/protocol — Types for the staking protocol aggregate.
 */

import type { BatchErrorCode } from "@bondline/batches";
import { BatchError } from "@bondline/batches";
import type { PoolErrorCode } from "@bondline/pool";
import { PoolError } from "@bondline/pool";
import type { TrackerErrorCode } from "@bondline/reconciler";
import { TrackerError } from "@bondline/reconciler";
import type { Amount, Identity, MessageId, Timestamp } from "@bondline/types";

// =============================================================================
// Errors
// =============================================================================

export type ProtocolErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_IDENTITY"
  | "INVALID_CONFIG"
  | "INVALID_SNAPSHOT"
  | "BELOW_MINIMUM"
  | "NOTHING_TO_CLAIM"
  | "NO_PENDING_OWNER"
  | "DUPLICATE_VALIDATOR"
  | "VALIDATOR_NOT_FOUND"
  | "DISPATCH_FAILED";

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;
  public readonly details?: readonly string[] | undefined;

  constructor(code: ProtocolErrorCode, message: string, details?: readonly string[]) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
    this.details = details;
  }
}

/** Any error code raised by a Bondline package. */
export type DomainErrorCode =
  | PoolErrorCode
  | BatchErrorCode
  | TrackerErrorCode
  | ProtocolErrorCode;

export type DomainError = PoolError | BatchError | TrackerError | ProtocolError;

export type ErrorCategory =
  | "validation"    // Bad input; retry with corrected input
  | "invariant"     // Would break an accounting invariant; needs review
  | "authorization" // Caller may not perform this action
  | "conflict"      // Valid input, wrong lifecycle state
  | "not-found"
  | "dispatch";     // A collaborator could not emit an instruction

const ERROR_CATEGORIES: Record<DomainErrorCode, ErrorCategory> = {
  INVALID_AMOUNT: "validation",
  INVALID_FEE: "validation",
  INVALID_OPTIONS: "validation",
  INVALID_IDENTITY: "validation",
  INVALID_CONFIG: "validation",
  INVALID_SNAPSHOT: "validation",
  BELOW_MINIMUM: "validation",

  ZERO_MINT: "invariant",
  DEPLETED_POOL: "invariant",
  SETTLEMENT_UNDERFLOW: "invariant",
  EMPTY_BATCH: "invariant",

  UNAUTHORIZED: "authorization",

  BATCH_NOT_PENDING: "conflict",
  BATCH_NOT_SUBMITTED: "conflict",
  BATCH_NOT_RECEIVED: "conflict",
  ALREADY_REDEEMED: "conflict",
  ALREADY_RESOLVED: "conflict",
  DUPLICATE_IDENTIFIER: "conflict",
  DUPLICATE_VALIDATOR: "conflict",
  NO_PENDING_OWNER: "conflict",
  NOTHING_TO_CLAIM: "conflict",

  BATCH_NOT_FOUND: "not-found",
  REQUEST_NOT_FOUND: "not-found",
  DISCREPANCY_NOT_FOUND: "not-found",
  VALIDATOR_NOT_FOUND: "not-found",

  DISPATCH_FAILED: "dispatch",
};

export function isDomainError(err: unknown): err is DomainError {
  return (
    err instanceof PoolError ||
    err instanceof BatchError ||
    err instanceof TrackerError ||
    err instanceof ProtocolError
  );
}

/**
 * Place an error in the taxonomy. Anything that is not a domain error
 * is reported as undefined.
 */
export function classifyError(
  err: unknown,
): { readonly code: DomainErrorCode; readonly category: ErrorCategory } | undefined {
  if (!isDomainError(err)) return undefined;
  return { code: err.code, category: ERROR_CATEGORIES[err.code] };
}

// =============================================================================
// Collaborators
// =============================================================================

/** Who is calling and when. `now` is Unix seconds. */
export interface ExecutionContext {
  readonly sender: Identity;
  readonly now: Timestamp;
}

/**
 * Emissions made during an operation are held until the operation
 * finishes: commit() releases them, discard() drops them. Both are no-ops
 * when nothing is held.
 */
export interface StagedDispatch {
  commit(): void;
  discard(): void;
}

/**
 * Token mint/burn/transfer primitives. Each call stages an instruction and
 * returns its identifier, or throws when it cannot be emitted.
 */
export interface TokenCustody extends StagedDispatch {
  mint(denom: string, amount: Amount, recipient: Identity): MessageId;
  burn(denom: string, amount: Amount, source: Identity): MessageId;
  transfer(denom: string, amount: Amount, recipient: Identity): MessageId;
}

export interface CrossChainTransferRequest {
  readonly denom: string;
  readonly amount: Amount;
  readonly destination: Identity;
  readonly memo: string;
}

/**
 * Dispatches value to the remote chain. Replies come back through
 * StakingProtocol.handleReply().
 */
export interface CrossChainTransport extends StagedDispatch {
  sendTransfer(request: CrossChainTransferRequest): MessageId;
}

export interface IdentityValidator {
  validate(identity: string): boolean;
}
