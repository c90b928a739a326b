/**
 * @bondline/protocol — Liquid-staking protocol aggregate.
 *
 * Composes the pool, batch lifecycle and reply tracker behind a single
 * synchronous API:
 * - stake / unstake / submitBatch / claim / collectRewards
 * - handleReply for asynchronous cross-chain and custody replies
 * - two-step ownership and the validator list
 * - JSON read projections, snapshots and a canonical state hash
 */

// Aggregate
export { StakingProtocol } from "./staking-protocol.js";
export type {
  StakingProtocolDeps,
  StakeResult,
  UnstakeResult,
  SubmitResult,
  ClaimResult,
  RewardsResult,
} from "./staking-protocol.js";

// Configuration
export { ProtocolConfigSchema, AmountSchema, parseProtocolConfig } from "./config.js";
export type { ProtocolConfig, ProtocolConfigInput } from "./config.js";

// Collaborators
export { AddressShapeValidator, DEFAULT_IDENTITY_PATTERN } from "./identity.js";
export { InMemoryOutbox } from "./outbox.js";
export type { OutboxInstruction, OutboxInstructionType } from "./outbox.js";
export { AdminRegistry } from "./admin.js";
export type { AdminState } from "./admin.js";

// Projections
export {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  resolveLimit,
  toBatchView,
  toDiscrepancyView,
  toTransferView,
  toReplyView,
} from "./queries.js";
export type {
  PageOptions,
  ConfigView,
  PoolStateView,
  UnstakeRequestView,
  BatchView,
  TransferView,
  ReplyView,
  DiscrepancyView,
  ClaimableView,
} from "./queries.js";

// Snapshots
export { SNAPSHOT_VERSION, ProtocolSnapshotSchema, hashSnapshot, parseSnapshot } from "./snapshot.js";
export type { ProtocolSnapshot, RestoredState } from "./snapshot.js";

// Errors and collaborator contracts
export { ProtocolError, classifyError, isDomainError } from "./types.js";
export type {
  ProtocolErrorCode,
  DomainErrorCode,
  DomainError,
  ErrorCategory,
  ExecutionContext,
  TokenCustody,
  StagedDispatch,
  CrossChainTransport,
  CrossChainTransferRequest,
  IdentityValidator,
} from "./types.js";
