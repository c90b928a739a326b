/**
 * Type barrel — re-exports all public types from @bondline/node.
 */

// DTOs
export {
  PageQuerySchema,
  IdentitySchema,
  AmountBodySchema,
  ReplyOutcomeSchema,
  ListDiscrepanciesQuerySchema,
  ResolveDiscrepancySchema,
  TransferOwnershipSchema,
  AddValidatorSchema,
} from "./dto.js";
export type {
  PageQuery,
  AmountBody,
  ReplyOutcomeDto,
  StakeResponse,
  SubmitResponse,
  UnstakeResponse,
  ClaimResponse,
  RewardsResponse,
  ReplyResponse,
  InstructionView,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission, JwtClaimsSchema } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord, JwtClaims } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
