/**
 * @bondline/pool — Pool totals and exchange-rate arithmetic.
 *
 * Converts between native deposits and derivative shares and keeps
 * the pool's running totals:
 * - Every division floors in the pool's favour
 * - All arithmetic uses bigint (no floating point)
 * - Zero runtime dependencies beyond shared types
 */

// Core engine
export { PoolLedger } from "./pool-ledger.js";

// Exchange-rate calculator
export {
  computeMintAmount,
  computeUnbondAmount,
  computeClaimAmount,
  computeProtocolFee,
  computeRedemptionRate,
  RATE_DECIMALS,
  BPS_DENOMINATOR,
} from "./exchange-rate.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  formatRatio,
  assertNonNegative,
  assertPositive,
  saturatingSub,
} from "./amount-math.js";

// Types
export type {
  PoolErrorCode,
  UnderflowPolicy,
  SettlementResult,
} from "./types.js";

export { PoolError, EMPTY_POOL } from "./types.js";
