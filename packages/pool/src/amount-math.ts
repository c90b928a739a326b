/**
 * @bondline/pool — Deterministic integer arithmetic.
 *
 * All amounts are bigint base units. Conversion to and from decimal
 * strings happens only at the edges (snapshots, projections, HTTP).
 *
 * Rules:
 * - No floating-point operations
 * - Division always floors
 * - Negative amounts are rejected
 */

import type { Amount } from "@bondline/types";
import { PoolError } from "./types.js";

/**
 * Parse a non-negative integer string into an amount.
 *
 * "1500" → 1500n
 * "0" → 0n
 */
export function parseAmount(amount: string): Amount {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new PoolError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new PoolError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  return BigInt(trimmed);
}

/**
 * Render an amount as a decimal integer string.
 */
export function formatAmount(amount: Amount): string {
  return amount.toString();
}

/**
 * Render `numerator / denominator` as a decimal string with at most
 * `decimals` fractional digits, truncated, trailing zeros removed.
 *
 * (1500n, 1500n) → "1"
 * (900n, 1000n) → "0.9"
 * (1n, 3n, 4) → "0.3333"
 */
export function formatRatio(
  numerator: Amount,
  denominator: Amount,
  decimals: number,
): string {
  if (denominator === 0n) {
    throw new PoolError("INVALID_AMOUNT", "Ratio denominator must be non-zero");
  }

  const scaled = (numerator * 10n ** BigInt(decimals)) / denominator;
  const digits = scaled.toString().padStart(decimals + 1, "0");
  const intPart = digits.slice(0, digits.length - decimals);
  const fracPart = digits.slice(digits.length - decimals).replace(/0+$/, "");

  return fracPart === "" ? intPart : `${intPart}.${fracPart}`;
}

/**
 * Assert an amount is non-negative.
 * Throws PoolError with the given label in the message.
 */
export function assertNonNegative(amount: Amount, label: string): void {
  if (amount < 0n) {
    throw new PoolError(
      "INVALID_AMOUNT",
      `${label} must be non-negative, got ${amount.toString()}`,
    );
  }
}

/**
 * Assert an amount is strictly positive.
 */
export function assertPositive(amount: Amount, label: string): void {
  if (amount <= 0n) {
    throw new PoolError(
      "INVALID_AMOUNT",
      `${label} must be positive, got ${amount.toString()}`,
    );
  }
}

/**
 * Subtract, flooring at zero. Returns the result and what could not be deducted.
 */
export function saturatingSub(
  a: Amount,
  b: Amount,
): { readonly value: Amount; readonly shortfall: Amount } {
  if (b > a) {
    return { value: 0n, shortfall: b - a };
  }
  return { value: a - b, shortfall: 0n };
}
