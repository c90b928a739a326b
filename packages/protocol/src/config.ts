/**
 * @bondline/protocol — Protocol configuration.
 *
 * Validated with Zod. Amounts may be given as bigint, a non-negative
 * safe integer, or a decimal integer string.
 */

import { z } from "zod";
import { ProtocolError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const AmountSchema = z.union([
  z.bigint().nonnegative(),
  z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER).transform((v) => BigInt(v)),
  z.string().regex(/^\d+$/, "Expected a non-negative integer string").transform((v) => BigInt(v)),
]);

const identity = z.string().min(1);

export const ProtocolConfigSchema = z
  .object({
    /** The protocol's own address; the only sender allowed to submit batches. */
    protocolAddress: identity,
    /** Initial owner. Later ownership lives in the admin state. */
    owner: identity,
    nativeDenom: z.string().min(1),
    derivativeDenom: z.string().min(1),
    /** Receives protocol fees on collected rewards. */
    treasuryAddress: identity,
    /** Remote account stake deposits are forwarded to. */
    stakerAddress: identity,
    operators: z.array(identity).default([]),
    validators: z.array(identity).default([]),

    batchPeriod: z.number().int().nonnegative(),
    unbondingPeriod: z.number().int().nonnegative(),
    protocolFeeBps: z.number().int().min(0).max(10_000).default(0),

    minimumLiquidStakeAmount: AmountSchema.default(1n),
    minimumLiquidUnstakeAmount: AmountSchema.default(1n),
    minimumRewardsToCollect: AmountSchema.default(1n),

    underflowPolicy: z.enum(["fail", "clamp"]).default("fail"),
  })
  .superRefine((config, ctx) => {
    const minimums = [
      "minimumLiquidStakeAmount",
      "minimumLiquidUnstakeAmount",
      "minimumRewardsToCollect",
    ] as const;
    for (const key of minimums) {
      if (config[key] < 1n) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "Must be at least 1",
        });
      }
    }
    if (config.nativeDenom === config.derivativeDenom) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["derivativeDenom"],
        message: "Derivative denom must differ from the native denom",
      });
    }
  });

/** Configuration after validation and defaults. */
export type ProtocolConfig = z.output<typeof ProtocolConfigSchema>;

/** Configuration as accepted from callers, files or the environment. */
export type ProtocolConfigInput = z.input<typeof ProtocolConfigSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate protocol configuration.
 *
 * @throws {ProtocolError} INVALID_CONFIG listing every failing field
 */
export function parseProtocolConfig(input: unknown): ProtocolConfig {
  const result = ProtocolConfigSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ProtocolError(
      "INVALID_CONFIG",
      `Invalid protocol configuration: ${details.join("; ")}`,
      details,
    );
  }
  return result.data;
}
