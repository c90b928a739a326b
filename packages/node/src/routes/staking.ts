/**
 * Staking routes. The caller is the authenticated identity.
 *
 * POST /api/v1/stake    — Deposit native token, mint derivative
 * POST /api/v1/unstake  — Queue derivative for redemption
 * POST /api/v1/claim    — Collect every received batch payout
 * POST /api/v1/rewards  — Add collected rewards (operator, admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountBodySchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission, senderOf } from "../middleware/auth.js";

export function createStakingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/stake", requirePermission("transact"), async (c) => {
    const sender = senderOf(c);
    const { amount } = await readBody(c, AmountBodySchema);
    return c.json({ data: c.get("service").stake(sender, amount) }, 201);
  });

  routes.post("/unstake", requirePermission("transact"), async (c) => {
    const sender = senderOf(c);
    const { amount } = await readBody(c, AmountBodySchema);
    return c.json({ data: c.get("service").unstake(sender, amount) }, 201);
  });

  routes.post("/claim", requirePermission("transact"), (c) => {
    const sender = senderOf(c);
    return c.json({ data: c.get("service").claim(sender) });
  });

  routes.post("/rewards", requirePermission("collect-rewards"), async (c) => {
    const sender = senderOf(c);
    const { amount } = await readBody(c, AmountBodySchema);
    return c.json({ data: c.get("service").collectRewards(sender, amount) });
  });

  return routes;
}
