/**
 * Owner administration routes. The caller is the authenticated identity;
 * every route but accept needs the administer permission.
 *
 * POST   /api/v1/admin/ownership            — Propose a new owner
 * DELETE /api/v1/admin/ownership            — Withdraw the proposal
 * POST   /api/v1/admin/ownership/accept     — Proposed owner takes over
 * POST   /api/v1/admin/validators           — Add a validator
 * DELETE /api/v1/admin/validators/:address  — Remove a validator
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddValidatorSchema, TransferOwnershipSchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission, senderOf } from "../middleware/auth.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/ownership", requirePermission("administer"), async (c) => {
    const sender = senderOf(c);
    const { newOwner } = await readBody(c, TransferOwnershipSchema);
    return c.json({ data: c.get("service").transferOwnership(sender, newOwner) });
  });

  routes.delete("/ownership", requirePermission("administer"), (c) => {
    return c.json({ data: c.get("service").revokeOwnershipTransfer(senderOf(c)) });
  });

  routes.post("/ownership/accept", requirePermission("transact"), (c) => {
    return c.json({ data: c.get("service").acceptOwnership(senderOf(c)) });
  });

  routes.post("/validators", requirePermission("administer"), async (c) => {
    const sender = senderOf(c);
    const { address } = await readBody(c, AddValidatorSchema);
    return c.json({ data: c.get("service").addValidator(sender, address) }, 201);
  });

  routes.delete("/validators/:address", requirePermission("administer"), (c) => {
    const sender = senderOf(c);
    return c.json({ data: c.get("service").removeValidator(sender, c.req.param("address")) });
  });

  return routes;
}
