/**
 * Reconciliation routes.
 *
 * GET  /api/v1/transfers                    — In-flight cross-chain transfers
 * GET  /api/v1/replies                      — Custody instructions awaiting a reply
 * GET  /api/v1/discrepancies                — Discrepancy log (status=open|resolved|all)
 * POST /api/v1/discrepancies/:id/resolve    — Mark one reviewed (owner)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListDiscrepanciesQuerySchema,
  PageQuerySchema,
  ResolveDiscrepancySchema,
} from "../types/dto.js";
import { readBody, readQuery } from "../middleware/validate.js";
import { requirePermission, senderOf } from "../middleware/auth.js";

export function createReconciliationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/transfers", (c) => {
    const query = readQuery(c, PageQuerySchema);
    return c.json({ data: c.get("service").listTransfers(query) });
  });

  routes.get("/replies", (c) => {
    const query = readQuery(c, PageQuerySchema);
    return c.json({ data: c.get("service").listReplies(query) });
  });

  routes.get("/discrepancies", (c) => {
    const { status } = readQuery(c, ListDiscrepanciesQuerySchema);
    return c.json({ data: c.get("service").listDiscrepancies(status) });
  });

  routes.post("/discrepancies/:id/resolve", requirePermission("administer"), async (c) => {
    const sender = senderOf(c);
    const { note } = await readBody(c, ResolveDiscrepancySchema);
    const resolved = c.get("service").resolveDiscrepancy(sender, c.req.param("id"), note);
    return c.json({ data: resolved });
  });

  return routes;
}
