/**
 * Relayer routes, for callers with the relay permission.
 *
 * POST /api/v1/relayer/replies/:id         — Report the outcome of a dispatched message
 * POST /api/v1/relayer/batches/:id/submit  — Submit a due batch on the protocol's behalf
 * GET  /api/v1/relayer/instructions        — Everything dispatched so far
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ReplyOutcomeSchema } from "../types/dto.js";
import { readBody, readIdParam } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createRelayerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  routes.use("*", requirePermission("relay"));

  routes.post("/replies/:id", async (c) => {
    const outcome = await readBody(c, ReplyOutcomeSchema);
    return c.json({ data: c.get("service").handleReply(c.req.param("id"), outcome) });
  });

  routes.post("/batches/:id/submit", (c) => {
    const id = readIdParam(c, "id");
    return c.json({ data: c.get("service").submitBatch(id) });
  });

  routes.get("/instructions", (c) => {
    return c.json({ data: c.get("service").instructions() });
  });

  return routes;
}
