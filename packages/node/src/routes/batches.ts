/**
 * Batch routes.
 *
 * GET /api/v1/batches           — Batches by ascending id (startAfter, limit)
 * GET /api/v1/batches/pending   — The open batch
 * GET /api/v1/batches/:id       — A single batch
 * GET /api/v1/claimable/:user   — What a user can claim right now
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PageQuerySchema } from "../types/dto.js";
import { readIdParam, readQuery } from "../middleware/validate.js";

export function createBatchRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/batches", (c) => {
    const query = readQuery(c, PageQuerySchema);
    return c.json({ data: c.get("service").listBatches(query) });
  });

  routes.get("/batches/pending", (c) => {
    return c.json({ data: c.get("service").getPendingBatch() });
  });

  routes.get("/batches/:id", (c) => {
    const id = readIdParam(c, "id");
    return c.json({ data: c.get("service").getBatch(id) });
  });

  routes.get("/claimable/:user", (c) => {
    return c.json({ data: c.get("service").claimable(c.req.param("user")) });
  });

  return routes;
}
