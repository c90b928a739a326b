/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe with a summary of reconciliation backlog
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const state = c.get("service").getState();
    return c.json({
      status: "ready",
      pendingBatchId: state.pendingBatchId,
      inFlightTransfers: state.inFlightTransfers,
      pendingReplies: state.pendingReplies,
      openDiscrepancies: state.openDiscrepancies,
    });
  });

  return routes;
}
