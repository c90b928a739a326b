/**
 * Protocol-wide read routes.
 *
 * GET /api/v1/config  — Effective protocol configuration
 * GET /api/v1/state   — Pool totals, rate, ownership and backlog counts
 * GET /api/v1/export  — Full snapshot plus its canonical state hash
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createProtocolRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/config", (c) => c.json({ data: c.get("service").getConfig() }));

  routes.get("/state", (c) => c.json({ data: c.get("service").getState() }));

  routes.get("/export", (c) => {
    const { snapshot, stateHash } = c.get("service").export();
    c.header("X-State-Hash", stateHash);
    return c.json({ data: snapshot, stateHash });
  });

  return routes;
}
