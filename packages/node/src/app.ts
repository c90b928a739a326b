/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from main.ts
 * so tests drive the app through app.request() without a server.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { Logger } from "pino";
import type { ProtocolConfigInput } from "@bondline/protocol";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { StakingService } from "./services/staking-service.js";
import type { Clock } from "./services/staking-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createProtocolRoutes } from "./routes/protocol.js";
import { createStakingRoutes } from "./routes/staking.js";
import { createBatchRoutes } from "./routes/batches.js";
import { createReconciliationRoutes } from "./routes/reconciliation.js";
import { createRelayerRoutes } from "./routes/relayer.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly protocolConfig: ProtocolConfigInput;
  /** Credential registry. Routes that change state answer 401 to anonymous callers. */
  readonly auth: AuthConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Handed to the protocol; also receives unexpected request errors. */
  readonly logger?: Logger | undefined;
  /** Unix seconds. Defaults to the system clock. */
  readonly clock?: Clock | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StakingService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new StakingService({
    config: options.protocolConfig,
    clock: options.clock,
    logger: options.logger,
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.use("/api/v1/*", authMiddleware(options.auth, options.clock));

  // ─── Routes ──────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1", createProtocolRoutes());
  app.route("/api/v1", createStakingRoutes());
  app.route("/api/v1", createBatchRoutes());
  app.route("/api/v1", createReconciliationRoutes());
  app.route("/api/v1/relayer", createRelayerRoutes());
  app.route("/api/v1/admin", createAdminRoutes());

  // ─── Errors ──────────────────────────────────────────────────────
  const logger = options.logger;
  app.onError(
    createErrorHandler((err: Error, c: Context) => {
      logger?.error(
        { err, requestId: c.get("requestId"), method: c.req.method, path: c.req.path },
        "Unhandled request error",
      );
    }),
  );

  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  return { app, service };
}
