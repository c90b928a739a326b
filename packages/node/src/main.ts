/**
 * @bondline/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { fileURLToPath } from "node:url";
import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, toAuthConfig, toProtocolConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Re-exports (package public API)
// =============================================================================

export { StakingService, systemClock } from "./services/staking-service.js";
export type { Clock, StakingServiceOptions, ExportResponse } from "./services/staking-service.js";
export { loadConfig, toProtocolConfig, toAuthConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const auth = toAuthConfig(config);
  if (auth.apiKeys.size === 0 && auth.jwtSecret === undefined) {
    logger.warn("Neither API_KEYS nor JWT_SECRET set; only read routes are reachable");
  }

  const protocolConfig = toProtocolConfig(config);
  const { app, service } = createApp({
    protocolConfig,
    auth,
    logger: logger.child({ component: "protocol" }),
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      underflowPolicy: protocolConfig.underflowPolicy,
      pendingBatchId: service.getState().pendingBatchId,
    },
    "Bondline node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info({ stateHash: service.export().stateHash }, "Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err, signal }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

// Only run when executed directly (not when imported)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error("Fatal startup error:", err);
    process.exit(1);
  });
}
