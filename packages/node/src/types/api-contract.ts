/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { StakingService } from "../services/staking-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Authenticated caller, if the request carried credentials (set by auth middleware) */
    auth: AuthContext | undefined;

    /** The protocol behind this app (set once in createApp) */
    service: StakingService;
  };
}
