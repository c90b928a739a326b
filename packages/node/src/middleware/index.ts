/**
 * Middleware barrel.
 */

export { createErrorHandler, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export {
  authMiddleware,
  requirePermission,
  senderOf,
  verifyJwt,
  signJwt,
  API_KEY_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { readBody, readQuery, readIdParam, formatZodErrors } from "./validate.js";
