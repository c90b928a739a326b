/**
 * Global error handler.
 *
 * Catches everything thrown by middleware and route handlers and produces
 * a consistent error envelope response. Domain errors keep their code and
 * get an HTTP status from their category.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ProtocolError, classifyError } from "@bondline/protocol";
import type { ErrorCategory } from "@bondline/protocol";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<ErrorCategory, ContentfulStatusCode> = {
  validation: 400,
  authorization: 403,
  "not-found": 404,
  conflict: 409,
  invariant: 422,
  dispatch: 502,
};

export function statusFor(category: ErrorCategory): ContentfulStatusCode {
  return STATUS_MAP[category];
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the onError handler. `reportUnexpected` sees every error that
 * ends up as a 500.
 */
export function createErrorHandler(
  reportUnexpected?: (err: Error, c: Context) => void,
): (err: Error, c: Context) => Response {
  return (err, c) => {
    if (err instanceof ApiError) {
      return c.json(createErrorEnvelope(err.code, err.message, err.details), err.status);
    }

    const classified = classifyError(err);
    if (classified !== undefined) {
      const details =
        err instanceof ProtocolError && err.details !== undefined
          ? { issues: err.details }
          : undefined;
      return c.json(
        createErrorEnvelope(classified.code, err.message, details),
        statusFor(classified.category),
      );
    }

    reportUnexpected?.(err, c);
    // Internal details stay in the logs.
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
