/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { DomainErrorCode } from "@bondline/protocol";
import type { ContentfulStatusCode } from "hono/utils/http-status";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes the HTTP layer produces itself; domain errors keep their own code.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | DomainErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/**
 * Raised by the HTTP layer for request problems the protocol never sees
 * (malformed body, missing or insufficient credentials).
 */
export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  public readonly status: ContentfulStatusCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: ApiErrorCode,
    status: ContentfulStatusCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | DomainErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}
