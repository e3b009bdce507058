/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Known domain error codes map to HTTP statuses;
 * anything else becomes 500, as does every fatal wrapper error.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { WrapperError } from "@coinwrap/wrapper";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Input errors
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_SNAPSHOT: 400,

  // Permission errors
  UNAUTHORIZED: 403,

  // State conflicts
  ALREADY_EXISTS: 409,
  NO_CUSTODY_ACCOUNT: 409,

  // Insufficient funds
  INSUFFICIENT_CUSTODY_FUNDS: 422,
  INSUFFICIENT_SYNTHETIC_BALANCE: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
};

const HTTP_CODES: Readonly<Partial<Record<number, ApiErrorCode>>> = {
  400: "VALIDATION_ERROR",
  401: "UNAUTHORIZED",
  403: "FORBIDDEN",
  404: "NOT_FOUND",
};

function hasCode(err: Error): err is Error & { readonly code: string } {
  return "code" in err && typeof err.code === "string";
}

// =============================================================================
// Handler
// =============================================================================

export interface ErrorHandlerOptions {
  /** Called for every error answered with 500, fatal wrapper errors included */
  readonly onInternalError?: (err: Error) => void;
}

/**
 * Create the handler registered with Hono's onError.
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}) {
  return (err: Error, c: Context): Response => {
    if (err instanceof HTTPException) {
      const code = HTTP_CODES[err.status] ?? "INTERNAL_ERROR";
      return c.json(createErrorEnvelope(code, err.message), err.status);
    }

    // A broken reserve is never reported to the caller as their own error
    const fatal = err instanceof WrapperError && err.fatal;
    if (!fatal && hasCode(err)) {
      const status = STATUS_MAP[err.code];
      if (status !== undefined) {
        return c.json(createErrorEnvelope(err.code, err.message), status);
      }
    }

    options.onInternalError?.(err);
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
