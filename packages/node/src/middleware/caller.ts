/**
 * Caller identity middleware.
 *
 * State-changing routes act on behalf of the address in the
 * X-Caller-Address header. Missing → 401, malformed → 400.
 * Addresses are lowercased before use.
 */

import type { MiddlewareHandler } from "hono";
import { isParticipant } from "@coinwrap/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Address";

export function callerMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const raw = c.req.header(CALLER_HEADER);
    if (raw === undefined || raw.trim() === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Missing ${CALLER_HEADER} header`),
        401,
      );
    }

    const caller = raw.trim();
    if (!isParticipant(caller)) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          `${CALLER_HEADER} must be a non-zero 0x-prefixed 40 hex digit address`,
        ),
        400,
      );
    }

    c.set("caller", caller.toLowerCase());
    return next();
  };
}
