/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@coinwrap/types";
import type { WrapperService } from "../services/wrapper-service.js";

/**
 * Hono environment type for the coinwrap app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The deployment's service (set by the app factory) */
    service: WrapperService;

    /** Acting identity from X-Caller-Address (set by caller middleware) */
    caller: Address;
  };
}
