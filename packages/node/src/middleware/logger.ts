/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to a log function; the entry
 * point wires that function to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@coinwrap/types";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Acting identity, for requests that carried one */
  readonly caller?: Address;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const caller = c.get("caller");
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(caller !== undefined ? { caller } : {}),
    };

    log(entry);
  };
}
