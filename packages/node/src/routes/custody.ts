/**
 * Custody account routes.
 *
 * POST /api/v1/custody-accounts        — Create the caller's custody account
 * GET  /api/v1/custody-accounts/:user  — Look up a user's custody account
 *
 * A user deposits by sending coins to the returned account address
 * (POST /api/v1/coins/transfer).
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema } from "../types/dto.js";
import { callerMiddleware } from "../middleware/caller.js";
import { createErrorEnvelope } from "../types/error.js";

export function createCustodyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", callerMiddleware(), (c) => {
    const account = c.get("service").createCustodyAccount(c.get("caller"));
    return c.json({ data: account }, 201);
  });

  routes.get("/:user", (c) => {
    const user = AddressSchema.safeParse(c.req.param("user"));
    if (!user.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid user address"), 400);
    }
    return c.json({ data: c.get("service").custodyAccount(user.data) });
  });

  return routes;
}
