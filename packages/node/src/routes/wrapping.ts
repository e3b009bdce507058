/**
 * Wrap / unwrap routes.
 *
 * POST /api/v1/wrap    — Wrap custodied coins: { amount }
 * POST /api/v1/unwrap  — Unwrap synthetic units: { amount }
 *
 * Both answer with the caller's balances after the operation.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountBodySchema } from "../types/dto.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createWrappingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/wrap", callerMiddleware(), validateBody(AmountBodySchema), (c) => {
    const { amount } = c.req.valid("json");
    return c.json({ data: c.get("service").wrap(c.get("caller"), amount) });
  });

  routes.post("/unwrap", callerMiddleware(), validateBody(AmountBodySchema), (c) => {
    const { amount } = c.req.valid("json");
    return c.json({ data: c.get("service").unwrap(c.get("caller"), amount) });
  });

  return routes;
}
