/**
 * Underlying coin routes.
 *
 * POST /api/v1/coins/transfer — Send coins as the caller (deposits go here)
 * POST /api/v1/coins/issue    — Issue new coins (issuer only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CoinTransferSchema } from "../types/dto.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";

export function createCoinRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/transfer", callerMiddleware(), validateBody(CoinTransferSchema), (c) => {
    const body = c.req.valid("json");
    const sender = c.get("service").sendCoin(c.get("caller"), body.to, body.amount);
    return c.json({ data: sender });
  });

  routes.post("/issue", callerMiddleware(), validateBody(CoinTransferSchema), (c) => {
    const body = c.req.valid("json");
    const recipient = c.get("service").issueCoins(c.get("caller"), body.to, body.amount);
    return c.json({ data: recipient }, 201);
  });

  return routes;
}
