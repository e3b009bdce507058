/**
 * Synthetic token routes.
 *
 * GET  /api/v1/token                       — Token metadata, supply and reserve
 * GET  /api/v1/balances/:holder            — Synthetic and underlying balances
 * GET  /api/v1/allowances/:owner/:spender  — Remaining allowance
 * POST /api/v1/transfers                   — Transfer (or transferFrom when `from` is set)
 * POST /api/v1/approvals                   — Set an allowance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, ApproveSchema, TransferSchema } from "../types/dto.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/token
  routes.get("/token", (c) => {
    return c.json({ data: c.get("service").tokenInfo() });
  });

  // GET /api/v1/balances/:holder
  routes.get("/balances/:holder", (c) => {
    const holder = AddressSchema.safeParse(c.req.param("holder"));
    if (!holder.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid holder address"), 400);
    }
    return c.json({ data: c.get("service").balances(holder.data) });
  });

  // GET /api/v1/allowances/:owner/:spender
  routes.get("/allowances/:owner/:spender", (c) => {
    const owner = AddressSchema.safeParse(c.req.param("owner"));
    const spender = AddressSchema.safeParse(c.req.param("spender"));
    if (!owner.success || !spender.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid owner or spender address"), 400);
    }
    const amount = c.get("service").allowance(owner.data, spender.data);
    return c.json({
      data: { owner: owner.data, spender: spender.data, amount: amount.toString() },
    });
  });

  // POST /api/v1/transfers
  routes.post("/transfers", callerMiddleware(), validateBody(TransferSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const body = c.req.valid("json");

    if (body.from !== undefined) {
      service.transferFrom(caller, body.from, body.to, body.amount);
    } else {
      service.transfer(caller, body.to, body.amount);
    }

    const from = body.from ?? caller;
    return c.json({
      data: {
        from: service.balances(from),
        to: service.balances(body.to),
      },
    });
  });

  // POST /api/v1/approvals
  routes.post("/approvals", callerMiddleware(), validateBody(ApproveSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const body = c.req.valid("json");

    service.approve(caller, body.spender, body.amount);
    return c.json({
      data: { owner: caller, spender: body.spender, amount: body.amount.toString() },
    });
  });

  return routes;
}
