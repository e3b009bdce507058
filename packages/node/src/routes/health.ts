/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (conservation audit: 503 when the
 *               synthetic supply is not fully backed)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = c.get("service").audit();

    return c.json(
      {
        status: report.backed ? "ready" : "not_ready",
        conservation: {
          totalSupply: report.totalSupply.toString(),
          sumOfBalances: report.sumOfBalances.toString(),
          reserve: report.reserve.toString(),
          surplus: report.surplus.toString(),
          balanced: report.balanced,
          backed: report.backed,
        },
        timestamp: new Date().toISOString(),
      },
      report.backed ? 200 : 503,
    );
  });

  return routes;
}
