/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Tests create the app without starting the HTTP server; main.ts
 * adds the server and logging.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { WrapperService } from "./services/wrapper-service.js";
import type { WrapperServiceConfig } from "./services/wrapper-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTokenRoutes } from "./routes/token.js";
import { createCustodyRoutes } from "./routes/custody.js";
import { createWrappingRoutes } from "./routes/wrapping.js";
import { createCoinRoutes } from "./routes/coins.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: WrapperServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called for every error answered with 500 */
  readonly onInternalError?: (err: Error) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WrapperService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new WrapperService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(
    createErrorHandler(
      options.onInternalError !== undefined ? { onInternalError: options.onInternalError } : {},
    ),
  );
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/api/v1", createTokenRoutes());
  app.route("/api/v1", createWrappingRoutes());
  app.route("/api/v1/custody-accounts", createCustodyRoutes());
  app.route("/api/v1/coins", createCoinRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
