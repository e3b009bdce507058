/**
 * @coinwrap/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { WrapperError } from "@coinwrap/wrapper";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { toNotificationDto } from "./types/dto.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      wrapperAddress: config.WRAPPER_ADDRESS,
      coinAddress: config.COIN_ADDRESS,
      issuerAddress: config.ISSUER_ADDRESS,
      tokenName: config.TOKEN_NAME,
      tokenSymbol: config.TOKEN_SYMBOL,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err) => {
      if (err instanceof WrapperError && err.fatal) {
        logger.fatal({ err, audit: service.audit() }, "Conservation invariant violated");
      } else {
        logger.error({ err }, "Unhandled error");
      }
    },
  });

  const notifications = service.onNotification((notification) => {
    const dto = toNotificationDto(notification);
    logger.info({ event: dto }, `${dto.type} #${dto.position}`);
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      wrapper: config.WRAPPER_ADDRESS,
      underlyingAsset: config.COIN_ADDRESS,
    },
    "coinwrap node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    notifications.unsubscribe();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
