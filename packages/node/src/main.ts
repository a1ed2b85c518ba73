/**
 * @spreadvault/node - Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, protocolConfigFrom } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, protocol } = createApp({
    protocolOptions: {
      config: protocolConfigFrom(config),
      logger: logger.child({ component: "protocol" }),
    },
    requestLogger: logger.child({ component: "http" }),
  });

  logger.info(
    {
      emissionPerAccrue: protocol.config.emissionPerAccrue.toString(),
      lpShareBps: protocol.config.lpShareBps.toString(),
      burnShareBps: protocol.config.burnShareBps.toString(),
      token: protocol.config.tokenSymbol,
    },
    "Protocol configured",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Spread vault node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info({ events: protocol.journal.size() }, "Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM");
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT");
  });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
