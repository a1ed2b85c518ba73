/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability - tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { Protocol } from "./services/protocol.js";
import type { ProtocolOptions } from "./services/protocol.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogger } from "./middleware/logger.js";
import { actorMiddleware } from "./middleware/actor.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createPositionRoutes } from "./routes/positions.js";
import { createStrategyConfigRoutes } from "./routes/strategy-configs.js";
import { createOrderBookRoutes } from "./routes/order-books.js";
import { createMarketRoutes } from "./routes/markets.js";
import { createTokenRoutes } from "./routes/tokens.js";
import { createRecordRoutes } from "./routes/records.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Serve an existing protocol instead of creating one from protocolOptions */
  readonly protocol?: Protocol;
  readonly protocolOptions?: ProtocolOptions;
  /** When provided, every request is logged through it */
  readonly requestLogger?: RequestLogger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly protocol: Protocol;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const protocol = options.protocol ?? new Protocol(options.protocolOptions);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.requestLogger !== undefined) {
    app.use("*", loggerMiddleware(options.requestLogger));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.path}`), 404));

  // ─── Health Routes (no actor required) ──────────────────────────
  app.route("/", createHealthRoutes(protocol));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("protocol", protocol);
    await next();
  });
  app.use("/api/*", actorMiddleware());

  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/positions", createPositionRoutes());
  app.route("/api/v1/strategy-configs", createStrategyConfigRoutes());
  app.route("/api/v1/order-books", createOrderBookRoutes());
  app.route("/api/v1/markets", createMarketRoutes());
  app.route("/api/v1/tokens", createTokenRoutes());
  app.route("/api/v1/records", createRecordRoutes());

  return { app, protocol };
}
