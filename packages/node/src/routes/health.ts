/**
 * Health check routes.
 *
 * GET /health - Liveness probe with journal integrity
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { Protocol } from "../services/protocol.js";

export function createHealthRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const integrity = protocol.verifyJournal();
    return c.json(
      {
        status: integrity.valid ? "ok" : "degraded",
        journal: {
          events: protocol.journal.size(),
          chainValid: integrity.valid,
        },
        timestamp: new Date().toISOString(),
      },
      integrity.valid ? 200 : 503,
    );
  });

  return routes;
}
