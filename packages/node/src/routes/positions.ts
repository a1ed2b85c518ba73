/**
 * GET /api/v1/positions/:id - Position with owner, pending reward and
 * current withdrawal value.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toWire } from "../types/wire.js";

export function createPositionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id", (c) => {
    const view = c.get("protocol").getPosition(c.req.param("id"));
    return c.json({ data: toWire(view) });
  });

  return routes;
}
