/**
 * Strategy config routes.
 *
 * POST /api/v1/strategy-configs      - Create an immutable config
 * GET  /api/v1/strategy-configs/:id  - Read a config
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateStrategyConfigSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { parseBody } from "../middleware/validate.js";

export function createStrategyConfigRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseBody(c, CreateStrategyConfigSchema);
    const result = c.get("protocol").createStrategyConfig(c.get("actor"), body);
    return c.json({ data: toWire(result) }, 201);
  });

  routes.get("/:id", (c) => {
    const config = c.get("protocol").getStrategyConfig(c.req.param("id"));
    return c.json({ data: toWire(config) });
  });

  return routes;
}
