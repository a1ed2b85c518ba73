/**
 * Token market routes.
 *
 * POST /api/v1/markets      - Open a fixed-price market and mint its reserve
 * GET  /api/v1/markets/:id  - Market reserves and price
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateMarketSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { parseBody } from "../middleware/validate.js";

export function createMarketRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseBody(c, CreateMarketSchema);
    const result = c
      .get("protocol")
      .createTokenMarket(
        c.get("actor"),
        body.treasuryId,
        body.initialReserve,
        body.priceQuotePerToken,
      );
    return c.json({ data: toWire(result) }, 201);
  });

  routes.get("/:id", (c) => {
    const market = c.get("protocol").getMarket(c.req.param("id"));
    return c.json({ data: toWire(market) });
  });

  return routes;
}
