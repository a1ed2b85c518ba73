/**
 * Order book routes.
 *
 * POST /api/v1/order-books             - Create a book at an initial mid price
 * GET  /api/v1/order-books/:id         - Book state with resting orders
 * POST /api/v1/order-books/:id/trades  - Move the mid price and fill crossed orders
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateOrderBookSchema, SimulateTradeSchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { parseBody } from "../middleware/validate.js";

export function createOrderBookRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const body = await parseBody(c, CreateOrderBookSchema);
    const result = c.get("protocol").createOrderBook(c.get("actor"), body.initialMidPrice);
    return c.json({ data: toWire(result) }, 201);
  });

  routes.get("/:id", (c) => {
    const book = c.get("protocol").getOrderBook(c.req.param("id"));
    return c.json({ data: toWire(book) });
  });

  routes.post("/:id/trades", async (c) => {
    const body = await parseBody(c, SimulateTradeSchema);
    const record = c
      .get("protocol")
      .simulateTrade(c.get("actor"), c.req.param("id"), body.directionUp, body.priceDelta);
    return c.json({ data: toWire(record) }, 201);
  });

  return routes;
}
