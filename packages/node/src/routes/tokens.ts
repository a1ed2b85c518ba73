/**
 * Incentive token routes.
 *
 * GET /api/v1/tokens/:holder?treasuryId=  - A holder's token balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { TokenQuerySchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { parseQuery } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:holder", (c) => {
    const query = parseQuery(c, TokenQuerySchema);
    const balance = c.get("protocol").balanceOf(c.req.param("holder"), query.treasuryId);
    return c.json({ data: toWire(balance) });
  });

  return routes;
}
