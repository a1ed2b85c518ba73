/**
 * Record journal routes.
 *
 * GET /api/v1/records         - Journaled operation records, oldest first
 * GET /api/v1/records/verify  - Hash chain integrity of the journal
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListRecordsQuerySchema } from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { parseQuery } from "../middleware/validate.js";

export function createRecordRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseQuery(c, ListRecordsQuerySchema);
    const protocol = c.get("protocol");
    const events = protocol.records({
      fromPosition: query.fromPosition,
      maxCount: query.limit,
    });
    return c.json({
      data: toWire(events),
      meta: { count: events.length, total: protocol.journal.size() },
    });
  });

  routes.get("/verify", (c) => {
    return c.json({ data: toWire(c.get("protocol").verifyJournal()) });
  });

  return routes;
}
