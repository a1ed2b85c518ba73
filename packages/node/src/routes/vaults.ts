/**
 * Vault routes.
 *
 * POST /api/v1/vaults                - Create a vault
 * GET  /api/v1/vaults/:id            - Vault state
 * POST /api/v1/vaults/:id/deposit    - Deposit and mint a share position
 * POST /api/v1/vaults/:id/withdraw   - Burn a position in full
 * POST /api/v1/vaults/:id/rebalance  - Re-quote the vault's orders (keeper only)
 * POST /api/v1/vaults/:id/settle     - Collect pending fills
 * POST /api/v1/vaults/:id/accrue     - Emit one round of incentive tokens
 * POST /api/v1/vaults/:id/claim      - Claim a position's pending reward
 * POST /api/v1/vaults/:id/buyback    - Split fees and buy back tokens
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccrueSchema,
  BuybackSchema,
  ClaimSchema,
  DepositSchema,
  PositionRefSchema,
  RebalanceSchema,
  SettleSchema,
} from "../types/dto.js";
import { toWire } from "../types/wire.js";
import { parseBody } from "../middleware/validate.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", (c) => {
    const result = c.get("protocol").createVault(c.get("actor"));
    return c.json({ data: toWire(result) }, 201);
  });

  routes.get("/:id", (c) => {
    const vault = c.get("protocol").getVault(c.req.param("id"));
    return c.json({ data: toWire(vault) });
  });

  routes.post("/:id/deposit", async (c) => {
    const body = await parseBody(c, DepositSchema);
    const result = c
      .get("protocol")
      .deposit(c.get("actor"), c.req.param("id"), body.baseAmount, body.quoteAmount);
    return c.json({ data: toWire(result) }, 201);
  });

  routes.post("/:id/withdraw", async (c) => {
    const body = await parseBody(c, PositionRefSchema);
    const result = c.get("protocol").withdraw(c.get("actor"), c.req.param("id"), body.positionId);
    return c.json({ data: toWire(result) });
  });

  // ─── Strategy ──────────────────────────────────────────────────────

  routes.post("/:id/rebalance", async (c) => {
    const body = await parseBody(c, RebalanceSchema);
    const record = c
      .get("protocol")
      .rebalance(c.get("actor"), c.req.param("id"), body.configId, body.bookId);
    return c.json({ data: toWire(record) });
  });

  routes.post("/:id/settle", async (c) => {
    const body = await parseBody(c, SettleSchema);
    const record = c.get("protocol").settle(c.get("actor"), c.req.param("id"), body.bookId);
    return c.json({ data: toWire(record) });
  });

  // ─── Incentives ────────────────────────────────────────────────────

  routes.post("/:id/accrue", async (c) => {
    const body = await parseBody(c, AccrueSchema);
    const record = c
      .get("protocol")
      .accrueRewards(c.get("actor"), c.req.param("id"), body.treasuryId);
    return c.json({ data: toWire(record) });
  });

  routes.post("/:id/claim", async (c) => {
    const body = await parseBody(c, ClaimSchema);
    const record = c
      .get("protocol")
      .claimRewards(c.get("actor"), c.req.param("id"), body.positionId, body.treasuryId);
    return c.json({ data: toWire(record) });
  });

  // ─── Buyback ───────────────────────────────────────────────────────

  routes.post("/:id/buyback", async (c) => {
    const body = await parseBody(c, BuybackSchema);
    const record = c
      .get("protocol")
      .executeBuyback(c.get("actor"), c.req.param("id"), body.marketId, body.treasuryId);
    return c.json({ data: toWire(record) });
  });

  return routes;
}
