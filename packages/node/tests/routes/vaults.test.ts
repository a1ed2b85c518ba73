/**
 * Tests for vault routes.
 *
 * Drives the full market-making cycle over HTTP and checks the wire
 * form of amounts (decimal strings) and the error statuses.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, actorRequest, jsonRequest } from "../setup.js";
import type { AppInstance } from "../../src/app.js";

interface DataBody<T> {
  data: T;
}

interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

describe("vault routes", () => {
  let instance: AppInstance;

  async function post(actor: string, path: string, body?: unknown): Promise<Response> {
    return instance.app.request(actorRequest(actor, path, "POST", body));
  }

  beforeEach(async () => {
    instance = createTestApp();
    await post("admin", "/api/v1/vaults");
  });

  // ─── Create / read ───────────────────────────────────────────────────

  describe("POST /api/v1/vaults", () => {
    it("creates a vault and returns its state with amounts as strings", async () => {
      const res = await post("admin", "/api/v1/vaults");

      expect(res.status).toBe(201);
      const body = (await res.json()) as DataBody<{
        vault: Record<string, string>;
        record: Record<string, string>;
      }>;
      expect(body.data.vault["id"]).toBe("vault-2");
      expect(body.data.vault["totalShares"]).toBe("0");
      expect(body.data.record).toEqual({
        type: "vault.created",
        vaultId: "vault-2",
        creator: "admin",
      });
    });

    it("requires an actor", async () => {
      const res = await instance.app.request(jsonRequest("/api/v1/vaults", "POST"));

      expect(res.status).toBe(401);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("UNAUTHORIZED");
    });
  });

  describe("GET /api/v1/vaults/:id", () => {
    it("returns 404 for an unknown vault", async () => {
      const res = await instance.app.request("/api/v1/vaults/vault-9");

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorBody;
      expect(body.error).toEqual({
        code: "VAULT_NOT_FOUND",
        message: 'Vault "vault-9" not found',
      });
    });
  });

  // ─── Deposit / withdraw ──────────────────────────────────────────────

  describe("POST /api/v1/vaults/:id/deposit", () => {
    it("mints a position for the depositor", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/deposit", {
        baseAmount: "5000000000",
        quoteAmount: "5000000000",
      });

      expect(res.status).toBe(201);
      const body = (await res.json()) as DataBody<{ position: Record<string, string> }>;
      expect(body.data.position).toEqual({
        id: "vault-1:position:1",
        vaultId: "vault-1",
        shares: "10000000000",
        rewardDebt: "0",
      });
    });

    it("rejects a numeric amount", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/deposit", {
        baseAmount: 5,
        quoteAmount: "5",
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("VALIDATION_ERROR");
      expect(body.error.details?.["issues"]).toEqual([
        { path: "baseAmount", message: "Expected string, received number" },
      ]);
    });

    it("rejects an amount above u64", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/deposit", {
        baseAmount: "18446744073709551616",
        quoteAmount: "0",
      });

      expect(res.status).toBe(400);
    });

    it("maps a zero deposit to 400", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/deposit", {
        baseAmount: "0",
        quoteAmount: "0",
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("ZERO_DEPOSIT");
    });

    it("rejects malformed JSON", async () => {
      const res = await instance.app.request(
        new Request("http://localhost/api/v1/vaults/vault-1/deposit", {
          method: "POST",
          headers: { "Content-Type": "application/json", "X-Actor-Id": "alice" },
          body: "{not json",
        }),
      );

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.message).toBe("Invalid JSON in request body");
    });
  });

  describe("POST /api/v1/vaults/:id/withdraw", () => {
    beforeEach(async () => {
      await post("alice", "/api/v1/vaults/vault-1/deposit", {
        baseAmount: "5000000000",
        quoteAmount: "3000000000",
      });
    });

    it("pays the depositor back", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/withdraw", {
        positionId: "vault-1:position:1",
      });

      expect(res.status).toBe(200);
      const body = (await res.json()) as DataBody<{ baseOut: string; quoteOut: string }>;
      expect(body.data.baseOut).toBe("5000000000");
      expect(body.data.quoteOut).toBe("3000000000");
    });

    it("returns 403 to anyone else", async () => {
      const res = await post("mallory", "/api/v1/vaults/vault-1/withdraw", {
        positionId: "vault-1:position:1",
      });

      expect(res.status).toBe(403);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("POSITION_NOT_OWNED");
    });
  });

  // ─── Strategy, incentives and buyback ────────────────────────────────

  describe("full cycle", () => {
    beforeEach(async () => {
      await post("alice", "/api/v1/vaults/vault-1/deposit", {
        baseAmount: "50000000000",
        quoteAmount: "50000000000",
      });
      await post("admin", "/api/v1/order-books", { initialMidPrice: "10000000000" });
      await post("admin", "/api/v1/strategy-configs", {
        spreadBps: 100,
        orderSize: "1000000000",
        numOrdersPerSide: 3,
        keeper: "keeper",
      });
      await post("admin", "/api/v1/markets", {
        initialReserve: "1000000000000",
        priceQuotePerToken: "1000000000",
      });
    });

    it("refuses a rebalance by a non-keeper with 403", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/rebalance", {
        configId: "config-1",
        bookId: "book-1",
      });

      expect(res.status).toBe(403);
    });

    it("turns a price move into bought, burned and pooled tokens", async () => {
      const rebalance = await post("keeper", "/api/v1/vaults/vault-1/rebalance", {
        configId: "config-1",
        bookId: "book-1",
      });
      expect(rebalance.status).toBe(200);

      await post("anyone", "/api/v1/order-books/book-1/trades", {
        directionUp: true,
        priceDelta: "500000000",
      });
      const settle = await post("keeper", "/api/v1/vaults/vault-1/settle", { bookId: "book-1" });
      const settled = (await settle.json()) as DataBody<Record<string, string>>;
      expect(settled.data["quoteEarned"]).toBe("30300000000");

      const buyback = await post("admin", "/api/v1/vaults/vault-1/buyback", {
        marketId: "market-1",
      });

      expect(buyback.status).toBe(200);
      const body = (await buyback.json()) as DataBody<Record<string, string>>;
      expect(body.data["tokensBought"]).toBe("12120000000");
      expect(body.data["tokensBurned"]).toBe("6060000000");
      expect(body.data["tokensToRewards"]).toBe("6060000000");
    });

    it("returns 422 for a buyback with no fees", async () => {
      const res = await post("admin", "/api/v1/vaults/vault-1/buyback", {
        marketId: "market-1",
      });

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("NO_FEES");
    });

    it("accrues and pays rewards to the position owner", async () => {
      const accrue = await post("keeper", "/api/v1/vaults/vault-1/accrue");
      const accrued = (await accrue.json()) as DataBody<Record<string, string>>;
      expect(accrued.data["rewardPerShare"]).toBe("1000000000000");

      const position = await instance.app.request("/api/v1/positions/vault-1:position:1");
      const view = (await position.json()) as DataBody<{ owner: string; pendingReward: string }>;
      expect(view.data.owner).toBe("alice");
      expect(view.data.pendingReward).toBe("100000000000");

      const claim = await post("alice", "/api/v1/vaults/vault-1/claim", {
        positionId: "vault-1:position:1",
      });
      expect(claim.status).toBe(200);

      const balance = await instance.app.request("/api/v1/tokens/alice");
      const tokens = (await balance.json()) as DataBody<Record<string, string>>;
      expect(tokens.data).toEqual({
        treasuryId: "treasury-1",
        symbol: "GRID",
        holder: "alice",
        balance: "100000000000",
      });
    });

    it("returns 422 for a claim with nothing pending", async () => {
      const res = await post("alice", "/api/v1/vaults/vault-1/claim", {
        positionId: "vault-1:position:1",
      });

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("NOTHING_TO_CLAIM");
    });
  });
});
