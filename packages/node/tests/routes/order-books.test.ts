/**
 * Tests for order book, strategy config and market routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createTestApp, actorRequest } from "../setup.js";
import type { AppInstance } from "../../src/app.js";

interface DataBody<T> {
  data: T;
}

interface ErrorBody {
  error: { code: string; message: string };
}

describe("order book routes", () => {
  let instance: AppInstance;

  beforeEach(async () => {
    instance = createTestApp();
    await instance.app.request(
      actorRequest("admin", "/api/v1/order-books", "POST", { initialMidPrice: "10000000000" }),
    );
  });

  it("creates a book and reads it back", async () => {
    const res = await instance.app.request("/api/v1/order-books/book-1");

    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<Record<string, unknown>>;
    expect(body.data).toEqual({
      id: "book-1",
      bids: [],
      asks: [],
      midPrice: "10000000000",
      pendingFillBase: "0",
      pendingFillQuote: "0",
      nextOrderId: "1",
    });
  });

  it("rejects a zero mid price", async () => {
    const res = await instance.app.request(
      actorRequest("admin", "/api/v1/order-books", "POST", { initialMidPrice: "0" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("ZERO_PRICE");
  });

  it("clamps a downward move that would cross zero", async () => {
    const res = await instance.app.request(
      actorRequest("trader", "/api/v1/order-books/book-1/trades", "POST", {
        directionUp: false,
        priceDelta: "20000000000",
      }),
    );

    expect(res.status).toBe(201);
    const body = (await res.json()) as DataBody<Record<string, string>>;
    expect(body.data["oldMidPrice"]).toBe("10000000000");
    expect(body.data["newMidPrice"]).toBe("1");
  });

  it("requires a boolean direction", async () => {
    const res = await instance.app.request(
      actorRequest("trader", "/api/v1/order-books/book-1/trades", "POST", {
        directionUp: "up",
        priceDelta: "1",
      }),
    );

    expect(res.status).toBe(400);
  });

  it("returns 404 for trades on an unknown book", async () => {
    const res = await instance.app.request(
      actorRequest("trader", "/api/v1/order-books/book-7/trades", "POST", {
        directionUp: true,
        priceDelta: "1",
      }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("BOOK_NOT_FOUND");
  });
});

describe("strategy config routes", () => {
  it("creates a config and reads it back", async () => {
    const { app } = createTestApp();
    const created = await app.request(
      actorRequest("admin", "/api/v1/strategy-configs", "POST", {
        spreadBps: 25,
        orderSize: "2000000000",
        numOrdersPerSide: 2,
        keeper: "keeper",
      }),
    );
    expect(created.status).toBe(201);

    const res = await app.request("/api/v1/strategy-configs/config-1");
    const body = (await res.json()) as DataBody<Record<string, string>>;
    expect(body.data).toEqual({
      id: "config-1",
      spreadBps: "25",
      orderSize: "2000000000",
      numOrdersPerSide: "2",
      keeper: "keeper",
    });
  });

  it("rejects a spread of 10000 bps", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      actorRequest("admin", "/api/v1/strategy-configs", "POST", {
        spreadBps: 10000,
        orderSize: "1",
        numOrdersPerSide: 1,
        keeper: "keeper",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_CONFIG");
  });

  it("rejects more orders per side than the bound before touching the protocol", async () => {
    const { app, protocol } = createTestApp();
    const res = await app.request(
      actorRequest("admin", "/api/v1/strategy-configs", "POST", {
        spreadBps: 25,
        orderSize: "1",
        numOrdersPerSide: 9_000_000_000_000_000,
        keeper: "keeper",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(() => protocol.getStrategyConfig("config-1")).toThrow(/config-1/);
  });
});

describe("market routes", () => {
  it("opens a market on the default treasury", async () => {
    const { app } = createTestApp();
    const created = await app.request(
      actorRequest("admin", "/api/v1/markets", "POST", {
        initialReserve: "5000000000",
        priceQuotePerToken: "2000000000",
      }),
    );
    expect(created.status).toBe(201);

    const res = await app.request("/api/v1/markets/market-1");
    const body = (await res.json()) as DataBody<Record<string, string>>;
    expect(body.data).toEqual({
      id: "market-1",
      tokenReserve: "5000000000",
      quoteReserve: "0",
      priceQuotePerToken: "2000000000",
    });
  });

  it("returns 404 for an unknown treasury", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      actorRequest("admin", "/api/v1/markets", "POST", {
        treasuryId: "treasury-2",
        initialReserve: "1",
        priceQuotePerToken: "1",
      }),
    );

    expect(res.status).toBe(404);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("TREASURY_NOT_FOUND");
  });
});
