/**
 * Tests for the error handler middleware.
 *
 * Verifies domain error codes map to the right HTTP status and that
 * unknown errors never leak their message.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { LedgerError } from "@spreadvault/ledger";
import { TreasuryError } from "@spreadvault/treasury";
import { StrategyError } from "@spreadvault/strategy";
import { handleError } from "../../src/middleware/error-handler.js";
import { ApiError } from "../../src/types/error.js";

function appThrowing(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function statusOf(err: Error): Promise<number> {
  const res = await appThrowing(err).request("/boom");
  return res.status;
}

describe("error handler", () => {
  it("maps validation codes to 400", async () => {
    expect(await statusOf(new LedgerError("ZERO_SHARES", "dust"))).toBe(400);
    expect(await statusOf(new TreasuryError("ZERO_AMOUNT", "zero"))).toBe(400);
  });

  it("maps authorization codes to 403", async () => {
    expect(await statusOf(new StrategyError("NOT_KEEPER", "no"))).toBe(403);
  });

  it("maps consistency codes to 409", async () => {
    expect(await statusOf(new TreasuryError("TREASURY_MISMATCH", "other"))).toBe(409);
  });

  it("maps insufficiency and arithmetic codes to 422", async () => {
    expect(await statusOf(new LedgerError("INSUFFICIENT_BALANCE", "short"))).toBe(422);
    expect(await statusOf(new LedgerError("OVERFLOW", "big"))).toBe(422);
  });

  it("renders the domain message and code", async () => {
    const res = await appThrowing(new TreasuryError("NO_FEES", "Vault has no fees")).request(
      "/boom",
    );
    expect(await res.json()).toEqual({
      error: { code: "NO_FEES", message: "Vault has no fees" },
    });
  });

  it("carries validation details", async () => {
    const res = await appThrowing(
      new ApiError("VALIDATION_ERROR", "bad body", { issues: [] }),
    ).request("/boom");
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "bad body", details: { issues: [] } },
    });
  });

  it("hides the message of an unexpected error", async () => {
    const res = await appThrowing(new Error("secret stack detail")).request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
  });
});
