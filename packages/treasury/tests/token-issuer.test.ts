import { describe, it, expect, beforeEach } from "vitest";
import { TokenIssuer, isReservedHolder, marketHolder, vaultCustody } from "../src/token-issuer.js";
import { TreasuryError } from "../src/types.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof TreasuryError ? err.code : "NOT_A_TREASURY_ERROR";
  }
  return undefined;
}

describe("TokenIssuer", () => {
  let issuer: TokenIssuer;

  beforeEach(() => {
    issuer = new TokenIssuer("treasury-1", "GRID", 9);
  });

  it("tracks supply across mint, transfer and burn", () => {
    issuer.mint("alice", 5n);
    issuer.transfer("alice", "bob", 2n);
    issuer.burn("bob", 1n);

    expect(issuer.totalSupply).toBe(4n);
    expect(issuer.state()).toEqual({
      id: "treasury-1",
      symbol: "GRID",
      decimals: 9,
      totalSupply: 4n,
      balances: { alice: 3n, bob: 1n },
    });
  });

  it("omits emptied holders from the state view", () => {
    issuer.mint("alice", 5n);
    issuer.burn("alice", 5n);
    expect(issuer.state().balances).toEqual({});
    expect(issuer.balanceOf("alice")).toBe(0n);
  });

  it("rejects zero amounts", () => {
    expect(codeOf(() => issuer.mint("alice", 0n))).toBe("ZERO_AMOUNT");
    expect(codeOf(() => issuer.burn("alice", 0n))).toBe("ZERO_AMOUNT");
  });

  it("refuses to burn or move more than a holder has", () => {
    issuer.mint("alice", 5n);
    expect(codeOf(() => issuer.burn("alice", 6n))).toBe("INSUFFICIENT_TOKENS");
    expect(codeOf(() => issuer.transfer("alice", "bob", 6n))).toBe("INSUFFICIENT_TOKENS");
    expect(issuer.balanceOf("alice")).toBe(5n);
    expect(issuer.totalSupply).toBe(5n);
  });

  it("treats a self-transfer as a no-op", () => {
    issuer.mint("alice", 5n);
    issuer.transfer("alice", "alice", 5n);
    expect(issuer.balanceOf("alice")).toBe(5n);
  });

  it("rejects invalid token metadata", () => {
    expect(codeOf(() => new TokenIssuer("treasury-1", "", 9))).toBe("INVALID_PARAMS");
    expect(codeOf(() => new TokenIssuer("treasury-1", "GRID", 19))).toBe("INVALID_PARAMS");
  });

  it("restores from a snapshot", () => {
    issuer.mint("alice", 5n);
    const snap = issuer.snapshot();
    issuer.mint("bob", 7n);
    issuer.restore(snap);

    expect(issuer.totalSupply).toBe(5n);
    expect(issuer.balanceOf("bob")).toBe(0n);
    expect(codeOf(() => issuer.restore(new TokenIssuer("treasury-2", "X", 0).snapshot()))).toBe(
      "TREASURY_MISMATCH",
    );
  });

  it("names reserved holder accounts", () => {
    expect(vaultCustody("vault-1")).toBe("vault:vault-1");
    expect(marketHolder("market-1")).toBe("market:market-1");
  });
});

describe("isReservedHolder", () => {
  it("flags custody and market holder ids only", () => {
    expect(isReservedHolder(vaultCustody("vault-1"))).toBe(true);
    expect(isReservedHolder(marketHolder("market-1"))).toBe(true);
    expect(isReservedHolder("alice")).toBe(false);
    expect(isReservedHolder("vault-1")).toBe(false);
  });
});
