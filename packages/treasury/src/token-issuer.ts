/**
 * Token Issuer - mint/burn authority for the incentive token.
 *
 * Balances are keyed by holder id. Vault custody and market reserves
 * are ordinary holders under reserved prefixes.
 */

import type {
  Identity,
  MarketId,
  ScaledAmount,
  TokenIssuerState,
  TreasuryId,
  VaultId,
} from "@spreadvault/types";
import { assertU64, checkedAdd } from "@spreadvault/ledger";
import type { TokenIssuerSnapshot } from "./types.js";
import { TreasuryError } from "./types.js";

/** Holder id of the tokens a vault keeps for its reward pool. */
export function vaultCustody(vaultId: VaultId): Identity {
  return `vault:${vaultId}`;
}

/** Holder id of a market's token reserve. */
export function marketHolder(marketId: MarketId): Identity {
  return `market:${marketId}`;
}

const RESERVED_HOLDER_PREFIXES = ["vault:", "market:"] as const;

/** True for holder ids kept for vault custody and market reserves. */
export function isReservedHolder(holder: Identity): boolean {
  return RESERVED_HOLDER_PREFIXES.some((prefix) => holder.startsWith(prefix));
}

export class TokenIssuer {
  private readonly _id: TreasuryId;
  private readonly _symbol: string;
  private readonly _decimals: number;
  private _totalSupply = 0n;
  private readonly _balances = new Map<Identity, ScaledAmount>();

  constructor(id: TreasuryId, symbol: string, decimals: number) {
    if (id.length === 0 || symbol.length === 0) {
      throw new TreasuryError("INVALID_PARAMS", "Treasury ID and token symbol must be non-empty");
    }
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
      throw new TreasuryError("INVALID_PARAMS", `Token decimals must be 0–18, got ${String(decimals)}`);
    }
    this._id = id;
    this._symbol = symbol;
    this._decimals = decimals;
  }

  get id(): TreasuryId {
    return this._id;
  }

  get totalSupply(): ScaledAmount {
    return this._totalSupply;
  }

  balanceOf(holder: Identity): ScaledAmount {
    return this._balances.get(holder) ?? 0n;
  }

  mint(to: Identity, amount: ScaledAmount): void {
    this._requirePositive(amount, "mint");
    const supply = checkedAdd(this._totalSupply, amount, "token supply");
    const balance = checkedAdd(this.balanceOf(to), amount, "token balance");
    this._totalSupply = supply;
    this._balances.set(to, balance);
  }

  burn(from: Identity, amount: ScaledAmount): void {
    this._requirePositive(amount, "burn");
    this._requireBalance(from, amount);
    this._balances.set(from, this.balanceOf(from) - amount);
    this._totalSupply -= amount;
  }

  transfer(from: Identity, to: Identity, amount: ScaledAmount): void {
    this._requirePositive(amount, "transfer");
    this._requireBalance(from, amount);
    if (from === to) return;
    const credited = checkedAdd(this.balanceOf(to), amount, "token balance");
    this._balances.set(from, this.balanceOf(from) - amount);
    this._balances.set(to, credited);
  }

  state(): TokenIssuerState {
    const balances: Record<string, ScaledAmount> = {};
    for (const [holder, amount] of this._balances) {
      if (amount > 0n) balances[holder] = amount;
    }
    return {
      id: this._id,
      symbol: this._symbol,
      decimals: this._decimals,
      totalSupply: this._totalSupply,
      balances,
    };
  }

  snapshot(): TokenIssuerSnapshot {
    return { version: 1, state: this.state() };
  }

  restore(snapshot: TokenIssuerSnapshot): void {
    if (snapshot.state.id !== this._id) {
      throw new TreasuryError(
        "TREASURY_MISMATCH",
        `Snapshot of treasury "${snapshot.state.id}" cannot restore treasury "${this._id}"`,
      );
    }
    this._totalSupply = snapshot.state.totalSupply;
    this._balances.clear();
    for (const [holder, amount] of Object.entries(snapshot.state.balances)) {
      this._balances.set(holder, amount);
    }
  }

  private _requirePositive(amount: ScaledAmount, action: string): void {
    assertU64(amount, `${action} amount`);
    if (amount === 0n) {
      throw new TreasuryError("ZERO_AMOUNT", `Cannot ${action} zero tokens`);
    }
  }

  private _requireBalance(holder: Identity, amount: ScaledAmount): void {
    const balance = this.balanceOf(holder);
    if (amount > balance) {
      throw new TreasuryError(
        "INSUFFICIENT_TOKENS",
        `"${holder}" holds ${balance.toString()} tokens, needs ${amount.toString()}`,
      );
    }
  }
}
