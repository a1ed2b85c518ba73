/**
 * Fixed-Price Market - sells incentive tokens for quote at a fixed price.
 *
 * The token reserve is held by the market's holder account on the
 * issuer; tokenReserve always equals that balance.
 */

import type {
  Identity,
  MarketCreatedRecord,
  MarketId,
  ScaledAmount,
  TokenMarketState,
  TreasuryId,
} from "@spreadvault/types";
import { SCALE, assertU64, checkedAdd, mulDiv } from "@spreadvault/ledger";
import type { TokenIssuer } from "./token-issuer.js";
import { marketHolder } from "./token-issuer.js";
import type { TokenMarketSnapshot } from "./types.js";
import { TreasuryError } from "./types.js";

export class FixedPriceMarket {
  private readonly _id: MarketId;
  private readonly _treasuryId: TreasuryId;
  private _tokenReserve: ScaledAmount;
  private _quoteReserve = 0n;
  private readonly _price: ScaledAmount;

  /** Use createTokenMarket(); the constructor does not fund the reserve. */
  constructor(id: MarketId, treasuryId: TreasuryId, tokenReserve: ScaledAmount, price: ScaledAmount) {
    assertU64(tokenReserve, "token reserve");
    assertU64(price, "market price");
    if (tokenReserve === 0n || price === 0n) {
      throw new TreasuryError(
        "INVALID_MARKET",
        `Market reserve and price must be non-zero (reserve=${tokenReserve.toString()}, price=${price.toString()})`,
      );
    }
    this._id = id;
    this._treasuryId = treasuryId;
    this._tokenReserve = tokenReserve;
    this._price = price;
  }

  get id(): MarketId {
    return this._id;
  }

  get treasuryId(): TreasuryId {
    return this._treasuryId;
  }

  state(): TokenMarketState {
    return {
      id: this._id,
      tokenReserve: this._tokenReserve,
      quoteReserve: this._quoteReserve,
      priceQuotePerToken: this._price,
    };
  }

  /**
   * Tokens `quoteIn` would buy right now; 0 below one token unit.
   * Throws what buy() would throw.
   */
  quote(quoteIn: ScaledAmount): ScaledAmount {
    assertU64(quoteIn, "quote in");
    if (quoteIn === 0n) {
      throw new TreasuryError("ZERO_AMOUNT", "Cannot buy with zero quote");
    }
    const tokenOut = mulDiv(quoteIn, SCALE, this._price);
    if (tokenOut > this._tokenReserve) {
      throw new TreasuryError(
        "INSUFFICIENT_RESERVE",
        `Buy of ${tokenOut.toString()} tokens exceeds reserve ${this._tokenReserve.toString()}`,
      );
    }
    checkedAdd(this._quoteReserve, quoteIn, "quote reserve");
    return tokenOut;
  }

  /**
   * Buy tokens for `quoteIn` and deliver them to `recipient`.
   * tokenOut = quoteIn × SCALE / price, truncated. A dust buy keeps
   * the quote and delivers nothing.
   */
  buy(issuer: TokenIssuer, quoteIn: ScaledAmount, recipient: Identity): ScaledAmount {
    this.assertIssuer(issuer);
    const tokenOut = this.quote(quoteIn);

    if (tokenOut > 0n) {
      issuer.transfer(marketHolder(this._id), recipient, tokenOut);
    }
    this._tokenReserve -= tokenOut;
    this._quoteReserve += quoteIn;
    return tokenOut;
  }

  snapshot(): TokenMarketSnapshot {
    return { version: 1, treasuryId: this._treasuryId, state: this.state() };
  }

  restore(snapshot: TokenMarketSnapshot): void {
    if (snapshot.state.id !== this._id) {
      throw new TreasuryError(
        "MARKET_MISMATCH",
        `Snapshot of market "${snapshot.state.id}" cannot restore market "${this._id}"`,
      );
    }
    this._tokenReserve = snapshot.state.tokenReserve;
    this._quoteReserve = snapshot.state.quoteReserve;
  }

  /** Throws TREASURY_MISMATCH unless `issuer` is the treasury this market trades. */
  assertIssuer(issuer: TokenIssuer): void {
    if (issuer.id !== this._treasuryId) {
      throw new TreasuryError(
        "TREASURY_MISMATCH",
        `Market "${this._id}" trades treasury "${this._treasuryId}", not "${issuer.id}"`,
      );
    }
  }
}

/**
 * Open a market and mint its whole reserve to the market's holder account.
 */
export function createTokenMarket(
  id: MarketId,
  issuer: TokenIssuer,
  initialReserve: ScaledAmount,
  priceQuotePerToken: ScaledAmount,
): { market: FixedPriceMarket; record: MarketCreatedRecord } {
  const market = new FixedPriceMarket(id, issuer.id, initialReserve, priceQuotePerToken);
  issuer.mint(marketHolder(id), initialReserve);
  return {
    market,
    record: {
      type: "market.created",
      marketId: id,
      treasuryId: issuer.id,
      tokenReserve: initialReserve,
      priceQuotePerToken,
    },
  };
}
