/**
 * @spreadvault/orderbook - Order Book Simulator.
 *
 * A deterministic stand-in for an external order book. Orders rest
 * unordered on each side; a simulated trade moves the single reference
 * price and every order the move crosses fills completely.
 *
 * Rules:
 * - Fills are all-or-nothing (no partial fills, no price-time priority)
 * - Placement does no balance check; the caller locks its own funds
 * - Pending fills accumulate until takePendingFills() sweeps them
 */

import type {
  Order,
  OrderBookCreatedRecord,
  OrderBookId,
  OrderBookState,
  OrderSide,
  ScaledAmount,
  TradeRecord,
  VaultId,
} from "@spreadvault/types";
import { SCALE, assertU64, checkedAdd, mulDiv } from "@spreadvault/ledger";
import type { OrderBookSnapshot, PendingFills } from "./types.js";
import { OrderBookError } from "./types.js";

export class OrderBookSimulator {
  private readonly _id: OrderBookId;
  private _bids: Order[] = [];
  private _asks: Order[] = [];
  private _midPrice: ScaledAmount;
  private _pendingFillBase = 0n;
  private _pendingFillQuote = 0n;
  private _nextOrderId = 1n;

  constructor(id: OrderBookId, initialMidPrice: ScaledAmount) {
    if (id.length === 0) {
      throw new OrderBookError("INVALID_BOOK_ID", "Order book ID must be a non-empty string");
    }
    assertU64(initialMidPrice, "mid price");
    if (initialMidPrice === 0n) {
      throw new OrderBookError("ZERO_PRICE", "Initial mid price must be greater than zero");
    }
    this._id = id;
    this._midPrice = initialMidPrice;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get id(): OrderBookId {
    return this._id;
  }

  get midPrice(): ScaledAmount {
    return this._midPrice;
  }

  bids(): readonly Order[] {
    return [...this._bids];
  }

  asks(): readonly Order[] {
    return [...this._asks];
  }

  ordersOf(owner: VaultId): readonly Order[] {
    return [...this._bids, ...this._asks].filter((o) => o.owner === owner);
  }

  state(): OrderBookState {
    return {
      id: this._id,
      bids: this.bids(),
      asks: this.asks(),
      midPrice: this._midPrice,
      pendingFillBase: this._pendingFillBase,
      pendingFillQuote: this._pendingFillQuote,
      nextOrderId: this._nextOrderId,
    };
  }

  // ─── Order lifecycle ─────────────────────────────────────────────────

  /**
   * Rest a new order on the book and return its id.
   */
  place(side: OrderSide, price: ScaledAmount, size: ScaledAmount, owner: VaultId): bigint {
    assertU64(price, "order price");
    assertU64(size, "order size");
    if (price === 0n || size === 0n) {
      throw new OrderBookError(
        "INVALID_ORDER",
        `Order price and size must be non-zero (price=${price.toString()}, size=${size.toString()})`,
      );
    }

    const id = this._nextOrderId;
    const order: Order = { id, side, price, size, owner, filled: 0n };
    this._nextOrderId = checkedAdd(id, 1n, "order id");
    if (side === "bid") {
      this._bids.push(order);
    } else {
      this._asks.push(order);
    }
    return id;
  }

  /** Remove every resting order owned by `owner`. Returns how many were removed. */
  cancelAll(owner: VaultId): number {
    const before = this._bids.length + this._asks.length;
    this._bids = this._bids.filter((o) => o.owner !== owner);
    this._asks = this._asks.filter((o) => o.owner !== owner);
    return before - (this._bids.length + this._asks.length);
  }

  // ─── Trade simulation ────────────────────────────────────────────────

  /**
   * Move the mid price by `priceDelta` and fill every order the move crosses.
   *
   * Upward moves fill asks priced at or below the new mid; each contributes
   * size × price / SCALE quote. Downward moves fill bids priced at or above
   * the new mid; each contributes its size in base. A downward move that
   * would reach zero clamps the mid to 1.
   */
  simulateTrade(directionUp: boolean, priceDelta: ScaledAmount): TradeRecord {
    assertU64(priceDelta, "price delta");
    const oldMidPrice = this._midPrice;
    const newMidPrice = directionUp
      ? checkedAdd(oldMidPrice, priceDelta, "mid price")
      : priceDelta >= oldMidPrice
        ? 1n
        : oldMidPrice - priceDelta;

    let bidFilled = 0n;
    let askFilled = 0n;
    let quoteEarned = 0n;
    let remainingBids = this._bids;
    let remainingAsks = this._asks;

    if (directionUp) {
      const crossed = this._asks.filter((o) => o.price <= newMidPrice);
      for (const order of crossed) {
        askFilled = checkedAdd(askFilled, order.size, "ask fill");
        quoteEarned = checkedAdd(quoteEarned, mulDiv(order.size, order.price, SCALE), "quote fill");
      }
      remainingAsks = this._asks.filter((o) => o.price > newMidPrice);
    } else {
      const crossed = this._bids.filter((o) => o.price >= newMidPrice);
      for (const order of crossed) {
        bidFilled = checkedAdd(bidFilled, order.size, "bid fill");
      }
      remainingBids = this._bids.filter((o) => o.price < newMidPrice);
    }

    // Bound-check the accumulators before anything is written.
    const pendingFillBase = checkedAdd(this._pendingFillBase, bidFilled, "pending base fill");
    const pendingFillQuote = checkedAdd(this._pendingFillQuote, quoteEarned, "pending quote fill");

    this._midPrice = newMidPrice;
    this._bids = remainingBids;
    this._asks = remainingAsks;
    this._pendingFillBase = pendingFillBase;
    this._pendingFillQuote = pendingFillQuote;

    return {
      type: "orderbook.trade_simulated",
      bookId: this._id,
      oldMidPrice,
      newMidPrice,
      bidFilled,
      askFilled,
      quoteEarned,
    };
  }

  /**
   * Read and zero the pending-fill accumulators. A second call without an
   * intervening fill returns zeros.
   */
  takePendingFills(): PendingFills {
    const fills = { base: this._pendingFillBase, quote: this._pendingFillQuote };
    this._pendingFillBase = 0n;
    this._pendingFillQuote = 0n;
    return fills;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): OrderBookSnapshot {
    return { version: 1, state: this.state() };
  }

  restore(snapshot: OrderBookSnapshot): void {
    const s = snapshot.state;
    if (s.id !== this._id) {
      throw new OrderBookError(
        "BOOK_MISMATCH",
        `Snapshot of book "${s.id}" cannot restore book "${this._id}"`,
      );
    }
    this._bids = [...s.bids];
    this._asks = [...s.asks];
    this._midPrice = s.midPrice;
    this._pendingFillBase = s.pendingFillBase;
    this._pendingFillQuote = s.pendingFillQuote;
    this._nextOrderId = s.nextOrderId;
  }

  static fromSnapshot(snapshot: OrderBookSnapshot): OrderBookSimulator {
    const book = new OrderBookSimulator(snapshot.state.id, snapshot.state.midPrice);
    book.restore(snapshot);
    return book;
  }
}

/**
 * Create a book with no resting orders around `initialMidPrice`.
 */
export function createOrderBook(
  id: OrderBookId,
  initialMidPrice: ScaledAmount,
): { book: OrderBookSimulator; record: OrderBookCreatedRecord } {
  const book = new OrderBookSimulator(id, initialMidPrice);
  return { book, record: { type: "orderbook.created", bookId: id, midPrice: initialMidPrice } };
}
