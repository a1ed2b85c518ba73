/**
 * @spreadvault/orderbook - Deterministic order-book simulator.
 *
 * Holds resting bids and asks around a single reference price and
 * accumulates the value realized by fills until a settlement sweep.
 */

export { OrderBookSimulator, createOrderBook } from "./order-book.js";

export type { OrderBookErrorCode, PendingFills, OrderBookSnapshot } from "./types.js";

export { OrderBookError } from "./types.js";
