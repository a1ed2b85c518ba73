/**
 * @spreadvault/orderbook - Types for the order-book simulator.
 */

import type { OrderBookState } from "@spreadvault/types";

/** Error codes for order-book operations. */
export type OrderBookErrorCode =
  | "ZERO_PRICE"
  | "INVALID_ORDER"
  | "INVALID_BOOK_ID"
  | "BOOK_MISMATCH";

export class OrderBookError extends Error {
  public readonly code: OrderBookErrorCode;

  constructor(code: OrderBookErrorCode, message: string) {
    super(message);
    this.name = "OrderBookError";
    this.code = code;
  }
}

/** Value realized by fills since the last settlement sweep. */
export interface PendingFills {
  readonly base: bigint;
  readonly quote: bigint;
}

export interface OrderBookSnapshot {
  readonly version: 1;
  readonly state: OrderBookState;
}
