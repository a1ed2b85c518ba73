/**
 * Tests for the OrderBookSimulator.
 *
 * Covers:
 * - Placement and id assignment
 * - Owner-scoped cancellation
 * - Deterministic fills on upward and downward moves
 * - Mid-price clamping
 * - Pending-fill sweep
 * - Snapshot / restore
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { OrderBookSimulator, createOrderBook } from "../src/order-book.js";
import { OrderBookError } from "../src/types.js";

const ONE = 1_000_000_000n;

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof OrderBookError ? err.code : "NOT_AN_ORDERBOOK_ERROR";
  }
  return undefined;
}

describe("createOrderBook", () => {
  it("creates an empty book and its record", () => {
    const { book, record } = createOrderBook("book-1", 10n * ONE);

    expect(record).toEqual({ type: "orderbook.created", bookId: "book-1", midPrice: 10n * ONE });
    expect(book.state()).toEqual({
      id: "book-1",
      bids: [],
      asks: [],
      midPrice: 10n * ONE,
      pendingFillBase: 0n,
      pendingFillQuote: 0n,
      nextOrderId: 1n,
    });
  });

  it("rejects a zero mid price", () => {
    expect(errorCode(() => createOrderBook("book-1", 0n))).toBe("ZERO_PRICE");
  });
});

describe("OrderBookSimulator", () => {
  let book: OrderBookSimulator;

  beforeEach(() => {
    book = new OrderBookSimulator("book-1", 10n * ONE);
  });

  // ─── Placement ───────────────────────────────────────────────────────

  describe("place", () => {
    it("assigns monotonic ids across both sides", () => {
      expect(book.place("bid", 9n * ONE, ONE, "vault-1")).toBe(1n);
      expect(book.place("ask", 11n * ONE, ONE, "vault-1")).toBe(2n);
      expect(book.place("bid", 9n * ONE, ONE, "vault-2")).toBe(3n);

      expect(book.bids()).toHaveLength(2);
      expect(book.asks()).toEqual([
        { id: 2n, side: "ask", price: 11n * ONE, size: ONE, owner: "vault-1", filled: 0n },
      ]);
    });

    it("rejects a zero price or size", () => {
      expect(errorCode(() => book.place("bid", 0n, ONE, "vault-1"))).toBe("INVALID_ORDER");
      expect(errorCode(() => book.place("ask", ONE, 0n, "vault-1"))).toBe("INVALID_ORDER");
      expect(book.state().nextOrderId).toBe(1n);
    });
  });

  describe("cancelAll", () => {
    it("removes only the owner's orders", () => {
      book.place("bid", 9n * ONE, ONE, "vault-1");
      book.place("ask", 11n * ONE, ONE, "vault-1");
      book.place("ask", 12n * ONE, ONE, "vault-2");

      expect(book.cancelAll("vault-1")).toBe(2);
      expect(book.ordersOf("vault-1")).toEqual([]);
      expect(book.ordersOf("vault-2")).toHaveLength(1);
      expect(book.cancelAll("vault-1")).toBe(0);
    });
  });

  // ─── Trade simulation ────────────────────────────────────────────────

  describe("simulateTrade", () => {
    it("fills every ask at or below the new mid on an upward move", () => {
      book.place("ask", 10_100_000_000n, ONE, "vault-1");
      book.place("ask", 10_300_000_000n, ONE, "vault-1");
      book.place("ask", 11n * ONE, ONE, "vault-1");

      const record = book.simulateTrade(true, 500_000_000n);

      expect(record).toEqual({
        type: "orderbook.trade_simulated",
        bookId: "book-1",
        oldMidPrice: 10n * ONE,
        newMidPrice: 10_500_000_000n,
        bidFilled: 0n,
        askFilled: 2n * ONE,
        quoteEarned: 20_400_000_000n,
      });
      expect(book.asks().map((o) => o.id)).toEqual([3n]);
      expect(book.state().pendingFillQuote).toBe(20_400_000_000n);
    });

    it("fills an ask priced exactly at the new mid", () => {
      book.place("ask", 10_500_000_000n, 2n * ONE, "vault-1");
      const record = book.simulateTrade(true, 500_000_000n);
      expect(record.quoteEarned).toBe(21n * ONE);
    });

    it("fills every bid at or above the new mid on a downward move", () => {
      book.place("bid", 9_900_000_000n, 2n * ONE, "vault-1");
      book.place("bid", 9_500_000_000n, ONE, "vault-1");
      book.place("ask", 9_000_000_000n, ONE, "vault-1");

      const record = book.simulateTrade(false, 200_000_000n);

      expect(record.newMidPrice).toBe(9_800_000_000n);
      expect(record.bidFilled).toBe(2n * ONE);
      expect(record.askFilled).toBe(0n);
      expect(record.quoteEarned).toBe(0n);
      expect(book.bids().map((o) => o.id)).toEqual([2n]);
      // A downward move never touches asks.
      expect(book.asks()).toHaveLength(1);
      expect(book.state().pendingFillBase).toBe(2n * ONE);
    });

    it("clamps a downward move that would reach zero to 1", () => {
      book.place("bid", 1n, ONE, "vault-1");
      const record = book.simulateTrade(false, 10n * ONE);

      expect(record.newMidPrice).toBe(1n);
      expect(record.bidFilled).toBe(ONE);
    });

    it("truncates quote earned toward zero", () => {
      book.place("ask", 3n, 1n, "vault-1");
      expect(book.simulateTrade(true, 0n).quoteEarned).toBe(0n);
    });
  });

  describe("takePendingFills", () => {
    it("reads and zeroes the accumulators", () => {
      book.place("ask", 10n * ONE, ONE, "vault-1");
      book.place("bid", 10n * ONE, 3n * ONE, "vault-1");
      book.simulateTrade(true, 0n);
      book.simulateTrade(false, 0n);

      expect(book.takePendingFills()).toEqual({ base: 3n * ONE, quote: 10n * ONE });
      expect(book.takePendingFills()).toEqual({ base: 0n, quote: 0n });
    });
  });

  describe("snapshot", () => {
    it("restores orders, mid and accumulators", () => {
      book.place("ask", 10n * ONE, ONE, "vault-1");
      const snap = book.snapshot();

      book.simulateTrade(true, ONE);
      book.place("bid", 9n * ONE, ONE, "vault-1");
      book.restore(snap);

      expect(book.state()).toEqual(snap.state);
      expect(book.place("bid", 9n * ONE, ONE, "vault-1")).toBe(2n);
    });

    it("rebuilds a book from a snapshot", () => {
      book.place("bid", 9n * ONE, ONE, "vault-1");
      const copy = OrderBookSimulator.fromSnapshot(book.snapshot());
      expect(copy.state()).toEqual(book.state());
    });

    it("refuses a snapshot of another book", () => {
      const other = new OrderBookSimulator("book-2", ONE);
      expect(errorCode(() => book.restore(other.snapshot()))).toBe("BOOK_MISMATCH");
    });
  });
});

describe("OrderBookSimulator properties", () => {
  const arbMove = fc.record({
    up: fc.boolean(),
    delta: fc.bigInt({ min: 0n, max: 5n * ONE }),
  });

  it("keeps the mid price positive and conserves order count", () => {
    fc.assert(
      fc.property(fc.array(arbMove, { maxLength: 30 }), (moves) => {
        const book = new OrderBookSimulator("book-p", 10n * ONE);
        for (let i = 1n; i <= 10n; i++) {
          book.place("bid", i * ONE, ONE, "vault-p");
          book.place("ask", (10n + i) * ONE, ONE, "vault-p");
        }
        let filled = 0n;
        for (const move of moves) {
          const record = book.simulateTrade(move.up, move.delta);
          expect(record.newMidPrice > 0n).toBe(true);
          filled += record.bidFilled + record.askFilled;
        }
        const resting = BigInt(book.bids().length + book.asks().length);
        expect(resting * ONE + filled).toBe(20n * ONE);
      }),
    );
  });
});
