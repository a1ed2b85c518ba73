/**
 * @spreadvault/strategy - Strategy Controller.
 *
 * Orchestrates one vault's order lifecycle against the order book:
 * a rebalance cycle replaces the vault's resting orders with a fresh
 * symmetric band around the mid price, and settlement sweeps realized
 * fills back into the vault.
 *
 * Lock discipline:
 * - Every placed bid locks orderSize × bid / SCALE quote
 * - Every placed ask locks orderSize base
 * - Rebalance releases all of the vault's locks before placing anew
 * - Settle releases at most what is locked (min(fill, locked))
 */

import type {
  Identity,
  RebalanceRecord,
  SettleRecord,
  StrategyConfig,
} from "@spreadvault/types";
import {
  BPS_DENOMINATOR,
  SCALE,
  checkedAdd,
  minAmount,
  mulDiv,
} from "@spreadvault/ledger";
import type { VaultLedger } from "@spreadvault/ledger";
import type { OrderBookSimulator } from "@spreadvault/orderbook";
import { StrategyError } from "./types.js";

/** Bid and ask prices for a given mid and spread. */
export interface QuoteBand {
  readonly bidPrice: bigint;
  readonly askPrice: bigint;
}

/**
 * offset = mid × spreadBps / 10000; bid = mid − offset, ask = mid + offset.
 */
export function computeQuoteBand(midPrice: bigint, spreadBps: bigint): QuoteBand {
  const offset = mulDiv(midPrice, spreadBps, BPS_DENOMINATOR);
  return {
    bidPrice: midPrice - offset,
    askPrice: checkedAdd(midPrice, offset, "ask price"),
  };
}

/**
 * Run one rebalance cycle for `vault` on `book`.
 *
 * Only the config's keeper may trigger it. Orders the vault cannot
 * cover from its available balance are skipped rather than failing the
 * cycle.
 */
export function rebalance(
  caller: Identity,
  vault: VaultLedger,
  config: StrategyConfig,
  book: OrderBookSimulator,
): RebalanceRecord {
  if (caller !== config.keeper) {
    throw new StrategyError(
      "NOT_KEEPER",
      `"${caller}" is not the keeper of strategy config "${config.id}"`,
    );
  }

  const midPrice = book.midPrice;
  const { bidPrice, askPrice } = computeQuoteBand(midPrice, config.spreadBps);
  const bidCost = mulDiv(config.orderSize, bidPrice, SCALE);

  const ordersCancelled = book.cancelAll(vault.id);
  const locked = vault.state();
  vault.unlockBase(locked.lockedBase);
  vault.unlockQuote(locked.lockedQuote);

  let ordersPlaced = 0;
  for (let i = 0n; i < config.numOrdersPerSide; i++) {
    const before = ordersPlaced;
    if (vault.availableQuote() >= bidCost) {
      book.place("bid", bidPrice, config.orderSize, vault.id);
      vault.lockQuote(bidCost);
      ordersPlaced++;
    }
    if (vault.availableBase() >= config.orderSize) {
      book.place("ask", askPrice, config.orderSize, vault.id);
      vault.lockBase(config.orderSize);
      ordersPlaced++;
    }
    // Availability only shrinks, so later rounds cannot place either.
    if (ordersPlaced === before) break;
  }

  return {
    type: "strategy.rebalanced",
    vaultId: vault.id,
    midPrice,
    bidPrice,
    askPrice,
    ordersCancelled,
    ordersPlaced,
  };
}

/**
 * Sweep the book's pending fills into `vault`.
 *
 * Unlocks min(fill, locked) on each side and adds the quote fill to the
 * vault's accrued fees. Pending fills are global to the book, so a book
 * shared by several vaults credits whichever vault settles first.
 */
export function settle(vault: VaultLedger, book: OrderBookSimulator): SettleRecord {
  const pending = book.state();
  const s = vault.state();
  // Bound-check the fee credit before the sweep zeroes the book.
  checkedAdd(s.accruedFeeQuote, pending.pendingFillQuote, "accrued fees");

  const fills = book.takePendingFills();
  const baseReturned = minAmount(fills.base, s.lockedBase);
  vault.unlockBase(baseReturned);
  vault.unlockQuote(minAmount(fills.quote, s.lockedQuote));
  if (fills.quote > 0n) {
    vault.addFeeQuote(fills.quote);
  }

  return {
    type: "strategy.settled",
    vaultId: vault.id,
    baseReturned,
    quoteEarned: fills.quote,
  };
}
