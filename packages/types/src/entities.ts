/**
 * Entity Types
 *
 * Readonly views of the protocol's persisted entities. Each entity is
 * addressed by an opaque string id; the owning package keeps the live
 * mutable copy and hands these views out.
 */

import type { Bps, Identity, ScaledAmount } from "./financial.js";

export type VaultId = string;
export type PositionId = string;
export type OrderBookId = string;
export type StrategyConfigId = string;
export type MarketId = string;
export type TreasuryId = string;

// =============================================================================
// Vault
// =============================================================================

/**
 * Pooled base/quote balances for one asset pair.
 *
 * Invariants:
 * - lockedBase <= baseBalance, lockedQuote <= quoteBalance
 * - totalShares is 0 only while the vault is empty
 * - rewardPerShare never decreases
 */
export interface VaultState {
  readonly id: VaultId;
  readonly baseBalance: ScaledAmount;
  readonly quoteBalance: ScaledAmount;
  readonly totalShares: bigint;
  readonly lockedBase: ScaledAmount;
  readonly lockedQuote: ScaledAmount;
  /** Realized spread yield awaiting the fee split. */
  readonly accruedFeeQuote: ScaledAmount;
  /** Cumulative emission per share since genesis, 1e12 scale. */
  readonly rewardPerShare: bigint;
  /** Incentive tokens reserved for unclaimed rewards. */
  readonly rewardPoolBalance: ScaledAmount;
}

/**
 * A depositor's claim on a vault, created by one deposit.
 * Positions are never merged and are redeemed only in full.
 */
export interface SharePosition {
  readonly id: PositionId;
  readonly vaultId: VaultId;
  readonly shares: bigint;
  /** shares × rewardPerShare / PRECISION at mint or last claim. */
  readonly rewardDebt: ScaledAmount;
}

// =============================================================================
// Order book
// =============================================================================

export type OrderSide = "bid" | "ask";

export interface Order {
  readonly id: bigint;
  readonly side: OrderSide;
  readonly price: ScaledAmount;
  readonly size: ScaledAmount;
  /** The vault that placed the order. */
  readonly owner: VaultId;
  readonly filled: ScaledAmount;
}

export interface OrderBookState {
  readonly id: OrderBookId;
  readonly bids: readonly Order[];
  readonly asks: readonly Order[];
  readonly midPrice: ScaledAmount;
  readonly pendingFillBase: ScaledAmount;
  readonly pendingFillQuote: ScaledAmount;
  readonly nextOrderId: bigint;
}

// =============================================================================
// Strategy
// =============================================================================

/** Immutable once created. */
export interface StrategyConfig {
  readonly id: StrategyConfigId;
  /** Half-width of the bid/ask band around the mid price. */
  readonly spreadBps: Bps;
  readonly orderSize: ScaledAmount;
  readonly numOrdersPerSide: bigint;
  /** The only identity allowed to trigger a rebalance. */
  readonly keeper: Identity;
}

// =============================================================================
// Token
// =============================================================================

export interface TokenMarketState {
  readonly id: MarketId;
  readonly tokenReserve: ScaledAmount;
  readonly quoteReserve: ScaledAmount;
  /** Quote paid per whole token, 1e9 scale. */
  readonly priceQuotePerToken: ScaledAmount;
}

export interface TokenIssuerState {
  readonly id: TreasuryId;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: ScaledAmount;
  readonly balances: Readonly<Record<string, ScaledAmount>>;
}
