/**
 * @spreadvault/treasury domain types.
 *
 * The treasury side of the protocol:
 * - Incentive token issuance (mint/burn authority, supply, holder balances)
 * - Reward-per-share emission accumulator
 * - Fixed-price token market
 * - Fee split and buyback-and-burn
 */

import type { TokenIssuerState, TokenMarketState, TreasuryId } from "@spreadvault/types";

// =============================================================================
// Errors
// =============================================================================

export type TreasuryErrorCode =
  | "ZERO_AMOUNT"
  | "INSUFFICIENT_TOKENS"
  | "NOTHING_TO_CLAIM"
  | "INVALID_MARKET"
  | "INSUFFICIENT_RESERVE"
  | "NO_FEES"
  | "TREASURY_MISMATCH"
  | "MARKET_MISMATCH"
  | "VAULT_MISMATCH"
  | "POSITION_NOT_FOUND"
  | "INVALID_PARAMS";

export class TreasuryError extends Error {
  public readonly code: TreasuryErrorCode;

  constructor(code: TreasuryErrorCode, message: string) {
    super(message);
    this.name = "TreasuryError";
    this.code = code;
  }
}

// =============================================================================
// Parameters
// =============================================================================

export interface IncentiveParams {
  /** Tokens minted per accrue call, 1e9 scale. */
  readonly emissionPerAccrue: bigint;
}

export interface BuybackParams {
  /** Share of swept fees returned to LPs. */
  readonly lpShareBps: bigint;
  /** Share of bought-back tokens that is burned; the rest funds rewards. */
  readonly burnShareBps: bigint;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface TokenIssuerSnapshot {
  readonly version: 1;
  readonly state: TokenIssuerState;
}

export interface TokenMarketSnapshot {
  readonly version: 1;
  readonly treasuryId: TreasuryId;
  readonly state: TokenMarketState;
}
