/**
 * @spreadvault/treasury - Incentive token, reward emission,
 * fixed-price market and fee buyback.
 */

// Token
export { TokenIssuer, vaultCustody, marketHolder, isReservedHolder } from "./token-issuer.js";

// Rewards
export {
  IncentiveAccumulator,
  DEFAULT_EMISSION_PER_ACCRUE,
  DEFAULT_INCENTIVE_PARAMS,
} from "./incentives.js";

// Market
export { FixedPriceMarket, createTokenMarket } from "./market.js";

// Buyback
export {
  BuybackEngine,
  DEFAULT_LP_SHARE_BPS,
  DEFAULT_BURN_SHARE_BPS,
  DEFAULT_BUYBACK_PARAMS,
} from "./buyback.js";
export type { FeeSplit } from "./buyback.js";

// Types
export type {
  TreasuryErrorCode,
  IncentiveParams,
  BuybackParams,
  TokenIssuerSnapshot,
  TokenMarketSnapshot,
} from "./types.js";

export { TreasuryError } from "./types.js";
