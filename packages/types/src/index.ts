/**
 * @spreadvault/types - Shared domain types for the spread vault protocol.
 *
 * These types are used across all packages:
 * - Fixed-point primitives (scaled amounts, bps, identities)
 * - Entity views (vault, share position, order book, strategy, market)
 * - Operation records and their journal events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  ScaledAmount,
  Bps,
  Identity,
  AmountString,
} from "./financial.js";
export { U64_MAX } from "./financial.js";

// Entity types
export type {
  VaultId,
  PositionId,
  OrderBookId,
  StrategyConfigId,
  MarketId,
  TreasuryId,
  VaultState,
  SharePosition,
  OrderSide,
  Order,
  OrderBookState,
  StrategyConfig,
  TokenMarketState,
  TokenIssuerState,
} from "./entities.js";

// Record types
export type {
  VaultCreatedRecord,
  DepositRecord,
  WithdrawRecord,
  StrategyConfigCreatedRecord,
  RebalanceRecord,
  SettleRecord,
  OrderBookCreatedRecord,
  TradeRecord,
  AccrueRecord,
  ClaimRecord,
  MarketCreatedRecord,
  BuybackRecord,
  ProtocolRecord,
  ProtocolRecordType,
} from "./record.js";

// Event types
export type {
  EventSource,
  EventMetadata,
  EventPayloadValue,
  DomainEvent,
} from "./event.js";

// Runtime type guards
export {
  isAmountString,
  isOrderSide,
  isSharePosition,
  isProtocolRecordType,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
