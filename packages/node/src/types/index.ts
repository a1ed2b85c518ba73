/**
 * Type barrel - re-exports all public types from @spreadvault/node.
 */

// DTOs
export {
  AmountSchema,
  IntegerSchema,
  DepositSchema,
  PositionRefSchema,
  CreateStrategyConfigSchema,
  RebalanceSchema,
  SettleSchema,
  CreateOrderBookSchema,
  SimulateTradeSchema,
  AccrueSchema,
  ClaimSchema,
  CreateMarketSchema,
  BuybackSchema,
  TokenQuerySchema,
  ListRecordsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  PositionRefDto,
  CreateStrategyConfigDto,
  RebalanceDto,
  SettleDto,
  CreateOrderBookDto,
  SimulateTradeDto,
  AccrueDto,
  ClaimDto,
  CreateMarketDto,
  BuybackDto,
  TokenQuery,
  ListRecordsQuery,
} from "./dto.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Wire
export { toWire } from "./wire.js";
export type { WireValue } from "./wire.js";

// App env
export type { AppEnv } from "./api-contract.js";
