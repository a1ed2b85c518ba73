/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 *
 * Scaled amounts travel as decimal integer strings and come out of
 * parsing as bigint; basis points and counts are plain JSON integers.
 */

import { z } from "zod";
import { isAmountString } from "@spreadvault/types";
import { MAX_ORDERS_PER_SIDE } from "@spreadvault/strategy";
import { DEFAULT_TREASURY_ID } from "../services/protocol.js";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .refine(isAmountString, { message: "Must be an unsigned 64-bit decimal integer string" })
  .transform((value) => BigInt(value));

export const IntegerSchema = z
  .number()
  .int()
  .nonnegative()
  .transform((value) => BigInt(value));

const IdSchema = z.string().min(1).max(128);

const TreasuryIdSchema = IdSchema.default(DEFAULT_TREASURY_ID);

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  baseAmount: AmountSchema,
  quoteAmount: AmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const PositionRefSchema = z.object({
  positionId: IdSchema,
});

export type PositionRefDto = z.infer<typeof PositionRefSchema>;

// =============================================================================
// Strategy DTOs
// =============================================================================

export const CreateStrategyConfigSchema = z.object({
  spreadBps: IntegerSchema,
  orderSize: AmountSchema,
  numOrdersPerSide: z
    .number()
    .int()
    .min(1)
    .max(Number(MAX_ORDERS_PER_SIDE))
    .transform((value) => BigInt(value)),
  keeper: IdSchema,
});

export type CreateStrategyConfigDto = z.infer<typeof CreateStrategyConfigSchema>;

export const RebalanceSchema = z.object({
  configId: IdSchema,
  bookId: IdSchema,
});

export type RebalanceDto = z.infer<typeof RebalanceSchema>;

export const SettleSchema = z.object({
  bookId: IdSchema,
});

export type SettleDto = z.infer<typeof SettleSchema>;

// =============================================================================
// Order book DTOs
// =============================================================================

export const CreateOrderBookSchema = z.object({
  initialMidPrice: AmountSchema,
});

export type CreateOrderBookDto = z.infer<typeof CreateOrderBookSchema>;

export const SimulateTradeSchema = z.object({
  directionUp: z.boolean(),
  priceDelta: AmountSchema,
});

export type SimulateTradeDto = z.infer<typeof SimulateTradeSchema>;

// =============================================================================
// Incentive & market DTOs
// =============================================================================

export const AccrueSchema = z.object({
  treasuryId: TreasuryIdSchema,
});

export type AccrueDto = z.infer<typeof AccrueSchema>;

export const ClaimSchema = z.object({
  positionId: IdSchema,
  treasuryId: TreasuryIdSchema,
});

export type ClaimDto = z.infer<typeof ClaimSchema>;

export const CreateMarketSchema = z.object({
  treasuryId: TreasuryIdSchema,
  initialReserve: AmountSchema,
  priceQuotePerToken: AmountSchema,
});

export type CreateMarketDto = z.infer<typeof CreateMarketSchema>;

export const BuybackSchema = z.object({
  marketId: IdSchema,
  treasuryId: TreasuryIdSchema,
});

export type BuybackDto = z.infer<typeof BuybackSchema>;

// =============================================================================
// Query DTOs
// =============================================================================

export const TokenQuerySchema = z.object({
  treasuryId: TreasuryIdSchema,
});

export type TokenQuery = z.infer<typeof TokenQuerySchema>;

export const ListRecordsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListRecordsQuery = z.infer<typeof ListRecordsQuerySchema>;
