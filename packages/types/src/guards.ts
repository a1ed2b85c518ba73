/**
 * Runtime Type Guards
 *
 * Narrowing functions for protocol types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, journal reads, deserialized snapshots).
 */

import { U64_MAX } from "./financial.js";
import type { AmountString } from "./financial.js";
import type { OrderSide, SharePosition } from "./entities.js";
import type { ProtocolRecordType } from "./record.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Financial guards
// =============================================================================

const DECIMAL_INTEGER = /^(0|[1-9]\d*)$/;

/**
 * A decimal integer string that fits an unsigned 64-bit field.
 */
export function isAmountString(value: unknown): value is AmountString {
  if (typeof value !== "string" || !DECIMAL_INTEGER.test(value)) return false;
  return BigInt(value) <= U64_MAX;
}

// =============================================================================
// Entity guards
// =============================================================================

export function isOrderSide(value: unknown): value is OrderSide {
  return value === "bid" || value === "ask";
}

export function isSharePosition(value: unknown): value is SharePosition {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.vaultId === "string" &&
    typeof v.shares === "bigint" &&
    v.shares > 0n &&
    typeof v.rewardDebt === "bigint" &&
    v.rewardDebt >= 0n
  );
}

// =============================================================================
// Record & event guards
// =============================================================================

const RECORD_TYPES = new Set<string>([
  "vault.created",
  "vault.deposited",
  "vault.withdrawn",
  "strategy.config_created",
  "strategy.rebalanced",
  "strategy.settled",
  "orderbook.created",
  "orderbook.trade_simulated",
  "incentive.accrued",
  "incentive.claimed",
  "market.created",
  "buyback.executed",
] satisfies ProtocolRecordType[]);

export function isProtocolRecordType(value: unknown): value is ProtocolRecordType {
  return typeof value === "string" && RECORD_TYPES.has(value);
}

const EVENT_SOURCES = new Set<string>([
  "vault", "orderbook", "strategy", "incentive", "market", "buyback",
] satisfies EventSource[]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isProtocolRecordType(v.type) || !isEventMetadata(v.metadata)) return false;
  if (v.payload === null || typeof v.payload !== "object") return false;
  return Object.values(v.payload).every(
    (p) => typeof p === "string" || typeof p === "number" || typeof p === "boolean",
  );
}
