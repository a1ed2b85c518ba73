/**
 * @spreadvault/ledger - Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. A product of two u64 values is exact
 * (bigint is arbitrary precision, so the double-width intermediate is
 * free); only the stored result is bounded to u64.
 *
 * Rules:
 * - No floating-point operations
 * - Division truncates toward zero
 * - Every result written to a u64 field passes through assertU64
 */

import { U64_MAX } from "@spreadvault/types";
import type { AmountString, Bps, ScaledAmount } from "@spreadvault/types";
import { LedgerError } from "./types.js";

// ─── Scales ──────────────────────────────────────────────────────────────

/** Implicit scale of amounts and prices (9 decimals). */
export const SCALE = 1_000_000_000n;

/** Implicit scale of the reward-per-share accumulator. */
export const PRECISION = 1_000_000_000_000n;

/** 100% in basis points. */
export const BPS_DENOMINATOR = 10_000n;

// ─── Bounds ──────────────────────────────────────────────────────────────

/**
 * Assert a value fits an unsigned 64-bit field.
 * Throws LedgerError("OVERFLOW") otherwise.
 */
export function assertU64(value: bigint, label = "value"): bigint {
  if (value < 0n) {
    throw new LedgerError("OVERFLOW", `${label} underflows u64: ${value.toString()}`);
  }
  if (value > U64_MAX) {
    throw new LedgerError("OVERFLOW", `${label} overflows u64: ${value.toString()}`);
  }
  return value;
}

/** a + b, bounded to u64. */
export function checkedAdd(a: bigint, b: bigint, label = "sum"): bigint {
  return assertU64(a + b, label);
}

/** a - b, bounded to u64 (no silent wrap below zero). */
export function checkedSub(a: bigint, b: bigint, label = "difference"): bigint {
  return assertU64(a - b, label);
}

/**
 * floor(a × b / denominator) with an exact intermediate product.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv denominator is zero");
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new LedgerError("INVALID_AMOUNT", "mulDiv operands must be unsigned");
  }
  return assertU64((a * b) / denominator, "mulDiv result");
}

/**
 * floor(amount × bps / 10000).
 */
export function bpsOf(amount: ScaledAmount, bps: Bps): ScaledAmount {
  if (bps < 0n || bps > BPS_DENOMINATOR) {
    throw new LedgerError("INVALID_AMOUNT", `Basis points out of range: ${bps.toString()}`);
  }
  return mulDiv(amount, bps, BPS_DENOMINATOR);
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── Conversions ─────────────────────────────────────────────────────────

/**
 * Parse a human decimal string into a scaled integer.
 *
 * "10.5" with decimals=9 → 10500000000n
 * "0.1" with decimals=9 → 100000000n
 */
export function parseScaled(amount: string, decimals = 9): ScaledAmount {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  return assertU64(BigInt(intPart + fracPart.padEnd(decimals, "0")), "amount");
}

/**
 * Render a scaled integer as a human decimal string.
 *
 * 10500000000n with decimals=9 → "10.500000000"
 */
export function formatScaled(scaled: ScaledAmount, decimals = 9): string {
  if (decimals === 0) {
    return scaled.toString();
  }
  const str = scaled.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

/** bigint → wire string. */
export function toAmountString(value: bigint): AmountString {
  return value.toString();
}

/**
 * Wire string → bigint. Accepts only unsigned decimal integers in u64 range.
 */
export function fromAmountString(value: AmountString, label = "amount"): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `${label} must be an unsigned integer string, got "${value}"`);
  }
  return assertU64(BigInt(value), label);
}
