/**
 * Financial Types
 *
 * Fixed-point primitives shared by every package.
 *
 * Rules:
 * - All on-ledger quantities are bigint scaled integers, never floats
 * - Amounts and prices carry an implicit 1e9 scale
 * - The reward accumulator carries an implicit 1e12 scale
 * - Stored fields are unsigned 64-bit
 */

/**
 * An unsigned scaled integer (u64 range).
 * Asset amounts, token amounts and prices use a 1e9 scale.
 */
export type ScaledAmount = bigint;

/**
 * Basis points (1/10000th). 10_000n is 100%.
 */
export type Bps = bigint;

/**
 * Opaque identity of a caller (a depositor, a keeper, a token holder).
 */
export type Identity = string;

/**
 * Wire form of a scaled amount: a decimal integer string ("5000000000").
 * Used in records, journals and HTTP bodies where bigint cannot travel.
 */
export type AmountString = string;

/** Largest value an unsigned 64-bit field can hold. */
export const U64_MAX: bigint = (1n << 64n) - 1n;
