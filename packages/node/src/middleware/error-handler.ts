/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain error codes (LedgerError, TreasuryError, etc.)
 * to HTTP status codes.
 */

import type { Context } from "hono";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request errors
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INVALID_ACTOR: 400,

  // Validation
  ZERO_DEPOSIT: 400,
  ZERO_SHARES: 400,
  ZERO_AMOUNT: 400,
  ZERO_PRICE: 400,
  INVALID_AMOUNT: 400,
  INVALID_ORDER: 400,
  INVALID_CONFIG: 400,
  INVALID_MARKET: 400,
  INVALID_PARAMS: 400,
  INVALID_BOOK_ID: 400,
  INVALID_VAULT_ID: 400,

  // Authorization
  NOT_KEEPER: 403,
  POSITION_NOT_OWNED: 403,

  // Lookup
  VAULT_NOT_FOUND: 404,
  POSITION_NOT_FOUND: 404,
  BOOK_NOT_FOUND: 404,
  CONFIG_NOT_FOUND: 404,
  MARKET_NOT_FOUND: 404,
  TREASURY_NOT_FOUND: 404,

  // Consistency
  VAULT_MISMATCH: 409,
  TREASURY_MISMATCH: 409,
  MARKET_MISMATCH: 409,
  BOOK_MISMATCH: 409,

  // Insufficiency
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_FEES: 422,
  INSUFFICIENT_RESERVE: 422,
  INSUFFICIENT_TOKENS: 422,
  INSUFFICIENT_REWARD_POOL: 422,
  NOTHING_TO_CLAIM: 422,
  NO_FEES: 422,

  // Arithmetic
  OVERFLOW: 422,
  DIVISION_BY_ZERO: 422,
  REWARD_DECREASE: 422,
};

function getErrorCode(err: Error): string {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = getErrorCode(err);
  const status = STATUS_MAP[code] ?? 500;

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), status);
  }

  const details = err instanceof ApiError ? err.details : undefined;
  return c.json(createErrorEnvelope(code, err.message, details), status);
}
