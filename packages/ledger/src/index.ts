/**
 * @spreadvault/ledger - Fixed-point math and the share-based vault ledger.
 *
 * Enforces the vault accounting invariants:
 * - Σ live position shares == totalShares
 * - locked balances never exceed pooled balances
 * - rewardPerShare never decreases
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Preconditions are validated before any state is written
 */

// Vault ledger
export { VaultLedger, createVault } from "./vault-ledger.js";

// Fixed-point arithmetic
export {
  SCALE,
  PRECISION,
  BPS_DENOMINATOR,
  assertU64,
  checkedAdd,
  checkedSub,
  mulDiv,
  bpsOf,
  minAmount,
  parseScaled,
  formatScaled,
  toAmountString,
  fromAmountString,
} from "./fixed-math.js";

// Types
export type {
  LedgerErrorCode,
  DepositResult,
  WithdrawResult,
  PositionValue,
  VaultSnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
