/**
 * @spreadvault/ledger - Internal types for the vault ledger.
 *
 * Rules:
 * - Views handed out are readonly copies
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Preconditions are checked before any field is written
 */

import type {
  DepositRecord,
  SharePosition,
  VaultState,
  WithdrawRecord,
} from "@spreadvault/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ZERO_DEPOSIT"
  | "ZERO_SHARES"
  | "VAULT_MISMATCH"
  | "POSITION_NOT_FOUND"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_FEES"
  | "INSUFFICIENT_REWARD_POOL"
  | "REWARD_DECREASE"
  | "INVALID_AMOUNT"
  | "INVALID_VAULT_ID"
  | "DIVISION_BY_ZERO"
  | "OVERFLOW";

/**
 * Structured error from the ledger engine.
 * Always thrown - never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Operation Results ───────────────────────────────────────────────────

export interface DepositResult {
  readonly position: SharePosition;
  readonly record: DepositRecord;
}

export interface WithdrawResult {
  readonly baseOut: bigint;
  readonly quoteOut: bigint;
  readonly record: WithdrawRecord;
}

/**
 * What a full withdrawal of a position would pay right now.
 */
export interface PositionValue {
  readonly positionId: string;
  readonly shares: bigint;
  readonly baseValue: bigint;
  readonly quoteValue: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of a vault and its live positions.
 */
export interface VaultSnapshot {
  readonly version: 1;
  readonly state: VaultState;
  readonly positions: readonly SharePosition[];
  readonly nextPositionSeq: number;
}
