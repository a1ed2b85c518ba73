/**
 * @spreadvault/ledger - Vault Ledger.
 *
 * Share-based accounting for one base/quote vault. Holds the pooled
 * balances, the locked (order-committed) sub-balances, the accrued fee
 * balance, the reward accumulator and the registry of live share
 * positions.
 *
 * API surface:
 * - deposit() / withdraw() - mint and burn share positions
 * - lockBase() / lockQuote() / unlockBase() / unlockQuote() - strategy bookkeeping
 * - addFeeQuote() / takeFees() / creditQuote() - settlement and buyback
 * - setRewardPerShare() / setShareRewardDebt() / addRewardPool() / deductRewardPool()
 *   - incentive accumulator
 * - snapshot() / fromSnapshot() - persistence and rollback
 *
 * Every mutator validates all preconditions before writing any field.
 */

import type {
  Identity,
  PositionId,
  VaultCreatedRecord,
  ScaledAmount,
  SharePosition,
  VaultId,
  VaultState,
} from "@spreadvault/types";
import {
  PRECISION,
  assertU64,
  checkedAdd,
  checkedSub,
  mulDiv,
} from "./fixed-math.js";
import type {
  DepositResult,
  PositionValue,
  VaultSnapshot,
  WithdrawResult,
} from "./types.js";
import { LedgerError } from "./types.js";

type MutableVaultState = { -readonly [K in keyof VaultState]: VaultState[K] };

export class VaultLedger {
  private readonly _state: MutableVaultState;
  private readonly _positions = new Map<PositionId, SharePosition>();
  private _nextPositionSeq = 1;

  constructor(id: VaultId) {
    if (id.length === 0) {
      throw new LedgerError("INVALID_VAULT_ID", "Vault ID must be a non-empty string");
    }
    this._state = {
      id,
      baseBalance: 0n,
      quoteBalance: 0n,
      totalShares: 0n,
      lockedBase: 0n,
      lockedQuote: 0n,
      accruedFeeQuote: 0n,
      rewardPerShare: 0n,
      rewardPoolBalance: 0n,
    };
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get id(): VaultId {
    return this._state.id;
  }

  state(): VaultState {
    return { ...this._state };
  }

  availableBase(): ScaledAmount {
    return this._state.baseBalance - this._state.lockedBase;
  }

  availableQuote(): ScaledAmount {
    return this._state.quoteBalance - this._state.lockedQuote;
  }

  getPosition(positionId: PositionId): SharePosition | undefined {
    return this._positions.get(positionId);
  }

  positions(): readonly SharePosition[] {
    return [...this._positions.values()];
  }

  /**
   * What a full withdrawal of this position would pay right now.
   */
  positionValue(position: SharePosition): PositionValue {
    const live = this._livePosition(position);
    const [baseValue, quoteValue] = this._proRata(live.shares);
    return { positionId: live.id, shares: live.shares, baseValue, quoteValue };
  }

  // ─── Deposit / Withdraw ──────────────────────────────────────────────

  /**
   * Deposit paired assets and mint a new share position.
   *
   * The first deposit into an empty vault mints base + quote shares.
   * Later deposits mint (base + quote) × totalShares / (baseBalance + quoteBalance),
   * truncated; a deposit that would mint zero shares is refused.
   */
  deposit(depositor: Identity, baseAmount: ScaledAmount, quoteAmount: ScaledAmount): DepositResult {
    assertU64(baseAmount, "base amount");
    assertU64(quoteAmount, "quote amount");
    if (baseAmount === 0n && quoteAmount === 0n) {
      throw new LedgerError("ZERO_DEPOSIT", "Deposit must include a non-zero base or quote amount");
    }

    const s = this._state;
    const value = checkedAdd(baseAmount, quoteAmount, "deposit value");
    const shares =
      s.totalShares === 0n
        ? value
        : mulDiv(value, s.totalShares, checkedAdd(s.baseBalance, s.quoteBalance, "pool value"));

    if (shares === 0n) {
      throw new LedgerError(
        "ZERO_SHARES",
        `Deposit of ${value.toString()} is too small to mint a share`,
      );
    }

    const baseBalance = checkedAdd(s.baseBalance, baseAmount, "base balance");
    const quoteBalance = checkedAdd(s.quoteBalance, quoteAmount, "quote balance");
    const totalShares = checkedAdd(s.totalShares, shares, "total shares");
    const rewardDebt = mulDiv(shares, s.rewardPerShare, PRECISION);

    s.baseBalance = baseBalance;
    s.quoteBalance = quoteBalance;
    s.totalShares = totalShares;

    const position: SharePosition = {
      id: `${s.id}:position:${String(this._nextPositionSeq++)}`,
      vaultId: s.id,
      shares,
      rewardDebt,
    };
    this._positions.set(position.id, position);

    return {
      position,
      record: {
        type: "vault.deposited",
        vaultId: s.id,
        positionId: position.id,
        depositor,
        baseAmount,
        quoteAmount,
        sharesMinted: shares,
        totalShares,
      },
    };
  }

  /**
   * Burn a position and pay out its pro-rata share of the available
   * (unlocked) balances. Locked balances stay with the vault.
   */
  withdraw(withdrawer: Identity, position: SharePosition): WithdrawResult {
    const live = this._livePosition(position);
    const [baseOut, quoteOut] = this._proRata(live.shares);

    if (baseOut > this.availableBase() || quoteOut > this.availableQuote()) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Withdrawal of ${baseOut.toString()}/${quoteOut.toString()} exceeds available balance`,
      );
    }

    const s = this._state;
    const totalShares = checkedSub(s.totalShares, live.shares, "total shares");

    s.baseBalance -= baseOut;
    s.quoteBalance -= quoteOut;
    s.totalShares = totalShares;
    this._positions.delete(live.id);

    return {
      baseOut,
      quoteOut,
      record: {
        type: "vault.withdrawn",
        vaultId: s.id,
        positionId: live.id,
        withdrawer,
        baseOut,
        quoteOut,
        sharesBurned: live.shares,
        totalShares,
      },
    };
  }

  // ─── Locks (Strategy Controller) ─────────────────────────────────────

  lockBase(amount: ScaledAmount): void {
    if (amount > this.availableBase()) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot lock ${amount.toString()} base, only ${this.availableBase().toString()} available`,
      );
    }
    this._state.lockedBase = checkedAdd(this._state.lockedBase, amount, "locked base");
  }

  lockQuote(amount: ScaledAmount): void {
    if (amount > this.availableQuote()) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot lock ${amount.toString()} quote, only ${this.availableQuote().toString()} available`,
      );
    }
    this._state.lockedQuote = checkedAdd(this._state.lockedQuote, amount, "locked quote");
  }

  /** The caller must never unlock more than it locked. */
  unlockBase(amount: ScaledAmount): void {
    this._state.lockedBase = checkedSub(this._state.lockedBase, amount, "locked base");
  }

  /** The caller must never unlock more than it locked. */
  unlockQuote(amount: ScaledAmount): void {
    this._state.lockedQuote = checkedSub(this._state.lockedQuote, amount, "locked quote");
  }

  // ─── Fees (settlement and buyback) ───────────────────────────────────

  addFeeQuote(amount: ScaledAmount): void {
    this._state.accruedFeeQuote = checkedAdd(this._state.accruedFeeQuote, amount, "accrued fees");
  }

  /**
   * Remove `amount` from the accrued fee balance and hand it to the caller.
   */
  takeFees(amount: ScaledAmount): ScaledAmount {
    if (amount > this._state.accruedFeeQuote) {
      throw new LedgerError(
        "INSUFFICIENT_FEES",
        `Cannot take ${amount.toString()} fees, only ${this._state.accruedFeeQuote.toString()} accrued`,
      );
    }
    this._state.accruedFeeQuote -= amount;
    return amount;
  }

  /** Return quote to the spendable pool (the LP portion of swept fees). */
  creditQuote(amount: ScaledAmount): void {
    this._state.quoteBalance = checkedAdd(this._state.quoteBalance, amount, "quote balance");
  }

  // ─── Rewards (Incentive Accumulator) ─────────────────────────────────

  setRewardPerShare(value: bigint): void {
    assertU64(value, "reward per share");
    if (value < this._state.rewardPerShare) {
      throw new LedgerError(
        "REWARD_DECREASE",
        `Reward per share cannot decrease from ${this._state.rewardPerShare.toString()} to ${value.toString()}`,
      );
    }
    this._state.rewardPerShare = value;
  }

  setShareRewardDebt(position: SharePosition, rewardDebt: ScaledAmount): SharePosition {
    const live = this._livePosition(position);
    const updated: SharePosition = { ...live, rewardDebt: assertU64(rewardDebt, "reward debt") };
    this._positions.set(live.id, updated);
    return updated;
  }

  addRewardPool(amount: ScaledAmount): void {
    this._state.rewardPoolBalance = checkedAdd(this._state.rewardPoolBalance, amount, "reward pool");
  }

  deductRewardPool(amount: ScaledAmount): void {
    if (amount > this._state.rewardPoolBalance) {
      throw new LedgerError(
        "INSUFFICIENT_REWARD_POOL",
        `Cannot pay ${amount.toString()} from a reward pool of ${this._state.rewardPoolBalance.toString()}`,
      );
    }
    this._state.rewardPoolBalance -= amount;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): VaultSnapshot {
    return {
      version: 1,
      state: this.state(),
      positions: this.positions(),
      nextPositionSeq: this._nextPositionSeq,
    };
  }

  /**
   * Overwrite this vault's state with a snapshot of the same vault.
   */
  restore(snapshot: VaultSnapshot): void {
    if (snapshot.state.id !== this._state.id) {
      throw new LedgerError(
        "VAULT_MISMATCH",
        `Snapshot of vault "${snapshot.state.id}" cannot restore vault "${this._state.id}"`,
      );
    }
    Object.assign(this._state, snapshot.state);
    this._positions.clear();
    for (const position of snapshot.positions) {
      this._positions.set(position.id, position);
    }
    this._nextPositionSeq = snapshot.nextPositionSeq;
  }

  static fromSnapshot(snapshot: VaultSnapshot): VaultLedger {
    const ledger = new VaultLedger(snapshot.state.id);
    ledger.restore(snapshot);
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Resolve the stored copy of a position. The caller's copy may carry a
   * stale reward debt; the stored copy is authoritative.
   */
  private _livePosition(position: SharePosition): SharePosition {
    if (position.vaultId !== this._state.id) {
      throw new LedgerError(
        "VAULT_MISMATCH",
        `Position "${position.id}" belongs to vault "${position.vaultId}", not "${this._state.id}"`,
      );
    }
    const live = this._positions.get(position.id);
    if (live === undefined) {
      throw new LedgerError("POSITION_NOT_FOUND", `Position "${position.id}" does not exist`);
    }
    return live;
  }

  private _proRata(shares: bigint): [bigint, bigint] {
    const total = this._state.totalShares;
    return [
      mulDiv(shares, this.availableBase(), total),
      mulDiv(shares, this.availableQuote(), total),
    ];
  }
}

/**
 * Create an empty vault.
 */
export function createVault(
  id: VaultId,
  creator: Identity,
): { vault: VaultLedger; record: VaultCreatedRecord } {
  const vault = new VaultLedger(id);
  return { vault, record: { type: "vault.created", vaultId: id, creator } };
}
