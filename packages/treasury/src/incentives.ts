/**
 * Incentive Accumulator - reward-per-share emission.
 *
 * Each accrue mints a fixed emission into the vault's custody account
 * and raises the vault's reward-per-share accumulator by
 * emission × PRECISION / totalShares. A position's pending reward is
 * shares × rewardPerShare / PRECISION − rewardDebt, so distribution is
 * O(1) regardless of how many positions exist.
 *
 * Rules:
 * - rewardPerShare never decreases
 * - A claim never pays more than the position's pending reward
 * - The reward pool and the custody balance move together
 */

import type {
  AccrueRecord,
  ClaimRecord,
  Identity,
  ScaledAmount,
  SharePosition,
} from "@spreadvault/types";
import { PRECISION, checkedAdd, mulDiv } from "@spreadvault/ledger";
import type { VaultLedger } from "@spreadvault/ledger";
import type { TokenIssuer } from "./token-issuer.js";
import { vaultCustody } from "./token-issuer.js";
import type { IncentiveParams } from "./types.js";
import { TreasuryError } from "./types.js";

/** 100 tokens per accrue at 9 decimals. */
export const DEFAULT_EMISSION_PER_ACCRUE = 100_000_000_000n;

export const DEFAULT_INCENTIVE_PARAMS: IncentiveParams = {
  emissionPerAccrue: DEFAULT_EMISSION_PER_ACCRUE,
};

export class IncentiveAccumulator {
  private readonly params: IncentiveParams;

  constructor(params: IncentiveParams = DEFAULT_INCENTIVE_PARAMS) {
    if (params.emissionPerAccrue <= 0n) {
      throw new TreasuryError("INVALID_PARAMS", "emissionPerAccrue must be greater than zero");
    }
    this.params = params;
  }

  get emissionPerAccrue(): ScaledAmount {
    return this.params.emissionPerAccrue;
  }

  /**
   * Emit one round of rewards into `vault`. Returns null (and mints
   * nothing) while the vault has no shares outstanding.
   */
  accrue(vault: VaultLedger, issuer: TokenIssuer): AccrueRecord | null {
    const s = vault.state();
    if (s.totalShares === 0n) {
      return null;
    }

    const minted = this.params.emissionPerAccrue;
    const rewardPerShare = checkedAdd(
      s.rewardPerShare,
      mulDiv(minted, PRECISION, s.totalShares),
      "reward per share",
    );
    checkedAdd(s.rewardPoolBalance, minted, "reward pool");
    checkedAdd(issuer.totalSupply, minted, "token supply");

    issuer.mint(vaultCustody(vault.id), minted);
    vault.setRewardPerShare(rewardPerShare);
    vault.addRewardPool(minted);

    return { type: "incentive.accrued", vaultId: vault.id, minted, rewardPerShare };
  }

  /**
   * Unclaimed reward of `position`, floored at zero.
   */
  pending(vault: VaultLedger, position: SharePosition): ScaledAmount {
    const live = this._livePosition(vault, position);
    return this._pendingOf(vault, live).pending;
  }

  /**
   * Pay `position`'s pending reward to `claimant` and snapshot its debt
   * to the current accumulator.
   */
  claim(
    claimant: Identity,
    vault: VaultLedger,
    position: SharePosition,
    issuer: TokenIssuer,
  ): ClaimRecord {
    const live = this._livePosition(vault, position);
    const { accumulated, pending } = this._pendingOf(vault, live);
    if (pending === 0n) {
      throw new TreasuryError("NOTHING_TO_CLAIM", `Position "${live.id}" has no pending reward`);
    }

    const pool = vault.state().rewardPoolBalance;
    const custody = issuer.balanceOf(vaultCustody(vault.id));
    if (pending > pool || pending > custody) {
      throw new TreasuryError(
        "INSUFFICIENT_TOKENS",
        `Pending reward ${pending.toString()} exceeds the reward pool (${pool.toString()}) or custody (${custody.toString()})`,
      );
    }

    vault.setShareRewardDebt(live, accumulated);
    vault.deductRewardPool(pending);
    issuer.transfer(vaultCustody(vault.id), claimant, pending);

    return {
      type: "incentive.claimed",
      vaultId: vault.id,
      positionId: live.id,
      claimant,
      amount: pending,
    };
  }

  private _livePosition(vault: VaultLedger, position: SharePosition): SharePosition {
    if (position.vaultId !== vault.id) {
      throw new TreasuryError(
        "VAULT_MISMATCH",
        `Position "${position.id}" belongs to vault "${position.vaultId}", not "${vault.id}"`,
      );
    }
    const live = vault.getPosition(position.id);
    if (live === undefined) {
      throw new TreasuryError("POSITION_NOT_FOUND", `Position "${position.id}" does not exist`);
    }
    return live;
  }

  private _pendingOf(
    vault: VaultLedger,
    position: SharePosition,
  ): { accumulated: ScaledAmount; pending: ScaledAmount } {
    const accumulated = mulDiv(position.shares, vault.state().rewardPerShare, PRECISION);
    const pending = accumulated > position.rewardDebt ? accumulated - position.rewardDebt : 0n;
    return { accumulated, pending };
  }
}
