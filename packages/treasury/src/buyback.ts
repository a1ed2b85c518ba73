/**
 * Buyback Engine - fee split and buyback-and-burn.
 *
 * Sweeps a vault's accrued fees, returns the LP share to the vault's
 * spendable quote, spends the rest on the fixed-price market, burns a
 * share of the tokens bought and adds the remainder to the reward pool.
 *
 * Conservation:
 * - lpPortion + buybackPortion == totalFees
 * - quote spent == buybackPortion
 * - tokensBurned + tokensToRewards == tokensBought
 *
 * Every precondition is checked before the first write.
 */

import type { BuybackRecord, ScaledAmount } from "@spreadvault/types";
import { BPS_DENOMINATOR, bpsOf, checkedAdd } from "@spreadvault/ledger";
import type { VaultLedger } from "@spreadvault/ledger";
import type { FixedPriceMarket } from "./market.js";
import type { TokenIssuer } from "./token-issuer.js";
import { vaultCustody } from "./token-issuer.js";
import type { BuybackParams } from "./types.js";
import { TreasuryError } from "./types.js";

export const DEFAULT_LP_SHARE_BPS = 6000n;
export const DEFAULT_BURN_SHARE_BPS = 5000n;

export const DEFAULT_BUYBACK_PARAMS: BuybackParams = {
  lpShareBps: DEFAULT_LP_SHARE_BPS,
  burnShareBps: DEFAULT_BURN_SHARE_BPS,
};

/** The split of one fee sweep, before anything is bought. */
export interface FeeSplit {
  readonly totalFees: ScaledAmount;
  readonly lpPortion: ScaledAmount;
  readonly buybackPortion: ScaledAmount;
}

export class BuybackEngine {
  private readonly params: BuybackParams;

  constructor(params: BuybackParams = DEFAULT_BUYBACK_PARAMS) {
    const checks: ReadonlyArray<[string, bigint]> = [
      ["lpShareBps", params.lpShareBps],
      ["burnShareBps", params.burnShareBps],
    ];
    for (const [name, bps] of checks) {
      if (bps < 0n || bps > BPS_DENOMINATOR) {
        throw new TreasuryError("INVALID_PARAMS", `${name} must be within 0–10000, got ${bps.toString()}`);
      }
    }
    this.params = params;
  }

  splitFees(totalFees: ScaledAmount): FeeSplit {
    const lpPortion = bpsOf(totalFees, this.params.lpShareBps);
    return { totalFees, lpPortion, buybackPortion: totalFees - lpPortion };
  }

  /**
   * Sweep all of `vault`'s accrued fees through the split and buyback.
   */
  executeBuyback(
    vault: VaultLedger,
    market: FixedPriceMarket,
    issuer: TokenIssuer,
  ): BuybackRecord {
    const s = vault.state();
    if (s.accruedFeeQuote === 0n) {
      throw new TreasuryError("NO_FEES", `Vault "${vault.id}" has no accrued fees`);
    }
    market.assertIssuer(issuer);

    const { totalFees, lpPortion, buybackPortion } = this.splitFees(s.accruedFeeQuote);
    const tokensBought = buybackPortion > 0n ? market.quote(buybackPortion) : 0n;
    const tokensBurned = bpsOf(tokensBought, this.params.burnShareBps);
    const tokensToRewards = tokensBought - tokensBurned;
    checkedAdd(s.quoteBalance, lpPortion, "quote balance");
    checkedAdd(s.rewardPoolBalance, tokensToRewards, "reward pool");

    const custody = vaultCustody(vault.id);
    vault.takeFees(totalFees);
    vault.creditQuote(lpPortion);
    if (buybackPortion > 0n) {
      market.buy(issuer, buybackPortion, custody);
    }
    if (tokensBurned > 0n) {
      issuer.burn(custody, tokensBurned);
    }
    vault.addRewardPool(tokensToRewards);

    return {
      type: "buyback.executed",
      vaultId: vault.id,
      marketId: market.id,
      totalFees,
      lpPortion,
      buybackPortion,
      tokensBought,
      tokensBurned,
      tokensToRewards,
    };
  }
}
