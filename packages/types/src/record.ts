/**
 * Operation Records
 *
 * Every state-changing operation returns a structured record describing
 * what it did. Records are the protocol's only output channel: callers
 * display them and the journal persists them.
 *
 * Discriminated by `type`.
 */

import type { Bps, Identity, ScaledAmount } from "./financial.js";
import type {
  MarketId,
  OrderBookId,
  PositionId,
  StrategyConfigId,
  TreasuryId,
  VaultId,
} from "./entities.js";

export interface VaultCreatedRecord {
  readonly type: "vault.created";
  readonly vaultId: VaultId;
  readonly creator: Identity;
}

export interface DepositRecord {
  readonly type: "vault.deposited";
  readonly vaultId: VaultId;
  readonly positionId: PositionId;
  readonly depositor: Identity;
  readonly baseAmount: ScaledAmount;
  readonly quoteAmount: ScaledAmount;
  readonly sharesMinted: bigint;
  readonly totalShares: bigint;
}

export interface WithdrawRecord {
  readonly type: "vault.withdrawn";
  readonly vaultId: VaultId;
  readonly positionId: PositionId;
  readonly withdrawer: Identity;
  readonly baseOut: ScaledAmount;
  readonly quoteOut: ScaledAmount;
  readonly sharesBurned: bigint;
  readonly totalShares: bigint;
}

export interface StrategyConfigCreatedRecord {
  readonly type: "strategy.config_created";
  readonly configId: StrategyConfigId;
  readonly spreadBps: Bps;
  readonly orderSize: ScaledAmount;
  readonly numOrdersPerSide: bigint;
  readonly keeper: Identity;
}

export interface RebalanceRecord {
  readonly type: "strategy.rebalanced";
  readonly vaultId: VaultId;
  readonly midPrice: ScaledAmount;
  readonly bidPrice: ScaledAmount;
  readonly askPrice: ScaledAmount;
  readonly ordersCancelled: number;
  readonly ordersPlaced: number;
}

export interface SettleRecord {
  readonly type: "strategy.settled";
  readonly vaultId: VaultId;
  readonly baseReturned: ScaledAmount;
  readonly quoteEarned: ScaledAmount;
}

export interface OrderBookCreatedRecord {
  readonly type: "orderbook.created";
  readonly bookId: OrderBookId;
  readonly midPrice: ScaledAmount;
}

export interface TradeRecord {
  readonly type: "orderbook.trade_simulated";
  readonly bookId: OrderBookId;
  readonly oldMidPrice: ScaledAmount;
  readonly newMidPrice: ScaledAmount;
  /** Total base size of bids filled by this move. */
  readonly bidFilled: ScaledAmount;
  /** Total base size of asks filled by this move. */
  readonly askFilled: ScaledAmount;
  readonly quoteEarned: ScaledAmount;
}

export interface AccrueRecord {
  readonly type: "incentive.accrued";
  readonly vaultId: VaultId;
  readonly minted: ScaledAmount;
  readonly rewardPerShare: bigint;
}

export interface ClaimRecord {
  readonly type: "incentive.claimed";
  readonly vaultId: VaultId;
  readonly positionId: PositionId;
  readonly claimant: Identity;
  readonly amount: ScaledAmount;
}

export interface MarketCreatedRecord {
  readonly type: "market.created";
  readonly marketId: MarketId;
  readonly treasuryId: TreasuryId;
  readonly tokenReserve: ScaledAmount;
  readonly priceQuotePerToken: ScaledAmount;
}

export interface BuybackRecord {
  readonly type: "buyback.executed";
  readonly vaultId: VaultId;
  readonly marketId: MarketId;
  readonly totalFees: ScaledAmount;
  readonly lpPortion: ScaledAmount;
  readonly buybackPortion: ScaledAmount;
  readonly tokensBought: ScaledAmount;
  readonly tokensBurned: ScaledAmount;
  readonly tokensToRewards: ScaledAmount;
}

export type ProtocolRecord =
  | VaultCreatedRecord
  | DepositRecord
  | WithdrawRecord
  | StrategyConfigCreatedRecord
  | RebalanceRecord
  | SettleRecord
  | OrderBookCreatedRecord
  | TradeRecord
  | AccrueRecord
  | ClaimRecord
  | MarketCreatedRecord
  | BuybackRecord;

export type ProtocolRecordType = ProtocolRecord["type"];
