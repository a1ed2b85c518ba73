/**
 * Protocol - Composition root for all domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The protocol owns an arena of entities addressed by
 * opaque ids and runs every operation as one atomic step: the touched
 * entities are checkpointed first and restored if anything throws, so an
 * aborted operation leaves no trace in state or in the journal.
 */

import type { Logger } from "pino";
import type {
  AccrueRecord,
  BuybackRecord,
  ClaimRecord,
  DepositRecord,
  MarketCreatedRecord,
  OrderBookCreatedRecord,
  StrategyConfigCreatedRecord,
  VaultCreatedRecord,
  WithdrawRecord,
  Identity,
  MarketId,
  OrderBookId,
  OrderBookState,
  PositionId,
  ProtocolRecord,
  RebalanceRecord,
  ScaledAmount,
  SettleRecord,
  SharePosition,
  StrategyConfig,
  StrategyConfigId,
  TokenIssuerState,
  TokenMarketState,
  TradeRecord,
  TreasuryId,
  VaultId,
  VaultState,
} from "@spreadvault/types";
import { VaultLedger, createVault } from "@spreadvault/ledger";
import type { PositionValue } from "@spreadvault/ledger";
import { OrderBookSimulator, createOrderBook } from "@spreadvault/orderbook";
import { createStrategyConfig, rebalance, settle } from "@spreadvault/strategy";
import type { StrategyConfigInput } from "@spreadvault/strategy";
import {
  BuybackEngine,
  DEFAULT_BURN_SHARE_BPS,
  DEFAULT_EMISSION_PER_ACCRUE,
  DEFAULT_LP_SHARE_BPS,
  FixedPriceMarket,
  IncentiveAccumulator,
  TokenIssuer,
  createTokenMarket,
  isReservedHolder,
} from "@spreadvault/treasury";
import { RecordJournal } from "@spreadvault/event-store";
import type {
  EventHandler,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  Subscription,
} from "@spreadvault/event-store";

// =============================================================================
// Errors
// =============================================================================

export type ProtocolErrorCode =
  | "INVALID_ACTOR"
  | "VAULT_NOT_FOUND"
  | "POSITION_NOT_FOUND"
  | "POSITION_NOT_OWNED"
  | "BOOK_NOT_FOUND"
  | "CONFIG_NOT_FOUND"
  | "MARKET_NOT_FOUND"
  | "TREASURY_NOT_FOUND";

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

// =============================================================================
// Configuration
// =============================================================================

export const DEFAULT_TREASURY_ID: TreasuryId = "treasury-1";

export interface ProtocolConfig {
  readonly emissionPerAccrue: ScaledAmount;
  readonly lpShareBps: bigint;
  readonly burnShareBps: bigint;
  readonly tokenSymbol: string;
  readonly tokenDecimals: number;
}

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
  emissionPerAccrue: DEFAULT_EMISSION_PER_ACCRUE,
  lpShareBps: DEFAULT_LP_SHARE_BPS,
  burnShareBps: DEFAULT_BURN_SHARE_BPS,
  tokenSymbol: "GRID",
  tokenDecimals: 9,
};

export type ProtocolLogger = Pick<Logger, "info" | "warn">;

export interface ProtocolOptions {
  readonly config?: Partial<ProtocolConfig>;
  readonly journal?: RecordJournal;
  readonly logger?: ProtocolLogger;
}

// =============================================================================
// Results
// =============================================================================

export interface PositionView {
  readonly position: SharePosition;
  readonly owner: Identity;
  readonly pendingReward: ScaledAmount;
  readonly value: PositionValue;
}

export interface TokenBalanceView {
  readonly treasuryId: TreasuryId;
  readonly symbol: string;
  readonly holder: Identity;
  readonly balance: ScaledAmount;
}

interface Restorable<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

/** Capture an entity's state; the returned function puts it back. */
function checkpoint<S>(entity: Restorable<S>): () => void {
  const saved = entity.snapshot();
  return () => {
    entity.restore(saved);
  };
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

type EntityKind = "vault" | "book" | "config" | "market";

interface PositionEntry {
  readonly vaultId: VaultId;
  readonly owner: Identity;
}

// =============================================================================
// Service
// =============================================================================

export class Protocol {
  readonly config: ProtocolConfig;
  readonly journal: RecordJournal;

  private readonly incentives: IncentiveAccumulator;
  private readonly buyback: BuybackEngine;
  private readonly logger: ProtocolLogger | undefined;

  private readonly vaults = new Map<VaultId, VaultLedger>();
  private readonly books = new Map<OrderBookId, OrderBookSimulator>();
  private readonly configs = new Map<StrategyConfigId, StrategyConfig>();
  private readonly markets = new Map<MarketId, FixedPriceMarket>();
  private readonly treasuries = new Map<TreasuryId, TokenIssuer>();
  private readonly positionOwners = new Map<PositionId, PositionEntry>();
  private readonly counters: Record<EntityKind, number> = {
    vault: 0,
    book: 0,
    config: 0,
    market: 0,
  };

  constructor(options: ProtocolOptions = {}) {
    this.config = { ...DEFAULT_PROTOCOL_CONFIG, ...options.config };
    this.journal = options.journal ?? new RecordJournal();
    this.logger = options.logger;

    this.incentives = new IncentiveAccumulator({
      emissionPerAccrue: this.config.emissionPerAccrue,
    });
    this.buyback = new BuybackEngine({
      lpShareBps: this.config.lpShareBps,
      burnShareBps: this.config.burnShareBps,
    });

    this.treasuries.set(
      DEFAULT_TREASURY_ID,
      new TokenIssuer(DEFAULT_TREASURY_ID, this.config.tokenSymbol, this.config.tokenDecimals),
    );
  }

  // ─── Vault ───────────────────────────────────────────────────────────

  createVault(actor: Identity): { vault: VaultState; record: VaultCreatedRecord } {
    const id = this.peekId("vault");
    const created = this.run(
      actor,
      [],
      () => createVault(id, actor),
      ({ vault }) => {
        this.vaults.set(id, vault);
        this.counters.vault += 1;
      },
    );
    return { vault: created.vault.state(), record: created.record };
  }

  deposit(
    actor: Identity,
    vaultId: VaultId,
    baseAmount: ScaledAmount,
    quoteAmount: ScaledAmount,
  ): { position: SharePosition; record: DepositRecord } {
    const vault = this.requireVault(vaultId);
    return this.run(
      actor,
      [checkpoint(vault)],
      () => vault.deposit(actor, baseAmount, quoteAmount),
      ({ position }) => {
        this.positionOwners.set(position.id, { vaultId, owner: actor });
      },
    );
  }

  /**
   * Burn a position in full. Unclaimed rewards are forfeited.
   */
  withdraw(
    actor: Identity,
    vaultId: VaultId,
    positionId: PositionId,
  ): { baseOut: ScaledAmount; quoteOut: ScaledAmount; record: WithdrawRecord } {
    const vault = this.requireVault(vaultId);
    const position = this.requireOwnedPosition(actor, positionId);
    return this.run(
      actor,
      [checkpoint(vault)],
      () => vault.withdraw(actor, position),
      () => {
        this.positionOwners.delete(positionId);
      },
    );
  }

  // ─── Strategy ────────────────────────────────────────────────────────

  createStrategyConfig(
    actor: Identity,
    input: StrategyConfigInput,
  ): { config: StrategyConfig; record: StrategyConfigCreatedRecord } {
    const id = this.peekId("config");
    return this.run(
      actor,
      [],
      () => createStrategyConfig(id, input),
      ({ config }) => {
        this.configs.set(id, config);
        this.counters.config += 1;
      },
    );
  }

  rebalance(
    actor: Identity,
    vaultId: VaultId,
    configId: StrategyConfigId,
    bookId: OrderBookId,
  ): RebalanceRecord {
    const vault = this.requireVault(vaultId);
    const config = this.requireConfig(configId);
    const book = this.requireBook(bookId);
    return this.run(actor, [checkpoint(vault), checkpoint(book)], () => ({
      record: rebalance(actor, vault, config, book),
    })).record;
  }

  settle(actor: Identity, vaultId: VaultId, bookId: OrderBookId): SettleRecord {
    const vault = this.requireVault(vaultId);
    const book = this.requireBook(bookId);
    return this.run(actor, [checkpoint(vault), checkpoint(book)], () => ({
      record: settle(vault, book),
    })).record;
  }

  // ─── Order book ──────────────────────────────────────────────────────

  createOrderBook(
    actor: Identity,
    initialMidPrice: ScaledAmount,
  ): { book: OrderBookState; record: OrderBookCreatedRecord } {
    const id = this.peekId("book");
    const created = this.run(
      actor,
      [],
      () => createOrderBook(id, initialMidPrice),
      ({ book }) => {
        this.books.set(id, book);
        this.counters.book += 1;
      },
    );
    return { book: created.book.state(), record: created.record };
  }

  simulateTrade(
    actor: Identity,
    bookId: OrderBookId,
    directionUp: boolean,
    priceDelta: ScaledAmount,
  ): TradeRecord {
    const book = this.requireBook(bookId);
    return this.run(actor, [checkpoint(book)], () => ({
      record: book.simulateTrade(directionUp, priceDelta),
    })).record;
  }

  // ─── Incentives ──────────────────────────────────────────────────────

  /**
   * Mint one emission into the vault's custody. Returns null, and
   * journals nothing, while the vault has no shares.
   */
  accrueRewards(actor: Identity, vaultId: VaultId, treasuryId: TreasuryId): AccrueRecord | null {
    const vault = this.requireVault(vaultId);
    const issuer = this.requireTreasury(treasuryId);
    return this.run(actor, [checkpoint(vault), checkpoint(issuer)], () => ({
      record: this.incentives.accrue(vault, issuer),
    })).record;
  }

  claimRewards(
    actor: Identity,
    vaultId: VaultId,
    positionId: PositionId,
    treasuryId: TreasuryId,
  ): ClaimRecord {
    const vault = this.requireVault(vaultId);
    const position = this.requireOwnedPosition(actor, positionId);
    const issuer = this.requireTreasury(treasuryId);
    return this.run(actor, [checkpoint(vault), checkpoint(issuer)], () => ({
      record: this.incentives.claim(actor, vault, position, issuer),
    })).record;
  }

  // ─── Market & buyback ────────────────────────────────────────────────

  createTokenMarket(
    actor: Identity,
    treasuryId: TreasuryId,
    initialReserve: ScaledAmount,
    priceQuotePerToken: ScaledAmount,
  ): { market: TokenMarketState; record: MarketCreatedRecord } {
    const issuer = this.requireTreasury(treasuryId);
    const id = this.peekId("market");
    const created = this.run(
      actor,
      [checkpoint(issuer)],
      () => createTokenMarket(id, issuer, initialReserve, priceQuotePerToken),
      ({ market }) => {
        this.markets.set(id, market);
        this.counters.market += 1;
      },
    );
    return { market: created.market.state(), record: created.record };
  }

  executeBuyback(
    actor: Identity,
    vaultId: VaultId,
    marketId: MarketId,
    treasuryId: TreasuryId,
  ): BuybackRecord {
    const vault = this.requireVault(vaultId);
    const market = this.requireMarket(marketId);
    const issuer = this.requireTreasury(treasuryId);
    return this.run(
      actor,
      [checkpoint(vault), checkpoint(market), checkpoint(issuer)],
      () => ({ record: this.buyback.executeBuyback(vault, market, issuer) }),
    ).record;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getVault(vaultId: VaultId): VaultState {
    return this.requireVault(vaultId).state();
  }

  getPosition(positionId: PositionId): PositionView {
    const entry = this.positionOwners.get(positionId);
    const vault = entry === undefined ? undefined : this.vaults.get(entry.vaultId);
    const position = vault?.getPosition(positionId);
    if (entry === undefined || vault === undefined || position === undefined) {
      throw new ProtocolError("POSITION_NOT_FOUND", `Position "${positionId}" not found`);
    }
    return {
      position,
      owner: entry.owner,
      pendingReward: this.incentives.pending(vault, position),
      value: vault.positionValue(position),
    };
  }

  getOrderBook(bookId: OrderBookId): OrderBookState {
    return this.requireBook(bookId).state();
  }

  getStrategyConfig(configId: StrategyConfigId): StrategyConfig {
    return this.requireConfig(configId);
  }

  getMarket(marketId: MarketId): TokenMarketState {
    return this.requireMarket(marketId).state();
  }

  getTreasury(treasuryId: TreasuryId = DEFAULT_TREASURY_ID): TokenIssuerState {
    return this.requireTreasury(treasuryId).state();
  }

  balanceOf(holder: Identity, treasuryId: TreasuryId = DEFAULT_TREASURY_ID): TokenBalanceView {
    const issuer = this.requireTreasury(treasuryId);
    const state = issuer.state();
    return {
      treasuryId,
      symbol: state.symbol,
      holder,
      balance: issuer.balanceOf(holder),
    };
  }

  records(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.journal.entries(options);
  }

  verifyJournal(): EventStoreIntegrityResult {
    return this.journal.verify();
  }

  /**
   * Observe every record journaled from now on, as its stored event.
   *
   * Handlers run after the record is appended. A handler that throws is
   * logged and does not abort the operation.
   */
  onRecord(handler: EventHandler): Subscription {
    return this.journal.subscribe((event) => {
      try {
        handler(event);
      } catch (err) {
        this.logger?.warn({ type: event.event.type, err }, "Record observer failed");
      }
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run one operation atomically.
   *
   * `operation` mutates the checkpointed entities and yields a record;
   * the record is journaled and `commit` then registers whatever the
   * operation created. A throw restores every checkpoint in `undo`.
   */
  private run<T extends { readonly record: ProtocolRecord | null }>(
    actor: Identity,
    undo: readonly (() => void)[],
    operation: () => T,
    commit?: (result: T) => void,
  ): T {
    if (actor.trim().length === 0) {
      throw new ProtocolError("INVALID_ACTOR", "Actor identity must be a non-empty string");
    }
    if (isReservedHolder(actor)) {
      throw new ProtocolError("INVALID_ACTOR", `Actor "${actor}" uses a reserved holder prefix`);
    }

    try {
      const result = operation();
      if (result.record !== null) {
        this.journal.append(result.record, { actor });
      }
      commit?.(result);
      if (result.record === null) {
        this.logger?.info({ actor }, "Operation had no effect");
      } else {
        this.logger?.info({ actor, type: result.record.type }, "Operation applied");
      }
      return result;
    } catch (err) {
      for (const restore of undo) {
        restore();
      }
      this.logger?.warn({ actor, code: errorCode(err) }, "Operation aborted");
      throw err;
    }
  }

  private peekId(kind: EntityKind): string {
    return `${kind}-${String(this.counters[kind] + 1)}`;
  }

  private requireVault(vaultId: VaultId): VaultLedger {
    const vault = this.vaults.get(vaultId);
    if (vault === undefined) {
      throw new ProtocolError("VAULT_NOT_FOUND", `Vault "${vaultId}" not found`);
    }
    return vault;
  }

  private requireBook(bookId: OrderBookId): OrderBookSimulator {
    const book = this.books.get(bookId);
    if (book === undefined) {
      throw new ProtocolError("BOOK_NOT_FOUND", `Order book "${bookId}" not found`);
    }
    return book;
  }

  private requireConfig(configId: StrategyConfigId): StrategyConfig {
    const config = this.configs.get(configId);
    if (config === undefined) {
      throw new ProtocolError("CONFIG_NOT_FOUND", `Strategy config "${configId}" not found`);
    }
    return config;
  }

  private requireMarket(marketId: MarketId): FixedPriceMarket {
    const market = this.markets.get(marketId);
    if (market === undefined) {
      throw new ProtocolError("MARKET_NOT_FOUND", `Market "${marketId}" not found`);
    }
    return market;
  }

  private requireTreasury(treasuryId: TreasuryId): TokenIssuer {
    const issuer = this.treasuries.get(treasuryId);
    if (issuer === undefined) {
      throw new ProtocolError("TREASURY_NOT_FOUND", `Treasury "${treasuryId}" not found`);
    }
    return issuer;
  }

  /**
   * Resolve a live position the actor owns. The position may sit in a
   * vault other than the one the caller names; the ledger rejects that.
   */
  private requireOwnedPosition(actor: Identity, positionId: PositionId): SharePosition {
    const entry = this.positionOwners.get(positionId);
    const position =
      entry === undefined ? undefined : this.vaults.get(entry.vaultId)?.getPosition(positionId);
    if (entry === undefined || position === undefined) {
      throw new ProtocolError("POSITION_NOT_FOUND", `Position "${positionId}" not found`);
    }
    if (entry.owner !== actor) {
      throw new ProtocolError(
        "POSITION_NOT_OWNED",
        `Position "${positionId}" is not owned by "${actor}"`,
      );
    }
    return position;
  }
}
