/**
 * @spreadvault/event-store - Record journal.
 *
 * Turns operation records into domain events and appends them to an
 * EventStore, one stream per primary resource. Scaled amounts are
 * bigint in records and decimal strings in events.
 */

import { randomUUID } from "node:crypto";
import type {
  DomainEvent,
  EventPayloadValue,
  EventSource,
  Identity,
  ProtocolRecord,
  ProtocolRecordType,
} from "@spreadvault/types";
import { InMemoryEventStore } from "./in-memory-store.js";
import type {
  EventStore,
  EventStoreIntegrityResult,
  EventHandler,
  HashedStoredEvent,
  ReadAllOptions,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

// =============================================================================
// Record → event
// =============================================================================

const SOURCE_BY_PREFIX: Readonly<Record<string, EventSource>> = {
  vault: "vault",
  orderbook: "orderbook",
  strategy: "strategy",
  incentive: "incentive",
  market: "market",
  buyback: "buyback",
};

/** Subsystem that emits records of `type`. */
export function recordSource(type: ProtocolRecordType): EventSource {
  const prefix = type.slice(0, type.indexOf("."));
  const source = SOURCE_BY_PREFIX[prefix];
  if (source === undefined) {
    throw new EventStoreError("INVALID_EVENT", `No event source for record type "${type}"`);
  }
  return source;
}

/** Stream a record is journaled under: the id of the resource it changed. */
export function recordStreamId(record: ProtocolRecord): string {
  switch (record.type) {
    case "vault.created":
    case "vault.deposited":
    case "vault.withdrawn":
    case "strategy.rebalanced":
    case "strategy.settled":
    case "incentive.accrued":
    case "incentive.claimed":
    case "buyback.executed":
      return record.vaultId;
    case "strategy.config_created":
      return record.configId;
    case "orderbook.created":
    case "orderbook.trade_simulated":
      return record.bookId;
    case "market.created":
      return record.marketId;
  }
}

/**
 * JSON-safe payload of a record: every field but `type`, with bigint
 * fields as decimal strings.
 */
export function recordPayload(record: ProtocolRecord): Record<string, EventPayloadValue> {
  const payload: Record<string, EventPayloadValue> = {};
  const entries: [string, unknown][] = Object.entries(record);
  for (const [key, value] of entries) {
    if (key === "type") continue;
    if (typeof value === "bigint") {
      payload[key] = value.toString();
    } else if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      payload[key] = value;
    } else {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Field "${key}" of record "${record.type}" is not JSON-safe`,
      );
    }
  }
  return payload;
}

// =============================================================================
// Journal
// =============================================================================

export interface JournalContext {
  readonly actor: Identity;
  /** Groups the events of one operation; defaults to a fresh UUID. */
  readonly correlationId?: string;
}

export interface RecordJournalOptions {
  readonly store?: EventStore;
  readonly clock?: () => Date;
  readonly generateId?: () => string;
}

export class RecordJournal {
  private readonly store: EventStore;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: RecordJournalOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.store = options.store ?? new InMemoryEventStore({ clock: this.clock });
    this.generateId = options.generateId ?? randomUUID;
  }

  /** Build the domain event for a record without appending it. */
  toEvent(record: ProtocolRecord, context: JournalContext): DomainEvent {
    return {
      type: record.type,
      metadata: {
        eventId: this.generateId(),
        timestamp: this.clock().toISOString(),
        actor: context.actor,
        correlationId: context.correlationId ?? this.generateId(),
        source: recordSource(record.type),
      },
      payload: recordPayload(record),
    };
  }

  append(record: ProtocolRecord, context: JournalContext): HashedStoredEvent {
    const result = this.store.append(recordStreamId(record), [this.toEvent(record, context)]);
    const [stored] = result.events;
    if (stored === undefined) {
      throw new EventStoreError("EMPTY_APPEND", "Append stored no event", result.streamId);
    }
    return stored;
  }

  /** Observe every event journaled from now on. */
  subscribe(handler: EventHandler): Subscription {
    return this.store.subscribeAll(handler);
  }

  entries(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.store.readAll(options);
  }

  stream(streamId: string): readonly HashedStoredEvent[] {
    return this.store.read(streamId);
  }

  size(): number {
    return this.store.globalPosition();
  }

  verify(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }
}
