/**
 * Event Types
 *
 * Journal form of an operation record. Records carry bigint fields;
 * events carry the same fields as JSON-safe values so they can be
 * canonicalized, hashed and sent over the wire.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - No UPDATE, no DELETE - only new events
 */

/**
 * Subsystem that emitted an event.
 */
export type EventSource =
  | "vault"
  | "orderbook"
  | "strategy"
  | "incentive"
  | "market"
  | "buyback";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Identity that invoked the operation */
  readonly actor: string;

  /** ID for grouping the events of one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * JSON-safe payload value. Scaled amounts travel as decimal strings.
 */
export type EventPayloadValue = string | number | boolean;

/**
 * A domain event, discriminated by `type` (the record type).
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, EventPayloadValue>>;
}
