/**
 * Event Types
 *
 * Every committed state change in the exchange is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - A failed call produces no event
 */

/** Subsystem that emitted an event. */
export type EventSource =
  | "profiles"
  | "balances"
  | "offers"
  | "escrows"
  | "arbitration";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** Unix seconds supplied by the call context */
  readonly timestamp: number;

  /** Principal whose call caused this event */
  readonly actor: string;

  /** Groups the events of a single call */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`
 * (e.g., "escrow.opened", "dispute.resolved").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
