/**
 * Runtime Type Guards
 *
 * Narrowing functions for Souk domain types.
 * Used at system boundaries (API inputs, restored snapshots).
 */

import type { Principal, Profile, Offer, Escrow, EscrowStatus } from "./trading.js";
import type { DomainEvent, EventMetadata } from "./event.js";

function isCount(value: unknown): boolean {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isRecordId(value: unknown): boolean {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 1;
}

// =============================================================================
// Trading guards
// =============================================================================

const ESCROW_STATUSES = new Set<string>(["pending", "completed", "cancelled", "disputed"]);
const RESOLUTIONS = new Set<string>(["buyer", "seller"]);

export function isPrincipal(value: unknown): value is Principal {
  return typeof value === "string" && value.length > 0;
}

export function isEscrowStatus(value: unknown): value is EscrowStatus {
  return typeof value === "string" && ESCROW_STATUSES.has(value);
}

export function isProfile(value: unknown): value is Profile {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isPrincipal(v.principal) &&
    typeof v.displayName === "string" &&
    typeof v.primaryContact === "string" &&
    typeof v.secondaryContact === "string" &&
    isCount(v.joinedAt) &&
    isCount(v.totalTrades) &&
    isCount(v.completedTrades) &&
    isCount(v.disputedTrades) &&
    isCount(v.averageSettlementSeconds)
  );
}

export function isOffer(value: unknown): value is Offer {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isRecordId(v.id) &&
    isPrincipal(v.seller) &&
    typeof v.maxTradeAmount === "bigint" &&
    typeof v.minTradeAmount === "bigint" &&
    typeof v.unitPrice === "bigint" &&
    typeof v.currency === "string" &&
    typeof v.paymentMethod === "string" &&
    isCount(v.openEscrows) &&
    typeof v.active === "boolean" &&
    isCount(v.createdAt)
  );
}

export function isEscrow(value: unknown): value is Escrow {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isRecordId(v.id) &&
    isRecordId(v.offerId) &&
    isPrincipal(v.buyer) &&
    isPrincipal(v.seller) &&
    typeof v.amount === "bigint" &&
    typeof v.fiatAmount === "bigint" &&
    isCount(v.createdAt) &&
    isCount(v.updatedAt) &&
    isEscrowStatus(v.status) &&
    (v.resolution === undefined ||
      (typeof v.resolution === "string" && RESOLUTIONS.has(v.resolution)))
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "profiles",
  "balances",
  "offers",
  "escrows",
  "arbitration",
]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    isCount(v.timestamp) &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
