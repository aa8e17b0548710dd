/**
 * @souk/exchange — Process-wide record store.
 *
 * Owns every profile, offer, escrow and balance record, the two id
 * allocators and the per-principal reverse indices.
 *
 * Rules:
 * - Records are immutable values; writes replace them
 * - Ids start at 1, increase by one, and are never reused
 * - Reverse indices are append-only
 * - checkpoint()/rollback() restore the exact pre-call state
 */

import type {
  BalanceRecord,
  Escrow,
  EscrowId,
  Offer,
  OfferId,
  Principal,
  Profile,
} from "@souk/types";
import type { ExchangeSnapshot, IndexSnapshotEntry } from "./types.js";

const EMPTY_BALANCE: BalanceRecord = { deposited: 0n, locked: 0n };

/**
 * Opaque copy of the store taken before a call.
 */
export interface StoreCheckpoint {
  readonly nextOfferId: number;
  readonly nextEscrowId: number;
  readonly profiles: ReadonlyMap<Principal, Profile>;
  readonly offers: ReadonlyMap<OfferId, Offer>;
  readonly escrows: ReadonlyMap<EscrowId, Escrow>;
  readonly balances: ReadonlyMap<Principal, BalanceRecord>;
  readonly offerIndex: ReadonlyMap<Principal, readonly OfferId[]>;
  readonly escrowIndex: ReadonlyMap<Principal, readonly EscrowId[]>;
}

export class ExchangeStore {
  private _nextOfferId = 1;
  private _nextEscrowId = 1;
  private _profiles = new Map<Principal, Profile>();
  private _offers = new Map<OfferId, Offer>();
  private _escrows = new Map<EscrowId, Escrow>();
  private _balances = new Map<Principal, BalanceRecord>();
  private _offerIndex = new Map<Principal, readonly OfferId[]>();
  private _escrowIndex = new Map<Principal, readonly EscrowId[]>();

  // ─── Id Allocation ──────────────────────────────────────────────────

  allocateOfferId(): OfferId {
    return this._nextOfferId++;
  }

  allocateEscrowId(): EscrowId {
    return this._nextEscrowId++;
  }

  // ─── Profiles ───────────────────────────────────────────────────────

  getProfile(principal: Principal): Profile | undefined {
    return this._profiles.get(principal);
  }

  putProfile(profile: Profile): void {
    this._profiles.set(profile.principal, profile);
  }

  // ─── Offers ─────────────────────────────────────────────────────────

  getOffer(id: OfferId): Offer | undefined {
    return this._offers.get(id);
  }

  putOffer(offer: Offer): void {
    this._offers.set(offer.id, offer);
  }

  /** All offers in id order. */
  offers(): readonly Offer[] {
    return [...this._offers.values()].sort((a, b) => a.id - b.id);
  }

  // ─── Escrows ────────────────────────────────────────────────────────

  getEscrow(id: EscrowId): Escrow | undefined {
    return this._escrows.get(id);
  }

  putEscrow(escrow: Escrow): void {
    this._escrows.set(escrow.id, escrow);
  }

  /** All escrows in id order. */
  escrows(): readonly Escrow[] {
    return [...this._escrows.values()].sort((a, b) => a.id - b.id);
  }

  // ─── Balances ───────────────────────────────────────────────────────

  getBalance(principal: Principal): BalanceRecord {
    return this._balances.get(principal) ?? EMPTY_BALANCE;
  }

  putBalance(principal: Principal, record: BalanceRecord): void {
    this._balances.set(principal, record);
  }

  /** Principals holding a balance record. */
  balanceHolders(): readonly Principal[] {
    return [...this._balances.keys()];
  }

  // ─── Reverse Indices ────────────────────────────────────────────────

  appendOfferIndex(principal: Principal, id: OfferId): void {
    this._offerIndex.set(principal, [...this.offerIdsOf(principal), id]);
  }

  appendEscrowIndex(principal: Principal, id: EscrowId): void {
    this._escrowIndex.set(principal, [...this.escrowIdsOf(principal), id]);
  }

  offerIdsOf(principal: Principal): readonly OfferId[] {
    return this._offerIndex.get(principal) ?? [];
  }

  escrowIdsOf(principal: Principal): readonly EscrowId[] {
    return this._escrowIndex.get(principal) ?? [];
  }

  // ─── Atomicity ──────────────────────────────────────────────────────

  checkpoint(): StoreCheckpoint {
    return {
      nextOfferId: this._nextOfferId,
      nextEscrowId: this._nextEscrowId,
      profiles: new Map(this._profiles),
      offers: new Map(this._offers),
      escrows: new Map(this._escrows),
      balances: new Map(this._balances),
      offerIndex: new Map(this._offerIndex),
      escrowIndex: new Map(this._escrowIndex),
    };
  }

  rollback(checkpoint: StoreCheckpoint): void {
    this._nextOfferId = checkpoint.nextOfferId;
    this._nextEscrowId = checkpoint.nextEscrowId;
    this._profiles = new Map(checkpoint.profiles);
    this._offers = new Map(checkpoint.offers);
    this._escrows = new Map(checkpoint.escrows);
    this._balances = new Map(checkpoint.balances);
    this._offerIndex = new Map(checkpoint.offerIndex);
    this._escrowIndex = new Map(checkpoint.escrowIndex);
  }

  // ─── Snapshot (Persistence) ─────────────────────────────────────────

  snapshot(): ExchangeSnapshot {
    return {
      version: 1,
      nextOfferId: this._nextOfferId,
      nextEscrowId: this._nextEscrowId,
      profiles: [...this._profiles.values()],
      offers: this.offers(),
      escrows: this.escrows(),
      balances: [...this._balances].map(([principal, record]) => ({ principal, record })),
      offerIndex: indexEntries(this._offerIndex),
      escrowIndex: indexEntries(this._escrowIndex),
    };
  }

  static fromSnapshot(snapshot: ExchangeSnapshot): ExchangeStore {
    const store = new ExchangeStore();
    store._nextOfferId = snapshot.nextOfferId;
    store._nextEscrowId = snapshot.nextEscrowId;

    for (const profile of snapshot.profiles) {
      store._profiles.set(profile.principal, profile);
    }
    for (const offer of snapshot.offers) {
      store._offers.set(offer.id, offer);
    }
    for (const escrow of snapshot.escrows) {
      store._escrows.set(escrow.id, escrow);
    }
    for (const { principal, record } of snapshot.balances) {
      store._balances.set(principal, record);
    }
    for (const { principal, ids } of snapshot.offerIndex) {
      store._offerIndex.set(principal, [...ids]);
    }
    for (const { principal, ids } of snapshot.escrowIndex) {
      store._escrowIndex.set(principal, [...ids]);
    }

    return store;
  }
}

function indexEntries(
  index: ReadonlyMap<Principal, readonly number[]>,
): readonly IndexSnapshotEntry[] {
  return [...index].map(([principal, ids]) => ({ principal, ids: [...ids] }));
}
