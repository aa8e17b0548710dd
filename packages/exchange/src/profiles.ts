/**
 * Profile Registry — identity and reputation records.
 *
 * Rules:
 * - One profile per principal, created once, never deleted
 * - Only contact fields change after creation
 * - Trade counters move only through escrow transitions
 */

import type { Principal, Profile } from "@souk/types";
import type { ExchangeStore } from "./store.js";
import type { CallContext } from "./types.js";
import { ExchangeError } from "./types.js";
import { assertText } from "./validate.js";

export class ProfileRegistry {
  private readonly store: ExchangeStore;

  constructor(store: ExchangeStore) {
    this.store = store;
  }

  create(
    ctx: CallContext,
    displayName: string,
    primaryContact: string,
    secondaryContact: string,
  ): Profile {
    if (this.store.getProfile(ctx.caller) !== undefined) {
      throw new ExchangeError("ALREADY_EXISTS", `Profile for '${ctx.caller}' already exists`);
    }
    assertText("displayName", displayName);
    assertText("primaryContact", primaryContact);
    assertText("secondaryContact", secondaryContact);

    const profile: Profile = {
      principal: ctx.caller,
      displayName,
      primaryContact,
      secondaryContact,
      joinedAt: ctx.now,
      totalTrades: 0,
      completedTrades: 0,
      disputedTrades: 0,
      averageSettlementSeconds: 0,
    };

    this.store.putProfile(profile);
    return profile;
  }

  updateContacts(
    ctx: CallContext,
    primaryContact: string,
    secondaryContact: string,
  ): Profile {
    const profile = this.require(ctx.caller);
    assertText("primaryContact", primaryContact);
    assertText("secondaryContact", secondaryContact);

    const updated: Profile = { ...profile, primaryContact, secondaryContact };
    this.store.putProfile(updated);
    return updated;
  }

  get(principal: Principal): Profile | undefined {
    return this.store.getProfile(principal);
  }

  /**
   * Return the profile or fail with PROFILE_REQUIRED.
   */
  require(principal: Principal): Profile {
    const profile = this.store.getProfile(principal);
    if (profile === undefined) {
      throw new ExchangeError("PROFILE_REQUIRED", `No profile for '${principal}'`);
    }
    return profile;
  }

  // ─── Reputation updates (engine only) ───────────────────────────────

  recordTradeOpened(principal: Principal): void {
    const profile = this.require(principal);
    this.store.putProfile({ ...profile, totalTrades: profile.totalTrades + 1 });
  }

  recordCompleted(principal: Principal): Profile {
    const profile = this.require(principal);
    const updated: Profile = { ...profile, completedTrades: profile.completedTrades + 1 };
    this.store.putProfile(updated);
    return updated;
  }

  recordDisputeLost(principal: Principal): void {
    const profile = this.require(principal);
    this.store.putProfile({ ...profile, disputedTrades: profile.disputedTrades + 1 });
  }

  /**
   * Record a seller-confirmed settlement: completed +1 and fold the
   * elapsed seconds into the running integer average.
   */
  recordSettlement(principal: Principal, elapsedSeconds: number): void {
    const profile = this.recordCompleted(principal);
    const n = profile.completedTrades;
    const average =
      n === 1
        ? elapsedSeconds
        : Math.floor((profile.averageSettlementSeconds * (n - 1) + elapsedSeconds) / n);

    this.store.putProfile({ ...profile, averageSettlementSeconds: average });
  }
}
