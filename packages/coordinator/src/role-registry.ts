/**
 * Role Registry — flat capabilities under a single owner.
 *
 * Rules:
 * - Only the owner grants or revokes
 * - Ownership moves in one call, with no timelock
 * - The emergency admin may pause but never unpause
 * - ADMIN does not imply BUFFER or RESOLVE
 */

import type { Address, Role, RoleGrant } from "@meridian/types";
import { ROLES } from "@meridian/types";
import { CoordinationError } from "./errors.js";

export class RoleRegistry {
  private readonly grants = new Map<Role, Set<Address>>();
  private _owner: Address;
  private _emergencyAdmin: Address;

  constructor(owner: Address) {
    this._owner = owner;
    this._emergencyAdmin = owner;
    for (const role of ROLES) {
      this.grants.set(role, new Set());
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get owner(): Address {
    return this._owner;
  }

  get emergencyAdmin(): Address {
    return this._emergencyAdmin;
  }

  hasRole(role: Role, account: Address): boolean {
    return this.grants.get(role)?.has(account) ?? false;
  }

  /** Every current grant, grouped by role. */
  listGrants(): readonly RoleGrant[] {
    const result: RoleGrant[] = [];
    for (const role of ROLES) {
      for (const account of this.grants.get(role) ?? []) {
        result.push({ role, account, granted: true });
      }
    }
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Guards
  // ───────────────────────────────────────────────────────────────────────

  requireRole(role: Role, caller: Address): void {
    if (!this.hasRole(role, caller)) {
      throw new CoordinationError(
        "AUTHORIZATION_ERROR",
        `Caller ${caller} lacks ${role} capability`,
        { role, caller },
      );
    }
  }

  requireOwner(caller: Address): void {
    if (caller !== this._owner) {
      throw new CoordinationError(
        "AUTHORIZATION_ERROR",
        `Caller ${caller} is not the owner`,
        { caller },
      );
    }
  }

  /** ADMIN holders and the owner pass. */
  requireAdmin(caller: Address): void {
    if (caller !== this._owner && !this.hasRole("ADMIN", caller)) {
      throw new CoordinationError(
        "AUTHORIZATION_ERROR",
        `Caller ${caller} is neither owner nor ADMIN`,
        { caller },
      );
    }
  }

  /** The emergency admin, ADMIN holders and the owner pass. */
  requirePauser(caller: Address): void {
    if (caller !== this._emergencyAdmin) {
      this.requireAdmin(caller);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /** @returns false when the grant already existed */
  grant(role: Role, account: Address): boolean {
    const holders = this.holders(role);
    if (holders.has(account)) return false;
    holders.add(account);
    return true;
  }

  /** @returns false when there was nothing to revoke */
  revoke(role: Role, account: Address): boolean {
    return this.holders(role).delete(account);
  }

  transferOwnership(newOwner: Address): Address {
    const previous = this._owner;
    this._owner = newOwner;
    return previous;
  }

  setEmergencyAdmin(account: Address): void {
    this._emergencyAdmin = account;
  }

  private holders(role: Role): Set<Address> {
    let holders = this.grants.get(role);
    if (holders === undefined) {
      holders = new Set();
      this.grants.set(role, holders);
    }
    return holders;
  }
}
