/**
 * Access Control — single-owner authorization.
 *
 * Rules:
 * - Exactly one owner at all times; never cleared to "no owner"
 * - Only the current owner can hand ownership to someone else
 * - The new owner must be a valid, non-null identity
 * - The owner field changes in one assignment, after all checks
 */

import type { Party } from "@custody/types";
import { enforce, validParty } from "./checks.js";
import type { Check } from "./checks.js";
import { VaultError } from "./errors.js";

export interface OwnershipChange {
  readonly previousOwner: Party;
  readonly newOwner: Party;
}

export class AccessControl {
  private _owner: Party;

  constructor(owner: Party) {
    enforce([validParty(owner, "owner")]);
    this._owner = owner;
  }

  get owner(): Party {
    return this._owner;
  }

  isOwner(caller: Party): boolean {
    return caller === this._owner;
  }

  /**
   * Precondition form of requireOwner, for use in a check list.
   */
  ownerOnly(caller: Party): Check {
    return () =>
      this.isOwner(caller)
        ? undefined
        : { code: "UNAUTHORIZED", message: `"${caller}" is not the owner` };
  }

  requireOwner(caller: Party): void {
    if (!this.isOwner(caller)) {
      throw new VaultError("UNAUTHORIZED", `"${caller}" is not the owner`);
    }
  }

  transferOwnership(caller: Party, newOwner: Party): OwnershipChange {
    enforce([this.ownerOnly(caller), validParty(newOwner, "new owner")]);

    const previousOwner = this._owner;
    this._owner = newOwner;
    return { previousOwner, newOwner };
  }
}
