/**
 * Feature Policy — runtime switches and deposit bounds.
 *
 * Rules:
 * - Only the owner changes policy
 * - minDeposit <= maxDeposit at all times
 * - The deposit path reads the deposit switch and both bounds
 * - The withdrawal path reads only the withdrawal switch; withdrawal
 *   amounts are bounded by balances, not by policy
 */

import type { Amount, Party } from "@custody/types";
import type { AccessControl } from "./access-control.js";
import type { Check } from "./checks.js";
import {
  enforce,
  featureEnabled,
  positiveAmount,
  validRange,
  withinBounds,
} from "./checks.js";
import type { PolicyState } from "./types.js";

export class FeaturePolicy {
  private _state: PolicyState;
  private readonly access: AccessControl;

  constructor(access: AccessControl, initial: PolicyState) {
    enforce([validRange(initial.minDeposit, initial.maxDeposit)]);
    this.access = access;
    this._state = initial;
  }

  get state(): PolicyState {
    return this._state;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner-only mutations
  // ───────────────────────────────────────────────────────────────────────

  setDepositsEnabled(caller: Party, enabled: boolean): PolicyState {
    enforce([this.access.ownerOnly(caller)]);
    this._state = { ...this._state, depositsEnabled: enabled };
    return this._state;
  }

  setWithdrawalsEnabled(caller: Party, enabled: boolean): PolicyState {
    enforce([this.access.ownerOnly(caller)]);
    this._state = { ...this._state, withdrawalsEnabled: enabled };
    return this._state;
  }

  setLimits(caller: Party, minDeposit: Amount, maxDeposit: Amount): PolicyState {
    enforce([this.access.ownerOnly(caller), validRange(minDeposit, maxDeposit)]);
    this._state = { ...this._state, minDeposit, maxDeposit };
    return this._state;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Preconditions
  // ───────────────────────────────────────────────────────────────────────

  /** Deposit gate: switch, then positive amount, then bounds. */
  depositChecks(amount: Amount): readonly Check[] {
    const { depositsEnabled, minDeposit, maxDeposit } = this._state;
    return [
      featureEnabled(depositsEnabled, "deposits"),
      positiveAmount(amount),
      withinBounds(amount, minDeposit, maxDeposit),
    ];
  }

  withdrawalGate(): Check {
    return featureEnabled(this._state.withdrawalsEnabled, "withdrawals");
  }
}
