/**
 * Composable preconditions.
 *
 * Each factory returns a Check: a thunk that yields a typed failure or
 * nothing. Operations list their checks in order and hand them to
 * enforce(), which throws on the first failure. Nothing is mutated
 * until every check of an operation has passed.
 */

import type { Amount, Party } from "@custody/types";
import { isParty } from "@custody/types";
import type { VaultErrorCode } from "./errors.js";
import { VaultError } from "./errors.js";

export interface CheckFailure {
  readonly code: VaultErrorCode;
  readonly message: string;
}

export type Check = () => CheckFailure | undefined;

/**
 * Run checks in order; throw a VaultError for the first failure.
 */
export function enforce(checks: readonly Check[]): void {
  for (const check of checks) {
    const failure = check();
    if (failure !== undefined) {
      throw new VaultError(failure.code, failure.message);
    }
  }
}

// ─── Factories ───────────────────────────────────────────────────────────

export function validParty(party: Party, role: string): Check {
  return () =>
    isParty(party)
      ? undefined
      : { code: "INVALID_ADDRESS", message: `Invalid ${role} address: "${party}"` };
}

/** The pool address never deposits into its own vault. */
export function notSelf(caller: Party, vault: Party): Check {
  return () =>
    caller === vault
      ? { code: "INVALID_ADDRESS", message: `The vault "${vault}" cannot deposit into itself` }
      : undefined;
}

export function featureEnabled(enabled: boolean, feature: "deposits" | "withdrawals"): Check {
  return () =>
    enabled ? undefined : { code: "FEATURE_DISABLED", message: `${feature} are disabled` };
}

export function positiveAmount(amount: Amount): Check {
  return () =>
    amount > 0n
      ? undefined
      : { code: "INVALID_AMOUNT", message: `Amount must be positive, got ${amount.toString()}` };
}

export function withinBounds(amount: Amount, min: Amount, max: Amount): Check {
  return () =>
    amount >= min && amount <= max
      ? undefined
      : {
          code: "AMOUNT_OUT_OF_BOUNDS",
          message: `Amount ${amount.toString()} is outside [${min.toString()}, ${max.toString()}]`,
        };
}

export function validRange(min: Amount, max: Amount): Check {
  return () =>
    min >= 0n && min <= max
      ? undefined
      : {
          code: "INVALID_RANGE",
          message: `Invalid range [${min.toString()}, ${max.toString()}]: min must be non-negative and not above max`,
        };
}

/**
 * Room for a credit once `reserved` is set aside for the compensations of
 * withdrawals still in flight.
 */
export function headroom(current: Amount, reserved: Amount, amount: Amount, max: Amount): Check {
  return () =>
    current + reserved + amount <= max
      ? undefined
      : {
          code: "ARITHMETIC_OVERFLOW",
          message: `Adding ${amount.toString()} to ${current.toString()} (${reserved.toString()} held for pending withdrawals) exceeds ${max.toString()}`,
        };
}

export function sufficientBalance(party: Party, balance: Amount, amount: Amount): Check {
  return () =>
    balance >= amount
      ? undefined
      : {
          code: "INSUFFICIENT_BALANCE",
          message: `Insufficient balance for "${party}": has ${balance.toString()}, needs ${amount.toString()}`,
        };
}

export function solvent(total: Amount, amount: Amount): Check {
  return () =>
    total >= amount
      ? undefined
      : {
          code: "INSUFFICIENT_BALANCE",
          message: `Vault total ${total.toString()} cannot cover ${amount.toString()}`,
        };
}

export function nonZero(balance: Amount, party: Party): Check {
  return () =>
    balance > 0n
      ? undefined
      : { code: "NOTHING_TO_WITHDRAW", message: `Nothing to withdraw for "${party}"` };
}
