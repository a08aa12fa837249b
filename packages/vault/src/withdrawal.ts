/**
 * Withdrawal Protocol — checks, then effects, then the interaction.
 *
 *   start ──► validated ──► debited ──► transferring ──► complete
 *     │           │            │              │
 *     └───────────┴────────────┴──────────────┴──────► failed
 *
 * The ledger is debited before the host transfer runs. Receiver code
 * executed during the transfer can call straight back into the vault;
 * any such call already sees the reduced balance and fails its own
 * balance check. No lock is held across the transfer.
 *
 * A failed transfer is compensated with an explicit credit of the
 * amount this call debited, then reported as TRANSFER_FAILED. The host
 * offers no whole-call rollback, so the compensation is the rollback.
 * If the compensation itself fails, the error is still TRANSFER_FAILED,
 * with the compensation failure as `cause`. If the host itself throws,
 * the value may already have left the pool; the debit then stands and
 * the error is reported without compensation.
 */

import type { Amount, Party } from "@custody/types";
import type { TransferOutcome, TransferPrimitive } from "@custody/host";
import type { Check } from "./checks.js";
import { enforce } from "./checks.js";
import { VaultError, withLedger } from "./errors.js";
import type { WithdrawalPhase, WithdrawalReceipt } from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<WithdrawalPhase, readonly WithdrawalPhase[]> = {
  start: ["validated", "failed"],
  validated: ["debited", "failed"],
  debited: ["transferring", "failed"],
  transferring: ["complete", "failed"],
  complete: [],
  failed: [],
};

/**
 * Phase tracker for one withdrawal call.
 */
export class WithdrawalRun {
  private readonly _phases: WithdrawalPhase[] = ["start"];

  get phase(): WithdrawalPhase {
    return this._phases[this._phases.length - 1] ?? "start";
  }

  get phases(): readonly WithdrawalPhase[] {
    return [...this._phases];
  }

  advance(to: WithdrawalPhase): void {
    if (!VALID_TRANSITIONS[this.phase].includes(to)) {
      throw new Error(`Invalid withdrawal transition: ${this.phase} → ${to}`);
    }
    this._phases.push(to);
  }

  /**
   * Move to `failed` and build the error to throw.
   */
  fail(error: VaultError): VaultError {
    this.advance("failed");
    return new VaultError(error.code, error.message, {
      cause: error.cause,
      phases: this.phases,
    });
  }
}

// =============================================================================
// Protocol
// =============================================================================

export interface WithdrawalPlan {
  readonly caller: Party;
  readonly recipient: Party;
  readonly amount: Amount;
  /** Preconditions, in the order they must be evaluated */
  readonly checks: readonly Check[];
  /** Ledger effect; returns the balance left behind */
  readonly debit: () => Amount;
  /** Undo of `debit`, applied when the transfer fails */
  readonly compensate: () => void;
  /** Read of the balance left behind once the call completes */
  readonly remaining: () => Amount;
}

/**
 * Execute one withdrawal against the pool held by `pool`.
 */
export function executeWithdrawal(
  host: TransferPrimitive,
  pool: Party,
  plan: WithdrawalPlan,
): WithdrawalReceipt {
  const run = new WithdrawalRun();

  // Checks
  try {
    enforce(plan.checks);
  } catch (err) {
    throw run.fail(asVaultError(err));
  }
  run.advance("validated");

  // Effects
  try {
    withLedger(plan.debit);
  } catch (err) {
    throw run.fail(asVaultError(err));
  }
  run.advance("debited");

  // Interaction
  run.advance("transferring");
  let outcome: TransferOutcome;
  try {
    outcome = host.transfer(pool, plan.recipient, plan.amount);
  } catch (err) {
    throw run.fail(
      new VaultError(
        "TRANSFER_FAILED",
        `Transfer of ${plan.amount.toString()} to "${plan.recipient}" aborted by the host`,
        { cause: err },
      ),
    );
  }

  if (!outcome.ok) {
    const message = `Transfer of ${plan.amount.toString()} to "${plan.recipient}" failed: ${outcome.reason}`;
    try {
      withLedger(plan.compensate);
    } catch (err) {
      throw run.fail(
        new VaultError("TRANSFER_FAILED", `${message}; compensation failed`, { cause: err }),
      );
    }
    throw run.fail(new VaultError("TRANSFER_FAILED", message, { cause: outcome.cause }));
  }

  run.advance("complete");
  return {
    caller: plan.caller,
    recipient: plan.recipient,
    amount: plan.amount,
    remaining: plan.remaining(),
    phases: run.phases,
  };
}

function asVaultError(err: unknown): VaultError {
  if (err instanceof VaultError) return err;
  throw err;
}
