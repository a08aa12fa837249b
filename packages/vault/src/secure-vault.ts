/**
 * SecureVault — custody vault that is safe against re-entrant withdrawal.
 *
 * Composes:
 * - BalanceLedger (per-party balances + aggregate total)
 * - AccessControl (single owner)
 * - FeaturePolicy (switches + deposit bounds)
 * - Withdrawal protocol (checks → effects → interaction)
 *
 * Every public operation takes the caller explicitly. State changes are
 * committed before any value leaves the vault, and notifications are
 * emitted only once the operation has succeeded.
 *
 * While a payout is in flight its amount stays reserved as ledger
 * headroom. Deposits made from receiver code cannot use that room, so
 * the compensating credit of a failed payout always fits.
 */

import type { Amount, Party } from "@custody/types";
import { BalanceLedger } from "@custody/ledger";
import type { InvariantReport } from "@custody/ledger";
import { InMemoryEventStore } from "@custody/event-store";
import type { EventStore, StoredEvent } from "@custody/event-store";
import type { TransferPrimitive } from "@custody/host";
import { AccessControl } from "./access-control.js";
import type { OwnershipChange } from "./access-control.js";
import {
  enforce,
  headroom,
  nonZero,
  notSelf,
  positiveAmount,
  solvent,
  sufficientBalance,
  validParty,
} from "./checks.js";
import { VaultError, withLedger } from "./errors.js";
import { VAULT_EVENTS, VaultEventEmitter } from "./events.js";
import type { VaultEventType } from "./events.js";
import { FeaturePolicy } from "./policy.js";
import type {
  DepositReceipt,
  PolicyState,
  VaultConfig,
  VaultSnapshot,
  VaultStats,
  WithdrawalReceipt,
  WithdrawalTarget,
} from "./types.js";
import { executeWithdrawal } from "./withdrawal.js";

// =============================================================================
// SecureVault
// =============================================================================

export class SecureVault implements WithdrawalTarget {
  readonly address: Party;
  private ledger: BalanceLedger;
  private readonly access: AccessControl;
  private readonly policy: FeaturePolicy;
  private readonly host: TransferPrimitive;
  private readonly emitter: VaultEventEmitter;
  private readonly reserved: Map<Party, Amount> = new Map();
  private reservedTotal: Amount = 0n;

  constructor(
    config: VaultConfig,
    host: TransferPrimitive,
    events: EventStore = new InMemoryEventStore(),
  ) {
    enforce([validParty(config.address, "vault")]);
    this.address = config.address;
    this.host = host;
    this.ledger = withLedger(
      () => new BalanceLedger(config.bits !== undefined ? { bits: config.bits } : undefined),
    );
    this.access = new AccessControl(config.owner);
    this.policy = new FeaturePolicy(this.access, {
      depositsEnabled: config.depositsEnabled ?? true,
      withdrawalsEnabled: config.withdrawalsEnabled ?? true,
      minDeposit: config.minDeposit ?? 1n,
      maxDeposit: config.maxDeposit ?? this.ledger.maxValue,
    });
    this.emitter = new VaultEventEmitter(events, config.address);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit `amount` to the caller and pull the value into the pool.
   */
  deposit(caller: Party, amount: Amount): DepositReceipt {
    const correlationId = this.emitter.nextCorrelationId();
    const max = this.ledger.maxValue;
    enforce([
      notSelf(caller, this.address),
      ...this.policy.depositChecks(amount),
      headroom(this.ledger.balanceOf(caller), this.reserved.get(caller) ?? 0n, amount, max),
      headroom(this.ledger.total(), this.reservedTotal, amount, max),
    ]);

    const newBalance = withLedger(() => this.ledger.credit(caller, amount));

    const outcome = this.host.transfer(caller, this.address, amount);
    if (!outcome.ok) {
      withLedger(() => this.ledger.debit(caller, amount));
      throw new VaultError(
        "TRANSFER_FAILED",
        `Deposit of ${amount.toString()} from "${caller}" failed: ${outcome.reason}`,
        { cause: outcome.cause },
      );
    }

    this.emitter.emit(VAULT_EVENTS.DEPOSIT, caller, correlationId, {
      party: caller,
      amount: amount.toString(),
      newBalance: newBalance.toString(),
    });
    return { party: caller, amount, newBalance };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Withdraw `amount` of the caller's balance to the caller.
   */
  withdraw(caller: Party, amount: Amount): WithdrawalReceipt {
    const correlationId = this.emitter.nextCorrelationId();
    const receipt = this.withReserve(caller, amount, () =>
      executeWithdrawal(this.host, this.address, {
        caller,
        recipient: caller,
        amount,
        checks: [
          this.policy.withdrawalGate(),
          positiveAmount(amount),
          sufficientBalance(caller, this.ledger.balanceOf(caller), amount),
          solvent(this.ledger.total(), amount),
        ],
        debit: () => this.ledger.debit(caller, amount),
        compensate: () => {
          this.ledger.credit(caller, amount);
        },
        remaining: () => this.ledger.balanceOf(caller),
      }),
    );

    this.emitWithdrawal(receipt, correlationId);
    return receipt;
  }

  /**
   * Withdraw the caller's entire balance.
   */
  withdrawAll(caller: Party): WithdrawalReceipt {
    const correlationId = this.emitter.nextCorrelationId();
    const balance = this.ledger.balanceOf(caller);
    const receipt = this.withReserve(caller, balance, () =>
      executeWithdrawal(this.host, this.address, {
        caller,
        recipient: caller,
        amount: balance,
        checks: [
          this.policy.withdrawalGate(),
          nonZero(balance, caller),
          solvent(this.ledger.total(), balance),
        ],
        debit: () => this.ledger.debit(caller, balance),
        compensate: () => {
          this.ledger.credit(caller, balance);
        },
        remaining: () => this.ledger.balanceOf(caller),
      }),
    );

    this.emitWithdrawal(receipt, correlationId);
    return receipt;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Emergency drains (owner only)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move `amount` of pooled value to the owner, reducing only the aggregate
   * total. Individual balances are left as they are.
   */
  emergencyWithdraw(caller: Party, amount: Amount): WithdrawalReceipt {
    const correlationId = this.emitter.nextCorrelationId();
    const receipt = this.withReserve(undefined, amount, () =>
      executeWithdrawal(this.host, this.address, {
        caller,
        recipient: caller,
        amount,
        checks: [
          this.access.ownerOnly(caller),
          positiveAmount(amount),
          solvent(this.ledger.total(), amount),
        ],
        debit: () => this.ledger.debitTotal(amount),
        compensate: () => {
          this.ledger.creditTotal(amount);
        },
        remaining: () => this.ledger.total(),
      }),
    );

    this.emitEmergency(receipt, correlationId);
    return receipt;
  }

  /**
   * Move the whole aggregate total to the owner.
   */
  emergencyWithdrawAll(caller: Party): WithdrawalReceipt {
    const correlationId = this.emitter.nextCorrelationId();
    const total = this.ledger.total();
    const receipt = this.withReserve(undefined, total, () =>
      executeWithdrawal(this.host, this.address, {
        caller,
        recipient: caller,
        amount: total,
        checks: [this.access.ownerOnly(caller), nonZero(total, this.address)],
        debit: () => this.ledger.sweepTotal(),
        compensate: () => {
          this.ledger.creditTotal(total);
        },
        remaining: () => this.ledger.total(),
      }),
    );

    this.emitEmergency(receipt, correlationId);
    return receipt;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration (owner only)
  // ───────────────────────────────────────────────────────────────────────

  transferOwnership(caller: Party, newOwner: Party): OwnershipChange {
    const correlationId = this.emitter.nextCorrelationId();
    const change = this.access.transferOwnership(caller, newOwner);
    this.emitter.emit(VAULT_EVENTS.OWNERSHIP_TRANSFERRED, caller, correlationId, change);
    return change;
  }

  setDepositsEnabled(caller: Party, enabled: boolean): PolicyState {
    const correlationId = this.emitter.nextCorrelationId();
    const state = this.policy.setDepositsEnabled(caller, enabled);
    this.emitter.emit(VAULT_EVENTS.DEPOSITS_TOGGLED, caller, correlationId, { enabled });
    return state;
  }

  setWithdrawalsEnabled(caller: Party, enabled: boolean): PolicyState {
    const correlationId = this.emitter.nextCorrelationId();
    const state = this.policy.setWithdrawalsEnabled(caller, enabled);
    this.emitter.emit(VAULT_EVENTS.WITHDRAWALS_TOGGLED, caller, correlationId, { enabled });
    return state;
  }

  setLimits(caller: Party, minDeposit: Amount, maxDeposit: Amount): PolicyState {
    const correlationId = this.emitter.nextCorrelationId();
    const state = this.policy.setLimits(caller, minDeposit, maxDeposit);
    this.emitter.emit(VAULT_EVENTS.LIMITS_UPDATED, caller, correlationId, {
      minDeposit: minDeposit.toString(),
      maxDeposit: maxDeposit.toString(),
    });
    return state;
  }

  requireOwner(caller: Party): void {
    this.access.requireOwner(caller);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(party: Party): Amount {
    return this.ledger.balanceOf(party);
  }

  total(): Amount {
    return this.ledger.total();
  }

  get owner(): Party {
    return this.access.owner;
  }

  get policyState(): PolicyState {
    return this.policy.state;
  }

  getVaultStats(): VaultStats {
    const policy = this.policy.state;
    return {
      totalDeposits: this.ledger.total(),
      poolHoldings: this.host.holdingsOf(this.address),
      depositsEnabled: policy.depositsEnabled,
      withdrawalsEnabled: policy.withdrawalsEnabled,
      minDeposit: policy.minDeposit,
      maxDeposit: policy.maxDeposit,
      owner: this.access.owner,
      holderCount: this.ledger.holderCount,
    };
  }

  checkInvariants(): InvariantReport {
    return this.ledger.checkInvariants();
  }

  history(type?: VaultEventType): readonly StoredEvent[] {
    return this.emitter.history(type);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VaultSnapshot {
    const policy = this.policy.state;
    return {
      version: 1,
      address: this.address,
      owner: this.access.owner,
      policy: {
        depositsEnabled: policy.depositsEnabled,
        withdrawalsEnabled: policy.withdrawalsEnabled,
        minDeposit: policy.minDeposit.toString(),
        maxDeposit: policy.maxDeposit.toString(),
      },
      ledger: this.ledger.snapshot(),
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Restore vault state from a snapshot. The pool's value lives on the
   * host and is not part of the snapshot.
   */
  static fromSnapshot(
    snapshot: VaultSnapshot,
    host: TransferPrimitive,
    events?: EventStore,
  ): SecureVault {
    const ledger = withLedger(() => BalanceLedger.fromSnapshot(snapshot.ledger));
    const vault = new SecureVault(
      {
        address: snapshot.address,
        owner: snapshot.owner,
        depositsEnabled: snapshot.policy.depositsEnabled,
        withdrawalsEnabled: snapshot.policy.withdrawalsEnabled,
        minDeposit: parseAmount(snapshot.policy.minDeposit, "minDeposit"),
        maxDeposit: parseAmount(snapshot.policy.maxDeposit, "maxDeposit"),
        bits: snapshot.ledger.bits,
      },
      host,
      events,
    );
    vault.ledger = ledger;
    return vault;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Hold `amount` of headroom for the duration of one payout. Emergency
   * drains only touch the total and pass no party.
   */
  private withReserve<T>(party: Party | undefined, amount: Amount, payout: () => T): T {
    this.reservedTotal += amount;
    if (party !== undefined) {
      this.reserved.set(party, (this.reserved.get(party) ?? 0n) + amount);
    }
    try {
      return payout();
    } finally {
      this.reservedTotal -= amount;
      if (party !== undefined) {
        const left = (this.reserved.get(party) ?? 0n) - amount;
        if (left > 0n) {
          this.reserved.set(party, left);
        } else {
          this.reserved.delete(party);
        }
      }
    }
  }

  private emitWithdrawal(receipt: WithdrawalReceipt, correlationId: string): void {
    this.emitter.emit(VAULT_EVENTS.WITHDRAWAL, receipt.caller, correlationId, {
      party: receipt.caller,
      amount: receipt.amount.toString(),
      newBalance: receipt.remaining.toString(),
    });
  }

  private emitEmergency(receipt: WithdrawalReceipt, correlationId: string): void {
    this.emitter.emit(VAULT_EVENTS.EMERGENCY_WITHDRAWAL, receipt.caller, correlationId, {
      owner: receipt.caller,
      amount: receipt.amount.toString(),
      remainingTotal: receipt.remaining.toString(),
    });
  }
}

function parseAmount(value: string, field: string): Amount {
  if (!/^\d+$/.test(value)) {
    throw new VaultError("INVALID_SNAPSHOT", `Snapshot ${field} is not an unsigned integer: "${value}"`);
  }
  return BigInt(value);
}
