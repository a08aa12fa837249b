/**
 * VulnerableVault — contrast vault with the interaction before the effect.
 *
 * Exists to show what the checks → effects → interaction order prevents.
 * withdraw() reads the caller's balance, sends the value, and only then
 * writes back the balance it read before the send. A receiver that calls
 * withdraw() again from inside the transfer passes the same balance check
 * every time and drains the pool, while the ledger records a single
 * withdrawal.
 *
 * Never use this for custody.
 */

import type { Amount, Party } from "@custody/types";
import { BalanceLedger } from "@custody/ledger";
import type { TransferPrimitive } from "@custody/host";
import { enforce, notSelf, positiveAmount, sufficientBalance, validParty } from "./checks.js";
import { VaultError, withLedger } from "./errors.js";
import type { DepositReceipt, WithdrawalTarget } from "./types.js";

export interface VulnerableVaultConfig {
  readonly address: Party;
  readonly bits?: number;
}

export class VulnerableVault implements WithdrawalTarget {
  readonly address: Party;
  private readonly ledger: BalanceLedger;
  private readonly host: TransferPrimitive;

  constructor(config: VulnerableVaultConfig, host: TransferPrimitive) {
    enforce([validParty(config.address, "vault")]);
    this.address = config.address;
    this.host = host;
    this.ledger = withLedger(
      () => new BalanceLedger(config.bits !== undefined ? { bits: config.bits } : undefined),
    );
  }

  deposit(caller: Party, amount: Amount): DepositReceipt {
    enforce([notSelf(caller, this.address), positiveAmount(amount)]);
    const outcome = this.host.transfer(caller, this.address, amount);
    if (!outcome.ok) {
      throw new VaultError(
        "TRANSFER_FAILED",
        `Deposit of ${amount.toString()} from "${caller}" failed: ${outcome.reason}`,
        { cause: outcome.cause },
      );
    }
    const newBalance = withLedger(() => this.ledger.credit(caller, amount));
    return { party: caller, amount, newBalance };
  }

  /**
   * Unsafe: sends first, then writes back a balance read before the send.
   */
  withdraw(caller: Party, amount: Amount): Amount {
    const bal = this.ledger.balanceOf(caller);
    enforce([positiveAmount(amount), sufficientBalance(caller, bal, amount)]);

    const outcome = this.host.transfer(this.address, caller, amount);
    if (!outcome.ok) {
      throw new VaultError(
        "TRANSFER_FAILED",
        `Transfer of ${amount.toString()} to "${caller}" failed: ${outcome.reason}`,
        { cause: outcome.cause },
      );
    }

    // Stale write: the balance becomes `bal - amount` no matter what
    // happened during the transfer.
    const current = this.ledger.balanceOf(caller);
    const target = bal - amount;
    if (current > target) {
      withLedger(() => this.ledger.debit(caller, current - target));
    }
    return target;
  }

  balanceOf(party: Party): Amount {
    return this.ledger.balanceOf(party);
  }

  total(): Amount {
    return this.ledger.total();
  }
}
