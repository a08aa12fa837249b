/**
 * @custody/ledger — Balance ledger.
 *
 * Keyed mapping from party to unsigned balance plus an aggregate total.
 *
 * API surface:
 * - credit() / debit() — The only per-party mutations
 * - creditTotal() / debitTotal() / sweepTotal() — Aggregate-only admin mutations
 * - balanceOf() / total() / parties() — Pure reads
 * - checkInvariants() — Conservation and non-negativity report
 * - snapshot() / fromSnapshot() — Serialization
 *
 * Every mutation computes all new values before storing any of them,
 * so a failed operation leaves the ledger untouched.
 */

import type { Amount, Party } from "@custody/types";
import { isParty, maxUint, UINT256_BITS } from "@custody/types";
import { checkedAdd, checkedSub, parseUnits } from "./uint-math.js";
import type {
  BalanceLedgerOptions,
  InvariantReport,
  LedgerSnapshot,
} from "./types.js";
import { LedgerError } from "./types.js";

export class BalanceLedger {
  private readonly _balances: Map<Party, Amount> = new Map();
  private _total: Amount = 0n;
  private readonly _bits: number;
  private readonly _max: Amount;

  constructor(options?: BalanceLedgerOptions) {
    const bits = options?.bits ?? UINT256_BITS;
    if (!Number.isInteger(bits) || bits < 1 || bits > UINT256_BITS) {
      throw new LedgerError(
        "INVALID_WIDTH",
        `Ledger width must be an integer between 1 and ${String(UINT256_BITS)}, got ${String(bits)}`,
      );
    }
    this._bits = bits;
    this._max = maxUint(bits);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Add `amount` to a party's balance and to the aggregate total.
   * Returns the party's new balance.
   */
  credit(party: Party, amount: Amount): Amount {
    this._assertParty(party);
    this._assertPositive(amount);

    const balance = checkedAdd(this.balanceOf(party), amount, this._max);
    const total = checkedAdd(this._total, amount, this._max);

    this._balances.set(party, balance);
    this._total = total;
    return balance;
  }

  /**
   * Subtract `amount` from a party's balance and from the aggregate total.
   * Returns the party's new balance.
   */
  debit(party: Party, amount: Amount): Amount {
    this._assertParty(party);
    this._assertPositive(amount);

    const current = this.balanceOf(party);
    if (current < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for "${party}": has ${current.toString()}, needs ${amount.toString()}`,
      );
    }

    const balance = current - amount;
    const total = checkedSub(this._total, amount);

    if (balance === 0n) {
      this._balances.delete(party);
    } else {
      this._balances.set(party, balance);
    }
    this._total = total;
    return balance;
  }

  /**
   * Increase only the aggregate total. Used to compensate a failed admin drain.
   */
  creditTotal(amount: Amount): Amount {
    this._assertPositive(amount);
    this._total = checkedAdd(this._total, amount, this._max);
    return this._total;
  }

  /**
   * Decrease only the aggregate total (admin recovery drain).
   */
  debitTotal(amount: Amount): Amount {
    this._assertPositive(amount);
    this._total = checkedSub(this._total, amount);
    return this._total;
  }

  /**
   * Zero the aggregate total and return what it held (full-sweep drain).
   */
  sweepTotal(): Amount {
    const swept = this._total;
    this._total = 0n;
    return swept;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(party: Party): Amount {
    return this._balances.get(party) ?? 0n;
  }

  total(): Amount {
    return this._total;
  }

  /** Parties holding a non-zero balance, in first-credit order. */
  parties(): readonly Party[] {
    return [...this._balances.keys()];
  }

  get holderCount(): number {
    return this._balances.size;
  }

  get maxValue(): Amount {
    return this._max;
  }

  sumOfBalances(): Amount {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return sum;
  }

  checkInvariants(): InvariantReport {
    const sumOfBalances = this.sumOfBalances();
    let nonNegative = this._total >= 0n;
    for (const balance of this._balances.values()) {
      if (balance < 0n) nonNegative = false;
    }
    return {
      total: this._total,
      sumOfBalances,
      conserved: sumOfBalances === this._total,
      nonNegative,
    };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      bits: this._bits,
      total: this._total.toString(),
      entries: [...this._balances].map(([party, balance]) => ({
        party,
        balance: balance.toString(),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Every balance and the total are re-validated against the snapshot's width.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): BalanceLedger {
    const ledger = new BalanceLedger({ bits: snapshot.bits });

    for (const entry of snapshot.entries) {
      ledger._assertParty(entry.party);
      if (ledger._balances.has(entry.party)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Duplicate party in snapshot: "${entry.party}"`);
      }
      const balance = parseUnits(entry.balance, 0, ledger._max);
      if (balance > 0n) {
        ledger._balances.set(entry.party, balance);
      }
    }

    ledger._total = parseUnits(snapshot.total, 0, ledger._max);
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertParty(party: Party): void {
    if (!isParty(party)) {
      throw new LedgerError("INVALID_PARTY", `Invalid party: "${party}"`);
    }
  }

  private _assertPositive(amount: Amount): void {
    if (amount <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount must be positive, got ${amount.toString()}`,
      );
    }
  }
}
