/**
 * Vault Types
 *
 * Domain types for the custody vault.
 * The vault composes four parts:
 *
 * 1. Ledger — per-party balances and the aggregate total
 * 2. Access control — single owner gating administrative operations
 * 3. Policy — deposit/withdrawal switches and deposit bounds
 * 4. Withdrawal protocol — checks, then ledger effects, then the transfer
 *
 * Rules:
 * - Amounts are unsigned bigint; serialized forms use decimal strings
 * - Operations are identified by an explicit caller, never ambient state
 */

import type { Amount, Party } from "@custody/types";
import type { LedgerSnapshot } from "@custody/ledger";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** Identity of the vault itself; its host holdings are the pool */
  readonly address: Party;

  /** Initial owner */
  readonly owner: Party;

  /** Smallest accepted deposit. Default: 1 */
  readonly minDeposit?: Amount;

  /** Largest accepted deposit. Default: the integer width maximum */
  readonly maxDeposit?: Amount;

  /** Default: true */
  readonly depositsEnabled?: boolean;

  /** Default: true */
  readonly withdrawalsEnabled?: boolean;

  /** Unsigned integer width for balances. Default: 256 */
  readonly bits?: number;
}

// =============================================================================
// Policy
// =============================================================================

export interface PolicyState {
  readonly depositsEnabled: boolean;
  readonly withdrawalsEnabled: boolean;
  readonly minDeposit: Amount;
  readonly maxDeposit: Amount;
}

// =============================================================================
// Withdrawal protocol
// =============================================================================

/**
 * Phases of a single withdrawal call.
 * `failed` is absorbing and reachable from every non-terminal phase.
 */
export type WithdrawalPhase =
  | "start"
  | "validated"
  | "debited"
  | "transferring"
  | "complete"
  | "failed";

export interface WithdrawalReceipt {
  readonly caller: Party;
  readonly recipient: Party;
  readonly amount: Amount;
  /** Caller's ledger balance (or, for emergency drains, the aggregate total) after completion */
  readonly remaining: Amount;
  readonly phases: readonly WithdrawalPhase[];
}

export interface DepositReceipt {
  readonly party: Party;
  readonly amount: Amount;
  readonly newBalance: Amount;
}

// =============================================================================
// Reads
// =============================================================================

export interface VaultStats {
  /** Aggregate total recorded by the ledger */
  readonly totalDeposits: Amount;
  /** Native value the vault actually holds on the host */
  readonly poolHoldings: Amount;
  readonly depositsEnabled: boolean;
  readonly withdrawalsEnabled: boolean;
  readonly minDeposit: Amount;
  readonly maxDeposit: Amount;
  readonly owner: Party;
  readonly holderCount: number;
}

/**
 * What a counterparty needs to interact with a vault's public entry points.
 * Implemented by both the safe and the unsafe vault.
 */
export interface WithdrawalTarget {
  readonly address: Party;
  deposit(caller: Party, amount: Amount): unknown;
  withdraw(caller: Party, amount: Amount): unknown;
  balanceOf(party: Party): Amount;
  total(): Amount;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface VaultSnapshot {
  readonly version: 1;
  readonly address: Party;
  readonly owner: Party;
  readonly policy: {
    readonly depositsEnabled: boolean;
    readonly withdrawalsEnabled: boolean;
    readonly minDeposit: string;
    readonly maxDeposit: string;
  };
  readonly ledger: LedgerSnapshot;
  readonly savedAt: string;
}
