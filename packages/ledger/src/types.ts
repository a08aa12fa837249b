/**
 * @custody/ledger — Internal types for the balance ledger.
 *
 * Rules:
 * - All exported structures are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Amounts are unsigned bigint; snapshots carry them as strings
 */

import type { Amount, Party } from "@custody/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_PARTY"
  | "INSUFFICIENT_BALANCE"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "INVALID_WIDTH"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface BalanceLedgerOptions {
  /** Width of the unsigned integer used for balances and the total, 1–256. Defaults to 256. */
  readonly bits?: number | undefined;
}

// ─── Reports ─────────────────────────────────────────────────────────────

/**
 * Result of checking the ledger's bookkeeping invariants.
 */
export interface InvariantReport {
  readonly total: Amount;
  readonly sumOfBalances: Amount;
  /** total === Σ balances */
  readonly conserved: boolean;
  /** No balance and no total below zero */
  readonly nonNegative: boolean;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface LedgerSnapshotEntry {
  readonly party: Party;
  readonly balance: string;
}

/**
 * Serializable snapshot of the ledger state.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly bits: number;
  readonly total: string;
  readonly entries: readonly LedgerSnapshotEntry[];
  readonly createdAt: string;
}
