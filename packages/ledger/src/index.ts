/**
 * @custody/ledger — Balance ledger with checked unsigned arithmetic.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces bookkeeping invariants:
 * - total() equals the sum of all party balances
 * - No balance or total is ever negative
 * - Overflow and underflow fail the operation, never wrap
 *
 * Design rules:
 * - Failed mutations leave no partial state behind
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Core engine
export { BalanceLedger } from "./balance-ledger.js";

// Arithmetic
export { checkedAdd, checkedSub, parseUnits } from "./uint-math.js";

// Types
export type {
  LedgerErrorCode,
  BalanceLedgerOptions,
  InvariantReport,
  LedgerSnapshot,
  LedgerSnapshotEntry,
} from "./types.js";

export { LedgerError } from "./types.js";
