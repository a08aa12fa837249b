/**
 * Property-Based Tests for @custody/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of credits and debits:
 *
 * 1. Conservation: total() equals the sum of all balances
 * 2. Non-negativity: a debit beyond the balance always fails, never wraps
 * 3. Failed operations leave the ledger unchanged
 * 4. Snapshot → restore preserves every balance
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { BalanceLedger } from "../src/balance-ledger.js";
import { LedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const PARTIES = ["0xa11ce", "0xb0b", "0xca401", "0xdave"] as const;

type Op =
  | { readonly kind: "credit"; readonly party: string; readonly amount: bigint }
  | { readonly kind: "debit"; readonly party: string; readonly amount: bigint };

const arbParty = fc.constantFrom(...PARTIES);

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constant("credit" as const),
    party: arbParty,
    amount: fc.bigInt({ min: 1n, max: 1_000_000n }),
  }),
  fc.record({
    kind: fc.constant("debit" as const),
    party: arbParty,
    amount: fc.bigInt({ min: 1n, max: 1_000_000n }),
  }),
);

function apply(ledger: BalanceLedger, op: Op): void {
  try {
    if (op.kind === "credit") {
      ledger.credit(op.party, op.amount);
    } else {
      ledger.debit(op.party, op.amount);
    }
  } catch (err) {
    if (!(err instanceof LedgerError)) throw err;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("property: conservation", () => {
  it("total always equals the sum of balances", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 60 }), (ops) => {
        const ledger = new BalanceLedger();
        for (const op of ops) {
          apply(ledger, op);
          const report = ledger.checkInvariants();
          expect(report.conserved).toBe(true);
          expect(report.nonNegative).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: no debit beyond balance", () => {
  it("over-debits fail with INSUFFICIENT_BALANCE and change nothing", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 1_000_000n }),
        fc.bigInt({ min: 1n, max: 1_000_000n }),
        (deposited, excess) => {
          const ledger = new BalanceLedger();
          ledger.credit("0xa11ce", deposited);

          expect(() => ledger.debit("0xa11ce", deposited + excess)).toThrow(LedgerError);
          expect(ledger.balanceOf("0xa11ce")).toBe(deposited);
          expect(ledger.total()).toBe(deposited);
        },
      ),
      { numRuns: 200 },
    );
  });
});

describe("property: overflow never wraps", () => {
  it("credits beyond the width fail and preserve the previous balance", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 255n }),
        fc.bigInt({ min: 1n, max: 255n }),
        (first, second) => {
          const ledger = new BalanceLedger({ bits: 8 });
          ledger.credit("0xa11ce", first);

          if (first + second > 255n) {
            expect(() => ledger.credit("0xa11ce", second)).toThrow(/exceeds the maximum/);
            expect(ledger.balanceOf("0xa11ce")).toBe(first);
          } else {
            expect(ledger.credit("0xa11ce", second)).toBe(first + second);
          }
        },
      ),
      { numRuns: 200 },
    );
  });
});

describe("property: snapshot restore", () => {
  it("restored ledger has identical balances and total", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const ledger = new BalanceLedger();
        for (const op of ops) apply(ledger, op);

        const restored = BalanceLedger.fromSnapshot(ledger.snapshot());
        expect(restored.total()).toBe(ledger.total());
        for (const party of PARTIES) {
          expect(restored.balanceOf(party)).toBe(ledger.balanceOf(party));
        }
      }),
      { numRuns: 100 },
    );
  });
});
