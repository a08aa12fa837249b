/**
 * Property-Based Tests for SecureVault
 *
 * For ANY sequence of deposits and withdrawals by any mix of parties:
 *
 * 1. The ledger total equals the sum of balances
 * 2. The pool holds exactly the ledger total
 * 3. Value is neither created nor destroyed on the host
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ValueHost } from "@custody/host";
import { SecureVault } from "../src/secure-vault.js";
import { VaultError } from "../src/errors.js";

const VAULT = "0xvault";
const PARTIES = ["0xa11ce", "0xb0b", "0xca401"] as const;
const FUNDING = 10_000n;

type Op =
  | { readonly kind: "deposit"; readonly party: string; readonly amount: bigint }
  | { readonly kind: "withdraw"; readonly party: string; readonly amount: bigint }
  | { readonly kind: "withdrawAll"; readonly party: string };

const arbParty = fc.constantFrom(...PARTIES);
const arbAmount = fc.bigInt({ min: 0n, max: 3_000n });

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("deposit" as const), party: arbParty, amount: arbAmount }),
  fc.record({ kind: fc.constant("withdraw" as const), party: arbParty, amount: arbAmount }),
  fc.record({ kind: fc.constant("withdrawAll" as const), party: arbParty }),
);

function apply(vault: SecureVault, op: Op): void {
  try {
    if (op.kind === "deposit") vault.deposit(op.party, op.amount);
    else if (op.kind === "withdraw") vault.withdraw(op.party, op.amount);
    else vault.withdrawAll(op.party);
  } catch (err) {
    if (!(err instanceof VaultError)) throw err;
  }
}

describe("SecureVault properties", () => {
  it("keeps ledger, pool and host in agreement", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const host = new ValueHost();
        for (const party of PARTIES) host.fund(party, FUNDING);
        const vault = new SecureVault({ address: VAULT, owner: "0x0wner" }, host);

        for (const op of ops) {
          apply(vault, op);
          const report = vault.checkInvariants();
          expect(report.conserved).toBe(true);
          expect(host.holdingsOf(VAULT)).toBe(vault.total());
        }

        expect(host.totalHoldings()).toBe(FUNDING * BigInt(PARTIES.length));
        for (const party of PARTIES) {
          expect(host.holdingsOf(party) + vault.balanceOf(party)).toBe(FUNDING);
        }
      }),
    );
  });
});
