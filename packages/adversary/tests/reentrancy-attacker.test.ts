/**
 * Tests for ReentrancyAttacker against both vaults.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ValueHost } from "@custody/host";
import { InMemoryEventStore } from "@custody/event-store";
import { SecureVault, VulnerableVault, VaultError } from "@custody/vault";
import { ReentrancyAttacker } from "../src/reentrancy-attacker.js";

const VAULT = "0xvault";
const OWNER = "0x0wner";
const VICTIM = "0xv1ct1m";
const ATTACKER = "0xa77ac4";
const CONTROLLER = "0xc0n7r01";

describe("ReentrancyAttacker", () => {
  let host: ValueHost;

  beforeEach(() => {
    host = new ValueHost();
    host.fund(VICTIM, 1000n);
    host.fund(CONTROLLER, 100n);
  });

  // ─── Against the secure vault ───────────────────────────────────────

  describe("against SecureVault", () => {
    let vault: SecureVault;
    let attacker: ReentrancyAttacker;

    beforeEach(() => {
      vault = new SecureVault({ address: VAULT, owner: OWNER }, host);
      vault.deposit(VICTIM, 1000n);
      attacker = new ReentrancyAttacker({
        address: ATTACKER,
        controller: CONTROLLER,
        target: vault,
        host,
      });
    });

    it("is refused on re-entry and gains nothing", () => {
      const report = attacker.attack(CONTROLLER, 100n);

      expect(report).toEqual({
        stake: 100n,
        poolBefore: 1000n,
        poolAfter: 1000n,
        stolen: 0n,
        reentries: 1,
        rejections: ["INSUFFICIENT_BALANCE"],
        observations: [
          { reentry: 1, targetTotal: 1000n, attackerBalance: 0n, poolHoldings: 1000n },
        ],
        drained: false,
      });
    });

    it("sees a ledger that already reflects the debit", () => {
      const [observation] = attacker.attack(CONTROLLER, 100n).observations;
      expect(observation?.targetTotal).toBe(vault.balanceOf(VICTIM) + (observation?.attackerBalance ?? 0n));
    });

    it("leaves the victim whole", () => {
      attacker.attack(CONTROLLER, 100n);
      expect(vault.balanceOf(VICTIM)).toBe(1000n);
      expect(vault.total()).toBe(1000n);
      expect(host.holdingsOf(VAULT)).toBe(1000n);
      expect(vault.checkInvariants().conserved).toBe(true);
      expect(vault.withdraw(VICTIM, 1000n).remaining).toBe(0n);
    });

    it("returns only the stake to the controller", () => {
      attacker.attack(CONTROLLER, 100n);
      expect(attacker.collectStolenFunds(CONTROLLER)).toBe(100n);
      expect(host.holdingsOf(CONTROLLER)).toBe(100n);
    });
  });

  // ─── Against the vulnerable vault ───────────────────────────────────

  describe("against VulnerableVault", () => {
    let vault: VulnerableVault;

    beforeEach(() => {
      vault = new VulnerableVault({ address: VAULT }, host);
      vault.deposit(VICTIM, 1000n);
    });

    it("drains the pool", () => {
      const attacker = new ReentrancyAttacker({
        address: ATTACKER,
        controller: CONTROLLER,
        target: vault,
        host,
      });
      const report = attacker.attack(CONTROLLER, 100n);

      expect(report.poolBefore).toBe(1000n);
      expect(report.poolAfter).toBe(0n);
      expect(report.stolen).toBe(1000n);
      expect(report.reentries).toBe(10);
      expect(report.rejections).toEqual([]);
      expect(report.drained).toBe(true);
      expect(report.observations.map((o) => o.poolHoldings)).toEqual([
        1000n, 900n, 800n, 700n, 600n, 500n, 400n, 300n, 200n, 100n,
      ]);
      expect(report.observations.every((o) => o.attackerBalance === 100n)).toBe(true);

      // The ledger still owes the victim everything.
      expect(vault.balanceOf(VICTIM)).toBe(1000n);
      expect(vault.total()).toBe(1000n);

      expect(attacker.collectStolenFunds(CONTROLLER)).toBe(1100n);
    });

    it("stops at maxReentries", () => {
      const attacker = new ReentrancyAttacker({
        address: ATTACKER,
        controller: CONTROLLER,
        target: vault,
        host,
        maxReentries: 3,
      });
      const report = attacker.attack(CONTROLLER, 100n);

      expect(report.reentries).toBe(3);
      expect(report.stolen).toBe(300n);
      expect(report.poolAfter).toBe(700n);
      expect(report.drained).toBe(true);
    });
  });

  // ─── Control ────────────────────────────────────────────────────────

  describe("control", () => {
    let attacker: ReentrancyAttacker;

    beforeEach(() => {
      const vault = new SecureVault({ address: VAULT, owner: OWNER }, host);
      attacker = new ReentrancyAttacker({
        address: ATTACKER,
        controller: CONTROLLER,
        target: vault,
        host,
      });
    });

    it("rejects other callers", () => {
      expect(() => attacker.attack(VICTIM, 1n)).toThrow(/does not control/);
      expect(() => attacker.collectStolenFunds(VICTIM)).toThrow(VaultError);
    });

    it("has nothing to collect before an attack", () => {
      let code: string | undefined;
      try {
        attacker.collectStolenFunds(CONTROLLER);
      } catch (err) {
        if (err instanceof VaultError) code = err.code;
      }
      expect(code).toBe("NOTHING_TO_WITHDRAW");
    });

    it("fails when the controller cannot fund the stake", () => {
      expect(() => attacker.attack(CONTROLLER, 101n)).toThrow(/INSUFFICIENT_FUNDS/);
    });

    it("ignores value that does not come from the target", () => {
      expect(host.transfer(CONTROLLER, ATTACKER, 10n)).toEqual({ ok: true });
      expect(host.holdingsOf(ATTACKER)).toBe(10n);
    });

    it("records a summary event when given a store", () => {
      const store = new InMemoryEventStore();
      const vault = new VulnerableVault({ address: "0xweak" }, host);
      vault.deposit(VICTIM, 1000n);
      const recorded = new ReentrancyAttacker({
        address: "0xa77ac5",
        controller: CONTROLLER,
        target: vault,
        host,
        events: store,
      });

      recorded.attack(CONTROLLER, 100n);

      const [stored] = store.read("0xa77ac5");
      expect(stored?.event.type).toBe("adversary.attack_completed");
      expect(stored?.event.metadata.source).toBe("adversary");
      expect(stored?.event.payload).toEqual({
        target: "0xweak",
        stake: "100",
        stolen: "1000",
        reentries: 10,
        rejections: [],
        drained: true,
      });
    });
  });
});
