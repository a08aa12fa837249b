/**
 * Tests for ValueHost — the transfer primitive with re-entrant receivers.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { ZERO_PARTY } from "@custody/types";
import { ValueHost } from "../src/value-host.js";
import { HostError } from "../src/types.js";

const POOL = "0xpool";
const ALICE = "0xa11ce";
const BOB = "0xb0b";

describe("ValueHost", () => {
  let host: ValueHost;

  beforeEach(() => {
    host = new ValueHost();
    host.fund(POOL, 1000n);
  });

  // ─── Funding ────────────────────────────────────────────────────────

  describe("fund", () => {
    it("creates holdings", () => {
      expect(host.holdingsOf(POOL)).toBe(1000n);
      expect(host.totalHoldings()).toBe(1000n);
    });

    it("rejects non-positive amounts and the zero party", () => {
      expect(() => host.fund(ALICE, 0n)).toThrow(HostError);
      expect(() => host.fund(ZERO_PARTY, 1n)).toThrow(/Invalid party/);
    });
  });

  describe("construction", () => {
    it("rejects a non-positive call depth", () => {
      expect(() => new ValueHost({ maxCallDepth: 0 })).toThrow(/maxCallDepth/);
    });
  });

  // ─── Plain transfers ────────────────────────────────────────────────

  describe("transfer without a receiver", () => {
    it("moves value and records the transfer", () => {
      expect(host.transfer(POOL, ALICE, 400n)).toEqual({ ok: true });
      expect(host.holdingsOf(POOL)).toBe(600n);
      expect(host.holdingsOf(ALICE)).toBe(400n);
      expect(host.transfers()).toEqual([
        { sequence: 1, from: POOL, to: ALICE, amount: 400n, depth: 1, ok: true },
      ]);
    });

    it("fails with INSUFFICIENT_FUNDS without moving value", () => {
      expect(host.transfer(POOL, ALICE, 1001n)).toEqual({ ok: false, reason: "INSUFFICIENT_FUNDS" });
      expect(host.holdingsOf(POOL)).toBe(1000n);
    });

    it("fails for zero amounts and the zero party", () => {
      expect(host.transfer(POOL, ALICE, 0n)).toEqual({ ok: false, reason: "INVALID_AMOUNT" });
      expect(host.transfer(POOL, ZERO_PARTY, 1n)).toEqual({ ok: false, reason: "INVALID_PARTY" });
    });
  });

  // ─── Receivers ──────────────────────────────────────────────────────

  describe("transfer with a receiver", () => {
    it("runs the hook after value has moved", () => {
      const seen: bigint[] = [];
      host.register(ALICE, {
        onReceive: () => {
          seen.push(host.holdingsOf(ALICE));
        },
      });

      host.transfer(POOL, ALICE, 250n);
      expect(seen).toEqual([250n]);
    });

    it("passes sender and amount to the hook", () => {
      const onReceive = vi.fn().mockReturnValue(true);
      host.register(ALICE, { onReceive });

      host.transfer(POOL, ALICE, 10n);
      expect(onReceive).toHaveBeenCalledWith(POOL, 10n);
    });

    it("undoes the movement when the hook returns false", () => {
      host.register(ALICE, { onReceive: () => false });

      expect(host.transfer(POOL, ALICE, 100n)).toEqual({ ok: false, reason: "RECEIVER_REJECTED" });
      expect(host.holdingsOf(POOL)).toBe(1000n);
      expect(host.holdingsOf(ALICE)).toBe(0n);
    });

    it("undoes the movement and carries the cause when the hook throws", () => {
      const boom = new Error("not accepting");
      host.register(ALICE, {
        onReceive: () => {
          throw boom;
        },
      });

      const outcome = host.transfer(POOL, ALICE, 100n);
      expect(outcome).toEqual({ ok: false, reason: "RECEIVER_THREW", cause: boom });
      expect(host.holdingsOf(ALICE)).toBe(0n);
    });

    it("refuses to undo a rejection after the receiver spent the value", () => {
      host.register(ALICE, {
        onReceive: () => {
          host.transfer(ALICE, BOB, 100n);
          return false;
        },
      });

      expect(() => host.transfer(POOL, ALICE, 100n)).toThrow(/cannot be undone/);
    });

    it("rejects a second receiver for the same party", () => {
      host.register(ALICE, { onReceive: () => true });
      expect(() => host.register(ALICE, { onReceive: () => true })).toThrow(/already has a receiver/);
    });

    it("unregister removes the hook", () => {
      host.register(ALICE, { onReceive: () => false });
      expect(host.unregister(ALICE)).toBe(true);
      expect(host.transfer(POOL, ALICE, 1n)).toEqual({ ok: true });
    });
  });

  // ─── Re-entry ───────────────────────────────────────────────────────

  describe("nested transfers", () => {
    it("lets a hook call back into the sender before the outer transfer returns", () => {
      const depths: number[] = [];
      host.register(ALICE, {
        onReceive: () => {
          depths.push(host.currentDepth);
          if (host.holdingsOf(POOL) >= 100n) {
            host.transfer(POOL, ALICE, 100n);
          }
        },
      });

      host.transfer(POOL, ALICE, 100n);

      expect(depths).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(host.holdingsOf(ALICE)).toBe(1000n);
      expect(host.currentDepth).toBe(0);
    });

    it("records nested transfers before the transfer that triggered them", () => {
      host.register(ALICE, {
        onReceive: (_from, amount) => {
          if (amount === 300n) host.transfer(POOL, ALICE, 200n);
        },
      });

      host.transfer(POOL, ALICE, 300n);
      expect(host.transfers().map((r) => [r.amount, r.depth])).toEqual([
        [200n, 2],
        [300n, 1],
      ]);
    });

    it("fails transfers beyond the configured call depth", () => {
      const shallow = new ValueHost({ maxCallDepth: 3 });
      shallow.fund(POOL, 1000n);
      const outcomes: string[] = [];
      shallow.register(ALICE, {
        onReceive: () => {
          const outcome = shallow.transfer(POOL, ALICE, 1n);
          outcomes.push(outcome.ok ? "ok" : outcome.reason);
        },
      });

      shallow.transfer(POOL, ALICE, 1n);
      expect(outcomes).toEqual(["CALL_DEPTH_EXCEEDED", "ok", "ok"]);
      expect(shallow.holdingsOf(ALICE)).toBe(3n);
    });

    it("conserves total holdings across nested transfers", () => {
      host.register(ALICE, {
        onReceive: () => {
          if (host.holdingsOf(POOL) >= 50n) host.transfer(POOL, ALICE, 50n);
        },
      });

      host.transfer(POOL, ALICE, 50n);
      expect(host.totalHoldings()).toBe(1000n);
      expect(host.transfers({ to: ALICE })).toHaveLength(20);
    });
  });
});
