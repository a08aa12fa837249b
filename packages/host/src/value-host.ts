/**
 * Value Host
 *
 * In-memory execution environment that custodies native value for
 * every party and implements the transfer primitive.
 *
 * Design rules:
 * - Value moves before the receiver's hook runs, so the hook observes
 *   its new holdings and may spend them or call back into the sender
 * - A hook that throws or returns false rejects the transfer; the
 *   value movement of that transfer is undone
 * - Transfers nest: the hook may trigger further transfers, bounded
 *   by maxCallDepth
 * - Total holdings only change through fund()
 */

import type { Amount, Party } from "@custody/types";
import { isParty } from "@custody/types";
import type {
  TransferFailureReason,
  TransferOutcome,
  TransferPrimitive,
  TransferRecord,
  ValueHostOptions,
  ValueReceiver,
} from "./types.js";
import { HostError } from "./types.js";

const DEFAULT_MAX_CALL_DEPTH = 64;

export class ValueHost implements TransferPrimitive {
  private readonly holdings: Map<Party, Amount> = new Map();
  private readonly receivers: Map<Party, ValueReceiver> = new Map();
  private readonly records: TransferRecord[] = [];
  private readonly maxCallDepth: number;
  private depth = 0;
  private sequence = 0;

  constructor(options?: ValueHostOptions) {
    const maxCallDepth = options?.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    if (!Number.isInteger(maxCallDepth) || maxCallDepth < 1) {
      throw new HostError(
        "INVALID_CONFIG",
        `maxCallDepth must be a positive integer, got ${String(maxCallDepth)}`,
      );
    }
    this.maxCallDepth = maxCallDepth;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Setup
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create value out of nothing and give it to a party.
   * This is the only way total holdings grow.
   */
  fund(party: Party, amount: Amount): Amount {
    this.assertParty(party);
    if (amount <= 0n) {
      throw new HostError("INVALID_AMOUNT", `Funding amount must be positive, got ${amount.toString()}`);
    }
    const next = this.holdingsOf(party) + amount;
    this.holdings.set(party, next);
    return next;
  }

  /**
   * Attach receive-hook code to a party.
   * Throws if the party already has a receiver.
   */
  register(party: Party, receiver: ValueReceiver): void {
    this.assertParty(party);
    if (this.receivers.has(party)) {
      throw new HostError("RECEIVER_EXISTS", `Party "${party}" already has a receiver`);
    }
    this.receivers.set(party, receiver);
  }

  unregister(party: Party): boolean {
    return this.receivers.delete(party);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transfer primitive
  // ───────────────────────────────────────────────────────────────────────

  transfer(from: Party, to: Party, amount: Amount): TransferOutcome {
    if (amount <= 0n) {
      return this.fail(from, to, amount, "INVALID_AMOUNT");
    }
    if (!isParty(from) || !isParty(to)) {
      return this.fail(from, to, amount, "INVALID_PARTY");
    }
    if (this.depth >= this.maxCallDepth) {
      return this.fail(from, to, amount, "CALL_DEPTH_EXCEEDED");
    }
    if (this.holdingsOf(from) < amount) {
      return this.fail(from, to, amount, "INSUFFICIENT_FUNDS");
    }

    this.move(from, to, amount);

    const receiver = this.receivers.get(to);
    if (receiver === undefined) {
      return this.succeed(from, to, amount, this.depth + 1);
    }

    this.depth++;
    const depth = this.depth;
    let outcome: TransferOutcome;
    try {
      const accepted = receiver.onReceive(from, amount);
      outcome = accepted === false
        ? { ok: false, reason: "RECEIVER_REJECTED" }
        : { ok: true };
    } catch (err) {
      outcome = { ok: false, reason: "RECEIVER_THREW", cause: err };
    } finally {
      this.depth--;
    }

    if (outcome.ok) {
      return this.succeed(from, to, amount, depth);
    }

    if (this.holdingsOf(to) < amount) {
      throw new HostError(
        "UNREVERTIBLE_TRANSFER",
        `Receiver "${to}" rejected ${amount.toString()} after spending it; transfer cannot be undone`,
      );
    }
    this.move(to, from, amount);
    this.record(from, to, amount, depth, outcome.reason);
    return outcome;
  }

  holdingsOf(party: Party): Amount {
    return this.holdings.get(party) ?? 0n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Observation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Transfer attempts in resolution order, optionally filtered.
   */
  transfers(filter?: { readonly from?: Party; readonly to?: Party }): readonly TransferRecord[] {
    return this.records.filter(
      (r) =>
        (filter?.from === undefined || r.from === filter.from) &&
        (filter?.to === undefined || r.to === filter.to),
    );
  }

  /** Nesting depth of the transfer currently running its receiver (0 = none). */
  get currentDepth(): number {
    return this.depth;
  }

  totalHoldings(): Amount {
    let sum = 0n;
    for (const amount of this.holdings.values()) {
      sum += amount;
    }
    return sum;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private move(from: Party, to: Party, amount: Amount): void {
    this.holdings.set(from, this.holdingsOf(from) - amount);
    this.holdings.set(to, this.holdingsOf(to) + amount);
  }

  private succeed(from: Party, to: Party, amount: Amount, depth: number): TransferOutcome {
    this.record(from, to, amount, depth);
    return { ok: true };
  }

  private fail(
    from: Party,
    to: Party,
    amount: Amount,
    reason: TransferFailureReason,
  ): TransferOutcome {
    this.record(from, to, amount, this.depth + 1, reason);
    return { ok: false, reason };
  }

  private record(
    from: Party,
    to: Party,
    amount: Amount,
    depth: number,
    reason?: TransferFailureReason,
  ): void {
    this.sequence++;
    this.records.push({
      sequence: this.sequence,
      from,
      to,
      amount,
      depth,
      ok: reason === undefined,
      ...(reason !== undefined ? { reason } : {}),
    });
  }

  private assertParty(party: Party): void {
    if (!isParty(party)) {
      throw new HostError("INVALID_PARTY", `Invalid party: "${party}"`);
    }
  }
}
