/**
 * ReentrancyAttacker — receiver that calls back into the vault paying it.
 *
 * Lifecycle of one attack:
 *
 *   controller ──stake──► attacker ──deposit──► target
 *   target ──withdraw──► attacker.onReceive ──withdraw──► target ──► ...
 *
 * Each payout from the target runs onReceive, which withdraws the stake
 * again while the target's pool can still cover it. A safe target refuses
 * the nested call; the refusal is recorded and the outer payout completes.
 */

import { randomUUID } from "node:crypto";
import type { Amount, Party } from "@custody/types";
import type { EventStore } from "@custody/event-store";
import type { ValueHost, ValueReceiver } from "@custody/host";
import { VaultError } from "@custody/vault";
import type { WithdrawalTarget } from "@custody/vault";
import type { AttackReport, AttackerConfig, ReentryObservation } from "./types.js";

const DEFAULT_MAX_REENTRIES = 32;

export class ReentrancyAttacker implements ValueReceiver {
  readonly address: Party;
  readonly controller: Party;
  private readonly target: WithdrawalTarget;
  private readonly host: ValueHost;
  private readonly maxReentries: number;
  private readonly events: EventStore | undefined;

  private stake: Amount = 0n;
  private attacking = false;
  private reentries = 0;
  private rejections: string[] = [];
  private observations: ReentryObservation[] = [];
  private attackSeq = 0;

  constructor(config: AttackerConfig) {
    this.address = config.address;
    this.controller = config.controller;
    this.target = config.target;
    this.host = config.host;
    this.maxReentries = config.maxReentries ?? DEFAULT_MAX_REENTRIES;
    this.events = config.events;
    this.host.register(this.address, this);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Receive hook
  // ───────────────────────────────────────────────────────────────────────

  onReceive(from: Party, _amount: Amount): boolean {
    if (!this.attacking || from !== this.target.address) return true;
    if (this.reentries >= this.maxReentries) return true;

    const poolHoldings = this.host.holdingsOf(this.target.address);
    if (poolHoldings < this.stake) return true;

    this.reentries++;
    this.observations.push({
      reentry: this.reentries,
      targetTotal: this.target.total(),
      attackerBalance: this.target.balanceOf(this.address),
      poolHoldings,
    });

    try {
      this.target.withdraw(this.address, this.stake);
    } catch (err) {
      if (!(err instanceof VaultError)) throw err;
      this.rejections.push(err.code);
    }
    return true;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Controller operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Fund the attacker with `stake`, deposit it into the target, and
   * withdraw it with re-entry armed.
   */
  attack(caller: Party, stake: Amount): AttackReport {
    this.requireController(caller);
    if (stake <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Stake must be positive, got ${stake.toString()}`);
    }

    const poolBefore = this.host.holdingsOf(this.target.address);
    const funding = this.host.transfer(this.controller, this.address, stake);
    if (!funding.ok) {
      throw new VaultError(
        "TRANSFER_FAILED",
        `Controller could not fund a stake of ${stake.toString()}: ${funding.reason}`,
        { cause: funding.cause },
      );
    }
    const holdingsBefore = this.host.holdingsOf(this.address);

    this.target.deposit(this.address, stake);

    this.stake = stake;
    this.reentries = 0;
    this.rejections = [];
    this.observations = [];
    this.attacking = true;
    try {
      this.target.withdraw(this.address, stake);
    } finally {
      this.attacking = false;
    }

    const poolAfter = this.host.holdingsOf(this.target.address);
    const gained = this.host.holdingsOf(this.address) - holdingsBefore;
    const report: AttackReport = {
      stake,
      poolBefore,
      poolAfter,
      stolen: gained > 0n ? gained : 0n,
      reentries: this.reentries,
      rejections: [...this.rejections],
      observations: [...this.observations],
      drained: poolAfter < this.target.total(),
    };
    this.record(caller, report);
    return report;
  }

  /**
   * Move everything the attacker holds to the controller.
   */
  collectStolenFunds(caller: Party): Amount {
    this.requireController(caller);
    const holdings = this.host.holdingsOf(this.address);
    if (holdings === 0n) {
      throw new VaultError("NOTHING_TO_WITHDRAW", `Attacker "${this.address}" holds nothing`);
    }
    const outcome = this.host.transfer(this.address, this.controller, holdings);
    if (!outcome.ok) {
      throw new VaultError(
        "TRANSFER_FAILED",
        `Collecting ${holdings.toString()} failed: ${outcome.reason}`,
        { cause: outcome.cause },
      );
    }
    return holdings;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private requireController(caller: Party): void {
    if (caller !== this.controller) {
      throw new VaultError("UNAUTHORIZED", `"${caller}" does not control attacker "${this.address}"`);
    }
  }

  private record(caller: Party, report: AttackReport): void {
    if (this.events === undefined) return;
    this.attackSeq++;
    this.events.append(this.address, [
      {
        type: "adversary.attack_completed",
        metadata: {
          eventId: randomUUID(),
          timestamp: new Date().toISOString(),
          actor: caller,
          correlationId: `${this.address}:attack-${String(this.attackSeq)}`,
          source: "adversary",
        },
        payload: {
          target: this.target.address,
          stake: report.stake.toString(),
          stolen: report.stolen.toString(),
          reentries: report.reentries,
          rejections: report.rejections,
          drained: report.drained,
        },
      },
    ]);
  }
}
