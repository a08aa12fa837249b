/**
 * Adversary Types
 */

import type { Amount, Party } from "@custody/types";
import type { EventStore } from "@custody/event-store";
import type { ValueHost } from "@custody/host";
import type { WithdrawalTarget } from "@custody/vault";

export interface AttackerConfig {
  /** Host identity of the attacker; its receive hook re-enters the target */
  readonly address: Party;

  /** The only party allowed to launch attacks and collect proceeds */
  readonly controller: Party;

  readonly target: WithdrawalTarget;

  readonly host: ValueHost;

  /** Upper bound on nested calls per attack. Default: 32 */
  readonly maxReentries?: number;

  /** Where attack summaries are recorded, if anywhere */
  readonly events?: EventStore;
}

/**
 * What the attacker saw at the moment it re-entered.
 */
export interface ReentryObservation {
  /** 1-based index of the re-entry within the attack */
  readonly reentry: number;
  readonly targetTotal: Amount;
  readonly attackerBalance: Amount;
  readonly poolHoldings: Amount;
}

export interface AttackReport {
  readonly stake: Amount;
  /** Target pool holdings before the stake was deposited */
  readonly poolBefore: Amount;
  readonly poolAfter: Amount;
  /** Value received beyond the stake */
  readonly stolen: Amount;
  readonly reentries: number;
  /** Error codes of nested calls the target refused */
  readonly rejections: readonly string[];
  readonly observations: readonly ReentryObservation[];
  /** The pool ends up holding less than the target's ledger owes */
  readonly drained: boolean;
}
