/**
 * Vault notifications.
 *
 * Each vault writes to its own stream (keyed by its address) in an
 * EventStore. Events are emitted only after the mutation they describe
 * has committed; a failed operation emits nothing.
 */

import { randomUUID } from "node:crypto";
import type { EventStore, StoredEvent } from "@custody/event-store";
import type { DomainEvent, Party } from "@custody/types";

export const VAULT_EVENTS = {
  DEPOSIT: "vault.deposit",
  WITHDRAWAL: "vault.withdrawal",
  EMERGENCY_WITHDRAWAL: "vault.emergency_withdrawal",
  OWNERSHIP_TRANSFERRED: "vault.ownership_transferred",
  DEPOSITS_TOGGLED: "vault.deposits_toggled",
  WITHDRAWALS_TOGGLED: "vault.withdrawals_toggled",
  LIMITS_UPDATED: "vault.limits_updated",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

export type DepositPayload = {
  readonly party: Party;
  readonly amount: string;
  readonly newBalance: string;
};

export type WithdrawalPayload = {
  readonly party: Party;
  readonly amount: string;
  readonly newBalance: string;
};

export type EmergencyWithdrawalPayload = {
  readonly owner: Party;
  readonly amount: string;
  readonly remainingTotal: string;
};

export type OwnershipTransferredPayload = {
  readonly previousOwner: Party;
  readonly newOwner: Party;
};

export type ToggledPayload = {
  readonly enabled: boolean;
};

export type LimitsUpdatedPayload = {
  readonly minDeposit: string;
  readonly maxDeposit: string;
};

export interface VaultEventPayloads {
  readonly "vault.deposit": DepositPayload;
  readonly "vault.withdrawal": WithdrawalPayload;
  readonly "vault.emergency_withdrawal": EmergencyWithdrawalPayload;
  readonly "vault.ownership_transferred": OwnershipTransferredPayload;
  readonly "vault.deposits_toggled": ToggledPayload;
  readonly "vault.withdrawals_toggled": ToggledPayload;
  readonly "vault.limits_updated": LimitsUpdatedPayload;
}

/**
 * Writes typed vault events to one stream of an EventStore.
 */
export class VaultEventEmitter {
  private readonly store: EventStore;
  private readonly streamId: string;
  private operationSeq = 0;

  constructor(store: EventStore, streamId: string) {
    this.store = store;
    this.streamId = streamId;
  }

  /**
   * Allocate a correlation ID for one top-level operation call.
   * Re-entrant calls get their own.
   */
  nextCorrelationId(): string {
    this.operationSeq++;
    return `${this.streamId}:op-${String(this.operationSeq)}`;
  }

  emit<K extends VaultEventType>(
    type: K,
    actor: Party,
    correlationId: string,
    payload: VaultEventPayloads[K],
  ): void {
    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor,
        correlationId,
        source: "vault",
      },
      payload,
    };
    this.store.append(this.streamId, [event]);
  }

  history(type?: VaultEventType): readonly StoredEvent[] {
    return this.store.read(this.streamId, type !== undefined ? { type } : undefined);
  }
}
