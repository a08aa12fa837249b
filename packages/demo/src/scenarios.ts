/**
 * Walkthrough scenarios.
 *
 * Each scenario builds its own host and vault from the config, runs to
 * completion, and returns what the CLI prints. Nothing here writes to
 * the terminal.
 */

import type { Amount, Party } from "@custody/types";
import type { EventStore } from "@custody/event-store";
import { ValueHost } from "@custody/host";
import { SecureVault, VaultError, VulnerableVault } from "@custody/vault";
import type { VaultErrorCode, VaultStats, WithdrawalReceipt, WithdrawalTarget } from "@custody/vault";
import { ReentrancyAttacker } from "@custody/adversary";
import type { AttackReport } from "@custody/adversary";
import { ProfileRegistry } from "@custody/registry";
import type { Profile } from "@custody/registry";
import type { DemoConfig } from "./config.js";

export const PARTIES = {
  vault: "0xva017",
  owner: "0x0wner",
  alice: "0xa11ce",
  victim: "0xv1c71m",
  attacker: "0xa77ac4",
  controller: "0xc0n7r01",
} as const satisfies Record<string, Party>;

type ScenarioConfig = Pick<
  DemoConfig,
  "VAULT_MIN_DEPOSIT" | "VAULT_MAX_DEPOSIT" | "HOST_MAX_CALL_DEPTH" | "VICTIM_DEPOSIT" | "ATTACK_STAKE"
>;

function createHost(config: ScenarioConfig): ValueHost {
  return new ValueHost({ maxCallDepth: config.HOST_MAX_CALL_DEPTH });
}

function createSecureVault(config: ScenarioConfig, host: ValueHost, events: EventStore): SecureVault {
  return new SecureVault(
    {
      address: PARTIES.vault,
      owner: PARTIES.owner,
      minDeposit: config.VAULT_MIN_DEPOSIT,
      ...(config.VAULT_MAX_DEPOSIT !== undefined ? { maxDeposit: config.VAULT_MAX_DEPOSIT } : {}),
    },
    host,
    events,
  );
}

function codeOf(fn: () => unknown): VaultErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof VaultError) return err.code;
    throw err;
  }
  return undefined;
}

// =============================================================================
// Deposit / withdraw
// =============================================================================

export interface BasicFlowResult {
  readonly afterDeposit: { readonly balance: Amount; readonly total: Amount };
  readonly withdrawal: WithdrawalReceipt;
  /** Code of the over-withdrawal attempt */
  readonly overdraft: VaultErrorCode | undefined;
  readonly stats: VaultStats;
}

/**
 * Deposit `deposit`, withdraw `withdraw`, then try to withdraw `deposit` again.
 */
export function runBasicFlow(
  config: ScenarioConfig,
  events: EventStore,
  deposit: Amount = 1000n,
  withdraw: Amount = 400n,
): BasicFlowResult {
  const host = createHost(config);
  host.fund(PARTIES.alice, deposit);
  const vault = createSecureVault(config, host, events);

  vault.deposit(PARTIES.alice, deposit);
  const afterDeposit = { balance: vault.balanceOf(PARTIES.alice), total: vault.total() };
  const withdrawal = vault.withdraw(PARTIES.alice, withdraw);
  const overdraft = codeOf(() => vault.withdraw(PARTIES.alice, deposit));

  return { afterDeposit, withdrawal, overdraft, stats: vault.getVaultStats() };
}

// =============================================================================
// Withdrawal switch
// =============================================================================

export interface ToggleResult {
  readonly whileDisabled: VaultErrorCode | undefined;
  readonly afterReenable: WithdrawalReceipt;
}

export function runToggleScenario(config: ScenarioConfig, events: EventStore): ToggleResult {
  const host = createHost(config);
  host.fund(PARTIES.alice, 100n);
  const vault = createSecureVault(config, host, events);
  vault.deposit(PARTIES.alice, 100n);

  vault.setWithdrawalsEnabled(PARTIES.owner, false);
  const whileDisabled = codeOf(() => vault.withdraw(PARTIES.alice, 10n));
  vault.setWithdrawalsEnabled(PARTIES.owner, true);

  return { whileDisabled, afterReenable: vault.withdraw(PARTIES.alice, 10n) };
}

// =============================================================================
// Re-entrancy attack
// =============================================================================

export type VaultKind = "secure" | "vulnerable";

export interface AttackScenarioResult {
  readonly kind: VaultKind;
  readonly report: AttackReport;
  /** What the victim's ledger entry says it is owed */
  readonly victimBalance: Amount;
  readonly ledgerTotal: Amount;
  readonly attackerHoldings: Amount;
}

/**
 * A victim deposits, then the attacker runs one attack with its stake.
 */
export function runAttackScenario(
  kind: VaultKind,
  config: ScenarioConfig,
  events: EventStore,
): AttackScenarioResult {
  const host = createHost(config);
  host.fund(PARTIES.victim, config.VICTIM_DEPOSIT);
  host.fund(PARTIES.controller, config.ATTACK_STAKE);

  const target: WithdrawalTarget =
    kind === "secure"
      ? createSecureVault(config, host, events)
      : new VulnerableVault({ address: PARTIES.vault }, host);
  target.deposit(PARTIES.victim, config.VICTIM_DEPOSIT);

  const attacker = new ReentrancyAttacker({
    address: PARTIES.attacker,
    controller: PARTIES.controller,
    target,
    host,
    events,
  });
  const report = attacker.attack(PARTIES.controller, config.ATTACK_STAKE);

  return {
    kind,
    report,
    victimBalance: target.balanceOf(PARTIES.victim),
    ledgerTotal: target.total(),
    attackerHoldings: host.holdingsOf(PARTIES.attacker),
  };
}

// =============================================================================
// Registry
// =============================================================================

export function runRegistryScenario(events: EventStore): Profile {
  const registry = new ProfileRegistry(events);
  registry.register(PARTIES.alice, { name: "Alice", age: 34, email: "alice@example.test" });
  return registry.update(PARTIES.alice, { age: 35 });
}
