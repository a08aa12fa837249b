/**
 * @custody/vault — Custody vault safe against re-entrant withdrawal.
 *
 * Four parts:
 * - Ledger: per-party balances via @custody/ledger
 * - Access: single owner gating administration and emergency drains
 * - Policy: deposit/withdrawal switches and deposit bounds
 * - Withdrawal: checks → ledger effects → external transfer
 *
 * Design rules:
 * - Every operation names its caller explicitly
 * - No value leaves the vault before the ledger reflects it
 * - A failed operation leaves no partial state and emits nothing
 * - All state is snapshot-able and restorable
 */

// Vaults
export { SecureVault } from "./secure-vault.js";
export { VulnerableVault } from "./vulnerable-vault.js";
export type { VulnerableVaultConfig } from "./vulnerable-vault.js";

// Subsystems
export { AccessControl } from "./access-control.js";
export type { OwnershipChange } from "./access-control.js";
export { FeaturePolicy } from "./policy.js";
export { WithdrawalRun, executeWithdrawal } from "./withdrawal.js";
export type { WithdrawalPlan } from "./withdrawal.js";
export {
  enforce,
  validParty,
  featureEnabled,
  positiveAmount,
  withinBounds,
  validRange,
  sufficientBalance,
  solvent,
  nonZero,
} from "./checks.js";
export type { Check, CheckFailure } from "./checks.js";

// Errors
export { VaultError, withLedger } from "./errors.js";
export type { VaultErrorCode, VaultErrorOptions } from "./errors.js";

// Events
export { VAULT_EVENTS, VaultEventEmitter } from "./events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  DepositPayload,
  WithdrawalPayload,
  EmergencyWithdrawalPayload,
  OwnershipTransferredPayload,
  ToggledPayload,
  LimitsUpdatedPayload,
} from "./events.js";

// Types
export type {
  VaultConfig,
  PolicyState,
  WithdrawalPhase,
  WithdrawalReceipt,
  DepositReceipt,
  VaultStats,
  WithdrawalTarget,
  VaultSnapshot,
} from "./types.js";
