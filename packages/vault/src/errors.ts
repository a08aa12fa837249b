/**
 * Vault errors.
 *
 * Every failed vault operation throws a VaultError carrying one of the
 * codes below. Ledger failures raised mid-operation are re-thrown with
 * the same code and the original error as `cause`.
 */

import { LedgerError } from "@custody/ledger";
import type { LedgerErrorCode } from "@custody/ledger";
import type { WithdrawalPhase } from "./types.js";

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_ADDRESS"
  | "INVALID_RANGE"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "TRANSFER_FAILED"
  | "NOTHING_TO_WITHDRAW"
  | "FEATURE_DISABLED"
  | "AMOUNT_OUT_OF_BOUNDS"
  | "INVALID_WIDTH"
  | "INVALID_SNAPSHOT";

export interface VaultErrorOptions {
  readonly cause?: unknown;
  /** Phases a withdrawal passed through before failing */
  readonly phases?: readonly WithdrawalPhase[];
}

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly phases: readonly WithdrawalPhase[] | undefined;

  constructor(code: VaultErrorCode, message: string, options?: VaultErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "VaultError";
    this.code = code;
    this.phases = options?.phases;
  }
}

const LEDGER_TO_VAULT: Readonly<Record<LedgerErrorCode, VaultErrorCode>> = {
  INVALID_AMOUNT: "INVALID_AMOUNT",
  INVALID_PARTY: "INVALID_ADDRESS",
  INSUFFICIENT_BALANCE: "INSUFFICIENT_BALANCE",
  ARITHMETIC_OVERFLOW: "ARITHMETIC_OVERFLOW",
  ARITHMETIC_UNDERFLOW: "ARITHMETIC_UNDERFLOW",
  INVALID_WIDTH: "INVALID_WIDTH",
  INVALID_SNAPSHOT: "INVALID_SNAPSHOT",
};

/**
 * Run a ledger mutation, translating LedgerError into VaultError.
 */
export function withLedger<T>(mutation: () => T): T {
  try {
    return mutation();
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new VaultError(LEDGER_TO_VAULT[err.code], err.message, { cause: err });
    }
    throw err;
  }
}
